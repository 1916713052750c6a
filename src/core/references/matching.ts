/**
 * Filename matching and substitution.
 *
 * A target is matched by its full name (`ctrl_v1.slx`) or by its base name
 * (`ctrl_v1`), both only at identifier boundaries: `ctrl_v1` does not match
 * inside `ctrl_v10` or `my_ctrl_v1`. A base name followed by another
 * extension (`ctrl_v1.mat`) names a different file and is not matched.
 */

import { splitFileName } from '../project/file-types.js';

/** Options for building a matcher. */
export interface MatchOptions {
  /** Compare case-insensitively (block parameters are). Default: false. */
  ignoreCase?: boolean;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Characters that continue an identifier. */
const IDENT = 'A-Za-z0-9_';

export class NameMatcher {
  readonly fileName: string;
  readonly baseName: string;
  private readonly fullPattern: RegExp;
  private readonly basePattern: RegExp;

  constructor(fileName: string, options?: MatchOptions) {
    this.fileName = fileName;
    this.baseName = splitFileName(fileName).base;
    const flags = options?.ignoreCase ? 'gi' : 'g';
    this.fullPattern = new RegExp(`(?<![${IDENT}])${escapeRegExp(fileName)}(?![${IDENT}])`, flags);
    this.basePattern = new RegExp(
      `(?<![${IDENT}])${escapeRegExp(this.baseName)}(?![${IDENT}])(?!\\.[A-Za-z0-9])`,
      flags,
    );
  }

  /** Whether text mentions the target by full or base name. */
  matches(text: string): boolean {
    this.fullPattern.lastIndex = 0;
    this.basePattern.lastIndex = 0;
    return this.fullPattern.test(text) || (this.baseName !== '' && this.basePattern.test(text));
  }

  /**
   * Replace every mention of the target: full names become `newFileName`,
   * then remaining base-name mentions become the new base name.
   */
  replace(text: string, newFileName: string): string {
    const newBase = splitFileName(newFileName).base;
    const withFullNames = text.replace(this.fullPattern, () => newFileName);
    if (this.baseName === '') return withFullNames;
    return withFullNames.replace(this.basePattern, () => newBase);
  }
}
