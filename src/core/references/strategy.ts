/**
 * Reference strategy contract.
 *
 * One strategy per file type both discovers references to a filename and
 * rewrites them, so discovery and update never disagree about a type.
 */

/** How a reference update was carried out. */
export type UpdateMethod =
  | 'block-source-path'
  | 'dictionary-entries'
  | 'link-set'
  | 'xml-attributes'
  | 'text'
  | 'manual';

/** Result of one strategy update. */
export interface StrategyUpdate {
  method: UpdateMethod;
  /** Whether the file was rewritten. */
  changed: boolean;
  /** Whether the reference needs a manual check instead of an edit. */
  manual?: boolean;
}

export interface ReferenceStrategy {
  readonly name: string;
  /** Whether the file at `filePath` mentions `targetFileName`. */
  references(filePath: string, targetFileName: string): Promise<boolean>;
  /** Rewrite mentions of `oldFileName` to `newFileName` in the file at `filePath`. */
  update(filePath: string, oldFileName: string, newFileName: string): Promise<StrategyUpdate>;
}
