/**
 * Strategy table keyed by file type.
 */

import type { FileKind } from '../../types/project.js';
import type { ReferenceStrategy } from './strategy.js';
import { modelStrategy } from './strategies/model.js';
import { textStrategy } from './strategies/text.js';
import { dictionaryStrategy } from './strategies/dictionary.js';
import { linkSetStrategy } from './strategies/link-set.js';
import { spreadsheetStrategy } from './strategies/spreadsheet.js';

const STRATEGIES: Readonly<Record<FileKind, ReferenceStrategy>> = {
  'model': modelStrategy,
  'library': modelStrategy,
  'script': textStrategy,
  'data-dictionary': dictionaryStrategy,
  'model-reference-link': linkSetStrategy,
  'requirements': textStrategy,
  'spreadsheet': spreadsheetStrategy,
  'data-archive': textStrategy,
};

/** Strategy for a type tag; files without one get plain text handling. */
export function strategyFor(kind: FileKind | null): ReferenceStrategy {
  return kind === null ? textStrategy : STRATEGIES[kind];
}
