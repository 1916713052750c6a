/**
 * Workbooks: shared-string scan only. Cells are never rewritten; a match is
 * reported for a manual check.
 */

import { Artifact } from '../../artifacts/artifact.js';
import { NameMatcher } from '../matching.js';
import { artifactMentions } from './text.js';
import type { ReferenceStrategy, StrategyUpdate } from '../strategy.js';

/** Workbook parts that hold cell text. */
function isCellTextPart(name: string): boolean {
  return name === '' || name === 'xl/sharedStrings.xml' || /^xl\/worksheets\/[^/]+\.xml$/.test(name);
}

export const spreadsheetStrategy: ReferenceStrategy = {
  name: 'spreadsheet',

  async references(filePath: string, targetFileName: string): Promise<boolean> {
    const artifact = await Artifact.open(filePath);
    return artifactMentions(artifact, new NameMatcher(targetFileName), isCellTextPart);
  },

  async update(): Promise<StrategyUpdate> {
    return { method: 'manual', changed: false, manual: true };
  },
};
