/**
 * Data dictionaries: entry scan and substitution in string entry values.
 *
 * Entry values are the leaf text of the dictionary's XML parts; element
 * names and attributes (entry names, types, GUIDs) are left alone.
 */

import { Artifact } from '../../artifacts/artifact.js';
import { allElements, elementText, isLeafElement, rewriteElementText } from '../../artifacts/xml.js';
import { NameMatcher } from '../matching.js';
import { isXmlPart, rewriteXmlParts, scanXmlParts } from './xml-parts.js';
import type { ReferenceStrategy, StrategyUpdate } from '../strategy.js';

function entryValues(doc: Document): Element[] {
  return allElements(doc).filter(isLeafElement);
}

/** Plain dictionaries have a single unnamed part; packaged ones are scanned by XML part. */
function isDictionaryPart(name: string): boolean {
  return name === '' || isXmlPart(name);
}

export const dictionaryStrategy: ReferenceStrategy = {
  name: 'data-dictionary',

  async references(filePath: string, targetFileName: string): Promise<boolean> {
    const artifact = await Artifact.open(filePath);
    const matcher = new NameMatcher(targetFileName);
    return scanXmlParts(
      artifact,
      isDictionaryPart,
      (doc) => entryValues(doc).some((element) => matcher.matches(elementText(element))),
      (text) => matcher.matches(text),
    );
  },

  async update(filePath: string, oldFileName: string, newFileName: string): Promise<StrategyUpdate> {
    const artifact = await Artifact.open(filePath);
    const matcher = new NameMatcher(oldFileName);
    const rewrite = (value: string): string => matcher.replace(value, newFileName);

    const result = rewriteXmlParts(
      artifact,
      isDictionaryPart,
      (doc) => {
        let changed = false;
        for (const element of entryValues(doc)) {
          if (rewriteElementText(element, rewrite)) changed = true;
        }
        return changed;
      },
      rewrite,
    );
    const method = result.structured === 0 && result.fallback > 0 ? 'text' : 'dictionary-entries';
    return { method, changed: await artifact.save() };
  },
};
