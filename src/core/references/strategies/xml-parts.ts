/**
 * Structured passes over the XML parts of an artifact, with per-part text fallback.
 */

import type { Artifact } from '../../artifacts/artifact.js';
import { parseXml, serializeXml } from '../../artifacts/xml.js';
import { errorMessage } from '../../errors.js';
import { getLogger } from '../../logger.js';

/** Part names that hold XML. */
export function isXmlPart(name: string): boolean {
  return /\.xml$/i.test(name);
}

/** Counts of parts handled by the structured pass and by the text fallback. */
export interface PartRewriteResult {
  structured: number;
  fallback: number;
}

/**
 * Whether any selected part matches: parsed parts are tested with `test`,
 * parts that fail to parse with `fallback` on their raw text.
 */
export function scanXmlParts(
  artifact: Artifact,
  select: (partName: string) => boolean,
  test: (doc: Document) => boolean,
  fallback: (text: string) => boolean,
): boolean {
  for (const part of artifact.textParts(select)) {
    const source = part.name || artifact.path;
    let doc: Document;
    try {
      doc = parseXml(part.text, source);
    } catch (err) {
      getLogger('references').debug({ file: artifact.path, part: part.name, err: errorMessage(err) }, 'XML scan fell back to text');
      if (fallback(part.text)) return true;
      continue;
    }
    if (test(doc)) return true;
  }
  return false;
}

/**
 * Rewrite the selected parts: parsed parts through `rewrite` (returns whether
 * the document changed), parts that fail to parse through `fallback`.
 */
export function rewriteXmlParts(
  artifact: Artifact,
  select: (partName: string) => boolean,
  rewrite: (doc: Document) => boolean,
  fallback: (text: string) => string,
): PartRewriteResult {
  const result: PartRewriteResult = { structured: 0, fallback: 0 };
  for (const part of artifact.textParts(select)) {
    const source = part.name || artifact.path;
    let doc: Document;
    try {
      doc = parseXml(part.text, source);
    } catch (err) {
      getLogger('references').warn({ file: artifact.path, part: part.name, err: errorMessage(err) }, 'XML update fell back to text substitution');
      const next = fallback(part.text);
      if (next !== part.text) {
        artifact.replacePart(part.name, next);
        result.fallback++;
      }
      continue;
    }
    if (rewrite(doc)) {
      artifact.replacePart(part.name, serializeXml(doc));
      result.structured++;
    }
  }
  return result;
}
