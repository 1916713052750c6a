/**
 * Simulink models and libraries: block-parameter scan and block source-path substitution.
 *
 * Packaged models (.slx) keep block parameters as `<P Name="SourceBlock">lib/Block</P>`
 * in the XML parts under simulink/. Text models (.mdl) keep them as
 * `SourceBlock "lib/Block"` lines. Names compare case-insensitively.
 */

import { Artifact, PLAIN_PART } from '../../artifacts/artifact.js';
import { elementsByTagName, elementText, rewriteElementText } from '../../artifacts/xml.js';
import { NameMatcher } from '../matching.js';
import { artifactMentions, substituteInArtifact } from './text.js';
import { isXmlPart, rewriteXmlParts, scanXmlParts } from './xml-parts.js';
import type { ReferenceStrategy, StrategyUpdate } from '../strategy.js';

/** Block parameters that name another model, library or library block. */
export const BLOCK_REFERENCE_PARAMS = [
  'SourceBlock',
  'ReferenceBlock',
  'LibraryBlock',
  'ReferencedLibrary',
  'ModelName',
  'ModelNameDialog',
  'ModelFile',
] as const;

const PARAM_NAMES = new Set<string>(BLOCK_REFERENCE_PARAMS);

/** `Param "value"` lines of a text model; value keeps its escapes. */
const MDL_PARAM_LINE = new RegExp(
  `^([ \\t]*)(${BLOCK_REFERENCE_PARAMS.join('|')})([ \\t]+)"((?:[^"\\\\\\n]|\\\\.)*)"`,
  'gm',
);

function isModelPart(name: string): boolean {
  return name.startsWith('simulink/') && isXmlPart(name);
}

function referenceParams(doc: Document): Element[] {
  return elementsByTagName(doc, 'P').filter((p) => PARAM_NAMES.has(p.getAttribute('Name') ?? ''));
}

/** Values of the reference parameters in a text model. */
export function mdlParamValues(text: string): string[] {
  return [...text.matchAll(MDL_PARAM_LINE)].map((match) => match[4] ?? '');
}

function rewriteMdlParams(text: string, rewrite: (value: string) => string): string {
  return text.replace(
    MDL_PARAM_LINE,
    (_line: string, indent: string, param: string, gap: string, value: string) =>
      `${indent}${param}${gap}"${rewrite(value)}"`,
  );
}

/** Whether a packaged model has any block-diagram parts to scan structurally. */
function hasModelParts(artifact: Artifact): boolean {
  return artifact.textParts(isModelPart).length > 0;
}

export const modelStrategy: ReferenceStrategy = {
  name: 'model',

  async references(filePath: string, targetFileName: string): Promise<boolean> {
    const artifact = await Artifact.open(filePath);
    const matcher = new NameMatcher(targetFileName, { ignoreCase: true });

    if (!artifact.packaged) {
      const [part] = artifact.textParts();
      return mdlParamValues(part?.text ?? '').some((value) => matcher.matches(value));
    }
    if (!hasModelParts(artifact)) {
      return artifactMentions(artifact, matcher);
    }
    return scanXmlParts(
      artifact,
      isModelPart,
      (doc) => referenceParams(doc).some((p) => matcher.matches(elementText(p))),
      (text) => matcher.matches(text),
    );
  },

  async update(filePath: string, oldFileName: string, newFileName: string): Promise<StrategyUpdate> {
    const artifact = await Artifact.open(filePath);
    const matcher = new NameMatcher(oldFileName, { ignoreCase: true });
    const rewrite = (value: string): string => matcher.replace(value, newFileName);

    if (!artifact.packaged) {
      const [part] = artifact.textParts();
      artifact.replacePart(PLAIN_PART, rewriteMdlParams(part?.text ?? '', rewrite));
      return { method: 'block-source-path', changed: await artifact.save() };
    }
    if (!hasModelParts(artifact)) {
      substituteInArtifact(artifact, matcher, newFileName);
      return { method: 'text', changed: await artifact.save() };
    }

    const result = rewriteXmlParts(
      artifact,
      isModelPart,
      (doc) => {
        let changed = false;
        for (const p of referenceParams(doc)) {
          if (rewriteElementText(p, rewrite)) changed = true;
        }
        return changed;
      },
      rewrite,
    );
    const method = result.structured === 0 && result.fallback > 0 ? 'text' : 'block-source-path';
    return { method, changed: await artifact.save() };
  },
};
