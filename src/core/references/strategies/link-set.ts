/**
 * Requirement link sets (.slmx): XML attribute scan and a three-step update.
 *
 * 1. Link-set rewrite: artifact URIs (`artifactUri`/`artifact` elements and
 *    `artifactUri` attributes) that tie the link set to its model.
 * 2. When that changes nothing, attribute substitution in `modelReference`
 *    (ModelName, ModelFile, ModelPath) and `ModelInformation` (name).
 * 3. When neither changed anything, or a part is not well-formed XML, text substitution.
 */

import { Artifact } from '../../artifacts/artifact.js';
import {
  allElements,
  elementText,
  elementsByTagName,
  parseXml,
  rewriteAttribute,
  rewriteElementText,
  serializeXml,
} from '../../artifacts/xml.js';
import { errorMessage } from '../../errors.js';
import { getLogger } from '../../logger.js';
import { NameMatcher } from '../matching.js';
import { substituteInArtifact } from './text.js';
import { isXmlPart, scanXmlParts } from './xml-parts.js';
import type { ReferenceStrategy, StrategyUpdate, UpdateMethod } from '../strategy.js';

const MODEL_REFERENCE_ATTRIBUTES = ['ModelName', 'ModelFile', 'ModelPath'] as const;
const ARTIFACT_ELEMENTS = ['artifactUri', 'artifact'] as const;

function isLinkSetPart(name: string): boolean {
  return name === '' || isXmlPart(name);
}

/** Elements with an attribute, paired with that attribute's name. */
function attributeSites(doc: Document): Array<[Element, string]> {
  const sites: Array<[Element, string]> = [];
  for (const ref of elementsByTagName(doc, 'modelReference')) {
    for (const attr of MODEL_REFERENCE_ATTRIBUTES) sites.push([ref, attr]);
  }
  for (const info of elementsByTagName(doc, 'ModelInformation')) {
    sites.push([info, 'name']);
  }
  return sites;
}

function artifactElements(doc: Document): Element[] {
  return ARTIFACT_ELEMENTS.flatMap((tag) => elementsByTagName(doc, tag));
}

function elementsWithArtifactUri(doc: Document): Element[] {
  return allElements(doc).filter((element) => element.hasAttribute('artifactUri'));
}

/** Link-set rewrite of artifact URIs. Returns whether the document changed. */
function rewriteArtifactUris(doc: Document, rewrite: (value: string) => string): boolean {
  let changed = false;
  for (const element of artifactElements(doc)) {
    if (rewriteElementText(element, rewrite)) changed = true;
  }
  for (const element of elementsWithArtifactUri(doc)) {
    if (rewriteAttribute(element, 'artifactUri', rewrite)) changed = true;
  }
  return changed;
}

/** Attribute substitution in model reference sites. Returns whether the document changed. */
function rewriteModelReferenceAttributes(doc: Document, rewrite: (value: string) => string): boolean {
  let changed = false;
  for (const [element, attr] of attributeSites(doc)) {
    if (rewriteAttribute(element, attr, rewrite)) changed = true;
  }
  return changed;
}

/**
 * Apply one structured pass to every XML part.
 * Returns the number of parts changed, or null when a part is not well-formed.
 */
function structuredPass(
  artifact: Artifact,
  pass: (doc: Document) => boolean,
): number | null {
  const updates: Array<[string, string]> = [];
  for (const part of artifact.textParts(isLinkSetPart)) {
    let doc: Document;
    try {
      doc = parseXml(part.text, part.name || artifact.path);
    } catch (err) {
      getLogger('references').warn({ file: artifact.path, part: part.name, err: errorMessage(err) }, 'Link set is not well-formed XML');
      return null;
    }
    if (pass(doc)) updates.push([part.name, serializeXml(doc)]);
  }
  for (const [name, text] of updates) {
    artifact.replacePart(name, text);
  }
  return updates.length;
}

export const linkSetStrategy: ReferenceStrategy = {
  name: 'model-reference-link',

  async references(filePath: string, targetFileName: string): Promise<boolean> {
    const artifact = await Artifact.open(filePath);
    const matcher = new NameMatcher(targetFileName);
    return scanXmlParts(
      artifact,
      isLinkSetPart,
      (doc) =>
        attributeSites(doc).some(([element, attr]) => matcher.matches(element.getAttribute(attr) ?? '')) ||
        artifactElements(doc).some((element) => matcher.matches(elementText(element))) ||
        elementsWithArtifactUri(doc).some((element) => matcher.matches(element.getAttribute('artifactUri') ?? '')),
      (text) => matcher.matches(text),
    );
  },

  async update(filePath: string, oldFileName: string, newFileName: string): Promise<StrategyUpdate> {
    const artifact = await Artifact.open(filePath);
    const matcher = new NameMatcher(oldFileName);
    const rewrite = (value: string): string => matcher.replace(value, newFileName);

    let method: UpdateMethod = 'link-set';
    let changedParts = structuredPass(artifact, (doc) => rewriteArtifactUris(doc, rewrite));
    if (changedParts === 0) {
      getLogger('references').debug({ file: filePath }, 'Link-set rewrite changed nothing, trying model reference attributes');
      method = 'xml-attributes';
      changedParts = structuredPass(artifact, (doc) => rewriteModelReferenceAttributes(doc, rewrite));
    }
    if (changedParts === null || changedParts === 0) {
      getLogger('references').debug({ file: filePath }, 'Falling back to text substitution');
      method = 'text';
      substituteInArtifact(artifact, matcher, newFileName);
    }
    return { method, changed: await artifact.save() };
  },
};
