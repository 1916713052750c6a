/**
 * XML helpers over @xmldom/xmldom.
 */

import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { ToolError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

/**
 * Parse XML text. Any parser error or warning about malformed markup fails
 * with VALIDATION_ERROR so callers can fall back to text handling.
 */
export function parseXml(text: string, source: string): Document {
  const problems: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: () => undefined,
      error: (msg: string) => {
        problems.push(msg);
      },
      fatalError: (msg: string) => {
        problems.push(msg);
      },
    },
  });

  let doc: Document;
  try {
    doc = parser.parseFromString(text, 'text/xml');
  } catch (err) {
    throw new ToolError(ExitCode.VALIDATION_ERROR, `Malformed XML in ${source}`, { cause: err });
  }
  if (problems.length > 0 || !doc.documentElement) {
    throw new ToolError(
      ExitCode.VALIDATION_ERROR,
      `Malformed XML in ${source}: ${problems[0] ?? 'no document element'}`,
    );
  }
  return doc;
}

export function serializeXml(doc: Document): string {
  return new XMLSerializer().serializeToString(doc);
}

/** Elements with a tag name, in document order. */
export function elementsByTagName(doc: Document, tagName: string): Element[] {
  const list = doc.getElementsByTagName(tagName);
  const elements: Element[] = [];
  for (let i = 0; i < list.length; i++) {
    const element = list.item(i);
    if (element) elements.push(element);
  }
  return elements;
}

function isCharacterData(node: Node): node is CharacterData {
  return node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE;
}

/** Direct text and CDATA children of a node. */
export function textChildren(node: Node): CharacterData[] {
  const children: CharacterData[] = [];
  const list = node.childNodes;
  for (let i = 0; i < list.length; i++) {
    const child = list.item(i);
    if (child && isCharacterData(child)) {
      children.push(child);
    }
  }
  return children;
}

/** Whether an element has no element children (a string-valued leaf). */
export function isLeafElement(element: Element): boolean {
  const list = element.childNodes;
  for (let i = 0; i < list.length; i++) {
    const child = list.item(i);
    if (child && child.nodeType === ELEMENT_NODE) return false;
  }
  return true;
}

/** Text value of an element: its direct text and CDATA children joined. */
export function elementText(element: Element): string {
  return textChildren(element).map((node) => node.data).join('');
}

/**
 * Rewrite the direct text children of an element.
 * Returns true when any text changed.
 */
export function rewriteElementText(element: Element, rewrite: (value: string) => string): boolean {
  let changed = false;
  for (const node of textChildren(element)) {
    const next = rewrite(node.data);
    if (next !== node.data) {
      node.replaceData(0, node.data.length, next);
      changed = true;
    }
  }
  return changed;
}

/**
 * Rewrite an attribute value when present.
 * Returns true when the value changed.
 */
export function rewriteAttribute(element: Element, name: string, rewrite: (value: string) => string): boolean {
  if (!element.hasAttribute(name)) return false;
  const value = element.getAttribute(name) ?? '';
  const next = rewrite(value);
  if (next === value) return false;
  element.setAttribute(name, next);
  return true;
}

/** All elements of a document, in document order. */
export function allElements(doc: Document): Element[] {
  return elementsByTagName(doc, '*');
}
