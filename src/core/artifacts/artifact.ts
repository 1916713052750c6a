/**
 * Artifact content access.
 *
 * Project files are either plain text or OPC/zip packages of parts (models,
 * dictionaries, link sets, requirement sets, archives, workbooks). Both are
 * exposed as a list of text parts that can be read, replaced and saved back.
 */

import AdmZip from 'adm-zip';
import { readBytes, atomicWrite } from '../../store/atomic.js';
import { ToolError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';

/** Package entries treated as text parts. */
const TEXT_PART_PATTERN = /\.(xml|rels|txt|m|mdl|json)$/i;

/** Name of the single part of a plain (non-package) artifact. */
export const PLAIN_PART = '';

/** A named text part of an artifact. */
export interface ArtifactPart {
  name: string;
  text: string;
}

type TextEncoding = 'utf8' | 'latin1';

/** Whether a buffer starts with the zip local-file-header magic (`PK\x03\x04`). */
export function isZipPackage(bytes: Buffer): boolean {
  return bytes.length >= 4 && bytes[0] === 0x50 && bytes[1] === 0x4b && bytes[2] === 0x03 && bytes[3] === 0x04;
}

/**
 * Decode bytes as UTF-8 when they round-trip, otherwise as latin1, so that
 * saving an unmodified region reproduces the original bytes.
 */
function decodeText(bytes: Buffer): { text: string; encoding: TextEncoding } {
  const utf8 = bytes.toString('utf8');
  if (Buffer.from(utf8, 'utf8').equals(bytes)) {
    return { text: utf8, encoding: 'utf8' };
  }
  return { text: bytes.toString('latin1'), encoding: 'latin1' };
}

export class Artifact {
  readonly path: string;
  private readonly zip: AdmZip | null;
  private readonly encoding: TextEncoding;
  private readonly parts = new Map<string, string>();
  private readonly changed = new Set<string>();

  private constructor(path: string, zip: AdmZip | null, encoding: TextEncoding, parts: ArtifactPart[]) {
    this.path = path;
    this.zip = zip;
    this.encoding = encoding;
    for (const part of parts) {
      this.parts.set(part.name, part.text);
    }
  }

  /**
   * Read an artifact from disk.
   * Fails with NOT_FOUND for a missing file and VALIDATION_ERROR for a corrupt package.
   */
  static async open(filePath: string): Promise<Artifact> {
    const bytes = await readBytes(filePath);
    if (!isZipPackage(bytes)) {
      const { text, encoding } = decodeText(bytes);
      return new Artifact(filePath, null, encoding, [{ name: PLAIN_PART, text }]);
    }

    let zip: AdmZip;
    try {
      zip = new AdmZip(bytes);
    } catch (err) {
      throw new ToolError(ExitCode.VALIDATION_ERROR, `Corrupt package: ${filePath}`, { cause: err });
    }
    const parts = zip
      .getEntries()
      .filter((entry) => !entry.isDirectory && TEXT_PART_PATTERN.test(entry.entryName))
      .map((entry) => ({ name: entry.entryName, text: entry.getData().toString('utf8') }));
    return new Artifact(filePath, zip, 'utf8', parts);
  }

  /** Whether the artifact is a zip package. */
  get packaged(): boolean {
    return this.zip !== null;
  }

  /** Whether any part was replaced since open(). */
  get modified(): boolean {
    return this.changed.size > 0;
  }

  /**
   * Text parts, optionally filtered by part name.
   */
  textParts(filter?: (name: string) => boolean): ArtifactPart[] {
    const parts: ArtifactPart[] = [];
    for (const [name, text] of this.parts) {
      if (!filter || filter(name)) parts.push({ name, text });
    }
    return parts;
  }

  /**
   * Replace a part's text. Unchanged text is not recorded as a modification.
   */
  replacePart(name: string, text: string): void {
    const current = this.parts.get(name);
    if (current === undefined) {
      throw new ToolError(ExitCode.NOT_FOUND, `No part "${name}" in ${this.path}`);
    }
    if (current === text) return;
    this.parts.set(name, text);
    this.changed.add(name);
  }

  /**
   * Apply a text transform to every part (or those matching a filter).
   * Returns the number of parts whose text changed.
   */
  transformParts(transform: (text: string, name: string) => string, filter?: (name: string) => boolean): number {
    let count = 0;
    for (const part of this.textParts(filter)) {
      const next = transform(part.text, part.name);
      if (next !== part.text) {
        this.replacePart(part.name, next);
        count++;
      }
    }
    return count;
  }

  /**
   * Write the artifact back atomically when something changed.
   * Returns true when the file was written.
   */
  async save(): Promise<boolean> {
    if (!this.modified) return false;

    if (this.zip === null) {
      const text = this.parts.get(PLAIN_PART) ?? '';
      await atomicWrite(this.path, Buffer.from(text, this.encoding));
    } else {
      for (const name of this.changed) {
        this.zip.updateFile(name, Buffer.from(this.parts.get(name) ?? '', 'utf8'));
      }
      await atomicWrite(this.path, this.zip.toBuffer());
    }
    this.changed.clear();
    return true;
  }
}
