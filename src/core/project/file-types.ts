/**
 * Extension allow-list and type tags.
 */

import { extname, basename } from 'node:path';
import type { FileKind } from '../../types/project.js';

/** Supported extensions (lowercase) and the type tag each maps to. */
export const SUPPORTED_EXTENSIONS: Readonly<Record<string, FileKind>> = {
  '.slx': 'model',
  '.mdl': 'model',
  '.lib': 'library',
  '.m': 'script',
  '.sldd': 'data-dictionary',
  '.slmx': 'model-reference-link',
  '.slreqx': 'requirements',
  '.xlsx': 'spreadsheet',
  '.mldatx': 'data-archive',
};

/**
 * Type tag for a path, or null when its extension is outside the allow-list.
 * Extensions compare case-insensitively.
 */
export function fileKindOf(filePath: string): FileKind | null {
  return SUPPORTED_EXTENSIONS[extname(filePath).toLowerCase()] ?? null;
}

/** Split a file name into base name and extension (`ctrl_v1.slx` -> `ctrl_v1`, `.slx`). */
export function splitFileName(filePath: string): { base: string; ext: string } {
  const ext = extname(filePath);
  return { base: basename(filePath, ext), ext };
}
