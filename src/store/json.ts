/**
 * JSON file reading for configuration files.
 */

import { safeReadFile } from './atomic.js';
import { ToolError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/**
 * Read and parse a JSON file. The caller validates the shape.
 * Returns null if the file does not exist.
 */
export async function readJson(filePath: string): Promise<unknown> {
  const content = await safeReadFile(filePath);
  if (content === null) return null;

  try {
    const data: unknown = JSON.parse(content);
    return data;
  } catch (err) {
    throw new ToolError(
      ExitCode.VALIDATION_ERROR,
      `Invalid JSON in: ${filePath}`,
      { cause: err },
    );
  }
}
