import * as fs from 'fs/promises';
import * as errors from '../errors.js';

/**
 * Reads a UTF-8 text document for analysis.
 *
 * @param path - Absolute path to the text file
 */
export async function loadTextFile(path: string): Promise<string> {
  try {
    return await fs.readFile(path, 'utf8');
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new Error(errors.textFileNotFound(path).content[0].text);
    }
    throw error;
  }
}
