import * as fs from 'fs/promises';
import * as path from 'node:path';
import * as errors from '../errors.js';

/**
 * Writes an SVG document, creating parent directories as needed.
 *
 * @param filePath - Absolute path of the .svg file to write
 * @param svg - The SVG markup
 */
export async function saveSvgFile(filePath: string, svg: string): Promise<void> {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, `${svg}\n`, 'utf8');
  } catch (error: unknown) {
    throw new Error(`${errors.cannotWritePath(filePath).content[0].text} (${errors.messageOf(error)})`);
  }
}
