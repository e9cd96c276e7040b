import * as fs from 'fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import * as errors from '../errors.js';

/** The built-in list shipped in `data/stopwords.json`. */
export const BUILTIN_STOPWORDS_PATH = fileURLToPath(new URL('../../data/stopwords.json', import.meta.url));

const stopwordsSchema = z.array(z.string());

/**
 * Loads a stopword list: a JSON array of strings.
 *
 * @param path - Path to the list, the built-in one by default
 * @returns The words, lower-cased
 */
export async function loadStopwordsFile(path: string = BUILTIN_STOPWORDS_PATH): Promise<string[]> {
  let fileContent: string;
  try {
    fileContent = await fs.readFile(path, 'utf8');
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new Error(errors.stopwordsFileNotFound(path).content[0].text);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch (e: unknown) {
    throw new Error(errors.invalidStopwordsFile(path, `Invalid JSON. ${errors.messageOf(e)}`).content[0].text);
  }

  const result = stopwordsSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(errors.invalidStopwordsFile(path, 'Expected a JSON array of strings.').content[0].text);
  }
  return result.data.map((w) => w.toLowerCase());
}
