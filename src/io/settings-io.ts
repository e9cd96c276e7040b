import * as fs from 'fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { type SettingsConfig } from '../types/settings.js';
import { SettingsClass } from '../classes/settings.js';
import { loadStopwordsFile } from './stopwords-io.js';
import {
  DEFAULT_MIN_FONT_SIZE,
  DEFAULT_MAX_FONT_SIZE,
  DEFAULT_MIN_OPACITY,
  DEFAULT_MAX_OPACITY,
} from '../algorithms/word-cloud.js';
import * as errors from '../errors.js';

export const SETTINGS_ENV_VAR = 'WORDCLOUD_CONFIG';

const settingsSchema = z
  .object({
    max_words: z.number().int().nonnegative().optional(),
    top_n: z.number().int().nonnegative().optional(),
    spacing: z.number().nonnegative().finite().optional(),
    max_width: z.number().nonnegative().optional(),
    font: z
      .object({
        min_size: z.number().positive().finite().optional(),
        max_size: z.number().positive().finite().optional(),
        char_width_ratio: z.number().positive().finite().optional(),
        line_height_ratio: z.number().positive().finite().optional(),
      })
      .strict()
      // A bound left out takes its default, so compare against that too
      .refine((f) => (f.min_size ?? DEFAULT_MIN_FONT_SIZE) <= (f.max_size ?? DEFAULT_MAX_FONT_SIZE), {
        message: 'min_size must not exceed max_size',
        path: ['min_size'],
      })
      .optional(),
    opacity: z
      .object({
        min: z.number().min(0).max(1).optional(),
        max: z.number().min(0).max(1).optional(),
      })
      .strict()
      .refine((o) => (o.min ?? DEFAULT_MIN_OPACITY) <= (o.max ?? DEFAULT_MAX_OPACITY), {
        message: 'min must not exceed max',
        path: ['min'],
      })
      .optional(),
    palette: z.array(z.string().min(1)).min(1).optional(),
    extra_stopwords: z.array(z.string()).optional(),
  })
  .strict();

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Loads and validates a wordcloud.json settings file.
 *
 * @param filePath - Path to the settings file
 * @returns The validated settings data
 */
export async function loadSettingsFile(filePath: string): Promise<SettingsConfig> {
  let fileContent: string;
  try {
    fileContent = await fs.readFile(filePath, 'utf8');
  } catch (error: unknown) {
    if (isMissingFile(error)) {
      throw new Error(errors.settingsFileNotFound(filePath).content[0].text);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch (e: unknown) {
    throw new Error(errors.invalidSettingsFile(filePath, `Invalid JSON. ${errors.messageOf(e)}`).content[0].text);
  }

  const result = settingsSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new Error(errors.invalidSettingsFile(filePath, `${where}${issue.message}`).content[0].text);
  }
  return result.data;
}

/**
 * Picks the settings path from `--config <path>` (or `--config=<path>`),
 * falling back to the WORDCLOUD_CONFIG environment variable.
 */
export function resolveSettingsPath(argv: readonly string[], env: NodeJS.ProcessEnv): string | undefined {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--config' && i + 1 < argv.length) {
      return argv[i + 1];
    }
    if (arg.startsWith('--config=')) {
      return arg.slice('--config='.length);
    }
  }
  const fromEnv = env[SETTINGS_ENV_VAR];
  return fromEnv !== undefined && fromEnv !== '' ? fromEnv : undefined;
}

/**
 * Loads server settings, or the defaults when no path is given, together with
 * the built-in stopword list.
 */
export async function loadSettings(filePath: string | undefined): Promise<SettingsClass> {
  if (filePath === undefined) {
    return SettingsClass.defaults(await loadStopwordsFile());
  }
  const resolved = path.resolve(filePath);
  const [data, stopwords] = await Promise.all([loadSettingsFile(resolved), loadStopwordsFile()]);
  return SettingsClass.fromJSON(resolved, data, stopwords);
}
