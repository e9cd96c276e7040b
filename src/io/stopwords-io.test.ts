import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { loadStopwordsFile } from './stopwords-io.js';

describe('stopwords-io', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'wordcloud-stopwords-io-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('loads the built-in list from data/stopwords.json', async () => {
    const stopwords = await loadStopwordsFile();
    expect(stopwords).toContain('the');
    expect(stopwords).toContain('whose');
    expect(stopwords).not.toContain('moon');
  });

  it('lower-cases a custom list', async () => {
    const filePath = path.join(tempDir, 'words.json');
    await fs.writeFile(filePath, '["Said","ASKED"]');
    expect(await loadStopwordsFile(filePath)).toEqual(['said', 'asked']);
  });

  it('throws a domain error if the file is missing', async () => {
    const filePath = path.join(tempDir, 'nope.json');
    await expect(loadStopwordsFile(filePath)).rejects.toThrow(`Stopword list not found: ${filePath}`);
  });

  it('throws on invalid JSON', async () => {
    const filePath = path.join(tempDir, 'bad.json');
    await fs.writeFile(filePath, '[ not json');
    await expect(loadStopwordsFile(filePath)).rejects.toThrow(`Invalid stopword list: ${filePath}. Invalid JSON.`);
  });

  it('rejects anything but an array of strings', async () => {
    const filePath = path.join(tempDir, 'object.json');
    await fs.writeFile(filePath, '{"words":["the"]}');
    await expect(loadStopwordsFile(filePath)).rejects.toThrow(
      `Invalid stopword list: ${filePath}. Expected a JSON array of strings.`,
    );
  });
});
