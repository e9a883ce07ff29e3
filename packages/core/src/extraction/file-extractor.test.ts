/**
 * File Extractor Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { ExtractionError, FetchError } from '../errors/index.js';

import { createExtractor } from './create-extractor.js';
import { FileExtractor } from './file-extractor.js';

describe('FileExtractor', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'lexiscan-file-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads plain text and markdown as written', async () => {
    const file = path.join(dir, 'post.md');
    await fs.writeFile(file, '# Title\r\n\r\n- one point\r\n');

    const content = await new FileExtractor().extract({ kind: 'file', filePath: file });

    expect(content.text).toBe('# Title\n\n- one point');
    expect(content.wordCount).toBe(5);
    expect(content.title).toBeUndefined();
  });

  it('converts .html files to text', async () => {
    const file = path.join(dir, 'page.html');
    await fs.writeFile(file, '<title>Saved</title><article><h1>Head</h1><p>Body text.</p></article>');

    const content = await new FileExtractor().extract({ kind: 'file', filePath: file });

    expect(content.text).toBe('# Head\n\nBody text.');
    expect(content.title).toBe('Saved');
  });

  it('reports a missing file as a permanent fetch error', async () => {
    const file = path.join(dir, 'absent.txt');
    const error = await new FileExtractor().extract({ kind: 'file', filePath: file }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ transient: false, message: expect.stringContaining(`Cannot read ${file}`) });
  });

  it('rejects empty files', async () => {
    const file = path.join(dir, 'empty.txt');
    await fs.writeFile(file, '  \n');
    await expect(new FileExtractor().extract({ kind: 'file', filePath: file })).rejects.toBeInstanceOf(ExtractionError);
  });

  it('refuses URL identities', async () => {
    await expect(new FileExtractor().extract({ kind: 'url', url: 'https://blog.test/a' })).rejects.toThrow(
      'FileExtractor cannot read https://blog.test/a'
    );
  });

  it('is used for files by the routing extractor', async () => {
    const file = path.join(dir, 'note.txt');
    await fs.writeFile(file, 'Two words');

    const content = await createExtractor({ minWords: 50 }).extract({ kind: 'file', filePath: file });

    expect(content.wordCount).toBe(2);
  });
});
