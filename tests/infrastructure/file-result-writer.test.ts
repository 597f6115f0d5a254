import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, readdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { FileResultWriter } from '../../src/infrastructure/services/file-result-writer.service.js';
import { makeTempDir, removeDir } from '../helpers/fakes.js';

describe('FileResultWriter', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('resolves output paths against its output directory', () => {
    expect(new FileResultWriter(dir).resolveOutputPath('/elsewhere/a.pdf')).toBe(join(dir, 'a.tei.xml'));
    expect(new FileResultWriter().resolveOutputPath(join(dir, 'a.pdf'))).toBe(join(dir, 'a.tei.xml'));
  });

  it('reports whether the output already exists', async () => {
    const writer = new FileResultWriter();
    const target = join(dir, 'a.tei.xml');
    expect(await writer.exists(target)).toBe(false);
    writeFileSync(target, 'x');
    expect(await writer.exists(target)).toBe(true);
  });

  it('writes the body and leaves no temp file behind', async () => {
    const target = join(dir, 'a.tei.xml');

    const result = await new FileResultWriter().write(target, '<TEI>é</TEI>');

    expect(result).toEqual({ ok: true, outputPath: target });
    expect(readFileSync(target, 'utf-8')).toBe('<TEI>é</TEI>');
    expect(readdirSync(dir)).toEqual(['a.tei.xml']);
  });

  it('replaces an existing file', async () => {
    const target = join(dir, 'a.tei.xml');
    writeFileSync(target, 'stale content that is longer');

    await new FileResultWriter().write(target, 'fresh');

    expect(readFileSync(target, 'utf-8')).toBe('fresh');
  });

  it('returns the error instead of throwing when the directory is missing', async () => {
    const target = join(dir, 'missing', 'a.tei.xml');

    const result = await new FileResultWriter().write(target, 'x');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.outputPath).toBe(target);
    expect(result.errorMessage).toContain('ENOENT');
    expect(readdirSync(dir)).toEqual([]);
  });

  it('does not leave a half-written destination when the rename fails', async () => {
    // a directory at the destination makes rename fail after the temp file was written
    const target = join(dir, 'a.tei.xml');
    mkdirSync(join(target, 'occupied'), { recursive: true });

    const result = await new FileResultWriter().write(target, 'body');

    expect(result.ok).toBe(false);
    expect(readdirSync(dir)).toEqual(['a.tei.xml']);
    expect(readdirSync(target)).toEqual(['occupied']);
  });
});
