import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  directoryExists,
  ensureDirectory,
  fileBrowserCommand,
  fileNameFromUrl,
  sanitizeFileName,
} from './files';
import { heading, truncate, yesNo } from './text';

describe('sanitizeFileName', () => {
  it('replaces characters that are unsafe in file names', () => {
    expect(sanitizeFileName('a/b:c*d?.pdf')).toBe('a_b_c_d_.pdf');
  });

  it('strips leading dots and falls back for empty names', () => {
    expect(sanitizeFileName('..hidden')).toBe('hidden');
    expect(sanitizeFileName('   ')).toBe('unnamed');
  });
});

describe('fileNameFromUrl', () => {
  it('uses the decoded last path segment', () => {
    expect(fileNameFromUrl('https://files.test/docs/CR%2012345.pdf?download=1', 'fallback')).toBe(
      'CR 12345.pdf'
    );
  });

  it('falls back when the URL has no file name or is invalid', () => {
    expect(fileNameFromUrl('https://files.test/', 'Report A')).toBe('Report A');
    expect(fileNameFromUrl('not a url', 'Report/B')).toBe('Report_B');
  });
});

describe('directories', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'gsq-files-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('creates nested directories', async () => {
    const target = path.join(root, 'a', 'b');

    expect(await directoryExists(target)).toBe(false);
    expect(await ensureDirectory(target)).toBe(target);
    expect(await directoryExists(target)).toBe(true);
  });

  it('does not treat a file as a directory', async () => {
    const file = path.join(root, 'file.txt');
    await writeFile(file, 'x');

    expect(await directoryExists(file)).toBe(false);
  });
});

describe('fileBrowserCommand', () => {
  it('picks the platform file browser', () => {
    expect(fileBrowserCommand('win32')).toBe('explorer');
    expect(fileBrowserCommand('darwin')).toBe('open');
    expect(fileBrowserCommand('linux')).toBe('xdg-open');
  });
});

describe('text helpers', () => {
  it('truncates, underlines and renders flags', () => {
    expect(truncate('abcdef', 3)).toBe('abc...');
    expect(truncate('abc', 3)).toBe('abc');
    expect(heading('TITLE', 5)).toBe('TITLE\n=====');
    expect(yesNo(true)).toBe('Yes');
    expect(yesNo(false)).toBe('No');
  });
});
