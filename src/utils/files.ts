import { spawn } from 'node:child_process';
import { mkdir, stat } from 'node:fs/promises';
import path from 'node:path';

const UNSAFE_FILE_CHARS = /[<>:"/\\|?*\x00-\x1f]/g;

/**
 * Replace characters that are not allowed in file names on common platforms.
 */
export function sanitizeFileName(name: string): string {
  const cleaned = name.replace(UNSAFE_FILE_CHARS, '_').replace(/\s+/g, ' ').trim();
  return cleaned.replace(/^\.+/, '').slice(0, 200) || 'unnamed';
}

/**
 * Derive a file name for a resource from its URL, falling back to a name.
 */
export function fileNameFromUrl(url: string, fallback: string): string {
  let base: string;
  try {
    base = decodeURIComponent(path.posix.basename(new URL(url).pathname));
  } catch {
    return sanitizeFileName(fallback);
  }
  return sanitizeFileName(base.length > 0 ? base : fallback);
}

/**
 * Check whether a path exists and is a directory.
 */
export async function directoryExists(dir: string): Promise<boolean> {
  try {
    return (await stat(dir)).isDirectory();
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Create a directory and its parents if missing.
 *
 * @returns The absolute directory path
 */
export async function ensureDirectory(dir: string): Promise<string> {
  const absolute = path.resolve(dir);
  await mkdir(absolute, { recursive: true });
  return absolute;
}

/**
 * Command used to open a directory in the platform file browser.
 */
export function fileBrowserCommand(platform: NodeJS.Platform = process.platform): string {
  if (platform === 'win32') return 'explorer';
  if (platform === 'darwin') return 'open';
  return 'xdg-open';
}

/**
 * Open a directory in the platform's default file browser.
 *
 * Resolves once the browser process has been spawned.
 */
export function openInFileBrowser(
  dir: string,
  platform: NodeJS.Platform = process.platform
): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(fileBrowserCommand(platform), [dir], {
      detached: true,
      stdio: 'ignore',
    });
    child.once('error', reject);
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
