/**
 * Path Utilities
 */

import { extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Get file extension (lowercase, without dot)
 */
export function getExtension(filename: string): string {
  const ext = extname(filename.trim());
  return ext.toLowerCase().replace(/^\./, '');
}

/**
 * Key used to detect the same file given twice (case-insensitive on Windows)
 */
export function normalizePathKey(filePath: string): string {
  const absolute = resolve(filePath);
  return process.platform === 'win32' ? absolute.toLowerCase() : absolute;
}

/**
 * Split pasted or dropped text into paths.
 * 
 * Whitespace separates paths unless quoted; file:// URLs are decoded.
 */
export function parsePastedPaths(text: string): string[] {
  const paths: string[] = [];
  let buf = '';
  let inQuotes = false;

  const flush = (): void => {
    const token = buf.trim();
    buf = '';
    if (!token) return;
    paths.push(token.startsWith('file://') ? fileUrlToPath(token) : token);
  };

  for (const ch of text) {
    if (ch === '"') {
      inQuotes = !inQuotes;
    } else if (/\s/.test(ch) && !inQuotes) {
      flush();
    } else {
      buf += ch;
    }
  }
  flush();

  return paths;
}

function fileUrlToPath(url: string): string {
  try {
    return fileURLToPath(url);
  } catch {
    return decodeURIComponent(url.replace(/^file:\/\//, ''));
  }
}
