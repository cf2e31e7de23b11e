import { readFile } from 'node:fs/promises';
import path from 'node:path';

export type StaticAsset = {
  body: Buffer;
  contentType: string;
};

const CONTENT_TYPES: Record<string, string> = {
  '.html': 'text/html; charset=utf-8',
  '.css': 'text/css; charset=utf-8',
  '.js': 'text/javascript; charset=utf-8',
  '.json': 'application/json; charset=utf-8',
  '.svg': 'image/svg+xml',
  '.png': 'image/png',
  '.ico': 'image/x-icon',
  '.txt': 'text/plain; charset=utf-8',
};

const NOT_FOUND_CODES = new Set(['ENOENT', 'EISDIR', 'ENOTDIR']);

export function contentTypeFor(filePath: string): string {
  return CONTENT_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream';
}

/** Resolves a request path inside `root`; null when it would escape it. */
export function resolveStaticPath(root: string, relPath: string): string | null {
  const base = path.resolve(root);
  const normalized = relPath.replace(/\\/g, '/').replace(/^\/+/, '');
  const candidate = path.resolve(base, normalized.length > 0 ? normalized : 'index.html');
  if (!candidate.startsWith(base + path.sep)) {
    return null;
  }
  return candidate;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && NOT_FOUND_CODES.has(error.code);
}

export async function readStaticAsset(root: string, relPath: string): Promise<StaticAsset | null> {
  const filePath = resolveStaticPath(root, relPath);
  if (!filePath) return null;
  try {
    const body = await readFile(filePath);
    return { body, contentType: contentTypeFor(filePath) };
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }
}
