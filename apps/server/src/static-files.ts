import * as fs from "fs";
import * as path from "path";

const CONTENT_TYPES: Record<string, string> = {
  ".html": "text/html; charset=utf-8",
  ".js": "text/javascript; charset=utf-8",
  ".mjs": "text/javascript; charset=utf-8",
  ".css": "text/css; charset=utf-8",
  ".json": "application/json; charset=utf-8",
  ".svg": "image/svg+xml",
  ".png": "image/png",
  ".ico": "image/x-icon",
  ".woff2": "font/woff2",
  ".map": "application/json; charset=utf-8",
};

export function contentTypeFor(filePath: string): string {
  return CONTENT_TYPES[path.extname(filePath).toLowerCase()] ?? "application/octet-stream";
}

/**
 * Maps a URL path onto a file inside `webDir`. Returns `null` when the path
 * escapes the directory or cannot be decoded.
 */
export function resolveStaticPath(webDir: string, pathname: string): string | null {
  let decoded: string;
  try {
    decoded = decodeURIComponent(pathname);
  } catch {
    return null;
  }
  if (decoded.includes("\0")) return null;

  const root = path.resolve(webDir);
  const target = path.resolve(root, `.${path.posix.normalize(`/${decoded}`)}`);
  if (target !== root && !target.startsWith(`${root}${path.sep}`)) return null;
  return target;
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Finds the file to serve for `pathname`: the file itself, or the client's
 * index.html so that client-side routes still load the app.
 */
export async function findStaticFile(webDir: string, pathname: string): Promise<string | null> {
  const target = resolveStaticPath(webDir, pathname);
  if (target === null) return null;
  if (await isFile(target)) return target;

  const index = path.join(path.resolve(webDir), "index.html");
  return (await isFile(index)) ? index : null;
}
