import { join } from "path";

const GIST_ID = /^[A-Za-z0-9_-]+$/;

/**
 * Neutralise a gist file name so it is always a single path segment.
 * Separators become underscores; `.`, `..` and empty names get a `_` prefix.
 * Distinct names can flatten to the same segment (`a/b` and `a_b`); callers
 * writing several files check for that.
 */
export function safeFileName(fileName: string): string {
  const flattened = fileName.replace(/[\\/]/g, "_").replace(/\0/g, "");
  if (flattened === "" || /^\.+$/.test(flattened)) {
    return `_${flattened}`;
  }
  return flattened;
}

/**
 * Relative location of a gist file under the download destination:
 * `<gistId>/<fileName>`.
 */
export function targetPath(gistId: string, fileName: string): string {
  if (!GIST_ID.test(gistId)) {
    throw new Error(`Refusing to build a path for unexpected gist id "${gistId}"`);
  }
  return join(gistId, safeFileName(fileName));
}
