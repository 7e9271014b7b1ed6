import { resolve, normalize, relative, isAbsolute, dirname, basename, join, sep } from 'path';
import { realpath } from 'fs/promises';

/**
 * Clean a path, make it absolute against the process cwd and resolve symlinks.
 * Falls back to the absolute, unresolved form when resolution fails
 * (broken link, missing entry, permissions).
 * @throws Error if path is empty
 */
export async function normalizePath(inputPath: string): Promise<string> {
  if (!inputPath) {
    throw new Error('Path must not be empty');
  }

  const absolute = resolve(normalize(inputPath));
  try {
    return await realpath(absolute);
  } catch {
    return absolute;
  }
}

/**
 * Resolve symlinks on the deepest existing ancestor of `absolutePath` and
 * re-append the segments that do not exist yet.
 */
async function resolveExistingPrefix(absolutePath: string): Promise<string> {
  const pending: string[] = [];
  let current = absolutePath;

  for (;;) {
    try {
      const resolved = await realpath(current);
      return pending.length > 0 ? join(resolved, ...pending.reverse()) : resolved;
    } catch {
      const parent = dirname(current);
      if (parent === current) {
        return absolutePath;
      }
      pending.push(basename(current));
      current = parent;
    }
  }
}

/**
 * Lexical containment check on two already-resolved absolute paths.
 * A path contains itself.
 */
export function isContainedPath(resolvedBase: string, resolvedTarget: string): boolean {
  const rel = relative(resolvedBase, resolvedTarget);
  if (rel === '') {
    return true;
  }
  if (isAbsolute(rel)) {
    return false;
  }
  return rel !== '..' && !rel.startsWith(`..${sep}`);
}

/**
 * Prove that `target` lies within `base` (or is `base`), with symlinks resolved
 * on both sides independently, so a link inside `base` that points elsewhere
 * is judged by where it points.
 *
 * Both empty is trivially contained.
 * @throws Error if exactly one side is empty
 */
export async function isPathUnder(base: string, target: string): Promise<boolean> {
  if (!base && !target) {
    return true;
  }
  if (!base || !target) {
    throw new Error(`Cannot check containment with an empty path (base: '${base}', target: '${target}')`);
  }

  const [resolvedBase, resolvedTarget] = await Promise.all([
    resolveExistingPrefix(resolve(normalize(base))),
    resolveExistingPrefix(resolve(normalize(target))),
  ]);

  return isContainedPath(resolvedBase, resolvedTarget);
}

function safeDecode(value: string): string | null {
  try {
    return decodeURIComponent(value);
  } catch {
    // malformed escape: leave undecoded
    return null;
  }
}

/**
 * Detect `..` in a user-supplied identifier fragment: literal, after
 * normalization, percent-encoded or double percent-encoded.
 */
export function containsPathTraversal(value: string): boolean {
  if (value.includes('..')) {
    return true;
  }

  const cleaned = normalize(value);
  if (cleaned !== value && cleaned.includes('..')) {
    return true;
  }

  const decoded = safeDecode(value);
  if (decoded !== null && decoded !== value) {
    if (decoded.includes('..')) {
      return true;
    }
    const doubleDecoded = safeDecode(decoded);
    if (doubleDecoded !== null && doubleDecoded !== decoded && doubleDecoded.includes('..')) {
      return true;
    }
  }

  return false;
}
