import { relative, isAbsolute, resolve, sep } from 'node:path';

/** Cross-platform check: is `target` inside `root`? Uses path.relative to avoid separator issues. */
export function isWithinRoot(target: string, root: string): boolean {
  const rel = relative(root, target);
  return rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

const DRIVE_LETTER = /^[A-Za-z]:/;

/**
 * Normalize an archive entry name to a `/`-separated path relative to `root`.
 * Returns null when the name is absolute, carries a drive letter, or resolves
 * outside `root`. Returns '' for names that resolve to the root itself.
 */
export function resolveEntryPath(name: string, root: string): string | null {
  const unified = name.replace(/\\/g, '/');
  if (unified.startsWith('/') || DRIVE_LETTER.test(unified)) return null;
  if (unified.includes('\0')) return null;
  const target = resolve(root, unified);
  if (!isWithinRoot(target, root)) return null;
  return relative(root, target).split('\\').join('/');
}
