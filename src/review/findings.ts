import type { Finding } from './review.types.js';

function compare(a: Finding, b: Finding): number {
  if (a.path !== b.path) return a.path < b.path ? -1 : 1;
  return (a.line ?? 0) - (b.line ?? 0);
}

/** Drop exact repeats of (path, line, rule, message) and order by path, then line. */
export function normalizeFindings(findings: Finding[]): Finding[] {
  const seen = new Set<string>();
  const unique: Finding[] = [];
  for (const finding of findings) {
    const key = `${finding.path}\0${finding.line ?? 0}\0${finding.rule}\0${finding.message}`;
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(finding);
  }
  return unique.sort(compare);
}

export function formatLocation(finding: Pick<Finding, 'path' | 'line'>): string {
  return finding.line !== undefined ? `${finding.path}:${finding.line}` : finding.path;
}
