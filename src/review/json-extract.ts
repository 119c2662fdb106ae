/**
 * Locate the first balanced `{...}` block in `text`, skipping braces inside
 * string literals. Tries each opening brace until one closes.
 */
export function extractBalancedJson(text: string): string | null {
  for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
    let depth = 0;
    let inString = false;
    let escaped = false;
    for (let i = start; i < text.length; i++) {
      const ch = text[i];
      if (inString) {
        if (escaped) escaped = false;
        else if (ch === '\\') escaped = true;
        else if (ch === '"') inString = false;
        continue;
      }
      if (ch === '"') inString = true;
      else if (ch === '{') depth++;
      else if (ch === '}' && --depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

/** Remove `//` and `/* *\/` comments and trailing commas outside string literals. */
export function stripJsonArtifacts(text: string): string {
  let out = '';
  let inString = false;
  let escaped = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      out += ch;
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '/' && text[i + 1] === '/') {
      const eol = text.indexOf('\n', i);
      i = eol === -1 ? text.length : eol - 1;
      continue;
    }
    if (ch === '/' && text[i + 1] === '*') {
      const end = text.indexOf('*/', i + 2);
      i = end === -1 ? text.length : end + 1;
      continue;
    }
    if (ch === '}' || ch === ']') {
      out = out.replace(/,\s*$/, (match) => match.slice(1));
    }
    if (ch === '"') inString = true;
    out += ch;
  }
  return out;
}

/** Candidate JSON strings for a model reply, most literal first. */
export function jsonCandidates(reply: string): string[] {
  const candidates = [reply.trim()];
  const unfenced = reply.replace(/```(?:json)?\s*/gi, '').trim();
  candidates.push(unfenced);
  const block = extractBalancedJson(unfenced);
  if (block) candidates.push(block, stripJsonArtifacts(block));
  return [...new Set(candidates)];
}
