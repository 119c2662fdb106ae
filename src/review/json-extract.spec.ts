import { describe, it, expect } from 'vitest';
import {
  extractBalancedJson,
  jsonCandidates,
  stripJsonArtifacts,
} from './json-extract.js';

describe('extractBalancedJson', () => {
  it('should extract the first complete object from surrounding prose', () => {
    expect(extractBalancedJson('Here you go: {"a": {"b": 1}} thanks')).toBe(
      '{"a": {"b": 1}}',
    );
  });

  it('should ignore braces inside strings', () => {
    expect(extractBalancedJson('{"s": "}{\\"", "n": 1}')).toBe(
      '{"s": "}{\\"", "n": 1}',
    );
  });

  it('should skip an unbalanced opening brace', () => {
    expect(extractBalancedJson('{ broken {"ok": true}')).toBe('{"ok": true}');
  });

  it('should return null without an object', () => {
    expect(extractBalancedJson('no json here')).toBeNull();
  });
});

describe('stripJsonArtifacts', () => {
  it('should remove comments and trailing commas', () => {
    const input = '{\n  "a": 1, // note\n  "b": [1, 2,],\n  /* block */ "c": 3,\n}';
    expect(JSON.parse(stripJsonArtifacts(input))).toEqual({ a: 1, b: [1, 2], c: 3 });
  });

  it('should keep comment-like text inside strings', () => {
    const input = '{"url": "http://x.test/a,]", "n": 1,}';
    expect(JSON.parse(stripJsonArtifacts(input))).toEqual({
      url: 'http://x.test/a,]',
      n: 1,
    });
  });
});

describe('jsonCandidates', () => {
  it('should offer the raw reply first', () => {
    expect(jsonCandidates(' {"a":1} ')).toEqual(['{"a":1}']);
  });

  it('should strip markdown fences', () => {
    const candidates = jsonCandidates('```json\n{"a":1}\n```');
    expect(candidates).toContain('{"a":1}');
  });

  it('should end with a cleaned balanced block', () => {
    const candidates = jsonCandidates('Result:\n{"a": 1,}\nDone');
    expect(candidates[candidates.length - 1]).toBe('{"a": 1}');
  });
});
