import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const __dirname = dirname(fileURLToPath(import.meta.url));
const STOPWORDS_PATH = resolve(__dirname, '..', '..', 'data', 'stopwords.json');

export const CHUNK_LINES = 400;
export const CHUNK_OVERLAP = 50;
export const DEFAULT_TOP_K = 8;
/** Characters of a single file that are indexed. */
export const MAX_INDEXED_CHARS = 200_000;

const TOKEN = /[\p{L}\p{N}_-]{3,}/gu;

const stopwordsSchema = z.record(z.array(z.string()));

export interface CodeChunk {
  path: string;
  /** 1-based, inclusive. */
  startLine: number;
  endLine: number;
  text: string;
}

export interface ScoredChunk extends CodeChunk {
  score: number;
}

interface IndexedChunk {
  chunk: CodeChunk;
  haystack: string;
}

let stopwords: Promise<ReadonlySet<string>> | undefined;

/** Stopwords of every bundled language, read once per process. */
export function loadStopwords(): Promise<ReadonlySet<string>> {
  if (!stopwords) {
    stopwords = readFile(STOPWORDS_PATH, 'utf-8').then((raw) => {
      const lists = stopwordsSchema.parse(JSON.parse(raw));
      return new Set(Object.values(lists).flat().map((word) => word.toLowerCase()));
    });
  }
  return stopwords;
}

/** Distinct lowercase search tokens of a query, stopwords removed. */
export function queryTokens(query: string, ignore: ReadonlySet<string>): string[] {
  const tokens = query.toLowerCase().match(TOKEN) ?? [];
  return [...new Set(tokens)].filter((token) => !ignore.has(token));
}

export function countOccurrences(haystack: string, needle: string): number {
  if (needle.length === 0) return 0;
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

/** Split a file into overlapping line windows. Blank files yield nothing. */
export function chunkText(path: string, text: string): CodeChunk[] {
  if (text.trim() === '') return [];
  const lines = text.split(/\r?\n/);
  const chunks: CodeChunk[] = [];
  let start = 0;
  for (;;) {
    const end = Math.min(lines.length, start + CHUNK_LINES);
    chunks.push({
      path,
      startLine: start + 1,
      endLine: end,
      text: lines.slice(start, end).join('\n'),
    });
    if (end === lines.length) return chunks;
    start = end - CHUNK_OVERLAP;
  }
}

/**
 * Keyword index over the text files of a staged project. A chunk scores the
 * number of times the query tokens occur in its path and text.
 */
export class CodeIndex {
  private readonly chunks: IndexedChunk[] = [];

  constructor(private readonly stopwords: ReadonlySet<string>) {}

  get size(): number {
    return this.chunks.length;
  }

  add(path: string, text: string): void {
    for (const chunk of chunkText(path, text.slice(0, MAX_INDEXED_CHARS))) {
      this.chunks.push({ chunk, haystack: `${path}\n${chunk.text}`.toLowerCase() });
    }
  }

  tokens(query: string): string[] {
    return queryTokens(query, this.stopwords);
  }

  /** Best `topK` chunks with a positive score; ties keep insertion order. */
  retrieve(query: string, topK = DEFAULT_TOP_K): ScoredChunk[] {
    const tokens = this.tokens(query);
    if (tokens.length === 0) return [];
    return this.chunks
      .map(({ chunk, haystack }) => ({
        ...chunk,
        score: tokens.reduce((sum, token) => sum + countOccurrences(haystack, token), 0),
      }))
      .filter((scored) => scored.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, topK);
  }
}
