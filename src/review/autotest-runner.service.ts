import { Injectable, ConsoleLogger, Inject } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { minimatch } from 'minimatch';
import { z } from 'zod';
import { MAX_AUTOTESTS, MAX_SAMPLE_FILE_SIZE } from '../constants.js';
import { countOccurrences } from './code-index.js';
import { resolveEntryPath } from './path-utils.js';
import { isSensitiveFile } from './project-inspector.service.js';
import type { StagedEntry, StagedProject } from './review.types.js';

const id = z.string().trim().min(1).max(80);
const path = z.string().trim().min(1);
const pattern = z.string().min(1);
const explanation = z.string().trim().default('');

/** One check the model derived from the checklist. Patterns are literal text. */
export const autotestSchema = z.discriminatedUnion('type', [
  z.object({ id, type: z.literal('file_exists'), path, explanation }),
  z.object({ id, type: z.literal('glob_exists'), glob: path, explanation }),
  z.object({ id, type: z.literal('file_contains'), path, pattern, explanation }),
  z.object({
    id,
    type: z.literal('grep_count'),
    path,
    pattern,
    countMin: z.number().int().min(1).default(1),
    explanation,
  }),
]);

export type Autotest = z.infer<typeof autotestSchema>;

export interface AutotestResult {
  id: string;
  type: Autotest['type'];
  ok: boolean;
  explanation: string;
  detail: string;
}

type ReadOutcome = { found: true; text: string } | { found: false; reason: string };

const MAX_LISTED_MATCHES = 5;

function normalizeGlob(glob: string): string {
  return glob.trim().replace(/\\/g, '/').replace(/^\.\//, '');
}

@Injectable()
export class AutotestRunnerService {
  constructor(@Inject(ConsoleLogger) private readonly logger: ConsoleLogger) {
    this.logger.setContext(AutotestRunnerService.name);
  }

  /** Run checks against the staged entries. Nothing outside the project is read. */
  async run(project: StagedProject, tests: Autotest[]): Promise<AutotestResult[]> {
    const entries = new Map(project.entries.map((entry) => [entry.path, entry]));
    const results: AutotestResult[] = [];
    for (const test of tests.slice(0, MAX_AUTOTESTS)) {
      results.push(await this.runOne(project, entries, test));
    }
    const failed = results.filter((result) => !result.ok).length;
    this.logger.log(`Ran ${results.length} autotests, ${failed} failed`);
    return results;
  }

  private async runOne(
    project: StagedProject,
    entries: Map<string, StagedEntry>,
    test: Autotest,
  ): Promise<AutotestResult> {
    const result = (ok: boolean, detail: string): AutotestResult => ({
      id: test.id,
      type: test.type,
      ok,
      explanation: test.explanation,
      detail,
    });

    switch (test.type) {
      case 'file_exists': {
        const target = resolveEntryPath(test.path, project.root);
        if (target === null) return result(false, 'path is outside the project');
        const exists =
          target === '' ||
          entries.has(target) ||
          [...entries.keys()].some((p) => p.startsWith(`${target}/`));
        return result(exists, exists ? `found ${target}` : `missing ${target}`);
      }
      case 'glob_exists': {
        const glob = normalizeGlob(test.glob);
        const matches = [...entries.keys()].filter((p) => minimatch(p, glob, { dot: true }));
        if (matches.length === 0) return result(false, `no file matches ${glob}`);
        const listed = matches.slice(0, MAX_LISTED_MATCHES).join(', ');
        const more = matches.length > MAX_LISTED_MATCHES ? ', ...' : '';
        return result(true, `matched ${listed}${more}`);
      }
      case 'file_contains': {
        const read = await this.readEntry(project, entries, test.path);
        if (!read.found) return result(false, read.reason);
        const contains = read.text.includes(test.pattern);
        return result(contains, contains ? 'pattern found' : 'pattern not found');
      }
      case 'grep_count': {
        const read = await this.readEntry(project, entries, test.path);
        if (!read.found) return result(false, read.reason);
        const count = countOccurrences(read.text, test.pattern);
        return result(count >= test.countMin, `count=${count}, min=${test.countMin}`);
      }
    }
  }

  private async readEntry(
    project: StagedProject,
    entries: Map<string, StagedEntry>,
    name: string,
  ): Promise<ReadOutcome> {
    const target = resolveEntryPath(name, project.root);
    if (target === null) return { found: false, reason: 'path is outside the project' };
    const entry = entries.get(target);
    if (!entry) return { found: false, reason: `missing ${target || name}` };
    if (isSensitiveFile(entry.path)) {
      return { found: false, reason: `${entry.path} is a sensitive file and was not read` };
    }
    if (entry.size > MAX_SAMPLE_FILE_SIZE) {
      return { found: false, reason: `${entry.path} is too large to read` };
    }
    try {
      return { found: true, text: await readFile(join(project.root, entry.path), 'utf-8') };
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Autotest could not read ${entry.path} (${msg})`);
      return { found: false, reason: `${entry.path} could not be read` };
    }
  }
}
