import { Injectable, ConsoleLogger, Inject } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import { extname, join, posix } from 'node:path';
import { ConfigService } from '../config/config.service.js';
import { MAX_CHECKLIST_ITEMS, MAX_SAMPLE_FILE_SIZE } from '../constants.js';
import { CodeIndex, loadStopwords } from './code-index.js';
import { parseChecklist, parseProjectDescription } from './document-parser.js';
import { normalizeFindings } from './findings.js';
import type {
  Finding,
  ProjectInsight,
  RuleContext,
  StagedEntry,
  StagedProject,
  ValidatedArtifacts,
} from './review.types.js';

export const SAMPLE_EXTENSIONS = new Set([
  '.md',
  '.txt',
  '.py',
  '.js',
  '.ts',
  '.tsx',
  '.jsx',
  '.html',
  '.css',
  '.json',
  '.yaml',
  '.yml',
  '.toml',
  '.go',
  '.java',
  '.kt',
  '.rs',
  '.rb',
  '.php',
  '.cs',
]);

const SENSITIVE_PATTERNS = [
  /^\.env($|\.)/i,
  /\.pem$/i,
  /\.key$/i,
  /\.p12$/i,
  /\.pfx$/i,
  /(^|[^A-Z])[Ss][Ee][Cc][Rr][Ee][Tt]s?($|[^a-z])/,
  /(^|[^A-Z])[Cc][Rr][Ee][Dd][Ee][Nn][Tt][Ii][Aa][Ll]s?($|[^a-z])/,
  /\.keystore$/i,
];

export const DEPENDENCY_MANIFESTS = new Set([
  'package.json',
  'requirements.txt',
  'pyproject.toml',
  'setup.py',
  'Pipfile',
  'go.mod',
  'Cargo.toml',
  'pom.xml',
  'build.gradle',
  'build.gradle.kts',
  'Gemfile',
  'composer.json',
]);

const README = /^readme(\.[^/]*)?$/i;
const TEST_DIRS = new Set(['test', 'tests', '__tests__']);
const TEST_FILES = [/^test_.*\.py$/i, /_test\.[^.]+$/i, /\.(test|spec)\.[^.]+$/i];
const TODO_MARKER = /\b(TODO|FIXME)\b/;
const CONCURRENCY = 16;

export function isSensitiveFile(filePath: string): boolean {
  const segments = filePath.replace(/\\/g, '/').split('/');
  return segments.some((segment) =>
    SENSITIVE_PATTERNS.some((pattern) => pattern.test(segment)),
  );
}

function isTestPath(filePath: string): boolean {
  const segments = filePath.split('/');
  const name = segments[segments.length - 1] ?? '';
  return (
    segments.slice(0, -1).some((segment) => TEST_DIRS.has(segment)) ||
    TEST_FILES.some((pattern) => pattern.test(name))
  );
}

/** 1-based number of the first line matching `test`, if any. */
function firstLine(text: string, test: (line: string) => boolean): number | undefined {
  const lines = text.split(/\r?\n/);
  const index = lines.findIndex(test);
  return index === -1 ? undefined : index + 1;
}

interface FileText {
  entry: StagedEntry;
  data: Buffer;
}

@Injectable()
export class ProjectInspectorService {
  constructor(
    @Inject(ConsoleLogger) private readonly logger: ConsoleLogger,
    @Inject(ConfigService) private readonly configService: ConfigService,
  ) {
    this.logger.setContext(ProjectInspectorService.name);
  }

  async inspect(
    project: StagedProject,
    artifacts: ValidatedArtifacts,
  ): Promise<ProjectInsight> {
    const description = parseProjectDescription(
      artifacts.description.buffer.toString('utf-8'),
    );
    const checklist = parseChecklist(artifacts.checklist.buffer.toString('utf-8'));
    const files = project.entries;
    this.logger.log(`Inspecting ${files.length} files`);

    const findings: Finding[] = this.structuralFindings(files);
    const samples: Record<string, string> = {};
    let remaining = this.configService.getConfig().review.maxSampleBytes;
    const index = new CodeIndex(await loadStopwords());

    for (const { entry, data } of await this.readCandidates(project)) {
      const content = data.toString('utf-8');
      index.add(entry.path, content);
      if (entry.path.toLowerCase().endsWith('.py')) {
        if (content.includes('print(') && !content.includes('if __name__')) {
          findings.push({
            path: entry.path,
            line: firstLine(content, (line) => line.includes('print(')),
            severity: 'low',
            rule: 'stray-print',
            message: 'print() call outside an `if __name__` guard; prefer logging',
          });
        }
      }
      if (remaining <= 0 || !SAMPLE_EXTENSIONS.has(extname(entry.path).toLowerCase())) {
        continue;
      }
      const sample = data.subarray(0, remaining).toString('utf-8');
      samples[entry.path] = sample;
      remaining -= Math.min(data.length, remaining);

      const todoLine = firstLine(sample, (line) => TODO_MARKER.test(line));
      if (todoLine !== undefined) {
        findings.push({
          path: entry.path,
          line: todoLine,
          severity: 'low',
          rule: 'todo-marker',
          message: 'Unresolved TODO/FIXME marker',
        });
      }
    }

    const ruleContexts = this.matchChecklist(index, checklist.items);
    if (files.length > 0) {
      for (const { rule, chunks } of ruleContexts) {
        if (chunks.length > 0 || index.tokens(rule).length === 0) continue;
        findings.push({
          path: '.',
          severity: 'medium',
          rule: 'checklist-item',
          message: `No code found for checklist item "${rule}"`,
        });
      }
    }

    const heuristicFindings = normalizeFindings(findings);
    this.logger.debug(
      `Collected ${Object.keys(samples).length} samples, ${index.size} chunks and ${heuristicFindings.length} heuristic findings`,
    );
    return { description, checklist, files, samples, ruleContexts, heuristicFindings };
  }

  /** Retrieve supporting code for each checklist item. */
  private matchChecklist(index: CodeIndex, items: string[]): RuleContext[] {
    return items
      .slice(0, MAX_CHECKLIST_ITEMS)
      .map((rule) => ({ rule, chunks: index.retrieve(rule) }));
  }

  private structuralFindings(files: StagedEntry[]): Finding[] {
    if (files.length === 0) {
      return [
        {
          path: '.',
          severity: 'high',
          rule: 'empty-project',
          message: 'The archive contains no files',
        },
      ];
    }
    const findings: Finding[] = [];
    for (const file of files) {
      if (isSensitiveFile(file.path)) {
        findings.push({
          path: file.path,
          severity: 'high',
          rule: 'sensitive-file',
          message: 'Possible secret or credential file included in the project',
        });
      }
    }
    const paths = files.map((f) => f.path);
    if (
      !paths.some(
        (p) => p.split('/').length <= 2 && README.test(posix.basename(p)),
      )
    ) {
      findings.push({
        path: '.',
        severity: 'medium',
        rule: 'missing-readme',
        message: 'No README found at the project root',
      });
    }
    if (!paths.some((p) => DEPENDENCY_MANIFESTS.has(posix.basename(p)))) {
      findings.push({
        path: '.',
        severity: 'medium',
        rule: 'missing-dependency-manifest',
        message: 'No dependency manifest (e.g. package.json, requirements.txt) found',
      });
    }
    if (!paths.some(isTestPath)) {
      findings.push({
        path: '.',
        severity: 'medium',
        rule: 'missing-tests',
        message: 'No tests found',
      });
    }
    return findings;
  }

  /** Readable text candidates in sorted path order. */
  private async readCandidates(project: StagedProject): Promise<FileText[]> {
    const candidates = project.entries.filter((entry) => {
      const ext = extname(entry.path).toLowerCase();
      return (
        SAMPLE_EXTENSIONS.has(ext) &&
        entry.size <= MAX_SAMPLE_FILE_SIZE &&
        !isSensitiveFile(entry.path)
      );
    });

    const readOne = async (entry: StagedEntry): Promise<FileText | null> => {
      try {
        return { entry, data: await readFile(join(project.root, entry.path)) };
      } catch (error) {
        const msg = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Skipping unreadable file: ${entry.path} (${msg})`);
        return null;
      }
    };

    const results: FileText[] = [];
    for (let i = 0; i < candidates.length; i += CONCURRENCY) {
      const batch = await Promise.all(
        candidates.slice(i, i + CONCURRENCY).map(readOne),
      );
      for (const item of batch) {
        if (item) results.push(item);
      }
    }
    return results;
  }
}
