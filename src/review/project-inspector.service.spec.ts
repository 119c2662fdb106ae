import { Test } from '@nestjs/testing';
import { ConsoleLogger } from '@nestjs/common';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import {
  ProjectInspectorService,
  isSensitiveFile,
} from './project-inspector.service.js';
import { ConfigService } from '../config/config.service.js';
import { DEFAULT_CONFIG } from '../constants.js';
import type {
  StagedEntry,
  StagedProject,
  UploadedPart,
  ValidatedArtifacts,
} from './review.types.js';

const part = (fieldName: string, content: string): UploadedPart => ({
  fieldName,
  originalName: `${fieldName}.html`,
  mimeType: 'text/html',
  buffer: Buffer.from(content),
});

const artifacts: ValidatedArtifacts = {
  description: part('desc', '<title>Demo</title><p>A demo app</p>'),
  checklist: part('checklist', '<ul></ul>'),
  archive: part('project_zip', 'unused'),
};

const withChecklist = (items: string[]): ValidatedArtifacts => ({
  ...artifacts,
  checklist: part(
    'checklist',
    `<ul>${items.map((item) => `<li>${item}</li>`).join('')}</ul>`,
  ),
});

describe('ProjectInspectorService', () => {
  let root: string;
  let maxSampleBytes: number;

  async function stage(files: Record<string, string>): Promise<StagedProject> {
    const entries: StagedEntry[] = [];
    for (const [path, content] of Object.entries(files)) {
      await mkdir(dirname(join(root, path)), { recursive: true });
      await writeFile(join(root, path), content);
      entries.push({ path, size: Buffer.byteLength(content) });
    }
    entries.sort((a, b) => (a.path < b.path ? -1 : 1));
    return { root, entries };
  }

  async function createService(): Promise<ProjectInspectorService> {
    const configService = {
      getConfig: () => ({
        ...DEFAULT_CONFIG,
        review: { ...DEFAULT_CONFIG.review, maxSampleBytes },
      }),
    };
    const module = await Test.createTestingModule({
      providers: [
        ProjectInspectorService,
        { provide: ConsoleLogger, useValue: new ConsoleLogger() },
        { provide: ConfigService, useValue: configService },
      ],
    }).compile();
    return module.get(ProjectInspectorService);
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'inspector-spec-'));
    maxSampleBytes = DEFAULT_CONFIG.review.maxSampleBytes;
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should parse documents and collect samples and findings', async () => {
    const project = await stage({
      'README.md': '# Demo\n',
      'requirements.txt': 'flask\n',
      'src/main.py': "import os\n\nprint('hi')\n# TODO: config\n",
      'tests/test_main.py': 'def test_ok():\n    assert True\n',
      '.env': 'KEY=test-secret\n',
      'image.png': 'not really a png',
    });
    const insight = await (await createService()).inspect(
      project,
      withChecklist(['Greets the user with print', 'Stores data in PostgreSQL']),
    );

    expect(insight.description).toEqual({
      title: 'Demo',
      headers: [],
      content: 'A demo app',
    });
    expect(insight.checklist).toEqual({
      title: '',
      items: ['Greets the user with print', 'Stores data in PostgreSQL'],
    });
    expect(insight.files).toBe(project.entries);
    expect(Object.keys(insight.samples)).toEqual([
      'README.md',
      'requirements.txt',
      'src/main.py',
      'tests/test_main.py',
    ]);
    expect(insight.samples['requirements.txt']).toBe('flask\n');
    expect(
      insight.heuristicFindings.map((f) => [f.path, f.line, f.rule, f.severity]),
    ).toEqual([
      ['.', undefined, 'checklist-item', 'medium'],
      ['.env', undefined, 'sensitive-file', 'high'],
      ['src/main.py', 3, 'stray-print', 'low'],
      ['src/main.py', 4, 'todo-marker', 'low'],
    ]);
    expect(insight.heuristicFindings[0]?.message).toBe(
      'No code found for checklist item "Stores data in PostgreSQL"',
    );
  });

  it('should retrieve the code matching each checklist item', async () => {
    const project = await stage({
      'README.md': '# Shop\n',
      'requirements.txt': 'flask\n',
      'src/cart.py': 'def add_to_cart(item):\n    cart.append(item)\n',
      'src/login.py': 'def login(user):\n    return user\n',
      'tests/test_cart.py': 'def test_cart():\n    add_to_cart(1)\n',
    });
    const insight = await (await createService()).inspect(
      project,
      withChecklist(['Users can login', 'Cart']),
    );

    expect(insight.ruleContexts).toEqual([
      {
        rule: 'Users can login',
        chunks: [
          {
            path: 'src/login.py',
            startLine: 1,
            endLine: 3,
            text: 'def login(user):\n    return user\n',
            score: 2,
          },
        ],
      },
      {
        rule: 'Cart',
        chunks: [
          expect.objectContaining({ path: 'src/cart.py', score: 3 }),
          expect.objectContaining({ path: 'tests/test_cart.py', score: 3 }),
        ],
      },
    ]);
    expect(insight.heuristicFindings).toEqual([]);
  });

  it('should not flag checklist items without searchable words', async () => {
    const project = await stage({
      'README.md': 'x',
      'package.json': '{}',
      'app.test.js': '',
    });
    const insight = await (await createService()).inspect(
      project,
      withChecklist(['a', 'It must be done']),
    );
    expect(insight.ruleContexts.map((c) => c.chunks)).toEqual([[], []]);
    expect(insight.heuristicFindings).toEqual([]);
  });

  it('should report only an empty project when there are no files', async () => {
    const insight = await (await createService()).inspect(
      { root, entries: [] },
      withChecklist(['Stores data in PostgreSQL']),
    );
    expect(insight.heuristicFindings).toEqual([
      {
        path: '.',
        severity: 'high',
        rule: 'empty-project',
        message: 'The archive contains no files',
      },
    ]);
    expect(insight.samples).toEqual({});
  });

  it('should report missing readme, manifest and tests', async () => {
    const project = await stage({ 'app.js': 'console.log(1)\n' });
    const insight = await (await createService()).inspect(project, artifacts);
    expect(insight.heuristicFindings.map((f) => [f.path, f.rule])).toEqual([
      ['.', 'missing-readme'],
      ['.', 'missing-dependency-manifest'],
      ['.', 'missing-tests'],
    ]);
  });

  it('should accept a README one directory down but not deeper', async () => {
    const service = await createService();
    const shallow = await stage({
      'project/README.md': 'x',
      'project/package.json': '{}',
      'project/app.spec.ts': '',
    });
    expect((await service.inspect(shallow, artifacts)).heuristicFindings).toEqual(
      [],
    );

    await rm(root, { recursive: true, force: true });
    root = await mkdtemp(join(tmpdir(), 'inspector-spec-'));
    const deep = await stage({
      'a/b/README.md': 'x',
      'a/go.mod': 'module x',
      'a/x_test.go': '',
    });
    expect(
      (await service.inspect(deep, artifacts)).heuristicFindings.map((f) => f.rule),
    ).toEqual(['missing-readme']);
  });

  it('should not flag prints behind a main guard', async () => {
    const project = await stage({
      'README.md': 'x',
      'setup.py': 'from setuptools import setup\n',
      'test_app.py': '',
      'app.py': "def main():\n    print('x')\n\nif __name__ == '__main__':\n    main()\n",
    });
    const insight = await (await createService()).inspect(project, artifacts);
    expect(insight.heuristicFindings).toEqual([]);
  });

  it('should stop sampling at the byte budget but keep checking python files', async () => {
    maxSampleBytes = 10;
    const project = await stage({
      'README.md': '# Demo\n',
      'requirements.txt': 'flask\n',
      'src/main.py': "print('hi')  # TODO\n",
      'tests/test_main.py': '',
    });
    const insight = await (await createService()).inspect(project, artifacts);
    expect(insight.samples).toEqual({
      'README.md': '# Demo\n',
      'requirements.txt': 'fla',
    });
    expect(insight.heuristicFindings.map((f) => f.rule)).toEqual(['stray-print']);
  });
});

describe('isSensitiveFile', () => {
  it('should match secrets by name or extension', () => {
    expect(isSensitiveFile('.env')).toBe(true);
    expect(isSensitiveFile('config/.env.local')).toBe(true);
    expect(isSensitiveFile('certs/server.pem')).toBe(true);
    expect(isSensitiveFile('deploy/id_rsa.key')).toBe(true);
    expect(isSensitiveFile('app/secrets.json')).toBe(true);
    expect(isSensitiveFile('credentials/db.txt')).toBe(true);
  });

  it('should not match ordinary files', () => {
    expect(isSensitiveFile('src/main.py')).toBe(false);
    expect(isSensitiveFile('docs/keyboard.md')).toBe(false);
    expect(isSensitiveFile('environment.md')).toBe(false);
  });
});
