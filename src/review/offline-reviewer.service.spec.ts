import { Test } from '@nestjs/testing';
import { ConsoleLogger } from '@nestjs/common';
import { describe, it, expect } from 'vitest';
import {
  OfflineReviewerService,
  scoreFindings,
} from './offline-reviewer.service.js';
import { ConfigService } from '../config/config.service.js';
import { DEFAULT_CONFIG } from '../constants.js';
import type { Finding, ProjectInsight, Severity } from './review.types.js';

const finding = (severity: Severity, path = 'a.py'): Finding => ({
  path,
  severity,
  rule: 'test-rule',
  message: 'message',
});

function insight(overrides: Partial<ProjectInsight> = {}): ProjectInsight {
  return {
    description: { title: 'Demo', headers: [], content: '' },
    checklist: { title: '', items: ['a', 'b', 'c'] },
    files: [
      { path: 'main.py', size: 10 },
      { path: 'README.md', size: 5 },
    ],
    samples: {},
    ruleContexts: [],
    heuristicFindings: [],
    ...overrides,
  };
}

async function createService(maxFindings = 50): Promise<OfflineReviewerService> {
  const module = await Test.createTestingModule({
    providers: [
      OfflineReviewerService,
      { provide: ConsoleLogger, useValue: new ConsoleLogger() },
      {
        provide: ConfigService,
        useValue: {
          getConfig: () => ({
            ...DEFAULT_CONFIG,
            review: { ...DEFAULT_CONFIG.review, maxFindings },
          }),
        },
      },
    ],
  }).compile();
  return module.get(OfflineReviewerService);
}

describe('scoreFindings', () => {
  it('should subtract severity penalties from 100', () => {
    expect(scoreFindings([])).toBe(100);
    expect(scoreFindings([finding('high'), finding('medium'), finding('low')])).toBe(
      68,
    );
  });

  it('should never drop below 0', () => {
    expect(scoreFindings(Array.from({ length: 6 }, () => finding('high')))).toBe(0);
  });
});

describe('OfflineReviewerService', () => {
  it('should give a clean project a perfect score', async () => {
    const service = await createService();
    expect(service.review(insight())).toEqual({
      summary:
        'Demo: offline review of 2 files. Found 0 issues (0 high, 0 medium, 0 low). Checklist has 3 items.',
      findings: [],
      score: 100,
    });
  });

  it('should summarize findings per severity', async () => {
    const service = await createService();
    const findings = [finding('medium', '.'), finding('low'), finding('low', 'b.py')];
    const result = service.review(
      insight({
        description: { title: '', headers: [], content: '' },
        checklist: { title: '', items: ['only'] },
        files: [{ path: 'a.py', size: 1 }],
        heuristicFindings: findings,
      }),
    );
    expect(result.summary).toBe(
      'Untitled project: offline review of 1 file. Found 3 issues (0 high, 1 medium, 2 low). Checklist has 1 item.',
    );
    expect(result.findings).toEqual(findings);
    expect(result.score).toBe(86);
  });

  it('should cap findings and score only the kept ones', async () => {
    const service = await createService(2);
    const result = service.review(
      insight({
        heuristicFindings: [finding('high'), finding('high'), finding('high')],
      }),
    );
    expect(result.findings).toHaveLength(2);
    expect(result.score).toBe(60);
  });

  it('should be deterministic', async () => {
    const service = await createService();
    const input = insight({ heuristicFindings: [finding('medium')] });
    expect(service.review(input)).toEqual(service.review(input));
  });
});
