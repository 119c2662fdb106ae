import { Injectable, ConsoleLogger, Inject } from '@nestjs/common';
import { ConfigService } from '../config/config.service.js';
import { SEVERITY_PENALTY } from '../constants.js';
import type {
  Finding,
  ProjectInsight,
  ReviewResult,
  Severity,
} from './review.types.js';

export function scoreFindings(findings: Finding[]): number {
  const penalty = findings.reduce(
    (sum, finding) => sum + SEVERITY_PENALTY[finding.severity],
    0,
  );
  return Math.max(0, 100 - penalty);
}

function countBySeverity(findings: Finding[]): Record<Severity, number> {
  const counts: Record<Severity, number> = { high: 0, medium: 0, low: 0 };
  for (const finding of findings) counts[finding.severity]++;
  return counts;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/** Deterministic review built only from the local heuristics. */
@Injectable()
export class OfflineReviewerService {
  constructor(
    @Inject(ConsoleLogger) private readonly logger: ConsoleLogger,
    @Inject(ConfigService) private readonly configService: ConfigService,
  ) {
    this.logger.setContext(OfflineReviewerService.name);
  }

  review(insight: ProjectInsight): ReviewResult {
    const { maxFindings } = this.configService.getConfig().review;
    const findings = insight.heuristicFindings.slice(0, maxFindings);
    const counts = countBySeverity(findings);
    const title = insight.description.title || 'Untitled project';

    const summary =
      `${title}: offline review of ${plural(insight.files.length, 'file')}. ` +
      `Found ${plural(findings.length, 'issue')} ` +
      `(${counts.high} high, ${counts.medium} medium, ${counts.low} low). ` +
      `Checklist has ${plural(insight.checklist.items.length, 'item')}.`;

    const score = scoreFindings(findings);
    this.logger.debug(`Offline score ${score} from ${findings.length} findings`);
    return { summary, findings, score };
  }
}
