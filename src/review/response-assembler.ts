import { formatLocation } from './findings.js';
import { InternalError } from './review.errors.js';
import { SEVERITIES } from './review.types.js';
import type { ReviewResponse, ReviewResult } from './review.types.js';

export interface ResponseMeta {
  id: string;
  mode: ReviewResponse['mode'];
  degraded: boolean;
  durationMs: number;
}

export function assembleResponse(
  result: ReviewResult,
  meta: ResponseMeta,
): ReviewResponse {
  const { score } = result;
  if (!Number.isFinite(score) || score < 0 || score > 100) {
    throw new InternalError(`Review score out of range: ${score}`);
  }
  const findings = result.findings.map((finding, index) => {
    if (!SEVERITIES.includes(finding.severity)) {
      throw new InternalError(
        `Finding ${index} has unknown severity "${finding.severity}"`,
      );
    }
    if (finding.message.trim() === '') {
      throw new InternalError(`Finding ${index} has an empty message`);
    }
    return {
      location: formatLocation(finding),
      severity: finding.severity,
      rule: finding.rule,
      message: finding.message,
    };
  });
  return {
    id: meta.id,
    mode: meta.mode,
    degraded: meta.degraded,
    summary: result.summary,
    score: Math.round(score),
    findings,
    durationMs: Math.max(0, Math.round(meta.durationMs)),
  };
}
