import type { ScoredChunk } from './code-index.js';

export type Severity = 'high' | 'medium' | 'low';

export const SEVERITIES: readonly Severity[] = ['high', 'medium', 'low'];

/** One multipart part as received from the client. */
export interface UploadedPart {
  fieldName: string;
  originalName: string;
  mimeType: string;
  buffer: Buffer;
}

export interface ReviewRequest {
  description?: UploadedPart;
  checklist?: UploadedPart;
  archive?: UploadedPart;
}

export interface ValidatedArtifacts {
  description: UploadedPart;
  checklist: UploadedPart;
  archive: UploadedPart;
}

export interface StagedEntry {
  /** Normalized, `/`-separated path relative to the staging root. */
  path: string;
  size: number;
}

export interface StagedProject {
  root: string;
  entries: StagedEntry[];
}

export interface ProjectDescription {
  title: string;
  headers: string[];
  content: string;
}

export interface Checklist {
  title: string;
  items: string[];
}

export interface Finding {
  /** Project-relative path, `.` for project-level findings. */
  path: string;
  line?: number;
  severity: Severity;
  rule: string;
  message: string;
}

/** Code retrieved for one checklist item. */
export interface RuleContext {
  rule: string;
  chunks: ScoredChunk[];
}

export interface ProjectInsight {
  description: ProjectDescription;
  checklist: Checklist;
  files: StagedEntry[];
  samples: Record<string, string>;
  ruleContexts: RuleContext[];
  heuristicFindings: Finding[];
}

export interface ReviewResult {
  summary: string;
  findings: Finding[];
  /** Integer in [0, 100]. */
  score: number;
}

export interface WireFinding {
  location: string;
  severity: Severity;
  rule: string;
  message: string;
}

export interface ReviewResponse {
  id: string;
  mode: 'online' | 'offline';
  /** True when an online attempt failed and the offline path produced the result. */
  degraded: boolean;
  summary: string;
  score: number;
  findings: WireFinding[];
  durationMs: number;
}
