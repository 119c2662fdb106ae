import type { LogLevelName } from './log-levels.js';

export interface ProviderConfig {
  /** Only ever read from YANDEX_API_KEY. */
  apiKey?: string;
  /** Only ever read from YANDEX_FOLDER_ID. */
  folderId?: string;
  model: string;
  endpoint: string;
  timeoutMs: number;
  /** 0 or 1: an online call is retried at most once. */
  maxRetries: number;
  retryDelayMs: number;
  temperature: number;
  maxTokens: number;
}

export interface LimitsConfig {
  maxUploadBytes: number;
  maxDocumentBytes: number;
  maxArchiveEntries: number;
  maxExtractedBytes: number;
  maxEntryBytes: number;
}

export interface ReviewSettings {
  language: string;
  maxSampleBytes: number;
  maxFindings: number;
}

export interface AppConfig {
  provider: ProviderConfig;
  limits: LimitsConfig;
  review: ReviewSettings;
  logLevel: LogLevelName;
}
