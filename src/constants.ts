import type { AppConfig } from './config/config.types.js';

export const SERVICE_NAME = 'autoreview-service';
export const SERVICE_VERSION = '0.1.0';

export const CONFIG_FILE_NAME = 'autoreview.config.json';

/** Fallback for every field the loaded config leaves out. */
export const DEFAULT_CONFIG: AppConfig = {
  provider: {
    model: 'yandexgpt-lite',
    endpoint: 'https://llm.api.cloud.yandex.net/foundationModels/v1/completion',
    timeoutMs: 8_000,
    maxRetries: 1,
    retryDelayMs: 500,
    temperature: 0.2,
    maxTokens: 2_000,
  },
  limits: {
    maxUploadBytes: 20 * 1_048_576,
    maxDocumentBytes: 2 * 1_048_576,
    maxArchiveEntries: 2_000,
    maxExtractedBytes: 100 * 1_048_576,
    maxEntryBytes: 10 * 1_048_576,
  },
  review: {
    language: 'en',
    maxSampleBytes: 80_000,
    maxFindings: 50,
  },
  logLevel: 'info',
};

/** Multipart field names of POST /api/review/run. */
export const UPLOAD_FIELDS = {
  description: 'desc',
  checklist: 'checklist',
  archive: 'project_zip',
} as const;

/** Prefix of per-request staging directories under the OS temp dir. */
export const STAGING_DIR_PREFIX = 'autoreview-';

/** Files larger than this are listed but never sampled or scanned. */
export const MAX_SAMPLE_FILE_SIZE = 1_048_576;

/** Checklist items that are matched against the code and sent to the model. */
export const MAX_CHECKLIST_ITEMS = 50;

/** Maximum number of file paths listed in the online prompt. */
export const MAX_PROMPT_FILE_PATHS = 500;

/** Maximum characters of a single file sample in the online prompt. */
export const MAX_PROMPT_SAMPLE_CHARS = 2_000;

/** Maximum number of samples included in the online prompt. */
export const MAX_PROMPT_SAMPLES = 20;

/** Retrieved chunks sent to the model per checklist item. */
export const MAX_PROMPT_CHUNKS_PER_RULE = 3;

/** Maximum characters of a single retrieved chunk in the online prompt. */
export const MAX_PROMPT_CHUNK_CHARS = 1_200;

/** Budget for all retrieved chunks in the online prompt. */
export const MAX_PROMPT_RULE_CONTEXT_CHARS = 24_000;

/** Autotests run per online review. */
export const MAX_AUTOTESTS = 30;

export const SEVERITY_PENALTY = {
  high: 20,
  medium: 10,
  low: 2,
} as const;
