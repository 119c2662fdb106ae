import { Injectable, Logger } from '@nestjs/common';
import { readFile, access } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  AppConfig,
  LimitsConfig,
  ProviderConfig,
  ReviewSettings,
} from './config.types.js';
import { isLogLevelName, LOG_LEVEL_NAMES } from './log-levels.js';
import { DEFAULT_CONFIG, CONFIG_FILE_NAME } from '../constants.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = resolve(__dirname, '..', '..');
const CWD_CONFIG_PATH = resolve(CONFIG_FILE_NAME);

const MAX_PROVIDER_TIMEOUT_MS = 120_000;
const MAX_RETRY_DELAY_MS = 10_000;

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Trim an environment value and strip one pair of surrounding quotes.
 * Returns undefined for unset or blank values.
 */
export function cleanEnv(value: string | undefined): string | undefined {
  if (typeof value !== 'string') return undefined;
  let v = value.trim();
  if (
    v.length >= 2 &&
    ((v.startsWith("'") && v.endsWith("'")) ||
      (v.startsWith('"') && v.endsWith('"')))
  ) {
    v = v.slice(1, -1).trim();
  }
  return v === '' ? undefined : v;
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (typeof value === 'object' && value !== null) deepFreeze(value);
  }
  return Object.freeze(obj);
}

@Injectable()
export class ConfigService {
  // Plain Logger: the injectable ConsoleLogger is built from this service's config.
  private readonly logger = new Logger(ConfigService.name);
  private config: Readonly<AppConfig> | null = null;

  async loadConfig(configPath?: string): Promise<Readonly<AppConfig>> {
    const { parsed, source } = await this.resolveBaseConfig(configPath);
    const config = this.validateConfig(parsed, source);
    this.applyEnvOverrides(config);
    this.config = deepFreeze(config);
    return this.config;
  }

  getConfig(): Readonly<AppConfig> {
    if (!this.config) {
      throw new Error('Config not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  private async resolveBaseConfig(
    configPath?: string,
  ): Promise<{ parsed: unknown; source: string }> {
    if (configPath) {
      return this.loadFromFile(resolve(configPath));
    }
    const configJson = process.env.CONFIG_JSON;
    if (configJson && configJson.trim() !== '') {
      return this.parseConfigJson(configJson);
    }
    if (await this.fileExists(CWD_CONFIG_PATH)) {
      return this.loadFromFile(CWD_CONFIG_PATH);
    }
    return this.loadFromFile(resolve(PROJECT_ROOT, CONFIG_FILE_NAME));
  }

  private async fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  private async loadFromFile(
    filePath: string,
  ): Promise<{ parsed: unknown; source: string }> {
    const content = await readFile(filePath, 'utf-8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      const msg = error instanceof SyntaxError ? error.message : String(error);
      throw new Error(`Failed to parse config file "${filePath}": ${msg}`);
    }
    return { parsed, source: filePath };
  }

  private parseConfigJson(configJson: string): {
    parsed: unknown;
    source: string;
  } {
    let parsed: unknown;
    try {
      parsed = JSON.parse(configJson);
    } catch (error) {
      const msg = error instanceof SyntaxError ? error.message : String(error);
      throw new Error(
        `Failed to parse CONFIG_JSON environment variable: ${msg}`,
      );
    }
    return { parsed, source: 'CONFIG_JSON env' };
  }

  private applyEnvOverrides(config: AppConfig): void {
    config.provider.apiKey = cleanEnv(process.env.YANDEX_API_KEY);
    config.provider.folderId = cleanEnv(process.env.YANDEX_FOLDER_ID);

    const model = cleanEnv(process.env.YANDEX_GPT_MODEL);
    if (model) {
      if (/^[^\n\r]{1,100}$/.test(model)) {
        config.provider.model = model;
      } else {
        this.logger.warn(
          'Ignoring invalid YANDEX_GPT_MODEL env (must be 1-100 chars, no newlines)',
        );
      }
    }
    const endpoint = cleanEnv(process.env.YANDEX_GPT_ENDPOINT);
    if (endpoint) {
      if (this.isHttpUrl(endpoint)) {
        config.provider.endpoint = endpoint;
      } else {
        this.logger.warn('Ignoring invalid YANDEX_GPT_ENDPOINT env (not an http(s) URL)');
      }
    }
    const timeout = cleanEnv(process.env.PROVIDER_TIMEOUT_MS);
    if (timeout) {
      const parsed = Number(timeout);
      if (
        Number.isInteger(parsed) &&
        parsed > 0 &&
        parsed <= MAX_PROVIDER_TIMEOUT_MS
      ) {
        config.provider.timeoutMs = parsed;
      }
    }
    const retries = cleanEnv(process.env.PROVIDER_MAX_RETRIES);
    if (retries === '0' || retries === '1') {
      config.provider.maxRetries = Number(retries);
    }
    const level = cleanEnv(process.env.LOG_LEVEL)?.toLowerCase();
    if (level) {
      if (isLogLevelName(level)) {
        config.logLevel = level;
      } else {
        this.logger.warn(
          `Ignoring unknown LOG_LEVEL "${level}", using "${config.logLevel}"`,
        );
      }
    }
  }

  private isHttpUrl(value: string): boolean {
    try {
      const url = new URL(value);
      return url.protocol === 'https:' || url.protocol === 'http:';
    } catch {
      return false;
    }
  }

  /** Missing fields fall back to DEFAULT_CONFIG; present fields must be valid. */
  private validateConfig(parsed: unknown, source: string): AppConfig {
    if (!isRecord(parsed)) {
      throw new Error(`Invalid config (${source}): root must be a JSON object`);
    }
    const provider = this.section(parsed, 'provider', source);
    const limits = this.section(parsed, 'limits', source);
    const review = this.section(parsed, 'review', source);

    const defaults = DEFAULT_CONFIG;
    const providerConfig: ProviderConfig = {
      model: this.readString(provider, 'provider.model', defaults.provider.model, source),
      endpoint: this.readString(provider, 'provider.endpoint', defaults.provider.endpoint, source),
      timeoutMs: this.readInt(provider, 'provider.timeoutMs', defaults.provider.timeoutMs, source, 1, MAX_PROVIDER_TIMEOUT_MS),
      maxRetries: this.readInt(provider, 'provider.maxRetries', defaults.provider.maxRetries, source, 0, 1),
      retryDelayMs: this.readInt(provider, 'provider.retryDelayMs', defaults.provider.retryDelayMs, source, 0, MAX_RETRY_DELAY_MS),
      temperature: this.readNumber(provider, 'provider.temperature', defaults.provider.temperature, source, 0, 1),
      maxTokens: this.readInt(provider, 'provider.maxTokens', defaults.provider.maxTokens, source, 1, 8000),
    };
    if (!this.isHttpUrl(providerConfig.endpoint)) {
      throw new Error(
        `Invalid config (${source}): "provider.endpoint" must be an http(s) URL`,
      );
    }

    const limitsConfig: LimitsConfig = {
      maxUploadBytes: this.readInt(limits, 'limits.maxUploadBytes', defaults.limits.maxUploadBytes, source, 1),
      maxDocumentBytes: this.readInt(limits, 'limits.maxDocumentBytes', defaults.limits.maxDocumentBytes, source, 1),
      maxArchiveEntries: this.readInt(limits, 'limits.maxArchiveEntries', defaults.limits.maxArchiveEntries, source, 1),
      maxExtractedBytes: this.readInt(limits, 'limits.maxExtractedBytes', defaults.limits.maxExtractedBytes, source, 1),
      maxEntryBytes: this.readInt(limits, 'limits.maxEntryBytes', defaults.limits.maxEntryBytes, source, 1),
    };

    const reviewSettings: ReviewSettings = {
      language: this.readString(review, 'review.language', defaults.review.language, source),
      maxSampleBytes: this.readInt(review, 'review.maxSampleBytes', defaults.review.maxSampleBytes, source, 1),
      maxFindings: this.readInt(review, 'review.maxFindings', defaults.review.maxFindings, source, 1),
    };
    if (!/^[a-zA-Z-]{2,10}$/.test(reviewSettings.language)) {
      throw new Error(
        `Invalid config (${source}): "review.language" must be 2-10 alpha/dash chars`,
      );
    }

    const rawLevel = parsed.logLevel ?? defaults.logLevel;
    if (typeof rawLevel !== 'string' || !isLogLevelName(rawLevel)) {
      throw new Error(
        `Invalid config (${source}): "logLevel" must be one of ${LOG_LEVEL_NAMES.join(', ')}`,
      );
    }

    return {
      provider: providerConfig,
      limits: limitsConfig,
      review: reviewSettings,
      logLevel: rawLevel,
    };
  }

  private section(parsed: JsonRecord, key: string, source: string): JsonRecord {
    const value = parsed[key];
    if (value === undefined) return {};
    if (!isRecord(value)) {
      throw new Error(`Invalid config (${source}): "${key}" must be an object`);
    }
    return value;
  }

  private fieldName(path: string): string {
    return path.slice(path.lastIndexOf('.') + 1);
  }

  private readString(
    section: JsonRecord,
    path: string,
    fallback: string,
    source: string,
  ): string {
    const value = section[this.fieldName(path)];
    if (value === undefined) return fallback;
    if (typeof value !== 'string' || value.trim() === '') {
      throw new Error(
        `Invalid config (${source}): "${path}" must be a non-empty string`,
      );
    }
    return value.trim();
  }

  private readInt(
    section: JsonRecord,
    path: string,
    fallback: number,
    source: string,
    min: number,
    max: number = Number.MAX_SAFE_INTEGER,
  ): number {
    const value = section[this.fieldName(path)];
    if (value === undefined) return fallback;
    if (
      typeof value !== 'number' ||
      !Number.isInteger(value) ||
      value < min ||
      value > max
    ) {
      throw new Error(
        `Invalid config (${source}): "${path}" must be an integer between ${min} and ${max}`,
      );
    }
    return value;
  }

  private readNumber(
    section: JsonRecord,
    path: string,
    fallback: number,
    source: string,
    min: number,
    max: number,
  ): number {
    const value = section[this.fieldName(path)];
    if (value === undefined) return fallback;
    if (
      typeof value !== 'number' ||
      !Number.isFinite(value) ||
      value < min ||
      value > max
    ) {
      throw new Error(
        `Invalid config (${source}): "${path}" must be a number between ${min} and ${max}`,
      );
    }
    return value;
  }
}
