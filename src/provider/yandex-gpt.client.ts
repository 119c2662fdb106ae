import { Injectable, ConsoleLogger, Inject } from '@nestjs/common';
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { ConfigService } from '../config/config.service.js';
import { ProviderError } from '../review/review.errors.js';
import type { ProviderCredentials } from '../review/review-mode.js';
import { sanitizeErrorMessage } from '../review/retry-utils.js';

export const HTTP_CLIENT = Symbol('HTTP_CLIENT');

export type HttpClient = Pick<AxiosInstance, 'post'>;

export interface CompletionOptions {
  signal?: AbortSignal;
}

const completionResponseSchema = z.object({
  result: z.object({
    alternatives: z
      .array(
        z.object({
          message: z.object({ role: z.string().optional(), text: z.string() }),
          status: z.string().optional(),
        }),
      )
      .min(1),
  }),
});

/** Classify a failed completion call. */
export function toProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;
  if (axios.isCancel(error)) {
    return new ProviderError('aborted', 'Completion request was cancelled');
  }
  if (axios.isAxiosError(error)) {
    if (error.response) {
      const status = error.response.status;
      return new ProviderError('http', `Provider returned HTTP ${status}`, status);
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new ProviderError('timeout', 'Completion request timed out');
    }
  }
  return new ProviderError('network', sanitizeErrorMessage(error));
}

/** Client for the YandexGPT foundation models completion endpoint. */
@Injectable()
export class YandexGptClient {
  constructor(
    @Inject(ConsoleLogger) private readonly logger: ConsoleLogger,
    @Inject(ConfigService) private readonly configService: ConfigService,
    @Inject(HTTP_CLIENT) private readonly http: HttpClient,
  ) {
    this.logger.setContext(YandexGptClient.name);
  }

  async complete(
    prompt: string,
    credentials: ProviderCredentials,
    options: CompletionOptions = {},
  ): Promise<string> {
    const { provider } = this.configService.getConfig();
    const body = {
      modelUri: `gpt://${credentials.folderId}/${provider.model}`,
      completionOptions: {
        stream: false,
        temperature: provider.temperature,
        maxTokens: provider.maxTokens,
      },
      messages: [{ role: 'user', text: prompt }],
    };
    this.logger.debug(
      `Requesting completion from ${provider.model} (${prompt.length} chars)`,
    );

    let data: unknown;
    try {
      const response = await this.http.post<unknown>(provider.endpoint, body, {
        headers: {
          Authorization: `Api-Key ${credentials.apiKey}`,
          'x-folder-id': credentials.folderId,
          'Content-Type': 'application/json',
        },
        timeout: provider.timeoutMs,
        signal: options.signal,
      });
      data = response.data;
    } catch (error) {
      throw toProviderError(error);
    }

    const parsed = completionResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError('malformed', 'Unexpected completion response shape');
    }
    const text = parsed.data.result.alternatives[0].message.text.trim();
    if (text === '') {
      throw new ProviderError('malformed', 'Provider returned an empty completion');
    }
    return text;
  }
}
