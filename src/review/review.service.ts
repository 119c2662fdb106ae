import { Injectable, ConsoleLogger, Inject } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { ConfigService } from '../config/config.service.js';
import type { ProviderConfig } from '../config/config.types.js';
import { UPLOAD_FIELDS } from '../constants.js';
import { ArchiveStagerService } from './archive-stager.service.js';
import { ArtifactValidatorService } from './artifact-validator.service.js';
import { OfflineReviewerService } from './offline-reviewer.service.js';
import { OnlineReviewerService } from './online-reviewer.service.js';
import { ProjectInspectorService } from './project-inspector.service.js';
import { assembleResponse } from './response-assembler.js';
import { retryWithBackoff, sanitizeErrorMessage } from './retry-utils.js';
import { selectReviewMode } from './review-mode.js';
import { ReviewAbortedError } from './review.errors.js';
import type {
  ProjectInsight,
  ReviewRequest,
  ReviewResponse,
  ReviewResult,
  StagedProject,
  UploadedPart,
  ValidatedArtifacts,
} from './review.types.js';

export interface LocalReviewPaths {
  description: string;
  checklist: string;
  archive: string;
}

interface Generated {
  result: ReviewResult;
  mode: ReviewResponse['mode'];
  degraded: boolean;
}

const MEDIA_TYPE_BY_EXTENSION: Record<string, string> = {
  '.html': 'text/html',
  '.htm': 'text/html',
  '.xhtml': 'application/xhtml+xml',
  '.zip': 'application/zip',
};

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new ReviewAbortedError();
}

@Injectable()
export class ReviewService {
  constructor(
    @Inject(ConsoleLogger) private readonly logger: ConsoleLogger,
    @Inject(ConfigService) private readonly configService: ConfigService,
    @Inject(ArtifactValidatorService)
    private readonly validator: ArtifactValidatorService,
    @Inject(ArchiveStagerService) private readonly stager: ArchiveStagerService,
    @Inject(ProjectInspectorService)
    private readonly inspector: ProjectInspectorService,
    @Inject(OfflineReviewerService)
    private readonly offlineReviewer: OfflineReviewerService,
    @Inject(OnlineReviewerService)
    private readonly onlineReviewer: OnlineReviewerService,
  ) {
    this.logger.setContext(ReviewService.name);
  }

  /**
   * Validate, stage, inspect and review one upload. Validation and staging
   * failures propagate; online failures fall back to the offline review.
   */
  async run(request: ReviewRequest, signal?: AbortSignal): Promise<ReviewResponse> {
    const id = `review-${randomUUID().slice(0, 8)}`;
    const startMs = Date.now();
    const config = this.configService.getConfig();
    this.logger.log(`Starting review ${id}`);

    let artifacts: ValidatedArtifacts;
    try {
      artifacts = this.validator.validate(request, config.limits);
    } catch (error) {
      this.logger.debug(`${id}: Start -> Rejected (${sanitizeErrorMessage(error)})`);
      throw error;
    }
    this.logger.debug(`${id}: Start -> Validated`);

    let staged = false;
    let generated: Generated;
    try {
      generated = await this.stager.withStagedProject(
        artifacts.archive.buffer,
        config.limits,
        async (project) => {
          staged = true;
          this.logger.debug(`${id}: Validated -> Staged (${project.entries.length} files)`);
          throwIfAborted(signal);
          const insight = await this.inspector.inspect(project, artifacts);
          throwIfAborted(signal);
          return this.generate(id, insight, project, config.provider, signal);
        },
      );
    } catch (error) {
      if (!staged) {
        this.logger.debug(`${id}: Validated -> Rejected (${sanitizeErrorMessage(error)})`);
      }
      throw error;
    }

    const response = assembleResponse(generated.result, {
      id,
      mode: generated.mode,
      degraded: generated.degraded,
      durationMs: Date.now() - startMs,
    });
    this.logger.debug(`${id}: Reviewed -> Completed`);
    this.logger.log(
      `Review ${id} completed in ${response.durationMs}ms (${response.mode}${response.degraded ? ', degraded' : ''}, score ${response.score})`,
    );
    return response;
  }

  /** Review three files from disk through the same pipeline as an upload. */
  async reviewLocal(paths: LocalReviewPaths, signal?: AbortSignal): Promise<ReviewResponse> {
    const [description, checklist, archive] = await Promise.all([
      this.readPart(paths.description, UPLOAD_FIELDS.description),
      this.readPart(paths.checklist, UPLOAD_FIELDS.checklist),
      this.readPart(paths.archive, UPLOAD_FIELDS.archive),
    ]);
    return this.run({ description, checklist, archive }, signal);
  }

  private async readPart(filePath: string, fieldName: string): Promise<UploadedPart> {
    return {
      fieldName,
      originalName: basename(filePath),
      mimeType:
        MEDIA_TYPE_BY_EXTENSION[extname(filePath).toLowerCase()] ??
        'application/octet-stream',
      buffer: await readFile(filePath),
    };
  }

  private async generate(
    id: string,
    insight: ProjectInsight,
    project: StagedProject,
    provider: Readonly<ProviderConfig>,
    signal?: AbortSignal,
  ): Promise<Generated> {
    const mode = selectReviewMode(provider);
    if (mode.kind === 'offline') {
      this.logger.debug(`${id}: Staged -> Reviewed (offline, ${mode.reason})`);
      return { result: this.offlineReviewer.review(insight), mode: 'offline', degraded: false };
    }

    try {
      const result = await retryWithBackoff(
        () => this.onlineReviewer.review(insight, project, mode.credentials, signal),
        {
          maxRetries: provider.maxRetries,
          label: `Online review ${id}`,
          logger: this.logger,
          baseDelayMs: provider.retryDelayMs,
          signal,
        },
      );
      this.logger.debug(`${id}: Staged -> Reviewed (online)`);
      return { result, mode: 'online', degraded: false };
    } catch (error) {
      throwIfAborted(signal);
      this.logger.warn(
        `Online review ${id} failed, using offline review: ${sanitizeErrorMessage(error)}`,
      );
      this.logger.debug(`${id}: Staged -> Degraded -> Reviewed (offline)`);
      return { result: this.offlineReviewer.review(insight), mode: 'offline', degraded: true };
    }
  }
}
