import { Injectable, ConsoleLogger, Inject } from '@nestjs/common';
import { extname } from 'node:path';
import type { LimitsConfig } from '../config/config.types.js';
import { UPLOAD_FIELDS } from '../constants.js';
import { ValidationError } from './review.errors.js';
import type {
  ReviewRequest,
  UploadedPart,
  ValidatedArtifacts,
} from './review.types.js';

const HTML_MEDIA_TYPES = new Set(['text/html', 'application/xhtml+xml']);
const ZIP_MEDIA_TYPES = new Set([
  'application/zip',
  'application/x-zip-compressed',
  'application/x-zip',
  'multipart/x-zip',
]);
/** Types browsers and curl send when they cannot guess; the extension decides. */
const GENERIC_MEDIA_TYPES = new Set(['', 'application/octet-stream', 'text/plain']);
const HTML_EXTENSIONS = new Set(['.html', '.htm', '.xhtml']);

const ZIP_LOCAL_HEADER = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
const ZIP_EMPTY_ARCHIVE = Buffer.from([0x50, 0x4b, 0x05, 0x06]);

type PartKind = 'html' | 'zip';

/** Strip parameters such as `; charset=utf-8` and lower-case the type. */
export function baseMediaType(mimeType: string): string {
  return mimeType.split(';')[0].trim().toLowerCase();
}

export function isAcceptedMediaType(part: UploadedPart, kind: PartKind): boolean {
  const type = baseMediaType(part.mimeType);
  const ext = extname(part.originalName).toLowerCase();
  if (kind === 'html') {
    return (
      HTML_MEDIA_TYPES.has(type) ||
      (GENERIC_MEDIA_TYPES.has(type) && HTML_EXTENSIONS.has(ext))
    );
  }
  return (
    ZIP_MEDIA_TYPES.has(type) || (GENERIC_MEDIA_TYPES.has(type) && ext === '.zip')
  );
}

@Injectable()
export class ArtifactValidatorService {
  constructor(@Inject(ConsoleLogger) private readonly logger: ConsoleLogger) {
    this.logger.setContext(ArtifactValidatorService.name);
  }

  /** Checks every part before anything touches the filesystem. */
  validate(
    request: ReviewRequest,
    limits: Readonly<LimitsConfig>,
  ): ValidatedArtifacts {
    const description = this.checkPart(
      request.description,
      UPLOAD_FIELDS.description,
      'html',
      limits.maxDocumentBytes,
    );
    const checklist = this.checkPart(
      request.checklist,
      UPLOAD_FIELDS.checklist,
      'html',
      limits.maxDocumentBytes,
    );
    const archive = this.checkPart(
      request.archive,
      UPLOAD_FIELDS.archive,
      'zip',
      limits.maxUploadBytes,
    );
    if (!this.hasZipSignature(archive.buffer)) {
      throw new ValidationError(
        'INVALID_ARCHIVE',
        `Part "${UPLOAD_FIELDS.archive}" is not a zip archive`,
        UPLOAD_FIELDS.archive,
      );
    }
    this.logger.debug(
      `Validated artifacts (${description.buffer.length} + ${checklist.buffer.length} + ${archive.buffer.length} bytes)`,
    );
    return { description, checklist, archive };
  }

  private checkPart(
    part: UploadedPart | undefined,
    name: string,
    kind: PartKind,
    maxBytes: number,
  ): UploadedPart {
    if (!part) {
      throw new ValidationError('MISSING_PART', `Missing required part "${name}"`, name);
    }
    if (part.buffer.length === 0) {
      throw new ValidationError('EMPTY_PART', `Part "${name}" is empty`, name);
    }
    if (part.buffer.length > maxBytes) {
      throw new ValidationError(
        'PART_TOO_LARGE',
        `Part "${name}" exceeds ${maxBytes} bytes`,
        name,
      );
    }
    if (!isAcceptedMediaType(part, kind)) {
      const expected = kind === 'html' ? 'an HTML document' : 'a zip archive';
      throw new ValidationError(
        'UNSUPPORTED_MEDIA_TYPE',
        `Part "${name}" must be ${expected} (got "${part.mimeType || 'unknown'}")`,
        name,
      );
    }
    return part;
  }

  private hasZipSignature(buffer: Buffer): boolean {
    const head = buffer.subarray(0, 4);
    return head.equals(ZIP_LOCAL_HEADER) || head.equals(ZIP_EMPTY_ARCHIVE);
  }
}
