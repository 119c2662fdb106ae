import {
  Controller,
  HttpCode,
  Inject,
  Post,
  Res,
  UploadedFiles,
  UseInterceptors,
} from '@nestjs/common';
import { FileFieldsInterceptor } from '@nestjs/platform-express';
import { UPLOAD_FIELDS } from '../constants.js';
import { ReviewService } from './review.service.js';
import type { ReviewResponse, UploadedPart } from './review.types.js';

/** The subset of a multer in-memory file the review reads. */
export interface ReceivedFile {
  fieldname: string;
  originalname: string;
  mimetype: string;
  buffer: Buffer;
}

export type ReceivedFiles = Partial<Record<string, ReceivedFile[]>>;

/** Emits `close`; a close before the response finished means the client went away. */
export interface ClosableResponse {
  readonly writableFinished: boolean;
  on(event: 'close', listener: () => void): unknown;
  off(event: 'close', listener: () => void): unknown;
}

function toPart(files: ReceivedFiles | undefined, field: string): UploadedPart | undefined {
  const file = files?.[field]?.[0];
  if (!file) return undefined;
  return {
    fieldName: file.fieldname,
    originalName: file.originalname,
    mimeType: file.mimetype,
    buffer: file.buffer,
  };
}

@Controller('review')
export class ReviewController {
  constructor(@Inject(ReviewService) private readonly reviewService: ReviewService) {}

  @Post('run')
  @HttpCode(200)
  @UseInterceptors(
    FileFieldsInterceptor([
      { name: UPLOAD_FIELDS.description, maxCount: 1 },
      { name: UPLOAD_FIELDS.checklist, maxCount: 1 },
      { name: UPLOAD_FIELDS.archive, maxCount: 1 },
    ]),
  )
  async run(
    @UploadedFiles() files: ReceivedFiles | undefined,
    @Res({ passthrough: true }) res: ClosableResponse,
  ): Promise<ReviewResponse> {
    const controller = new AbortController();
    const onClose = (): void => {
      if (!res.writableFinished) controller.abort();
    };
    res.on('close', onClose);
    try {
      return await this.reviewService.run(
        {
          description: toPart(files, UPLOAD_FIELDS.description),
          checklist: toPart(files, UPLOAD_FIELDS.checklist),
          archive: toPart(files, UPLOAD_FIELDS.archive),
        },
        controller.signal,
      );
    } finally {
      res.off('close', onClose);
    }
  }
}
