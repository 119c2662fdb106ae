import { Module } from '@nestjs/common';
import { MulterModule } from '@nestjs/platform-express';
import { ConfigService } from '../config/config.service.js';
import { ProviderModule } from '../provider/provider.module.js';
import { ArchiveStagerService } from './archive-stager.service.js';
import { ArtifactValidatorService } from './artifact-validator.service.js';
import { AutotestRunnerService } from './autotest-runner.service.js';
import { OfflineReviewerService } from './offline-reviewer.service.js';
import { OnlineReviewerService } from './online-reviewer.service.js';
import { ProjectInspectorService } from './project-inspector.service.js';
import { ReviewController } from './review.controller.js';
import { ReviewService } from './review.service.js';

@Module({
  imports: [
    ProviderModule,
    // No `dest` or `storage`: multer keeps parts in memory as `file.buffer`.
    MulterModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        limits: {
          fileSize: configService.getConfig().limits.maxUploadBytes,
        },
      }),
    }),
  ],
  controllers: [ReviewController],
  providers: [
    ArtifactValidatorService,
    ArchiveStagerService,
    ProjectInspectorService,
    OfflineReviewerService,
    AutotestRunnerService,
    OnlineReviewerService,
    ReviewService,
  ],
  exports: [ReviewService],
})
export class ReviewModule {}
