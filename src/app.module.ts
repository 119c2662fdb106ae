import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { AppConfigModule } from './config/config.module.js';
import { HealthModule } from './health/health.module.js';
import { ReviewExceptionFilter } from './review/review-exception.filter.js';
import { ReviewModule } from './review/review.module.js';

@Module({
  imports: [AppConfigModule, ReviewModule, HealthModule],
  providers: [{ provide: APP_FILTER, useClass: ReviewExceptionFilter }],
})
export class AppModule {}
