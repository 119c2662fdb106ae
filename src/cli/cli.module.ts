import { Module } from '@nestjs/common';
import { AppConfigModule } from '../config/config.module.js';
import { ReviewModule } from '../review/review.module.js';
import { ReviewCommand } from './review.command.js';

@Module({
  imports: [AppConfigModule, ReviewModule],
  providers: [ReviewCommand],
})
export class CliModule {}
