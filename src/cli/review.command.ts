import { Command, CommandRunner, Option } from 'nest-commander';
import { Inject } from '@nestjs/common';
import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { ReviewService } from '../review/review.service.js';
import { ConfigService } from '../config/config.service.js';
import { ReviewError } from '../review/review.errors.js';
import { renderMarkdown, renderSummary, sanitize } from './report-renderer.js';

export interface ReviewCommandOptions {
  desc?: string;
  checklist?: string;
  zip?: string;
  out?: string;
  md?: string;
  config?: string;
}

const DEFAULT_OUT = 'review.json';

@Command({
  name: 'review',
  description: 'Review a project from a description, a checklist and a zipped codebase',
  options: { isDefault: true },
})
export class ReviewCommand extends CommandRunner {
  constructor(
    @Inject(ReviewService) private readonly reviewService: ReviewService,
    @Inject(ConfigService) private readonly configService: ConfigService,
  ) {
    super();
  }

  async run(_params: string[], options: ReviewCommandOptions): Promise<void> {
    const { desc, checklist, zip } = options;
    if (!desc || !checklist || !zip) {
      throw new Error('Please provide --desc, --checklist and --zip.');
    }
    await this.configService.loadConfig(options.config);

    const controller = new AbortController();
    const onInterrupt = (): void => controller.abort();
    process.once('SIGINT', onInterrupt);

    console.log(`Reviewing ${zip}...\n`);
    try {
      const response = await this.reviewService.reviewLocal(
        { description: desc, checklist, archive: zip },
        controller.signal,
      );

      const out = resolve(options.out ?? DEFAULT_OUT);
      await writeFile(out, `${JSON.stringify(response, null, 2)}\n`, 'utf-8');
      if (options.md) {
        await writeFile(resolve(options.md), renderMarkdown(response), 'utf-8');
      }

      console.log(renderSummary(response));
      console.log(`\nWrote ${out}${options.md ? ` and ${resolve(options.md)}` : ''}`);
    } catch (error) {
      if (!(error instanceof ReviewError)) throw error;
      console.error(`Error [${error.code}]: ${sanitize(error.message)}`);
      process.exitCode = 1;
    } finally {
      process.off('SIGINT', onInterrupt);
    }
  }

  @Option({ flags: '--desc <path>', description: 'Project description (HTML)' })
  parseDesc(val: string) { return val; }

  @Option({ flags: '--checklist <path>', description: 'Checklist (HTML)' })
  parseChecklist(val: string) { return val; }

  @Option({ flags: '--zip <path>', description: 'Project archive (zip)' })
  parseZip(val: string) { return val; }

  @Option({ flags: '--out <path>', description: `JSON output path (default: ${DEFAULT_OUT})` })
  parseOut(val: string) { return val; }

  @Option({ flags: '--md <path>', description: 'Also write a markdown report' })
  parseMd(val: string) { return val; }

  @Option({ flags: '--config <path>', description: 'Config file path' })
  parseConfig(val: string) { return val; }
}
