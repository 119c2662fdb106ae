import { Controller, Get, Inject } from '@nestjs/common';
import { cpus, freemem, totalmem } from 'node:os';
import { ConfigService } from '../config/config.service.js';
import { SERVICE_NAME, SERVICE_VERSION } from '../constants.js';
import { selectReviewMode } from '../review/review-mode.js';

const MEMORY_CRITICAL_PERCENT = 90;

export interface HealthStatus {
  status: 'ok';
  timestamp: string;
  service: string;
}

export interface DetailedHealthStatus extends Omit<HealthStatus, 'status'> {
  status: 'ok' | 'degraded';
  version: string;
  uptimeSeconds: number;
  system: {
    memoryPercent: number;
    cpuCount: number;
  };
  provider: {
    configured: boolean;
    mode: 'online' | 'offline';
  };
  criticalIssues: string[];
}

/** Memory and CPU figures, injectable so tests can pin them. */
export interface SystemProbe {
  totalMemory(): number;
  freeMemory(): number;
  cpuCount(): number;
}

export const SYSTEM_PROBE = Symbol('SYSTEM_PROBE');

export const osSystemProbe: SystemProbe = {
  totalMemory: () => totalmem(),
  freeMemory: () => freemem(),
  cpuCount: () => cpus().length,
};

@Controller('health')
export class HealthController {
  constructor(
    @Inject(ConfigService) private readonly configService: ConfigService,
    @Inject(SYSTEM_PROBE) private readonly probe: SystemProbe,
  ) {}

  @Get()
  check(): HealthStatus {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME,
    };
  }

  @Get('detailed')
  detailed(): DetailedHealthStatus {
    const total = this.probe.totalMemory();
    const used = total - this.probe.freeMemory();
    const memoryPercent = total > 0 ? Math.round((used / total) * 1000) / 10 : 0;

    const criticalIssues: string[] = [];
    if (memoryPercent > MEMORY_CRITICAL_PERCENT) {
      criticalIssues.push(`Memory usage at ${memoryPercent}%`);
    }

    const mode = selectReviewMode(this.configService.getConfig().provider);
    return {
      status: criticalIssues.length > 0 ? 'degraded' : 'ok',
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      uptimeSeconds: Math.round(process.uptime()),
      system: { memoryPercent, cpuCount: this.probe.cpuCount() },
      provider: { configured: mode.kind === 'online', mode: mode.kind },
      criticalIssues,
    };
  }
}
