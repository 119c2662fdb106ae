import { Module } from '@nestjs/common';
import { HealthController, SYSTEM_PROBE, osSystemProbe } from './health.controller.js';

@Module({
  controllers: [HealthController],
  providers: [{ provide: SYSTEM_PROBE, useValue: osSystemProbe }],
})
export class HealthModule {}
