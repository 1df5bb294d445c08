/**
 * Health Monitor
 *
 * Decides whether remindctl can take writes right now. Reports are cached
 * for a short window so bursts of writes do not each spawn a status check.
 */

import type { RemindctlExecutor } from '../integrations/remindctl-runner.js';
import type { RunnerFailure } from '../types/errors.js';
import { createLogger } from '../utils/logger.js';

const healthLogger = createLogger('health');

export interface HealthReport {
  available: boolean;
  authorized: boolean;
  status: string;
  checkedAt: string;
  failure?: RunnerFailure;
}

export interface HealthProbe {
  check(): Promise<HealthReport>;
  isAvailable(): Promise<boolean>;
}

export const DEFAULT_HEALTH_CACHE_MS = 5000;

export class HealthMonitor implements HealthProbe {
  private lastReport: HealthReport | null = null;
  private lastCheckedAtMs = 0;

  constructor(
    private readonly runner: RemindctlExecutor,
    private readonly cacheMs: number = DEFAULT_HEALTH_CACHE_MS,
    private readonly now: () => number = Date.now
  ) {}

  async check(): Promise<HealthReport> {
    const result = await this.runner.execute({ op: 'status' });
    const checkedAtMs = this.now();
    const checkedAt = new Date(checkedAtMs).toISOString();

    const report: HealthReport = result.ok
      ? {
          available: result.payload.authorized,
          authorized: result.payload.authorized,
          status: result.payload.status,
          checkedAt,
        }
      : {
          available: false,
          authorized: false,
          status: 'unavailable',
          checkedAt,
          failure: result.failure,
        };

    if (this.lastReport && this.lastReport.available !== report.available) {
      healthLogger.info(
        { available: report.available, status: report.status },
        'Backend availability changed'
      );
    }
    this.lastReport = report;
    this.lastCheckedAtMs = checkedAtMs;
    return report;
  }

  async isAvailable(): Promise<boolean> {
    if (this.lastReport && this.now() - this.lastCheckedAtMs < this.cacheMs) {
      return this.lastReport.available;
    }
    const report = await this.check();
    return report.available;
  }

  getLastReport(): HealthReport | null {
    return this.lastReport;
  }
}
