/**
 * Metrics collection for monitoring and observability
 */

import { promises as fs } from 'node:fs';
import { Classification } from '../types/collection';
import { getLogger, type Logger } from './logger';

export type EntityOutcome = Classification | 'failed';

export interface ApiMetrics {
  service: string;
  calls: number;
  failures: number;
  totalDuration: number;
  averageDuration: number;
  minDuration: number;
  maxDuration: number;
}

export interface DegradedModeEvent {
  timestamp: string;
  component: string;
  reason: string;
  scope: 'item' | 'global';
}

export interface ExecutionMetrics {
  startTime: string;
  endTime: string;
  duration: number;
  outcomes: Record<EntityOutcome, number>;
  classifierCalls: number;
  skippedByEarlyTermination: number;
  apiCalls: ApiMetrics[];
  degradedMode: DegradedModeEvent[];
  errors: Array<{
    timestamp: string;
    source: string;
    error: string;
  }>;
  success: boolean;
}

function emptyOutcomes(): Record<EntityOutcome, number> {
  return {
    [Classification.POSITIVE]: 0,
    [Classification.NEGATIVE]: 0,
    [Classification.UNKNOWN]: 0,
    failed: 0
  };
}

export class MetricsCollector {
  private static instance: MetricsCollector | undefined;
  private logger: Logger;
  private startTime: Date;
  private apiMetrics: Map<string, ApiMetrics>;
  private outcomes: Record<EntityOutcome, number>;
  private classifierCalls: number;
  private skipped: number;
  private degraded: DegradedModeEvent[];
  private errors: Array<{ timestamp: string; source: string; error: string }>;

  constructor(logger?: Logger) {
    this.logger = logger || getLogger();
    this.startTime = new Date();
    this.apiMetrics = new Map();
    this.outcomes = emptyOutcomes();
    this.classifierCalls = 0;
    this.skipped = 0;
    this.degraded = [];
    this.errors = [];
  }

  /**
   * Get singleton instance
   */
  static getInstance(logger?: Logger): MetricsCollector {
    if (!MetricsCollector.instance) {
      MetricsCollector.instance = new MetricsCollector(logger);
    }
    return MetricsCollector.instance;
  }

  /**
   * Reset metrics (useful for testing)
   */
  reset(): void {
    this.startTime = new Date();
    this.apiMetrics.clear();
    this.outcomes = emptyOutcomes();
    this.classifierCalls = 0;
    this.skipped = 0;
    this.degraded = [];
    this.errors = [];
  }

  /**
   * Track an outbound call (login, validate, fetch, classify)
   */
  trackApiCall(service: string, duration: number, success: boolean = true): void {
    const existing = this.apiMetrics.get(service) || {
      service,
      calls: 0,
      failures: 0,
      totalDuration: 0,
      averageDuration: 0,
      minDuration: Infinity,
      maxDuration: 0
    };

    const calls = existing.calls + 1;
    const totalDuration = existing.totalDuration + duration;

    this.apiMetrics.set(service, {
      service,
      calls,
      failures: success ? existing.failures : existing.failures + 1,
      totalDuration,
      averageDuration: totalDuration / calls,
      minDuration: Math.min(existing.minDuration, duration),
      maxDuration: Math.max(existing.maxDuration, duration)
    });

    this.logger.debug(`API call tracked: ${service}`, { duration, success, totalCalls: calls });
  }

  /**
   * Track the final outcome of one entity
   */
  trackOutcome(outcome: EntityOutcome): void {
    this.outcomes[outcome] += 1;
  }

  /**
   * Classifier calls made for one entity and sub-records left unexamined after POSITIVE
   */
  trackClassification(calls: number, skippedCount: number): void {
    this.classifierCalls += calls;
    this.skipped += skippedCount;
  }

  /**
   * Record that a component fell back to a degraded implementation
   */
  trackDegradedMode(component: string, reason: string, scope: DegradedModeEvent['scope']): void {
    this.degraded.push({
      timestamp: new Date().toISOString(),
      component,
      reason,
      scope
    });
  }

  /**
   * Track error
   */
  trackError(source: string, error: Error): void {
    this.errors.push({
      timestamp: new Date().toISOString(),
      source,
      error: error.message
    });
  }

  getApiMetrics(service: string): ApiMetrics | undefined {
    return this.apiMetrics.get(service);
  }

  /**
   * Get summary metrics
   */
  getSummary(): ExecutionMetrics {
    const endTime = new Date();
    const duration = (endTime.getTime() - this.startTime.getTime()) / 1000;

    return {
      startTime: this.startTime.toISOString(),
      endTime: endTime.toISOString(),
      duration,
      outcomes: { ...this.outcomes },
      classifierCalls: this.classifierCalls,
      skippedByEarlyTermination: this.skipped,
      apiCalls: Array.from(this.apiMetrics.values()),
      degradedMode: [...this.degraded],
      errors: [...this.errors],
      success: this.errors.length === 0
    };
  }

  /**
   * Log summary
   */
  logSummary(): void {
    const summary = this.getSummary();

    this.logger.info('=== Execution Summary ===', {
      duration: summary.duration,
      outcomes: summary.outcomes,
      classifierCalls: summary.classifierCalls,
      skippedByEarlyTermination: summary.skippedByEarlyTermination,
      success: summary.success
    });

    summary.apiCalls.forEach((api) => {
      this.logger.info(`API: ${api.service}`, {
        calls: api.calls,
        failures: api.failures,
        averageDuration: Math.round(api.averageDuration),
        minDuration: Math.round(api.minDuration),
        maxDuration: Math.round(api.maxDuration)
      });
    });

    if (summary.degradedMode.length > 0) {
      this.logger.warn(`Degraded mode used ${summary.degradedMode.length} times`);
    }

    if (summary.errors.length > 0) {
      this.logger.warn(`Execution completed with ${summary.errors.length} errors`);
    }
  }

  exportToJson(): string {
    return JSON.stringify(this.getSummary(), null, 2);
  }

  async saveToFile(filepath: string): Promise<void> {
    await fs.writeFile(filepath, this.exportToJson());
    this.logger.info(`Metrics saved to ${filepath}`);
  }
}

export function getMetricsCollector(logger?: Logger): MetricsCollector {
  return MetricsCollector.getInstance(logger);
}
