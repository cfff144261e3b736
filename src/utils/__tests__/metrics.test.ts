/**
 * Unit tests for MetricsCollector
 */

import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Classification } from '../../types/collection';
import { createCapturingLogger, type LogEntry, Logger } from '../logger';
import { getMetricsCollector, MetricsCollector } from '../metrics';

describe('MetricsCollector', () => {
  let metrics: MetricsCollector;
  let logEntries: LogEntry[];

  beforeEach(() => {
    const capturing = createCapturingLogger();
    logEntries = capturing.entries;
    metrics = new MetricsCollector(capturing.logger);
  });

  describe('API Call Tracking', () => {
    it('should aggregate calls per service', () => {
      metrics.trackApiCall('yahoo:fetch', 100, true);
      metrics.trackApiCall('yahoo:fetch', 300, false);
      metrics.trackApiCall('rapras:login', 50, true);

      expect(metrics.getApiMetrics('yahoo:fetch')).toEqual({
        service: 'yahoo:fetch',
        calls: 2,
        failures: 1,
        totalDuration: 400,
        averageDuration: 200,
        minDuration: 100,
        maxDuration: 300
      });
      expect(metrics.getSummary().apiCalls).toHaveLength(2);
    });

    it('should return undefined for an unknown service', () => {
      expect(metrics.getApiMetrics('unknown')).toBeUndefined();
    });
  });

  describe('Outcome Tracking', () => {
    it('should count entity outcomes', () => {
      metrics.trackOutcome(Classification.POSITIVE);
      metrics.trackOutcome(Classification.POSITIVE);
      metrics.trackOutcome(Classification.UNKNOWN);
      metrics.trackOutcome('failed');

      expect(metrics.getSummary().outcomes).toEqual({
        POSITIVE: 2,
        NEGATIVE: 0,
        UNKNOWN: 1,
        failed: 1
      });
    });

    it('should add classifier calls and early-termination skips', () => {
      metrics.trackClassification(3, 9);
      metrics.trackClassification(12, 0);

      const summary = metrics.getSummary();
      expect(summary.classifierCalls).toBe(15);
      expect(summary.skippedByEarlyTermination).toBe(9);
    });
  });

  describe('Degraded Mode', () => {
    it('should record fallback events with their scope', () => {
      metrics.trackDegradedMode('tokenizer', 'no tokenizer configured', 'global');

      expect(metrics.getSummary().degradedMode).toEqual([
        {
          timestamp: expect.any(String),
          component: 'tokenizer',
          reason: 'no tokenizer configured',
          scope: 'global'
        }
      ]);
    });
  });

  describe('Error Tracking', () => {
    it('should mark the run unsuccessful once an error is tracked', () => {
      expect(metrics.getSummary().success).toBe(true);

      metrics.trackError('entity:alpha', new Error('socket hang up'));

      const summary = metrics.getSummary();
      expect(summary.success).toBe(false);
      expect(summary.errors).toEqual([
        { timestamp: expect.any(String), source: 'entity:alpha', error: 'socket hang up' }
      ]);
    });
  });

  describe('Reset', () => {
    it('should clear every counter', () => {
      metrics.trackApiCall('yahoo:fetch', 100);
      metrics.trackOutcome(Classification.NEGATIVE);
      metrics.trackClassification(2, 1);
      metrics.trackError('main', new Error('boom'));

      metrics.reset();

      const summary = metrics.getSummary();
      expect(summary.apiCalls).toEqual([]);
      expect(summary.outcomes).toEqual({ POSITIVE: 0, NEGATIVE: 0, UNKNOWN: 0, failed: 0 });
      expect(summary.classifierCalls).toBe(0);
      expect(summary.errors).toEqual([]);
    });
  });

  describe('Reporting', () => {
    it('should log a summary with one line per service', () => {
      metrics.trackApiCall('yahoo:fetch', 120);
      metrics.trackError('main', new Error('boom'));

      metrics.logSummary();

      const messages = logEntries.map((entry) => entry.message);
      expect(messages).toContain('=== Execution Summary ===');
      expect(messages).toContain('API: yahoo:fetch');
      expect(messages).toContain('Execution completed with 1 errors');
    });

    it('should export and save the summary as JSON', async () => {
      metrics.trackOutcome(Classification.POSITIVE);
      const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'metrics-'));
      const file = path.join(dir, 'execution-summary.json');

      try {
        await metrics.saveToFile(file);
        const saved: unknown = JSON.parse(await fs.readFile(file, 'utf8'));
        const exported: unknown = JSON.parse(metrics.exportToJson());

        expect(saved).toMatchObject({ outcomes: { POSITIVE: 1, NEGATIVE: 0 } });
        expect(exported).toMatchObject({ outcomes: { POSITIVE: 1, NEGATIVE: 0 } });
      } finally {
        await fs.rm(dir, { recursive: true, force: true });
      }
    });
  });

  describe('Singleton', () => {
    it('should return the same instance', () => {
      expect(getMetricsCollector(Logger.silent())).toBe(MetricsCollector.getInstance());
    });
  });
});
