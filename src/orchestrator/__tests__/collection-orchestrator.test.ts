import { EntityTaskError } from '../../collectors';
import type { Exporter } from '../../exporters';
import {
  Classification,
  type CollectionResult,
  type CollectionTarget,
  type ExportRow,
  type FetchedEntity,
  isAdmitted
} from '../../types/collection';
import { err, ok, type Result } from '../../types/result';
import { AuthenticationError, ExportError } from '../../utils/errors';
import { createCapturingLogger, Logger } from '../../utils/logger';
import { MetricsCollector } from '../../utils/metrics';
import {
  CollectionAbortedError,
  CollectionOrchestrator,
  type EntityTaskRunner
} from '../collection-orchestrator';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function target(id: string, aggregateValue?: number): CollectionTarget {
  return {
    entityId: id,
    name: `Seller ${id}`,
    locator: `https://auctions.yahoo.co.jp/seller/${id}`,
    aggregateValue,
    threshold: aggregateValue === undefined ? undefined : 100000
  };
}

interface FakeRunnerOptions {
  latencyMs?: number;
  failing?: string[];
  fatal?: string[];
  slow?: Record<string, number>;
  classification?: (entityId: string) => Classification;
  classifyThrows?: string[];
  fetchThrows?: string[];
}

function fakeRunner(options: FakeRunnerOptions = {}) {
  let inFlight = 0;
  const stats = { maxInFlight: 0, fetched: [] as string[], classified: [] as string[] };

  const runner: EntityTaskRunner = {
    async fetch(entity: CollectionTarget): Promise<Result<FetchedEntity, EntityTaskError>> {
      stats.fetched.push(entity.entityId);
      inFlight++;
      stats.maxInFlight = Math.max(stats.maxInFlight, inFlight);
      try {
        await delay(options.slow?.[entity.entityId] ?? options.latencyMs ?? 0);
      } finally {
        inFlight--;
      }

      if (options.fetchThrows?.includes(entity.entityId)) {
        throw new Error('boom');
      }
      if (options.fatal?.includes(entity.entityId)) {
        return err(
          new EntityTaskError(
            entity.entityId,
            'AuthenticationError',
            true,
            new AuthenticationError('yahoo', '3 attempt(s) failed', 3)
          )
        );
      }
      if (options.failing?.includes(entity.entityId)) {
        return err(
          new EntityTaskError(entity.entityId, 'ConnectionError', false, new Error('socket hang up'))
        );
      }
      return ok({ target: entity, subRecords: [{ label: 'title words' }], partial: true });
    },

    async classify(fetched: FetchedEntity): Promise<CollectionResult> {
      const { entityId } = fetched.target;
      stats.classified.push(entityId);
      if (options.classifyThrows?.includes(entityId)) {
        throw new Error('tokenizer exploded');
      }
      return {
        entityId,
        name: fetched.target.name,
        locator: fetched.target.locator,
        subRecords: fetched.subRecords,
        classification: options.classification?.(entityId) ?? Classification.NEGATIVE,
        partial: fetched.partial,
        skippedCount: 0,
        examinedCount: fetched.subRecords.length,
        unknownCount: 0
      };
    }
  };

  return { runner, stats };
}

function fakeExporter() {
  return {
    exportIntermediate: jest
      .fn<Promise<string>, [ExportRow[]]>()
      .mockResolvedValue('output/sellers_20240501_120000.csv'),
    exportFinal: jest
      .fn<Promise<string>, [ExportRow[]]>()
      .mockResolvedValue('output/sellers_20240501_120000_final.csv')
  } satisfies Exporter;
}

function orchestrator(runner: EntityTaskRunner, exporter: Exporter, overrides = {}) {
  const metrics = new MetricsCollector(Logger.silent());
  const { logger, entries } = createCapturingLogger();
  const instance = new CollectionOrchestrator({
    tasks: runner,
    exporter,
    concurrency: 3,
    logger,
    metrics,
    ...overrides
  });
  return { instance, metrics, entries };
}

describe('isAdmitted', () => {
  it('admits targets at or above the threshold', () => {
    expect(isAdmitted(target('a', 100000))).toBe(true);
    expect(isAdmitted(target('b', 99999))).toBe(false);
    expect(isAdmitted(target('c'))).toBe(true);
  });
});

describe('CollectionOrchestrator', () => {
  it('isolates failures and never exceeds the concurrency cap', async () => {
    const targets = Array.from({ length: 10 }, (_, index) => target(`s${index}`));
    const { runner, stats } = fakeRunner({ latencyMs: 40, failing: ['s1', 's4', 's7'] });
    const { instance } = orchestrator(runner, fakeExporter());

    const started = Date.now();
    const run = await instance.run(targets);
    const elapsed = Date.now() - started;

    expect(run.results).toHaveLength(7);
    expect(run.failures.map((failure) => failure.entityId)).toEqual(['s1', 's4', 's7']);
    expect(run.failures[0]).toEqual({
      entityId: 's1',
      errorKind: 'ConnectionError',
      message: 'socket hang up'
    });
    expect(stats.maxInFlight).toBe(3);
    // ceil(10 / 3) waves of 40ms, well short of running all ten in sequence
    expect(elapsed).toBeGreaterThanOrEqual(150);
    expect(elapsed).toBeLessThan(400);
  });

  it('records a rejected fetch as a failure and keeps the other sellers', async () => {
    const { runner } = fakeRunner({ latencyMs: 5, fetchThrows: ['b'] });
    const { instance, metrics } = orchestrator(runner, fakeExporter());

    const run = await instance.run([target('a'), target('b'), target('c'), target('d')]);

    expect(run.results.map((result) => result.entityId)).toEqual(['a', 'c', 'd']);
    expect(run.failures).toEqual([{ entityId: 'b', errorKind: 'UnexpectedError', message: 'boom' }]);
    expect(run.summary).toEqual({ positive: 0, negative: 3, unknown: 0, failed: 1, total: 4 });
    expect(metrics.getSummary().outcomes.failed).toBe(1);
  });

  it('lists failures in target order whatever order they completed in', async () => {
    const { runner } = fakeRunner({
      latencyMs: 5,
      slow: { a: 60 },
      failing: ['a', 'd'],
      classifyThrows: ['b']
    });
    const { instance } = orchestrator(runner, fakeExporter());

    const run = await instance.run([target('a'), target('b'), target('c'), target('d')]);

    expect(run.failures.map((failure) => failure.entityId)).toEqual(['a', 'b', 'd']);
    expect(run.results.map((result) => result.entityId)).toEqual(['c']);
  });

  it('filters targets below the threshold before scheduling', async () => {
    const { runner, stats } = fakeRunner();
    const { instance } = orchestrator(runner, fakeExporter());

    const run = await instance.run([target('rich', 150000), target('poor', 50000), target('exact', 100000)]);

    expect(run.rejected).toEqual(['poor']);
    expect(stats.fetched.sort()).toEqual(['exact', 'rich']);
    expect(run.summary.total).toBe(2);
  });

  it('writes the intermediate checkpoint before classifying and the final one after', async () => {
    const { runner, stats } = fakeRunner({
      failing: ['b'],
      classification: (id) => (id === 'a' ? Classification.POSITIVE : Classification.UNKNOWN)
    });
    const exporter = fakeExporter();
    let classifiedAtIntermediate = -1;
    exporter.exportIntermediate.mockImplementation(async () => {
      classifiedAtIntermediate = stats.classified.length;
      return 'output/sellers_20240501_120000.csv';
    });
    const { instance } = orchestrator(runner, exporter);

    const run = await instance.run([target('a'), target('b'), target('c')]);

    expect(classifiedAtIntermediate).toBe(0);
    expect(exporter.exportIntermediate).toHaveBeenCalledWith([
      { entityName: 'Seller a', entityLocator: 'https://auctions.yahoo.co.jp/seller/a', label: '未判定' },
      { entityName: 'Seller c', entityLocator: 'https://auctions.yahoo.co.jp/seller/c', label: '未判定' }
    ]);
    expect(exporter.exportFinal).toHaveBeenCalledWith([
      { entityName: 'Seller a', entityLocator: 'https://auctions.yahoo.co.jp/seller/a', label: 'はい' },
      { entityName: 'Seller c', entityLocator: 'https://auctions.yahoo.co.jp/seller/c', label: '未判定' }
    ]);
    expect(run.intermediatePath).toBe('output/sellers_20240501_120000.csv');
    expect(run.finalPath).toBe('output/sellers_20240501_120000_final.csv');
  });

  it('summarizes outcomes on the run and in metrics', async () => {
    const { runner } = fakeRunner({
      failing: ['d'],
      classification: (id) =>
        id === 'a' ? Classification.POSITIVE : id === 'b' ? Classification.UNKNOWN : Classification.NEGATIVE
    });
    const { instance, metrics } = orchestrator(runner, fakeExporter());

    const run = await instance.run([target('a'), target('b'), target('c'), target('d')]);

    expect(run.summary).toEqual({ positive: 1, negative: 1, unknown: 1, failed: 1, total: 4 });
    expect(metrics.getSummary().outcomes).toEqual({ POSITIVE: 1, NEGATIVE: 1, UNKNOWN: 1, failed: 1 });
    expect(run.timedOut).toBe(false);
  });

  it('records an export failure and still returns the collected data', async () => {
    const { runner } = fakeRunner();
    const exporter = fakeExporter();
    exporter.exportIntermediate.mockRejectedValue(
      new ExportError('output/sellers_20240501_120000.csv', 'EACCES')
    );
    const { instance } = orchestrator(runner, exporter);

    const run = await instance.run([target('a'), target('b')]);

    expect(run.intermediatePath).toBeUndefined();
    expect(run.exportErrors).toHaveLength(1);
    expect(run.exportErrors[0]).toBeInstanceOf(ExportError);
    expect(run.results).toHaveLength(2);
    expect(run.finalPath).toBe('output/sellers_20240501_120000_final.csv');
  });

  it('turns a classification crash into a failure for that seller only', async () => {
    const { runner } = fakeRunner({ classifyThrows: ['b'] });
    const { instance } = orchestrator(runner, fakeExporter());

    const run = await instance.run([target('a'), target('b')]);

    expect(run.results.map((result) => result.entityId)).toEqual(['a']);
    expect(run.failures).toEqual([
      { entityId: 'b', errorKind: 'UnexpectedError', message: 'tokenizer exploded' }
    ]);
  });

  it('stops queued tasks on a service-fatal error and lets in-flight ones settle', async () => {
    const { runner, stats } = fakeRunner({ fatal: ['a'], slow: { a: 5, b: 30 } });
    const exporter = fakeExporter();
    const { instance } = orchestrator(runner, exporter, { concurrency: 2 });

    const attempt = instance.run([target('a'), target('b'), target('c'), target('d')]);

    await expect(attempt).rejects.toBeInstanceOf(CollectionAbortedError);
    const error = await attempt.catch((caught: unknown) => caught);
    if (!(error instanceof CollectionAbortedError)) {
      throw new Error('expected CollectionAbortedError');
    }

    expect(stats.fetched).toEqual(['a', 'b']);
    expect(error.reason).toBeInstanceOf(AuthenticationError);
    expect(error.run.failures).toEqual([
      {
        entityId: 'a',
        errorKind: 'AuthenticationError',
        message: 'Authentication failed for yahoo: 3 attempt(s) failed'
      }
    ]);
    expect(error.run.results).toEqual([]);
    expect(exporter.exportIntermediate).not.toHaveBeenCalled();
    expect(stats.classified).toEqual([]);
  });

  it('warns when the soft budget is exceeded without cancelling anything', async () => {
    const { runner } = fakeRunner({ latencyMs: 40 });
    const { instance, entries } = orchestrator(runner, fakeExporter(), { softTimeoutMs: 10 });

    const run = await instance.run([target('a'), target('b')]);

    expect(run.timedOut).toBe(true);
    expect(run.results).toHaveLength(2);
    expect(entries.filter((entry) => entry.level === 'WARN').map((entry) => entry.message)).toEqual([
      'Collection exceeded its 10ms budget, letting tasks finish'
    ]);
  });
});
