/**
 * CollectionOrchestrator - runs every admitted seller through fetch and
 * classification under a shared concurrency cap, with a CSV checkpoint after
 * each phase.
 */

import type { EntityTaskError } from '../collectors';
import type { Exporter } from '../exporters';
import {
  type CollectionFailure,
  type CollectionResult,
  type CollectionRun,
  type CollectionTarget,
  ClassificationLabel,
  type ExportRow,
  type FetchedEntity,
  isAdmitted,
  summarize,
  toLabel
} from '../types/collection';
import type { Result } from '../types/result';
import { Semaphore } from '../utils/concurrency';
import { BaseError, toError } from '../utils/errors';
import { getLogger, type Logger } from '../utils/logger';
import { getMetricsCollector, type MetricsCollector } from '../utils/metrics';

export const DEFAULT_CONCURRENCY = 3;
export const DEFAULT_SOFT_TIMEOUT_MS = 300000;

/**
 * The two phases of one entity's work. EntityCollector is the production implementation.
 */
export interface EntityTaskRunner {
  fetch(target: CollectionTarget): Promise<Result<FetchedEntity, EntityTaskError>>;
  classify(fetched: FetchedEntity): Promise<CollectionResult>;
}

export interface OrchestratorOptions {
  tasks: EntityTaskRunner;
  exporter: Exporter;
  concurrency?: number;
  softTimeoutMs?: number;
  logger?: Logger;
  metrics?: MetricsCollector;
  now?: () => Date;
}

/**
 * A service-fatal error stopped the run. `run` holds whatever completed first.
 */
export class CollectionAbortedError extends BaseError {
  constructor(
    public readonly run: CollectionRun,
    public readonly reason: Error
  ) {
    super(`Collection aborted: ${reason.message}`, {
      failed: run.failures.length,
      intermediatePath: run.intermediatePath
    });
  }
}

type TaskOutcome<T> =
  | { status: 'done'; value: T }
  | { status: 'failed'; failure: CollectionFailure }
  | { status: 'skipped' };

interface RunState {
  failures: CollectionFailure[];
  exportErrors: Error[];
  abortReason?: Error;
  notStarted: number;
  timedOut: boolean;
}

export class CollectionOrchestrator {
  private readonly tasks: EntityTaskRunner;
  private readonly exporter: Exporter;
  private readonly concurrency: number;
  private readonly softTimeoutMs: number;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly now: () => Date;

  constructor(options: OrchestratorOptions) {
    this.tasks = options.tasks;
    this.exporter = options.exporter;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.softTimeoutMs = options.softTimeoutMs ?? DEFAULT_SOFT_TIMEOUT_MS;
    this.logger = (options.logger ?? getLogger()).child({ service: 'orchestrator' });
    this.metrics = options.metrics ?? getMetricsCollector();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run the collection. Throws CollectionAbortedError only for service-fatal errors;
   * every other failure stays on the returned run.
   */
  async run(targets: CollectionTarget[]): Promise<CollectionRun> {
    const startedAt = this.now();
    const state: RunState = { failures: [], exportErrors: [], notStarted: 0, timedOut: false };

    const admitted = targets.filter(isAdmitted);
    const rejected = targets.filter((target) => !isAdmitted(target)).map((target) => target.entityId);

    this.logger.info('Starting collection', {
      targets: targets.length,
      admitted: admitted.length,
      rejected: rejected.length,
      concurrency: this.concurrency
    });

    const watchdog = setTimeout(() => {
      state.timedOut = true;
      this.logger.warn(`Collection exceeded its ${this.softTimeoutMs}ms budget, letting tasks finish`);
    }, this.softTimeoutMs);
    watchdog.unref();

    const semaphore = new Semaphore(this.concurrency);
    let results: CollectionResult[] = [];
    let intermediatePath: string | undefined;
    let finalPath: string | undefined;

    try {
      // Phase 1: fetch
      this.logger.info('Phase 1: fetching sub-records');
      const fetched = await this.fetchAll(admitted, semaphore, state);
      this.logger.info(`Fetched ${fetched.length} of ${admitted.length} sellers`);

      if (!state.abortReason) {
        intermediatePath = await this.checkpoint(
          () =>
            this.exporter.exportIntermediate(
              fetched.map((entity) => ({
                entityName: entity.target.name,
                entityLocator: entity.target.locator,
                label: ClassificationLabel.PENDING
              }))
            ),
          'intermediate',
          state
        );

        // Phase 2: classify
        this.logger.info('Phase 2: classifying sellers');
        results = await this.classifyAll(fetched, semaphore, state);

        finalPath = await this.checkpoint(
          () => this.exporter.exportFinal(results.map(toExportRow)),
          'final',
          state
        );
      }
    } finally {
      clearTimeout(watchdog);
    }

    // Phase 2 failures were appended after phase 1's; restore target order
    const position = new Map(admitted.map((target, index) => [target.entityId, index]));
    const failures = [...state.failures].sort(
      (a, b) => (position.get(a.entityId) ?? 0) - (position.get(b.entityId) ?? 0)
    );

    const run: CollectionRun = {
      results,
      failures,
      rejected,
      startedAt,
      finishedAt: this.now(),
      summary: summarize(results, failures),
      intermediatePath,
      finalPath,
      timedOut: state.timedOut,
      exportErrors: state.exportErrors
    };

    if (state.abortReason) {
      this.logger.error('Collection aborted', state.abortReason, {
        failed: run.failures.length,
        notStarted: state.notStarted
      });
      throw new CollectionAbortedError(run, state.abortReason);
    }

    this.logger.info('Collection finished', { ...run.summary, timedOut: run.timedOut });
    return run;
  }

  private async fetchAll(
    targets: CollectionTarget[],
    semaphore: Semaphore,
    state: RunState
  ): Promise<FetchedEntity[]> {
    const outcomes = await Promise.all(
      targets.map((target) =>
        semaphore.use(async (): Promise<TaskOutcome<FetchedEntity>> => {
          if (state.abortReason) {
            state.notStarted++;
            return { status: 'skipped' };
          }

          let result: Result<FetchedEntity, EntityTaskError>;
          try {
            result = await this.tasks.fetch(target);
          } catch (error) {
            return this.unexpectedFailure(target.entityId, error);
          }

          if (result.ok) {
            return { status: 'done', value: result.value };
          }

          const failure = result.error.toFailure();
          this.recordFailure(failure, result.error.originalError);
          if (result.error.fatal && !state.abortReason) {
            state.abortReason = result.error.originalError;
            this.logger.warn('Service-fatal error, queued tasks will not start', {
              entityId: target.entityId,
              errorKind: result.error.errorKind
            });
          }
          return { status: 'failed', failure };
        })
      )
    );

    return collect(outcomes, state);
  }

  private async classifyAll(
    fetched: FetchedEntity[],
    semaphore: Semaphore,
    state: RunState
  ): Promise<CollectionResult[]> {
    const outcomes = await Promise.all(
      fetched.map((entity) =>
        semaphore.use(async (): Promise<TaskOutcome<CollectionResult>> => {
          try {
            const result = await this.tasks.classify(entity);
            this.metrics.trackOutcome(result.classification);
            return { status: 'done', value: result };
          } catch (error) {
            return this.unexpectedFailure(entity.target.entityId, error);
          }
        })
      )
    );

    return collect(outcomes, state);
  }

  private unexpectedFailure(entityId: string, error: unknown): TaskOutcome<never> {
    const cause = toError(error);
    const failure: CollectionFailure = {
      entityId,
      errorKind: 'UnexpectedError',
      message: cause.message
    };
    this.recordFailure(failure, cause);
    return { status: 'failed', failure };
  }

  private recordFailure(failure: CollectionFailure, cause: Error): void {
    this.metrics.trackOutcome('failed');
    this.metrics.trackError(`entity:${failure.entityId}`, cause);
    this.logger.warn(`Seller ${failure.entityId} failed`, {
      errorKind: failure.errorKind,
      message: failure.message
    });
  }

  private async checkpoint(
    write: () => Promise<string>,
    name: string,
    state: RunState
  ): Promise<string | undefined> {
    try {
      return await write();
    } catch (error) {
      const cause = toError(error);
      state.exportErrors.push(cause);
      this.metrics.trackError(`export:${name}`, cause);
      this.logger.error(`Failed to write ${name} export, continuing`, cause);
      return undefined;
    }
  }
}

/**
 * Split positional outcomes into values and failures, both in input order
 */
function collect<T>(outcomes: TaskOutcome<T>[], state: RunState): T[] {
  const values: T[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === 'done') {
      values.push(outcome.value);
    } else if (outcome.status === 'failed') {
      state.failures.push(outcome.failure);
    }
  }
  return values;
}

function toExportRow(result: CollectionResult): ExportRow {
  return {
    entityName: result.name,
    entityLocator: result.locator,
    label: toLabel(result.classification)
  };
}
