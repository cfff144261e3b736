#!/usr/bin/env node

/**
 * Main entry point: list sellers from Rapras, collect and classify their Yahoo
 * Auctions listings, and write the CSV checkpoints.
 */

import { stdin as input, stdout as output } from 'node:process';
import { createInterface } from 'node:readline/promises';
import { TitleKeyDeriver, WordTokenizer } from './analyzers/title-key';
import { LLMTitleClassifier } from './analyzers/title-classifier';
import { EntityCollector } from './collectors';
import { type AppConfig, config, loadConfig, loadPipelineConfig, type PipelineFile, validateConfig } from './config';
import { createConnectors, type ConnectorBundle } from './connectors/factory';
import { RAPRAS_SERVICE_ID } from './connectors/rapras';
import { YAHOO_SERVICE_ID } from './connectors/yahoo';
import { CsvExporter } from './exporters';
import { createLLMProvider, type LLMProviderId } from './llm';
import { CollectionAbortedError, CollectionOrchestrator } from './orchestrator';
import { EncryptedFileSessionStore, SecretKeyProvider, SessionLifecycleManager } from './session';
import type { CollectionRun, CollectionTarget } from './types';
import {
  ConfigurationError,
  getLogger,
  getMetricsCollector,
  type Logger,
  type MetricsCollector,
  SessionExpiredError,
  toError
} from './utils';

const SUMMARY_FILE = 'execution-summary.json';

/**
 * Read the SMS code Yahoo sends during login from the terminal
 */
async function promptForSmsCode(): Promise<string> {
  const rl = createInterface({ input, output });
  try {
    return await rl.question('SMS認証コードを入力してください: ');
  } finally {
    rl.close();
  }
}

/**
 * Validate and load configuration
 */
function initializeConfiguration(logger: Logger): AppConfig {
  const validation = validateConfig();

  if (!validation.valid) {
    throw new ConfigurationError('Configuration validation failed', validation.errors);
  }

  const appConfig = loadConfig();
  logger.info('Configuration loaded', config.redacted());
  return appConfig;
}

function classifierKeys(appConfig: AppConfig): Partial<Record<LLMProviderId, string>> {
  const { provider, apiKey } = appConfig.classifier;
  return provider === 'openrouter' ? { openrouter: apiKey } : { openai_gpt4o_mini: apiKey };
}

/**
 * Seller list for the configured window. A rejected Rapras session is renewed once.
 */
async function listSellers(
  sessions: SessionLifecycleManager,
  connectors: ConnectorBundle,
  appConfig: AppConfig,
  pipeline: PipelineFile,
  logger: Logger
): Promise<CollectionTarget[]> {
  const query = {
    startDate: appConfig.window.startDate,
    endDate: appConfig.window.endDate,
    minPrice: pipeline.collection.admission_threshold
  };

  const session = await sessions.ensureValid(RAPRAS_SERVICE_ID);
  try {
    return await connectors.rapras.fetchSellerLinks(session, query);
  } catch (error) {
    if (!(error instanceof SessionExpiredError)) {
      throw error;
    }
    logger.warn('Rapras session rejected while listing sellers, logging in again');
    await sessions.invalidate(RAPRAS_SERVICE_ID, session);
    return connectors.rapras.fetchSellerLinks(await sessions.ensureValid(RAPRAS_SERVICE_ID), query);
  }
}

/**
 * Wire every component and run one collection
 */
export async function runCollection(
  appConfig: AppConfig,
  pipeline: PipelineFile,
  logger: Logger,
  metrics: MetricsCollector
): Promise<CollectionRun> {
  const connectors = createConnectors(appConfig, pipeline, {
    promptSmsCode: promptForSmsCode,
    logger,
    metrics
  });

  const sessions = new SessionLifecycleManager({
    store: new EncryptedFileSessionStore({
      directory: appConfig.session.dir,
      keyProvider: new SecretKeyProvider(appConfig.session.encryptionKey),
      logger
    }),
    clients: {
      [RAPRAS_SERVICE_ID]: connectors.rapras,
      [YAHOO_SERVICE_ID]: connectors.yahooAuth
    },
    loginPolicy: {
      maxAttempts: pipeline.retries.login.attempts,
      baseDelay: pipeline.retries.login.base_delay_ms
    },
    logger,
    metrics
  });

  const llmProvider = await createLLMProvider({
    preferred: appConfig.classifier.provider,
    apiKeys: classifierKeys(appConfig),
    model: appConfig.classifier.model,
    logger
  });

  const collector = new EntityCollector({
    sessions,
    fetcher: connectors.yahooFetcher,
    classifier: new LLMTitleClassifier({ llmProvider, logger, metrics }),
    keyDeriver: new TitleKeyDeriver({ tokenizer: new WordTokenizer(), logger, metrics }),
    maxItems: pipeline.collection.max_items,
    fetchPolicy: {
      maxAttempts: pipeline.retries.fetch.attempts,
      baseDelay: pipeline.retries.fetch.base_delay_ms
    },
    callTimeoutMs: pipeline.collection.call_timeout_ms,
    logger,
    metrics
  });

  const orchestrator = new CollectionOrchestrator({
    tasks: collector,
    exporter: new CsvExporter({ outputDir: appConfig.outputDir ?? pipeline.output.dir, logger }),
    concurrency: pipeline.collection.concurrency,
    softTimeoutMs: pipeline.collection.soft_timeout_ms,
    logger,
    metrics
  });

  const targets = await listSellers(sessions, connectors, appConfig, pipeline, logger);
  return orchestrator.run(targets);
}

/**
 * Write execution summary to the working directory
 */
async function writeSummary(metrics: MetricsCollector, logger: Logger): Promise<void> {
  try {
    await metrics.saveToFile(SUMMARY_FILE);
  } catch (error) {
    logger.error('Failed to write execution summary', toError(error));
  }
}

/**
 * Main execution function. Resolves to the process exit code.
 */
async function main(): Promise<number> {
  const logger = getLogger();
  const metrics = getMetricsCollector(logger);
  logger.info('Seller collection starting');

  let exitCode = 0;

  try {
    const appConfig = initializeConfiguration(logger);
    const pipeline = await loadPipelineConfig();

    const run = await runCollection(appConfig, pipeline, logger, metrics);
    logger.info('Seller collection completed', {
      ...run.summary,
      rejected: run.rejected.length,
      intermediatePath: run.intermediatePath,
      finalPath: run.finalPath,
      timedOut: run.timedOut
    });

    // Collected data without a final export is still a failed run
    if (!run.finalPath) {
      exitCode = 1;
    }
  } catch (error) {
    const cause = toError(error);
    metrics.trackError('main', cause);

    if (error instanceof CollectionAbortedError) {
      logger.error('Collection aborted by a service-fatal error', error.reason, {
        ...error.run.summary,
        intermediatePath: error.run.intermediatePath
      });
    } else {
      logger.error('Fatal error', cause);
    }
    exitCode = 1;
  }

  metrics.logSummary();
  await writeSummary(metrics, logger);
  return exitCode;
}

// Run if this is the main module
if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      getLogger().error('Unexpected error', toError(error));
      process.exit(1);
    });
}

export { main };
