import type { AppConfig, PipelineFile } from '../config';
import { HttpClient } from '../utils/http';
import { getLogger, type Logger } from '../utils/logger';
import type { MetricsCollector } from '../utils/metrics';
import { RAPRAS_SERVICE_ID, RaprasConnector } from './rapras';
import { type SmsCodePrompt, YAHOO_SERVICE_ID, YahooAuthClient, YahooSellerFetcher } from './yahoo';

export interface ConnectorBundle {
  rapras: RaprasConnector;
  yahooAuth: YahooAuthClient;
  yahooFetcher: YahooSellerFetcher;
}

export interface ConnectorFactoryOptions {
  promptSmsCode: SmsCodePrompt;
  logger?: Logger;
  metrics?: MetricsCollector;
}

/**
 * Wire the site connectors from environment and pipeline settings. Yahoo
 * traffic always goes through the configured proxy; Rapras is reached directly.
 */
export function createConnectors(
  config: AppConfig,
  pipeline: PipelineFile,
  options: ConnectorFactoryOptions
): ConnectorBundle {
  const logger = options.logger ?? getLogger();
  const timeoutMs = pipeline.collection.call_timeout_ms;

  const raprasHttp = new HttpClient({
    serviceId: RAPRAS_SERVICE_ID,
    timeoutMs,
    logger,
    metrics: options.metrics
  });

  const yahooHttp = new HttpClient({
    serviceId: YAHOO_SERVICE_ID,
    timeoutMs,
    proxy: config.proxy,
    logger,
    metrics: options.metrics
  });

  const yahooEndpoints = {
    loginUrl: pipeline.services.yahoo.login_url,
    auctionsUrl: pipeline.services.yahoo.auctions_url,
    proxyCheckUrl: pipeline.services.yahoo.proxy_check_url
  };

  return {
    rapras: new RaprasConnector(
      raprasHttp,
      config.rapras,
      pipeline.services.rapras.base_url,
      logger
    ),
    yahooAuth: new YahooAuthClient(
      yahooHttp,
      config.yahoo.phoneNumber,
      options.promptSmsCode,
      yahooEndpoints,
      logger
    ),
    yahooFetcher: new YahooSellerFetcher(yahooHttp, logger)
  };
}
