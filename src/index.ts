import * as k8s from '@kubernetes/client-node';
import { CleanupAdvisor, KubernetesCleanupClient } from './cleanup.js';
import { KubernetesSnapshotCollector } from './collector.js';
import { loadConfig, type StewardConfig } from './config.js';
import { CostAggregator } from './cost.js';
import { MetricsExporter, serveMetrics } from './exporter.js';
import { HealthEvaluator } from './health.js';
import { createLogger } from './logger.js';
import { Monitor } from './monitor.js';
import { ResourceOptimizer } from './optimizer.js';
import { DEFAULT_PRICING, loadPricingConfig } from './pricing.js';

// Handle unhandled promise rejections
process.on('unhandledRejection', reason => {
  console.error('❌ Unhandled promise rejection:', reason);
  process.exit(1);
});

function loadConfigOrExit(): StewardConfig {
  try {
    return loadConfig();
  } catch (error) {
    console.error('❌ Invalid configuration:', error);
    process.exit(1);
  }
}

const config = loadConfigOrExit();

const logger = createLogger(config.logLevel);
logger.info('🚀 Starting cluster-steward');
logger.debug('Configuration:', config);

const pricing = config.pricingConfigPath ? await loadPricingConfig(config.pricingConfigPath) : DEFAULT_PRICING;
logger.info(
  config.pricingConfigPath
    ? `Loaded pricing from ${config.pricingConfigPath}`
    : 'No PRICING_CONFIG_PATH set, using built-in default prices'
);

// Respects KUBECONFIG and falls back to the in-cluster service account
const kubeConfig = new k8s.KubeConfig();
kubeConfig.loadFromDefault();
const coreApi = kubeConfig.makeApiClient(k8s.CoreV1Api);

const collector = new KubernetesSnapshotCollector(
  {
    core: coreApi,
    apps: kubeConfig.makeApiClient(k8s.AppsV1Api),
    networking: kubeConfig.makeApiClient(k8s.NetworkingV1Api),
    metrics: new k8s.Metrics(kubeConfig)
  },
  logger
);
logger.info('✅ Kubernetes clients initialized');

const exporter = new MetricsExporter();
const server = config.metricsPort > 0 ? serveMetrics(exporter, config.metricsPort, logger) : undefined;

const monitor = new Monitor(
  {
    source: collector,
    evaluator: new HealthEvaluator(logger),
    aggregator: new CostAggregator(pricing, logger),
    optimizer: new ResourceOptimizer(
      {
        lowUtilization: config.lowUtilizationThreshold / 100,
        idleUtilization: config.idleUtilizationThreshold / 100,
        headroom: config.rightsizingHeadroom / 100
      },
      logger
    ),
    cleanup: new CleanupAdvisor(
      new KubernetesCleanupClient(coreApi),
      { retentionDays: config.cleanupRetentionDays, excludedNamespaces: config.cleanupExcludedNamespaces },
      logger
    ),
    exporter,
    logger
  },
  {
    intervalSeconds: config.monitorIntervalSeconds,
    cycleTimeoutSeconds: config.cycleTimeoutSeconds,
    cleanupMode: config.cleanupMode,
    forecastWindow: config.forecastWindow,
    forecastHorizonDays: config.forecastHorizonDays
  }
);

// Handle graceful shutdown
const controller = new AbortController();
const shutdown = () => {
  logger.info('👋 Shutting down...');
  controller.abort(new Error('shutdown requested'));
  server?.close();
};
process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

logger.info(`⏰ Running evaluation every ${config.monitorIntervalSeconds}s (cleanup: ${config.cleanupMode})`);
await monitor.run(controller.signal);
