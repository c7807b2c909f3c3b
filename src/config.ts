import { ConfigError } from './errors.js';
import { isLogLevel, type LogLevel } from './logger.js';

export type CleanupMode = 'off' | 'dry-run' | 'apply';

export interface StewardConfig {
  monitorIntervalSeconds: number;
  cycleTimeoutSeconds: number;
  pricingConfigPath?: string;
  lowUtilizationThreshold: number; // percent, rightsizing below this
  idleUtilizationThreshold: number; // percent, idle below this
  rightsizingHeadroom: number; // percent kept above observed peak
  cleanupMode: CleanupMode;
  cleanupRetentionDays: number;
  cleanupExcludedNamespaces: string[];
  forecastWindow: number; // samples kept in memory
  forecastHorizonDays: number;
  metricsPort: number; // 0 disables the /metrics listener
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function isCleanupMode(value: string): value is CleanupMode {
  return value === 'off' || value === 'dry-run' || value === 'apply';
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: Env = process.env): StewardConfig {
  const cleanupMode = env.CLEANUP_MODE || 'dry-run';
  const logLevel = env.LOG_LEVEL || 'info';
  if (!isCleanupMode(cleanupMode)) {
    throw new ConfigError(`CLEANUP_MODE must be one of off, dry-run, apply (got "${cleanupMode}")`);
  }
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error (got "${logLevel}")`);
  }

  const config: StewardConfig = {
    monitorIntervalSeconds: parseInt(env.MONITOR_INTERVAL_SECONDS || '300', 10),
    cycleTimeoutSeconds: parseInt(env.CYCLE_TIMEOUT_SECONDS || '120', 10),
    pricingConfigPath: env.PRICING_CONFIG_PATH || undefined,
    lowUtilizationThreshold: parseFloat(env.LOW_UTILIZATION_THRESHOLD || '30'),
    idleUtilizationThreshold: parseFloat(env.IDLE_UTILIZATION_THRESHOLD || '5'),
    rightsizingHeadroom: parseFloat(env.RIGHTSIZING_HEADROOM || '20'),
    cleanupMode,
    cleanupRetentionDays: parseFloat(env.CLEANUP_RETENTION_DAYS || '7'),
    cleanupExcludedNamespaces: (env.CLEANUP_EXCLUDED_NAMESPACES ?? 'kube-system,kube-public,kube-node-lease')
      .split(',')
      .map(ns => ns.trim())
      .filter(ns => ns.length > 0),
    forecastWindow: parseInt(env.FORECAST_WINDOW || '24', 10),
    forecastHorizonDays: parseFloat(env.FORECAST_HORIZON_DAYS || '30'),
    metricsPort: parseInt(env.METRICS_PORT || '9464', 10),
    logLevel
  };

  const invalid = Object.entries(config)
    .filter(([, value]) => typeof value === 'number' && (!Number.isFinite(value) || value < 0))
    .map(([key]) => key);
  if (invalid.length > 0) {
    throw new ConfigError(`Invalid numeric configuration: ${invalid.join(', ')}`);
  }
  if (config.monitorIntervalSeconds === 0 || config.cycleTimeoutSeconds === 0) {
    throw new ConfigError('MONITOR_INTERVAL_SECONDS and CYCLE_TIMEOUT_SECONDS must be positive');
  }
  if (config.forecastWindow < 2) {
    throw new ConfigError('FORECAST_WINDOW must keep at least 2 samples');
  }
  if (config.idleUtilizationThreshold > config.lowUtilizationThreshold) {
    throw new ConfigError('IDLE_UTILIZATION_THRESHOLD must not exceed LOW_UTILIZATION_THRESHOLD');
  }
  return config;
}
