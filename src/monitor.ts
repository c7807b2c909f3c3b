import { setTimeout as sleep } from 'node:timers/promises';
import type { CleanupAdvisor, CleanupResult } from './cleanup.js';
import type { SnapshotSource } from './collector.js';
import type { CleanupMode } from './config.js';
import type { CostAggregator } from './cost.js';
import { throwIfAborted, untilAborted } from './errors.js';
import type { MetricsExporter } from './exporter.js';
import { blendedUtilization, forecastCost, type CostForecast, type UtilizationSample } from './forecast.js';
import type { HealthEvaluator } from './health.js';
import type { Logger } from './logger.js';
import { UsageWindow, type ResourceOptimizer } from './optimizer.js';
import type { ClusterHealth, CostReport, OptimizationReport } from './types.js';

export interface CycleReport {
  snapshotTakenAt: Date;
  health: ClusterHealth;
  costs: CostReport;
  optimization: OptimizationReport;
  forecast: CostForecast;
  cleanup: CleanupResult | null;
}

export interface MonitorDependencies {
  source: SnapshotSource;
  evaluator: HealthEvaluator;
  aggregator: CostAggregator;
  optimizer: ResourceOptimizer;
  cleanup: CleanupAdvisor;
  exporter?: MetricsExporter;
  logger: Logger;
}

export interface MonitorOptions {
  intervalSeconds: number;
  cycleTimeoutSeconds: number;
  cleanupMode: CleanupMode;
  forecastWindow: number;
  forecastHorizonDays: number;
}

/**
 * Runs evaluation cycles back to back on a fixed interval. A cycle never
 * starts before the previous one, export included, has finished.
 */
export class Monitor {
  private deps: MonitorDependencies;
  private options: MonitorOptions;
  private history: UtilizationSample[] = [];
  private usage: UsageWindow;

  constructor(deps: MonitorDependencies, options: MonitorOptions) {
    this.deps = deps;
    this.options = options;
    this.usage = UsageWindow.empty(options.forecastWindow);
  }

  async runCycle(signal?: AbortSignal): Promise<CycleReport> {
    const { source, evaluator, aggregator, optimizer, cleanup, exporter } = this.deps;

    const snapshot = await source.collect(signal);
    throwIfAborted(signal);

    // independent tasks over the same read-only snapshot
    const [health, costs] = await Promise.all([evaluator.evaluate(snapshot), aggregator.computeCosts(snapshot)]);
    throwIfAborted(signal);

    // history is committed only once the cycle can no longer be cancelled
    const usage = this.usage.with(costs);
    const optimization = optimizer.generateReport(costs, usage);

    const utilization = blendedUtilization(costs.clusterUtilization);
    const history =
      utilization === undefined
        ? this.history
        : [...this.history, { timestamp: snapshot.takenAt, utilization }].slice(-this.options.forecastWindow);
    const forecast = forecastCost(history, costs.totalMonthlyCost, this.options.forecastHorizonDays);

    let cleanupResult: CleanupResult | null = null;
    if (this.options.cleanupMode !== 'off') {
      cleanupResult = await cleanup.run(snapshot, { dryRun: this.options.cleanupMode !== 'apply', signal });
    }
    throwIfAborted(signal);

    this.usage = usage;
    this.history = history;
    exporter?.record(snapshot, health, costs);

    return {
      snapshotTakenAt: snapshot.takenAt,
      health,
      costs,
      optimization,
      forecast,
      cleanup: cleanupResult
    };
  }

  /**
   * Loop until `signal` aborts. Failed cycles are logged; the next scheduled
   * cycle is the retry.
   */
  async run(signal: AbortSignal, onReport?: (report: CycleReport) => void): Promise<void> {
    const { logger } = this.deps;
    const intervalMs = this.options.intervalSeconds * 1000;

    while (!signal.aborted) {
      const cycleSignal = AbortSignal.any([signal, AbortSignal.timeout(this.options.cycleTimeoutSeconds * 1000)]);
      try {
        const report = await untilAborted(this.runCycle(cycleSignal), cycleSignal);
        this.logSummary(report);
        onReport?.(report);
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        logger.error('❌ Evaluation cycle failed:', error);
      }

      if (signal.aborted) {
        break;
      }
      try {
        await sleep(intervalMs, undefined, { signal });
      } catch (error) {
        if (!signal.aborted) {
          throw error;
        }
      }
    }
    logger.info('Monitor stopped');
  }

  private logSummary(report: CycleReport): void {
    const { logger } = this.deps;
    const { health, costs, optimization, cleanup } = report;
    logger.info(
      `✅ Health score ${health.score}/100, ${health.issues.length} issue(s) ` +
        `(${health.issues.filter(i => i.severity === 'critical').length} critical)`
    );
    logger.info(
      `💰 Cluster cost $${costs.totalHourlyCost.toFixed(2)}/h, $${costs.totalMonthlyCost.toFixed(2)}/month` +
        (costs.unknownNodes.length > 0 ? `, ${costs.unknownNodes.length} node(s) unpriced` : '')
    );
    logger.info(
      `📉 ${optimization.recommendations.length} optimization(s), potential savings ` +
        `$${optimization.potentialSavings.toFixed(2)}/month`
    );
    if (cleanup) {
      const verb = cleanup.dryRun ? 'would delete' : 'deleted';
      const count = cleanup.dryRun ? cleanup.recommendations.length : cleanup.deleted.length;
      logger.info(`🧹 Cleanup ${verb} ${count} resource(s)${cleanup.complete ? '' : ' (partial)'}`);
    }
  }
}
