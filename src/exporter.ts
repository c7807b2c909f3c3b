import { createServer, type Server } from 'node:http';
import { Gauge, Registry } from 'prom-client';
import type { Logger } from './logger.js';
import type { ClusterHealth, ClusterSnapshot, CostReport } from './types.js';

/**
 * Per-cycle gauges. Every gauge is reset before a cycle is recorded so series
 * for deleted nodes or namespaces disappear.
 */
export class MetricsExporter {
  readonly registry: Registry;
  private nodeReady: Gauge<'node'>;
  private namespacePods: Gauge<'namespace' | 'phase'>;
  private namespaceResourceUsage: Gauge<'namespace' | 'resource'>;
  private namespaceCostPerHour: Gauge<'namespace'>;
  private resourceEfficiency: Gauge<'namespace' | 'resource'>;
  private clusterHealthScore: Gauge;

  constructor(registry: Registry = new Registry()) {
    this.registry = registry;
    const registers = [registry];

    this.nodeReady = new Gauge({
      name: 'steward_node_ready',
      help: 'Whether the node reports Ready (1) or not (0)',
      labelNames: ['node'],
      registers
    });
    this.namespacePods = new Gauge({
      name: 'steward_namespace_pods',
      help: 'Pods per namespace and phase',
      labelNames: ['namespace', 'phase'],
      registers
    });
    this.namespaceResourceUsage = new Gauge({
      name: 'steward_namespace_resource_usage',
      help: 'Observed usage per namespace (cpu in cores, memory in bytes)',
      labelNames: ['namespace', 'resource'],
      registers
    });
    this.namespaceCostPerHour = new Gauge({
      name: 'steward_namespace_cost_per_hour',
      help: 'Attributed hourly cost per namespace',
      labelNames: ['namespace'],
      registers
    });
    this.resourceEfficiency = new Gauge({
      name: 'steward_resource_efficiency_ratio',
      help: 'Observed usage divided by requests per namespace',
      labelNames: ['namespace', 'resource'],
      registers
    });
    this.clusterHealthScore = new Gauge({
      name: 'steward_cluster_health_score',
      help: 'Composite cluster health score (0-100)',
      registers
    });
  }

  record(snapshot: ClusterSnapshot, health: ClusterHealth, costs: CostReport): void {
    this.registry.resetMetrics();

    if (health.node.known) {
      for (const [node, conditions] of Object.entries(health.node.status.nodeConditions)) {
        this.nodeReady.set({ node }, conditions.includes('Ready') ? 1 : 0);
      }
    }

    for (const ns of Object.values(health.namespaces)) {
      for (const [phase, count] of Object.entries(ns.pods.phaseCounts)) {
        this.namespacePods.set({ namespace: ns.namespace, phase }, count);
      }
      if (ns.resourceUsage.known) {
        const { cpuPercent, memoryPercent } = ns.resourceUsage.status;
        this.resourceEfficiency.set({ namespace: ns.namespace, resource: 'cpu' }, cpuPercent / 100);
        this.resourceEfficiency.set({ namespace: ns.namespace, resource: 'memory' }, memoryPercent / 100);
      }
    }

    if (snapshot.podMetrics.available) {
      const usage = new Map<string, { cpu: number; memory: number }>();
      for (const metric of snapshot.podMetrics.items) {
        const entry = usage.get(metric.namespace) ?? { cpu: 0, memory: 0 };
        entry.cpu += metric.usage.cpuMillicores / 1000;
        entry.memory += metric.usage.memoryBytes;
        usage.set(metric.namespace, entry);
      }
      for (const [namespace, { cpu, memory }] of usage) {
        this.namespaceResourceUsage.set({ namespace, resource: 'cpu' }, cpu);
        this.namespaceResourceUsage.set({ namespace, resource: 'memory' }, memory);
      }
    }

    for (const ns of costs.namespaces) {
      this.namespaceCostPerHour.set({ namespace: ns.namespace }, ns.hourlyCost);
    }

    this.clusterHealthScore.set(health.score);
  }

  metrics(): Promise<string> {
    return this.registry.metrics();
  }
}

export function serveMetrics(exporter: MetricsExporter, port: number, logger: Logger): Server {
  const server = createServer((req, res) => {
    if (req.url !== '/metrics') {
      res.writeHead(404).end();
      return;
    }
    exporter.metrics().then(
      body => {
        res.writeHead(200, { 'Content-Type': exporter.registry.contentType }).end(body);
      },
      error => {
        logger.error('Failed to render metrics:', error);
        res.writeHead(500).end();
      }
    );
  });
  server.listen(port, () => logger.info(`📊 Serving metrics on :${port}/metrics`));
  return server;
}
