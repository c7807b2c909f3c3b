import { SnapshotError } from './errors.js';
import type { Logger } from './logger.js';
import { resolvePrice } from './pricing.js';
import { GIB } from './quantity.js';
import type {
  AttributionBasis,
  ClusterNode,
  ClusterPod,
  ClusterSnapshot,
  CostBreakdown,
  CostReport,
  NamespaceCost,
  NodeCost,
  PodCost,
  PricingConfig,
  ResourceUsage,
  Utilization
} from './types.js';

/** Fixed hourly-to-monthly conversion, no calendar arithmetic. */
export const HOURS_PER_MONTH = 720;

const RESIDENT_PHASES = new Set(['Running', 'Pending', 'Unknown']);

export function sumBreakdown(b: CostBreakdown): number {
  return b.cpu + b.memory + b.storage + b.network + b.gpu;
}

/**
 * Per-item fractions summing to 1. An item is weighted by its request, by its
 * observed usage when it declares none, and all items split equally when no
 * item carries either.
 */
export function shares(
  requested: number[],
  observed: Array<number | undefined>
): { shares: number[]; basis: AttributionBasis[] } {
  const basis: AttributionBasis[] = [];
  const weights = requested.map((request, i) => {
    if (request > 0) {
      basis.push('request');
      return request;
    }
    const usage = observed[i];
    if (usage !== undefined && usage > 0) {
      basis.push('usage');
      return usage;
    }
    basis.push(usage === undefined ? 'request' : 'usage');
    return 0;
  });

  const total = weights.reduce((sum, w) => sum + w, 0);
  if (total === 0) {
    const equal = requested.length === 0 ? 0 : 1 / requested.length;
    return { shares: requested.map(() => equal), basis: requested.map((): AttributionBasis => 'equal') };
  }
  return { shares: weights.map(w => w / total), basis };
}

export function computeNodeCost(
  node: ClusterNode,
  pricing: PricingConfig,
  usage: ResourceUsage | undefined
): NodeCost {
  const allocatable = node.allocatable;
  if (!allocatable) {
    return { known: false, nodeName: node.name, reason: 'node reports no allocatable cpu/memory' };
  }

  const prices = resolvePrice(node, pricing);
  const breakdown: CostBreakdown = {
    cpu: (allocatable.cpuMillicores / 1000) * prices.prices.cpu,
    memory: (allocatable.memoryBytes / GIB) * prices.prices.memory,
    storage: (allocatable.storageBytes / GIB) * prices.prices.storage,
    network: prices.prices.network,
    gpu: (allocatable.gpu?.count ?? 0) * (prices.gpu?.price ?? 0)
  };
  const hourlyCost = sumBreakdown(breakdown);

  const utilization: Utilization = {};
  if (usage) {
    if (allocatable.cpuMillicores > 0) {
      utilization.cpu = usage.cpuMillicores / allocatable.cpuMillicores;
    }
    if (allocatable.memoryBytes > 0) {
      utilization.memory = usage.memoryBytes / allocatable.memoryBytes;
    }
  }

  return {
    known: true,
    nodeName: node.name,
    instanceType: node.instanceType,
    region: node.region,
    allocatable,
    prices,
    breakdown,
    hourlyCost,
    monthlyCost: hourlyCost * HOURS_PER_MONTH,
    usage,
    utilization
  };
}

/**
 * Distribute a node's cost over its resident pods. CPU cost follows CPU
 * shares, memory cost follows memory shares, and the remaining resource costs
 * follow the mean of both, so each pod set sums to the node total.
 */
export function attributeNodeCost(
  node: Extract<NodeCost, { known: true }>,
  pods: ClusterPod[],
  podUsage: Map<string, ResourceUsage>
): PodCost[] {
  if (pods.length === 0) {
    return [];
  }
  const usages = pods.map(pod => podUsage.get(`${pod.namespace}/${pod.name}`));
  const cpu = shares(
    pods.map(pod => pod.requests.cpuMillicores),
    usages.map(u => u?.cpuMillicores)
  );
  const memory = shares(
    pods.map(pod => pod.requests.memoryBytes),
    usages.map(u => u?.memoryBytes)
  );

  return pods.map((pod, i) => {
    const blended = (cpu.shares[i] + memory.shares[i]) / 2;
    const breakdown: CostBreakdown = {
      cpu: node.breakdown.cpu * cpu.shares[i],
      memory: node.breakdown.memory * memory.shares[i],
      storage: node.breakdown.storage * blended,
      network: node.breakdown.network * blended,
      gpu: node.breakdown.gpu * blended
    };
    const hourlyCost = sumBreakdown(breakdown);
    return {
      namespace: pod.namespace,
      name: pod.name,
      nodeName: node.nodeName,
      requests: pod.requests,
      usage: usages[i],
      breakdown,
      hourlyCost,
      monthlyCost: hourlyCost * HOURS_PER_MONTH,
      basis: { cpu: cpu.basis[i], memory: memory.basis[i] }
    };
  });
}

export function aggregateNamespaces(pods: PodCost[]): NamespaceCost[] {
  const byNamespace = new Map<string, NamespaceCost>();
  for (const pod of pods) {
    const entry = byNamespace.get(pod.namespace) ?? {
      namespace: pod.namespace,
      podCount: 0,
      hourlyCost: 0,
      monthlyCost: 0
    };
    entry.podCount++;
    entry.hourlyCost += pod.hourlyCost;
    entry.monthlyCost += pod.monthlyCost;
    byNamespace.set(pod.namespace, entry);
  }
  return [...byNamespace.values()].sort((a, b) => (a.namespace < b.namespace ? -1 : 1));
}

/**
 * Prices every node, attributes node cost down to pods, and rolls pods up
 * into namespaces. Each call returns a fresh report.
 */
export class CostAggregator {
  private pricing: PricingConfig;
  private logger: Logger;

  constructor(pricing: PricingConfig, logger: Logger) {
    this.pricing = pricing;
    this.logger = logger;
  }

  async computeCosts(snapshot: ClusterSnapshot): Promise<CostReport> {
    if (!snapshot.nodes.available) {
      throw new SnapshotError(`cost computation failed, nodes unavailable: ${snapshot.nodes.reason}`);
    }
    if (!snapshot.pods.available) {
      throw new SnapshotError(`cost computation failed, pods unavailable: ${snapshot.pods.reason}`);
    }

    const flags: string[] = [];
    const nodeUsage = new Map<string, ResourceUsage>();
    if (snapshot.nodeMetrics.available) {
      for (const metric of snapshot.nodeMetrics.items) {
        nodeUsage.set(metric.name, metric.usage);
      }
    } else {
      flags.push(`node utilization unknown: ${snapshot.nodeMetrics.reason}`);
    }
    const podUsage = new Map<string, ResourceUsage>();
    if (snapshot.podMetrics.available) {
      for (const metric of snapshot.podMetrics.items) {
        podUsage.set(`${metric.namespace}/${metric.name}`, metric.usage);
      }
    } else {
      flags.push(`pod usage unknown, attribution uses requests only: ${snapshot.podMetrics.reason}`);
    }

    const residents = new Map<string, ClusterPod[]>();
    for (const pod of snapshot.pods.items) {
      if (!pod.nodeName || !RESIDENT_PHASES.has(pod.phase)) {
        continue;
      }
      const list = residents.get(pod.nodeName) ?? [];
      list.push(pod);
      residents.set(pod.nodeName, list);
    }

    const nodes: NodeCost[] = [];
    const pods: PodCost[] = [];
    const unknownNodes: string[] = [];
    let totalHourlyCost = 0;
    let cpuUsed = 0;
    let cpuAllocatable = 0;
    let memoryUsed = 0;
    let memoryAllocatable = 0;

    for (const node of snapshot.nodes.items) {
      const cost = computeNodeCost(node, this.pricing, nodeUsage.get(node.name));
      nodes.push(cost);
      if (!cost.known) {
        unknownNodes.push(node.name);
        flags.push(`node ${node.name}: cost unknown, ${cost.reason}`);
        this.logger.warn(`Cost for node ${node.name} is unknown: ${cost.reason}`);
        continue;
      }
      flags.push(...cost.prices.flags);
      totalHourlyCost += cost.hourlyCost;
      if (cost.usage) {
        cpuUsed += cost.usage.cpuMillicores;
        cpuAllocatable += cost.allocatable.cpuMillicores;
        memoryUsed += cost.usage.memoryBytes;
        memoryAllocatable += cost.allocatable.memoryBytes;
      }
      pods.push(...attributeNodeCost(cost, residents.get(node.name) ?? [], podUsage));
    }

    const clusterUtilization: Utilization = {};
    if (cpuAllocatable > 0) {
      clusterUtilization.cpu = cpuUsed / cpuAllocatable;
    }
    if (memoryAllocatable > 0) {
      clusterUtilization.memory = memoryUsed / memoryAllocatable;
    }

    this.logger.debug(
      `Priced ${nodes.length - unknownNodes.length}/${nodes.length} nodes at $${totalHourlyCost.toFixed(2)}/h`
    );

    return {
      timestamp: snapshot.takenAt,
      nodes,
      pods,
      namespaces: aggregateNamespaces(pods),
      totalHourlyCost,
      totalMonthlyCost: totalHourlyCost * HOURS_PER_MONTH,
      clusterUtilization,
      unknownNodes,
      flags
    };
  }
}
