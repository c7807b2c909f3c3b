import { HOURS_PER_MONTH } from './cost.js';
import type { Logger } from './logger.js';
import { GIB } from './quantity.js';
import type { CostReport, NodeCost, OptimizationReport, PodCost, Recommendation, ResourceUsage } from './types.js';

export interface OptimizerOptions {
  /** Utilization ratio below which a resource is rightsized. */
  lowUtilization: number;
  /** Utilization ratio below which a resource is considered idle. */
  idleUtilization: number;
  /** Extra capacity kept above observed peak when rightsizing, as a ratio. */
  headroom: number;
}

export const DEFAULT_OPTIMIZER_OPTIONS: OptimizerOptions = {
  lowUtilization: 0.3,
  idleUtilization: 0.05,
  headroom: 0.2
};

const percent = (ratio: number) => `${(ratio * 100).toFixed(1)}%`;

/** Fewest samples a resource needs before it is judged. */
export const MIN_WINDOW_SAMPLES = 2;

type Samples = readonly ResourceUsage[];

function appendSample(samples: Samples | undefined, usage: ResourceUsage, size: number): Samples {
  return [...(samples ?? []), usage].slice(-size);
}

function peakOf(samples: Samples | undefined): ResourceUsage | undefined {
  if (!samples || samples.length < MIN_WINDOW_SAMPLES) {
    return undefined;
  }
  return {
    cpuMillicores: Math.max(...samples.map(s => s.cpuMillicores)),
    memoryBytes: Math.max(...samples.map(s => s.memoryBytes))
  };
}

/**
 * Observed usage of every node and pod over the last `size` cost reports.
 * Immutable: `with` returns a new window. A node or pod missing from a report
 * loses its samples and starts over.
 */
export class UsageWindow {
  readonly size: number;
  private nodes: ReadonlyMap<string, Samples>;
  private pods: ReadonlyMap<string, Samples>;

  private constructor(size: number, nodes: ReadonlyMap<string, Samples>, pods: ReadonlyMap<string, Samples>) {
    this.size = size;
    this.nodes = nodes;
    this.pods = pods;
  }

  static empty(size: number): UsageWindow {
    return new UsageWindow(size, new Map(), new Map());
  }

  with(costs: CostReport): UsageWindow {
    const nodes = new Map<string, Samples>();
    for (const node of costs.nodes) {
      if (node.known && node.usage) {
        nodes.set(node.nodeName, appendSample(this.nodes.get(node.nodeName), node.usage, this.size));
      }
    }
    const pods = new Map<string, Samples>();
    for (const pod of costs.pods) {
      if (pod.usage) {
        const key = `${pod.namespace}/${pod.name}`;
        pods.set(key, appendSample(this.pods.get(key), pod.usage, this.size));
      }
    }
    return new UsageWindow(this.size, nodes, pods);
  }

  /** Per-resource maximum, or undefined until enough samples exist. */
  nodePeak(name: string): ResourceUsage | undefined {
    return peakOf(this.nodes.get(name));
  }

  podPeak(namespace: string, name: string): ResourceUsage | undefined {
    return peakOf(this.pods.get(`${namespace}/${name}`));
  }
}

export class ResourceOptimizer {
  private options: OptimizerOptions;
  private logger: Logger;

  constructor(options: OptimizerOptions, logger: Logger) {
    this.options = options;
    this.logger = logger;
  }

  /**
   * Idle and low utilization are judged on the peak over `window`, which
   * should already include `costs`.
   */
  generateReport(costs: CostReport, window: UsageWindow): OptimizationReport {
    const recommendations: Recommendation[] = [];
    const flaggedNodes = new Set<string>();

    for (const node of costs.nodes) {
      const rec = node.known ? this.analyzeNode(node, window.nodePeak(node.nodeName)) : undefined;
      if (rec) {
        recommendations.push(rec);
        flaggedNodes.add(node.nodeName);
      }
    }

    let potentialSavings = recommendations.reduce((sum, r) => sum + r.potentialSaving, 0);
    for (const pod of costs.pods) {
      const rec = this.analyzePod(pod, window.podPeak(pod.namespace, pod.name));
      if (!rec) {
        continue;
      }
      recommendations.push(rec);
      // already counted in the node's saving
      if (!flaggedNodes.has(pod.nodeName)) {
        potentialSavings += rec.potentialSaving;
      }
    }

    recommendations.sort((a, b) => b.potentialSaving - a.potentialSaving || a.name.localeCompare(b.name));
    this.logger.debug(
      `${recommendations.length} optimization recommendation(s), $${potentialSavings.toFixed(2)}/month`
    );
    return { potentialSavings, recommendations };
  }

  private analyzeNode(
    node: Extract<NodeCost, { known: true }>,
    usage: ResourceUsage | undefined
  ): Recommendation | undefined {
    const { cpuMillicores, memoryBytes } = node.allocatable;
    if (!usage || cpuMillicores <= 0 || memoryBytes <= 0) {
      return undefined;
    }
    const cpu = usage.cpuMillicores / cpuMillicores;
    const memory = usage.memoryBytes / memoryBytes;
    const peak = Math.max(cpu, memory);

    if (peak < this.options.idleUtilization) {
      return {
        type: 'idle-node',
        resource: 'Node',
        name: node.nodeName,
        description: `Node ${node.nodeName} is idle (peak utilization ${percent(peak)}); consider draining and removing it`,
        currentMonthlyCost: node.monthlyCost,
        projectedMonthlyCost: 0,
        potentialSaving: node.monthlyCost
      };
    }
    if (peak >= this.options.lowUtilization) {
      return undefined;
    }

    const scale = 1 + this.options.headroom;
    const { prices } = node.prices;
    const resizedHourly =
      ((usage.cpuMillicores * scale) / 1000) * prices.cpu +
      ((usage.memoryBytes * scale) / GIB) * prices.memory +
      node.breakdown.storage +
      node.breakdown.network +
      node.breakdown.gpu;
    const projectedMonthlyCost = resizedHourly * HOURS_PER_MONTH;
    const potentialSaving = node.monthlyCost - projectedMonthlyCost;
    if (potentialSaving <= 0) {
      return undefined;
    }

    return {
      type: 'rightsize-node',
      resource: 'Node',
      name: node.nodeName,
      description:
        `Node ${node.nodeName} peaks at ${percent(cpu)} CPU / ${percent(memory)} memory; ` +
        'move to a smaller instance type',
      currentMonthlyCost: node.monthlyCost,
      projectedMonthlyCost,
      potentialSaving
    };
  }

  private analyzePod(pod: PodCost, usage: ResourceUsage | undefined): Recommendation | undefined {
    const { requests } = pod;
    if (!usage || requests.cpuMillicores <= 0 || requests.memoryBytes <= 0) {
      return undefined;
    }
    const cpu = usage.cpuMillicores / requests.cpuMillicores;
    const memory = usage.memoryBytes / requests.memoryBytes;
    const peak = Math.max(cpu, memory);
    const key = `${pod.namespace}/${pod.name}`;

    if (peak < this.options.idleUtilization) {
      return {
        type: 'idle-pod',
        resource: 'Pod',
        namespace: pod.namespace,
        name: pod.name,
        description: `Pod ${key} uses at most ${percent(peak)} of its requests; consider removing it`,
        currentMonthlyCost: pod.monthlyCost,
        projectedMonthlyCost: 0,
        potentialSaving: pod.monthlyCost
      };
    }
    if (peak >= this.options.lowUtilization) {
      return undefined;
    }

    const scale = 1 + this.options.headroom;
    const { breakdown } = pod;
    const resizedHourly =
      breakdown.cpu * Math.min(1, cpu * scale) +
      breakdown.memory * Math.min(1, memory * scale) +
      breakdown.storage +
      breakdown.network +
      breakdown.gpu;
    const projectedMonthlyCost = resizedHourly * HOURS_PER_MONTH;
    const potentialSaving = pod.monthlyCost - projectedMonthlyCost;
    if (potentialSaving <= 0) {
      return undefined;
    }

    const cpuTarget = Math.ceil(usage.cpuMillicores * scale);
    const memoryTarget = Math.ceil((usage.memoryBytes * scale) / 1024 ** 2);
    return {
      type: 'rightsize-pod',
      resource: 'Pod',
      namespace: pod.namespace,
      name: pod.name,
      description:
        `Pod ${key} uses ${percent(cpu)} CPU / ${percent(memory)} memory of its requests at peak; ` +
        `lower requests to ${cpuTarget}m CPU / ${memoryTarget}Mi memory`,
      currentMonthlyCost: pod.monthlyCost,
      projectedMonthlyCost,
      potentialSaving
    };
  }
}
