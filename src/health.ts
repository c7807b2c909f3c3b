import { SnapshotError } from './errors.js';
import type { Logger } from './logger.js';
import {
  PRESSURE_CONDITIONS,
  type CategoryResult,
  type ClusterHealth,
  type ClusterNode,
  type ClusterPod,
  type ClusterSnapshot,
  type ControlPlaneComponent,
  type ControlPlaneStatus,
  type HealthIssue,
  type NamespaceHealth,
  type NetworkStatus,
  type NodeConditionType,
  type NodeHealthStatus,
  type PodHealthStatus,
  type PodPhase,
  type ResourceUsageStatus,
  type ServiceStatus,
  type Severity
} from './types.js';

export const HEALTH_WEIGHTS = {
  node: 0.3,
  pod: 0.25,
  controlPlane: 0.25,
  network: 0.1,
  resourceUsage: 0.1
} as const;

export type HealthCategory = keyof typeof HEALTH_WEIGHTS;

const HEALTH_CATEGORIES: readonly HealthCategory[] = ['node', 'pod', 'controlPlane', 'network', 'resourceUsage'];

const RESTART_THRESHOLD = 5;
const HIGH_USAGE_PERCENT = 80;
const API_SERVER_SLOW_MS = 1000;

const CNI_APPS = new Set(['calico-node', 'flannel', 'weave-net', 'cilium']);

// kube-system pod name fragments identifying each control-plane component
const COMPONENT_POD_NAMES: Array<[ControlPlaneComponent, string]> = [
  ['controller-manager', 'kube-controller-manager'],
  ['scheduler', 'kube-scheduler'],
  ['etcd', 'etcd'],
  ['coredns', 'coredns']
];

const floor0 = (value: number) => Math.max(0, value);

export function checkNodeHealth(nodes: ClusterNode[]): CategoryResult<NodeHealthStatus> {
  const conditionCounts: Record<NodeConditionType, number> = {
    Ready: 0,
    MemoryPressure: 0,
    DiskPressure: 0,
    PIDPressure: 0,
    NetworkUnavailable: 0
  };
  const nodeConditions: Record<string, NodeConditionType[]> = {};
  const notReadyNodes: string[] = [];
  const pressureNodes: string[] = [];
  const networkUnavailableNodes: string[] = [];

  for (const node of nodes) {
    nodeConditions[node.name] = [...node.conditions];
    for (const condition of node.conditions) {
      conditionCounts[condition]++;
    }
    if (!node.conditions.includes('Ready')) {
      notReadyNodes.push(node.name);
    }
    if (node.conditions.some(c => PRESSURE_CONDITIONS.includes(c))) {
      pressureNodes.push(node.name);
    }
    if (node.conditions.includes('NetworkUnavailable')) {
      networkUnavailableNodes.push(node.name);
    }
  }

  const total = nodes.length;
  const ready = conditionCounts.Ready;
  const score = total === 0 ? 100 : floor0((100 * ready) / total - 5 * pressureNodes.length);

  return {
    known: true,
    score,
    status: {
      totalNodes: total,
      readyNodes: ready,
      notReadyNodes,
      pressureNodes,
      networkUnavailableNodes,
      conditionCounts,
      nodeConditions
    }
  };
}

export function checkPodHealth(pods: ClusterPod[]): CategoryResult<PodHealthStatus> {
  const phaseCounts: Record<PodPhase, number> = {
    Running: 0,
    Pending: 0,
    Succeeded: 0,
    Failed: 0,
    Unknown: 0
  };
  const podsPerNode: Record<string, number> = {};
  const crashLoopingPods: string[] = [];
  const restartingPods: string[] = [];

  for (const pod of pods) {
    phaseCounts[pod.phase]++;
    if (pod.nodeName) {
      podsPerNode[pod.nodeName] = (podsPerNode[pod.nodeName] ?? 0) + 1;
    }
    const key = `${pod.namespace}/${pod.name}`;
    if (pod.containers.some(c => c.waitingReason === 'CrashLoopBackOff')) {
      crashLoopingPods.push(key);
    }
    if (pod.containers.some(c => c.restartCount > RESTART_THRESHOLD)) {
      restartingPods.push(key);
    }
  }

  const total = pods.length;
  const score =
    total === 0
      ? 100
      : floor0((100 * phaseCounts.Running) / total - 2 * crashLoopingPods.length - restartingPods.length);

  return {
    known: true,
    score,
    status: { totalPods: total, phaseCounts, podsPerNode, crashLoopingPods, restartingPods }
  };
}

export function checkControlPlaneHealth(snapshot: ClusterSnapshot): CategoryResult<ControlPlaneStatus> {
  if (!snapshot.systemPods.available) {
    return { known: false, reason: `kube-system pods unavailable: ${snapshot.systemPods.reason}` };
  }

  const { reachable, latencyMs } = snapshot.apiServer;
  const components: Record<ControlPlaneComponent, boolean> = {
    'api-server': reachable && latencyMs < API_SERVER_SLOW_MS,
    'controller-manager': true,
    scheduler: true,
    etcd: true,
    coredns: true
  };

  // A component with no pod (managed control planes) counts as healthy
  for (const pod of snapshot.systemPods.items) {
    for (const [component, fragment] of COMPONENT_POD_NAMES) {
      if (pod.name.includes(fragment) && pod.phase !== 'Running') {
        components[component] = false;
      }
    }
  }

  const healthy = Object.values(components).filter(Boolean).length;
  const total = Object.keys(components).length;
  const overallHealthy = healthy === total;

  let score = 100;
  if (!overallHealthy) {
    score = (100 * healthy) / total;
    if (reachable && latencyMs >= API_SERVER_SLOW_MS) {
      score -= Math.min(20, latencyMs / 50);
    }
  }

  return {
    known: true,
    score: floor0(score),
    status: { components, apiServerLatencyMs: latencyMs, overallHealthy }
  };
}

function allRunning(pods: ClusterPod[]): boolean {
  return pods.every(pod => pod.phase === 'Running');
}

export function checkNetworkHealth(snapshot: ClusterSnapshot): CategoryResult<NetworkStatus> {
  const { systemPods, services, endpoints, ingressControllers, networkPolicies } = snapshot;
  if (!systemPods.available) {
    return { known: false, reason: `kube-system pods unavailable: ${systemPods.reason}` };
  }
  if (!services.available) {
    return { known: false, reason: `services unavailable: ${services.reason}` };
  }
  if (!endpoints.available) {
    return { known: false, reason: `endpoints unavailable: ${endpoints.reason}` };
  }
  if (!ingressControllers.available) {
    return { known: false, reason: `ingress controllers unavailable: ${ingressControllers.reason}` };
  }

  const cniPods = systemPods.items.filter(pod => CNI_APPS.has(pod.labels['k8s-app'] ?? ''));
  const dnsPods = systemPods.items.filter(pod => pod.labels['k8s-app'] === 'kube-dns');

  const subsets = new Map<string, number>();
  for (const ep of endpoints.items) {
    subsets.set(`${ep.namespace}/${ep.name}`, ep.subsetCount);
  }
  const servicesWithoutEndpoints = services.items
    .filter(svc => svc.hasSelector)
    .map(svc => `${svc.namespace}/${svc.name}`)
    .filter(key => (subsets.get(key) ?? 0) === 0);

  const status: NetworkStatus = {
    cniHealthy: allRunning(cniPods),
    dnsResolutionOk: allRunning(dnsPods),
    serviceEndpointsHealthy: servicesWithoutEndpoints.length === 0,
    ingressHealthy: ingressControllers.items.every(ic => ic.readyReplicas >= ic.desiredReplicas),
    servicesWithoutEndpoints,
    networkPolicyCount: networkPolicies.available ? networkPolicies.items.length : null
  };

  const passed = [
    status.cniHealthy,
    status.dnsResolutionOk,
    status.serviceEndpointsHealthy,
    status.ingressHealthy
  ].filter(Boolean).length;

  return { known: true, score: (100 * passed) / 4, status };
}

export function resourceUsageScore(cpuPercent: number, memoryPercent: number): number {
  return floor0(
    100 - floor0(cpuPercent - HIGH_USAGE_PERCENT) * 2 - floor0(memoryPercent - HIGH_USAGE_PERCENT) * 2
  );
}

export function checkResourceUsage(snapshot: ClusterSnapshot): CategoryResult<ResourceUsageStatus> {
  if (!snapshot.nodeMetrics.available) {
    return { known: false, reason: `node metrics unavailable: ${snapshot.nodeMetrics.reason}` };
  }
  const nodes = snapshot.nodes.available ? snapshot.nodes.items : [];
  const usageByNode = new Map(snapshot.nodeMetrics.items.map(m => [m.name, m.usage]));

  let cpuUsed = 0;
  let cpuAllocatable = 0;
  let memoryUsed = 0;
  let memoryAllocatable = 0;
  const highCpuNodes: string[] = [];
  const highMemoryNodes: string[] = [];

  for (const node of nodes) {
    const usage = usageByNode.get(node.name);
    const allocatable = node.allocatable;
    if (!usage || !allocatable || allocatable.cpuMillicores <= 0 || allocatable.memoryBytes <= 0) {
      continue;
    }
    cpuUsed += usage.cpuMillicores;
    cpuAllocatable += allocatable.cpuMillicores;
    memoryUsed += usage.memoryBytes;
    memoryAllocatable += allocatable.memoryBytes;

    if ((100 * usage.cpuMillicores) / allocatable.cpuMillicores > HIGH_USAGE_PERCENT) {
      highCpuNodes.push(node.name);
    }
    if ((100 * usage.memoryBytes) / allocatable.memoryBytes > HIGH_USAGE_PERCENT) {
      highMemoryNodes.push(node.name);
    }
  }

  if (cpuAllocatable === 0 || memoryAllocatable === 0) {
    return { known: false, reason: 'no node reported both metrics and allocatable resources' };
  }

  const cpuPercent = (100 * cpuUsed) / cpuAllocatable;
  const memoryPercent = (100 * memoryUsed) / memoryAllocatable;
  return {
    known: true,
    score: resourceUsageScore(cpuPercent, memoryPercent),
    status: { cpuPercent, memoryPercent, highCpuNodes, highMemoryNodes }
  };
}

function namespaceServices(snapshot: ClusterSnapshot, namespace: string): ServiceStatus | null {
  if (!snapshot.services.available || !snapshot.endpoints.available) {
    return null;
  }
  const withSubsets = new Set(
    snapshot.endpoints.items.filter(ep => ep.namespace === namespace && ep.subsetCount > 0).map(ep => ep.name)
  );
  const services = snapshot.services.items.filter(svc => svc.namespace === namespace && svc.hasSelector);
  const servicesWithEndpoints = services.filter(svc => withSubsets.has(svc.name)).length;
  return {
    totalServices: services.length,
    servicesWithEndpoints,
    servicesWithoutEndpoints: services.length - servicesWithEndpoints
  };
}

function namespaceResourceUsage(snapshot: ClusterSnapshot, pods: ClusterPod[]): CategoryResult<ResourceUsageStatus> {
  if (!snapshot.podMetrics.available) {
    return { known: false, reason: `pod metrics unavailable: ${snapshot.podMetrics.reason}` };
  }
  const usageByPod = new Map(snapshot.podMetrics.items.map(m => [`${m.namespace}/${m.name}`, m.usage]));

  let cpuUsed = 0;
  let cpuRequested = 0;
  let memoryUsed = 0;
  let memoryRequested = 0;
  for (const pod of pods) {
    const usage = usageByPod.get(`${pod.namespace}/${pod.name}`);
    if (!usage) {
      continue;
    }
    cpuUsed += usage.cpuMillicores;
    memoryUsed += usage.memoryBytes;
    cpuRequested += pod.requests.cpuMillicores;
    memoryRequested += pod.requests.memoryBytes;
  }

  if (cpuRequested === 0 || memoryRequested === 0) {
    return { known: false, reason: 'no measured pods with cpu and memory requests' };
  }
  const cpuPercent = (100 * cpuUsed) / cpuRequested;
  const memoryPercent = (100 * memoryUsed) / memoryRequested;
  return {
    known: true,
    score: resourceUsageScore(cpuPercent, memoryPercent),
    status: { cpuPercent, memoryPercent, highCpuNodes: [], highMemoryNodes: [] }
  };
}

export function checkNamespaceHealth(snapshot: ClusterSnapshot, pods: ClusterPod[]): Record<string, NamespaceHealth> {
  const byNamespace = new Map<string, ClusterPod[]>();
  for (const pod of pods) {
    const list = byNamespace.get(pod.namespace) ?? [];
    list.push(pod);
    byNamespace.set(pod.namespace, list);
  }

  const result: Record<string, NamespaceHealth> = {};
  for (const namespace of [...byNamespace.keys()].sort()) {
    const nsPods = byNamespace.get(namespace) ?? [];
    const podHealth = checkPodHealth(nsPods);
    if (!podHealth.known) {
      continue;
    }
    const resourceUsage = namespaceResourceUsage(snapshot, nsPods);
    const weighted: Array<[number, number]> = [[HEALTH_WEIGHTS.pod, podHealth.score]];
    if (resourceUsage.known) {
      weighted.push([HEALTH_WEIGHTS.resourceUsage, resourceUsage.score]);
    }
    result[namespace] = {
      namespace,
      pods: podHealth.status,
      podScore: podHealth.score,
      services: namespaceServices(snapshot, namespace),
      resourceUsage,
      score: weightedScore(weighted)
    };
  }
  return result;
}

function weightedScore(parts: Array<[weight: number, score: number]>): number {
  const totalWeight = parts.reduce((sum, [w]) => sum + w, 0);
  if (totalWeight === 0) {
    return 0;
  }
  const raw = parts.reduce((sum, [w, s]) => sum + w * s, 0) / totalWeight;
  return Math.min(100, Math.max(0, Math.round(raw)));
}

/**
 * Composite score over the categories that could be evaluated. Unknown
 * categories are dropped and the remaining weights renormalized.
 */
export function calculateHealthScore(categories: Record<HealthCategory, CategoryResult<unknown>>): number {
  const parts: Array<[number, number]> = [];
  for (const category of HEALTH_CATEGORIES) {
    const result = categories[category];
    if (result.known) {
      parts.push([HEALTH_WEIGHTS[category], result.score]);
    }
  }
  return weightedScore(parts);
}

const SEVERITY_RANK: Record<Severity, number> = { critical: 0, warning: 1, info: 2 };

function compareIssues(a: HealthIssue, b: HealthIssue): number {
  const keys = (i: HealthIssue) => [i.resource, i.namespace ?? '', i.name ?? '', i.message];
  const diff = SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity];
  if (diff !== 0) {
    return diff;
  }
  const ka = keys(a);
  const kb = keys(b);
  for (let i = 0; i < ka.length; i++) {
    if (ka[i] < kb[i]) return -1;
    if (ka[i] > kb[i]) return 1;
  }
  return 0;
}

function splitKey(key: string): { namespace: string; name: string } {
  const slash = key.indexOf('/');
  return { namespace: key.slice(0, slash), name: key.slice(slash + 1) };
}

const CATEGORY_LABELS: Record<HealthCategory, string> = {
  node: 'Node',
  pod: 'Pod',
  controlPlane: 'Control plane',
  network: 'Network',
  resourceUsage: 'Resource usage'
};

/**
 * Derive the ranked issue list from already computed category results.
 */
export function identifyHealthIssues(health: Omit<ClusterHealth, 'issues' | 'score'>): HealthIssue[] {
  const issues: HealthIssue[] = [];

  for (const category of HEALTH_CATEGORIES) {
    const result = health[category];
    if (!result.known) {
      issues.push({
        severity: 'warning',
        resource: 'Cluster',
        message: `${CATEGORY_LABELS[category]} health unknown: ${result.reason}`,
        suggestion: 'Check API permissions and that metrics-server is installed'
      });
    }
  }

  if (health.node.known) {
    const { notReadyNodes, pressureNodes, networkUnavailableNodes, nodeConditions } = health.node.status;
    for (const name of notReadyNodes) {
      issues.push({
        severity: 'critical',
        resource: 'Node',
        name,
        message: `Node ${name} is not Ready`,
        suggestion: 'Check kubelet status and node events'
      });
    }
    for (const name of pressureNodes) {
      const pressures = (nodeConditions[name] ?? []).filter(c => PRESSURE_CONDITIONS.includes(c));
      issues.push({
        severity: 'critical',
        resource: 'Node',
        name,
        message: `Node ${name} reports ${pressures.join(', ')}`,
        suggestion: 'Free resources on the node or reschedule workloads'
      });
    }
    for (const name of networkUnavailableNodes) {
      issues.push({
        severity: 'warning',
        resource: 'Node',
        name,
        message: `Node ${name} reports NetworkUnavailable`,
        suggestion: 'Check the CNI pods and routes on the node'
      });
    }
  }

  if (health.pod.known) {
    const { crashLoopingPods, restartingPods, phaseCounts } = health.pod.status;
    for (const key of crashLoopingPods) {
      issues.push({
        severity: 'critical',
        resource: 'Pod',
        ...splitKey(key),
        message: `Pod ${key} is in CrashLoopBackOff`,
        suggestion: 'Inspect container logs and the previous termination reason'
      });
    }
    for (const key of restartingPods) {
      issues.push({
        severity: 'warning',
        resource: 'Pod',
        ...splitKey(key),
        message: `Pod ${key} has a container restarted more than ${RESTART_THRESHOLD} times`,
        suggestion: 'Check liveness probes and memory limits'
      });
    }
    const notRunning: Array<[PodPhase, Severity]> = [
      ['Failed', 'warning'],
      ['Pending', 'warning'],
      ['Unknown', 'warning'],
      ['Succeeded', 'info']
    ];
    for (const [phase, severity] of notRunning) {
      if (phaseCounts[phase] > 0) {
        issues.push({
          severity,
          resource: 'Cluster',
          message: `${phaseCounts[phase]} pod(s) in phase ${phase}`,
          suggestion: phase === 'Succeeded' ? 'Remove completed pods' : 'Describe the pods to find the cause'
        });
      }
    }
  }

  if (health.controlPlane.known) {
    const { components, apiServerLatencyMs } = health.controlPlane.status;
    for (const [component, healthy] of Object.entries(components)) {
      if (healthy) {
        continue;
      }
      const message =
        component === 'api-server'
          ? `API server is unreachable or slow (${apiServerLatencyMs}ms)`
          : `Control plane component ${component} is not running`;
      issues.push({
        severity: 'warning',
        resource: 'ControlPlane',
        name: component,
        message,
        suggestion: 'Check kube-system pods and control plane logs'
      });
    }
  }

  if (health.network.known) {
    const status = health.network.status;
    const checks: Array<[boolean, string, string]> = [
      [status.cniHealthy, 'CNI pods are not all running', 'Check the CNI daemonset in kube-system'],
      [status.dnsResolutionOk, 'CoreDNS pods are not all running', 'Check the kube-dns deployment'],
      [status.ingressHealthy, 'Ingress controller is missing ready replicas', 'Check the ingress controller deployment']
    ];
    for (const [ok, message, suggestion] of checks) {
      if (!ok) {
        issues.push({ severity: 'warning', resource: 'Network', message, suggestion });
      }
    }
    for (const key of status.servicesWithoutEndpoints) {
      issues.push({
        severity: 'warning',
        resource: 'Service',
        ...splitKey(key),
        message: `Service ${key} has no endpoints`,
        suggestion: 'Verify the service selector matches running pods'
      });
    }
  }

  if (health.resourceUsage.known) {
    const { cpuPercent, memoryPercent } = health.resourceUsage.status;
    const usage: Array<[string, number]> = [
      ['CPU', cpuPercent],
      ['Memory', memoryPercent]
    ];
    for (const [label, percent] of usage) {
      if (percent > HIGH_USAGE_PERCENT) {
        issues.push({
          severity: percent > 95 ? 'warning' : 'info',
          resource: 'Cluster',
          message: `Cluster ${label} usage is ${percent.toFixed(1)}%`,
          suggestion: 'Add capacity or reduce workload requests'
        });
      }
    }
  }

  for (const ns of Object.values(health.namespaces)) {
    if (ns.resourceUsage.known && ns.resourceUsage.score < 100) {
      issues.push({
        severity: 'info',
        resource: 'Namespace',
        name: ns.namespace,
        message: `Namespace ${ns.namespace} uses more than ${HIGH_USAGE_PERCENT}% of its requests`,
        suggestion: 'Raise requests to match observed usage'
      });
    }
  }

  return issues.sort(compareIssues);
}

/**
 * Reduces a snapshot to per-category statuses, a composite score and a ranked
 * issue list. Node and pod enumeration failures are fatal; every other check
 * degrades to "unknown".
 */
export class HealthEvaluator {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async evaluate(snapshot: ClusterSnapshot): Promise<ClusterHealth> {
    if (!snapshot.nodes.available) {
      throw new SnapshotError(`node health check failed: ${snapshot.nodes.reason}`);
    }
    if (!snapshot.pods.available) {
      throw new SnapshotError(`pod health check failed: ${snapshot.pods.reason}`);
    }
    const pods = snapshot.pods.items;

    const categories = {
      node: checkNodeHealth(snapshot.nodes.items),
      pod: checkPodHealth(pods),
      controlPlane: checkControlPlaneHealth(snapshot),
      network: checkNetworkHealth(snapshot),
      resourceUsage: checkResourceUsage(snapshot)
    };
    for (const [category, result] of Object.entries(categories)) {
      if (!result.known) {
        this.logger.warn(`${category} health check degraded: ${result.reason}`);
      }
    }

    const partial = {
      timestamp: snapshot.takenAt,
      ...categories,
      namespaces: checkNamespaceHealth(snapshot, pods)
    };

    const health: ClusterHealth = {
      ...partial,
      score: calculateHealthScore(categories),
      issues: identifyHealthIssues(partial)
    };
    this.logger.debug(`Health score ${health.score} with ${health.issues.length} issue(s)`);
    return health;
  }
}
