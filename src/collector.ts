import type * as k8s from '@kubernetes/client-node';
import { errorMessage, untilAborted } from './errors.js';
import type { Logger } from './logger.js';
import { parseBytes, parseCpu } from './quantity.js';
import {
  available,
  unavailable,
  type ClusterNode,
  type ClusterPod,
  type ClusterSnapshot,
  type Collected,
  type NodeConditionType,
  type PodPhase,
  type ResourceUsage
} from './types.js';

// Narrow views of the generated clients, so tests can pass in-process fakes.
export interface CoreApi {
  listNode(): Promise<{ items: k8s.V1Node[] }>;
  listPodForAllNamespaces(): Promise<{ items: k8s.V1Pod[] }>;
  listNamespacedPod(param: { namespace: string }): Promise<{ items: k8s.V1Pod[] }>;
  listNamespace(param: { limit?: number }): Promise<unknown>;
  listServiceForAllNamespaces(): Promise<{ items: k8s.V1Service[] }>;
  listEndpointsForAllNamespaces(): Promise<{ items: k8s.V1Endpoints[] }>;
  listConfigMapForAllNamespaces(): Promise<{ items: k8s.V1ConfigMap[] }>;
}

export interface AppsApi {
  listDeploymentForAllNamespaces(param: { labelSelector?: string }): Promise<{ items: k8s.V1Deployment[] }>;
}

export interface NetworkingApi {
  listNetworkPolicyForAllNamespaces(): Promise<{ items: k8s.V1NetworkPolicy[] }>;
}

interface Usage {
  cpu: string;
  memory: string;
}

export interface MetricsApi {
  getNodeMetrics(): Promise<{ items: Array<{ metadata: { name: string }; usage: Usage }> }>;
  getPodMetrics(): Promise<{
    items: Array<{ metadata: { name: string; namespace?: string }; containers: Array<{ usage: Usage }> }>;
  }>;
}

export interface KubernetesApis {
  core: CoreApi;
  apps: AppsApi;
  networking: NetworkingApi;
  metrics: MetricsApi;
}

/** Anything that can produce a snapshot for one evaluation cycle. */
export interface SnapshotSource {
  collect(signal?: AbortSignal): Promise<ClusterSnapshot>;
}

export const INGRESS_CONTROLLER_SELECTOR = 'app in (ingress-nginx,traefik,istio-ingressgateway)';

const NODE_CONDITIONS = new Set<string>(['Ready', 'MemoryPressure', 'DiskPressure', 'PIDPressure', 'NetworkUnavailable']);
const POD_PHASES = new Set<string>(['Running', 'Pending', 'Succeeded', 'Failed', 'Unknown']);

const INSTANCE_TYPE_LABELS = ['node.kubernetes.io/instance-type', 'beta.kubernetes.io/instance-type'];
const REGION_LABELS = ['topology.kubernetes.io/region', 'failure-domain.beta.kubernetes.io/region'];
const ZONE_LABELS = ['topology.kubernetes.io/zone', 'failure-domain.beta.kubernetes.io/zone'];
const GPU_MODEL_LABELS = ['nvidia.com/gpu.product', 'cloud.google.com/gke-accelerator', 'k8s.amazonaws.com/accelerator'];
const GPU_RESOURCE = 'nvidia.com/gpu';

function firstLabel(labels: Record<string, string> | undefined, keys: string[]): string | undefined {
  for (const key of keys) {
    const value = labels?.[key];
    if (value) {
      return value;
    }
  }
  return undefined;
}

function isNodeCondition(type: string): type is NodeConditionType {
  return NODE_CONDITIONS.has(type);
}

function isPodPhase(phase: string | undefined): phase is PodPhase {
  return phase !== undefined && POD_PHASES.has(phase);
}

export function toClusterNode(node: k8s.V1Node): ClusterNode {
  const labels = node.metadata?.labels;
  const allocatable = node.status?.allocatable;
  const conditions = (node.status?.conditions ?? [])
    .filter(c => c.status === 'True')
    .map(c => c.type)
    .filter(isNodeCondition);

  let resources: ClusterNode['allocatable'];
  if (allocatable?.cpu && allocatable.memory) {
    const gpuCount = parseFloat(allocatable[GPU_RESOURCE] ?? '0') || 0;
    resources = {
      cpuMillicores: parseCpu(allocatable.cpu),
      memoryBytes: parseBytes(allocatable.memory),
      storageBytes: parseBytes(allocatable['ephemeral-storage']),
      gpu: gpuCount > 0 ? { count: gpuCount, model: firstLabel(labels, GPU_MODEL_LABELS) } : undefined
    };
  }

  return {
    name: node.metadata?.name ?? '',
    instanceType: firstLabel(labels, INSTANCE_TYPE_LABELS),
    region: firstLabel(labels, REGION_LABELS),
    zone: firstLabel(labels, ZONE_LABELS),
    allocatable: resources,
    conditions,
    createdAt: node.metadata?.creationTimestamp
  };
}

function configMapRefs(spec: k8s.V1PodSpec | undefined): string[] {
  const refs = new Set<string>();
  for (const volume of spec?.volumes ?? []) {
    if (volume.configMap?.name) {
      refs.add(volume.configMap.name);
    }
    for (const source of volume.projected?.sources ?? []) {
      if (source.configMap?.name) {
        refs.add(source.configMap.name);
      }
    }
  }
  for (const container of [...(spec?.initContainers ?? []), ...(spec?.containers ?? [])]) {
    for (const env of container.env ?? []) {
      const name = env.valueFrom?.configMapKeyRef?.name;
      if (name) {
        refs.add(name);
      }
    }
    for (const envFrom of container.envFrom ?? []) {
      if (envFrom.configMapRef?.name) {
        refs.add(envFrom.configMapRef.name);
      }
    }
  }
  return [...refs].sort();
}

export function toClusterPod(pod: k8s.V1Pod, fallbackCreatedAt: Date): ClusterPod {
  const phase = pod.status?.phase;
  let cpuMillicores = 0;
  let memoryBytes = 0;
  for (const container of pod.spec?.containers ?? []) {
    cpuMillicores += parseCpu(container.resources?.requests?.cpu);
    memoryBytes += parseBytes(container.resources?.requests?.memory);
  }

  return {
    namespace: pod.metadata?.namespace ?? 'default',
    name: pod.metadata?.name ?? '',
    nodeName: pod.spec?.nodeName || undefined,
    phase: isPodPhase(phase) ? phase : 'Unknown',
    labels: pod.metadata?.labels ?? {},
    containers: (pod.status?.containerStatuses ?? []).map(status => ({
      name: status.name,
      restartCount: status.restartCount,
      waitingReason: status.state?.waiting?.reason
    })),
    requests: { cpuMillicores, memoryBytes },
    configMapRefs: configMapRefs(pod.spec),
    createdAt: pod.metadata?.creationTimestamp ?? fallbackCreatedAt
  };
}

function toUsage(usage: Usage): ResourceUsage {
  return { cpuMillicores: parseCpu(usage.cpu), memoryBytes: parseBytes(usage.memory) };
}

/**
 * Reads one point-in-time snapshot from the API server and metrics-server.
 * Every list is fetched independently; a failed list is recorded in the
 * snapshot instead of aborting collection.
 */
export class KubernetesSnapshotCollector implements SnapshotSource {
  private apis: KubernetesApis;
  private logger: Logger;

  constructor(apis: KubernetesApis, logger: Logger) {
    this.apis = apis;
    this.logger = logger;
  }

  private async list<T>(label: string, fetch: () => Promise<T[]>): Promise<Collected<T>> {
    try {
      return available(await fetch());
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.warn(`Failed to list ${label}: ${reason}`);
      return unavailable(reason);
    }
  }

  private async checkApiServer(): Promise<ClusterSnapshot['apiServer']> {
    const start = Date.now();
    try {
      await this.apis.core.listNamespace({ limit: 1 });
      return { reachable: true, latencyMs: Date.now() - start };
    } catch (error) {
      return { reachable: false, latencyMs: Date.now() - start, error: errorMessage(error) };
    }
  }

  async collect(signal?: AbortSignal): Promise<ClusterSnapshot> {
    const takenAt = new Date();
    const { core, apps, networking, metrics } = this.apis;

    const lists = Promise.all([
      this.checkApiServer(),
      this.list('nodes', async () => (await core.listNode()).items.map(toClusterNode)),
      this.list('pods', async () =>
        (await core.listPodForAllNamespaces()).items.map(pod => toClusterPod(pod, takenAt))
      ),
      this.list('kube-system pods', async () =>
        (await core.listNamespacedPod({ namespace: 'kube-system' })).items.map(pod => toClusterPod(pod, takenAt))
      ),
      this.list('services', async () =>
        (await core.listServiceForAllNamespaces()).items.map(svc => ({
          namespace: svc.metadata?.namespace ?? 'default',
          name: svc.metadata?.name ?? '',
          hasSelector: Object.keys(svc.spec?.selector ?? {}).length > 0
        }))
      ),
      this.list('endpoints', async () =>
        (await core.listEndpointsForAllNamespaces()).items.map(ep => ({
          namespace: ep.metadata?.namespace ?? 'default',
          name: ep.metadata?.name ?? '',
          subsetCount: ep.subsets?.length ?? 0
        }))
      ),
      this.list('network policies', async () =>
        (await networking.listNetworkPolicyForAllNamespaces()).items.map(np => ({
          namespace: np.metadata?.namespace ?? 'default',
          name: np.metadata?.name ?? ''
        }))
      ),
      this.list('ingress controllers', async () =>
        (await apps.listDeploymentForAllNamespaces({ labelSelector: INGRESS_CONTROLLER_SELECTOR })).items.map(
          deploy => ({
            namespace: deploy.metadata?.namespace ?? 'default',
            name: deploy.metadata?.name ?? '',
            desiredReplicas: deploy.spec?.replicas ?? 1,
            readyReplicas: deploy.status?.readyReplicas ?? 0
          })
        )
      ),
      this.list('configmaps', async () =>
        (await core.listConfigMapForAllNamespaces()).items.map(cm => ({
          namespace: cm.metadata?.namespace ?? 'default',
          name: cm.metadata?.name ?? '',
          createdAt: cm.metadata?.creationTimestamp ?? takenAt
        }))
      ),
      this.list('node metrics', async () =>
        (await metrics.getNodeMetrics()).items.map(m => ({ name: m.metadata.name, usage: toUsage(m.usage) }))
      ),
      this.list('pod metrics', async () =>
        (await metrics.getPodMetrics()).items.map(m => {
          const usage = m.containers.map(c => toUsage(c.usage));
          return {
            namespace: m.metadata.namespace ?? 'default',
            name: m.metadata.name,
            usage: {
              cpuMillicores: usage.reduce((sum, u) => sum + u.cpuMillicores, 0),
              memoryBytes: usage.reduce((sum, u) => sum + u.memoryBytes, 0)
            }
          };
        })
      )
    ]);
    // a hung list must not hold the cycle past cancellation
    const [
      apiServer,
      nodes,
      pods,
      systemPods,
      services,
      endpoints,
      networkPolicies,
      ingressControllers,
      configMaps,
      nodeMetrics,
      podMetrics
    ] = await (signal ? untilAborted(lists, signal) : lists);

    this.logger.debug(
      `Collected snapshot: ${nodes.available ? nodes.items.length : '?'} nodes, ` +
        `${pods.available ? pods.items.length : '?'} pods`
    );

    return {
      takenAt,
      nodes,
      pods,
      systemPods,
      apiServer,
      services,
      endpoints,
      networkPolicies,
      ingressControllers,
      configMaps,
      nodeMetrics,
      podMetrics
    };
  }
}
