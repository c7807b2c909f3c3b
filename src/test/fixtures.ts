import { GIB } from '../quantity.js';
import { available, type ClusterNode, type ClusterPod, type ClusterSnapshot } from '../types.js';

export const TAKEN_AT = new Date('2024-06-01T12:00:00Z');

export const DAY_MS = 24 * 60 * 60 * 1000;

export function daysAgo(days: number): Date {
  return new Date(TAKEN_AT.getTime() - days * DAY_MS);
}

export function makeNode(overrides: Partial<ClusterNode> = {}): ClusterNode {
  return {
    name: 'node-a',
    allocatable: { cpuMillicores: 4000, memoryBytes: 16 * GIB, storageBytes: 100 * GIB },
    conditions: ['Ready'],
    ...overrides
  };
}

export function makePod(overrides: Partial<ClusterPod> = {}): ClusterPod {
  return {
    namespace: 'default',
    name: 'web-1',
    nodeName: 'node-a',
    phase: 'Running',
    labels: {},
    containers: [{ name: 'app', restartCount: 0 }],
    requests: { cpuMillicores: 500, memoryBytes: 1 * GIB },
    configMapRefs: [],
    createdAt: daysAgo(1),
    ...overrides
  };
}

/** A fully healthy kube-system: control plane, CNI and DNS pods all Running. */
export function systemPods(): ClusterPod[] {
  const sys = (name: string, labels: Record<string, string> = {}) =>
    makePod({ namespace: 'kube-system', name, labels, requests: { cpuMillicores: 0, memoryBytes: 0 } });
  return [
    sys('kube-apiserver-cp-1'),
    sys('kube-controller-manager-cp-1'),
    sys('kube-scheduler-cp-1'),
    sys('etcd-cp-1'),
    sys('coredns-5d78c9869d-abcde', { 'k8s-app': 'kube-dns' }),
    sys('calico-node-xyz12', { 'k8s-app': 'calico-node' })
  ];
}

export function makeSnapshot(overrides: Partial<ClusterSnapshot> = {}): ClusterSnapshot {
  return {
    takenAt: TAKEN_AT,
    nodes: available([makeNode()]),
    pods: available([makePod()]),
    systemPods: available(systemPods()),
    apiServer: { reachable: true, latencyMs: 20 },
    services: available([]),
    endpoints: available([]),
    networkPolicies: available([]),
    ingressControllers: available([]),
    configMaps: available([]),
    nodeMetrics: available([]),
    podMetrics: available([]),
    ...overrides
  };
}
