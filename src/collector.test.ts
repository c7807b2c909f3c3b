import type * as k8s from '@kubernetes/client-node';
import { describe, expect, it, vi } from 'vitest';
import {
  INGRESS_CONTROLLER_SELECTOR,
  KubernetesSnapshotCollector,
  toClusterNode,
  toClusterPod,
  type KubernetesApis
} from './collector.js';
import { CycleCancelledError } from './errors.js';
import { silentLogger } from './logger.js';
import { GIB } from './quantity.js';

const CREATED = new Date('2024-05-01T00:00:00Z');

const node: k8s.V1Node = {
  metadata: {
    name: 'gpu-node',
    labels: {
      'node.kubernetes.io/instance-type': 'g4dn.xlarge',
      'topology.kubernetes.io/region': 'us-east-1',
      'topology.kubernetes.io/zone': 'us-east-1a',
      'nvidia.com/gpu.product': 'nvidia-tesla-t4'
    },
    creationTimestamp: CREATED
  },
  status: {
    allocatable: { cpu: '3920m', memory: '15Gi', 'ephemeral-storage': '100Gi', 'nvidia.com/gpu': '1' },
    conditions: [
      { type: 'Ready', status: 'True' },
      { type: 'MemoryPressure', status: 'False' },
      { type: 'DiskPressure', status: 'True' }
    ]
  }
};

const pod: k8s.V1Pod = {
  metadata: { namespace: 'shop', name: 'cart-7d9f', labels: { app: 'cart' }, creationTimestamp: CREATED },
  spec: {
    nodeName: 'gpu-node',
    volumes: [
      { name: 'config', configMap: { name: 'cart-config' } },
      { name: 'bundle', projected: { sources: [{ configMap: { name: 'ca-bundle' } }] } }
    ],
    containers: [
      {
        name: 'app',
        resources: { requests: { cpu: '250m', memory: '256Mi' } },
        env: [{ name: 'MODE', valueFrom: { configMapKeyRef: { name: 'cart-flags', key: 'mode' } } }],
        envFrom: [{ configMapRef: { name: 'cart-config' } }]
      },
      { name: 'sidecar', resources: { requests: { cpu: '0.25', memory: '256Mi' } } }
    ]
  },
  status: {
    phase: 'Running',
    containerStatuses: [
      {
        name: 'app',
        restartCount: 3,
        ready: false,
        image: 'cart:1',
        imageID: '',
        state: { waiting: { reason: 'CrashLoopBackOff' } }
      }
    ]
  }
};

function fakeApis(): KubernetesApis {
  return {
    core: {
      listNode: vi.fn(async () => ({ items: [node] })),
      listPodForAllNamespaces: vi.fn(async () => ({ items: [pod] })),
      listNamespacedPod: vi.fn(async () => ({ items: [] })),
      listNamespace: vi.fn(async () => ({ items: [] })),
      listServiceForAllNamespaces: vi.fn(async () => ({
        items: [{ metadata: { namespace: 'shop', name: 'cart' }, spec: { selector: { app: 'cart' } } }]
      })),
      listEndpointsForAllNamespaces: vi.fn(async () => ({
        items: [{ metadata: { namespace: 'shop', name: 'cart' }, subsets: [{}] }]
      })),
      listConfigMapForAllNamespaces: vi.fn(async () => ({
        items: [{ metadata: { namespace: 'shop', name: 'cart-config', creationTimestamp: CREATED } }]
      }))
    },
    apps: {
      listDeploymentForAllNamespaces: vi.fn(async () => ({
        items: [
          {
            metadata: { namespace: 'ingress-nginx', name: 'ingress-nginx-controller' },
            spec: { replicas: 2, selector: {}, template: {} },
            status: { readyReplicas: 2 }
          }
        ]
      }))
    },
    networking: {
      listNetworkPolicyForAllNamespaces: vi.fn(async () => ({ items: [] }))
    },
    metrics: {
      getNodeMetrics: vi.fn(async () => ({
        items: [{ metadata: { name: 'gpu-node' }, usage: { cpu: '1500000000n', memory: '4Gi' } }]
      })),
      getPodMetrics: vi.fn(async () => ({
        items: [
          {
            metadata: { namespace: 'shop', name: 'cart-7d9f' },
            containers: [{ usage: { cpu: '100m', memory: '100Mi' } }, { usage: { cpu: '50m', memory: '28Mi' } }]
          }
        ]
      }))
    }
  };
}

describe('toClusterNode', () => {
  it('reads placement labels, allocatable resources and true conditions', () => {
    expect(toClusterNode(node)).toEqual({
      name: 'gpu-node',
      instanceType: 'g4dn.xlarge',
      region: 'us-east-1',
      zone: 'us-east-1a',
      allocatable: {
        cpuMillicores: 3920,
        memoryBytes: 15 * GIB,
        storageBytes: 100 * GIB,
        gpu: { count: 1, model: 'nvidia-tesla-t4' }
      },
      conditions: ['Ready', 'DiskPressure'],
      createdAt: CREATED
    });
  });

  it('leaves allocatable undefined when the node reports none', () => {
    expect(toClusterNode({ metadata: { name: 'new' } }).allocatable).toBeUndefined();
  });
});

describe('toClusterPod', () => {
  it('sums container requests and collects ConfigMap references', () => {
    const converted = toClusterPod(pod, new Date());

    expect(converted).toMatchObject({
      namespace: 'shop',
      name: 'cart-7d9f',
      nodeName: 'gpu-node',
      phase: 'Running',
      requests: { cpuMillicores: 500, memoryBytes: 512 * 1024 ** 2 },
      configMapRefs: ['ca-bundle', 'cart-config', 'cart-flags'],
      createdAt: CREATED
    });
    expect(converted.containers).toEqual([{ name: 'app', restartCount: 3, waitingReason: 'CrashLoopBackOff' }]);
  });

  it('maps an unrecognized phase to Unknown', () => {
    expect(toClusterPod({ status: { phase: 'Evicted' } }, CREATED).phase).toBe('Unknown');
  });
});

describe('KubernetesSnapshotCollector', () => {
  it('assembles a snapshot from every source', async () => {
    const apis = fakeApis();
    const snapshot = await new KubernetesSnapshotCollector(apis, silentLogger).collect();

    expect(snapshot.apiServer.reachable).toBe(true);
    expect(snapshot.nodes).toMatchObject({ available: true, items: [{ name: 'gpu-node' }] });
    expect(snapshot.services).toEqual({
      available: true,
      items: [{ namespace: 'shop', name: 'cart', hasSelector: true }]
    });
    expect(snapshot.endpoints).toEqual({
      available: true,
      items: [{ namespace: 'shop', name: 'cart', subsetCount: 1 }]
    });
    expect(snapshot.ingressControllers).toEqual({
      available: true,
      items: [{ namespace: 'ingress-nginx', name: 'ingress-nginx-controller', desiredReplicas: 2, readyReplicas: 2 }]
    });
    expect(snapshot.nodeMetrics).toEqual({
      available: true,
      items: [{ name: 'gpu-node', usage: { cpuMillicores: 1500, memoryBytes: 4 * GIB } }]
    });
    expect(snapshot.podMetrics).toEqual({
      available: true,
      items: [{ namespace: 'shop', name: 'cart-7d9f', usage: { cpuMillicores: 150, memoryBytes: 128 * 1024 ** 2 } }]
    });
    expect(apis.core.listNamespacedPod).toHaveBeenCalledWith({ namespace: 'kube-system' });
    expect(apis.apps.listDeploymentForAllNamespaces).toHaveBeenCalledWith({
      labelSelector: INGRESS_CONTROLLER_SELECTOR
    });
  });

  it('records a failed list instead of aborting collection', async () => {
    const apis = fakeApis();
    apis.metrics.getPodMetrics = vi.fn(async () => {
      throw new Error('the server could not find the requested resource');
    });
    const warn = vi.fn();

    const snapshot = await new KubernetesSnapshotCollector(apis, { ...silentLogger, warn }).collect();

    expect(snapshot.podMetrics).toEqual({
      available: false,
      reason: 'the server could not find the requested resource'
    });
    expect(snapshot.pods.available).toBe(true);
    expect(warn).toHaveBeenCalledWith('Failed to list pod metrics: the server could not find the requested resource');
  });

  it('marks the API server unreachable when the namespace list fails', async () => {
    const apis = fakeApis();
    apis.core.listNamespace = vi.fn(async () => {
      throw new Error('connect ECONNREFUSED');
    });

    const snapshot = await new KubernetesSnapshotCollector(apis, silentLogger).collect();

    expect(snapshot.apiServer).toMatchObject({ reachable: false, error: 'connect ECONNREFUSED' });
  });

  it('throws when the cycle was cancelled during collection', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      new KubernetesSnapshotCollector(fakeApis(), silentLogger).collect(controller.signal)
    ).rejects.toThrow(CycleCancelledError);
  });

  it('stops waiting on a list that never answers once the cycle is cancelled', async () => {
    const apis = fakeApis();
    apis.core.listNode = vi.fn(() => new Promise<k8s.V1NodeList>(() => {}));
    const controller = new AbortController();

    const collecting = new KubernetesSnapshotCollector(apis, silentLogger).collect(controller.signal);
    controller.abort();

    await expect(collecting).rejects.toThrow(CycleCancelledError);
  });
});
