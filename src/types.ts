/**
 * A list that may have failed to load. Secondary sources (metrics, services,
 * kube-system pods, ...) are allowed to fail without aborting a cycle.
 */
export type Collected<T> =
  | { available: true; items: T[] }
  | { available: false; reason: string };

export function available<T>(items: T[]): Collected<T> {
  return { available: true, items };
}

export function unavailable<T>(reason: string): Collected<T> {
  return { available: false, reason };
}

export type NodeConditionType =
  | 'Ready'
  | 'MemoryPressure'
  | 'DiskPressure'
  | 'PIDPressure'
  | 'NetworkUnavailable';

export const PRESSURE_CONDITIONS: readonly NodeConditionType[] = ['MemoryPressure', 'DiskPressure', 'PIDPressure'];

export interface NodeAllocatable {
  cpuMillicores: number;
  memoryBytes: number;
  storageBytes: number;
  gpu?: { count: number; model?: string };
}

export interface ClusterNode {
  name: string;
  instanceType?: string;
  region?: string;
  zone?: string;
  /** Undefined when the node did not report allocatable cpu/memory. */
  allocatable?: NodeAllocatable;
  /** Conditions whose status is True. */
  conditions: NodeConditionType[];
  createdAt?: Date;
}

export type PodPhase = 'Running' | 'Pending' | 'Succeeded' | 'Failed' | 'Unknown';

export interface ContainerState {
  name: string;
  restartCount: number;
  waitingReason?: string;
}

export interface ResourceRequests {
  cpuMillicores: number;
  memoryBytes: number;
}

export interface ClusterPod {
  namespace: string;
  name: string;
  nodeName?: string;
  phase: PodPhase;
  labels: Record<string, string>;
  containers: ContainerState[];
  requests: ResourceRequests;
  /** Names of ConfigMaps in the pod's namespace referenced by volumes or env. */
  configMapRefs: string[];
  createdAt: Date;
}

export interface ResourceUsage {
  cpuMillicores: number;
  memoryBytes: number;
}

export interface NodeMetric {
  name: string;
  usage: ResourceUsage;
}

export interface PodMetric {
  namespace: string;
  name: string;
  usage: ResourceUsage;
}

export interface ServiceInfo {
  namespace: string;
  name: string;
  hasSelector: boolean;
}

export interface EndpointsInfo {
  namespace: string;
  name: string;
  subsetCount: number;
}

export interface IngressControllerInfo {
  namespace: string;
  name: string;
  desiredReplicas: number;
  readyReplicas: number;
}

export interface NetworkPolicyInfo {
  namespace: string;
  name: string;
}

export interface ConfigMapInfo {
  namespace: string;
  name: string;
  createdAt: Date;
}

export interface ApiServerCheck {
  reachable: boolean;
  latencyMs: number;
  error?: string;
}

/**
 * Point-in-time view of a cluster. Read-only for a whole evaluation cycle.
 */
export interface ClusterSnapshot {
  takenAt: Date;
  nodes: Collected<ClusterNode>;
  pods: Collected<ClusterPod>;
  systemPods: Collected<ClusterPod>;
  apiServer: ApiServerCheck;
  services: Collected<ServiceInfo>;
  endpoints: Collected<EndpointsInfo>;
  networkPolicies: Collected<NetworkPolicyInfo>;
  ingressControllers: Collected<IngressControllerInfo>;
  configMaps: Collected<ConfigMapInfo>;
  nodeMetrics: Collected<NodeMetric>;
  podMetrics: Collected<PodMetric>;
}

// Health

export type Severity = 'critical' | 'warning' | 'info';

export type ResourceKind =
  | 'Node'
  | 'Pod'
  | 'ControlPlane'
  | 'Network'
  | 'Service'
  | 'Cluster'
  | 'Namespace';

export interface HealthIssue {
  severity: Severity;
  resource: ResourceKind;
  namespace?: string;
  name?: string;
  message: string;
  suggestion?: string;
}

/** A category result that is either computed or unknown because its inputs failed. */
export type CategoryResult<T> =
  | { known: true; status: T; score: number }
  | { known: false; reason: string };

export interface NodeHealthStatus {
  totalNodes: number;
  readyNodes: number;
  notReadyNodes: string[];
  pressureNodes: string[];
  /** Reported, not scored. */
  networkUnavailableNodes: string[];
  conditionCounts: Record<NodeConditionType, number>;
  nodeConditions: Record<string, NodeConditionType[]>;
}

export interface PodHealthStatus {
  totalPods: number;
  phaseCounts: Record<PodPhase, number>;
  podsPerNode: Record<string, number>;
  crashLoopingPods: string[];
  restartingPods: string[];
}

export type ControlPlaneComponent =
  | 'api-server'
  | 'controller-manager'
  | 'scheduler'
  | 'etcd'
  | 'coredns';

export interface ControlPlaneStatus {
  components: Record<ControlPlaneComponent, boolean>;
  apiServerLatencyMs: number;
  overallHealthy: boolean;
}

export interface NetworkStatus {
  cniHealthy: boolean;
  dnsResolutionOk: boolean;
  serviceEndpointsHealthy: boolean;
  ingressHealthy: boolean;
  servicesWithoutEndpoints: string[];
  /** Null when network policies could not be listed. */
  networkPolicyCount: number | null;
}

export interface ResourceUsageStatus {
  cpuPercent: number;
  memoryPercent: number;
  highCpuNodes: string[];
  highMemoryNodes: string[];
}

export interface ServiceStatus {
  totalServices: number;
  servicesWithEndpoints: number;
  servicesWithoutEndpoints: number;
}

export interface NamespaceHealth {
  namespace: string;
  pods: PodHealthStatus;
  podScore: number;
  services: ServiceStatus | null;
  resourceUsage: CategoryResult<ResourceUsageStatus>;
  score: number;
}

export interface ClusterHealth {
  timestamp: Date;
  node: CategoryResult<NodeHealthStatus>;
  pod: CategoryResult<PodHealthStatus>;
  controlPlane: CategoryResult<ControlPlaneStatus>;
  network: CategoryResult<NetworkStatus>;
  resourceUsage: CategoryResult<ResourceUsageStatus>;
  namespaces: Record<string, NamespaceHealth>;
  score: number;
  issues: HealthIssue[];
}

// Pricing

export type PricedResource = 'cpu' | 'memory' | 'storage' | 'network';

export type ResourcePrices = Record<PricedResource, number>;

export interface PricingConfig {
  defaults: ResourcePrices & { gpuPricing: Record<string, number> };
  instanceTypes: Record<string, Partial<ResourcePrices>>;
  regionMultipliers: Record<string, number>;
}

export type PriceSource = 'instanceType' | 'default';

export interface GpuPrice {
  model: string;
  price: number;
  known: boolean;
}

export interface PerUnitPrices {
  prices: ResourcePrices;
  sources: Record<PricedResource, PriceSource>;
  multiplier: number;
  gpu?: GpuPrice;
  flags: string[];
}

// Cost

export interface CostBreakdown {
  cpu: number;
  memory: number;
  storage: number;
  network: number;
  gpu: number;
}

export interface Utilization {
  /** Ratios in [0, ∞); undefined when metrics for the node are missing. */
  cpu?: number;
  memory?: number;
}

export type NodeCost =
  | {
      known: true;
      nodeName: string;
      instanceType?: string;
      region?: string;
      allocatable: NodeAllocatable;
      prices: PerUnitPrices;
      breakdown: CostBreakdown;
      hourlyCost: number;
      monthlyCost: number;
      usage?: ResourceUsage;
      utilization: Utilization;
    }
  | { known: false; nodeName: string; reason: string };

export type AttributionBasis = 'request' | 'usage' | 'equal';

export interface PodCost {
  namespace: string;
  name: string;
  nodeName: string;
  requests: ResourceRequests;
  usage?: ResourceUsage;
  breakdown: CostBreakdown;
  hourlyCost: number;
  monthlyCost: number;
  basis: { cpu: AttributionBasis; memory: AttributionBasis };
}

export interface NamespaceCost {
  namespace: string;
  podCount: number;
  hourlyCost: number;
  monthlyCost: number;
}

export interface CostReport {
  timestamp: Date;
  nodes: NodeCost[];
  pods: PodCost[];
  namespaces: NamespaceCost[];
  totalHourlyCost: number;
  totalMonthlyCost: number;
  /** Usage over allocatable across priced nodes that reported metrics. */
  clusterUtilization: Utilization;
  unknownNodes: string[];
  flags: string[];
}

// Optimization & cleanup

export type RecommendationType = 'rightsize-node' | 'idle-node' | 'rightsize-pod' | 'idle-pod';

export interface Recommendation {
  type: RecommendationType;
  resource: 'Node' | 'Pod';
  namespace?: string;
  name: string;
  description: string;
  currentMonthlyCost: number;
  projectedMonthlyCost: number;
  potentialSaving: number;
}

export interface OptimizationReport {
  potentialSavings: number;
  recommendations: Recommendation[];
}

export interface CleanupRecommendation {
  resourceType: 'ConfigMap' | 'Pod';
  namespace: string;
  name: string;
  reason: string;
  ageMs: number;
}
