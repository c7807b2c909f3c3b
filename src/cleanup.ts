import { SnapshotError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import type { CleanupRecommendation, ClusterSnapshot } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export const UNREFERENCED_CONFIGMAP_REASON = 'not referenced by any pod';

export interface CleanupOptions {
  retentionDays: number;
  excludedNamespaces: string[];
}

export const DEFAULT_CLEANUP_OPTIONS: CleanupOptions = {
  retentionDays: 7,
  excludedNamespaces: ['kube-system', 'kube-public', 'kube-node-lease']
};

/** The deletions cleanup needs. Backed by the Kubernetes API in production. */
export interface CleanupClient {
  deleteConfigMap(namespace: string, name: string): Promise<void>;
  deletePod(namespace: string, name: string): Promise<void>;
}

export interface CoreDeleteApi {
  deleteNamespacedConfigMap(param: { name: string; namespace: string }): Promise<unknown>;
  deleteNamespacedPod(param: { name: string; namespace: string }): Promise<unknown>;
}

export class KubernetesCleanupClient implements CleanupClient {
  private coreApi: CoreDeleteApi;

  constructor(coreApi: CoreDeleteApi) {
    this.coreApi = coreApi;
  }

  async deleteConfigMap(namespace: string, name: string): Promise<void> {
    await this.coreApi.deleteNamespacedConfigMap({ name, namespace });
  }

  async deletePod(namespace: string, name: string): Promise<void> {
    await this.coreApi.deleteNamespacedPod({ name, namespace });
  }
}

export interface CleanupResult {
  dryRun: boolean;
  recommendations: CleanupRecommendation[];
  deleted: CleanupRecommendation[];
  failed: Array<{ recommendation: CleanupRecommendation; error: string }>;
  /** Not attempted because the run was cancelled. */
  skipped: CleanupRecommendation[];
  /** Deleted by an earlier apply run after this snapshot was taken. */
  alreadyDeleted: CleanupRecommendation[];
  complete: boolean;
}

const byLocation = (a: CleanupRecommendation, b: CleanupRecommendation) =>
  a.namespace.localeCompare(b.namespace) || a.name.localeCompare(b.name);

/**
 * Find unreferenced ConfigMaps and terminal pods past retention. Ages are
 * measured against the snapshot time so the result depends on the snapshot only.
 */
export function analyzeCleanup(
  snapshot: ClusterSnapshot,
  options: CleanupOptions,
  logger: Logger
): CleanupRecommendation[] {
  if (!snapshot.pods.available) {
    throw new SnapshotError(`cleanup analysis failed, pods unavailable: ${snapshot.pods.reason}`);
  }
  const now = snapshot.takenAt.getTime();
  const excluded = new Set(options.excludedNamespaces);
  const pods = snapshot.pods.items;

  const configMapsInUse = new Set<string>();
  for (const pod of pods) {
    for (const ref of pod.configMapRefs) {
      configMapsInUse.add(`${pod.namespace}/${ref}`);
    }
  }

  const configMaps: CleanupRecommendation[] = [];
  if (snapshot.configMaps.available) {
    for (const cm of snapshot.configMaps.items) {
      if (excluded.has(cm.namespace) || configMapsInUse.has(`${cm.namespace}/${cm.name}`)) {
        continue;
      }
      configMaps.push({
        resourceType: 'ConfigMap',
        namespace: cm.namespace,
        name: cm.name,
        reason: UNREFERENCED_CONFIGMAP_REASON,
        ageMs: now - cm.createdAt.getTime()
      });
    }
  } else {
    logger.warn(`Skipping ConfigMap cleanup analysis: ${snapshot.configMaps.reason}`);
  }

  const retentionMs = options.retentionDays * DAY_MS;
  const stalePods: CleanupRecommendation[] = [];
  for (const pod of pods) {
    if (excluded.has(pod.namespace) || (pod.phase !== 'Failed' && pod.phase !== 'Succeeded')) {
      continue;
    }
    const ageMs = now - pod.createdAt.getTime();
    if (ageMs > retentionMs) {
      stalePods.push({
        resourceType: 'Pod',
        namespace: pod.namespace,
        name: pod.name,
        reason: `Failed/Completed pod older than ${options.retentionDays} days (status: ${pod.phase})`,
        ageMs
      });
    }
  }

  return [...configMaps.sort(byLocation), ...stalePods.sort(byLocation)];
}

const targetOf = (rec: CleanupRecommendation) => `${rec.resourceType} ${rec.namespace}/${rec.name}`;

/**
 * Computes cleanup recommendations and, outside dry-run, deletes exactly those
 * resources. Apply runs on one advisor never overlap, and a run does not
 * delete again what an earlier run removed after its snapshot was taken.
 */
export class CleanupAdvisor {
  private client: CleanupClient;
  private options: CleanupOptions;
  private logger: Logger;
  private tail: Promise<void> = Promise.resolve();
  /** Deletion time in epoch ms, by target. */
  private deletedAt = new Map<string, number>();

  constructor(client: CleanupClient, options: CleanupOptions, logger: Logger) {
    this.client = client;
    this.options = options;
    this.logger = logger;
  }

  analyze(snapshot: ClusterSnapshot): CleanupRecommendation[] {
    return analyzeCleanup(snapshot, this.options, this.logger);
  }

  async run(snapshot: ClusterSnapshot, opts: { dryRun: boolean; signal?: AbortSignal }): Promise<CleanupResult> {
    const recommendations = this.analyze(snapshot);
    if (opts.dryRun) {
      return {
        dryRun: true,
        recommendations,
        deleted: [],
        failed: [],
        skipped: [],
        alreadyDeleted: [],
        complete: true
      };
    }
    return this.exclusive(() => this.apply(recommendations, snapshot.takenAt.getTime(), opts.signal));
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // the caller observes the task's failure through `result`
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async apply(
    recommendations: CleanupRecommendation[],
    takenAt: number,
    signal?: AbortSignal
  ): Promise<CleanupResult> {
    const deleted: CleanupRecommendation[] = [];
    const failed: CleanupResult['failed'] = [];
    const skipped: CleanupRecommendation[] = [];
    const alreadyDeleted: CleanupRecommendation[] = [];

    // deletions before the snapshot are already reflected in it
    for (const [target, at] of this.deletedAt) {
      if (at < takenAt) {
        this.deletedAt.delete(target);
      }
    }

    for (const rec of recommendations) {
      const target = targetOf(rec);
      if (this.deletedAt.has(target)) {
        alreadyDeleted.push(rec);
        continue;
      }
      if (signal?.aborted) {
        skipped.push(rec);
        continue;
      }
      try {
        if (rec.resourceType === 'ConfigMap') {
          await this.client.deleteConfigMap(rec.namespace, rec.name);
        } else {
          await this.client.deletePod(rec.namespace, rec.name);
        }
        deleted.push(rec);
        this.deletedAt.set(target, Date.now());
        this.logger.info(`🗑️  Deleted ${target}`);
      } catch (error) {
        failed.push({ recommendation: rec, error: errorMessage(error) });
        this.logger.error(`Failed to delete ${target}:`, error);
      }
    }

    if (skipped.length > 0) {
      this.logger.warn(`Cleanup cancelled, ${skipped.length} deletion(s) not attempted`);
    }
    return {
      dryRun: false,
      recommendations,
      deleted,
      failed,
      skipped,
      alreadyDeleted,
      complete: failed.length === 0 && skipped.length === 0
    };
  }
}
