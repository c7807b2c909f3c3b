import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import type {
  ClusterNode,
  GpuPrice,
  PerUnitPrices,
  PricedResource,
  PriceSource,
  PricingConfig,
  ResourcePrices
} from './types.js';

const price = z.number().nonnegative();

const PricingConfigSchema = z.object({
  defaults: z.object({
    cpu: price, // per core-hour
    memory: price, // per GiB-hour
    storage: price, // per GiB-hour
    network: price, // per node-hour
    gpuPricing: z.record(price).default({})
  }),
  instanceTypes: z
    .record(
      z.object({
        cpu: price.optional(),
        memory: price.optional(),
        storage: price.optional(),
        network: price.optional()
      })
    )
    .default({}),
  regionMultipliers: z.record(z.number().positive()).default({})
});

/** Rough on-demand list prices, used when no pricing document is configured. */
export const DEFAULT_PRICING: PricingConfig = {
  defaults: {
    cpu: 0.031611,
    memory: 0.004237,
    storage: 0.00014,
    network: 0.01,
    gpuPricing: {
      'nvidia-tesla-t4': 0.35,
      'nvidia-tesla-v100': 2.48,
      'nvidia-a100-80gb': 3.93
    }
  },
  instanceTypes: {},
  regionMultipliers: {}
};

export function parsePricingConfig(document: unknown): PricingConfig {
  const result = PricingConfigSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid pricing config: ${issues}`);
  }
  return result.data;
}

/**
 * Load a pricing document from disk. YAML and JSON are both accepted.
 */
export async function loadPricingConfig(path: string): Promise<PricingConfig> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read pricing config ${path}: ${errorMessage(error)}`);
  }

  let document: unknown;
  try {
    document = yaml.load(raw);
  } catch (error) {
    throw new ConfigError(`Cannot parse pricing config ${path}: ${errorMessage(error)}`);
  }
  return parsePricingConfig(document);
}

// keys come from node labels, so inherited members such as `constructor` must not match
function lookup<T>(table: Record<string, T>, key: string | undefined): T | undefined {
  return key !== undefined && Object.hasOwn(table, key) ? table[key] : undefined;
}

/**
 * Resolve per-unit hourly prices for a node.
 *
 * Instance-type overrides win over defaults per resource type, and every price
 * is scaled by the node's region multiplier (1.0 when the region is unknown).
 * Never throws: gaps in the table lower precision, they never block costing.
 */
export function resolvePrice(node: ClusterNode, pricing: PricingConfig): PerUnitPrices {
  const overrides = lookup(pricing.instanceTypes, node.instanceType);
  const multiplier = lookup(pricing.regionMultipliers, node.region) ?? 1.0;
  const flags: string[] = [];

  const resolve = (type: PricedResource): { price: number; source: PriceSource } => {
    const override = overrides?.[type];
    return override !== undefined
      ? { price: override * multiplier, source: 'instanceType' }
      : { price: pricing.defaults[type] * multiplier, source: 'default' };
  };
  const cpu = resolve('cpu');
  const memory = resolve('memory');
  const storage = resolve('storage');
  const network = resolve('network');
  const prices: ResourcePrices = {
    cpu: cpu.price,
    memory: memory.price,
    storage: storage.price,
    network: network.price
  };
  const sources: Record<PricedResource, PriceSource> = {
    cpu: cpu.source,
    memory: memory.source,
    storage: storage.source,
    network: network.source
  };

  let gpu: GpuPrice | undefined;
  const gpuInfo = node.allocatable?.gpu;
  if (gpuInfo && gpuInfo.count > 0) {
    const model = gpuInfo.model ?? 'unknown';
    const modelPrice = lookup(pricing.defaults.gpuPricing, model);
    if (modelPrice === undefined) {
      gpu = { model, price: 0, known: false };
      flags.push(`node ${node.name}: no price for GPU model "${model}", priced at 0`);
    } else {
      gpu = { model, price: modelPrice * multiplier, known: true };
    }
  }

  return { prices, sources, multiplier, gpu, flags };
}
