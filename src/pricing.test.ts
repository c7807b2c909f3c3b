import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from './errors.js';
import { DEFAULT_PRICING, loadPricingConfig, parsePricingConfig, resolvePrice } from './pricing.js';
import { makeNode } from './test/fixtures.js';
import { GIB } from './quantity.js';
import type { PricingConfig } from './types.js';

const pricing: PricingConfig = {
  defaults: { cpu: 0.04, memory: 0.005, storage: 0.0002, network: 0.01, gpuPricing: { 'nvidia-tesla-t4': 0.5 } },
  instanceTypes: { 'm5.large': { cpu: 0.05, memory: 0.006 } },
  regionMultipliers: { 'eu-west-1': 2 }
};

describe('resolvePrice', () => {
  it('returns defaults unmultiplied for an unlisted instance type and region', () => {
    const onlyDefaults = parsePricingConfig({
      defaults: { cpu: 0.04, memory: 0.005, storage: 0.0002, network: 0.01 }
    });
    const resolved = resolvePrice(makeNode({ instanceType: 'x9.huge', region: 'mars-1' }), onlyDefaults);

    expect(resolved.multiplier).toBe(1);
    expect(resolved.prices).toEqual({ cpu: 0.04, memory: 0.005, storage: 0.0002, network: 0.01 });
    expect(resolved.sources).toEqual({ cpu: 'default', memory: 'default', storage: 'default', network: 'default' });
    expect(resolved.flags).toEqual([]);
  });

  it('prefers instance type overrides per resource and falls back to defaults for the rest', () => {
    const resolved = resolvePrice(makeNode({ instanceType: 'm5.large' }), pricing);

    expect(resolved.prices).toEqual({ cpu: 0.05, memory: 0.006, storage: 0.0002, network: 0.01 });
    expect(resolved.sources).toEqual({
      cpu: 'instanceType',
      memory: 'instanceType',
      storage: 'default',
      network: 'default'
    });
  });

  it('applies the region multiplier to every resource', () => {
    const resolved = resolvePrice(makeNode({ instanceType: 'm5.large', region: 'eu-west-1' }), pricing);

    expect(resolved.multiplier).toBe(2);
    expect(resolved.prices).toEqual({ cpu: 0.1, memory: 0.012, storage: 0.0004, network: 0.02 });
  });

  it('prices known GPU models with the region multiplier', () => {
    const node = makeNode({
      region: 'eu-west-1',
      allocatable: {
        cpuMillicores: 8000,
        memoryBytes: 32 * GIB,
        storageBytes: 0,
        gpu: { count: 1, model: 'nvidia-tesla-t4' }
      }
    });

    expect(resolvePrice(node, pricing).gpu).toEqual({ model: 'nvidia-tesla-t4', price: 1, known: true });
  });

  it('prices unknown GPU models at zero and flags them', () => {
    const node = makeNode({
      name: 'gpu-1',
      allocatable: { cpuMillicores: 8000, memoryBytes: 32 * GIB, storageBytes: 0, gpu: { count: 2, model: 'h100' } }
    });
    const resolved = resolvePrice(node, pricing);

    expect(resolved.gpu).toEqual({ model: 'h100', price: 0, known: false });
    expect(resolved.flags).toEqual(['node gpu-1: no price for GPU model "h100", priced at 0']);
  });

  it('ignores labels that name inherited object members', () => {
    const node = makeNode({
      instanceType: 'constructor',
      region: 'constructor',
      allocatable: { cpuMillicores: 8000, memoryBytes: 32 * GIB, storageBytes: 0, gpu: { count: 1, model: 'toString' } }
    });
    const resolved = resolvePrice(node, pricing);

    expect(resolved.multiplier).toBe(1);
    expect(resolved.prices).toEqual({ cpu: 0.04, memory: 0.005, storage: 0.0002, network: 0.01 });
    expect(resolved.sources).toEqual({ cpu: 'default', memory: 'default', storage: 'default', network: 'default' });
    expect(resolved.gpu).toEqual({ model: 'toString', price: 0, known: false });
  });

  it('leaves gpu undefined on nodes without GPUs', () => {
    expect(resolvePrice(makeNode(), DEFAULT_PRICING).gpu).toBeUndefined();
  });
});

describe('parsePricingConfig', () => {
  it('fills optional sections with empty tables', () => {
    const parsed = parsePricingConfig({ defaults: { cpu: 1, memory: 1, storage: 1, network: 1 } });

    expect(parsed.instanceTypes).toEqual({});
    expect(parsed.regionMultipliers).toEqual({});
    expect(parsed.defaults.gpuPricing).toEqual({});
  });

  it('rejects negative prices with the offending path', () => {
    expect(() => parsePricingConfig({ defaults: { cpu: -1, memory: 1, storage: 1, network: 1 } })).toThrow(
      /defaults\.cpu/
    );
  });

  it('rejects a document without defaults', () => {
    expect(() => parsePricingConfig({ instanceTypes: {} })).toThrow(ConfigError);
  });
});

describe('loadPricingConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pricing-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a YAML document', async () => {
    const path = join(dir, 'pricing.yaml');
    await writeFile(
      path,
      [
        'defaults:',
        '  cpu: 0.04',
        '  memory: 0.005',
        '  storage: 0.0002',
        '  network: 0.01',
        'instanceTypes:',
        '  m5.large:',
        '    cpu: 0.05',
        'regionMultipliers:',
        '  us-east-1: 1.1'
      ].join('\n')
    );

    const loaded = await loadPricingConfig(path);

    expect(loaded.instanceTypes).toEqual({ 'm5.large': { cpu: 0.05 } });
    expect(loaded.regionMultipliers).toEqual({ 'us-east-1': 1.1 });
  });

  it('accepts the sample pricing document', async () => {
    const loaded = await loadPricingConfig(fileURLToPath(new URL('../config/pricing.yaml', import.meta.url)));
    const resolved = resolvePrice(makeNode({ instanceType: 'm5.large', region: 'eu-west-1' }), loaded);

    expect(resolved.prices.cpu).toBeCloseTo(0.048 * 1.08, 10);
    expect(resolved.sources.storage).toBe('default');
  });

  it('fails with a ConfigError when the file is missing', async () => {
    await expect(loadPricingConfig(join(dir, 'missing.yaml'))).rejects.toThrow(ConfigError);
  });
});
