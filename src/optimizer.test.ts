import { describe, expect, it } from 'vitest';
import { CostAggregator } from './cost.js';
import { silentLogger } from './logger.js';
import { DEFAULT_OPTIMIZER_OPTIONS, ResourceOptimizer, UsageWindow } from './optimizer.js';
import { parsePricingConfig } from './pricing.js';
import { GIB } from './quantity.js';
import { makeNode, makePod, makeSnapshot } from './test/fixtures.js';
import { available, type ClusterSnapshot, type CostReport } from './types.js';

const MIB = 1024 ** 2;

// every fixture node costs 0.27/h, 194.4/month
const aggregator = new CostAggregator(
  parsePricingConfig({ defaults: { cpu: 0.04, memory: 0.005, storage: 0.0002, network: 0.01 } }),
  silentLogger
);
const optimizer = new ResourceOptimizer(DEFAULT_OPTIMIZER_OPTIONS, silentLogger);

function costsFor(overrides: Partial<ClusterSnapshot>): Promise<CostReport> {
  return aggregator.computeCosts(makeSnapshot(overrides));
}

// the same usage observed on two consecutive cycles
function steady(costs: CostReport): UsageWindow {
  return UsageWindow.empty(24).with(costs).with(costs);
}

function nodeAt(utilization: number): Promise<CostReport> {
  return costsFor({
    pods: available([]),
    nodeMetrics: available([
      { name: 'node-a', usage: { cpuMillicores: 4000 * utilization, memoryBytes: 16 * GIB * utilization } }
    ])
  });
}

const busy = { name: 'node-busy', usage: { cpuMillicores: 2000, memoryBytes: 8 * GIB } };

describe('ResourceOptimizer', () => {
  it('recommends removing an idle node', async () => {
    const costs = await costsFor({
      nodes: available([makeNode({ name: 'node-idle' }), makeNode({ name: 'node-busy' })]),
      pods: available([]),
      nodeMetrics: available([{ name: 'node-idle', usage: { cpuMillicores: 100, memoryBytes: GIB / 2 } }, busy])
    });

    const report = optimizer.generateReport(costs, steady(costs));

    expect(report.recommendations).toHaveLength(1);
    expect(report.recommendations[0]).toMatchObject({
      type: 'idle-node',
      resource: 'Node',
      name: 'node-idle',
      projectedMonthlyCost: 0
    });
    expect(report.recommendations[0].potentialSaving).toBeCloseTo(194.4, 8);
    expect(report.potentialSavings).toBeCloseTo(194.4, 8);
  });

  it('rightsizes an underused node to observed usage plus headroom', async () => {
    const costs = await costsFor({
      pods: available([]),
      nodeMetrics: available([{ name: 'node-a', usage: { cpuMillicores: 800, memoryBytes: 3.2 * GIB } }])
    });

    const [rec] = optimizer.generateReport(costs, steady(costs)).recommendations;

    // 0.96 cores and 3.84 GiB, plus unchanged storage and network
    expect(rec.type).toBe('rightsize-node');
    expect(rec.projectedMonthlyCost).toBeCloseTo(63.072, 8);
    expect(rec.potentialSaving).toBeCloseTo(131.328, 8);
  });

  it('leaves well utilized nodes and nodes without metrics alone', async () => {
    const costs = await costsFor({
      nodes: available([makeNode({ name: 'node-busy' }), makeNode({ name: 'node-dark' })]),
      pods: available([]),
      nodeMetrics: available([busy])
    });

    expect(optimizer.generateReport(costs, steady(costs))).toEqual({ potentialSavings: 0, recommendations: [] });
  });

  it('rightsizes and removes pods, largest saving first', async () => {
    const requests = { cpuMillicores: 1000, memoryBytes: 2000 * MIB };
    const costs = await costsFor({
      nodes: available([makeNode({ name: 'node-busy' })]),
      pods: available([
        makePod({ name: 'api', nodeName: 'node-busy', requests }),
        makePod({ name: 'worker', nodeName: 'node-busy', requests })
      ]),
      nodeMetrics: available([busy]),
      podMetrics: available([
        { namespace: 'default', name: 'api', usage: { cpuMillicores: 200, memoryBytes: 400 * MIB } },
        { namespace: 'default', name: 'worker', usage: { cpuMillicores: 10, memoryBytes: 10 * MIB } }
      ])
    });

    const report = optimizer.generateReport(costs, steady(costs));

    expect(report.recommendations.map(r => [r.type, r.name])).toEqual([
      ['idle-pod', 'worker'],
      ['rightsize-pod', 'api']
    ]);
    expect(report.recommendations[0].potentialSaving).toBeCloseTo(97.2, 8);
    expect(report.recommendations[1].potentialSaving).toBeCloseTo(65.664, 8);
    expect(report.recommendations[1].description).toMatch(/^Pod default\/api uses 20\.0% CPU \/ 20\.0% memory of its requests at peak/);
    expect(report.potentialSavings).toBeCloseTo(162.864, 8);
  });

  it('does not count pod savings twice on a node already flagged', async () => {
    const costs = await costsFor({
      nodes: available([makeNode({ name: 'node-idle' })]),
      pods: available([
        makePod({ name: 'sleepy', nodeName: 'node-idle', requests: { cpuMillicores: 1000, memoryBytes: 2000 * MIB } })
      ]),
      nodeMetrics: available([{ name: 'node-idle', usage: { cpuMillicores: 100, memoryBytes: GIB / 2 } }]),
      podMetrics: available([
        { namespace: 'default', name: 'sleepy', usage: { cpuMillicores: 10, memoryBytes: 10 * MIB } }
      ])
    });

    const report = optimizer.generateReport(costs, steady(costs));

    expect(report.recommendations.map(r => r.type)).toEqual(['idle-node', 'idle-pod']);
    expect(report.potentialSavings).toBeCloseTo(194.4, 8);
  });

  it('judges nothing until a resource has two samples', async () => {
    const costs = await nodeAt(0.01);

    expect(optimizer.generateReport(costs, UsageWindow.empty(24).with(costs)).recommendations).toEqual([]);
  });

  it('keeps a node that was busy earlier in the window', async () => {
    const [high, dip] = await Promise.all([nodeAt(0.7), nodeAt(0.01)]);
    const window = UsageWindow.empty(24).with(high).with(high).with(dip);

    expect(optimizer.generateReport(dip, window)).toEqual({ potentialSavings: 0, recommendations: [] });
  });

  it('rightsizes to the peak of the window, not the latest sample', async () => {
    const [earlier, latest] = await Promise.all([nodeAt(0.2), nodeAt(0.01)]);

    const [rec] = optimizer.generateReport(latest, UsageWindow.empty(24).with(earlier).with(latest)).recommendations;

    // 0.96 cores and 3.84 GiB, plus unchanged storage and network
    expect(rec.type).toBe('rightsize-node');
    expect(rec.projectedMonthlyCost).toBeCloseTo(63.072, 8);
    expect(rec.description).toMatch(/^Node node-a peaks at 20\.0% CPU \/ 20\.0% memory/);
  });

  it('forgets samples that fell out of the window', async () => {
    const [high, dip] = await Promise.all([nodeAt(0.7), nodeAt(0.01)]);
    const window = UsageWindow.empty(2).with(high).with(dip).with(dip);

    expect(optimizer.generateReport(dip, window).recommendations.map(r => [r.type, r.name])).toEqual([
      ['idle-node', 'node-a']
    ]);
  });

  it('starts over for a node that missed a report', async () => {
    const [dip, dark] = await Promise.all([
      nodeAt(0.01),
      costsFor({ pods: available([]), nodeMetrics: available([]) })
    ]);
    const window = UsageWindow.empty(24).with(dip).with(dark).with(dip);

    expect(optimizer.generateReport(dip, window).recommendations).toEqual([]);
  });
});
