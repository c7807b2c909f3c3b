import type { Utilization } from './types.js';

export interface UtilizationSample {
  timestamp: Date;
  /** Blended cpu/memory utilization ratio of the cluster. */
  utilization: number;
}

export interface CostBand {
  low: number;
  expected: number;
  high: number;
}

export type CostForecast =
  | { status: 'insufficient-history'; samples: number }
  | {
      status: 'ok';
      samples: number;
      horizonDays: number;
      slopePerDay: number;
      projectedUtilization: CostBand;
      monthlyCost: CostBand;
    };

const DAY_MS = 24 * 60 * 60 * 1000;

// minimum band half-width, as a fraction of the projection
const MIN_BAND = 0.1;

export function blendedUtilization(utilization: Utilization): number | undefined {
  const values = [utilization.cpu, utilization.memory].filter((v): v is number => v !== undefined);
  if (values.length === 0) {
    return undefined;
  }
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Linear trend over the sample window projected `horizonDays` past the last
 * sample. The expected monthly cost is the cost of the capacity the projected
 * utilization would occupy; the band widens with the fit's residual error.
 */
export function forecastCost(
  samples: UtilizationSample[],
  monthlyCapacityCost: number,
  horizonDays = 30
): CostForecast {
  if (samples.length < 2) {
    return { status: 'insufficient-history', samples: samples.length };
  }

  const origin = samples[0].timestamp.getTime();
  const xs = samples.map(s => (s.timestamp.getTime() - origin) / DAY_MS);
  const ys = samples.map(s => s.utilization);
  const n = samples.length;
  const meanX = xs.reduce((a, b) => a + b, 0) / n;
  const meanY = ys.reduce((a, b) => a + b, 0) / n;

  let sxx = 0;
  let sxy = 0;
  for (let i = 0; i < n; i++) {
    sxx += (xs[i] - meanX) ** 2;
    sxy += (xs[i] - meanX) * (ys[i] - meanY);
  }
  if (sxx === 0) {
    // every sample shares one timestamp: no trend to extrapolate
    return { status: 'insufficient-history', samples: n };
  }

  const slope = sxy / sxx;
  const intercept = meanY - slope * meanX;
  const residual = Math.sqrt(
    xs.reduce((sum, x, i) => sum + (ys[i] - (intercept + slope * x)) ** 2, 0) / n
  );

  const target = Math.max(...xs) + horizonDays;
  const projected = Math.max(0, intercept + slope * target);
  const halfWidth = Math.max(residual, projected * MIN_BAND);
  const projectedUtilization: CostBand = {
    low: Math.max(0, projected - halfWidth),
    expected: projected,
    high: projected + halfWidth
  };

  return {
    status: 'ok',
    samples: n,
    horizonDays,
    slopePerDay: slope,
    projectedUtilization,
    monthlyCost: {
      low: projectedUtilization.low * monthlyCapacityCost,
      expected: projectedUtilization.expected * monthlyCapacityCost,
      high: projectedUtilization.high * monthlyCapacityCost
    }
  };
}
