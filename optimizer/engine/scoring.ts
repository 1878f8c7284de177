/**
 * Metric lookup and derived values shared by the orchestrator and reports
 */

import type { Direction, InfraConfig, MetricDefinition } from '../../src/types/common.js';
import type { CloudProfile } from '../services/pricing/clouds.js';
import { monthlyCost, resourcesOf } from '../services/pricing/pricing.js';
import type { ServiceTarget } from '../targets/types.js';
import { InvalidParameterSpaceError } from './errors.js';

export const COST_EFFICIENCY = 'cost_efficiency';

export function findMetric(target: ServiceTarget, name: string): MetricDefinition {
  const metric = target.metrics.find(m => m.name === name);
  if (!metric) {
    throw new InvalidParameterSpaceError(
      `Unknown metric ${name} for ${target.name} (available: ${target.metrics.map(m => m.name).join(', ')})`
    );
  }
  return metric;
}

/**
 * Value of `name` for a result: measured, or derived from the primary
 * metric and monthly cost for `cost_efficiency`. null when unavailable.
 */
export function scoreMetric(
  target: ServiceTarget,
  profile: CloudProfile,
  name: string,
  metrics: Readonly<Record<string, number>>,
  infra: InfraConfig
): number | null {
  if (name === COST_EFFICIENCY) {
    const primary = metrics[target.primaryMetric];
    const cost = monthlyCost(profile, resourcesOf(profile, infra));
    return primary !== undefined && cost > 0 ? primary / cost : null;
  }
  const value = metrics[name];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function isBetter(direction: Direction, candidate: number, incumbent: number): boolean {
  return direction === 'maximize' ? candidate > incumbent : candidate < incumbent;
}
