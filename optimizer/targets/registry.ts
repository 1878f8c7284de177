/**
 * Target Registry
 * Looks up service targets by name and checks each declaration once
 */

import { INFRA_FIELDS } from '../../src/types/common.js';
import type { InfraField } from '../../src/types/common.js';
import { InvalidParameterSpaceError } from '../engine/errors.js';
import { meilisearchTarget } from './meilisearch.js';
import { minioTarget } from './minio.js';
import { postgresTarget } from './postgres.js';
import { redisTarget } from './redis.js';
import type { ServiceTarget } from './types.js';

export interface TargetRegistry {
  /**
   * @throws InvalidParameterSpaceError for unknown names
   */
  get(name: string): ServiceTarget;
  has(name: string): boolean;
  list(): ServiceTarget[];
}

function isInfraField(name: string): name is InfraField {
  return INFRA_FIELDS.some(field => field === name);
}

/**
 * Problems with a target declaration, empty when it is sound
 */
export function checkTarget(target: ServiceTarget): string[] {
  const problems: string[] = [];
  const metricNames = new Set(target.metrics.map(metric => metric.name));

  for (const param of target.configSpace) {
    if (isInfraField(param.name)) {
      problems.push(`config parameter ${param.name} collides with an infrastructure field`);
    }
    if (param.distribution.type === 'categorical' && param.distribution.choices.length === 0) {
      problems.push(`config parameter ${param.name} has no choices`);
    }
  }

  const configNames = target.configSpace.map(param => param.name);
  const duplicate = configNames.find((name, index) => configNames.indexOf(name) !== index);
  if (duplicate !== undefined) {
    problems.push(`config parameter ${duplicate} is declared twice`);
  }

  for (const name of [target.primaryMetric, target.defaultMetric, 'cost_efficiency']) {
    if (!metricNames.has(name)) {
      problems.push(`metric ${name} is not declared`);
    }
  }

  if (target.infraSpace.cpu.length === 0 || target.infraSpace.ram_gb.length === 0) {
    problems.push('infrastructure space needs cpu and ram_gb choices');
  }

  return problems;
}

export class DefaultTargetRegistry implements TargetRegistry {
  private targets = new Map<string, ServiceTarget>();

  constructor(targets: ServiceTarget[]) {
    for (const target of targets) {
      const problems = checkTarget(target);
      if (problems.length > 0) {
        throw new InvalidParameterSpaceError(`Target ${target.name} is invalid: ${problems.join('; ')}`);
      }
      this.targets.set(target.name, target);
    }
  }

  get(name: string): ServiceTarget {
    const target = this.targets.get(name);
    if (!target) {
      throw new InvalidParameterSpaceError(
        `Unknown service: ${name} (available: ${[...this.targets.keys()].join(', ')})`
      );
    }
    return target;
  }

  has(name: string): boolean {
    return this.targets.has(name);
  }

  list(): ServiceTarget[] {
    return [...this.targets.values()];
  }
}

let defaultRegistry: TargetRegistry | null = null;

export function getTargetRegistry(): TargetRegistry {
  if (!defaultRegistry) {
    defaultRegistry = new DefaultTargetRegistry([redisTarget, postgresTarget, minioTarget, meilisearchTarget]);
  }
  return defaultRegistry;
}

export function getTarget(name: string): ServiceTarget {
  return getTargetRegistry().get(name);
}

export function listTargets(): ServiceTarget[] {
  return getTargetRegistry().list();
}
