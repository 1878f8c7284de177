/**
 * Helpers for parameter distributions as stored in the study database.
 */

import type { Distribution, ParamValue } from '../../../src/types/common.js';
import { canonicalJson } from '../../../src/utils/canonical-json.js';
import { isRecord } from '../../../src/utils/env-config.js';

export function isParamValue(value: unknown): value is ParamValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

export function sameDistribution(a: Distribution, b: Distribution): boolean {
  return canonicalJson(a) === canonicalJson(b);
}

/**
 * Whether `value` could have been drawn from `distribution`
 */
export function contains(distribution: Distribution, value: ParamValue): boolean {
  switch (distribution.type) {
    case 'categorical':
      return distribution.choices.some(choice => choice === value);
    case 'int':
      if (typeof value !== 'number' || !Number.isInteger(value)) return false;
      if (value < distribution.low || value > distribution.high) return false;
      return distribution.step === undefined || (value - distribution.low) % distribution.step === 0;
    case 'float':
      return typeof value === 'number' && value >= distribution.low && value <= distribution.high;
  }
}

function readBound(value: Record<string, unknown>, key: string): number {
  const bound = value[key];
  if (typeof bound !== 'number' || !Number.isFinite(bound)) {
    throw new Error(`distribution.${key} must be a finite number`);
  }
  return bound;
}

/**
 * Decodes a distribution read back from storage.
 */
export function parseDistribution(value: unknown): Distribution {
  if (!isRecord(value)) {
    throw new Error('distribution must be an object');
  }

  if (value.type === 'categorical') {
    const choices = value.choices;
    if (!Array.isArray(choices) || choices.length === 0 || !choices.every(isParamValue)) {
      throw new Error('categorical distribution needs scalar choices');
    }
    return { type: 'categorical', choices };
  }

  if (value.type === 'int' || value.type === 'float') {
    const low = readBound(value, 'low');
    const high = readBound(value, 'high');
    if (low > high) {
      throw new Error(`distribution low ${low} exceeds high ${high}`);
    }
    return {
      type: value.type,
      low,
      high,
      ...(typeof value.step === 'number' && { step: value.step }),
      ...(value.log === true && { log: true })
    };
  }

  throw new Error(`unknown distribution type ${String(value.type)}`);
}

export function parseParams(value: unknown): Record<string, ParamValue> {
  if (!isRecord(value)) {
    throw new Error('params must be an object');
  }
  const params: Record<string, ParamValue> = {};
  for (const [name, item] of Object.entries(value)) {
    if (!isParamValue(item)) {
      throw new Error(`param ${name} must be a scalar`);
    }
    params[name] = item;
  }
  return params;
}

export function parseDistributions(value: unknown): Record<string, Distribution> {
  if (!isRecord(value)) {
    throw new Error('distributions must be an object');
  }
  const out: Record<string, Distribution> = {};
  for (const [name, item] of Object.entries(value)) {
    out[name] = parseDistribution(item);
  }
  return out;
}

export function describeDistribution(distribution: Distribution): string {
  switch (distribution.type) {
    case 'categorical':
      return `{${distribution.choices.join(', ')}}`;
    case 'int':
    case 'float':
      return `${distribution.type}[${distribution.low}, ${distribution.high}]`;
  }
}
