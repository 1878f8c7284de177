/**
 * Deterministic random sampler.
 *
 * Each value is derived from sha256(seed:trial:name), so a resumed study
 * draws the same values for the same trial numbers. Used in tests and when
 * no Python runtime is available.
 */

import { createHash } from 'crypto';
import type { Direction, Distribution, ParamValue } from '../../../src/types/common.js';
import type { CompletedTrial, SearchOracle, TrialOutcome } from './types.js';

export class RandomOracle implements SearchOracle {
  readonly name = 'random';

  constructor(private seed = 42) {}

  async open(_direction: Direction, _history: CompletedTrial[]): Promise<void> {
    // draws ignore history
  }

  async suggest(trialNumber: number, name: string, distribution: Distribution): Promise<ParamValue> {
    return sampleFrom(distribution, this.uniform(trialNumber, name));
  }

  async report(_trialNumber: number, _outcome: TrialOutcome): Promise<void> {
    // stateless between trials
  }

  async learn(_trial: CompletedTrial): Promise<void> {
    // draws ignore history
  }

  async close(): Promise<void> {
    // nothing to release
  }

  private uniform(trialNumber: number, name: string): number {
    const digest = createHash('sha256').update(`${this.seed}:${trialNumber}:${name}`).digest();
    // 48 bits keep the result exact in a double
    return digest.readUIntBE(0, 6) / 2 ** 48;
  }
}

/**
 * Maps u in [0, 1) onto a distribution
 */
export function sampleFrom(distribution: Distribution, u: number): ParamValue {
  switch (distribution.type) {
    case 'categorical': {
      const index = Math.min(Math.floor(u * distribution.choices.length), distribution.choices.length - 1);
      return distribution.choices[index];
    }
    case 'int': {
      const step = distribution.step ?? 1;
      if (distribution.log) {
        const value = Math.exp(Math.log(distribution.low) + u * (Math.log(distribution.high) - Math.log(distribution.low)));
        return Math.min(distribution.high, Math.max(distribution.low, Math.round(value)));
      }
      const slots = Math.floor((distribution.high - distribution.low) / step) + 1;
      return distribution.low + Math.min(Math.floor(u * slots), slots - 1) * step;
    }
    case 'float': {
      if (distribution.log) {
        return Math.exp(Math.log(distribution.low) + u * (Math.log(distribution.high) - Math.log(distribution.low)));
      }
      const value = distribution.low + u * (distribution.high - distribution.low);
      if (distribution.step !== undefined) {
        const snapped = distribution.low + Math.round((value - distribution.low) / distribution.step) * distribution.step;
        return Math.min(distribution.high, snapped);
      }
      return value;
    }
  }
}
