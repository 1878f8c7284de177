/**
 * Search Driver
 *
 * Wraps a SearchOracle with the persistent study: create-or-resume, the
 * distribution registry, trial bookkeeping and warm starts. Errors raised
 * here are fatal to the study.
 */

import type { Direction, Distribution, ParamValue } from '../../src/types/common.js';
import { Logger } from '../../src/utils/logger.js';
import { InvalidParameterSpaceError, OptimizerError, StudyStorageError, toError } from './errors.js';
import type { CompletedTrial, SearchOracle, TrialOutcome } from './oracles/types.js';
import { contains, describeDistribution, sameDistribution } from '../services/study/distributions.js';
import type { StoredTrial, StudyIdentity, StudyRecord, StudyStore } from '../services/study/store.js';

export interface HistoryEntry extends CompletedTrial {
  cacheKey: string;
}

/**
 * Name under which a parameter whose value set depends on a sibling is
 * registered, e.g. `ram_gb_cpu16`. One name per parent value keeps every
 * registered value set stable across trials.
 */
export function dependentName(name: string, parent: string, parentValue: ParamValue): string {
  return `${name}_${parent}${String(parentValue)}`;
}

export class TrialHandle {
  readonly params: Record<string, ParamValue> = {};
  readonly distributions: Record<string, Distribution> = {};

  constructor(readonly number: number, private driver: SearchDriver) {}

  async suggestCategorical<T extends ParamValue>(name: string, choices: readonly T[]): Promise<T> {
    if (choices.length === 0) {
      throw new InvalidParameterSpaceError(`Parameter ${name} has no valid choices`);
    }
    const value = await this.suggest(name, { type: 'categorical', choices: [...choices] });
    const match = choices.find(choice => choice === value);
    if (match === undefined) {
      throw new StudyStorageError(`Oracle returned ${String(value)} for ${name}, not one of the offered choices`);
    }
    return match;
  }

  async suggestInt(name: string, low: number, high: number, options: { step?: number; log?: boolean } = {}): Promise<number> {
    const value = await this.suggest(name, { type: 'int', low, high, ...options });
    if (typeof value !== 'number') {
      throw new StudyStorageError(`Oracle returned a non-numeric value for ${name}`);
    }
    return value;
  }

  async suggestFloat(name: string, low: number, high: number, options: { step?: number; log?: boolean } = {}): Promise<number> {
    const value = await this.suggest(name, { type: 'float', low, high, ...options });
    if (typeof value !== 'number') {
      throw new StudyStorageError(`Oracle returned a non-numeric value for ${name}`);
    }
    return value;
  }

  /**
   * Categorical parameter whose choices depend on `parent` in the same trial
   */
  suggestDependent<T extends ParamValue>(
    name: string,
    parent: string,
    parentValue: ParamValue,
    choices: readonly T[]
  ): Promise<T> {
    return this.suggestCategorical(dependentName(name, parent, parentValue), choices);
  }

  async suggest(name: string, distribution: Distribution): Promise<ParamValue> {
    if (name in this.params) {
      return this.params[name];
    }
    const value = await this.driver.draw(this.number, name, distribution);
    this.params[name] = value;
    this.distributions[name] = distribution;
    return value;
  }
}

export class SearchDriver {
  private registered: Record<string, Distribution>;

  private constructor(
    private store: StudyStore,
    private oracle: SearchOracle,
    readonly study: StudyRecord
  ) {
    this.registered = store.getDistributions(study.id);
  }

  /**
   * Creates or resumes the study and replays its completed trials into the oracle
   */
  static async open(
    store: StudyStore,
    oracle: SearchOracle,
    identity: StudyIdentity,
    direction: Direction
  ): Promise<SearchDriver> {
    const study = store.openStudy(identity, direction);

    const stale = store.failStaleTrials(study.id);
    if (stale > 0) {
      Logger.warn('Marked interrupted trials as failed', { study: study.id, trials: stale });
    }

    const history = store.getTrials(study.id, 'complete').flatMap(trial =>
      trial.value === null ? [] : [{ params: trial.params, distributions: trial.distributions, value: trial.value }]
    );

    try {
      await SearchDriver.wrap('open oracle', () => oracle.open(direction, history));
    } catch (error) {
      await SearchDriver.discard(oracle);
      throw error;
    }
    Logger.info('📊 Study ready', {
      study: study.id,
      name: study.name,
      sampler: oracle.name,
      direction,
      completed: history.length
    });

    return new SearchDriver(store, oracle, study);
  }

  get direction(): Direction {
    return this.study.direction;
  }

  async ask(): Promise<TrialHandle> {
    return new TrialHandle(this.store.createTrial(this.study.id), this);
  }

  /**
   * Registers the distribution, asks the oracle and checks the answer
   */
  async draw(trialNumber: number, name: string, distribution: Distribution): Promise<ParamValue> {
    this.register(name, distribution);

    const value = await SearchDriver.wrap('suggest', () => this.oracle.suggest(trialNumber, name, distribution));
    if (!contains(distribution, value)) {
      throw new StudyStorageError(
        `Oracle suggested ${String(value)} for ${name} outside ${describeDistribution(distribution)}`
      );
    }
    return value;
  }

  async tell(handle: TrialHandle, outcome: TrialOutcome, cacheKey?: string): Promise<void> {
    this.store.finishTrial(this.study.id, handle.number, {
      state: outcome.state,
      value: outcome.state === 'complete' ? outcome.value : null,
      params: handle.params,
      distributions: handle.distributions,
      cacheKey: cacheKey ?? null,
      note: outcome.state === 'complete' ? null : outcome.reason
    });
    await SearchDriver.wrap('report', () => this.oracle.report(handle.number, outcome));
  }

  /**
   * Adds results observed outside this study, skipping ones it already has
   *
   * @returns number of entries added
   */
  async seedHistory(entries: HistoryEntry[]): Promise<number> {
    let added = 0;
    for (const entry of entries) {
      if (this.store.hasCacheKey(this.study.id, entry.cacheKey)) {
        continue;
      }
      for (const [name, distribution] of Object.entries(entry.distributions)) {
        this.register(name, distribution);
      }

      const number = this.store.createTrial(this.study.id);
      this.store.finishTrial(this.study.id, number, {
        state: 'complete',
        value: entry.value,
        params: entry.params,
        distributions: entry.distributions,
        cacheKey: entry.cacheKey,
        note: 'history'
      });
      await SearchDriver.wrap('learn', () =>
        this.oracle.learn({ params: entry.params, distributions: entry.distributions, value: entry.value })
      );
      added++;
    }

    if (added > 0) {
      Logger.info('Warm-started study from cached results', { study: this.study.id, trials: added });
    }
    return added;
  }

  trials(): StoredTrial[] {
    return this.store.getTrials(this.study.id);
  }

  bestTrial(): StoredTrial | null {
    let best: StoredTrial | null = null;
    for (const trial of this.store.getTrials(this.study.id, 'complete')) {
      if (trial.value === null) continue;
      if (
        best === null || best.value === null ||
        (this.direction === 'maximize' ? trial.value > best.value : trial.value < best.value)
      ) {
        best = trial;
      }
    }
    return best;
  }

  async close(): Promise<void> {
    await SearchDriver.wrap('close oracle', () => this.oracle.close());
  }

  /**
   * Stores the distribution on first use; later uses with the same
   * distribution skip the database
   */
  private register(name: string, distribution: Distribution): void {
    const known = this.registered[name];
    if (known && sameDistribution(known, distribution)) {
      return;
    }
    this.store.registerDistribution(this.study.id, name, distribution);
    this.registered[name] = distribution;
  }

  private static async discard(oracle: SearchOracle): Promise<void> {
    try {
      await oracle.close();
    } catch (error) {
      Logger.warn('Search oracle did not close after a failed start', { error: toError(error).message });
    }
  }

  private static async wrap<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof OptimizerError) {
        throw error;
      }
      throw new StudyStorageError(`Oracle failed to ${operation}: ${toError(error).message}`, toError(error));
    }
  }
}
