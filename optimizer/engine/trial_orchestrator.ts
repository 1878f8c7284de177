/**
 * Trial Orchestrator
 *
 * One trial end to end: resolve the suggestion, consult the result cache,
 * provision on a miss, benchmark, persist and score. Prunable failures
 * become pruned outcomes; everything else propagates.
 */

import type {
  Endpoints,
  InfraConfig,
  MetricDefinition,
  OptimizationMode,
  PhaseTimings,
  TrialResult,
  TrialSpec,
  WorkloadSpec
} from '../../src/types/common.js';
import { Logger } from '../../src/utils/logger.js';
import type { CloudProfile } from '../services/pricing/clouds.js';
import { cacheKey } from '../services/results/store.js';
import type { ResultStore } from '../services/results/store.js';
import type { ServiceTarget } from '../targets/types.js';
import { isPrunable } from './errors.js';
import type { TrialOutcome } from './oracles/types.js';
import { findMetric, scoreMetric } from './scoring.js';
import type { SearchDriver } from './search_driver.js';
import type { SpaceResolver } from './space_resolver.js';
import { failedResult, withTimings } from './trial_result.js';

export interface TrialBroker {
  ensure(infra: InfraConfig, signal?: AbortSignal): Promise<{ endpoints: Endpoints; timings: PhaseTimings }>;
}

export interface TrialRunner {
  run(endpoints: Endpoints, trial: TrialSpec, workload: WorkloadSpec, signal?: AbortSignal): Promise<TrialResult>;
}

export interface OrchestratorOptions {
  target: ServiceTarget;
  profile: CloudProfile;
  mode: OptimizationMode;
  metric: string;
  resolver: SpaceResolver;
  results: ResultStore;
  broker: TrialBroker;
  executor: TrialRunner;
  workload: WorkloadSpec;
  login?: string;
  now?: () => number;
}

export type TrialStatus = 'cache_hit' | 'scored' | 'pruned';

export interface TrialEvaluation {
  status: TrialStatus;
  spec: TrialSpec;
  key: string;
  /** Requested metric, null when pruned */
  value: number | null;
  result: TrialResult;
  reason?: string;
}

export interface EvaluateOptions {
  trial?: number;
  signal?: AbortSignal;
}

export function outcomeOf(evaluation: TrialEvaluation): TrialOutcome {
  return evaluation.value === null
    ? { state: 'pruned', reason: evaluation.reason ?? 'no value' }
    : { state: 'complete', value: evaluation.value };
}

export class TrialOrchestrator {
  readonly metric: MetricDefinition;
  private now: () => number;

  constructor(private options: OrchestratorOptions) {
    this.metric = findMetric(options.target, options.metric);
    this.now = options.now ?? Date.now;
  }

  /**
   * Asks the driver for a trial, evaluates it and reports the outcome.
   * A trial interrupted by a fatal error is recorded as failed first.
   */
  async runTrial(driver: SearchDriver, signal?: AbortSignal): Promise<TrialEvaluation> {
    const handle = await driver.ask();

    let evaluation: TrialEvaluation;
    try {
      const spec = await this.options.resolver.resolve(handle);
      evaluation = await this.evaluate(spec, { trial: handle.number, signal });
    } catch (error) {
      await driver.tell(handle, {
        state: 'fail',
        reason: error instanceof Error ? error.message : String(error)
      });
      throw error;
    }

    await driver.tell(handle, outcomeOf(evaluation), evaluation.key);
    return evaluation;
  }

  async evaluate(spec: TrialSpec, options: EvaluateOptions = {}): Promise<TrialEvaluation> {
    const key = cacheKey(spec);

    const cached = await this.options.results.lookup(key);
    if (cached) {
      const value = this.score(cached.metrics, spec.infra);
      Logger.info('Cache hit', { trial: options.trial, metric: this.metric.name, value });
      const result: TrialResult = { metrics: cached.metrics, timings: cached.timings, error: null };
      return value === null
        ? { status: 'pruned', spec, key, value, result, reason: `${this.metric.name} missing from cached result` }
        : { status: 'cache_hit', spec, key, value, result };
    }

    const started = this.now();
    const result = await this.execute(spec, options.signal);
    const total = withTimings(result, { trial_total_s: Math.round(this.now() - started) / 1000 });

    await this.options.results.append(spec, total, {
      mode: this.options.mode,
      ...(options.trial !== undefined && { trial: options.trial }),
      ...(this.options.login ? { login: this.options.login } : {})
    });

    if (total.error) {
      const reason = `${total.error.kind}: ${total.error.message}`;
      Logger.info('Trial pruned', { trial: options.trial, reason });
      return { status: 'pruned', spec, key, value: null, result: total, reason };
    }

    const value = this.score(total.metrics, spec.infra);
    if (value === null) {
      return {
        status: 'pruned',
        spec,
        key,
        value,
        result: total,
        reason: `${this.metric.name} missing from benchmark result`
      };
    }

    Logger.info('📊 Trial scored', {
      trial: options.trial,
      metric: this.metric.name,
      value,
      primary: total.metrics[this.options.target.primaryMetric]
    });
    return { status: 'scored', spec, key, value, result: total };
  }

  score(metrics: Readonly<Record<string, number>>, infra: InfraConfig): number | null {
    return scoreMetric(this.options.target, this.options.profile, this.metric.name, metrics, infra);
  }

  private async execute(spec: TrialSpec, signal?: AbortSignal): Promise<TrialResult> {
    let deployment: { endpoints: Endpoints; timings: PhaseTimings };
    try {
      deployment = await this.options.broker.ensure({ ...spec.infra }, signal);
    } catch (error) {
      if (signal?.aborted || !isPrunable(error)) {
        throw error;
      }
      return failedResult(error);
    }

    const result = await this.options.executor.run(deployment.endpoints, spec, this.options.workload, signal);
    return withTimings(result, deployment.timings);
  }
}
