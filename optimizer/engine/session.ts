/**
 * Optimization Session
 *
 * Runs N trials of one study against one deployment. The deployment is
 * held for the whole loop and torn down in `finally` unless the caller
 * keeps it.
 */

import type { ParamValue } from '../../src/types/common.js';
import { Logger } from '../../src/utils/logger.js';
import type { ResultStore } from '../services/results/store.js';
import { toError } from './errors.js';
import type { HistoryEntry, SearchDriver } from './search_driver.js';
import type { SpaceResolver } from './space_resolver.js';
import type { TrialBroker, TrialOrchestrator } from './trial_orchestrator.js';

export interface DeploymentLifecycle extends TrialBroker {
  teardown(signal?: AbortSignal): Promise<void>;
}

export interface SessionOptions {
  driver: SearchDriver;
  orchestrator: TrialOrchestrator;
  resolver: SpaceResolver;
  results: ResultStore;
  broker: DeploymentLifecycle;
  trials: number;
  /** Leave the deployment running after the loop */
  noDestroy?: boolean;
  signal?: AbortSignal;
}

export interface BestTrial {
  number: number;
  value: number;
  params: Record<string, ParamValue>;
}

export interface SessionSummary {
  studyId: number;
  seeded: number;
  attempted: number;
  scored: number;
  cacheHits: number;
  pruned: number;
  best: BestTrial | null;
}

export class OptimizationSession {
  constructor(private options: SessionOptions) {}

  async run(): Promise<SessionSummary> {
    const { driver, orchestrator, trials, signal } = this.options;
    const summary: SessionSummary = {
      studyId: driver.study.id,
      seeded: 0,
      attempted: 0,
      scored: 0,
      cacheHits: 0,
      pruned: 0,
      best: null
    };

    Logger.info('🚀 Starting optimization', {
      service: driver.study.service,
      cloud: driver.study.cloud,
      mode: driver.study.mode,
      metric: driver.study.metric,
      trials
    });

    try {
      summary.seeded = await driver.seedHistory(await this.historyEntries());

      for (let i = 0; i < trials; i++) {
        signal?.throwIfAborted();
        summary.attempted++;

        const evaluation = await orchestrator.runTrial(driver, signal);
        switch (evaluation.status) {
          case 'scored':
            summary.scored++;
            break;
          case 'cache_hit':
            summary.cacheHits++;
            break;
          case 'pruned':
            summary.pruned++;
            Logger.warn('Trial pruned', { attempt: i + 1, reason: evaluation.reason });
            break;
        }
      }
    } finally {
      await this.release();
    }

    const best = driver.bestTrial();
    if (best && best.value !== null) {
      summary.best = { number: best.number, value: best.value, params: best.params };
    }

    Logger.info('✅ Optimization finished', {
      attempted: summary.attempted,
      scored: summary.scored,
      cacheHits: summary.cacheHits,
      pruned: summary.pruned,
      best: summary.best?.value
    });
    return summary;
  }

  /**
   * Usable cached results for this cloud that fit the current space
   */
  private async historyEntries(): Promise<HistoryEntry[]> {
    const { driver, orchestrator, resolver, results } = this.options;
    const records = await results.records({ cloud: driver.study.cloud, successfulOnly: true });

    const entries: HistoryEntry[] = [];
    for (const record of records) {
      const value = orchestrator.score(record.metrics, record.infra);
      if (value === null) continue;
      const entry = await resolver.historyEntry(record, value);
      if (entry) {
        entries.push(entry);
      }
    }
    return entries;
  }

  private async release(): Promise<void> {
    const { driver, broker, noDestroy } = this.options;
    try {
      if (noDestroy) {
        Logger.info('Keeping deployment (--no-destroy)', { cloud: driver.study.cloud });
      } else {
        await broker.teardown();
      }
    } catch (error) {
      Logger.error('tear down deployment', error, { cloud: driver.study.cloud });
      throw toError(error);
    } finally {
      try {
        await driver.close();
      } catch (error) {
        Logger.warn('Search oracle did not close cleanly', { study: driver.study.id, error: toError(error).message });
      }
    }
  }
}
