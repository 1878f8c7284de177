/**
 * Contract between the search driver and a suggestion strategy.
 *
 * The oracle keeps its own model of the search history. The driver owns the
 * persistent record and replays it through `open` on every run.
 */

import type { Direction, Distribution, ParamValue } from '../../../src/types/common.js';

export interface CompletedTrial {
  params: Record<string, ParamValue>;
  distributions: Record<string, Distribution>;
  value: number;
}

export type TrialOutcome =
  | { state: 'complete'; value: number }
  | { state: 'pruned'; reason: string }
  | { state: 'fail'; reason: string };

export interface SearchOracle {
  readonly name: string;

  /** Starts a session and replays completed history */
  open(direction: Direction, history: CompletedTrial[]): Promise<void>;

  /** Draws one parameter value for a trial */
  suggest(trialNumber: number, name: string, distribution: Distribution): Promise<ParamValue>;

  report(trialNumber: number, outcome: TrialOutcome): Promise<void>;

  /** Adds an externally observed trial (warm start) */
  learn(trial: CompletedTrial): Promise<void>;

  close(): Promise<void>;
}
