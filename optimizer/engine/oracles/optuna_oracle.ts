/**
 * TPE oracle backed by Optuna through a long-lived Python bridge.
 *
 * The bridge holds an in-memory Optuna study. It is rebuilt from the study
 * store on every run, so the SQLite database stays the only durable state.
 * Messages are JSON lines: one request, one response, strictly in order.
 */

import { PythonShell } from 'python-shell';
import * as fs from 'fs';
import type { Direction, Distribution, ParamValue } from '../../../src/types/common.js';
import { isRecord } from '../../../src/utils/env-config.js';
import { Logger } from '../../../src/utils/logger.js';
import { StudyStorageError } from '../errors.js';
import { isParamValue } from '../../services/study/distributions.js';
import type { CompletedTrial, SearchOracle, TrialOutcome } from './types.js';

export type BridgeRequest =
  | { op: 'create'; direction: Direction; seed: number }
  | { op: 'add_trial'; params: Record<string, ParamValue>; distributions: Record<string, Distribution>; value: number }
  | { op: 'suggest'; trial: number; name: string; distribution: Distribution }
  | { op: 'tell'; trial: number; state: TrialOutcome['state']; value?: number }
  | { op: 'close' };

export type BridgeResponse =
  | { ok: true; value?: ParamValue }
  | { ok: false; error: string };

export interface BridgeChannel {
  request(message: BridgeRequest): Promise<BridgeResponse>;
  close(): Promise<void>;
}

export function parseBridgeResponse(message: unknown): BridgeResponse {
  if (!isRecord(message) || typeof message.ok !== 'boolean') {
    return { ok: false, error: `Malformed bridge response: ${JSON.stringify(message)}` };
  }
  if (!message.ok) {
    return { ok: false, error: typeof message.error === 'string' ? message.error : 'unknown bridge error' };
  }
  const value = message.value;
  if (value === undefined) {
    return { ok: true };
  }
  if (!isParamValue(value)) {
    return { ok: false, error: `Bridge returned a non-scalar value: ${JSON.stringify(value)}` };
  }
  return { ok: true, value };
}

interface Pending {
  resolve: (response: BridgeResponse) => void;
  reject: (error: Error) => void;
}

/**
 * python-shell channel in json mode
 */
export class PythonBridgeChannel implements BridgeChannel {
  private shell: PythonShell;
  private pending: Pending[] = [];
  private closed = false;

  constructor(scriptPath: string, pythonPath: string) {
    if (!fs.existsSync(scriptPath)) {
      throw new StudyStorageError(`Python bridge not found: ${scriptPath}`);
    }

    this.shell = new PythonShell(scriptPath, { mode: 'json', pythonPath });

    this.shell.on('message', (message: unknown) => {
      const waiter = this.pending.shift();
      if (!waiter) {
        Logger.warn('Unexpected message from Python bridge', { message: JSON.stringify(message) });
        return;
      }
      waiter.resolve(parseBridgeResponse(message));
    });

    this.shell.on('stderr', (line: string) => {
      Logger.debug('optuna bridge', { line });
    });

    this.shell.on('pythonError', (error: Error) => this.failAll(error));
    this.shell.on('error', (error: Error) => this.failAll(error));
    this.shell.on('close', () => {
      this.closed = true;
      this.failAll(new Error('Python bridge exited'));
    });
  }

  request(message: BridgeRequest): Promise<BridgeResponse> {
    if (this.closed) {
      return Promise.reject(new StudyStorageError('Python bridge is closed'));
    }
    return new Promise((resolve, reject) => {
      this.pending.push({ resolve, reject });
      this.shell.send(message);
    });
  }

  close(): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      this.shell.end(error => {
        this.closed = true;
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  private failAll(error: Error): void {
    const waiting = this.pending.splice(0);
    for (const waiter of waiting) {
      waiter.reject(error);
    }
  }
}

export type BridgeFactory = () => BridgeChannel;

export class OptunaOracle implements SearchOracle {
  readonly name = 'tpe';
  private channel: BridgeChannel | null = null;

  constructor(private createChannel: BridgeFactory, private seed = 42) {}

  async open(direction: Direction, history: CompletedTrial[]): Promise<void> {
    this.channel = this.createChannel();
    await this.call({ op: 'create', direction, seed: this.seed });
    for (const trial of history) {
      await this.learn(trial);
    }
    Logger.debug('Optuna study rehydrated', { trials: history.length, direction });
  }

  async suggest(trialNumber: number, name: string, distribution: Distribution): Promise<ParamValue> {
    const response = await this.call({ op: 'suggest', trial: trialNumber, name, distribution });
    if (response.value === undefined) {
      throw new StudyStorageError(`Bridge returned no value for ${name}`);
    }
    return response.value;
  }

  async report(trialNumber: number, outcome: TrialOutcome): Promise<void> {
    await this.call({
      op: 'tell',
      trial: trialNumber,
      state: outcome.state,
      ...(outcome.state === 'complete' && { value: outcome.value })
    });
  }

  async learn(trial: CompletedTrial): Promise<void> {
    await this.call({
      op: 'add_trial',
      params: trial.params,
      distributions: trial.distributions,
      value: trial.value
    });
  }

  async close(): Promise<void> {
    const channel = this.channel;
    this.channel = null;
    if (!channel) return;

    try {
      await channel.request({ op: 'close' });
    } finally {
      await channel.close();
    }
  }

  private async call(message: BridgeRequest): Promise<{ ok: true; value?: ParamValue }> {
    if (!this.channel) {
      throw new StudyStorageError('Optuna oracle used before open()');
    }

    let response: BridgeResponse;
    try {
      response = await this.channel.request(message);
    } catch (error) {
      throw new StudyStorageError(
        `Python bridge failed during ${message.op}`,
        error instanceof Error ? error : new Error(String(error))
      );
    }

    if (!response.ok) {
      throw new StudyStorageError(`Optuna ${message.op} failed: ${response.error}`);
    }
    return response;
  }
}
