/**
 * Study Store using SQLite for optimization history persistence
 *
 * A study is addressed by name, which defaults to service-cloud-mode-metric.
 * It owns the trial log and the distribution registered under every
 * parameter name; a name can never be re-registered with a different
 * distribution.
 */

import Database from 'better-sqlite3';
import type { Direction, Distribution, OptimizationMode, ParamValue } from '../../../src/types/common.js';
import { InvalidParameterSpaceError, OptimizerError, StudyStorageError, toError } from '../../engine/errors.js';
import {
  describeDistribution,
  parseDistribution,
  parseDistributions,
  parseParams,
  sameDistribution
} from './distributions.js';

export interface StudyIdentity {
  service: string;
  cloud: string;
  mode: OptimizationMode;
  metric: string;
  name?: string;
}

export interface StudyRecord extends StudyIdentity {
  id: number;
  name: string;
  direction: Direction;
  created_at: string;
}

export type TrialState = 'running' | 'complete' | 'pruned' | 'fail';

export interface StoredTrial {
  number: number;
  state: TrialState;
  value: number | null;
  params: Record<string, ParamValue>;
  distributions: Record<string, Distribution>;
  cache_key: string | null;
  note: string | null;
  started_at: string;
  finished_at: string | null;
}

export interface TrialCompletion {
  state: Exclude<TrialState, 'running'>;
  value?: number | null;
  params: Record<string, ParamValue>;
  distributions: Record<string, Distribution>;
  cacheKey?: string | null;
  note?: string | null;
}

interface StudyRow {
  id: number;
  name: string;
  service: string;
  cloud: string;
  mode: string;
  metric: string;
  direction: string;
  created_at: string;
}

interface TrialRow {
  number: number;
  state: string;
  value: number | null;
  params_json: string;
  distributions_json: string;
  cache_key: string | null;
  note: string | null;
  started_at: string;
  finished_at: string | null;
}

export function studyName(identity: StudyIdentity): string {
  return identity.name ?? `${identity.service}-${identity.cloud}-${identity.mode}-${identity.metric}`;
}

function isTrialState(value: string): value is TrialState {
  return value === 'running' || value === 'complete' || value === 'pruned' || value === 'fail';
}

export class StudyStore {
  private db: Database.Database;

  constructor(private dbPath: string) {
    try {
      this.db = new Database(dbPath);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('foreign_keys = ON');
    } catch (error) {
      throw new StudyStorageError(`Cannot open study database ${dbPath}`, toError(error));
    }
  }

  initialize(): void {
    this.guard('initialize schema', () => {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS studies (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          name TEXT NOT NULL UNIQUE,
          service TEXT NOT NULL,
          cloud TEXT NOT NULL,
          mode TEXT NOT NULL,
          metric TEXT NOT NULL,
          direction TEXT NOT NULL,
          created_at DATETIME DEFAULT CURRENT_TIMESTAMP
        );

        CREATE TABLE IF NOT EXISTS study_params (
          study_id INTEGER NOT NULL REFERENCES studies(id) ON DELETE CASCADE,
          name TEXT NOT NULL,
          distribution_json TEXT NOT NULL,
          PRIMARY KEY (study_id, name)
        );

        CREATE TABLE IF NOT EXISTS trials (
          study_id INTEGER NOT NULL REFERENCES studies(id) ON DELETE CASCADE,
          number INTEGER NOT NULL,
          state TEXT NOT NULL,
          value REAL,
          params_json TEXT NOT NULL DEFAULT '{}',
          distributions_json TEXT NOT NULL DEFAULT '{}',
          cache_key TEXT,
          note TEXT,
          started_at DATETIME DEFAULT CURRENT_TIMESTAMP,
          finished_at DATETIME,
          PRIMARY KEY (study_id, number)
        );

        CREATE INDEX IF NOT EXISTS idx_trials_state ON trials(study_id, state);
        CREATE INDEX IF NOT EXISTS idx_trials_cache_key ON trials(study_id, cache_key);
      `);
    });
  }

  /**
   * Creates the study or resumes the existing one with the same identity.
   *
   * @throws InvalidParameterSpaceError when the stored direction differs
   */
  openStudy(identity: StudyIdentity, direction: Direction): StudyRecord {
    const existing = this.findStudy(identity);
    if (existing) {
      if (existing.direction !== direction) {
        throw new InvalidParameterSpaceError(
          `Study ${existing.name} was created to ${existing.direction}, cannot resume it to ${direction}`
        );
      }
      return existing;
    }

    this.guard('create study', () => {
      this.db.prepare<[string, string, string, string, string, string]>(
        'INSERT INTO studies (name, service, cloud, mode, metric, direction) VALUES (?, ?, ?, ?, ?, ?)'
      ).run(studyName(identity), identity.service, identity.cloud, identity.mode, identity.metric, direction);
    });

    const created = this.findStudy(identity);
    if (!created) {
      throw new StudyStorageError(`Study ${studyName(identity)} vanished after creation`);
    }
    return created;
  }

  /**
   * @throws InvalidParameterSpaceError when the name belongs to another
   * service, cloud, mode or metric
   */
  findStudy(identity: StudyIdentity): StudyRecord | null {
    const name = studyName(identity);
    const row = this.guard('read study', () =>
      this.db.prepare<[string], StudyRow>('SELECT * FROM studies WHERE name = ?').get(name)
    );
    if (!row) return null;

    const stored = `${row.service}/${row.cloud}/${row.mode}/${row.metric}`;
    if (stored !== this.describe(identity)) {
      throw new InvalidParameterSpaceError(`Study ${name} belongs to ${stored}, not ${this.describe(identity)}`);
    }
    if (row.direction !== 'maximize' && row.direction !== 'minimize') {
      throw new StudyStorageError(`Study ${row.id} has invalid direction ${row.direction}`);
    }

    return {
      id: row.id,
      name: row.name,
      service: row.service,
      cloud: row.cloud,
      mode: identity.mode,
      metric: row.metric,
      direction: row.direction,
      created_at: row.created_at
    };
  }

  /**
   * Records the distribution for a parameter name, or checks it against the
   * one already stored.
   *
   * @throws InvalidParameterSpaceError when the name is redefined
   */
  registerDistribution(studyId: number, name: string, distribution: Distribution): void {
    const stored = this.guard('read distribution', () =>
      this.db.prepare<[number, string], { distribution_json: string }>(
        'SELECT distribution_json FROM study_params WHERE study_id = ? AND name = ?'
      ).get(studyId, name)
    );

    if (stored) {
      const previous = this.decode('distribution', () => parseDistribution(JSON.parse(stored.distribution_json)));
      if (!sameDistribution(previous, distribution)) {
        throw new InvalidParameterSpaceError(
          `Parameter ${name} is registered as ${describeDistribution(previous)}, ` +
          `cannot redefine it as ${describeDistribution(distribution)}`
        );
      }
      return;
    }

    this.guard('register distribution', () => {
      this.db.prepare<[number, string, string]>(
        'INSERT INTO study_params (study_id, name, distribution_json) VALUES (?, ?, ?)'
      ).run(studyId, name, JSON.stringify(distribution));
    });
  }

  getDistributions(studyId: number): Record<string, Distribution> {
    const rows = this.guard('read distributions', () =>
      this.db.prepare<[number], { name: string; distribution_json: string }>(
        'SELECT name, distribution_json FROM study_params WHERE study_id = ? ORDER BY name'
      ).all(studyId)
    );

    const out: Record<string, Distribution> = {};
    for (const row of rows) {
      out[row.name] = this.decode('distribution', () => parseDistribution(JSON.parse(row.distribution_json)));
    }
    return out;
  }

  /**
   * Opens a new running trial and returns its number
   */
  createTrial(studyId: number): number {
    return this.guard('create trial', () => {
      const insert = this.db.transaction((id: number) => {
        const row = this.db.prepare<[number], { next: number }>(
          'SELECT COALESCE(MAX(number) + 1, 0) AS next FROM trials WHERE study_id = ?'
        ).get(id);
        const number = row ? row.next : 0;
        this.db.prepare<[number, number]>(
          "INSERT INTO trials (study_id, number, state) VALUES (?, ?, 'running')"
        ).run(id, number);
        return number;
      });
      return insert(studyId);
    });
  }

  finishTrial(studyId: number, number: number, completion: TrialCompletion): void {
    const changes = this.guard('finish trial', () =>
      this.db.prepare<[string, number | null, string, string, string | null, string | null, number, number]>(`
        UPDATE trials
        SET state = ?, value = ?, params_json = ?, distributions_json = ?, cache_key = ?, note = ?,
            finished_at = CURRENT_TIMESTAMP
        WHERE study_id = ? AND number = ?
      `).run(
        completion.state,
        completion.value ?? null,
        JSON.stringify(completion.params),
        JSON.stringify(completion.distributions),
        completion.cacheKey ?? null,
        completion.note ?? null,
        studyId,
        number
      ).changes
    );

    if (changes === 0) {
      throw new StudyStorageError(`Trial ${number} does not exist in study ${studyId}`);
    }
  }

  /**
   * Marks trials left running by an interrupted process as failed
   */
  failStaleTrials(studyId: number): number {
    return this.guard('fail stale trials', () =>
      this.db.prepare<[number]>(`
        UPDATE trials
        SET state = 'fail', note = 'interrupted', finished_at = CURRENT_TIMESTAMP
        WHERE study_id = ? AND state = 'running'
      `).run(studyId).changes
    );
  }

  getTrials(studyId: number, state?: TrialState): StoredTrial[] {
    const rows = this.guard('read trials', () =>
      state
        ? this.db.prepare<[number, string], TrialRow>(
          'SELECT * FROM trials WHERE study_id = ? AND state = ? ORDER BY number'
        ).all(studyId, state)
        : this.db.prepare<[number], TrialRow>(
          'SELECT * FROM trials WHERE study_id = ? ORDER BY number'
        ).all(studyId)
    );

    return rows.map(row => this.toTrial(row));
  }

  hasCacheKey(studyId: number, key: string): boolean {
    const row = this.guard('read cache key', () =>
      this.db.prepare<[number, string], { found: number }>(
        "SELECT 1 AS found FROM trials WHERE study_id = ? AND cache_key = ? AND state = 'complete' LIMIT 1"
      ).get(studyId, key)
    );
    return row !== undefined;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private toTrial(row: TrialRow): StoredTrial {
    if (!isTrialState(row.state)) {
      throw new StudyStorageError(`Trial ${row.number} has invalid state ${row.state}`);
    }
    return {
      number: row.number,
      state: row.state,
      value: row.value,
      params: this.decode('trial params', () => parseParams(JSON.parse(row.params_json))),
      distributions: this.decode('trial distributions', () => parseDistributions(JSON.parse(row.distributions_json))),
      cache_key: row.cache_key,
      note: row.note,
      started_at: row.started_at,
      finished_at: row.finished_at
    };
  }

  private describe(identity: StudyIdentity): string {
    return `${identity.service}/${identity.cloud}/${identity.mode}/${identity.metric}`;
  }

  private decode<T>(what: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new StudyStorageError(`Corrupt ${what} in ${this.dbPath}: ${toError(error).message}`, toError(error));
    }
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof OptimizerError) {
        throw error;
      }
      throw new StudyStorageError(`Failed to ${operation} in ${this.dbPath}`, toError(error));
    }
  }
}
