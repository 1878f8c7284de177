/**
 * Result Cache backed by an append-only JSON Lines file.
 *
 * Every executed trial is recorded, failures included. Lookups only ever
 * return usable records, so a failed configuration is retried rather than
 * poisoned. Writes go through temp-file-and-rename.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type {
  OptimizationMode,
  ParamValue,
  ResultRecord,
  TrialResult,
  TrialSpec
} from '../../../src/types/common.js';
import { TIMING_PHASES } from '../../../src/types/common.js';
import { canonicalJson } from '../../../src/utils/canonical-json.js';
import { isRecord } from '../../../src/utils/env-config.js';
import { writeFileAtomic } from '../../../src/utils/filesystem.js';
import { Logger } from '../../../src/utils/logger.js';
import { CacheCorruptionError, toError } from '../../engine/errors.js';
import { isCloudId } from '../pricing/clouds.js';

export interface ResultStoreOptions {
  service: string;
  primaryMetric: string;
  resultsDir: string;
}

export interface AppendMeta {
  mode?: OptimizationMode;
  trial?: number;
  login?: string;
}

export interface RecordFilter {
  cloud?: string;
  successfulOnly?: boolean;
}

export type AppendListener = (store: ResultStore, record: ResultRecord) => Promise<void>;

export function cacheKey(spec: Pick<TrialSpec, 'cloud' | 'infra' | 'config'>): string {
  return canonicalJson({ cloud: spec.cloud, infra: spec.infra, config: spec.config });
}

/**
 * A result may satisfy a lookup only with no error and a positive primary metric.
 */
export function isUsable(
  result: { error?: unknown; metrics: Readonly<Record<string, number>> },
  primaryMetric: string
): boolean {
  if (result.error !== undefined && result.error !== null) {
    return false;
  }
  const value = result.metrics[primaryMetric];
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

function isParamValue(value: unknown): value is ParamValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function readNumberMap(value: unknown, field: string, line: number): Record<string, number> {
  if (!isRecord(value)) {
    throw new CacheCorruptionError(`${field} must be an object`, line);
  }
  const out: Record<string, number> = {};
  for (const [key, item] of Object.entries(value)) {
    if (typeof item !== 'number') {
      throw new CacheCorruptionError(`${field}.${key} must be a number`, line);
    }
    out[key] = item;
  }
  return out;
}

/**
 * Validates one decoded line of the cache file.
 */
export function parseRecord(value: unknown, line: number): ResultRecord {
  if (!isRecord(value)) {
    throw new CacheCorruptionError('record is not an object', line);
  }

  const { service, cloud, infra, config, timestamp } = value;
  if (typeof service !== 'string') {
    throw new CacheCorruptionError('service must be a string', line);
  }
  if (typeof cloud !== 'string' || !isCloudId(cloud)) {
    throw new CacheCorruptionError(`unknown cloud ${String(cloud)}`, line);
  }
  if (!isRecord(infra) || typeof infra.cpu !== 'number' || typeof infra.ram_gb !== 'number') {
    throw new CacheCorruptionError('infra must carry numeric cpu and ram_gb', line);
  }
  if (!isRecord(config)) {
    throw new CacheCorruptionError('config must be an object', line);
  }
  if (typeof timestamp !== 'string') {
    throw new CacheCorruptionError('timestamp must be a string', line);
  }

  const record: ResultRecord = {
    service,
    cloud,
    infra: {
      cpu: infra.cpu,
      ram_gb: infra.ram_gb,
      ...(typeof infra.disk_type === 'string' && { disk_type: infra.disk_type }),
      ...(typeof infra.disk_size_gb === 'number' && { disk_size_gb: infra.disk_size_gb }),
      ...(typeof infra.drives === 'number' && { drives: infra.drives }),
      ...(typeof infra.nodes === 'number' && { nodes: infra.nodes }),
      ...(typeof infra.topology === 'string' && { topology: infra.topology })
    },
    config: {},
    metrics: readNumberMap(value.metrics ?? {}, 'metrics', line),
    timings: {},
    timestamp
  };

  for (const [key, item] of Object.entries(config)) {
    if (!isParamValue(item)) {
      throw new CacheCorruptionError(`config.${key} must be a scalar`, line);
    }
    record.config[key] = item;
  }

  const timings = readNumberMap(value.timings ?? {}, 'timings', line);
  for (const phase of TIMING_PHASES) {
    if (phase in timings) {
      record.timings[phase] = timings[phase];
    }
  }

  if (value.mode === 'infra' || value.mode === 'config' || value.mode === 'full') {
    record.mode = value.mode;
  }
  if (typeof value.trial === 'number') {
    record.trial = value.trial;
  }
  if (typeof value.login === 'string') {
    record.login = value.login;
  }
  if (value.error !== undefined && value.error !== null) {
    const error = value.error;
    if (isRecord(error) && typeof error.kind === 'string' && typeof error.message === 'string') {
      record.error = {
        kind: error.kind,
        message: error.message,
        ...(typeof error.snippet === 'string' && { snippet: error.snippet })
      };
    } else {
      record.error = { kind: 'Error', message: String(error) };
    }
  }

  return record;
}

interface Entry {
  key: string;
  record: ResultRecord;
}

export class ResultStore {
  readonly filePath: string;
  readonly service: string;
  readonly primaryMetric: string;

  private lines: string[] = [];
  private entries: Entry[] = [];
  private loaded = false;
  private listeners: AppendListener[] = [];

  constructor(options: ResultStoreOptions) {
    this.service = options.service;
    this.primaryMetric = options.primaryMetric;
    this.filePath = path.join(options.resultsDir, `${options.service}.jsonl`);
  }

  /**
   * Re-reads the file. Malformed lines are reported and skipped, and kept
   * verbatim so later rewrites do not lose them.
   */
  async reload(): Promise<void> {
    let content = '';
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        throw error;
      }
    }

    this.lines = content.split('\n').filter(line => line.trim() !== '');
    this.entries = [];

    this.lines.forEach((line, index) => {
      try {
        const record = parseRecord(this.decodeLine(line, index + 1), index + 1);
        this.entries.push({ key: cacheKey(record), record });
      } catch (error) {
        const corruption = error instanceof CacheCorruptionError
          ? error
          : new CacheCorruptionError(toError(error).message, index + 1, toError(error));
        Logger.warn('Skipping malformed result record', {
          file: this.filePath,
          line: corruption.line,
          reason: corruption.message
        });
      }
    });

    this.loaded = true;
  }

  /**
   * Latest usable record for the key, or null
   */
  async lookup(key: string): Promise<ResultRecord | null> {
    await this.ensureLoaded();
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const entry = this.entries[i];
      if (entry.key === key && isUsable(entry.record, this.primaryMetric)) {
        return entry.record;
      }
    }
    return null;
  }

  async append(spec: TrialSpec, result: TrialResult, meta: AppendMeta = {}): Promise<ResultRecord> {
    await this.ensureLoaded();

    const record: ResultRecord = {
      service: this.service,
      cloud: spec.cloud,
      ...(meta.mode ? { mode: meta.mode } : {}),
      ...(meta.trial !== undefined && { trial: meta.trial }),
      ...(meta.login ? { login: meta.login } : {}),
      infra: { ...spec.infra },
      config: { ...spec.config },
      metrics: { ...result.metrics },
      timings: { ...result.timings },
      ...(result.error && { error: { ...result.error } }),
      timestamp: new Date().toISOString()
    };

    const line = JSON.stringify(record);
    const nextLines = [...this.lines, line];
    await writeFileAtomic(this.filePath, nextLines.join('\n') + '\n');

    this.lines = nextLines;
    this.entries.push({ key: cacheKey(record), record });

    await this.notify(record);
    return record;
  }

  async records(filter: RecordFilter = {}): Promise<ResultRecord[]> {
    await this.ensureLoaded();
    return this.entries
      .map(entry => entry.record)
      .filter(record => !filter.cloud || record.cloud === filter.cloud)
      .filter(record => !filter.successfulOnly || isUsable(record, this.primaryMetric));
  }

  async count(): Promise<number> {
    await this.ensureLoaded();
    return this.entries.length;
  }

  /**
   * Registers a best-effort hook run after every append
   */
  onAppend(listener: AppendListener): void {
    this.listeners.push(listener);
  }

  private async notify(record: ResultRecord): Promise<void> {
    for (const listener of this.listeners) {
      try {
        await listener(this, record);
      } catch (error) {
        Logger.warn('Result export failed', {
          service: this.service,
          error: toError(error).message
        });
      }
    }
  }

  private decodeLine(line: string, lineNumber: number): unknown {
    try {
      const decoded: unknown = JSON.parse(line);
      return decoded;
    } catch (error) {
      throw new CacheCorruptionError(`invalid JSON: ${toError(error).message}`, lineNumber, toError(error));
    }
  }

  private async ensureLoaded(): Promise<void> {
    if (!this.loaded) {
      await this.reload();
    }
  }
}
