/**
 * Configuration loader with validation
 */

import type { CloudtuneConfig } from './types/common.js';
import * as yaml from 'js-yaml';
import * as fs from 'fs/promises';
import * as path from 'path';
import { Logger } from './utils/logger.js';
import { isRecord, mergeDeep, processEnvMappings, transforms } from './utils/env-config.js';
import type { EnvMapping } from './utils/env-config.js';

const DEFAULT_CONFIG_PATHS = [
  'cloudtune.config.yaml',
  'cloudtune.config.yml',
  path.join(process.cwd(), 'config', 'cloudtune.yaml')
];

const ENV_MAPPINGS: EnvMapping[] = [
  { envVar: 'CLOUDTUNE_RESULTS_DIR', configPath: ['paths', 'results_dir'] },
  { envVar: 'CLOUDTUNE_STUDY_DB', configPath: ['paths', 'study_db'] },
  { envVar: 'CLOUDTUNE_TERRAFORM_DIR', configPath: ['paths', 'terraform_dir'] },
  { envVar: 'CLOUDTUNE_SAMPLER', configPath: ['oracle', 'sampler'], transform: transforms.lower },
  { envVar: 'CLOUDTUNE_SEED', configPath: ['oracle', 'seed'], transform: transforms.int },
  { envVar: 'CLOUDTUNE_PYTHON', configPath: ['oracle', 'python_path'] },
  { envVar: 'CLOUDTUNE_SSH_USER', configPath: ['ssh', 'user'] },
  { envVar: 'CLOUDTUNE_SSH_KEY', configPath: ['ssh', 'identity_file'] },
  { envVar: 'CLOUDTUNE_SSH_STRICT_HOST_KEYS', configPath: ['ssh', 'strict_host_key_checking'], transform: transforms.boolean },
  { envVar: 'CLOUDTUNE_BENCHMARK_DURATION_S', configPath: ['workload', 'duration_s'], transform: transforms.int },
  { envVar: 'LOG_LEVEL', configPath: ['logging', 'level'], transform: transforms.lower }
];

/**
 * Load and validate configuration. Files only need the sections they
 * change; everything else comes from the defaults.
 */
export async function loadConfig(configPath?: string): Promise<CloudtuneConfig> {
  const pathsToTry = configPath ? [configPath] : DEFAULT_CONFIG_PATHS;

  for (const filePath of pathsToTry) {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (configPath) {
        throw new Error(`Failed to load config from ${configPath}: ${String(error)}`);
      }
      continue;
    }

    const parsed: unknown = yaml.load(content) ?? {};
    if (!isRecord(parsed)) {
      throw new Error(`Configuration in ${filePath} must be a mapping`);
    }

    const config: unknown = mergeDeep(getDefaultConfig(), parsed);
    validateConfig(config);

    Logger.info('Loaded configuration', { path: filePath });
    return config;
  }

  Logger.debug('No configuration file found, using defaults');
  return getDefaultConfig();
}

function section(c: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = c[name];
  if (!isRecord(value)) {
    throw new Error(`Missing required ${name} configuration`);
  }
  return value;
}

function requireString(s: Record<string, unknown>, sectionName: string, key: string): void {
  if (typeof s[key] !== 'string' || s[key] === '') {
    throw new Error(`${sectionName}.${key} must be a non-empty string`);
  }
}

function requirePositive(s: Record<string, unknown>, sectionName: string, key: string): void {
  const value = s[key];
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new Error(`${sectionName}.${key} must be a positive number`);
  }
}

/**
 * Validate configuration structure
 */
export function validateConfig(config: unknown): asserts config is CloudtuneConfig {
  if (!isRecord(config)) {
    throw new Error('Configuration must be an object');
  }

  const paths = section(config, 'paths');
  for (const key of ['results_dir', 'study_db', 'terraform_dir']) {
    requireString(paths, 'paths', key);
  }

  const oracle = section(config, 'oracle');
  if (oracle.sampler !== 'tpe' && oracle.sampler !== 'random') {
    throw new Error('oracle.sampler must be tpe or random');
  }
  if (typeof oracle.seed !== 'number' || !Number.isInteger(oracle.seed)) {
    throw new Error('oracle.seed must be an integer');
  }
  requireString(oracle, 'oracle', 'python_path');
  requireString(oracle, 'oracle', 'bridge_script');

  const ssh = section(config, 'ssh');
  requireString(ssh, 'ssh', 'user');
  requirePositive(ssh, 'ssh', 'connect_timeout_s');
  if (ssh.identity_file !== undefined && typeof ssh.identity_file !== 'string') {
    throw new Error('ssh.identity_file must be a string');
  }
  if (typeof ssh.strict_host_key_checking !== 'boolean') {
    throw new Error('ssh.strict_host_key_checking must be a boolean');
  }

  const timeouts = section(config, 'timeouts');
  for (const key of ['provision_s', 'vm_ready_s', 'service_ready_s', 'prepare_s', 'command_s', 'poll_interval_s', 'benchmark_grace_s']) {
    requirePositive(timeouts, 'timeouts', key);
  }

  const workload = section(config, 'workload');
  for (const key of ['duration_s', 'clients', 'threads']) {
    requirePositive(workload, 'workload', key);
  }

  const logging = section(config, 'logging');
  if (!['debug', 'info', 'warn', 'error'].includes(String(logging.level))) {
    throw new Error('logging.level must be one of debug, info, warn, error');
  }
}

/**
 * Get default configuration
 */
export function getDefaultConfig(): CloudtuneConfig {
  return {
    paths: {
      results_dir: './results',
      study_db: './data/studies.db',
      terraform_dir: './terraform'
    },
    oracle: {
      sampler: 'tpe',
      seed: 42,
      python_path: 'python3',
      bridge_script: './python/optuna_bridge.py'
    },
    ssh: {
      user: 'root',
      connect_timeout_s: 10,
      strict_host_key_checking: false
    },
    timeouts: {
      provision_s: 1800,
      vm_ready_s: 600,
      service_ready_s: 300,
      prepare_s: 900,
      command_s: 120,
      poll_interval_s: 5,
      benchmark_grace_s: 120
    },
    workload: {
      duration_s: 60,
      clients: 50,
      threads: 4
    },
    logging: {
      level: 'info'
    }
  };
}

/**
 * Get environment-based config patch
 */
export function getEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  return processEnvMappings(ENV_MAPPINGS, env);
}

/**
 * Override config with environment variables
 */
export function applyEnvOverrides(config: CloudtuneConfig, env: NodeJS.ProcessEnv = process.env): CloudtuneConfig {
  const overridden: unknown = mergeDeep(config, getEnvConfig(env));
  validateConfig(overridden);
  return overridden;
}
