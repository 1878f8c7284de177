/**
 * Terraform provisioning backend
 *
 * One working directory per cloud. Outputs expected from the configuration:
 * `service_host`, `benchmark_host`, and optionally `node_hosts`,
 * `service_specs` and `jump_host`. Each service VM set sits behind a
 * `<service>_enabled` variable and the load generator behind
 * `benchmark_enabled`, so the service can be removed on its own.
 */

import { access } from 'fs/promises';
import * as path from 'path';
import type { Endpoints } from '../../../src/types/common.js';
import { isRecord } from '../../../src/utils/env-config.js';
import { Logger } from '../../../src/utils/logger.js';
import { ProvisioningError } from '../../engine/errors.js';
import { snippet } from '../../engine/output_parsing.js';
import type { TerraformVars } from '../../targets/types.js';
import { runProcess } from './process_runner.js';
import type { ProcessRunner } from './process_runner.js';

export interface DeploymentOutputs {
  endpoints: Endpoints;
  /** Reported specs of the running deployment, compared as strings */
  specs: Record<string, string>;
}

export interface ProvisioningBackend {
  apply(vars: TerraformVars, signal?: AbortSignal): Promise<void>;
  /** null when nothing is deployed */
  readOutputs(signal?: AbortSignal): Promise<DeploymentOutputs | null>;
  /** Applies `vars` that disable the service VMs, keeping the benchmark host */
  releaseService(vars: TerraformVars, signal?: AbortSignal): Promise<void>;
  destroy(signal?: AbortSignal): Promise<void>;
}

function outputValue(outputs: Record<string, unknown>, name: string): unknown {
  const entry = outputs[name];
  return isRecord(entry) ? entry.value : undefined;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string' && item !== '') : [];
}

/**
 * Maps `terraform output -json` to endpoints, or null when the deployment
 * has no service host
 */
export function parseOutputs(raw: string): DeploymentOutputs | null {
  const trimmed = raw.trim();
  if (trimmed === '' || trimmed === '{}') {
    return null;
  }

  let outputs: unknown;
  try {
    outputs = JSON.parse(trimmed);
  } catch (error) {
    throw new ProvisioningError(`terraform output is not JSON: ${snippet(trimmed, 200)}`,
      error instanceof Error ? error : undefined);
  }
  if (!isRecord(outputs)) {
    return null;
  }

  const serviceHost = outputValue(outputs, 'service_host');
  if (typeof serviceHost !== 'string' || serviceHost === '') {
    return null;
  }
  const benchmarkHost = outputValue(outputs, 'benchmark_host');
  const jumpHost = outputValue(outputs, 'jump_host');
  const nodeHosts = stringList(outputValue(outputs, 'node_hosts'));

  const specs: Record<string, string> = {};
  const rawSpecs = outputValue(outputs, 'service_specs');
  if (isRecord(rawSpecs)) {
    for (const [key, value] of Object.entries(rawSpecs)) {
      if (value !== null && value !== undefined) {
        specs[key] = String(value);
      }
    }
  }

  return {
    endpoints: {
      serviceHost,
      benchmarkHost: typeof benchmarkHost === 'string' && benchmarkHost !== '' ? benchmarkHost : serviceHost,
      nodeHosts: nodeHosts.length > 0 ? nodeHosts : [serviceHost],
      ...(typeof jumpHost === 'string' && jumpHost !== '' ? { jumpHost } : {})
    },
    specs
  };
}

export function varArgs(vars: TerraformVars): string[] {
  return Object.entries(vars)
    .sort(([a], [b]) => a.localeCompare(b))
    .flatMap(([key, value]) => ['-var', `${key}=${String(value)}`]);
}

export class TerraformBackend implements ProvisioningBackend {
  constructor(
    private workingDir: string,
    private timeoutMs: number,
    private runner: ProcessRunner = runProcess,
    private binary = 'terraform'
  ) {}

  async apply(vars: TerraformVars, signal?: AbortSignal): Promise<void> {
    await this.ensureInitialized(signal);
    Logger.info('Applying terraform plan', { dir: this.workingDir, vars });
    await this.terraform(['apply', '-auto-approve', '-input=false', ...varArgs(vars)], 'apply', signal);
  }

  async readOutputs(signal?: AbortSignal): Promise<DeploymentOutputs | null> {
    if (!(await this.isInitialized())) {
      return null;
    }
    const stdout = await this.terraform(['output', '-json'], 'read outputs', signal);
    return parseOutputs(stdout);
  }

  async releaseService(vars: TerraformVars, signal?: AbortSignal): Promise<void> {
    if (!(await this.isInitialized())) {
      Logger.debug('Skipping service release, terraform never initialized', { dir: this.workingDir });
      return;
    }
    Logger.info('Destroying service VMs, keeping the benchmark host', { dir: this.workingDir, vars });
    await this.terraform(['apply', '-auto-approve', '-input=false', ...varArgs(vars)], 'release service', signal);
  }

  async destroy(signal?: AbortSignal): Promise<void> {
    if (!(await this.isInitialized())) {
      Logger.debug('Skipping destroy, terraform never initialized', { dir: this.workingDir });
      return;
    }
    Logger.info('Destroying deployment', { dir: this.workingDir });
    await this.terraform(['destroy', '-auto-approve', '-input=false'], 'destroy', signal);
  }

  private async isInitialized(): Promise<boolean> {
    try {
      await access(path.join(this.workingDir, '.terraform'));
      return true;
    } catch {
      return false;
    }
  }

  private async ensureInitialized(signal?: AbortSignal): Promise<void> {
    if (!(await this.isInitialized())) {
      await this.terraform(['init', '-input=false'], 'init', signal);
    }
  }

  private async terraform(args: string[], operation: string, signal?: AbortSignal): Promise<string> {
    const result = await this.runner(this.binary, args, {
      cwd: this.workingDir,
      timeoutMs: this.timeoutMs,
      signal,
      env: { TF_IN_AUTOMATION: '1' }
    });

    if (result.timedOut) {
      throw new ProvisioningError(`terraform ${operation} timed out after ${this.timeoutMs}ms`);
    }
    if (result.isCanceled) {
      throw new ProvisioningError(`terraform ${operation} was cancelled`);
    }
    if (result.exitCode !== 0) {
      throw new ProvisioningError(
        `terraform ${operation} failed (exit ${String(result.exitCode)}): ${snippet(result.stderr.trim(), 500)}`
      );
    }
    return result.stdout;
  }
}
