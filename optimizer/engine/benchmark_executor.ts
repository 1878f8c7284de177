/**
 * Benchmark Executor
 *
 * Applies a service configuration to a running deployment, waits for the
 * service, runs the target's benchmark and scores it. Phase failures end up
 * on the returned TrialResult; only cancellation rejects.
 */

import type {
  CloudtuneConfig,
  Endpoints,
  TrialResult,
  TrialSpec,
  WorkloadSpec
} from '../../src/types/common.js';
import { Logger } from '../../src/utils/logger.js';
import type { RemoteShell, RunOptions } from '../services/infra/remote_shell.js';
import type { ServiceTarget } from '../targets/types.js';
import {
  BenchmarkExecutionError,
  ConfigApplyError,
  NotReadyError,
  OptimizerError,
  ParseError,
  toError
} from './errors.js';
import { snippet } from './output_parsing.js';
import { pollUntil, sleep } from './polling.js';
import type { Sleeper } from './polling.js';
import { TrialResultBuilder } from './trial_result.js';

export interface ExecutorOptions {
  target: ServiceTarget;
  shell: RemoteShell;
  timeouts: CloudtuneConfig['timeouts'];
  sleep?: Sleeper;
  now?: () => number;
}

function failureText(stderr: string, stdout: string): string {
  return snippet((stderr.trim() || stdout.trim()).slice(-2000), 300);
}

export class BenchmarkExecutor {
  private sleep: Sleeper;
  private now: () => number;

  constructor(private options: ExecutorOptions) {
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
  }

  async run(
    endpoints: Endpoints,
    trial: TrialSpec,
    workload: WorkloadSpec,
    signal?: AbortSignal
  ): Promise<TrialResult> {
    const builder = new TrialResultBuilder(this.now);
    const { target } = this.options;

    try {
      await builder.time('config_apply_s', () => this.applyConfig(endpoints, trial, signal));
      await builder.time('service_ready_s', () => this.waitForService(endpoints, signal));

      if (target.prepareCommand) {
        const command = target.prepareCommand(endpoints, workload);
        await builder.time('prepare_s', () => this.prepare(endpoints, command, signal));
      }

      const output = await builder.time('benchmark_s', () => this.benchmark(endpoints, trial, workload, signal));
      const metrics = this.parse(output);

      for (const metric of target.metrics) {
        const timing = metric.fromTiming ? builder.timing(metric.fromTiming) : undefined;
        if (timing !== undefined) {
          metrics[metric.name] = timing;
        }
      }

      const primary = metrics[target.primaryMetric];
      if (primary === undefined || !(primary > 0)) {
        throw new BenchmarkExecutionError(
          `Primary metric ${target.primaryMetric} is not positive: ${String(primary)}`
        );
      }
      builder.setMetrics(metrics);
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      Logger.warn('Trial failed', {
        service: target.name,
        kind: error instanceof OptimizerError ? error.kind : 'Error',
        message: toError(error).message
      });
      builder.fail(error);
    }

    return builder.build();
  }

  private runOptions(endpoints: Endpoints, timeoutS: number, signal?: AbortSignal): RunOptions {
    return { timeoutMs: timeoutS * 1000, signal, jumpHost: endpoints.jumpHost };
  }

  private async applyConfig(endpoints: Endpoints, trial: TrialSpec, signal?: AbortSignal): Promise<void> {
    const rendered = this.options.target.renderConfig({ ...trial.config }, { ...trial.infra });
    const options = this.runOptions(endpoints, this.options.timeouts.command_s, signal);

    for (const host of endpoints.nodeHosts) {
      const written = await this.options.shell.writeFile(host, rendered.path, rendered.content, options);
      if (written.exitCode !== 0) {
        throw new ConfigApplyError(
          `Failed to write ${rendered.path} on ${host}: ${failureText(written.stderr, written.stdout)}`
        );
      }

      const reloaded = await this.options.shell.run(host, rendered.reloadCommand, options);
      if (reloaded.exitCode !== 0) {
        throw new ConfigApplyError(
          `${rendered.reloadCommand} failed on ${host} (exit ${reloaded.exitCode}): ` +
          failureText(reloaded.stderr, reloaded.stdout)
        );
      }
    }
    Logger.debug('Config applied', { path: rendered.path, hosts: endpoints.nodeHosts.length });
  }

  private async waitForService(endpoints: Endpoints, signal?: AbortSignal): Promise<void> {
    const { service_ready_s, poll_interval_s, command_s } = this.options.timeouts;
    const command = this.options.target.readinessCommand(endpoints);

    const ready = await pollUntil(
      { timeoutS: service_ready_s, intervalS: poll_interval_s, sleep: this.sleep, signal },
      async () => {
        const result = await this.options.shell.run(
          endpoints.serviceHost,
          command,
          this.runOptions(endpoints, command_s, signal)
        );
        return result.exitCode === 0;
      }
    );

    if (!ready) {
      throw new NotReadyError(`${this.options.target.name} not ready after ${service_ready_s}s`);
    }
  }

  private async prepare(endpoints: Endpoints, command: string, signal?: AbortSignal): Promise<void> {
    const timeoutS = this.options.timeouts.prepare_s;
    const result = await this.options.shell.run(
      endpoints.benchmarkHost,
      command,
      this.runOptions(endpoints, timeoutS, signal)
    );
    if (result.timedOut) {
      throw new BenchmarkExecutionError(`Prepare step timed out after ${timeoutS}s`);
    }
    if (result.exitCode !== 0) {
      throw new BenchmarkExecutionError(
        `Prepare step failed (exit ${result.exitCode}): ${failureText(result.stderr, result.stdout)}`
      );
    }
  }

  private async benchmark(
    endpoints: Endpoints,
    trial: TrialSpec,
    workload: WorkloadSpec,
    signal?: AbortSignal
  ): Promise<string> {
    const timeoutS = workload.duration_s + this.options.timeouts.benchmark_grace_s;
    const command = this.options.target.benchmarkCommand(endpoints, workload, { ...trial.infra });

    const result = await this.options.shell.run(
      endpoints.benchmarkHost,
      command,
      this.runOptions(endpoints, timeoutS, signal)
    );
    if (result.timedOut) {
      throw new BenchmarkExecutionError(`Benchmark timed out after ${timeoutS}s`);
    }
    if (result.exitCode !== 0) {
      throw new BenchmarkExecutionError(
        `Benchmark exited with code ${result.exitCode}: ${failureText(result.stderr, result.stdout)}`
      );
    }
    return result.stdout;
  }

  private parse(output: string): Record<string, number> {
    try {
      return { ...this.options.target.parseOutput(output) };
    } catch (error) {
      if (error instanceof ParseError) {
        throw error;
      }
      throw new ParseError(`Unreadable benchmark output: ${toError(error).message}`, snippet(output), toError(error));
    }
  }
}
