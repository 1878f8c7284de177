/**
 * Command line interface: `cloudtune <service> --cloud <cloud> [options]`
 */

import * as path from 'path';
import { Command, InvalidArgumentError, Option } from 'commander';
import type { OptionValues } from 'commander';
import type { CloudtuneConfig, Direction, OptimizationMode, SamplerKind } from './types/common.js';
import { applyEnvOverrides, loadConfig } from './config.js';
import { ensureDirectories } from './utils/filesystem.js';
import { Logger } from './utils/logger.js';
import { BenchmarkExecutor } from '../optimizer/engine/benchmark_executor.js';
import { toError } from '../optimizer/engine/errors.js';
import { OptunaOracle, PythonBridgeChannel } from '../optimizer/engine/oracles/optuna_oracle.js';
import { RandomOracle } from '../optimizer/engine/oracles/random_oracle.js';
import type { SearchOracle } from '../optimizer/engine/oracles/types.js';
import { findMetric } from '../optimizer/engine/scoring.js';
import { SearchDriver } from '../optimizer/engine/search_driver.js';
import { OptimizationSession } from '../optimizer/engine/session.js';
import type { SessionSummary } from '../optimizer/engine/session.js';
import { SpaceResolver } from '../optimizer/engine/space_resolver.js';
import { TrialOrchestrator } from '../optimizer/engine/trial_orchestrator.js';
import { InfrastructureBroker } from '../optimizer/services/infra/infrastructure_broker.js';
import { SshShell } from '../optimizer/services/infra/remote_shell.js';
import { TerraformBackend } from '../optimizer/services/infra/terraform_backend.js';
import { getCloudProfile, listClouds } from '../optimizer/services/pricing/clouds.js';
import type { CloudProfile } from '../optimizer/services/pricing/clouds.js';
import { buildReport, exportMarkdown, markdownExporter, renderBest, renderTable } from '../optimizer/services/results/report.js';
import { ResultStore } from '../optimizer/services/results/store.js';
import { StudyStore } from '../optimizer/services/study/store.js';
import type { StudyIdentity } from '../optimizer/services/study/store.js';
import { getTarget, listTargets } from '../optimizer/targets/registry.js';
import type { ServiceTarget } from '../optimizer/targets/types.js';

export interface CliOptions {
  cloud: string;
  mode: OptimizationMode;
  metric?: string;
  trials: number;
  cpu?: number;
  ram?: number;
  /** false with --no-destroy */
  destroy: boolean;
  showResults: boolean;
  exportMd: boolean;
  config?: string;
  sampler?: SamplerKind;
  login?: string;
  /** Existing load generator to benchmark from */
  benchmarkVmIp?: string;
  studyName?: string;
}

export interface RunContext {
  signal?: AbortSignal;
}

export type CliHandler = (service: string, options: CliOptions) => Promise<void>;

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function isMode(value: unknown): value is OptimizationMode {
  return value === 'infra' || value === 'config' || value === 'full';
}

function isSampler(value: unknown): value is SamplerKind {
  return value === 'tpe' || value === 'random';
}

/**
 * Narrows commander's option bag
 */
export function parseCliOptions(raw: OptionValues): CliOptions {
  const values: Record<string, unknown> = raw;
  const cloud = optionalString(values.cloud);
  if (!cloud) {
    throw new InvalidArgumentError('--cloud is required');
  }
  if (!isMode(values.mode)) {
    throw new InvalidArgumentError(`Invalid mode: ${String(values.mode)}`);
  }

  const metric = optionalString(values.metric);
  const cpu = optionalNumber(values.cpu);
  const ram = optionalNumber(values.ram);
  const config = optionalString(values.config);
  const login = optionalString(values.login);
  const benchmarkVmIp = optionalString(values.benchmarkVmIp);
  const studyName = optionalString(values.studyName);

  return {
    cloud,
    mode: values.mode,
    trials: optionalNumber(values.trials) ?? 10,
    destroy: values.destroy !== false,
    showResults: values.showResults === true,
    exportMd: values.exportMd === true,
    ...(metric ? { metric } : {}),
    ...(cpu !== undefined ? { cpu } : {}),
    ...(ram !== undefined ? { ram } : {}),
    ...(config ? { config } : {}),
    ...(isSampler(values.sampler) ? { sampler: values.sampler } : {}),
    ...(login ? { login } : {}),
    ...(benchmarkVmIp ? { benchmarkVmIp } : {}),
    ...(studyName ? { studyName } : {})
  };
}

export function createProgram(handler: CliHandler): Command {
  const services = listTargets().map(target => target.name);

  return new Command()
    .name('cloudtune')
    .description('Bayesian search over cloud infrastructure and service configuration')
    .version('0.1.0')
    .argument('<service>', `Service to optimize (${services.join(', ')})`)
    .addOption(new Option('--cloud <cloud>', 'Cloud provider').choices(listClouds()).makeOptionMandatory())
    .addOption(new Option('--mode <mode>', 'What to search').choices(['infra', 'config', 'full']).default('full'))
    .option('--metric <name>', 'Metric to optimize (defaults to the service primary metric)')
    .option('--trials <n>', 'Number of trials', positiveInt, 10)
    .option('--cpu <n>', 'Pin vCPU per node', positiveInt)
    .option('--ram <gb>', 'Pin RAM (GB) per node', positiveInt)
    .option('--no-destroy', 'Keep the deployment after the run')
    .option('--show-results', 'Print cached results and exit')
    .option('--export-md', 'Write the markdown report and exit')
    .option('--config <path>', 'Configuration file')
    .addOption(new Option('--sampler <kind>', 'Search strategy').choices(['tpe', 'random']))
    .option('--login <name>', 'Operator name stored with each result')
    .option('--benchmark-vm-ip <ip>', 'Benchmark from an existing VM instead of creating one')
    .option('--study-name <name>', 'Study to create or resume (defaults to service-cloud-mode-metric)')
    .action(async (service: string, options: OptionValues) => {
      await handler(service, parseCliOptions(options));
    });
}

/**
 * Starts the Optuna bridge once to check that Python and optuna are usable
 */
async function optunaAvailable(config: CloudtuneConfig): Promise<boolean> {
  const oracle = new OptunaOracle(() => new PythonBridgeChannel(config.oracle.bridge_script, config.oracle.python_path));
  let available = true;
  try {
    await oracle.open('maximize', []);
  } catch (error) {
    Logger.warn('Optuna bridge unavailable, falling back to random sampling', { error: toError(error).message });
    available = false;
  }

  try {
    await oracle.close();
  } catch (error) {
    Logger.debug('Optuna probe did not shut down cleanly', { error: toError(error).message });
  }
  return available;
}

export async function createOracle(config: CloudtuneConfig, sampler: SamplerKind): Promise<SearchOracle> {
  if (sampler === 'tpe' && await optunaAvailable(config)) {
    return new OptunaOracle(
      () => new PythonBridgeChannel(config.oracle.bridge_script, config.oracle.python_path),
      config.oracle.seed
    );
  }
  return new RandomOracle(config.oracle.seed);
}

function resultStore(config: CloudtuneConfig, target: ServiceTarget): ResultStore {
  return new ResultStore({
    service: target.name,
    primaryMetric: target.primaryMetric,
    resultsDir: config.paths.results_dir
  });
}

async function showResults(results: ResultStore, target: ServiceTarget, profile: CloudProfile): Promise<void> {
  const report = buildReport(target, profile, await results.records({ cloud: profile.id }));
  if (report.rows.length === 0) {
    console.log(`No results found for ${target.name} on ${profile.id}`);
    return;
  }

  console.log(`\n${target.description} - ${profile.id}`);
  console.log(renderTable(report));
  console.log(`Total: ${report.rows.length} results\n`);
  for (const line of renderBest(report)) {
    console.log(line);
  }
}

function printSummary(summary: SessionSummary, metric: string): void {
  console.log(
    `\nTrials: ${summary.attempted} (scored ${summary.scored}, cached ${summary.cacheHits}, pruned ${summary.pruned})`
  );
  if (!summary.best) {
    console.log('No completed trials yet');
    return;
  }
  console.log(`Best ${metric}: ${summary.best.value} (trial ${summary.best.number})`);
  for (const [name, value] of Object.entries(summary.best.params)) {
    console.log(`  ${name}: ${String(value)}`);
  }
}

export async function runCli(service: string, options: CliOptions, context: RunContext = {}): Promise<void> {
  const config = applyEnvOverrides(await loadConfig(options.config));
  Logger.setLevel(config.logging.level);

  const target = getTarget(service);
  const profile = getCloudProfile(options.cloud);
  const metric = findMetric(target, options.metric ?? target.defaultMetric);

  const results = resultStore(config, target);

  if (options.showResults) {
    await showResults(results, target, profile);
    return;
  }
  if (options.exportMd) {
    const written = await exportMarkdown(results, target, profile);
    console.log(written ? `Results exported to ${written}` : `No results found for ${target.name} on ${profile.id}`);
    return;
  }

  results.onAppend(markdownExporter(target, profile));
  await ensureDirectories(config.paths.results_dir, path.dirname(config.paths.study_db));

  const studies = new StudyStore(config.paths.study_db);
  try {
    studies.initialize();
    const summary = await optimize(config, target, profile, metric.name, metric.direction, options, studies, results, context);
    printSummary(summary, metric.name);
  } finally {
    studies.close();
  }
}

async function optimize(
  config: CloudtuneConfig,
  target: ServiceTarget,
  profile: CloudProfile,
  metric: string,
  direction: Direction,
  options: CliOptions,
  studies: StudyStore,
  results: ResultStore,
  context: RunContext
): Promise<SessionSummary> {
  const identity: StudyIdentity = {
    service: target.name,
    cloud: profile.id,
    mode: options.mode,
    metric,
    ...(options.studyName ? { name: options.studyName } : {})
  };
  const oracle = await createOracle(config, options.sampler ?? config.oracle.sampler);
  const driver = await SearchDriver.open(studies, oracle, identity, direction);

  const shell = new SshShell(config.ssh);
  const broker = new InfrastructureBroker({
    profile,
    target,
    backend: new TerraformBackend(
      path.join(config.paths.terraform_dir, profile.id),
      config.timeouts.provision_s * 1000
    ),
    shell,
    timeouts: config.timeouts,
    ...(options.benchmarkVmIp ? { benchmarkHost: options.benchmarkVmIp } : {})
  });

  const resolver = new SpaceResolver({
    target,
    profile,
    mode: options.mode,
    fixedInfra: {
      ...(options.cpu !== undefined ? { cpu: options.cpu } : {}),
      ...(options.ram !== undefined ? { ram_gb: options.ram } : {})
    }
  });

  const orchestrator = new TrialOrchestrator({
    target,
    profile,
    mode: options.mode,
    metric,
    resolver,
    results,
    broker,
    executor: new BenchmarkExecutor({ target, shell, timeouts: config.timeouts }),
    workload: config.workload,
    ...(options.login ? { login: options.login } : {})
  });

  return new OptimizationSession({
    driver,
    orchestrator,
    resolver,
    results,
    broker,
    trials: options.trials,
    noDestroy: !options.destroy,
    ...(context.signal ? { signal: context.signal } : {})
  }).run();
}
