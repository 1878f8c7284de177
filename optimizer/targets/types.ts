/**
 * Service target plugin contract.
 *
 * Each target declares its infrastructure tier and configuration tier
 * explicitly; the core never guesses which tier a parameter belongs to.
 */

import type {
  Endpoints,
  InfraConfig,
  MetricDefinition,
  ParamValue,
  ParameterDef,
  ServiceConfig,
  WorkloadSpec
} from '../../src/types/common.js';
import type { CloudProfile } from '../services/pricing/clouds.js';

export interface InfraSpace {
  cpu: number[];
  ram_gb: number[];
  /** 'all' searches the cloud's disk types, 'default' pins the cloud default */
  disk_type?: 'all' | 'default';
  disk_size_gb?: number[];
  drives?: number[];
  nodes?: number[];
  /** Topology choice, each fixing the node count */
  topology?: {
    choices: string[];
    nodes: Record<string, number>;
  };
}

export interface RenderedConfig {
  path: string;
  content: string;
  /** Run on every service node after the file is written */
  reloadCommand: string;
}

export type TerraformVars = Record<string, string | number | boolean>;

/**
 * Terraform variable that switches a service's VMs on or off
 */
export function enabledVar(service: string): string {
  return `${service}_enabled`;
}

export interface ServiceTarget {
  readonly name: string;
  readonly description: string;
  readonly infraSpace: InfraSpace;
  readonly configSpace: ParameterDef[];
  readonly metrics: MetricDefinition[];
  /** Metric that decides whether a result is usable */
  readonly primaryMetric: string;
  readonly defaultMetric: string;
  readonly defaultConfig: ServiceConfig;

  defaultInfra(profile: CloudProfile): InfraConfig;
  terraformVars(infra: InfraConfig, profile: CloudProfile): TerraformVars;
  renderConfig(config: ServiceConfig, infra: InfraConfig): RenderedConfig;
  /** Exits 0 once the service answers, run on the service host */
  readinessCommand(endpoints: Endpoints): string;
  /** One-off data preparation, run on the benchmark host */
  prepareCommand?(endpoints: Endpoints, workload: WorkloadSpec): string;
  benchmarkCommand(endpoints: Endpoints, workload: WorkloadSpec, infra: InfraConfig): string;
  /** @throws ParseError */
  parseOutput(output: string): Record<string, number>;
}

export function numericConfig(config: ServiceConfig, name: string, fallback: number): number {
  const value = config[name];
  return typeof value === 'number' ? value : fallback;
}

export function categorical(name: string, choices: ParamValue[], description?: string): ParameterDef {
  return { name, distribution: { type: 'categorical', choices }, ...(description ? { description } : {}) };
}

export function costEfficiencyMetric(primaryUnit: string): MetricDefinition {
  return {
    name: 'cost_efficiency',
    description: `${primaryUnit} per ruble per month`,
    direction: 'maximize',
    unit: `${primaryUnit}/₽/mo`,
    digits: 2
  };
}

/**
 * Writes `content` to `path` through a quoted heredoc
 */
export function heredoc(path: string, content: string): string {
  return `cat > ${path} << 'CLOUDTUNE_EOF'\n${content}\nCLOUDTUNE_EOF`;
}
