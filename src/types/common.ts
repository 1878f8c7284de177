/**
 * Common types for cloudtune
 */

export type CloudId = 'selectel' | 'timeweb';

export type OptimizationMode = 'infra' | 'config' | 'full';

export type Direction = 'maximize' | 'minimize';

export type SamplerKind = 'tpe' | 'random';

export type ParamValue = string | number | boolean;

/**
 * Parameters whose change requires destroying and recreating the deployment.
 */
export interface InfraConfig {
  cpu: number;
  ram_gb: number;
  disk_type?: string;
  disk_size_gb?: number;
  drives?: number;
  nodes?: number;
  topology?: string;
}

export const INFRA_FIELDS = [
  'cpu',
  'ram_gb',
  'disk_type',
  'disk_size_gb',
  'drives',
  'nodes',
  'topology'
] as const;

export type InfraField = typeof INFRA_FIELDS[number];

/**
 * Service-level settings applied in place on a running deployment.
 */
export type ServiceConfig = Record<string, ParamValue>;

export interface TrialSpec {
  readonly cloud: CloudId;
  readonly infra: Readonly<InfraConfig>;
  readonly config: Readonly<ServiceConfig>;
}

export type Distribution =
  | { type: 'categorical'; choices: ParamValue[] }
  | { type: 'int'; low: number; high: number; step?: number; log?: boolean }
  | { type: 'float'; low: number; high: number; step?: number; log?: boolean };

export interface ParameterDef {
  name: string;
  distribution: Distribution;
  description?: string;
}

export const TIMING_PHASES = [
  'provision_s',
  'vm_ready_s',
  'config_apply_s',
  'service_ready_s',
  'prepare_s',
  'benchmark_s',
  'trial_total_s'
] as const;

export type TimingPhase = typeof TIMING_PHASES[number];

export type PhaseTimings = Partial<Record<TimingPhase, number>>;

export interface TrialError {
  kind: string;
  message: string;
  snippet?: string;
}

/**
 * Outcome of one executed trial. Usable for cache hits only when
 * `error` is null and the primary metric is strictly positive.
 */
export interface TrialResult {
  readonly metrics: Readonly<Record<string, number>>;
  readonly timings: Readonly<PhaseTimings>;
  readonly error: TrialError | null;
}

/**
 * One line of the result cache file.
 */
export interface ResultRecord {
  service: string;
  cloud: CloudId;
  mode?: OptimizationMode;
  trial?: number;
  login?: string;
  infra: InfraConfig;
  config: ServiceConfig;
  metrics: Record<string, number>;
  timings: PhaseTimings;
  error?: TrialError;
  timestamp: string;
}

export interface MetricDefinition {
  name: string;
  description: string;
  direction: Direction;
  unit: string;
  digits: number;
  /** Copied from a phase timing instead of parsed from tool output */
  fromTiming?: TimingPhase;
}

export interface Endpoints {
  serviceHost: string;
  benchmarkHost: string;
  nodeHosts: string[];
  /** Bastion used to reach hosts on the private network */
  jumpHost?: string;
}

export interface Deployment {
  cloud: CloudId;
  infra: InfraConfig;
  endpoints: Endpoints;
  specs: Record<string, string>;
  created_at: string;
}

export interface WorkloadSpec {
  duration_s: number;
  clients: number;
  threads: number;
}

export interface CloudtuneConfig {
  paths: {
    results_dir: string;
    study_db: string;
    terraform_dir: string;
  };
  oracle: {
    sampler: SamplerKind;
    seed: number;
    python_path: string;
    bridge_script: string;
  };
  ssh: {
    user: string;
    connect_timeout_s: number;
    identity_file?: string;
    strict_host_key_checking: boolean;
  };
  timeouts: {
    provision_s: number;
    vm_ready_s: number;
    service_ready_s: number;
    /** Dataset load before the benchmark */
    prepare_s: number;
    command_s: number;
    poll_interval_s: number;
    benchmark_grace_s: number;
  };
  workload: WorkloadSpec;
  logging: {
    level: 'debug' | 'info' | 'warn' | 'error';
  };
}
