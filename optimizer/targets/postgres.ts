/**
 * PostgreSQL benchmarked with pgbench (TPC-B like).
 */

import type { Endpoints, InfraConfig, ServiceConfig, WorkloadSpec } from '../../src/types/common.js';
import type { CloudProfile } from '../services/pricing/clouds.js';
import { matchNumbers, optionalNumbers } from '../engine/output_parsing.js';
import { categorical, costEfficiencyMetric, numericConfig } from './types.js';
import type { RenderedConfig, ServiceTarget, TerraformVars } from './types.js';

const TPS_PATTERN = /tps = ([\d.]+)/;
const LATENCY_PATTERN = /latency average = ([\d.]+) ms/;
const FAILED_PATTERN = /number of failed transactions: (\d+)/;

const PGBENCH_SCALE = 50;
const DATABASE = 'bench';

export const postgresTarget: ServiceTarget = {
  name: 'postgres',
  description: 'PostgreSQL (pgbench)',

  infraSpace: {
    topology: {
      choices: ['single', 'cluster'],
      nodes: { single: 1, cluster: 3 }
    },
    cpu: [2, 4, 8, 16],
    ram_gb: [4, 8, 16, 32, 64],
    disk_type: 'default',
    disk_size_gb: [50, 100, 200]
  },

  configSpace: [
    categorical('shared_buffers_pct', [15, 20, 25, 30, 35, 40], 'shared_buffers as % of RAM'),
    categorical('effective_cache_size_pct', [50, 60, 70, 75], 'effective_cache_size as % of RAM'),
    categorical('work_mem_mb', [4, 16, 32, 64, 128, 256]),
    categorical('maintenance_work_mem_mb', [64, 128, 256, 512, 1024]),
    categorical('max_connections', [50, 100, 200, 500]),
    categorical('random_page_cost', [1.1, 1.5, 2.0, 4.0]),
    categorical('effective_io_concurrency', [1, 50, 100, 200]),
    categorical('wal_buffers_mb', [16, 32, 64, 128]),
    categorical('max_wal_size_gb', [1, 2, 4, 8]),
    categorical('checkpoint_completion_target', [0.5, 0.7, 0.9]),
    categorical('max_worker_processes', [2, 4, 8]),
    categorical('max_parallel_workers_per_gather', [0, 1, 2, 4])
  ],

  metrics: [
    { name: 'tps', description: 'Transactions per second', direction: 'maximize', unit: 'TPS', digits: 0 },
    { name: 'latency_avg_ms', description: 'Average latency', direction: 'minimize', unit: 'ms', digits: 2 },
    costEfficiencyMetric('TPS')
  ],

  primaryMetric: 'tps',
  defaultMetric: 'tps',

  defaultConfig: {
    shared_buffers_pct: 25,
    effective_cache_size_pct: 75,
    work_mem_mb: 4,
    maintenance_work_mem_mb: 64,
    max_connections: 100,
    random_page_cost: 4.0,
    effective_io_concurrency: 1,
    wal_buffers_mb: 16,
    max_wal_size_gb: 1,
    checkpoint_completion_target: 0.9,
    max_worker_processes: 8,
    max_parallel_workers_per_gather: 2
  },

  defaultInfra(profile: CloudProfile): InfraConfig {
    return {
      topology: 'single',
      nodes: 1,
      cpu: 4,
      ram_gb: 16,
      disk_type: profile.default_disk_type,
      disk_size_gb: 100
    };
  },

  terraformVars(infra: InfraConfig, profile: CloudProfile): TerraformVars {
    return {
      postgres_enabled: true,
      postgres_mode: infra.topology ?? 'single',
      postgres_cpu: infra.cpu,
      postgres_ram_gb: infra.ram_gb,
      postgres_disk_size_gb: infra.disk_size_gb ?? profile.default_disk_size_gb,
      postgres_disk_type: infra.disk_type ?? profile.default_disk_type
    };
  },

  renderConfig(config: ServiceConfig, infra: InfraConfig): RenderedConfig {
    const ramMb = infra.ram_gb * 1024;
    const sharedBuffersMb = Math.floor(ramMb * numericConfig(config, 'shared_buffers_pct', 25) / 100);
    const cacheMb = Math.floor(ramMb * numericConfig(config, 'effective_cache_size_pct', 75) / 100);
    const workers = numericConfig(config, 'max_worker_processes', 8);

    const lines = [
      `shared_buffers = ${sharedBuffersMb}MB`,
      `effective_cache_size = ${cacheMb}MB`,
      `work_mem = ${numericConfig(config, 'work_mem_mb', 4)}MB`,
      `maintenance_work_mem = ${numericConfig(config, 'maintenance_work_mem_mb', 64)}MB`,
      `max_connections = ${numericConfig(config, 'max_connections', 100)}`,
      `random_page_cost = ${numericConfig(config, 'random_page_cost', 4)}`,
      `effective_io_concurrency = ${numericConfig(config, 'effective_io_concurrency', 1)}`,
      `wal_buffers = ${numericConfig(config, 'wal_buffers_mb', 16)}MB`,
      `max_wal_size = ${numericConfig(config, 'max_wal_size_gb', 1)}GB`,
      `checkpoint_completion_target = ${numericConfig(config, 'checkpoint_completion_target', 0.9)}`,
      `max_worker_processes = ${workers}`,
      `max_parallel_workers = ${workers}`,
      `max_parallel_workers_per_gather = ${numericConfig(config, 'max_parallel_workers_per_gather', 2)}`
    ];

    return {
      path: '/etc/postgresql/conf.d/cloudtune.conf',
      content: lines.join('\n') + '\n',
      // shared_buffers and max_connections only change on restart
      reloadCommand: 'systemctl restart postgresql'
    };
  },

  readinessCommand(): string {
    return 'pg_isready -q -h localhost';
  },

  prepareCommand(endpoints: Endpoints): string {
    return `pgbench -i -q -s ${PGBENCH_SCALE} -h ${endpoints.serviceHost} -U postgres ${DATABASE} 2>&1`;
  },

  benchmarkCommand(endpoints: Endpoints, workload: WorkloadSpec): string {
    return [
      'pgbench',
      `-h ${endpoints.serviceHost}`,
      '-U postgres',
      `-c ${workload.clients}`,
      `-j ${workload.threads}`,
      `-T ${workload.duration_s}`,
      DATABASE,
      '2>&1'
    ].join(' ');
  },

  parseOutput(output: string): Record<string, number> {
    const [tps] = matchNumbers(output, TPS_PATTERN, 'pgbench tps');
    const latency = optionalNumbers(output, LATENCY_PATTERN);
    const failed = optionalNumbers(output, FAILED_PATTERN);
    return {
      tps,
      ...(latency ? { latency_avg_ms: latency[0] } : {}),
      ...(failed ? { failed_transactions: failed[0] } : {})
    };
  }
};
