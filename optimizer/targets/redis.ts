/**
 * Redis cache benchmarked with memtier_benchmark.
 *
 * Single node or a three-node sentinel group. Config lands in an include
 * file and is applied with a service restart.
 */

import type { Endpoints, InfraConfig, ServiceConfig, WorkloadSpec } from '../../src/types/common.js';
import { matchNumbers } from '../engine/output_parsing.js';
import { categorical, costEfficiencyMetric, numericConfig } from './types.js';
import type { RenderedConfig, ServiceTarget, TerraformVars } from './types.js';

// Type  Ops/sec  Hits/sec  Misses/sec  Avg. Latency  p50  p99  p99.9  KB/sec
const TOTALS_PATTERN =
  /Totals\s+([\d.]+)\s+[\d.]+\s+[\d.]+\s+([\d.]+)\s+([\d.]+)\s+([\d.]+)\s+([\d.]+)\s+([\d.]+)/;

/** Share of VM memory handed to maxmemory */
const MAXMEMORY_SHARE = 0.75;

export const redisTarget: ServiceTarget = {
  name: 'redis',
  description: 'Redis cache (memtier_benchmark, 1:4 SET:GET)',

  infraSpace: {
    topology: {
      choices: ['single', 'sentinel'],
      nodes: { single: 1, sentinel: 3 }
    },
    cpu: [2, 4, 8],
    ram_gb: [4, 8, 16, 32]
  },

  configSpace: [
    categorical('maxmemory_policy', ['allkeys-lru', 'volatile-lru'], 'Eviction policy'),
    categorical('io_threads', [1, 2, 4], 'Redis I/O threads'),
    categorical('persistence', ['none', 'rdb'], 'Snapshotting')
  ],

  metrics: [
    { name: 'ops_per_sec', description: 'Operations per second', direction: 'maximize', unit: 'ops/s', digits: 0 },
    { name: 'p99_latency_ms', description: 'p99 latency', direction: 'minimize', unit: 'ms', digits: 2 },
    { name: 'avg_latency_ms', description: 'Average latency', direction: 'minimize', unit: 'ms', digits: 2 },
    costEfficiencyMetric('ops/s')
  ],

  primaryMetric: 'ops_per_sec',
  defaultMetric: 'ops_per_sec',

  defaultConfig: {
    maxmemory_policy: 'allkeys-lru',
    io_threads: 1,
    persistence: 'none'
  },

  defaultInfra(): InfraConfig {
    return { topology: 'single', nodes: 1, cpu: 2, ram_gb: 4 };
  },

  terraformVars(infra: InfraConfig): TerraformVars {
    return {
      redis_enabled: true,
      redis_mode: infra.topology ?? 'single',
      redis_node_cpu: infra.cpu,
      redis_node_ram_gb: infra.ram_gb
    };
  },

  renderConfig(config: ServiceConfig, infra: InfraConfig): RenderedConfig {
    const maxmemoryMb = Math.floor(infra.ram_gb * 1024 * MAXMEMORY_SHARE);
    const ioThreads = numericConfig(config, 'io_threads', 1);
    const lines = [
      `maxmemory ${maxmemoryMb}mb`,
      `maxmemory-policy ${String(config.maxmemory_policy ?? 'allkeys-lru')}`,
      `io-threads ${ioThreads}`,
      `io-threads-do-reads ${ioThreads > 1 ? 'yes' : 'no'}`,
      'appendonly no',
      config.persistence === 'rdb' ? 'save 900 1 300 10' : 'save ""'
    ];
    return {
      path: '/etc/redis/cloudtune.conf',
      content: lines.join('\n') + '\n',
      reloadCommand: 'systemctl restart redis-server'
    };
  },

  readinessCommand(): string {
    return 'test -f /root/redis-ready && redis-cli ping | grep -q PONG';
  },

  benchmarkCommand(endpoints: Endpoints, workload: WorkloadSpec): string {
    return [
      'memtier_benchmark',
      `--server=${endpoints.serviceHost}`,
      '--port=6379',
      `--clients=${workload.clients}`,
      `--threads=${workload.threads}`,
      '--ratio=1:4',
      '--key-pattern=R:R',
      '--key-minimum=1',
      '--key-maximum=10000000',
      '--data-size=256',
      `--test-time=${workload.duration_s}`,
      '--hide-histogram',
      '2>&1'
    ].join(' ');
  },

  parseOutput(output: string): Record<string, number> {
    const [opsPerSec, avg, p50, p99, p999, kbPerSec] = matchNumbers(output, TOTALS_PATTERN, 'memtier Totals line');
    return {
      ops_per_sec: opsPerSec,
      avg_latency_ms: avg,
      p50_latency_ms: p50,
      p99_latency_ms: p99,
      p999_latency_ms: p999,
      kb_per_sec: kbPerSec
    };
  }
};

