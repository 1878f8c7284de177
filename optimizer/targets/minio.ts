/**
 * MinIO object store benchmarked with `warp mixed`.
 */

import type { Endpoints, InfraConfig, ServiceConfig, WorkloadSpec } from '../../src/types/common.js';
import type { CloudProfile } from '../services/pricing/clouds.js';
import { matchNumbers, optionalNumbers } from '../engine/output_parsing.js';
import { categorical, costEfficiencyMetric, numericConfig } from './types.js';
import type { RenderedConfig, ServiceTarget, TerraformVars } from './types.js';

// Operation: GET, 70%, Concurrency: 20, Ran 29s.
//  * Throughput: 305.61 MiB/s, 305.61 obj/s
const GET_PATTERN = /Operation:\s*GET.*?Throughput:\s*([\d.]+)\s*MiB\/s,\s*([\d.]+)\s*obj\/s/is;
const PUT_PATTERN = /Operation:\s*PUT.*?Throughput:\s*([\d.]+)\s*MiB\/s,\s*([\d.]+)\s*obj\/s/is;
const TOTAL_PATTERN = /Cluster Total:\s*([\d.]+)\s*MiB\/s,\s*([\d.]+)\s*obj\/s/i;

const MINIO_PORT = 9000;

/**
 * Parity only applies when the erasure set has room for it
 */
export function effectiveParity(parity: number, totalDrives: number): number {
  return parity > 0 && totalDrives >= 2 * parity ? parity : 0;
}

export const minioTarget: ServiceTarget = {
  name: 'minio',
  description: 'MinIO object storage (warp mixed)',

  infraSpace: {
    nodes: [1, 2, 3, 4],
    cpu: [2, 4, 8],
    ram_gb: [4, 8, 16, 32],
    drives: [1, 2, 3, 4],
    disk_size_gb: [100, 200],
    disk_type: 'all'
  },

  configSpace: [
    categorical('api_requests_max', [0, 256, 512, 1024], 'Concurrent S3 requests, 0 = auto'),
    categorical('storage_class_parity', [0, 1, 2], 'EC parity for STANDARD, 0 = server default'),
    categorical('compression', ['off', 'on'])
  ],

  metrics: [
    { name: 'total_mib_s', description: 'Cluster throughput', direction: 'maximize', unit: 'MiB/s', digits: 1 },
    { name: 'get_mib_s', description: 'GET throughput', direction: 'maximize', unit: 'MiB/s', digits: 1 },
    { name: 'put_mib_s', description: 'PUT throughput', direction: 'maximize', unit: 'MiB/s', digits: 1 },
    costEfficiencyMetric('MiB/s')
  ],

  primaryMetric: 'total_mib_s',
  defaultMetric: 'total_mib_s',

  defaultConfig: {
    api_requests_max: 0,
    storage_class_parity: 0,
    compression: 'off'
  },

  defaultInfra(profile: CloudProfile): InfraConfig {
    return {
      nodes: 1,
      cpu: 2,
      ram_gb: 4,
      drives: 1,
      disk_size_gb: 100,
      disk_type: profile.default_disk_type
    };
  },

  terraformVars(infra: InfraConfig, profile: CloudProfile): TerraformVars {
    return {
      minio_enabled: true,
      minio_node_count: infra.nodes ?? 1,
      minio_node_cpu: infra.cpu,
      minio_node_ram_gb: infra.ram_gb,
      minio_drives_per_node: infra.drives ?? 1,
      minio_drive_size_gb: infra.disk_size_gb ?? profile.default_disk_size_gb,
      minio_drive_type: infra.disk_type ?? profile.default_disk_type
    };
  },

  renderConfig(config: ServiceConfig, infra: InfraConfig): RenderedConfig {
    const totalDrives = (infra.nodes ?? 1) * (infra.drives ?? 1);
    const parity = effectiveParity(numericConfig(config, 'storage_class_parity', 0), totalDrives);
    const requestsMax = numericConfig(config, 'api_requests_max', 0);

    const lines = [
      `MINIO_COMPRESSION_ENABLE=${config.compression === 'on' ? 'on' : 'off'}`,
      ...(requestsMax > 0 ? [`MINIO_API_REQUESTS_MAX=${requestsMax}`] : []),
      ...(parity > 0 ? [`MINIO_STORAGE_CLASS_STANDARD=EC:${parity}`] : [])
    ];

    return {
      path: '/etc/default/minio.tuning',
      content: lines.join('\n') + '\n',
      reloadCommand: 'systemctl restart minio'
    };
  },

  readinessCommand(): string {
    return `curl -sf http://localhost:${MINIO_PORT}/minio/health/live`;
  },

  benchmarkCommand(endpoints: Endpoints, workload: WorkloadSpec): string {
    const hosts = endpoints.nodeHosts.length > 0 ? endpoints.nodeHosts : [endpoints.serviceHost];
    return [
      // credentials are placed on the benchmark host at provision time
      'set -a && . /root/warp.env && set +a &&',
      'warp mixed',
      `--host=${hosts.map(host => `${host}:${MINIO_PORT}`).join(',')}`,
      `--concurrent=${workload.clients}`,
      `--duration=${workload.duration_s}s`,
      '--get-distrib 60',
      '--stat-distrib 25',
      '--put-distrib 10',
      '--delete-distrib 5',
      '--noclear',
      '2>&1'
    ].join(' ');
  },

  parseOutput(output: string): Record<string, number> {
    const [totalMib, totalObj] = matchNumbers(output, TOTAL_PATTERN, 'warp Cluster Total');
    const get = optionalNumbers(output, GET_PATTERN);
    const put = optionalNumbers(output, PUT_PATTERN);
    return {
      total_mib_s: totalMib,
      total_obj_s: totalObj,
      ...(get ? { get_mib_s: get[0], get_obj_s: get[1] } : {}),
      ...(put ? { put_mib_s: put[0], put_obj_s: put[1] } : {})
    };
  }
};
