/**
 * Meilisearch search engine benchmarked with k6.
 *
 * The prepare step loads and indexes the product dataset; its duration is
 * reported as the `indexing_time` metric.
 */

import type { Endpoints, InfraConfig, ServiceConfig, WorkloadSpec } from '../../src/types/common.js';
import type { CloudProfile } from '../services/pricing/clouds.js';
import { extractJsonObject, numberAt, snippet } from '../engine/output_parsing.js';
import { ParseError } from '../engine/errors.js';
import { categorical, costEfficiencyMetric, heredoc, numericConfig } from './types.js';
import type { RenderedConfig, ServiceTarget, TerraformVars } from './types.js';

const MEILI_PORT = 7700;
const INDEX_NAME = 'products';
const SCRIPT_PATH = '/tmp/cloudtune_search.js';
const SUMMARY_PATH = '/tmp/cloudtune_k6_summary.json';

const K6_SCRIPT = `import http from 'k6/http';
import { check } from 'k6';
import { Trend, Counter } from 'k6/metrics';

const searchLatency = new Trend('search_latency_ms');
const searchErrors = new Counter('search_errors');

const QUERIES = ['laptop', 'phone', 'wireless headphones', 'camra', 'smart tv', 'gaming', 'charger', 'portble speaker'];
const FILTERS = [undefined, 'price < 500', 'in_stock = true AND rating >= 4.5'];

export default function () {
  const body = JSON.stringify({
    q: QUERIES[Math.floor(Math.random() * QUERIES.length)],
    filter: FILTERS[Math.floor(Math.random() * FILTERS.length)],
    limit: 20
  });
  const res = http.post(\`\${__ENV.MEILI_URL}/indexes/${INDEX_NAME}/search\`, body, {
    headers: { 'Content-Type': 'application/json', Authorization: \`Bearer \${__ENV.MEILI_KEY}\` }
  });
  searchLatency.add(res.timings.duration);
  if (!check(res, { 'status is 200': r => r.status === 200 })) {
    searchErrors.add(1);
  }
}`;

export const meilisearchTarget: ServiceTarget = {
  name: 'meilisearch',
  description: 'Meilisearch (k6 search load)',

  infraSpace: {
    cpu: [2, 4, 8, 16, 32],
    ram_gb: [4, 8, 16, 32, 64],
    disk_type: 'all'
  },

  configSpace: [
    categorical('max_indexing_memory_mb', [256, 512, 1024, 2048]),
    categorical('max_indexing_threads', [0, 2, 4, 8], '0 = auto')
  ],

  metrics: [
    { name: 'qps', description: 'Search requests per second', direction: 'maximize', unit: 'req/s', digits: 0 },
    { name: 'p95_ms', description: 'p95 search latency', direction: 'minimize', unit: 'ms', digits: 1 },
    {
      name: 'indexing_time',
      description: 'Dataset indexing time',
      direction: 'minimize',
      unit: 's',
      digits: 1,
      fromTiming: 'prepare_s'
    },
    costEfficiencyMetric('req/s')
  ],

  primaryMetric: 'qps',
  defaultMetric: 'qps',

  defaultConfig: {
    max_indexing_memory_mb: 1024,
    max_indexing_threads: 0
  },

  defaultInfra(profile: CloudProfile): InfraConfig {
    return { cpu: 4, ram_gb: 8, disk_type: profile.default_disk_type };
  },

  terraformVars(infra: InfraConfig, profile: CloudProfile): TerraformVars {
    return {
      meilisearch_enabled: true,
      meilisearch_cpu: infra.cpu,
      meilisearch_ram_gb: infra.ram_gb,
      meilisearch_disk_size_gb: infra.disk_size_gb ?? profile.default_disk_size_gb,
      meilisearch_disk_type: infra.disk_type ?? profile.default_disk_type
    };
  },

  renderConfig(config: ServiceConfig): RenderedConfig {
    const threads = numericConfig(config, 'max_indexing_threads', 0);
    const lines = [
      `MEILI_MAX_INDEXING_MEMORY=${numericConfig(config, 'max_indexing_memory_mb', 1024)}Mb`,
      ...(threads > 0 ? [`MEILI_MAX_INDEXING_THREADS=${threads}`] : [])
    ];
    return {
      path: '/etc/meilisearch.d/tuning.env',
      content: lines.join('\n') + '\n',
      reloadCommand: 'systemctl restart meilisearch'
    };
  },

  readinessCommand(): string {
    return `curl -sf http://localhost:${MEILI_PORT}/health`;
  },

  prepareCommand(endpoints: Endpoints): string {
    // loader and master key are installed on the benchmark host at provision time
    return `/opt/cloudtune/load-products.sh http://${endpoints.serviceHost}:${MEILI_PORT} ${INDEX_NAME} 2>&1`;
  },

  benchmarkCommand(endpoints: Endpoints, workload: WorkloadSpec): string {
    const run = [
      'K6_SUMMARY_TREND_STATS="avg,min,med,max,p(90),p(95),p(99)"',
      `k6 run --quiet ${SCRIPT_PATH}`,
      `-e MEILI_URL=http://${endpoints.serviceHost}:${MEILI_PORT}`,
      '-e MEILI_KEY="$(cat /root/meili-key)"',
      `--vus ${workload.clients}`,
      `--duration ${workload.duration_s}s`,
      `--summary-export=${SUMMARY_PATH}`,
      '>/dev/null',
      `&& cat ${SUMMARY_PATH}`
    ].join(' ');
    // a failed k6 run must exit non-zero and never surface an earlier summary
    return `${heredoc(SCRIPT_PATH, K6_SCRIPT)}\nrm -f ${SUMMARY_PATH}\n${run}`;
  },

  parseOutput(output: string): Record<string, number> {
    const summary = extractJsonObject(output);
    const qps = numberAt(summary, ['metrics', 'http_reqs', 'rate']);
    if (qps === null) {
      throw new ParseError('k6 summary has no http_reqs rate', snippet(output));
    }

    const metrics: Record<string, number> = { qps };
    const latency: Array<[string, string]> = [
      ['p50_ms', 'med'],
      ['p95_ms', 'p(95)'],
      ['p99_ms', 'p(99)']
    ];
    for (const [name, stat] of latency) {
      const value = numberAt(summary, ['metrics', 'search_latency_ms', stat]);
      if (value !== null) {
        metrics[name] = value;
      }
    }

    const total = numberAt(summary, ['metrics', 'http_reqs', 'count']);
    const errors = numberAt(summary, ['metrics', 'search_errors', 'count']) ?? 0;
    if (total !== null && total > 0) {
      metrics.error_rate = errors / total;
    }
    return metrics;
  }
};
