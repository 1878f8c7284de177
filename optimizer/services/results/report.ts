/**
 * Result reporting: terminal table and markdown export of the cache file
 */

import * as path from 'path';
import Table from 'cli-table3';
import type { InfraConfig, MetricDefinition, ResultRecord, ServiceConfig } from '../../../src/types/common.js';
import { writeFileAtomic } from '../../../src/utils/filesystem.js';
import { Logger } from '../../../src/utils/logger.js';
import { findMetric, isBetter, scoreMetric } from '../../engine/scoring.js';
import type { ServiceTarget } from '../../targets/types.js';
import type { CloudProfile } from '../pricing/clouds.js';
import { monthlyCost, resourcesOf } from '../pricing/pricing.js';
import { isUsable } from './store.js';
import type { AppendListener, ResultStore } from './store.js';

export interface ReportRow {
  index: number;
  mode: string;
  infra: string;
  config: string;
  metrics: Record<string, number | null>;
  monthlyCost: number;
}

export interface BestByMetric {
  metric: MetricDefinition;
  value: number;
  infra: string;
  config: string;
}

export interface ResultsReport {
  service: string;
  cloud: string;
  currency: string;
  metrics: MetricDefinition[];
  rows: ReportRow[];
  best: BestByMetric[];
}

export function summarizeInfra(infra: InfraConfig): string {
  const parts = [
    ...(infra.topology ? [infra.topology] : []),
    `${infra.nodes ?? 1}x ${infra.cpu}cpu/${infra.ram_gb}GB`
  ];
  if (infra.disk_size_gb !== undefined || infra.disk_type !== undefined) {
    const drives = infra.drives !== undefined && infra.drives > 1 ? `${infra.drives}x` : '';
    parts.push(`${drives}${infra.disk_size_gb ?? '?'}GB ${infra.disk_type ?? ''}`.trim());
  }
  return parts.join(' ');
}

export function summarizeConfig(config: ServiceConfig): string {
  const entries = Object.entries(config);
  return entries.length === 0 ? '-' : entries.map(([key, value]) => `${key}=${String(value)}`).join(', ');
}

export function formatValue(metric: MetricDefinition, value: number | null): string {
  return value === null ? '-' : value.toFixed(metric.digits);
}

/**
 * Usable records for one cloud, best primary metric first
 */
export function buildReport(target: ServiceTarget, profile: CloudProfile, records: ResultRecord[]): ResultsReport {
  const primary = findMetric(target, target.primaryMetric);
  const usable = records.filter(record => record.cloud === profile.id && isUsable(record, target.primaryMetric));

  const scored = usable.map(record => ({
    record,
    metrics: Object.fromEntries(
      target.metrics.map(metric => [metric.name, scoreMetric(target, profile, metric.name, record.metrics, record.infra)])
    )
  }));

  scored.sort((a, b) => {
    const left = a.metrics[primary.name] ?? 0;
    const right = b.metrics[primary.name] ?? 0;
    return primary.direction === 'maximize' ? right - left : left - right;
  });

  const rows = scored.map(({ record, metrics }, i): ReportRow => ({
    index: i + 1,
    mode: record.mode ?? '-',
    infra: summarizeInfra(record.infra),
    config: summarizeConfig(record.config),
    metrics,
    monthlyCost: monthlyCost(profile, resourcesOf(profile, record.infra))
  }));

  const best: BestByMetric[] = [];
  for (const metric of target.metrics) {
    let winner: ReportRow | null = null;
    let winnerValue = 0;
    for (const row of rows) {
      const value = row.metrics[metric.name];
      if (value === null || value === undefined) continue;
      if (winner === null || isBetter(metric.direction, value, winnerValue)) {
        winner = row;
        winnerValue = value;
      }
    }
    if (winner) {
      best.push({ metric, value: winnerValue, infra: winner.infra, config: winner.config });
    }
  }

  return {
    service: target.name,
    cloud: profile.id,
    currency: profile.currency,
    metrics: target.metrics,
    rows,
    best
  };
}

export function renderTable(report: ResultsReport): string {
  const table = new Table({
    head: [
      '#',
      'Mode',
      'Infra',
      'Config',
      ...report.metrics.map(metric => `${metric.name} (${metric.unit})`),
      `Cost/mo (${report.currency})`
    ],
    style: { head: [], border: [] }
  });

  for (const row of report.rows) {
    table.push([
      row.index,
      row.mode,
      row.infra,
      row.config,
      ...report.metrics.map(metric => formatValue(metric, row.metrics[metric.name] ?? null)),
      row.monthlyCost.toFixed(0)
    ]);
  }

  return table.toString();
}

export function renderBest(report: ResultsReport): string[] {
  return report.best.map(({ metric, value, infra, config }) =>
    `Best by ${metric.name}: ${formatValue(metric, value)} ${metric.unit} [${infra}; ${config}]`
  );
}

export function renderMarkdown(report: ResultsReport, generatedAt: Date): string {
  const title = `# ${report.service} benchmark results - ${report.cloud}`;
  const head = ['#', 'Mode', 'Infra', 'Config', ...report.metrics.map(m => `${m.name} (${m.unit})`), `Cost/mo (${report.currency})`];
  const align = ['--:', '---', '---', '---', ...report.metrics.map(() => '--:'), '--:'];

  const lines = [
    title,
    '',
    `Generated: ${generatedAt.toISOString()}`,
    '',
    '## Results',
    '',
    `| ${head.join(' | ')} |`,
    `|${align.join('|')}|`,
    ...report.rows.map(row => {
      const cells = [
        String(row.index),
        row.mode,
        row.infra,
        row.config,
        ...report.metrics.map(metric => formatValue(metric, row.metrics[metric.name] ?? null)),
        row.monthlyCost.toFixed(0)
      ];
      return `| ${cells.join(' | ')} |`;
    }),
    '',
    '## Best configurations',
    '',
    ...report.best.map(({ metric, value, infra, config }) =>
      `- **${metric.name}:** ${formatValue(metric, value)} ${metric.unit} (${infra}; \`${config}\`)`
    ),
    ''
  ];
  return lines.join('\n');
}

export function markdownPath(dir: string, service: string, cloud: string): string {
  return path.join(dir, `RESULTS_${service.toUpperCase()}_${cloud.toUpperCase()}.md`);
}

/**
 * Writes the markdown report next to the cache file
 *
 * @returns the written path, or null when there is nothing to report
 */
export async function exportMarkdown(
  store: ResultStore,
  target: ServiceTarget,
  profile: CloudProfile,
  now: Date = new Date()
): Promise<string | null> {
  const report = buildReport(target, profile, await store.records({ cloud: profile.id }));
  if (report.rows.length === 0) {
    return null;
  }

  const outputPath = markdownPath(path.dirname(store.filePath), target.name, profile.id);
  await writeFileAtomic(outputPath, renderMarkdown(report, now));
  Logger.debug('Exported results', { path: outputPath, rows: report.rows.length });
  return outputPath;
}

/**
 * Append hook that refreshes the markdown report after every trial
 */
export function markdownExporter(target: ServiceTarget, profile: CloudProfile): AppendListener {
  return async (store, record) => {
    if (record.cloud === profile.id) {
      await exportMarkdown(store, target, profile);
    }
  };
}
