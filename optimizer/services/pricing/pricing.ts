/**
 * Pricing Oracle
 *
 * Pure functions from a resource shape to a monthly cost and to validity
 * under the cloud's CPU/RAM constraints.
 */

import type { CloudId, InfraConfig } from '../../../src/types/common.js';
import { getCloudProfile } from './clouds.js';
import type { CloudProfile } from './clouds.js';

export const HOURS_PER_MONTH = 730;

/** Rate applied to disk types missing from a cloud's table */
const UNKNOWN_DISK_RATE = 0.01;

export interface DiskSpec {
  size_gb: number;
  disk_type: string;
  count: number;
}

export interface ResourceSpec {
  cpu: number;
  ram_gb: number;
  /** Number of identical nodes */
  nodes: number;
  /** Disks attached to each node */
  disks: DiskSpec[];
}

function profileOf(cloud: CloudId | CloudProfile): CloudProfile {
  return typeof cloud === 'string' ? getCloudProfile(cloud) : cloud;
}

/**
 * Monthly cost in the cloud's currency:
 * nodes × (cpu × cpu_rate + ram × ram_rate + Σ size × count × disk_rate)
 */
export function monthlyCost(cloud: CloudId | CloudProfile, spec: ResourceSpec): number {
  const profile = profileOf(cloud);

  const diskCost = spec.disks.reduce((sum, disk) => {
    const rate = profile.disk_rates[disk.disk_type] ?? UNKNOWN_DISK_RATE;
    return sum + disk.size_gb * disk.count * rate;
  }, 0);

  return spec.nodes * (spec.cpu * profile.cpu_rate + spec.ram_gb * profile.ram_rate + diskCost);
}

export function hourlyCost(cloud: CloudId | CloudProfile, spec: ResourceSpec): number {
  return monthlyCost(cloud, spec) / HOURS_PER_MONTH;
}

/**
 * Resource shape of an InfraConfig with one disk per drive. Fields the
 * config leaves out fall back to one node and the cloud's default disk.
 */
export function resourcesOf(cloud: CloudId | CloudProfile, infra: InfraConfig): ResourceSpec {
  const profile = profileOf(cloud);
  return {
    cpu: infra.cpu,
    ram_gb: infra.ram_gb,
    nodes: infra.nodes ?? 1,
    disks: [{
      size_gb: infra.disk_size_gb ?? profile.default_disk_size_gb,
      disk_type: infra.disk_type ?? profile.default_disk_type,
      count: infra.drives ?? 1
    }]
  };
}

export function minRamFor(cloud: CloudId | CloudProfile, cpu: number): number {
  return profileOf(cloud).min_ram_by_cpu[cpu] ?? 0;
}

/**
 * Keeps the RAM candidates allowed at `cpu`. May return an empty list.
 */
export function validRamOptions(cloud: CloudId | CloudProfile, cpu: number, candidates: readonly number[]): number[] {
  const minRam = minRamFor(cloud, cpu);
  return candidates.filter(ram => ram >= minRam);
}

/**
 * Keeps the CPU candidates that leave at least one valid RAM option.
 */
export function validCpuOptions(
  cloud: CloudId | CloudProfile,
  cpus: readonly number[],
  ramCandidates: readonly number[]
): number[] {
  return cpus.filter(cpu => validRamOptions(cloud, cpu, ramCandidates).length > 0);
}

/**
 * @returns a violation message, or null when the shape is allowed
 */
export function validateInfra(cloud: CloudId | CloudProfile, infra: Pick<InfraConfig, 'cpu' | 'ram_gb'>): string | null {
  const profile = profileOf(cloud);
  const minRam = minRamFor(profile, infra.cpu);
  if (infra.ram_gb < minRam) {
    return `${infra.cpu} vCPU requires min ${minRam}GB RAM on ${profile.id}`;
  }
  return null;
}
