/**
 * Per-cloud pricing rates and shape constraints, resolved once at study start.
 */

import type { CloudId } from '../../../src/types/common.js';
import { InvalidParameterSpaceError } from '../../engine/errors.js';

export interface CloudProfile {
  readonly id: CloudId;
  readonly currency: string;
  /** Per vCPU per month */
  readonly cpu_rate: number;
  /** Per GB of RAM per month */
  readonly ram_rate: number;
  /** Per GB of disk per month, keyed by disk type */
  readonly disk_rates: Readonly<Record<string, number>>;
  readonly default_disk_type: string;
  readonly default_disk_size_gb: number;
  /** Minimum RAM in GB for an exact vCPU count */
  readonly min_ram_by_cpu: Readonly<Record<number, number>>;
}

export const CLOUD_PROFILES: Readonly<Record<CloudId, CloudProfile>> = {
  selectel: {
    id: 'selectel',
    currency: '₽',
    cpu_rate: 655,
    ram_rate: 238,
    disk_rates: {
      fast: 39,
      universal: 18,
      universal2: 9,
      basicssd: 9,
      basic: 7
    },
    default_disk_type: 'fast',
    default_disk_size_gb: 50,
    min_ram_by_cpu: {
      2: 2,
      4: 4,
      8: 8,
      16: 32,
      32: 64
    }
  },
  timeweb: {
    id: 'timeweb',
    currency: '₽',
    cpu_rate: 220,
    ram_rate: 180,
    disk_rates: {
      nvme: 5,
      ssd: 4,
      hdd: 2
    },
    default_disk_type: 'nvme',
    default_disk_size_gb: 50,
    min_ram_by_cpu: {}
  }
};

export function isCloudId(value: string): value is CloudId {
  return Object.prototype.hasOwnProperty.call(CLOUD_PROFILES, value);
}

export function listClouds(): CloudId[] {
  return Object.values(CLOUD_PROFILES).map(profile => profile.id);
}

/**
 * @throws InvalidParameterSpaceError for an unknown cloud
 */
export function getCloudProfile(cloud: string): CloudProfile {
  if (!isCloudId(cloud)) {
    throw new InvalidParameterSpaceError(
      `Unknown cloud: ${cloud}. Available: ${listClouds().join(', ')}`
    );
  }
  return CLOUD_PROFILES[cloud];
}

export function diskTypes(profile: CloudProfile): string[] {
  return Object.keys(profile.disk_rates);
}
