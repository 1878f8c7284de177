/**
 * Space Resolver
 *
 * Turns oracle suggestions into a concrete (infra, config) pair for the
 * study's mode. Infrastructure tiers come first so RAM choices can be
 * filtered by the cloud's per-CPU minimum before they are offered.
 */

import type {
  Distribution,
  InfraConfig,
  OptimizationMode,
  ParamValue,
  ResultRecord,
  ServiceConfig,
  TrialSpec
} from '../../src/types/common.js';
import type { CloudProfile } from '../services/pricing/clouds.js';
import { diskTypes } from '../services/pricing/clouds.js';
import { validCpuOptions, validRamOptions, validateInfra } from '../services/pricing/pricing.js';
import { cacheKey } from '../services/results/store.js';
import { contains } from '../services/study/distributions.js';
import type { ServiceTarget } from '../targets/types.js';
import { InvalidParameterSpaceError } from './errors.js';
import { dependentName } from './search_driver.js';
import type { HistoryEntry } from './search_driver.js';

/**
 * What the resolver needs from a trial. TrialHandle satisfies it; so does
 * the replay used to fit cached results into the space.
 */
export interface Suggester {
  readonly params: Record<string, ParamValue>;
  readonly distributions: Record<string, Distribution>;
  suggestCategorical<T extends ParamValue>(name: string, choices: readonly T[]): Promise<T>;
  suggestDependent<T extends ParamValue>(
    name: string,
    parent: string,
    parentValue: ParamValue,
    choices: readonly T[]
  ): Promise<T>;
  suggest(name: string, distribution: Distribution): Promise<ParamValue>;
}

export interface ResolverOptions {
  target: ServiceTarget;
  profile: CloudProfile;
  mode: OptimizationMode;
  /** Pinned from the command line, never searched */
  fixedInfra?: Partial<Pick<InfraConfig, 'cpu' | 'ram_gb'>>;
}

class OutsideSpaceError extends Error {
  constructor(name: string) {
    super(`Value for ${name} is outside the search space`);
    this.name = 'OutsideSpaceError';
  }
}

/**
 * Answers suggestions from a stored record instead of an oracle
 */
class ReplaySuggester implements Suggester {
  readonly params: Record<string, ParamValue> = {};
  readonly distributions: Record<string, Distribution> = {};

  constructor(private values: Record<string, ParamValue>) {}

  async suggestCategorical<T extends ParamValue>(name: string, choices: readonly T[]): Promise<T> {
    return this.pick(name, name, choices);
  }

  async suggestDependent<T extends ParamValue>(
    name: string,
    parent: string,
    parentValue: ParamValue,
    choices: readonly T[]
  ): Promise<T> {
    return this.pick(dependentName(name, parent, parentValue), name, choices);
  }

  async suggest(name: string, distribution: Distribution): Promise<ParamValue> {
    const value = this.values[name];
    if (value === undefined || !contains(distribution, value)) {
      throw new OutsideSpaceError(name);
    }
    this.params[name] = value;
    this.distributions[name] = distribution;
    return value;
  }

  private pick<T extends ParamValue>(registered: string, field: string, choices: readonly T[]): T {
    const match = choices.find(choice => choice === this.values[field]);
    if (match === undefined) {
      throw new OutsideSpaceError(field);
    }
    this.params[registered] = match;
    this.distributions[registered] = { type: 'categorical', choices: [...choices] };
    return match;
  }
}

export class SpaceResolver {
  private ramIsDependent: boolean;

  constructor(private options: ResolverOptions) {
    const { cpu, ram_gb } = options.target.infraSpace;
    // one RAM parameter suffices when no CPU choice narrows the RAM set
    this.ramIsDependent = cpu.some(value => validRamOptions(options.profile, value, ram_gb).length !== ram_gb.length);
  }

  get searchesInfra(): boolean {
    return this.options.mode !== 'config';
  }

  get searchesConfig(): boolean {
    return this.options.mode !== 'infra';
  }

  /**
   * @throws InvalidParameterSpaceError when the space or pinned shape is unusable
   */
  async resolve(suggester: Suggester): Promise<TrialSpec> {
    const infra = this.searchesInfra ? await this.resolveInfra(suggester) : this.fixedInfra();
    const config = this.searchesConfig ? await this.resolveConfig(suggester) : { ...this.options.target.defaultConfig };
    return { cloud: this.options.profile.id, infra, config };
  }

  /**
   * Fits a cached result into the current space, or null when it does not
   * belong there (other mode, pinned values or choices)
   */
  async historyEntry(record: ResultRecord, value: number): Promise<HistoryEntry | null> {
    if (record.cloud !== this.options.profile.id) {
      return null;
    }
    const replay = new ReplaySuggester({ ...record.infra, ...record.config });
    let spec: TrialSpec;
    try {
      spec = await this.resolve(replay);
    } catch (error) {
      if (error instanceof OutsideSpaceError || error instanceof InvalidParameterSpaceError) {
        return null;
      }
      throw error;
    }

    const key = cacheKey(record);
    if (cacheKey(spec) !== key) {
      return null;
    }
    return { params: replay.params, distributions: replay.distributions, value, cacheKey: key };
  }

  /**
   * Infrastructure used when the mode does not search it
   */
  fixedInfra(): InfraConfig {
    const infra: InfraConfig = {
      ...this.options.target.defaultInfra(this.options.profile),
      ...this.options.fixedInfra
    };
    const violation = validateInfra(this.options.profile, infra);
    if (violation) {
      throw new InvalidParameterSpaceError(violation);
    }
    return infra;
  }

  private async resolveInfra(suggester: Suggester): Promise<InfraConfig> {
    const { profile, target } = this.options;
    const space = target.infraSpace;
    const fixed = this.options.fixedInfra ?? {};
    const infra: Partial<InfraConfig> = {};

    if (space.topology) {
      const topology = await suggester.suggestCategorical('topology', space.topology.choices);
      infra.topology = topology;
      infra.nodes = space.topology.nodes[topology] ?? 1;
    } else if (space.nodes) {
      infra.nodes = await suggester.suggestCategorical('nodes', space.nodes);
    }

    const ramCandidates = fixed.ram_gb !== undefined ? [fixed.ram_gb] : space.ram_gb;
    const cpu = fixed.cpu ?? await suggester.suggestCategorical(
      'cpu',
      validCpuOptions(profile, space.cpu, ramCandidates)
    );

    let ram: number;
    if (fixed.ram_gb !== undefined) {
      ram = fixed.ram_gb;
    } else {
      const choices = validRamOptions(profile, cpu, space.ram_gb);
      ram = this.ramIsDependent
        ? await suggester.suggestDependent('ram_gb', 'cpu', cpu, choices)
        : await suggester.suggestCategorical('ram_gb', choices);
    }

    const violation = validateInfra(profile, { cpu, ram_gb: ram });
    if (violation) {
      throw new InvalidParameterSpaceError(violation);
    }

    if (space.disk_type === 'all') {
      infra.disk_type = await suggester.suggestCategorical('disk_type', diskTypes(profile));
    } else if (space.disk_type === 'default') {
      infra.disk_type = profile.default_disk_type;
    }
    if (space.disk_size_gb) {
      infra.disk_size_gb = await suggester.suggestCategorical('disk_size_gb', space.disk_size_gb);
    }
    if (space.drives) {
      infra.drives = await suggester.suggestCategorical('drives', space.drives);
    }

    return { ...infra, cpu, ram_gb: ram };
  }

  private async resolveConfig(suggester: Suggester): Promise<ServiceConfig> {
    const config: ServiceConfig = {};
    for (const param of this.options.target.configSpace) {
      config[param.name] = await suggester.suggest(param.name, param.distribution);
    }
    return config;
  }
}
