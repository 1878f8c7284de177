/**
 * Infrastructure Broker
 *
 * Ensures a reachable deployment matching the requested infrastructure
 * exists, reusing the current one whenever its reported specs match.
 * A mismatch costs exactly one service release and one apply; the benchmark
 * host lives for the whole study and goes only with `teardown`.
 */

import type {
  CloudId,
  CloudtuneConfig,
  Deployment,
  Endpoints,
  InfraConfig,
  PhaseTimings
} from '../../../src/types/common.js';
import { INFRA_FIELDS } from '../../../src/types/common.js';
import { Logger } from '../../../src/utils/logger.js';
import { OptimizerError, ProvisioningError, toError } from '../../engine/errors.js';
import { pollUntil, sleep } from '../../engine/polling.js';
import type { Sleeper } from '../../engine/polling.js';
import type { CloudProfile } from '../pricing/clouds.js';
import { enabledVar } from '../../targets/types.js';
import type { ServiceTarget, TerraformVars } from '../../targets/types.js';
import type { DeploymentOutputs, ProvisioningBackend } from './terraform_backend.js';
import type { RemoteShell } from './remote_shell.js';

export const READY_MARKER = '/root/cloud-init-ready';

export interface BrokerOptions {
  profile: CloudProfile;
  target: ServiceTarget;
  backend: ProvisioningBackend;
  shell: RemoteShell;
  timeouts: CloudtuneConfig['timeouts'];
  /** Existing load generator; terraform then creates none */
  benchmarkHost?: string;
  sleep?: Sleeper;
  now?: () => number;
}

export interface EnsureResult {
  endpoints: Endpoints;
  timings: PhaseTimings;
  reused: boolean;
  deployment: Deployment;
}

/**
 * Fields of `infra` that differ from the reported specs. Values compare as
 * strings; only fields present in the request are checked.
 */
export function specMismatches(infra: InfraConfig, specs: Record<string, string>): string[] {
  return INFRA_FIELDS.filter(field => {
    const requested = infra[field];
    return requested !== undefined && specs[field] !== String(requested);
  });
}

export class InfrastructureBroker {
  private deployment: Deployment | null = null;
  private sleep: Sleeper;
  private now: () => number;

  constructor(private options: BrokerOptions) {
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
  }

  get cloud(): CloudId {
    return this.options.profile.id;
  }

  /**
   * @throws ProvisioningError when no reachable, ready deployment results
   */
  async ensure(infra: InfraConfig, signal?: AbortSignal): Promise<EnsureResult> {
    try {
      return await this.ensureDeployment(infra, signal);
    } catch (error) {
      if (error instanceof OptimizerError) {
        throw error;
      }
      throw new ProvisioningError(`Provisioning failed: ${toError(error).message}`, toError(error));
    }
  }

  /**
   * Destroys whatever is deployed, benchmark host included. Safe to call
   * when nothing is.
   */
  async teardown(signal?: AbortSignal): Promise<void> {
    Logger.info('Tearing down deployment', { cloud: this.cloud, host: this.deployment?.endpoints.serviceHost });
    await this.options.backend.destroy(signal);
    this.deployment = null;
  }

  private async ensureDeployment(infra: InfraConfig, signal?: AbortSignal): Promise<EnsureResult> {
    const existing = await this.options.backend.readOutputs(signal);

    if (existing) {
      const reachable = await this.isReachable(existing.endpoints, signal);
      const mismatches = specMismatches(infra, existing.specs);

      if (reachable && mismatches.length === 0) {
        Logger.info('Reusing deployment', { cloud: this.cloud, host: existing.endpoints.serviceHost });
        const deployment = this.remember(infra, existing);
        return { endpoints: deployment.endpoints, timings: {}, reused: true, deployment };
      }

      this.deployment = null;
      if (reachable) {
        Logger.info('Replacing service VMs', { cloud: this.cloud, reason: `specs differ: ${mismatches.join(', ')}` });
        await this.options.backend.releaseService(
          { ...this.benchmarkVars(), [enabledVar(this.options.target.name)]: false },
          signal
        );
      } else {
        Logger.info('Replacing deployment', { cloud: this.cloud, reason: 'unreachable' });
        await this.options.backend.destroy(signal);
      }
    }

    const started = this.now();
    await this.options.backend.apply(
      { ...this.options.target.terraformVars(infra, this.options.profile), ...this.benchmarkVars() },
      signal
    );
    const outputs = await this.options.backend.readOutputs(signal);
    if (!outputs) {
      throw new ProvisioningError('Terraform apply finished without a service_host output');
    }
    const provisioned = this.now();

    await this.waitForMarker(outputs.endpoints, signal);
    const ready = this.now();

    const deployment = this.remember(infra, outputs);
    Logger.info('Deployment ready', {
      cloud: this.cloud,
      host: outputs.endpoints.serviceHost,
      provision_s: (provisioned - started) / 1000
    });

    return {
      endpoints: deployment.endpoints,
      timings: {
        provision_s: (provisioned - started) / 1000,
        vm_ready_s: (ready - provisioned) / 1000
      },
      reused: false,
      deployment
    };
  }

  private benchmarkVars(): TerraformVars {
    return this.options.benchmarkHost ? { benchmark_enabled: false } : {};
  }

  private remember(infra: InfraConfig, outputs: DeploymentOutputs): Deployment {
    const { benchmarkHost } = this.options;
    const deployment: Deployment = {
      cloud: this.cloud,
      infra: { ...infra },
      endpoints: benchmarkHost ? { ...outputs.endpoints, benchmarkHost } : outputs.endpoints,
      specs: outputs.specs,
      created_at: this.deployment?.created_at ?? new Date(this.now()).toISOString()
    };
    this.deployment = deployment;
    return deployment;
  }

  private async isReachable(endpoints: Endpoints, signal?: AbortSignal): Promise<boolean> {
    const result = await this.options.shell.run(endpoints.serviceHost, 'echo ok', {
      timeoutMs: this.options.timeouts.command_s * 1000,
      signal,
      jumpHost: endpoints.jumpHost
    });
    return result.exitCode === 0 && result.stdout.trim() === 'ok';
  }

  private async waitForMarker(endpoints: Endpoints, signal?: AbortSignal): Promise<void> {
    const pending = new Set(
      this.options.benchmarkHost ? endpoints.nodeHosts : [...endpoints.nodeHosts, endpoints.benchmarkHost]
    );
    const { vm_ready_s, poll_interval_s, command_s } = this.options.timeouts;

    const ready = await pollUntil(
      { timeoutS: vm_ready_s, intervalS: poll_interval_s, sleep: this.sleep, signal },
      async () => {
        for (const host of [...pending]) {
          const result = await this.options.shell.run(host, `test -f ${READY_MARKER}`, {
            timeoutMs: command_s * 1000,
            signal,
            jumpHost: endpoints.jumpHost
          });
          if (result.exitCode === 0) {
            pending.delete(host);
          }
        }
        return pending.size === 0;
      }
    );

    if (!ready) {
      throw new ProvisioningError(
        `VMs not ready after ${vm_ready_s}s: ${[...pending].join(', ')}`
      );
    }
  }
}
