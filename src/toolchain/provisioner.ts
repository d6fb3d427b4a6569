/**
 * Toolchain Provisioner.
 *
 * Makes sure the compiler, cross targets, system packages, code generator
 * and emulation a job needs are present before the job's first step.
 * Requirements are derived from the job's kind and target, never from
 * ad hoc per-job conditionals.
 *
 * Each capability is provisioned at most once per host. Results are
 * memoised including failures: provisioning is a precondition, not a
 * retryable step, so every later job needing a failed capability fails
 * immediately with the same cause.
 *
 * An install runs under the signal of the job that started it. If that job
 * is canceled the install is killed and forgotten, and jobs that were
 * waiting on it start it again.
 */

import { JobKind } from '../domain/job';
import { TargetSpec } from '../domain/target';
import { CommandRunner, RunOptions } from '../engine/command-runner';
import { CommandTemplate, renderCommand } from '../engine/templates';
import { ToolchainConfig } from '../config';
import { Logger, logger as rootLogger } from '../logger';

/** One thing that must be installed, and how. */
export interface Capability {
  /** Stable identity, e.g. "compiler:stable" or "package:musl-tools". */
  id: string;
  install: CommandTemplate;
  vars: Record<string, string>;
}

export interface ToolchainRequirement {
  compilerVersion?: string;
  crossTarget?: string;
  codegen?: string;
  emulatedArchitecture?: string;
  capabilities: Capability[];
}

/** What a job can rely on once provisioning succeeded. */
export interface ToolchainHandle {
  compilerVersion?: string;
  crossTarget?: string;
  codegen?: string;
  emulatedArchitecture?: string;
  capabilities: string[];
}

export class ToolchainProvisioningError extends Error {
  constructor(
    public capability: string,
    message: string,
    public exitCode: number | null,
    public output: string,
  ) {
    super(message);
    this.name = 'ToolchainProvisioningError';
  }
}

export class ProvisioningCanceledError extends Error {
  constructor(public capability: string) {
    super(`Provisioning of ${capability} was canceled`);
    this.name = 'ProvisioningCanceledError';
  }
}

export interface HostPlatform {
  operatingSystem: string;
  cpuArchitecture: string;
}

const OUTPUT_TAIL_CHARS = 2_000;

export class ToolchainProvisioner {
  private ensured = new Map<string, Promise<void>>();

  constructor(
    private runner: CommandRunner,
    private config: ToolchainConfig,
    private host: HostPlatform,
    private workspaceRoot: string,
    private log: Logger = rootLogger.child({ module: 'toolchain' }),
  ) {}

  /** Derive what a job of the given kind and target needs. */
  resolveRequirement(kind: JobKind, target: TargetSpec | null): ToolchainRequirement {
    const requirement: ToolchainRequirement = { capabilities: [] };
    const { config } = this;

    const needsCompiler = kind === JobKind.Build || kind === JobKind.Lint || kind === JobKind.Test;
    const needsCodegen = needsCompiler || kind === JobKind.CodegenCheck;

    if (needsCompiler) {
      requirement.compilerVersion = config.compilerVersion;
      requirement.capabilities.push({
        id: `compiler:${config.compilerVersion}`,
        install: config.installCompiler,
        vars: { version: config.compilerVersion },
      });
    }

    if (kind === JobKind.Build && target) {
      const crossTarget = this.crossTargetFor(target);
      if (crossTarget) {
        requirement.crossTarget = crossTarget;
        if (config.addTarget) {
          requirement.capabilities.push({
            id: `target:${crossTarget}`,
            install: config.addTarget,
            vars: { target: crossTarget },
          });
        }
      }
      for (const rule of config.capabilities) {
        if (rule.operatingSystem !== target.operatingSystem) continue;
        for (const pkg of rule.packages) {
          requirement.capabilities.push({ id: `package:${pkg}`, install: rule.install, vars: { package: pkg } });
        }
      }
    }

    if (needsCodegen) {
      const { codegen } = config;
      requirement.codegen = `${codegen.name}@${codegen.version}`;
      requirement.capabilities.push({
        id: `codegen:${requirement.codegen}`,
        install: codegen.install,
        vars: { version: codegen.version },
      });
    }

    if (kind === JobKind.Image && target && target.cpuArchitecture !== this.host.cpuArchitecture) {
      requirement.emulatedArchitecture = target.cpuArchitecture;
      if (config.emulation) {
        requirement.capabilities.push({
          id: `emulation:${target.cpuArchitecture}`,
          install: config.emulation,
          vars: { arch: target.cpuArchitecture },
        });
      }
    }

    return requirement;
  }

  /** Cross target triple for a target, if one is declared. */
  crossTargetFor(target: TargetSpec): string | undefined {
    return this.config.crossTargets[`${target.operatingSystem}/${target.cpuArchitecture}`];
  }

  /**
   * Ensure every capability of the requirement is present.
   * Safe to call any number of times; throws ToolchainProvisioningError,
   * or ProvisioningCanceledError once `options.signal` fires.
   */
  async ensure(requirement: ToolchainRequirement, options: RunOptions = {}): Promise<ToolchainHandle> {
    for (const capability of requirement.capabilities) {
      await this.ensureCapability(capability, options);
    }
    return {
      compilerVersion: requirement.compilerVersion,
      crossTarget: requirement.crossTarget,
      codegen: requirement.codegen,
      emulatedArchitecture: requirement.emulatedArchitecture,
      capabilities: requirement.capabilities.map((c) => c.id),
    };
  }

  /** Whether a capability has already been provisioned (or attempted) on this host. */
  isProvisioned(capabilityId: string): boolean {
    return this.ensured.has(capabilityId);
  }

  private async ensureCapability(capability: Capability, options: RunOptions): Promise<void> {
    while (true) {
      let attempt = this.ensured.get(capability.id);
      if (!attempt) {
        if (options.signal?.aborted) throw new ProvisioningCanceledError(capability.id);
        attempt = this.install(capability, options);
        this.ensured.set(capability.id, attempt);
      }
      try {
        await attempt;
        return;
      } catch (err) {
        // Another job's install was canceled; start it again under ours.
        if (err instanceof ProvisioningCanceledError && !options.signal?.aborted) continue;
        throw err;
      }
    }
  }

  private async install(capability: Capability, options: RunOptions): Promise<void> {
    const { onOutput, signal } = options;
    const spec = renderCommand(capability.install, capability.vars, this.workspaceRoot);
    this.log.info('Provisioning capability', { capability: capability.id, command: spec.command });
    onOutput?.(`$ ${spec.command} ${spec.args.join(' ')}\n`);

    const result = await this.runner.run(spec, { onOutput, signal });
    if (result.canceled) {
      this.ensured.delete(capability.id);
      this.log.info('Capability provisioning canceled', { capability: capability.id });
      throw new ProvisioningCanceledError(capability.id);
    }
    if (result.exitCode !== 0) {
      const reason = result.spawnError ?? `exited with code ${result.exitCode}`;
      this.log.error('Capability provisioning failed', { capability: capability.id, reason });
      throw new ToolchainProvisioningError(
        capability.id,
        reason,
        result.exitCode,
        result.output.slice(-OUTPUT_TAIL_CHARS),
      );
    }
  }
}
