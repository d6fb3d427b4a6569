/**
 * Build Executor: runs build, lint and test jobs.
 *
 * provisioning → cache_restore → building, then on success the declared
 * binary output is stored and the cache saved. Any failing step fails the
 * job; there is no partial success.
 */

import path from 'path';
import fs from 'fs-extra';
import { CacheClass } from '../domain/cache';
import {
  buildError,
  describeError,
  missingOutputError,
  toolchainError,
} from '../domain/errors';
import { FailureReason, Job, JobKind, JobPhase } from '../domain/job';
import { CacheManager } from '../cache/cache-manager';
import { PipelineConfig } from '../config';
import { ArtifactService } from '../artifacts/artifact-service';
import {
  HostPlatform,
  ToolchainHandle,
  ToolchainProvisioner,
  ToolchainProvisioningError,
} from '../toolchain/provisioner';
import { CommandRunner } from './command-runner';
import { JobContext, JobFailure, JobHandler, JobOutcome } from './job-runner';
import { CommandTemplate, TemplateVars, renderCommand, renderTemplate, targetVars } from './templates';

const STDERR_TAIL_CHARS = 2_000;

export interface BuildExecutorOptions {
  workspaceRoot: string;
  host: HostPlatform;
  steps: PipelineConfig['steps'];
  /** Workspace-relative path template of the binary a build produces. */
  buildOutput?: string;
}

export class BuildExecutor implements JobHandler {
  readonly kinds = [JobKind.Build, JobKind.Lint, JobKind.Test] as const;

  constructor(
    private runner: CommandRunner,
    private provisioner: ToolchainProvisioner,
    private cache: CacheManager,
    private artifacts: ArtifactService,
    private options: BuildExecutorOptions,
  ) {}

  async execute(context: JobContext): Promise<JobOutcome> {
    const { job } = context;

    await context.enterPhase(JobPhase.Provisioning);
    const toolchain = await provision(this.provisioner, context);

    await context.enterPhase(JobPhase.CacheRestore);
    const outcome: JobOutcome = {};
    const cacheKey = await this.resolveCacheKey(context);
    if (cacheKey) {
      const restored = await this.cache.restore(cacheKey);
      outcome.cacheKey = cacheKey;
      outcome.cacheHit = restored.found;
      context.output.line(restored.found ? `cache hit: ${cacheKey}` : `cache miss: ${cacheKey}`);
      if (restored.error) {
        context.output.line(`warning: cache restore failed: ${restored.error}`);
      }
    }

    await context.enterPhase(JobPhase.Building);
    const vars: TemplateVars = {
      ...targetVars(job.target, toolchain.crossTarget),
      revision: context.revision,
    };
    for (const step of this.stepsFor(job)) {
      const spec = renderCommand(step, vars, this.options.workspaceRoot);
      context.output.line(`$ ${spec.command} ${spec.args.join(' ')}`);
      const result = await this.runner.run(spec, {
        signal: context.signal,
        onOutput: (chunk) => context.output.append(chunk),
      });
      if (result.exitCode !== 0) {
        if (result.spawnError) context.output.line(result.spawnError);
        throw new JobFailure(
          FailureReason.BuildError,
          buildError(job.id, step.name, result.exitCode, result.stderr.slice(-STDERR_TAIL_CHARS)),
          outcome,
        );
      }
    }

    if (job.kind === JobKind.Build && this.options.buildOutput) {
      await this.storeOutput(context, renderTemplate(this.options.buildOutput, vars), outcome);
    }

    if (cacheKey) {
      const saved = await this.cache.save(cacheKey);
      if (!saved.saved) {
        context.output.line(`warning: cache save failed: ${saved.error ?? 'unknown error'}`);
      }
    }
    return outcome;
  }

  private stepsFor(job: Job): CommandTemplate[] {
    switch (job.kind) {
      case JobKind.Build:
        return this.options.steps.build;
      case JobKind.Lint:
        return this.options.steps.lint;
      case JobKind.Test:
        return this.options.steps.test;
      default:
        throw new Error(`Build executor cannot run ${job.kind} jobs`);
    }
  }

  /** Build jobs key per target; lint and test share one key per host OS. */
  private async resolveCacheKey(context: JobContext): Promise<string | undefined> {
    const { job } = context;
    const cacheClass: CacheClass = job.kind === JobKind.Build ? 'build' : 'check';
    try {
      return await this.cache.keyFor({
        cacheClass,
        operatingSystem: job.target?.operatingSystem ?? this.options.host.operatingSystem,
        cpuArchitecture: job.target?.cpuArchitecture,
        featureSet: job.target?.featureSet,
      });
    } catch (err) {
      context.logger.warn('Cache key unavailable; running without cache', { error: describeError(err) });
      context.output.line(`warning: cache disabled: ${describeError(err)}`);
      return undefined;
    }
  }

  private async storeOutput(context: JobContext, relativePath: string, outcome: JobOutcome): Promise<void> {
    const { job } = context;
    const source = path.resolve(this.options.workspaceRoot, relativePath);
    if (!(await fs.pathExists(source))) {
      throw new JobFailure(FailureReason.BuildError, missingOutputError(job.id, relativePath), outcome);
    }
    const artifact = await this.artifacts.importFile(
      { pipelineId: context.pipelineId, jobId: job.id, name: path.basename(source), type: 'binary' },
      source,
    );
    context.attach(artifact);
  }
}

/**
 * Provision the job's toolchain, translating failures to ToolchainError.
 * Shared by every handler that needs tools installed.
 */
export async function provision(provisioner: ToolchainProvisioner, context: JobContext): Promise<ToolchainHandle> {
  const requirement = provisioner.resolveRequirement(context.job.kind, context.job.target);
  try {
    return await provisioner.ensure(requirement, {
      signal: context.signal,
      onOutput: (chunk) => context.output.append(chunk),
    });
  } catch (err) {
    if (err instanceof ToolchainProvisioningError) {
      throw new JobFailure(
        FailureReason.ToolchainError,
        toolchainError(context.job.id, err.capability, err.message, { exitCode: err.exitCode, outputTail: err.output }),
      );
    }
    throw err;
  }
}
