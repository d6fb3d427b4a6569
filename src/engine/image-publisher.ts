/**
 * Image Publisher.
 *
 * One image job per architecture builds and pushes a container image;
 * once every image job is terminal the multi-architecture manifest is
 * assembled. A manifest is published only when every image succeeded.
 */

import { describeError, imageError, manifestError } from '../domain/errors';
import { FailureReason, Job, JobKind, JobPhase, JobStatus } from '../domain/job';
import { ArchitectureImage, ImageManifest } from '../domain/pipeline';
import { ArtifactService } from '../artifacts/artifact-service';
import { ImageConfig } from '../config';
import { Logger, logger as rootLogger } from '../logger';
import { ToolchainProvisioner } from '../toolchain/provisioner';
import { provision } from './build-executor';
import { CommandRunner, CommandSpec } from './command-runner';
import { JobContext, JobFailure, JobHandler, JobOutcome } from './job-runner';
import { renderCommand } from './templates';

const OUTPUT_TAIL_CHARS = 2_000;

export interface ImagePublisherOptions {
  workspaceRoot: string;
  images: ImageConfig;
  /** Operating system images are built for. */
  operatingSystem: string;
}

export function imageReference(repository: string, revision: string, architecture: string): string {
  return `${repository}:${revision}-${architecture}`;
}

export function manifestReference(repository: string, revision: string): string {
  return `${repository}:${revision}`;
}

export class ImagePublisher implements JobHandler {
  readonly kinds = [JobKind.Image] as const;

  constructor(
    private runner: CommandRunner,
    private provisioner: ToolchainProvisioner,
    private artifacts: ArtifactService,
    private options: ImagePublisherOptions,
    private log: Logger = rootLogger.child({ module: 'images' }),
  ) {}

  async execute(context: JobContext): Promise<JobOutcome> {
    const { job } = context;
    if (!job.target) {
      throw new Error(`Image job ${job.id} has no target architecture`);
    }
    const architecture = job.target.cpuArchitecture;
    const { repository, build } = this.options.images;

    await context.enterPhase(JobPhase.Provisioning);
    await provision(this.provisioner, context);

    await context.enterPhase(JobPhase.Publishing);
    const reference = imageReference(repository, context.revision, architecture);
    const spec = renderCommand(
      build,
      {
        arch: architecture,
        platform: `${this.options.operatingSystem}/${architecture}`,
        image: reference,
        revision: context.revision,
      },
      this.options.workspaceRoot,
    );
    context.output.line(`$ ${spec.command} ${spec.args.join(' ')}`);
    const result = await this.runner.run(spec, {
      signal: context.signal,
      onOutput: (chunk) => context.output.append(chunk),
    });
    if (result.exitCode !== 0) {
      throw new JobFailure(
        FailureReason.ImageError,
        imageError(job.id, architecture, result.spawnError ?? `exited with code ${result.exitCode}`, {
          exitCode: result.exitCode,
          outputTail: result.output.slice(-OUTPUT_TAIL_CHARS),
        }),
      );
    }

    const artifact = await this.artifacts.reference(
      { pipelineId: context.pipelineId, jobId: job.id, name: reference, type: 'image' },
      { kind: 'image-registry', uri: reference },
    );
    context.attach(artifact);
    return { image: { architecture, reference } };
  }

  /**
   * Assemble the manifest from the terminal image jobs.
   * Returns undefined when the pipeline has no image jobs.
   */
  async assembleManifest(
    revision: string,
    jobs: Job[],
    images: ArchitectureImage[],
    signal?: AbortSignal,
  ): Promise<ImageManifest | undefined> {
    const imageJobs = jobs.filter((j) => j.kind === JobKind.Image);
    if (imageJobs.length === 0) return undefined;

    const failed = imageJobs.filter((j) => j.status === JobStatus.Failed);
    if (failed.length > 0) {
      return {
        status: 'failed',
        images,
        error: manifestError('Manifest not assembled: image builds failed', {
          failedJobs: failed.map((j) => j.id),
        }),
      };
    }
    if (imageJobs.some((j) => j.status !== JobStatus.Succeeded)) {
      return { status: 'skipped', images };
    }

    const reference = manifestReference(this.options.images.repository, revision);
    const spec = this.manifestCommand(reference, images);
    this.log.info('Assembling image manifest', { reference, images: images.length });
    try {
      const result = await this.runner.run(spec, { signal });
      if (result.exitCode !== 0) {
        return {
          status: 'failed',
          images,
          error: manifestError(`Manifest command failed: ${result.spawnError ?? `exited with code ${result.exitCode}`}`, {
            reference,
            outputTail: result.output.slice(-OUTPUT_TAIL_CHARS),
          }),
        };
      }
    } catch (err) {
      return { status: 'failed', images, error: manifestError(describeError(err), { reference }) };
    }
    return { status: 'succeeded', reference, images };
  }

  /** `{images}` standing alone expands to one argument per image. */
  private manifestCommand(reference: string, images: ArchitectureImage[]): CommandSpec {
    const refs = images.map((i) => i.reference);
    const rendered = renderCommand(
      this.options.images.manifest,
      { manifest: reference, images: refs.join(' ') },
      this.options.workspaceRoot,
    );
    const template = this.options.images.manifest.args ?? [];
    const args = template.flatMap((arg, i) => (arg === '{images}' ? refs : [rendered.args[i]]));
    return { ...rendered, args };
  }
}
