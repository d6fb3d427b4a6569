/**
 * Drift Detector: the codegen-check job.
 *
 * Regenerates derived sources into a scratch directory and compares them
 * with the committed tree under each generated root. Any added, modified
 * or deleted path is drift: the job fails and the unified diff is stored.
 */

import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { describeError, driftError, generationError } from '../domain/errors';
import { FailureReason, JobKind, JobPhase } from '../domain/job';
import { ChangedPath, DriftReport } from '../domain/pipeline';
import { ArtifactService } from '../artifacts/artifact-service';
import { CodegenConfig } from '../config';
import { ToolchainProvisioner } from '../toolchain/provisioner';
import { provision } from './build-executor';
import { CommandRunner } from './command-runner';
import { JobContext, JobFailure, JobHandler, JobOutcome } from './job-runner';
import { renderCommand } from './templates';
import { sameContent, unifiedDiff } from './unified-diff';

const STDERR_TAIL_CHARS = 2_000;

/** Workspace-relative files under a directory, with forward slashes, sorted. */
export async function listFiles(root: string): Promise<string[]> {
  const files: string[] = [];
  const walk = async (dir: string, prefix: string): Promise<void> => {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        await walk(path.join(dir, entry.name), relative);
      } else if (entry.isFile()) {
        files.push(relative);
      }
    }
  };
  if (await fs.pathExists(root)) {
    await walk(root, '');
  }
  return files.sort();
}

async function readOrNull(file: string): Promise<Buffer | null> {
  return (await fs.pathExists(file)) ? fs.readFile(file) : null;
}

/** Diff of one file, or a stub naming the file when the diff cannot be rendered. */
function renderDiff(displayPath: string, before: Buffer | null, after: Buffer | null): string {
  try {
    return unifiedDiff(displayPath, before, after);
  } catch (err) {
    return `diff --git a/${displayPath} b/${displayPath}\nDiff unavailable: ${describeError(err)}\n`;
  }
}

export interface TreeComparison {
  changedPaths: ChangedPath[];
  diff: string;
}

/**
 * Compare regenerated roots under `generatedDir` with the committed roots
 * under `workspaceRoot`.
 */
export async function compareTrees(workspaceRoot: string, generatedDir: string, roots: string[]): Promise<TreeComparison> {
  const changedPaths: ChangedPath[] = [];
  const diffs: string[] = [];

  for (const root of roots) {
    const committedRoot = path.resolve(workspaceRoot, root);
    const generatedRoot = path.resolve(generatedDir, root);
    const committed = await listFiles(committedRoot);
    const generated = await listFiles(generatedRoot);
    const all = Array.from(new Set([...committed, ...generated])).sort();

    for (const relative of all) {
      const before = await readOrNull(path.join(committedRoot, relative));
      const after = await readOrNull(path.join(generatedRoot, relative));
      if (sameContent(before, after)) continue;

      const displayPath = path.posix.join(root.split(path.sep).join('/'), relative);
      changedPaths.push({
        path: displayPath,
        change: before === null ? 'added' : after === null ? 'deleted' : 'modified',
      });
      diffs.push(renderDiff(displayPath, before, after));
    }
  }

  return { changedPaths, diff: diffs.join('') };
}

export interface DriftDetectorOptions {
  workspaceRoot: string;
  codegen: CodegenConfig;
}

export class DriftDetector implements JobHandler {
  readonly kinds = [JobKind.CodegenCheck] as const;

  constructor(
    private runner: CommandRunner,
    private provisioner: ToolchainProvisioner,
    private artifacts: ArtifactService,
    private options: DriftDetectorOptions,
  ) {}

  async execute(context: JobContext): Promise<JobOutcome> {
    const { job } = context;
    const { workspaceRoot, codegen } = this.options;

    await context.enterPhase(JobPhase.Provisioning);
    await provision(this.provisioner, context);

    const scratch = await fs.mkdtemp(path.join(os.tmpdir(), 'buildgate-gen-'));
    try {
      await context.enterPhase(JobPhase.Generating);
      const spec = renderCommand(codegen.generate, { out: scratch, revision: context.revision }, workspaceRoot);
      context.output.line(`$ ${spec.command} ${spec.args.join(' ')}`);
      const result = await this.runner.run(spec, {
        signal: context.signal,
        onOutput: (chunk) => context.output.append(chunk),
      });
      if (result.exitCode !== 0) {
        if (result.spawnError) context.output.line(result.spawnError);
        throw new JobFailure(
          FailureReason.GenerationError,
          generationError(job.id, result.exitCode, result.stderr.slice(-STDERR_TAIL_CHARS)),
        );
      }

      await context.enterPhase(JobPhase.Comparing);
      const comparison = await compareTrees(workspaceRoot, scratch, codegen.roots);
      const report: DriftReport = {
        hasDrift: comparison.changedPaths.length > 0,
        changedPaths: comparison.changedPaths,
      };
      if (!report.hasDrift) {
        context.output.line('generated code is up to date');
        return { driftReport: report };
      }

      for (const changed of report.changedPaths) {
        context.output.line(`${changed.change}: ${changed.path}`);
      }
      report.diffArtifact = await this.artifacts.write(
        { pipelineId: context.pipelineId, jobId: job.id, name: codegen.diffName, type: 'diff' },
        comparison.diff,
      );
      context.attach(report.diffArtifact);
      throw new JobFailure(
        FailureReason.DriftError,
        driftError(job.id, report.changedPaths.map((c) => c.path)),
        { driftReport: report },
      );
    } finally {
      await fs.remove(scratch).catch((err: unknown) => {
        context.logger.warn('Failed to remove scratch directory', { scratch, error: describeError(err) });
      });
    }
  }
}
