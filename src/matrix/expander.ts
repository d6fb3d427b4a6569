/**
 * Matrix expander.
 *
 * Turns a declarative target list plus the trigger into the full job set.
 * Pure: the same declaration and event always yield the same jobs, and
 * duplicate target rows collapse to a single build job.
 */

import { ConfigurationError, configurationError } from '../domain/errors';
import { Job, JobKind, JobStatus } from '../domain/job';
import { OmittedKind, TriggerEvent, isDraftEvent } from '../domain/pipeline';
import { MatrixDeclaration, TargetSpec, createTarget, targetKey } from '../domain/target';
import { validateMatrix } from './validator';

/** Per-kind scheduling policy applied to expanded jobs. */
export interface JobPolicy {
  /** Whether a failure of the kind fails the pipeline. */
  required: Record<JobKind, boolean>;
  /** Whether a failure of the kind skips remaining pending jobs. */
  failFast: Record<JobKind, boolean>;
  timeoutsMs: Record<JobKind, number>;
}

export const DEFAULT_JOB_POLICY: JobPolicy = {
  required: {
    [JobKind.Build]: true,
    [JobKind.Lint]: true,
    [JobKind.Test]: true,
    [JobKind.CodegenCheck]: true,
    [JobKind.Image]: true,
  },
  failFast: {
    [JobKind.Build]: true,
    [JobKind.Lint]: false,
    [JobKind.Test]: false,
    [JobKind.CodegenCheck]: false,
    [JobKind.Image]: false,
  },
  timeoutsMs: {
    [JobKind.Build]: 60 * 60_000,
    [JobKind.Lint]: 30 * 60_000,
    [JobKind.Test]: 45 * 60_000,
    [JobKind.CodegenCheck]: 20 * 60_000,
    [JobKind.Image]: 60 * 60_000,
  },
};

/** Operating system that container images are built for. */
export const IMAGE_OPERATING_SYSTEM = 'linux';

export interface MatrixExpansion {
  jobs: Job[];
  omitted: OmittedKind[];
  warnings: string[];
}

/**
 * Expand a matrix declaration into jobs.
 * Throws ConfigurationError when any target row is malformed.
 */
export function expandMatrix(
  declaration: MatrixDeclaration,
  event: TriggerEvent,
  policy: JobPolicy = DEFAULT_JOB_POLICY,
): MatrixExpansion {
  const validation = validateMatrix(declaration);
  if (!validation.valid) {
    const problems = validation.errors.map((e) => e.message);
    throw new ConfigurationError(
      configurationError(`Invalid build matrix: ${problems.join('; ')}`, { problems }),
    );
  }

  const warnings = [...validation.warnings];
  const jobs: Job[] = [];
  const seen = new Set<string>();

  for (const row of declaration.targets) {
    const target = createTarget(
      String(row.operatingSystem),
      String(row.cpuArchitecture),
      Array.isArray(row.featureSet) ? row.featureSet.map(String) : [],
    );
    const key = targetKey(target);
    if (seen.has(key)) {
      warnings.push(`Duplicate target ${key} collapsed into one job`);
      continue;
    }
    seen.add(key);
    jobs.push(createJob(`${JobKind.Build}:${key}`, JobKind.Build, target, policy));
  }

  jobs.push(createJob(JobKind.Lint, JobKind.Lint, null, policy));
  jobs.push(createJob(JobKind.Test, JobKind.Test, null, policy));

  const omitted: OmittedKind[] = [];
  if (isDraftEvent(event)) {
    omitted.push({ kind: JobKind.CodegenCheck, reason: 'draft' });
    omitted.push({ kind: JobKind.Image, reason: 'draft' });
    return { jobs, omitted, warnings };
  }

  jobs.push(createJob(JobKind.CodegenCheck, JobKind.CodegenCheck, null, policy));

  const architectures = new Set(declaration.imageArchitectures ?? []);
  for (const arch of architectures) {
    const target = createTarget(IMAGE_OPERATING_SYSTEM, arch);
    jobs.push(createJob(`${JobKind.Image}:${arch}`, JobKind.Image, target, policy));
  }

  return { jobs, omitted, warnings };
}

function createJob(id: string, kind: JobKind, target: TargetSpec | null, policy: JobPolicy): Job {
  return {
    id,
    kind,
    target,
    status: JobStatus.Pending,
    required: policy.required[kind],
    failFast: policy.failFast[kind],
    timeoutMs: policy.timeoutsMs[kind],
    artifacts: [],
  };
}
