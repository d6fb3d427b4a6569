import { FailureReason, Job, JobKind, JobStatus } from '../../src/domain/job';
import { PipelineRun, PipelineStatus, TriggerEvent } from '../../src/domain/pipeline';
import { aggregate, buildReport } from '../../src/engine/gate';

function job(id: string, status: JobStatus, required = true): Job {
  return {
    id,
    kind: JobKind.Lint,
    target: null,
    status,
    required,
    failFast: false,
    timeoutMs: 1_000,
    artifacts: [],
  };
}

describe('Gate Aggregator', () => {
  test('all succeeded passes', () => {
    expect(aggregate([job('lint', JobStatus.Succeeded), job('test', JobStatus.Succeeded)])).toEqual({
      status: PipelineStatus.Succeeded,
      exitCode: 0,
      requiredFailures: [],
      requiredSkipped: [],
    });
  });

  test('a required failure fails the gate', () => {
    const verdict = aggregate([job('lint', JobStatus.Failed), job('test', JobStatus.Succeeded)]);
    expect(verdict.status).toBe(PipelineStatus.Failed);
    expect(verdict.exitCode).toBe(1);
    expect(verdict.requiredFailures).toEqual(['lint']);
  });

  test('optional failures and skips do not fail the gate', () => {
    const verdict = aggregate([job('lint', JobStatus.Failed, false), job('test', JobStatus.Skipped, false)]);
    expect(verdict.exitCode).toBe(0);
  });

  test('a skipped required job fails the gate', () => {
    const verdict = aggregate([job('build', JobStatus.Failed, false), job('test', JobStatus.Skipped)]);
    expect(verdict).toEqual({
      status: PipelineStatus.Failed,
      exitCode: 1,
      requiredFailures: [],
      requiredSkipped: ['test'],
    });
  });

  test('a failed manifest fails the gate', () => {
    const verdict = aggregate([job('lint', JobStatus.Succeeded)], { status: 'failed', images: [] });
    expect(verdict.requiredFailures).toEqual(['manifest']);
  });

  test('a skipped manifest does not fail the gate', () => {
    expect(aggregate([], { status: 'skipped', images: [] }).exitCode).toBe(0);
  });
});

describe('Pipeline report', () => {
  test('reports jobs with their artifacts and failures', () => {
    const failed: Job = {
      ...job('lint', JobStatus.Failed),
      failureReason: FailureReason.BuildError,
      durationMs: 42,
      artifacts: [
        {
          id: 'art_1',
          pipelineId: 'pl_1',
          jobId: 'lint',
          name: 'job.log',
          type: 'log',
          pointer: { kind: 'memory', uri: 'memory://pl_1/lint/job.log' },
          metadata: { createdAt: '2026-01-01T00:00:00.000Z' },
        },
      ],
    };
    const pipeline: PipelineRun = {
      id: 'pl_1',
      revision: 'abc123',
      event: TriggerEvent.Push,
      draft: false,
      status: PipelineStatus.Failed,
      jobs: [failed, job('test', JobStatus.Succeeded)],
      omitted: [],
      createdAt: '2026-01-01T00:00:00.000Z',
      updatedAt: '2026-01-01T00:00:00.000Z',
    };

    const report = buildReport(pipeline);

    expect(report.exitCode).toBe(1);
    expect(report.requiredFailures).toEqual(['lint']);
    expect(report.jobs[0]).toEqual({
      id: 'lint',
      kind: JobKind.Lint,
      target: null,
      status: JobStatus.Failed,
      required: true,
      failureReason: FailureReason.BuildError,
      error: undefined,
      durationMs: 42,
      cacheHit: undefined,
      artifacts: [{ name: 'job.log', type: 'log', location: 'memory://pl_1/lint/job.log' }],
    });
  });

  test('a canceled pipeline exits non-zero', () => {
    const pipeline: PipelineRun = {
      id: 'pl_2',
      revision: 'abc123',
      event: TriggerEvent.Push,
      draft: false,
      status: PipelineStatus.Canceled,
      jobs: [job('lint', JobStatus.Skipped)],
      omitted: [],
      createdAt: '2026-01-01T00:00:00.000Z',
      updatedAt: '2026-01-01T00:00:00.000Z',
    };
    const report = buildReport(pipeline);
    expect(report.exitCode).toBe(1);
    expect(report.requiredFailures).toEqual([]);
    expect(report.requiredSkipped).toEqual(['lint']);
  });
});
