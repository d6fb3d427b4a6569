import path from 'path';
import fs from 'fs-extra';
import { ArtifactService } from '../../src/artifacts/artifact-service';
import { MemoryArtifactStore } from '../../src/artifacts/content-store';
import { MemoryCacheBackend } from '../../src/cache/backend';
import { CacheManager } from '../../src/cache/cache-manager';
import { PipelineConfig } from '../../src/config';
import { DataPlanePublisher } from '../../src/data-plane/publisher';
import { FailureReason, Job, JobKind, JobStatus } from '../../src/domain/job';
import { BuildExecutor } from '../../src/engine/build-executor';
import { runJob } from '../../src/engine/job-runner';
import { logger } from '../../src/logger';
import { createMemoryStore } from '../../src/storage/memory-store';
import { ToolchainProvisioner } from '../../src/toolchain/provisioner';
import { FakeCommandRunner } from '../helpers/fake-runner';
import { makeTempDir, testConfig } from '../helpers/fixtures';

function buildJob(): Job {
  return {
    id: 'build:linux-x86_64+jemalloc',
    kind: JobKind.Build,
    target: { operatingSystem: 'linux', cpuArchitecture: 'x86_64', featureSet: ['jemalloc'] },
    status: JobStatus.Pending,
    required: true,
    failFast: true,
    timeoutMs: 10_000,
    artifacts: [],
  };
}

function lintJob(): Job {
  return { ...buildJob(), id: 'lint', kind: JobKind.Lint, target: null, failFast: false };
}

describe('Build Executor', () => {
  let root: string;
  let config: PipelineConfig;
  let runner: FakeCommandRunner;
  let backend: MemoryCacheBackend;
  let artifacts: ArtifactService;

  beforeEach(async () => {
    root = await makeTempDir();
    config = testConfig(root, { buildOutput: 'out/{target}/server' });
    runner = new FakeCommandRunner();
    backend = new MemoryCacheBackend();
    const store = createMemoryStore();
    artifacts = new ArtifactService(new MemoryArtifactStore(), store.artifacts, new DataPlanePublisher(store.events));
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  function executor(): BuildExecutor {
    const provisioner = new ToolchainProvisioner(runner, config.toolchain, config.host, root);
    const cache = new CacheManager(backend, {
      workspaceRoot: root,
      namespace: config.cache.namespace,
      lockFiles: config.cache.lockFiles,
      paths: config.cache.paths,
    });
    return new BuildExecutor(runner, provisioner, cache, artifacts, {
      workspaceRoot: root,
      host: config.host,
      steps: config.steps,
      buildOutput: config.buildOutput,
    });
  }

  function run(job: Job, handler = executor()) {
    return runJob({ pipelineId: 'pl_1', revision: 'abc123', job, handler, artifacts, logger });
  }

  test('build renders target parameters and stores the binary', async () => {
    runner.on('compile', async () => {
      await fs.outputFile(path.join(root, 'out', 'x86_64-unknown-linux-musl', 'server'), 'ELF');
      return {};
    });

    const { job } = await run(buildJob());

    expect(job.status).toBe(JobStatus.Succeeded);
    expect(runner.callsNamed('compile')[0].args).toEqual(['build', '--target', 'x86_64-unknown-linux-musl', '-F', 'jemalloc']);
    const binary = job.artifacts.find((a) => a.type === 'binary');
    expect(binary?.name).toBe('server');
    expect(binary && (await artifacts.read(binary)).toString()).toBe('ELF');
    expect(job.cacheHit).toBe(false);
    expect(job.cacheKey).toMatch(/^cargo-build-linux-x86_64-jemalloc-[0-9a-f]{64}$/);
    expect(backend.size).toBe(1);
  });

  test('second build of the same target hits the cache', async () => {
    runner.on('compile', async () => {
      await fs.outputFile(path.join(root, 'out', 'x86_64-unknown-linux-musl', 'server'), 'ELF');
      return {};
    });
    const handler = executor();
    await run(buildJob(), handler);
    const { job } = await run(buildJob(), handler);
    expect(job.cacheHit).toBe(true);
  });

  test('failing step fails the job and skips the cache save', async () => {
    runner.fail('compile', 101, 'error: mismatched types');

    const { job } = await run(buildJob());

    expect(job.status).toBe(JobStatus.Failed);
    expect(job.failureReason).toBe(FailureReason.BuildError);
    expect(job.error?.details).toEqual({ step: 'compile', exitCode: 101, stderrTail: 'error: mismatched types' });
    expect(job.cacheHit).toBe(false);
    expect(backend.size).toBe(0);
  });

  test('missing declared output fails the build', async () => {
    const { job } = await run(buildJob());
    expect(job.error?.code).toBe('BUILD.OUTPUT_MISSING');
    expect(job.error?.details).toEqual({ outputPath: 'out/x86_64-unknown-linux-musl/server' });
  });

  test('provisioning failure stops before any step', async () => {
    runner.fail('install-compiler', 1, 'network unreachable');

    const { job } = await run(buildJob());

    expect(job.failureReason).toBe(FailureReason.ToolchainError);
    expect(job.error?.code).toBe('TOOLCHAIN.PROVISION_FAILED');
    expect(runner.callsNamed('compile')).toEqual([]);
  });

  test('lint shares the host check cache', async () => {
    const { job } = await run(lintJob());
    expect(job.status).toBe(JobStatus.Succeeded);
    expect(job.cacheKey).toMatch(/^cargo-check-linux-[0-9a-f]{64}$/);
    expect(runner.callsNamed('lint')).toHaveLength(1);
    expect(runner.callsNamed('compile')).toEqual([]);
  });

  test('a failed cache save leaves the job succeeded', async () => {
    jest.spyOn(backend, 'save').mockRejectedValue(new Error('disk full'));
    runner.on('compile', async () => {
      await fs.outputFile(path.join(root, 'out', 'x86_64-unknown-linux-musl', 'server'), 'ELF');
      return {};
    });

    const { job } = await run(buildJob());

    expect(job.status).toBe(JobStatus.Succeeded);
    expect(job.failureReason).toBeUndefined();
    expect(backend.size).toBe(0);
    const log = job.artifacts.find((a) => a.name === 'job.log');
    const text = log ? (await artifacts.read(log)).toString('utf8') : '';
    expect(text.split('\n')).toContain('warning: cache save failed: disk full');
  });
});
