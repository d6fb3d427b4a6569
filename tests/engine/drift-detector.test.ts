import path from 'path';
import fs from 'fs-extra';
import { ArtifactService } from '../../src/artifacts/artifact-service';
import { MemoryArtifactStore } from '../../src/artifacts/content-store';
import { DataPlanePublisher } from '../../src/data-plane/publisher';
import { FailureReason, Job, JobKind, JobStatus } from '../../src/domain/job';
import { CommandSpec } from '../../src/engine/command-runner';
import { DriftDetector, compareTrees, listFiles } from '../../src/engine/drift-detector';
import { runJob } from '../../src/engine/job-runner';
import { logger } from '../../src/logger';
import { createMemoryStore } from '../../src/storage/memory-store';
import { ToolchainProvisioner } from '../../src/toolchain/provisioner';
import { FakeCommandRunner } from '../helpers/fake-runner';
import { makeTempDir, testConfig } from '../helpers/fixtures';

const CODEGEN_JOB: Job = {
  id: 'codegen-check',
  kind: JobKind.CodegenCheck,
  target: null,
  status: JobStatus.Pending,
  required: true,
  failFast: false,
  timeoutMs: 10_000,
  artifacts: [],
};

/** Writes the given files under the generator's output directory. */
function generates(files: Record<string, string | Buffer>) {
  return async (spec: CommandSpec) => {
    const out = spec.env?.GEN_OUT ?? '';
    for (const [relative, content] of Object.entries(files)) {
      await fs.outputFile(path.join(out, relative), content);
    }
    return {};
  };
}

describe('Drift Detector', () => {
  let root: string;
  let runner: FakeCommandRunner;
  let artifacts: ArtifactService;

  beforeEach(async () => {
    root = await makeTempDir();
    runner = new FakeCommandRunner();
    const store = createMemoryStore();
    artifacts = new ArtifactService(new MemoryArtifactStore(), store.artifacts, new DataPlanePublisher(store.events));
    await fs.outputFile(path.join(root, 'gen', 'api.rs'), 'pub struct Api;\n');
    await fs.outputFile(path.join(root, 'gen', 'nested', 'types.rs'), 'pub type Id = u64;\n');
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  function run() {
    const config = testConfig(root);
    const provisioner = new ToolchainProvisioner(runner, config.toolchain, config.host, root);
    const detector = new DriftDetector(runner, provisioner, artifacts, { workspaceRoot: root, codegen: config.codegen });
    return runJob({
      pipelineId: 'pl_1',
      revision: 'abc123',
      job: structuredClone(CODEGEN_JOB),
      handler: detector,
      artifacts,
      logger,
    });
  }

  test('identical output passes with an empty report', async () => {
    runner.on('generate', generates({ 'gen/api.rs': 'pub struct Api;\n', 'gen/nested/types.rs': 'pub type Id = u64;\n' }));

    const { job, outcome } = await run();

    expect(job.status).toBe(JobStatus.Succeeded);
    expect(outcome?.driftReport).toEqual({ hasDrift: false, changedPaths: [] });
    expect(job.artifacts.some((a) => a.type === 'diff')).toBe(false);
  });

  test('modified, added and deleted files are drift', async () => {
    runner.on('generate', generates({ 'gen/api.rs': 'pub struct Api2;\n', 'gen/extra.rs': 'x\n' }));

    const { job, outcome } = await run();

    expect(job.status).toBe(JobStatus.Failed);
    expect(job.failureReason).toBe(FailureReason.DriftError);
    expect(outcome?.driftReport?.changedPaths).toEqual([
      { path: 'gen/api.rs', change: 'modified' },
      { path: 'gen/extra.rs', change: 'added' },
      { path: 'gen/nested/types.rs', change: 'deleted' },
    ]);

    const diff = job.artifacts.find((a) => a.type === 'diff');
    expect(diff?.name).toBe('code-gen.diff');
    expect(outcome?.driftReport?.diffArtifact?.id).toBe(diff?.id);
    const text = diff ? (await artifacts.read(diff)).toString() : '';
    expect(text.split('\n').slice(0, 7)).toEqual([
      'diff --git a/gen/api.rs b/gen/api.rs',
      '--- a/gen/api.rs',
      '+++ b/gen/api.rs',
      '@@ -1 +1 @@',
      '-pub struct Api;',
      '+pub struct Api2;',
      'diff --git a/gen/extra.rs b/gen/extra.rs',
    ]);
  });

  test('a single differing byte in a binary file is drift', async () => {
    await fs.outputFile(path.join(root, 'gen', 'desc.bin'), Buffer.from([0x01, 0xff, 0x02]));
    runner.on(
      'generate',
      generates({
        'gen/api.rs': 'pub struct Api;\n',
        'gen/nested/types.rs': 'pub type Id = u64;\n',
        'gen/desc.bin': Buffer.from([0x01, 0xfe, 0x02]),
      }),
    );

    const { job, outcome } = await run();

    expect(job.failureReason).toBe(FailureReason.DriftError);
    expect(outcome?.driftReport?.changedPaths).toEqual([{ path: 'gen/desc.bin', change: 'modified' }]);
    const diff = job.artifacts.find((a) => a.type === 'diff');
    const text = diff ? (await artifacts.read(diff)).toString() : '';
    expect(text).toBe(
      'diff --git a/gen/desc.bin b/gen/desc.bin\nBinary files a/gen/desc.bin and b/gen/desc.bin differ\n',
    );
  });

  test('generator failure is a GenerationError', async () => {
    runner.fail('generate', 2, 'protoc: parse error');

    const { job } = await run();

    expect(job.failureReason).toBe(FailureReason.GenerationError);
    expect(job.error?.code).toBe('CODEGEN.GENERATION_FAILED');
  });

  test('scratch directory is removed afterwards', async () => {
    let scratch = '';
    runner.on('generate', async (spec) => {
      scratch = spec.env?.GEN_OUT ?? '';
      return {};
    });
    await run();
    expect(scratch).not.toBe('');
    expect(await fs.pathExists(scratch)).toBe(false);
  });
});

describe('Tree comparison', () => {
  test('listFiles returns sorted posix paths and nothing for a missing root', async () => {
    const root = await makeTempDir();
    try {
      await fs.outputFile(path.join(root, 'b', 'c.rs'), '');
      await fs.outputFile(path.join(root, 'a.rs'), '');
      expect(await listFiles(root)).toEqual(['a.rs', 'b/c.rs']);
      expect(await listFiles(path.join(root, 'missing'))).toEqual([]);
    } finally {
      await fs.remove(root);
    }
  });

  test('identical trees have no changes', async () => {
    const workspace = await makeTempDir();
    const generated = await makeTempDir();
    try {
      await fs.outputFile(path.join(workspace, 'gen', 'x.rs'), 'same');
      await fs.outputFile(path.join(generated, 'gen', 'x.rs'), 'same');
      expect(await compareTrees(workspace, generated, ['gen'])).toEqual({ changedPaths: [], diff: '' });
    } finally {
      await fs.remove(workspace);
      await fs.remove(generated);
    }
  });

  test('binary content is compared byte for byte', async () => {
    const workspace = await makeTempDir();
    const generated = await makeTempDir();
    try {
      await fs.outputFile(path.join(workspace, 'gen', 'a.bin'), Buffer.from([0x01, 0xff, 0x02]));
      await fs.outputFile(path.join(generated, 'gen', 'a.bin'), Buffer.from([0x01, 0xfe, 0x02]));
      await fs.outputFile(path.join(workspace, 'gen', 'b.bin'), Buffer.from([0x00, 0xff]));
      await fs.outputFile(path.join(generated, 'gen', 'b.bin'), Buffer.from([0x00, 0xff]));

      const comparison = await compareTrees(workspace, generated, ['gen']);

      expect(comparison.changedPaths).toEqual([{ path: 'gen/a.bin', change: 'modified' }]);
    } finally {
      await fs.remove(workspace);
      await fs.remove(generated);
    }
  });
});
