import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { MemoryArtifactStore } from '../../src/artifacts/content-store';
import { MemoryCacheBackend } from '../../src/cache/backend';
import { PipelineConfig, createDefaultConfig } from '../../src/config';
import { AppContext, createAppContext } from '../../src/server';
import { createMemoryStore } from '../../src/storage/memory-store';
import { FakeCommandRunner } from './fake-runner';

export async function makeTempDir(prefix = 'buildgate-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/** A small configuration: two build targets, two image architectures. */
export function testConfig(workspaceRoot: string, overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  const base = createDefaultConfig(workspaceRoot);
  return {
    ...base,
    matrix: {
      targets: [
        { operatingSystem: 'linux', cpuArchitecture: 'x86_64', featureSet: ['jemalloc'] },
        { operatingSystem: 'macos', cpuArchitecture: 'arm64', featureSet: [] },
      ],
      featureRules: [{ operatingSystem: 'linux', cpuArchitecture: 'arm64', disallow: ['jemalloc'] }],
      imageArchitectures: ['x86_64', 'arm64'],
    },
    steps: {
      build: [{ name: 'compile', command: 'make', args: ['build', '--target', '{target}', '-F', '{features}'] }],
      lint: [{ name: 'lint', command: 'make', args: ['lint'] }],
      test: [{ name: 'test', command: 'make', args: ['test'] }],
    },
    toolchain: {
      ...base.toolchain,
      crossTargets: {
        'linux/x86_64': 'x86_64-unknown-linux-musl',
        'macos/arm64': 'aarch64-apple-darwin',
      },
      emulation: { name: 'register-emulation', command: 'docker', args: ['binfmt', '{arch}'] },
    },
    codegen: { ...base.codegen, roots: ['gen'] },
    images: { ...base.images, repository: 'registry.test/app' },
    ...overrides,
  };
}

export interface TestHarness {
  ctx: AppContext;
  runner: FakeCommandRunner;
  cacheBackend: MemoryCacheBackend;
}

/** Full application context over in-memory stores and a fake runner. */
export function createHarness(config: PipelineConfig, runner = new FakeCommandRunner()): TestHarness {
  const cacheBackend = new MemoryCacheBackend();
  const ctx = createAppContext(config, {
    store: createMemoryStore(),
    runner,
    cacheBackend,
    contentStore: new MemoryArtifactStore(),
  });
  return { ctx, runner, cacheBackend };
}
