import path from 'path';
import fs from 'fs-extra';
import { createProgram, CliIO } from '../src/cli';
import { hashLockFiles } from '../src/cache/cache-key';
import { makeTempDir } from './helpers/fixtures';

interface Captured extends CliIO {
  out: string;
  err: string;
  exitCode?: number;
}

function capture(): Captured {
  const io: Captured = {
    out: '',
    err: '',
    stdout: (text) => {
      io.out += text;
    },
    stderr: (text) => {
      io.err += text;
    },
    setExitCode: (code) => {
      io.exitCode = code;
    },
  };
  return io;
}

const CONFIG = {
  matrix: {
    targets: [
      { operatingSystem: 'linux', cpuArchitecture: 'x86_64', featureSet: ['jemalloc'] },
      { operatingSystem: 'macos', cpuArchitecture: 'arm64', featureSet: [] },
    ],
    imageArchitectures: ['x86_64'],
  },
  steps: {
    build: [{ name: 'compile', command: 'make', args: ['build'] }],
    lint: [{ name: 'lint', command: 'make', args: ['lint'] }],
    test: [{ name: 'test', command: 'make', args: ['test'] }],
  },
  codegen: { roots: ['gen'] },
  logLevel: 'error',
};

describe('CLI', () => {
  let root: string;
  let configPath: string;

  beforeEach(async () => {
    root = await makeTempDir();
    configPath = path.join(root, 'pipeline.config.json');
    await fs.writeJson(configPath, CONFIG);
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  async function run(io: CliIO, ...args: string[]): Promise<void> {
    await createProgram(io).parseAsync(['node', 'buildgate', ...args]);
  }

  test('matrix prints the jobs of a draft pull request', async () => {
    const io = capture();
    await run(io, '-c', configPath, 'matrix', '--event', 'pull-request-draft');

    const printed = JSON.parse(io.out);
    expect(printed.jobs.map((j: { id: string }) => j.id)).toEqual([
      'build:linux-x86_64+jemalloc',
      'build:macos-arm64',
      'lint',
      'test',
    ]);
    expect(printed.omitted).toEqual([
      { kind: 'codegen-check', reason: 'draft' },
      { kind: 'image', reason: 'draft' },
    ]);
    expect(io.exitCode).toBeUndefined();
  });

  test('cache-key prints the check key for a host', async () => {
    await fs.writeFile(path.join(root, 'Cargo.lock'), 'pinned');
    const io = capture();

    await run(io, '-c', configPath, 'cache-key', '--class', 'check', '--os', 'linux');

    const digest = hashLockFiles([{ path: 'Cargo.lock', content: 'pinned' }]);
    expect(io.out).toBe(`cargo-check-linux-${digest}\n`);
  });

  test('cache-key canonicalizes the feature list', async () => {
    const io = capture();
    await run(io, '-c', configPath, 'cache-key', '--os', 'linux', '--arch', 'x86_64', '--features', 'tls,jemalloc');
    expect(io.out.startsWith('cargo-build-linux-x86_64-jemalloc+tls-')).toBe(true);
  });

  test('missing configuration exits 1', async () => {
    const io = capture();
    const missing = path.join(root, 'nope.json');

    await run(io, '-c', missing, 'matrix');

    expect(io.err).toBe(`Configuration file not found: ${missing}\n`);
    expect(io.exitCode).toBe(1);
  });

  test('invalid matrix lists each problem and exits 1', async () => {
    await fs.writeJson(configPath, { ...CONFIG, matrix: { targets: [{ operatingSystem: 'linux' }] } });
    const io = capture();

    await run(io, '-c', configPath, 'matrix');

    expect(io.err).toBe(
      'Invalid configuration: Target #0 is missing required field: cpuArchitecture\n' +
        '  - Target #0 is missing required field: cpuArchitecture\n',
    );
    expect(io.exitCode).toBe(1);
  });
});
