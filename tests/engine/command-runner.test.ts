import { CommandSpec, ExecaCommandRunner } from '../../src/engine/command-runner';

function nodeScript(name: string, script: string, env?: Record<string, string>): CommandSpec {
  return { name, command: process.execPath, args: ['-e', script], env };
}

describe('ExecaCommandRunner', () => {
  const runner = new ExecaCommandRunner();

  test('captures exit code and output without throwing', async () => {
    const result = await runner.run(
      nodeScript('exit', "process.stdout.write('out'); process.stderr.write('err'); process.exit(3)"),
    );

    expect(result.exitCode).toBe(3);
    expect(result.stdout).toBe('out');
    expect(result.stderr).toBe('err');
    expect(result.output).toContain('out');
    expect(result.output).toContain('err');
    expect(result.canceled).toBe(false);
    expect(result.spawnError).toBeUndefined();
  });

  test('passes environment variables and streams output', async () => {
    const chunks: string[] = [];
    const result = await runner.run(
      nodeScript('env', 'process.stdout.write(process.env.BUILDGATE_TEST_VALUE)', { BUILDGATE_TEST_VALUE: 'test-value' }),
      { onOutput: (chunk) => chunks.push(chunk) },
    );

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe('test-value');
    expect(chunks.join('')).toBe('test-value');
  });

  test('a command that cannot start reports a spawn error', async () => {
    const result = await runner.run({ name: 'missing', command: 'buildgate-no-such-command', args: [] });

    expect(result.exitCode).toBeNull();
    expect(result.canceled).toBe(false);
    expect(result.spawnError).toBe('Could not start "buildgate-no-such-command"');
  });

  test('aborting the signal kills the child', async () => {
    const controller = new AbortController();
    const started = Date.now();

    const result = await runner.run(
      nodeScript('sleep', "process.stdout.write('ready'); setTimeout(() => undefined, 60000)"),
      {
        signal: controller.signal,
        onOutput: () => controller.abort(),
      },
    );

    expect(result.canceled).toBe(true);
    expect(result.exitCode).toBeNull();
    expect(result.spawnError).toBeUndefined();
    expect(Date.now() - started).toBeLessThan(30_000);
  });

  test('an already aborted signal runs nothing', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await runner.run(nodeScript('never', 'process.exit(7)'), { signal: controller.signal });

    expect(result).toEqual({ exitCode: null, stdout: '', stderr: '', output: '', canceled: true });
  });
});
