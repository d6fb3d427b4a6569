/**
 * Command runner: the single seam through which the orchestrator invokes
 * external tools (compiler, bundler, code generator, container builder).
 *
 * Commands never throw for a non-zero exit: the result carries the exit
 * status and captured output, and the caller classifies the failure.
 */

import execa from 'execa';

/** A fully rendered command invocation. */
export interface CommandSpec {
  /** Display name used in logs and error messages. */
  name: string;
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string>;
}

export interface CommandResult {
  /** Null when the process could not be spawned or was killed by a signal. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Combined stdout and stderr in arrival order. */
  output: string;
  /** True when the run was aborted through the signal. */
  canceled: boolean;
  /** Spawn failure message (e.g., command not found). */
  spawnError?: string;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Receives output chunks as they arrive. */
  onOutput?: (chunk: string) => void;
}

export interface CommandRunner {
  run(spec: CommandSpec, options?: RunOptions): Promise<CommandResult>;
}

/** Grace period before a terminated command is killed outright. */
const FORCE_KILL_AFTER_MS = 5_000;

/** Runs commands as child processes through execa. */
export class ExecaCommandRunner implements CommandRunner {
  async run(spec: CommandSpec, options: RunOptions = {}): Promise<CommandResult> {
    const { signal, onOutput } = options;
    if (signal?.aborted) {
      return { exitCode: null, stdout: '', stderr: '', output: '', canceled: true };
    }

    const subprocess = execa(spec.command, spec.args, {
      cwd: spec.cwd,
      env: spec.env,
      reject: false,
      all: true,
    });

    const onAbort = (): void => {
      subprocess.kill('SIGTERM', { forceKillAfterTimeout: FORCE_KILL_AFTER_MS });
    };
    signal?.addEventListener('abort', onAbort, { once: true });
    if (onOutput) {
      subprocess.all?.on('data', (chunk: Buffer) => onOutput(chunk.toString()));
    }

    try {
      const result = await subprocess;
      const exited = typeof result.exitCode === 'number';
      const canceled = result.isCanceled || signal?.aborted === true;
      return {
        exitCode: exited ? result.exitCode : null,
        stdout: result.stdout,
        stderr: result.stderr,
        output: result.all ?? `${result.stdout}${result.stderr}`,
        canceled,
        spawnError: exited || canceled || result.signal !== undefined
          ? undefined
          : `Could not start "${spec.command}"`,
      };
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
