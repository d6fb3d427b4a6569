#!/usr/bin/env node
/**
 * buildgate command line.
 *
 *   buildgate run --revision <rev> --event push [--report report.json]
 *   buildgate matrix --event pull-request
 *   buildgate cache-key --class build --os linux --arch x86_64 --features jemalloc
 *   buildgate serve --port 5000
 *
 * `run` exits 0 when the gate passes and 1 otherwise.
 */

import { Command, InvalidArgumentError } from 'commander';
import fs from 'fs-extra';
import path from 'path';
import { CacheClass } from './domain/cache';
import { ConfigurationError, describeError } from './domain/errors';
import { TriggerEvent } from './domain/pipeline';
import { PipelineConfig, loadConfig } from './config';
import { expandMatrix } from './matrix/expander';
import { parseTriggerEvent } from './matrix/schema';
import { logger, setLogLevel } from './logger';
import { VERSION, createApp, createAppContext } from './server';

/** Where the CLI writes; replaced in tests. */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  setExitCode(code: number): void;
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

function parseEvent(value: string): TriggerEvent {
  const event = parseTriggerEvent(value);
  if (!event) {
    throw new InvalidArgumentError('Expected push, pull-request or pull-request-draft.');
  }
  return event;
}

function parseCacheClass(value: string): CacheClass {
  if (value !== 'build' && value !== 'check') {
    throw new InvalidArgumentError('Expected build or check.');
  }
  return value;
}

function parsePort(value: string): number {
  const port = parseInt(value, 10);
  if (Number.isNaN(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Expected a port number.');
  }
  return port;
}

function json(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

async function load(configPath: string | undefined, io: CliIO): Promise<PipelineConfig | undefined> {
  try {
    const config = await loadConfig(configPath);
    setLogLevel(config.logLevel);
    return config;
  } catch (err) {
    if (err instanceof ConfigurationError) {
      io.stderr(`${err.message}\n`);
      for (const problem of err.problems) {
        io.stderr(`  - ${problem}\n`);
      }
      io.setExitCode(1);
      return undefined;
    }
    throw err;
  }
}

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .name('buildgate')
    .description('Build, lint, test and release gate for a matrix of targets')
    .version(VERSION)
    .option('-c, --config <path>', 'configuration file (default: $BUILDGATE_CONFIG or pipeline.config.json)');

  program
    .command('run')
    .description('Run the full pipeline for a revision and exit with the gate verdict')
    .requiredOption('-r, --revision <revision>', 'source revision being verified')
    .option('-e, --event <event>', 'trigger event', parseEvent, TriggerEvent.Push)
    .option('--report <file>', 'write the JSON report to a file instead of stdout')
    .action(async (options: { revision: string; event: TriggerEvent; report?: string }) => {
      const config = await load(program.opts<{ config?: string }>().config, io);
      if (!config) return;

      const ctx = createAppContext(config);
      let pipelineId: string | undefined;
      const onSignal = (): void => {
        if (!pipelineId) return;
        ctx.orchestrator.cancelPipeline(pipelineId, 'interrupted').catch((err: unknown) => {
          logger.error('Failed to cancel pipeline', { pipelineId, error: describeError(err) });
        });
      };
      process.once('SIGINT', onSignal);
      process.once('SIGTERM', onSignal);

      try {
        const pipeline = await ctx.orchestrator.createPipeline({ revision: options.revision, event: options.event });
        pipelineId = pipeline.id;
        await ctx.orchestrator.executePipeline(pipeline.id);
        const report = await ctx.orchestrator.getReport(pipeline.id);

        if (options.report) {
          const file = path.resolve(options.report);
          await fs.outputJson(file, report, { spaces: 2 });
          io.stdout(`Report written to ${file}\n`);
        } else {
          io.stdout(json(report));
        }
        for (const failure of report.requiredFailures) {
          io.stderr(`required job failed: ${failure}\n`);
        }
        for (const skipped of report.requiredSkipped) {
          io.stderr(`required job skipped: ${skipped}\n`);
        }
        io.setExitCode(report.exitCode);
      } catch (err) {
        if (err instanceof ConfigurationError) {
          io.stderr(`${err.message}\n`);
          io.setExitCode(1);
          return;
        }
        throw err;
      } finally {
        process.removeListener('SIGINT', onSignal);
        process.removeListener('SIGTERM', onSignal);
      }
    });

  program
    .command('matrix')
    .description('Print the jobs a trigger would produce, without running them')
    .option('-e, --event <event>', 'trigger event', parseEvent, TriggerEvent.Push)
    .action(async (options: { event: TriggerEvent }) => {
      const config = await load(program.opts<{ config?: string }>().config, io);
      if (!config) return;
      try {
        const expansion = expandMatrix(config.matrix, options.event, config.policy);
        io.stdout(
          json({
            jobs: expansion.jobs.map((job) => ({
              id: job.id,
              kind: job.kind,
              target: job.target,
              required: job.required,
              failFast: job.failFast,
              timeoutMs: job.timeoutMs,
            })),
            omitted: expansion.omitted,
            warnings: expansion.warnings,
          }),
        );
      } catch (err) {
        if (err instanceof ConfigurationError) {
          io.stderr(`${err.message}\n`);
          io.setExitCode(1);
          return;
        }
        throw err;
      }
    });

  program
    .command('cache-key')
    .description('Print the cache key for a job class and target')
    .option('--class <class>', 'cache class: build or check', parseCacheClass, 'build')
    .requiredOption('--os <os>', 'operating system')
    .option('--arch <arch>', 'CPU architecture (build class)')
    .option('--features <list>', 'comma separated feature flags (build class)', '')
    .action(async (options: { class: CacheClass; os: string; arch?: string; features: string }) => {
      const config = await load(program.opts<{ config?: string }>().config, io);
      if (!config) return;
      const ctx = createAppContext(config);
      const key = await ctx.cache.keyFor({
        cacheClass: options.class,
        operatingSystem: options.os,
        cpuArchitecture: options.arch,
        featureSet: options.features.split(',').filter((f) => f.length > 0),
      });
      io.stdout(`${key}\n`);
    });

  program
    .command('serve')
    .description('Serve the pipeline HTTP API')
    .option('-p, --port <port>', 'port to listen on', parsePort)
    .action(async (options: { port?: number }) => {
      const config = await load(program.opts<{ config?: string }>().config, io);
      if (!config) return;
      const port = options.port ?? config.server.port;
      const app = createApp(createAppContext(config));
      app.listen(port, () => {
        logger.info('API listening', { port, workspaceRoot: config.workspaceRoot });
      });
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      logger.error('Command failed', { error: describeError(err) });
      process.exitCode = 1;
    });
}
