/**
 * Pipeline configuration.
 *
 * Loaded from a JSON file (pipeline.config.json by default) merged over
 * built-in defaults, then overridden from the environment:
 *
 *   BUILDGATE_CONFIG           path of the configuration file
 *   BUILDGATE_CACHE_DIR        cache backend directory
 *   BUILDGATE_ARTIFACT_DIR     artifact store directory
 *   BUILDGATE_MAX_CONCURRENCY  runner slots
 *   BUILDGATE_LOG_LEVEL        debug | info | warn | error
 *
 * Usage:
 *   const config = await loadConfig('pipeline.config.json');
 *   const result = validateConfig(config);
 */

import path from 'path';
import fs from 'fs-extra';
import { ConfigurationError, configurationError } from './domain/errors';
import { JobKind } from './domain/job';
import { MatrixDeclaration } from './domain/target';
import { CommandTemplate } from './engine/templates';
import { DEFAULT_JOB_POLICY, JobPolicy } from './matrix/expander';
import { validateMatrix } from './matrix/validator';
import { LogLevel, parseLogLevel } from './logger';

/** System packages installed on hosts of a given operating system. */
export interface CapabilityRule {
  operatingSystem: string;
  packages: string[];
  /** `{package}` is replaced by each package name. */
  install: CommandTemplate;
}

export interface ToolchainConfig {
  compilerVersion: string;
  /** `{version}` is replaced by the compiler version. */
  installCompiler: CommandTemplate;
  /** `{target}` is replaced by the cross target triple. */
  addTarget?: CommandTemplate;
  /** Cross target triple per "os/arch". */
  crossTargets: Record<string, string>;
  codegen: {
    name: string;
    version: string;
    /** `{version}` is replaced by the tool version. */
    install: CommandTemplate;
  };
  capabilities: CapabilityRule[];
  /** Registers emulation for `{arch}` on the image host. */
  emulation?: CommandTemplate;
}

export interface CacheConfig {
  /** Key prefix, e.g. "cargo". */
  namespace: string;
  directory: string;
  lockFiles: string[];
  paths: string[];
}

export interface CodegenConfig {
  /** `{out}` is replaced by the scratch directory. */
  generate: CommandTemplate;
  /** Workspace-relative directories holding committed generated code. */
  roots: string[];
  /** Name of the uploaded diff artifact. */
  diffName: string;
}

export interface ImageConfig {
  repository: string;
  /** Placeholders: `{arch}`, `{platform}`, `{image}`, `{revision}`. */
  build: CommandTemplate;
  /** Placeholders: `{manifest}`, `{images}` (space separated). */
  manifest: CommandTemplate;
}

export interface PipelineConfig {
  workspaceRoot: string;
  host: {
    operatingSystem: string;
    cpuArchitecture: string;
  };
  matrix: MatrixDeclaration;
  steps: {
    build: CommandTemplate[];
    lint: CommandTemplate[];
    test: CommandTemplate[];
  };
  /** Workspace-relative path template of the compiled binary. */
  buildOutput?: string;
  toolchain: ToolchainConfig;
  cache: CacheConfig;
  codegen: CodegenConfig;
  images: ImageConfig;
  artifacts: {
    directory: string;
  };
  policy: JobPolicy & {
    maxConcurrency: number;
  };
  logLevel: LogLevel;
  server: {
    port: number;
  };
}

/** Shape of the configuration file: every section optional. */
export type PipelineConfigFile = {
  [K in keyof PipelineConfig]?: PipelineConfig[K] extends unknown[]
    ? PipelineConfig[K]
    : PipelineConfig[K] extends object
      ? Partial<PipelineConfig[K]>
      : PipelineConfig[K];
};

export const DEFAULT_CONFIG_FILE = 'pipeline.config.json';

export function createDefaultConfig(workspaceRoot: string = process.cwd()): PipelineConfig {
  return {
    workspaceRoot,
    host: { operatingSystem: 'linux', cpuArchitecture: 'x86_64' },
    matrix: { targets: [], featureRules: [], imageArchitectures: [] },
    steps: { build: [], lint: [], test: [] },
    toolchain: {
      compilerVersion: 'stable',
      installCompiler: { name: 'install-compiler', command: 'rustup', args: ['toolchain', 'install', '{version}', '--profile', 'minimal'] },
      addTarget: { name: 'add-target', command: 'rustup', args: ['target', 'add', '{target}'] },
      crossTargets: {},
      codegen: {
        name: 'protoc',
        version: 'latest',
        install: { name: 'check-codegen', command: 'protoc', args: ['--version'] },
      },
      capabilities: [],
    },
    cache: {
      namespace: 'cargo',
      directory: '.buildgate/cache',
      lockFiles: ['Cargo.lock'],
      paths: ['target'],
    },
    codegen: {
      generate: { name: 'generate', command: 'make', args: ['gen'], env: { GEN_OUT: '{out}' } },
      roots: [],
      diffName: 'code-gen.diff',
    },
    images: {
      repository: 'buildgate/app',
      build: { name: 'image-build', command: 'docker', args: ['buildx', 'build', '--platform', '{platform}', '-t', '{image}', '.'] },
      manifest: { name: 'image-manifest', command: 'docker', args: ['manifest', 'create', '{manifest}', '{images}'] },
    },
    artifacts: { directory: '.buildgate/artifacts' },
    policy: { ...DEFAULT_JOB_POLICY, maxConcurrency: 4 },
    logLevel: LogLevel.Info,
    server: { port: 5000 },
  };
}

/** Validation result for a configuration. */
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/** Validate a configuration. */
export function validateConfig(config: PipelineConfig): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const matrix = validateMatrix(config.matrix);
  errors.push(...matrix.errors.map((e) => e.message));
  warnings.push(...matrix.warnings);

  if (!config.host.operatingSystem || !config.host.cpuArchitecture) {
    errors.push('host.operatingSystem and host.cpuArchitecture are required');
  }

  for (const kind of ['build', 'lint', 'test'] as const) {
    const steps = config.steps[kind];
    if (!Array.isArray(steps)) {
      errors.push(`steps.${kind} must be an array`);
      continue;
    }
    if (steps.length === 0) {
      warnings.push(`steps.${kind} is empty; ${kind} jobs will succeed without running anything`);
    }
    steps.forEach((step, i) => validateCommand(step, `steps.${kind}[${i}]`, errors));
  }

  validateCommand(config.toolchain.installCompiler, 'toolchain.installCompiler', errors);
  if (config.toolchain.addTarget) validateCommand(config.toolchain.addTarget, 'toolchain.addTarget', errors);
  validateCommand(config.toolchain.codegen.install, 'toolchain.codegen.install', errors);
  if (config.toolchain.emulation) validateCommand(config.toolchain.emulation, 'toolchain.emulation', errors);
  config.toolchain.capabilities.forEach((rule, i) => {
    validateCommand(rule.install, `toolchain.capabilities[${i}].install`, errors);
  });

  for (const target of config.matrix.targets) {
    const key = `${String(target.operatingSystem)}/${String(target.cpuArchitecture)}`;
    if (!config.toolchain.crossTargets[key]) {
      warnings.push(`No cross target declared for ${key}; the compiler default target is used`);
    }
  }

  validateCommand(config.codegen.generate, 'codegen.generate', errors);
  if (!Array.isArray(config.codegen.roots) || config.codegen.roots.length === 0) {
    warnings.push('codegen.roots is empty; the drift check compares nothing');
  }
  validateCommand(config.images.build, 'images.build', errors);
  validateCommand(config.images.manifest, 'images.manifest', errors);

  if (!config.cache.namespace) {
    errors.push('cache.namespace is required');
  }

  if (!Number.isInteger(config.policy.maxConcurrency) || config.policy.maxConcurrency < 1) {
    errors.push('policy.maxConcurrency must be a positive integer');
  }

  for (const kind of Object.values(JobKind)) {
    const timeout = config.policy.timeoutsMs[kind];
    if (typeof timeout !== 'number' || !(timeout > 0)) {
      errors.push(`policy.timeoutsMs.${kind} must be a positive number`);
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}

function validateCommand(command: CommandTemplate | undefined, field: string, errors: string[]): void {
  if (!command || typeof command.command !== 'string' || command.command.length === 0) {
    errors.push(`${field}.command is required`);
    return;
  }
  if (command.args !== undefined && !Array.isArray(command.args)) {
    errors.push(`${field}.args must be an array`);
  }
}

/** Merge a configuration file over the defaults, section by section. */
export function mergeConfig(base: PipelineConfig, file: PipelineConfigFile): PipelineConfig {
  return {
    workspaceRoot: file.workspaceRoot ?? base.workspaceRoot,
    host: { ...base.host, ...file.host },
    matrix: { ...base.matrix, ...file.matrix },
    steps: { ...base.steps, ...file.steps },
    buildOutput: file.buildOutput ?? base.buildOutput,
    toolchain: { ...base.toolchain, ...file.toolchain },
    cache: { ...base.cache, ...file.cache },
    codegen: { ...base.codegen, ...file.codegen },
    images: { ...base.images, ...file.images },
    artifacts: { ...base.artifacts, ...file.artifacts },
    policy: {
      maxConcurrency: file.policy?.maxConcurrency ?? base.policy.maxConcurrency,
      required: { ...base.policy.required, ...file.policy?.required },
      failFast: { ...base.policy.failFast, ...file.policy?.failFast },
      timeoutsMs: { ...base.policy.timeoutsMs, ...file.policy?.timeoutsMs },
    },
    logLevel: file.logLevel ?? base.logLevel,
    server: { ...base.server, ...file.server },
  };
}

/** Apply environment overrides. */
export function applyEnvironment(config: PipelineConfig, env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const result = { ...config };
  if (env.BUILDGATE_CACHE_DIR) {
    result.cache = { ...result.cache, directory: env.BUILDGATE_CACHE_DIR };
  }
  if (env.BUILDGATE_ARTIFACT_DIR) {
    result.artifacts = { ...result.artifacts, directory: env.BUILDGATE_ARTIFACT_DIR };
  }
  if (env.BUILDGATE_MAX_CONCURRENCY) {
    result.policy = { ...result.policy, maxConcurrency: parseInt(env.BUILDGATE_MAX_CONCURRENCY, 10) };
  }
  const level = parseLogLevel(env.BUILDGATE_LOG_LEVEL);
  if (level) {
    result.logLevel = level;
  }
  if (env.PORT) {
    result.server = { ...result.server, port: parseInt(env.PORT, 10) };
  }
  return result;
}

/**
 * Load, merge and validate the configuration.
 * Throws ConfigurationError listing every problem when invalid.
 */
export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<PipelineConfig> {
  const file = path.resolve(configPath ?? env.BUILDGATE_CONFIG ?? DEFAULT_CONFIG_FILE);
  if (!(await fs.pathExists(file))) {
    throw new ConfigurationError(configurationError(`Configuration file not found: ${file}`, { path: file }));
  }

  let parsed: PipelineConfigFile;
  try {
    parsed = await fs.readJson(file);
  } catch (err) {
    throw new ConfigurationError(
      configurationError(`Configuration file is not valid JSON: ${file}`, {
        path: file,
        cause: err instanceof Error ? err.message : String(err),
      }),
    );
  }

  const base = createDefaultConfig(path.dirname(file));
  const merged = mergeConfig(base, parsed);
  merged.workspaceRoot = path.resolve(path.dirname(file), merged.workspaceRoot);

  const config = applyEnvironment(merged, env);
  const result = validateConfig(config);
  if (!result.valid) {
    throw new ConfigurationError(
      configurationError(`Invalid configuration: ${result.errors.join('; ')}`, { problems: result.errors, path: file }),
    );
  }
  return config;
}
