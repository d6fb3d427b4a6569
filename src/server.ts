/**
 * Application assembly.
 *
 * Wires configuration, storage, the command runner and the job handlers
 * into an orchestrator, and exposes it over HTTP.
 */

import path from 'path';
import express from 'express';
import { ArtifactService } from './artifacts/artifact-service';
import { ArtifactContentStore, FileSystemArtifactStore } from './artifacts/content-store';
import { CacheBackend, FileSystemCacheBackend } from './cache/backend';
import { CacheManager } from './cache/cache-manager';
import { PipelineConfig } from './config';
import { DataPlanePublisher } from './data-plane/publisher';
import { BuildExecutor } from './engine/build-executor';
import { CommandRunner, ExecaCommandRunner } from './engine/command-runner';
import { DriftDetector } from './engine/drift-detector';
import { ImagePublisher } from './engine/image-publisher';
import { PipelineOrchestrator } from './engine/orchestrator';
import { IMAGE_OPERATING_SYSTEM } from './matrix/expander';
import { createMemoryStore } from './storage/memory-store';
import { Store } from './storage/store';
import { ToolchainProvisioner } from './toolchain/provisioner';
import { errorHandler } from './api/middleware';
import { createPipelineRoutes } from './api/pipelines';
import { createArtifactRoutes } from './api/artifacts';
import { createEventRoutes } from './api/events';
import { logger } from './logger';

const startTime = Date.now();

export const VERSION = '0.1.0';

/** Application context containing all services. */
export interface AppContext {
  config: PipelineConfig;
  store: Store;
  publisher: DataPlanePublisher;
  artifacts: ArtifactService;
  cache: CacheManager;
  provisioner: ToolchainProvisioner;
  orchestrator: PipelineOrchestrator;
}

/** Replaceable collaborators, mainly for tests. */
export interface AppOverrides {
  store?: Store;
  runner?: CommandRunner;
  cacheBackend?: CacheBackend;
  contentStore?: ArtifactContentStore;
}

/** Create the application context with all services. */
export function createAppContext(config: PipelineConfig, overrides: AppOverrides = {}): AppContext {
  const root = config.workspaceRoot;
  const store = overrides.store ?? createMemoryStore();
  const runner = overrides.runner ?? new ExecaCommandRunner();
  const publisher = new DataPlanePublisher(store.events);
  const artifacts = new ArtifactService(
    overrides.contentStore ?? new FileSystemArtifactStore(path.resolve(root, config.artifacts.directory)),
    store.artifacts,
    publisher,
  );
  const cache = new CacheManager(
    overrides.cacheBackend ?? new FileSystemCacheBackend(path.resolve(root, config.cache.directory)),
    {
      workspaceRoot: root,
      namespace: config.cache.namespace,
      lockFiles: config.cache.lockFiles,
      paths: config.cache.paths,
    },
  );
  const provisioner = new ToolchainProvisioner(runner, config.toolchain, config.host, root);

  const images = new ImagePublisher(runner, provisioner, artifacts, {
    workspaceRoot: root,
    images: config.images,
    operatingSystem: IMAGE_OPERATING_SYSTEM,
  });
  const orchestrator = new PipelineOrchestrator(
    {
      store,
      publisher,
      artifacts,
      handlers: [
        new BuildExecutor(runner, provisioner, cache, artifacts, {
          workspaceRoot: root,
          host: config.host,
          steps: config.steps,
          buildOutput: config.buildOutput,
        }),
        new DriftDetector(runner, provisioner, artifacts, { workspaceRoot: root, codegen: config.codegen }),
        images,
      ],
      manifests: images,
    },
    {
      matrix: config.matrix,
      policy: config.policy,
      maxConcurrency: config.policy.maxConcurrency,
    },
  );

  return { config, store, publisher, artifacts, cache, provisioner, orchestrator };
}

/** Create and configure the Express application. */
export function createApp(ctx: AppContext): express.Application {
  const app = express();

  // Body parsing
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      uptimeMs: Date.now() - startTime,
      storage: 'memory',
    });
  });

  // Versioned API routes: /api/v1 prefix
  const v1 = express.Router();
  v1.use('/', createPipelineRoutes(ctx.orchestrator));
  v1.use('/', createArtifactRoutes(ctx.store, ctx.orchestrator, ctx.artifacts));
  v1.use('/', createEventRoutes(ctx.orchestrator, ctx.publisher));
  app.use('/api/v1', v1);

  // Error handler
  app.use(errorHandler);

  logger.debug('Application assembled', { workspaceRoot: ctx.config.workspaceRoot });
  return app;
}
