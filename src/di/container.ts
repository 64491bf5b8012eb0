import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import { type Result, ok, err } from 'neverthrow';
import { DI } from './tokens.js';
import { type PathConfig, loadConfig } from '../config/app-config.js';
import type { ConfigInvalidError } from '../errors/app-error.js';
import { formatError } from '../errors/formatter.js';
import { PinoLoggerFactory, createBootstrapLogger } from '../core/logging/index.js';
import type { FileSystemPort } from '../ports/file-system.port.js';
import { NodeFileSystem } from '../infra/local/file-system.js';
import { ContainerRegistry } from '../containers/registry.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

export interface ContainerInitOptions {
  /** environment to read configuration from; defaults to process.env */
  readonly env?: Record<string, string | undefined>;
  /** filesystem adapter; defaults to the local filesystem */
  readonly fileSystem?: FileSystemPort;
}

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(env: Record<string, string | undefined>): Result<void, ConfigInvalidError> {
  // Tests may inject config before initialization; do not overwrite it.
  if (container.isRegistered(DI.Config.Path)) {
    return ok(undefined);
  }

  const configResult = loadConfig({ env });
  if (configResult.isErr()) {
    createBootstrapLogger('di').error({ issues: configResult.error.issues }, formatError(configResult.error));
    return err(configResult.error);
  }

  container.register<PathConfig>(DI.Config.Path, { useValue: configResult.value });
  return ok(undefined);
}

function registerInfra(fileSystem: FileSystemPort | undefined): void {
  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register(DI.Logging.Factory, {
      useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
    });
  }
  if (!container.isRegistered(DI.Infra.FileSystem)) {
    container.register<FileSystemPort>(DI.Infra.FileSystem, { useValue: fileSystem ?? new NodeFileSystem() });
  }
}

function registerContainers(): void {
  container.register(DI.Containers.Registry, {
    useFactory: instanceCachingFactory((c) => c.resolve(ContainerRegistry)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container: validated configuration, logging, the
 * filesystem adapter and the container registry.
 *
 * Idempotent: calls after a successful initialization return immediately.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Result<void, ConfigInvalidError> {
  if (initialized) return ok(undefined);

  const configured = registerConfig(options.env ?? process.env);
  if (configured.isErr()) return configured;

  registerInfra(options.fileSystem);
  registerContainers();
  initialized = true;
  createBootstrapLogger('di').debug('container initialized');
  return ok(undefined);
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

/**
 * Check initialization state.
 */
export function isInitialized(): boolean {
  return initialized;
}

// Export container for direct access when needed
export { container };
