// Predicates
export * from './predicate/index.js';

// Name grammars
export { parseFileName, isBlockType } from './parsing/file-name.js';
export type { BlockType, ParsedFileName } from './parsing/file-name.js';
export { parseSessionName, formatSessionName, isSessionDirectoryName, SessionDateSchema } from './parsing/session-name.js';
export type { ParsedSessionName } from './parsing/session-name.js';

// Containers and enumeration
export * from './containers/index.js';
export { enumerate } from './search/enumerate.js';
export type { EnumerateOptions } from './search/enumerate.js';

// Errors
export * from './errors/index.js';

// Configuration
export { loadConfig, DEFAULT_PATH_CONFIG } from './config/app-config.js';
export type { PathConfig, IndexWidth, ValidatedConfig, LoadConfigOptions } from './config/app-config.js';

// Filesystem
export type { FileSystemPort, FsError, DirEntry, EntryKind } from './ports/file-system.port.js';
export { NodeFileSystem } from './infra/local/file-system.js';

// Logging
export { PinoLoggerFactory, createBootstrapLogger, getBootstrapLogger } from './core/logging/index.js';
export type { Logger, ILoggerFactory, LogLevel } from './core/logging/index.js';

// DI Container
export { initializeContainer, container, resetContainer, isInitialized } from './di/container.js';
export type { ContainerInitOptions } from './di/container.js';
export { DI } from './di/tokens.js';
