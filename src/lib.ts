export { loadConfig, createConfig, resolveConfigPath } from './config.js';
export type { TreehopConfig, ConfigValues, ConfigOverrides, LoadConfigOptions } from './config.js';
export { createLogger, createSilentLogger, isLogLevel, LOG_LEVELS } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export * from './errors.js';
export { normalizePath, isPathUnder, isContainedPath, containsPathTraversal } from './discovery/pathValidation.js';
export { discoverProjects, findProject } from './discovery/repoDiscovery.js';
export type { DiscoveredProject, DiscoveryOptions } from './types/discovery.js';
export { ContextDetector, nodeDetectorFileSystem } from './context/contextDetector.js';
export type { ContextDetectorOptions, DetectorFileSystem, FileInfo } from './context/contextDetector.js';
export { ContextResolver } from './context/contextResolver.js';
export type { ContextResolverOptions } from './context/contextResolver.js';
export { parseDuration, parseCacheTtl, DEFAULT_CACHE_TTL_MS } from './context/duration.js';
export * from './context/types.js';
export { CliGitClient, parseWorktreeList, parseBranchList } from './git/cliGitClient.js';
export { SpawnCommandExecutor } from './git/commandExecutor.js';
export type * from './git/types.js';
export { HookRunner, PROJECT_HOOKS_FILE } from './hooks/hookRunner.js';
export type { HookRunnerOptions } from './hooks/hookRunner.js';
export type * from './hooks/types.js';
export { WorktreeManager } from './workspaces/worktreeManager.js';
export { Navigator } from './workspaces/navigation.js';
export { findBranchNameProblem, findWorktreeBranchProblem } from './workspaces/branchValidation.js';
export type * from './workspaces/types.js';
export { createContainer } from './container.js';
export type { Container, ContainerOverrides } from './container.js';
export { createMainCommand, VERSION } from './cli.js';
export type { CliIO, CliDependencies } from './cli.js';
