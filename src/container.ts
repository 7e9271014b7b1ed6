import type { TreehopConfig } from './config.js';
import { ContextDetector, type DetectorFileSystem } from './context/contextDetector.js';
import { ContextResolver } from './context/contextResolver.js';
import { CliGitClient } from './git/cliGitClient.js';
import { SpawnCommandExecutor } from './git/commandExecutor.js';
import type { CommandExecutor, GitClient } from './git/types.js';
import type { Logger } from './logger.js';
import { Navigator } from './workspaces/navigation.js';
import { HookRunner } from './hooks/hookRunner.js';
import { WorktreeManager } from './workspaces/worktreeManager.js';

export interface Container {
  config: TreehopConfig;
  logger: Logger;
  git: GitClient;
  detector: ContextDetector;
  resolver: ContextResolver;
  navigator: Navigator;
  worktrees: WorktreeManager;
}

export interface ContainerOverrides {
  executor?: CommandExecutor;
  git?: GitClient;
  fs?: DetectorFileSystem;
}

/**
 * Wire every service from the config. Tests pass a fake git client or
 * executor through `overrides`; the executor also runs project hooks.
 */
export function createContainer(config: TreehopConfig, logger: Logger, overrides: ContainerOverrides = {}): Container {
  const executor = overrides.executor ?? new SpawnCommandExecutor(logger.child({ component: 'exec' }));
  const git =
    overrides.git ??
    new CliGitClient({
      executor,
      timeoutMs: config.git.cliTimeoutMs,
      logger: logger.child({ component: 'git' }),
    });

  const hooks = new HookRunner({
    executor,
    timeoutMs: config.hooks.timeoutMs,
    logger: logger.child({ component: 'hooks' }),
  });

  const detector = new ContextDetector({
    worktreesDirectory: config.worktreesDirectory,
    cacheTtlMs: config.contextDetection.cacheTtlMs,
    fs: overrides.fs,
    logger: logger.child({ component: 'detector' }),
  });

  const resolver = new ContextResolver({
    projectsDirectory: config.projectsDirectory,
    worktreesDirectory: config.worktreesDirectory,
    git,
    validateProjects: config.contextDetection.enableGitValidation,
    logger: logger.child({ component: 'resolver' }),
  });

  const navigator = new Navigator({ resolver, maxSuggestions: config.navigation.maxSuggestions });

  const worktrees = new WorktreeManager({
    config,
    git,
    resolver,
    detector,
    hooks,
    logger: logger.child({ component: 'worktrees' }),
  });

  return { config, logger, git, detector, resolver, navigator, worktrees };
}
