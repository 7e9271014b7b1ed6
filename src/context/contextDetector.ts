import { lstat, readFile, stat } from 'fs/promises';
import { basename, dirname, isAbsolute, join, relative, sep } from 'path';
import { ContextDetectionError } from '../errors.js';
import { normalizePath } from '../discovery/pathValidation.js';
import type { Logger } from '../logger.js';
import type { Context } from './types.js';
import { WorktreeValidityCache } from './validityCache.js';

export interface FileInfo {
  isFile(): boolean;
  isDirectory(): boolean;
}

/** The filesystem calls detection makes */
export interface DetectorFileSystem {
  stat(path: string): Promise<FileInfo>;
  lstat(path: string): Promise<FileInfo>;
  readFile(path: string): Promise<string>;
}

export const nodeDetectorFileSystem: DetectorFileSystem = {
  stat: (path) => stat(path),
  lstat: (path) => lstat(path),
  readFile: (path) => readFile(path, 'utf-8'),
};

export interface ContextDetectorOptions {
  worktreesDirectory: string;
  cacheTtlMs: number;
  fs?: DetectorFileSystem;
  logger?: Logger;
  now?: () => number;
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Classifies a directory as a worktree, a project checkout or neither.
 *
 * Worktree checks win over the project walk, so a worktree nested inside a
 * project tree is still reported as a worktree.
 */
export class ContextDetector {
  private readonly worktreesDirectory: string;
  private readonly fs: DetectorFileSystem;
  private readonly cache: WorktreeValidityCache;
  private readonly logger?: Logger;

  constructor(options: ContextDetectorOptions) {
    this.worktreesDirectory = options.worktreesDirectory;
    this.fs = options.fs ?? nodeDetectorFileSystem;
    this.cache = new WorktreeValidityCache(options.cacheTtlMs, options.now);
    this.logger = options.logger;
  }

  /**
   * @throws ContextDetectionError when `dir` is empty, missing or unreadable
   */
  async detectContext(dir: string): Promise<Context> {
    if (!dir) {
      throw new ContextDetectionError(dir, 'path is empty');
    }

    const path = await normalizePath(dir);
    try {
      await this.fs.stat(path);
    } catch (err) {
      const code = errorCode(err);
      const reason = code === 'ENOENT' || code === 'ENOTDIR' ? 'path does not exist' : 'cannot access path';
      throw new ContextDetectionError(dir, reason, { cause: err });
    }

    const worktree = await this.detectWorktree(path);
    if (worktree) {
      return worktree;
    }

    const project = await this.detectProject(path);
    if (project) {
      return project;
    }

    const context: Context = {
      type: 'outside-git',
      path,
      explanation: 'Not inside a project or worktree',
    };
    return Object.freeze(context);
  }

  private async detectWorktree(path: string): Promise<Context | null> {
    const root = await normalizePath(this.worktreesDirectory);
    const rel = relative(root, path);
    if (rel === '' || isAbsolute(rel) || rel === '..' || rel.startsWith(`..${sep}`)) {
      return null;
    }

    const segments = rel.split(sep);
    if (segments.length < 2) {
      return null;
    }
    const [projectName, branchName] = segments;

    const worktreeRoot = join(root, projectName, branchName);
    if (!(await this.isValidWorktree(worktreeRoot))) {
      return null;
    }

    const context: Context = {
      type: 'worktree',
      path,
      projectName,
      branchName,
      explanation: `In worktree '${branchName}' of project '${projectName}'`,
    };
    return Object.freeze(context);
  }

  private async isValidWorktree(worktreeRoot: string): Promise<boolean> {
    const cached = this.cache.get(worktreeRoot);
    if (cached !== undefined) {
      this.logger?.trace({ worktreeRoot, valid: cached }, 'worktree validity cache hit');
      return cached;
    }

    const valid = await this.checkGitFile(join(worktreeRoot, '.git'));
    this.cache.set(worktreeRoot, valid);
    this.logger?.debug({ worktreeRoot, valid }, 'worktree validity checked');
    return valid;
  }

  /** A worktree's `.git` is a regular file with a `gitdir:` line */
  private async checkGitFile(gitPath: string): Promise<boolean> {
    try {
      const info = await this.fs.lstat(gitPath);
      if (!info.isFile()) {
        return false;
      }
      const content = await this.fs.readFile(gitPath);
      return content.split('\n').some((line) => line.trimStart().startsWith('gitdir:'));
    } catch (err) {
      this.logger?.trace({ gitPath, err }, 'no worktree git file');
      return false;
    }
  }

  private async detectProject(path: string): Promise<Context | null> {
    let current = path;
    for (;;) {
      if (await this.hasGitDirectory(current)) {
        const projectName = basename(current);
        const context: Context = {
          type: 'project',
          path: current,
          projectName,
          explanation: `In project '${projectName}'`,
        };
        return Object.freeze(context);
      }
      const parent = dirname(current);
      if (parent === current) {
        return null;
      }
      current = parent;
    }
  }

  private async hasGitDirectory(dir: string): Promise<boolean> {
    try {
      const info = await this.fs.stat(join(dir, '.git'));
      return info.isDirectory();
    } catch {
      return false;
    }
  }

  /**
   * Forget cached validity for every worktree under `repoPath`
   * @returns number of cache entries dropped
   */
  async invalidateCacheForRepo(repoPath: string): Promise<number> {
    if (!repoPath) {
      return 0;
    }
    const root = await normalizePath(repoPath);
    const removed = this.cache.invalidateUnder(root);
    this.logger?.debug({ repoPath: root, removed }, 'worktree validity cache invalidated');
    return removed;
  }

  clearCache(): void {
    this.cache.clear();
  }
}
