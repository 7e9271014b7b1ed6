import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { ContextDetector, nodeDetectorFileSystem, type DetectorFileSystem } from '../src/context/contextDetector.js';
import { ContextDetectionError } from '../src/errors.js';
import { makeProject, makeTempDir, makeWorktreeDir, removeDir } from './helpers.js';

interface CountingFileSystem extends DetectorFileSystem {
  lstatCalls: number;
  readFileCalls: number;
}

function countingFileSystem(): CountingFileSystem {
  const fs: CountingFileSystem = {
    lstatCalls: 0,
    readFileCalls: 0,
    stat: (path) => nodeDetectorFileSystem.stat(path),
    lstat: (path) => {
      fs.lstatCalls++;
      return nodeDetectorFileSystem.lstat(path);
    },
    readFile: (path) => {
      fs.readFileCalls++;
      return nodeDetectorFileSystem.readFile(path);
    },
  };
  return fs;
}

describe('ContextDetector', () => {
  let root: string;
  let projectsDir: string;
  let worktreesDir: string;
  let fs: CountingFileSystem;
  let now: number;
  let detector: ContextDetector;

  beforeEach(() => {
    root = makeTempDir();
    projectsDir = join(root, 'Projects');
    worktreesDir = join(root, 'Worktrees');
    mkdirSync(projectsDir);
    mkdirSync(worktreesDir);
    fs = countingFileSystem();
    now = 0;
    detector = new ContextDetector({ worktreesDirectory: worktreesDir, cacheTtlMs: 5000, fs, now: () => now });
  });

  afterEach(() => {
    removeDir(root);
  });

  describe('worktrees', () => {
    it('should classify a worktree root', async () => {
      const path = makeWorktreeDir(worktreesDir, 'acme', 'feature-x');

      const context = await detector.detectContext(path);

      expect(context).toEqual({
        type: 'worktree',
        path,
        projectName: 'acme',
        branchName: 'feature-x',
        explanation: "In worktree 'feature-x' of project 'acme'",
      });
      expect(Object.isFrozen(context)).toBe(true);
    });

    it('should classify directories deep inside a worktree by its root', async () => {
      const worktree = makeWorktreeDir(worktreesDir, 'acme', 'feature-x');
      const nested = join(worktree, 'src', 'lib');
      mkdirSync(nested, { recursive: true });

      const context = await detector.detectContext(nested);

      expect(context.type).toBe('worktree');
      expect(context.path).toBe(nested);
      expect(context.projectName).toBe('acme');
      expect(context.branchName).toBe('feature-x');
    });

    it('should not treat a directory with a .git directory as a worktree', async () => {
      const path = join(worktreesDir, 'acme', 'main');
      mkdirSync(join(path, '.git'), { recursive: true });

      const context = await detector.detectContext(path);

      expect(context.type).toBe('project');
      expect(context.projectName).toBe('main');
      expect(context.path).toBe(path);
    });

    it('should not treat a .git file without gitdir as a worktree', async () => {
      const path = join(worktreesDir, 'acme', 'odd');
      mkdirSync(path, { recursive: true });
      writeFileSync(join(path, '.git'), 'something else\n');

      const context = await detector.detectContext(path);

      expect(context.type).toBe('outside-git');
    });

    it('should ignore the worktrees directory and project level directories', async () => {
      makeWorktreeDir(worktreesDir, 'acme', 'feature-x');

      expect((await detector.detectContext(worktreesDir)).type).toBe('outside-git');
      expect((await detector.detectContext(join(worktreesDir, 'acme'))).type).toBe('outside-git');
      expect(fs.lstatCalls).toBe(0);
    });

    it('should prefer the worktree classification over an enclosing project', async () => {
      const host = makeProject(projectsDir, 'host');
      const nestedWorktrees = join(host, 'trees');
      mkdirSync(nestedWorktrees);
      const nestedDetector = new ContextDetector({ worktreesDirectory: nestedWorktrees, cacheTtlMs: 5000 });
      const path = makeWorktreeDir(nestedWorktrees, 'acme', 'feature-x');

      const context = await nestedDetector.detectContext(path);

      expect(context.type).toBe('worktree');
      expect(context.projectName).toBe('acme');
    });
  });

  describe('projects', () => {
    it('should find the repository root from a subdirectory', async () => {
      const project = makeProject(projectsDir, 'acme');
      const nested = join(project, 'packages', 'core');
      mkdirSync(nested, { recursive: true });

      const context = await detector.detectContext(nested);

      expect(context).toEqual({
        type: 'project',
        path: project,
        projectName: 'acme',
        explanation: "In project 'acme'",
      });
    });

    it('should require .git to be a directory', async () => {
      const path = join(projectsDir, 'fake');
      mkdirSync(path);
      writeFileSync(join(path, '.git'), 'gitdir: /elsewhere\n');

      expect((await detector.detectContext(path)).type).toBe('outside-git');
    });
  });

  it('should fall back to outside-git', async () => {
    const context = await detector.detectContext(root);
    expect(context).toEqual({
      type: 'outside-git',
      path: root,
      explanation: 'Not inside a project or worktree',
    });
  });

  it('should reject an empty path', async () => {
    await expect(detector.detectContext('')).rejects.toThrow(ContextDetectionError);
    await expect(detector.detectContext('')).rejects.toThrow('context detection failed for <empty>: path is empty');
  });

  it('should reject a missing path', async () => {
    const missing = join(root, 'missing');
    await expect(detector.detectContext(missing)).rejects.toMatchObject({
      code: 'CONTEXT_DETECTION_FAILED',
      path: missing,
      reason: 'path does not exist',
    });
  });

  it('should return equal contexts for repeated detection', async () => {
    const path = makeWorktreeDir(worktreesDir, 'acme', 'feature-x');
    const first = await detector.detectContext(path);
    const second = await detector.detectContext(path);
    expect(second).toEqual(first);
  });

  describe('validity cache', () => {
    it('should skip the filesystem check on a live cache hit', async () => {
      const path = makeWorktreeDir(worktreesDir, 'acme', 'feature-x');

      await detector.detectContext(path);
      await detector.detectContext(join(path, '.'));

      expect(fs.lstatCalls).toBe(1);
      expect(fs.readFileCalls).toBe(1);
    });

    it('should check again after the repository cache is invalidated', async () => {
      const path = makeWorktreeDir(worktreesDir, 'acme', 'feature-x');
      await detector.detectContext(path);

      expect(await detector.invalidateCacheForRepo(join(worktreesDir, 'acme'))).toBe(1);
      await detector.detectContext(path);

      expect(fs.lstatCalls).toBe(2);
    });

    it('should keep entries of other projects when invalidating', async () => {
      const path = makeWorktreeDir(worktreesDir, 'acme', 'feature-x');
      await detector.detectContext(path);

      expect(await detector.invalidateCacheForRepo(join(worktreesDir, 'acme-two'))).toBe(0);
      await detector.detectContext(path);

      expect(fs.lstatCalls).toBe(1);
    });

    it('should serve the cached result until invalidation', async () => {
      const path = makeWorktreeDir(worktreesDir, 'acme', 'feature-x');
      await detector.detectContext(path);
      rmSync(join(path, '.git'));

      expect((await detector.detectContext(path)).type).toBe('worktree');

      await detector.invalidateCacheForRepo(path);
      expect((await detector.detectContext(path)).type).toBe('outside-git');
    });

    it('should expire entries after the ttl', async () => {
      const path = makeWorktreeDir(worktreesDir, 'acme', 'feature-x');
      await detector.detectContext(path);

      now += 5000;
      await detector.detectContext(path);

      expect(fs.lstatCalls).toBe(2);
    });

    it('should check again after clearCache', async () => {
      const path = makeWorktreeDir(worktreesDir, 'acme', 'feature-x');
      await detector.detectContext(path);

      detector.clearCache();
      await detector.detectContext(path);

      expect(fs.lstatCalls).toBe(2);
    });
  });
});
