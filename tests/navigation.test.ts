import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { ContextResolver } from '../src/context/contextResolver.js';
import type { Context } from '../src/context/types.js';
import { NotFoundError, ResolutionError } from '../src/errors.js';
import { Navigator } from '../src/workspaces/navigation.js';
import { FakeGitClient, makeProject, makeWorkspace, makeWorktreeDir, removeDir, type Workspace } from './helpers.js';

describe('Navigator', () => {
  let ws: Workspace;
  let git: FakeGitClient;
  let resolver: ContextResolver;
  let projectPath: string;
  let projectCtx: Context;

  function navigator(maxSuggestions = 0): Navigator {
    return new Navigator({ resolver, maxSuggestions });
  }

  beforeEach(() => {
    ws = makeWorkspace();
    git = new FakeGitClient();
    resolver = new ContextResolver({
      projectsDirectory: ws.projectsDir,
      worktreesDirectory: ws.worktreesDir,
      git,
      validateProjects: true,
    });
    projectPath = makeProject(ws.projectsDir, 'acme');
    projectCtx = { type: 'project', path: projectPath, projectName: 'acme', explanation: '' };
  });

  afterEach(() => {
    removeDir(ws.root);
  });

  describe('resolvePath', () => {
    it('should return existing targets', async () => {
      const worktree = makeWorktreeDir(ws.worktreesDir, 'acme', 'feature-x');

      expect((await navigator().resolvePath(projectCtx, 'feature-x')).resolvedPath).toBe(worktree);
      expect((await navigator().resolvePath(projectCtx, 'main')).resolvedPath).toBe(projectPath);
    });

    it('should suggest creating a missing worktree', async () => {
      const error = await navigator()
        .resolvePath(projectCtx, 'feature-q')
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({
        message: `worktree not found: ${join(ws.worktreesDir, 'acme', 'feature-q')}`,
        suggestions: ['treehop create feature-q'],
      });
    });

    it('should report a missing project', async () => {
      const outside: Context = { type: 'outside-git', path: ws.root, explanation: '' };
      await expect(navigator().resolvePath(outside, 'ghost')).rejects.toThrow(
        `project not found: ${join(ws.projectsDir, 'ghost')}`
      );
    });

    it('should turn invalid results into errors', async () => {
      await expect(navigator().resolvePath(projectCtx, 'a/b/c')).rejects.toThrow(ResolutionError);
    });
  });

  describe('suggest', () => {
    beforeEach(() => {
      git.addRepo(projectPath);
      git.addBranch(projectPath, 'feature-a');
      git.addBranch(projectPath, 'feature-b');
    });

    it('should return every suggestion when unlimited', async () => {
      const suggestions = await navigator().suggest(projectCtx, '');
      expect(suggestions.map((s) => s.text)).toEqual(['main', 'feature-a', 'feature-b']);
    });

    it('should cap suggestions', async () => {
      const suggestions = await navigator(2).suggest(projectCtx, '');
      expect(suggestions.map((s) => s.text)).toEqual(['main', 'feature-a']);
    });
  });
});
