import { stat } from 'fs/promises';
import { join } from 'path';
import { ResolutionError } from '../errors.js';
import { containsPathTraversal, isPathUnder } from '../discovery/pathValidation.js';
import { discoverProjects } from '../discovery/repoDiscovery.js';
import type { GitClient, WorktreeInfo } from '../git/types.js';
import type { Logger } from '../logger.js';
import {
  DEFAULT_SUGGESTION_OPTIONS,
  type Context,
  type ResolutionResult,
  type ResolutionSuggestion,
  type SuggestionOptions,
} from './types.js';

export interface ContextResolverOptions {
  projectsDirectory: string;
  worktreesDirectory: string;
  git: GitClient;
  /** Validate discovered projects through git */
  validateProjects: boolean;
  logger?: Logger;
}

/** One suggestion source's outcome; a failed source contributes nothing */
type SourceResult<T> = { ok: true; items: T[] } | { ok: false; error: unknown };

async function fromSource<T>(load: () => Promise<T[]>): Promise<SourceResult<T>> {
  try {
    return { ok: true, items: await load() };
  } catch (error) {
    return { ok: false, error };
  }
}

const IDENTIFIER_FORMATS = [
  "'main' for the current project's root",
  "'<branch>' for a worktree of the current project",
  "'<project>' from outside a project",
  "'<project>/<branch>' for a worktree of another project",
];

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

function invalid(explanation: string): ResolutionResult {
  const result: ResolutionResult = { resolvedPath: '', type: 'invalid', explanation };
  return Object.freeze(result);
}

/**
 * Turns short identifiers into checked paths and offers completions
 */
export class ContextResolver {
  private readonly projectsDirectory: string;
  private readonly worktreesDirectory: string;
  private readonly git: GitClient;
  private readonly validateProjects: boolean;
  private readonly logger?: Logger;

  constructor(options: ContextResolverOptions) {
    this.projectsDirectory = options.projectsDirectory;
    this.worktreesDirectory = options.worktreesDirectory;
    this.git = options.git;
    this.validateProjects = options.validateProjects;
    this.logger = options.logger;
  }

  /**
   * Resolve `identifier` relative to `ctx`.
   *
   * A malformed identifier or an unusable context gives an `invalid` result;
   * an empty identifier, traversal or an escaping path throws.
   * @throws ResolutionError
   */
  async resolveIdentifier(ctx: Context, identifier: string): Promise<ResolutionResult> {
    if (!identifier) {
      throw new ResolutionError(identifier, ctx.path, 'identifier is empty', {
        suggestions: IDENTIFIER_FORMATS,
      });
    }
    if (containsPathTraversal(identifier)) {
      throw new ResolutionError(identifier, ctx.path, 'path traversal detected in identifier', {
        suggestions: ["Use a plain project or branch name without '..'"],
      });
    }

    const contextType: string = ctx.type;
    switch (ctx.type) {
      case 'project':
      case 'worktree':
        if (identifier.includes('/')) {
          return this.resolveCrossProject(ctx, identifier);
        }
        if (!ctx.projectName) {
          return invalid(`The current ${ctx.type} context has no project name`);
        }
        this.assertSafeComponent(ctx, identifier, ctx.projectName, 'project name');
        if (identifier === 'main') {
          return this.resolveProject(ctx, identifier, ctx.projectName);
        }
        return this.resolveWorktree(ctx, identifier, ctx.projectName, identifier);
      case 'outside-git':
        if (identifier.includes('/')) {
          return this.resolveCrossProject(ctx, identifier);
        }
        return this.resolveProject(ctx, identifier, identifier);
      default:
        return invalid(`Cannot resolve '${identifier}' from an unknown context type '${contextType}'`);
    }
  }

  private resolveCrossProject(ctx: Context, identifier: string): Promise<ResolutionResult> {
    const parts = identifier.split('/');
    if (parts.length !== 2 || parts.some((part) => part === '')) {
      return Promise.resolve(
        invalid(`Invalid reference '${identifier}': expected the format 'project/branch'`)
      );
    }
    const [projectName, branchName] = parts;
    return this.resolveWorktree(ctx, identifier, projectName, branchName);
  }

  private assertSafeComponent(ctx: Context, identifier: string, component: string, label: string): void {
    if (containsPathTraversal(component)) {
      throw new ResolutionError(identifier, ctx.path, `path traversal detected in ${label} '${component}'`, {
        suggestions: ["Use a plain project or branch name without '..'"],
      });
    }
  }

  private async assertContained(ctx: Context, identifier: string, baseDir: string, target: string): Promise<void> {
    if (!(await isPathUnder(baseDir, target))) {
      throw new ResolutionError(identifier, ctx.path, `resolved path ${target} escapes ${baseDir}`);
    }
  }

  private async resolveProject(ctx: Context, identifier: string, projectName: string): Promise<ResolutionResult> {
    this.assertSafeComponent(ctx, identifier, projectName, 'project name');
    const resolvedPath = join(this.projectsDirectory, projectName);
    await this.assertContained(ctx, identifier, this.projectsDirectory, resolvedPath);

    const result: ResolutionResult = {
      resolvedPath,
      type: 'project',
      projectName,
      explanation:
        identifier === 'main' && ctx.type !== 'outside-git'
          ? `Root of project '${projectName}'`
          : `Project '${projectName}'`,
    };
    return Object.freeze(result);
  }

  private async resolveWorktree(
    ctx: Context,
    identifier: string,
    projectName: string,
    branchName: string
  ): Promise<ResolutionResult> {
    this.assertSafeComponent(ctx, identifier, projectName, 'project name');
    this.assertSafeComponent(ctx, identifier, branchName, 'branch name');
    const resolvedPath = join(this.worktreesDirectory, projectName, branchName);
    await this.assertContained(ctx, identifier, this.worktreesDirectory, resolvedPath);

    const result: ResolutionResult = {
      resolvedPath,
      type: 'worktree',
      projectName,
      branchName,
      explanation: `Worktree '${branchName}' of project '${projectName}'`,
    };
    return Object.freeze(result);
  }

  /**
   * Completion candidates for `partial`. Git failures drop the affected
   * source; this never rejects because of them.
   */
  async getResolutionSuggestions(
    ctx: Context,
    partial: string,
    options: SuggestionOptions = DEFAULT_SUGGESTION_OPTIONS
  ): Promise<ResolutionSuggestion[]> {
    if (ctx.type === 'outside-git') {
      return this.projectSuggestions(partial);
    }
    if (ctx.type !== 'project' && ctx.type !== 'worktree') {
      return [];
    }

    const suggestions: ResolutionSuggestion[] = [];
    const projectName = ctx.projectName;

    if (!options.existingOnly && 'main'.startsWith(partial)) {
      suggestions.push({
        text: 'main',
        description: 'Project root directory',
        type: 'project',
        projectName,
      });
    }

    const [worktrees, branches] = await Promise.all([
      fromSource(() => this.git.listWorktrees(ctx.path)),
      fromSource(() => this.git.listBranches(ctx.path)),
    ]);

    let worktreeBranches = new Set<string>();
    if (worktrees.ok) {
      worktreeBranches = new Set(
        worktrees.items.map((worktree) => worktree.branch).filter((branch): branch is string => branch !== null)
      );
      suggestions.push(...(await this.worktreeSuggestions(worktrees.items, partial, options, projectName)));
    } else {
      this.logger?.debug({ err: worktrees.error, path: ctx.path }, 'worktree suggestions unavailable');
    }

    if (branches.ok) {
      for (const branch of branches.items) {
        if (!branch.name.startsWith(partial) || worktreeBranches.has(branch.name)) continue;
        suggestions.push({
          text: branch.name,
          description: `Branch ${branch.name} (create worktree)`,
          type: 'project',
          projectName,
          branchName: branch.name,
        });
      }
    } else {
      this.logger?.debug({ err: branches.error, path: ctx.path }, 'branch suggestions unavailable');
    }

    return suggestions;
  }

  private async worktreeSuggestions(
    worktrees: WorktreeInfo[],
    partial: string,
    options: SuggestionOptions,
    projectName: string | undefined
  ): Promise<ResolutionSuggestion[]> {
    const suggestions: ResolutionSuggestion[] = [];
    for (const worktree of worktrees) {
      if (worktree.isMain || worktree.isBare || worktree.branch === null) continue;
      if (!worktree.branch.startsWith(partial)) continue;
      if (options.existingOnly && !(await pathExists(worktree.path))) continue;
      suggestions.push({
        text: worktree.branch,
        description: `Worktree for branch ${worktree.branch}`,
        type: 'worktree',
        projectName,
        branchName: worktree.branch,
      });
    }
    return suggestions;
  }

  private async projectSuggestions(partial: string): Promise<ResolutionSuggestion[]> {
    const projects = await fromSource(() =>
      discoverProjects(this.projectsDirectory, this.git, { validate: this.validateProjects })
    );
    if (!projects.ok) {
      this.logger?.debug({ err: projects.error }, 'project suggestions unavailable');
      return [];
    }
    return projects.items
      .filter((project) => project.name.startsWith(partial))
      .map((project): ResolutionSuggestion => ({
        text: project.name,
        description: 'Project directory',
        type: 'project',
        projectName: project.name,
      }));
  }
}
