import { mkdir, stat } from 'fs/promises';
import { dirname, join } from 'path';
import type { TreehopConfig } from '../config.js';
import type { ContextDetector } from '../context/contextDetector.js';
import type { ContextResolver } from '../context/contextResolver.js';
import type { Context, ResolutionResult } from '../context/types.js';
import { isContainedPath, normalizePath } from '../discovery/pathValidation.js';
import { discoverProjects, findProject } from '../discovery/repoDiscovery.js';
import { ConflictError, NotFoundError, ValidationError } from '../errors.js';
import type { GitClient, WorktreeInfo } from '../git/types.js';
import type { HookRunner } from '../hooks/hookRunner.js';
import type { Logger } from '../logger.js';
import type { DiscoveredProject } from '../types/discovery.js';
import { findWorktreeBranchProblem } from './branchValidation.js';
import type {
  CreatedWorktree,
  CreateWorktreeRequest,
  DeletedWorktree,
  DeleteWorktreeRequest,
  ListWorktreesRequest,
  PrunedWorktree,
  PruneRequest,
  PruneResult,
  SkippedWorktree,
  WorktreeSummary,
} from './types.js';

export interface WorktreeManagerOptions {
  config: TreehopConfig;
  git: GitClient;
  resolver: ContextResolver;
  detector: ContextDetector;
  hooks: HookRunner;
  logger: Logger;
}

interface ResolvedWorktree {
  path: string;
  projectName: string;
  branchName: string;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Creates, deletes, lists and prunes worktrees through the git client.
 * Every mutation drops the detector's cached validity for the project.
 */
export class WorktreeManager {
  private readonly config: TreehopConfig;
  private readonly git: GitClient;
  private readonly resolver: ContextResolver;
  private readonly detector: ContextDetector;
  private readonly hooks: HookRunner;
  private readonly logger: Logger;

  constructor(options: WorktreeManagerOptions) {
    this.config = options.config;
    this.git = options.git;
    this.resolver = options.resolver;
    this.detector = options.detector;
    this.hooks = options.hooks;
    this.logger = options.logger;
  }

  private get discovery() {
    return { validate: this.config.contextDetection.enableGitValidation };
  }

  private findProject(name: string): Promise<DiscoveredProject> {
    return findProject(this.config.projectsDirectory, name, this.git, this.discovery);
  }

  private async invalidateProject(projectName: string): Promise<void> {
    await this.detector.invalidateCacheForRepo(join(this.config.worktreesDirectory, projectName));
  }

  /** Resolve a worktree identifier, rejecting anything that is not a worktree */
  private async resolveWorktreeTarget(context: Context, target: string): Promise<ResolvedWorktree> {
    const result: ResolutionResult = await this.resolver.resolveIdentifier(context, target);
    if (result.type === 'invalid') {
      throw new ValidationError('target', target, result.explanation, {
        suggestions: ['Use <branch> inside a project or <project>/<branch> anywhere'],
      });
    }
    if (result.type !== 'worktree' || !result.projectName || !result.branchName) {
      throw new ValidationError('target', target, 'does not name a worktree');
    }
    return { path: result.resolvedPath, projectName: result.projectName, branchName: result.branchName };
  }

  /** A failed branch deletion leaves the branch and is reported, not thrown */
  private async tryDeleteBranch(project: DiscoveredProject, branchName: string, force: boolean): Promise<boolean> {
    try {
      await this.git.deleteBranch(project.path, branchName, force);
      return true;
    } catch (err) {
      this.logger.warn({ err, projectName: project.name, branchName }, 'worktree removed but branch was kept');
      return false;
    }
  }

  async createWorktree(request: CreateWorktreeRequest): Promise<CreatedWorktree> {
    const { context, branchName } = request;

    const problem = findWorktreeBranchProblem(branchName);
    if (problem) {
      throw new ValidationError('branch name', branchName, problem);
    }

    const projectName = request.projectName ?? context.projectName;
    if (!projectName) {
      throw new ValidationError('project', '', 'not inside a project and no project given', {
        suggestions: [`Use project/${branchName} to pick the project`],
      });
    }

    const project = await this.findProject(projectName);
    const { path } = await this.resolveWorktreeTarget(context, `${projectName}/${branchName}`);

    if (await pathExists(path)) {
      throw new ConflictError('worktree', `worktree already exists at ${path}`, {
        suggestions: [`treehop cd ${projectName}/${branchName}`],
      });
    }

    await mkdir(dirname(path), { recursive: true });
    const sourceBranch = request.sourceBranch ?? this.config.defaultSourceBranch;
    await this.git.createWorktree(project.path, branchName, sourceBranch, path);
    await this.invalidateProject(projectName);

    this.logger.info({ projectName, branchName, path, sourceBranch }, 'worktree created');

    const hookResult = await this.hooks.run({
      hookType: 'post-create',
      projectPath: project.path,
      worktreePath: path,
      projectName,
      branchName,
      sourceBranch,
    });
    return { projectName, branchName, path, hookResult };
  }

  async deleteWorktree(request: DeleteWorktreeRequest): Promise<DeletedWorktree> {
    const { context, target, force, keepBranch } = request;
    const { path, projectName, branchName } = await this.resolveWorktreeTarget(context, target);

    if (!(await pathExists(path))) {
      throw new NotFoundError('worktree', target, `worktree not found: ${path}`, {
        suggestions: ['Run `treehop list` to see existing worktrees'],
      });
    }

    const project = await this.findProject(projectName);

    if (!force && (await this.git.hasUncommittedChanges(path))) {
      throw new ConflictError('worktree', `worktree ${projectName}/${branchName} has uncommitted changes`, {
        suggestions: ['Commit or stash the changes first', 'Use --force to delete anyway'],
      });
    }

    const [resolvedWorktree, resolvedCurrent] = await Promise.all([
      normalizePath(path),
      normalizePath(context.path),
    ]);
    const navigateTo = isContainedPath(resolvedWorktree, resolvedCurrent) ? project.path : null;

    await this.git.deleteWorktree(project.path, path, force);

    const branchDeleted = !keepBranch && (await this.tryDeleteBranch(project, branchName, force));

    await this.invalidateProject(projectName);
    this.logger.info({ projectName, branchName, path, branchDeleted }, 'worktree deleted');
    return { path, projectName, branchName, branchDeleted, navigateTo };
  }

  private async projectsFor(context: Context, projectName: string | undefined, all: boolean): Promise<DiscoveredProject[]> {
    if (all) {
      return discoverProjects(this.config.projectsDirectory, this.git, this.discovery);
    }
    const name = projectName ?? context.projectName;
    if (!name) {
      throw new ValidationError('project', '', 'not inside a project', {
        suggestions: ['Use --all for every project', 'Use --project <name> for one project'],
      });
    }
    return [await this.findProject(name)];
  }

  private async linkedWorktrees(project: DiscoveredProject): Promise<WorktreeInfo[]> {
    const worktrees = await this.git.listWorktrees(project.path);
    return worktrees.filter((worktree) => !worktree.isMain && !worktree.isBare);
  }

  async listWorktrees(request: ListWorktreesRequest): Promise<WorktreeSummary[]> {
    const projects = await this.projectsFor(request.context, request.projectName, request.all);
    const summaries: WorktreeSummary[] = [];

    for (const project of projects) {
      let worktrees: WorktreeInfo[];
      try {
        worktrees = await this.linkedWorktrees(project);
      } catch (err) {
        if (!request.all) throw err;
        this.logger.warn({ err, project: project.name }, 'cannot list worktrees');
        continue;
      }
      for (const worktree of worktrees) {
        summaries.push({
          projectName: project.name,
          branchName: worktree.branch,
          path: worktree.path,
          commit: worktree.commit,
          isLocked: worktree.isLocked,
          isPrunable: worktree.isPrunable,
        });
      }
    }

    return summaries;
  }

  /**
   * Delete worktrees whose branch is merged. Worktrees are skipped, with a
   * reason, when they hold the current directory, carry a protected branch,
   * are unmerged, have local changes (without force) or on a dry run.
   */
  async pruneMergedWorktrees(request: PruneRequest): Promise<PruneResult> {
    const { context, target, all, dryRun, force, deleteBranches } = request;
    if (target && all) {
      throw new ValidationError('target', target, 'cannot combine a target with --all');
    }

    let projects: DiscoveredProject[];
    let onlyBranch: string | null = null;
    if (target) {
      const resolved = await this.resolveWorktreeTarget(context, target);
      projects = [await this.findProject(resolved.projectName)];
      onlyBranch = resolved.branchName;
    } else {
      projects = await this.projectsFor(context, undefined, all);
    }

    const currentPath = await normalizePath(context.path);
    const deleted: PrunedWorktree[] = [];
    const skipped: SkippedWorktree[] = [];

    for (const project of projects) {
      const worktrees = (await this.linkedWorktrees(project)).filter(
        (worktree) => onlyBranch === null || worktree.branch === onlyBranch
      );
      let removedAny = false;

      try {
        for (const worktree of worktrees) {
          const skip = (reason: SkippedWorktree['reason']) =>
            skipped.push({ projectName: project.name, branchName: worktree.branch, path: worktree.path, reason });

          const branch = worktree.branch;
          if (branch === null) {
            skip('detached');
            continue;
          }
          if (isContainedPath(await normalizePath(worktree.path), currentPath)) {
            skip('current');
            continue;
          }
          if (this.config.validation.protectedBranches.includes(branch)) {
            skip('protected');
            continue;
          }
          if (!(await this.git.isBranchMerged(project.path, branch))) {
            skip('unmerged');
            continue;
          }
          if (!force && !worktree.isPrunable && (await this.git.hasUncommittedChanges(worktree.path))) {
            skip('dirty');
            continue;
          }
          if (dryRun) {
            skip('dry-run');
            continue;
          }

          await this.git.deleteWorktree(project.path, worktree.path, force);
          removedAny = true;
          const branchDeleted = deleteBranches && (await this.tryDeleteBranch(project, branch, force));
          deleted.push({ projectName: project.name, branchName: branch, path: worktree.path, branchDeleted });
          this.logger.info({ projectName: project.name, branchName: branch, branchDeleted }, 'merged worktree pruned');
        }
      } finally {
        // Also runs when a deletion failed part way through the project
        if (removedAny) {
          await this.git.pruneWorktrees(project.path);
        }
        await this.invalidateProject(project.name);
      }
    }

    return { deleted, skipped };
  }
}
