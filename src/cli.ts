import { defineCommand, type CommandDef } from 'citty';
import { loadConfig, type ConfigOverrides } from './config.js';
import { createContainer, type Container } from './container.js';
import { isGitContext, type Context } from './context/types.js';
import { formatError, ValidationError } from './errors.js';
import { createLogger, type Logger } from './logger.js';

export const VERSION = '0.3.0';

/** Where command output goes; stdout lines are meant for scripts and shells */
export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  cwd(): string;
  setExitCode(code: number): void;
}

export interface CliDependencies {
  io?: CliIO;
  createContainer?: (overrides: ConfigOverrides) => Container;
}

const processIO: CliIO = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
  cwd: () => process.cwd(),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

function defaultContainer(overrides: ConfigOverrides): Container {
  const config = loadConfig({ overrides });
  return createContainer(config, createLogger(config.logLevel));
}

const globalArgs = {
  'projects-dir': {
    type: 'string',
    description: 'Projects directory (overrides config)',
  },
  'worktrees-dir': {
    type: 'string',
    description: 'Worktrees directory (overrides config)',
  },
  'log-level': {
    type: 'string',
    description: 'Log level: fatal, error, warn, info, debug, trace or silent',
  },
} as const;

interface GlobalArgValues {
  'projects-dir'?: string;
  'worktrees-dir'?: string;
  'log-level'?: string;
}

function overridesFrom(args: GlobalArgValues): ConfigOverrides {
  return {
    projectsDirectory: args['projects-dir'] || undefined,
    worktreesDirectory: args['worktrees-dir'] || undefined,
    logLevel: args['log-level'] || undefined,
  };
}

function describeContext(context: Context): string[] {
  const lines = [`type: ${context.type}`];
  if (context.projectName) lines.push(`project: ${context.projectName}`);
  if (context.branchName) lines.push(`branch: ${context.branchName}`);
  lines.push(`path: ${context.path}`);
  lines.push(`explanation: ${context.explanation}`);
  return lines;
}

/**
 * Build the `treehop` command tree
 */
export function createMainCommand(deps: CliDependencies = {}): CommandDef {
  const io = deps.io ?? processIO;
  const buildContainer = deps.createContainer ?? defaultContainer;

  /** Load services, detect the cwd context, and render any failure */
  async function execute(
    args: GlobalArgValues,
    action: (container: Container, context: Context) => Promise<void>
  ): Promise<void> {
    try {
      const container = buildContainer(overridesFrom(args));
      const context = await container.detector.detectContext(io.cwd());
      await action(container, context);
    } catch (err) {
      io.err(formatError(err));
      io.setExitCode(1);
    }
  }

  const cd = defineCommand({
    meta: { name: 'cd', description: 'Print the path of a project or worktree' },
    args: {
      ...globalArgs,
      target: {
        type: 'positional',
        required: false,
        description: "main, <branch>, <project> or <project>/<branch>",
      },
    },
    run: ({ args }) =>
      execute(args, async ({ navigator }, context) => {
        let target = args.target ?? '';
        if (!target) {
          if (!isGitContext(context)) {
            throw new ValidationError('target', '', 'no target given and not inside a project or worktree', {
              suggestions: ['treehop cd <project>', 'treehop cd <project>/<branch>'],
            });
          }
          target = 'main';
        }
        const result = await navigator.resolvePath(context, target);
        io.out(result.resolvedPath);
      }),
  });

  const context = defineCommand({
    meta: { name: 'context', description: 'Show where the current directory is' },
    args: {
      ...globalArgs,
      json: { type: 'boolean', description: 'Print as JSON' },
    },
    run: ({ args }) =>
      execute(args, async (_container, current) => {
        if (args.json) {
          io.out(JSON.stringify(current, null, 2));
          return;
        }
        for (const line of describeContext(current)) {
          io.out(line);
        }
      }),
  });

  const list = defineCommand({
    meta: { name: 'list', description: 'List worktrees' },
    args: {
      ...globalArgs,
      all: { type: 'boolean', description: 'List worktrees of every project' },
      project: { type: 'string', description: 'List worktrees of one project' },
    },
    run: ({ args }) =>
      execute(args, async ({ worktrees }, current) => {
        const summaries = await worktrees.listWorktrees({
          context: current,
          projectName: args.project || undefined,
          all: Boolean(args.all),
        });
        if (summaries.length === 0) {
          io.err('No worktrees found');
          return;
        }
        for (const summary of summaries) {
          io.out(`${summary.projectName}/${summary.branchName ?? '(detached)'}  ${summary.path}`);
        }
      }),
  });

  const create = defineCommand({
    meta: { name: 'create', description: 'Create a worktree' },
    args: {
      ...globalArgs,
      target: { type: 'positional', required: true, description: '<branch> or <project>/<branch>' },
      from: { type: 'string', description: 'Branch to start from' },
    },
    run: ({ args }) =>
      execute(args, async ({ worktrees }, current) => {
        const target = args.target ?? '';
        const parts = target.split('/');
        if (parts.length > 2) {
          throw new ValidationError('target', target, 'expected <branch> or <project>/<branch>');
        }
        const projectName = parts.length === 2 ? parts[0] : undefined;
        const branchName = parts[parts.length - 1];
        const created = await worktrees.createWorktree({
          context: current,
          projectName: projectName || undefined,
          branchName,
          sourceBranch: args.from || undefined,
        });
        io.out(created.path);
        for (const failure of created.hookResult.failures) {
          const exit = failure.exitCode === null ? 'did not finish' : `exit code ${failure.exitCode}`;
          io.err(`Warning: post-create hook failed: ${failure.command} (${exit})`);
          if (failure.output) {
            io.err(failure.output);
          }
        }
      }),
  });

  const remove = defineCommand({
    meta: { name: 'delete', description: 'Delete a worktree and its branch' },
    args: {
      ...globalArgs,
      target: { type: 'positional', required: true, description: '<branch> or <project>/<branch>' },
      force: { type: 'boolean', description: 'Delete even with uncommitted changes' },
      'keep-branch': { type: 'boolean', description: 'Keep the branch' },
    },
    run: ({ args }) =>
      execute(args, async ({ worktrees }, current) => {
        const deleted = await worktrees.deleteWorktree({
          context: current,
          target: args.target ?? '',
          force: Boolean(args.force),
          keepBranch: Boolean(args['keep-branch']),
        });
        io.out(deleted.path);
        if (deleted.navigateTo) {
          io.out(deleted.navigateTo);
        }
      }),
  });

  const prune = defineCommand({
    meta: { name: 'prune', description: 'Delete worktrees whose branch is merged' },
    args: {
      ...globalArgs,
      target: { type: 'positional', required: false, description: '<project>/<branch> to prune only that worktree' },
      all: { type: 'boolean', description: 'Prune every project' },
      'dry-run': { type: 'boolean', description: 'Only report what would be deleted' },
      force: { type: 'boolean', description: 'Delete worktrees with uncommitted changes' },
      'delete-branches': { type: 'boolean', description: 'Delete the merged branches too' },
    },
    run: ({ args }) =>
      execute(args, async ({ worktrees }, current) => {
        const result = await worktrees.pruneMergedWorktrees({
          context: current,
          target: args.target || undefined,
          all: Boolean(args.all),
          dryRun: Boolean(args['dry-run']),
          force: Boolean(args.force),
          deleteBranches: Boolean(args['delete-branches']),
        });
        for (const entry of result.deleted) {
          io.out(`deleted  ${entry.projectName}/${entry.branchName}  ${entry.path}`);
        }
        for (const entry of result.skipped) {
          io.out(`skipped  ${entry.projectName}/${entry.branchName ?? '(detached)'}  (${entry.reason})`);
        }
      }),
  });

  const complete = defineCommand({
    meta: { name: 'complete', description: 'Print completion candidates' },
    args: {
      ...globalArgs,
      partial: { type: 'positional', required: false, description: 'Text typed so far' },
      'existing-only': { type: 'boolean', description: 'Only existing worktrees' },
    },
    async run({ args }) {
      let logger: Logger | undefined;
      try {
        const { navigator, detector, logger: containerLogger } = buildContainer(overridesFrom(args));
        logger = containerLogger;
        const current = await detector.detectContext(io.cwd());
        const suggestions = await navigator.suggest(current, args.partial ?? '', {
          existingOnly: Boolean(args['existing-only']),
        });
        for (const suggestion of suggestions) {
          io.out(`${suggestion.text}\t${suggestion.description}`);
        }
      } catch (err) {
        // Completion never reports failures to the shell
        logger?.debug({ err }, 'completion failed');
      }
    },
  });

  const version = defineCommand({
    meta: { name: 'version', description: 'Print the version' },
    run() {
      io.out(VERSION);
    },
  });

  return defineCommand({
    meta: {
      name: 'treehop',
      version: VERSION,
      description: 'Jump between git projects and their worktrees',
    },
    subCommands: {
      cd,
      context,
      list,
      create,
      delete: remove,
      prune,
      complete,
      version,
    },
  });
}
