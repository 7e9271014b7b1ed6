import { spawn } from 'child_process';
import { GitCommandError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { CommandExecutor, CommandRequest, CommandResult } from './types.js';

/**
 * Runs commands with child_process.spawn, no shell, output captured
 */
export class SpawnCommandExecutor implements CommandExecutor {
  constructor(private readonly logger?: Logger) {}

  execute(request: CommandRequest): Promise<CommandResult> {
    const { cwd, command, args, timeoutMs } = request;
    this.logger?.debug({ cwd, command, args }, 'running command');

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd,
        shell: false,
        stdio: ['ignore', 'pipe', 'pipe'],
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0', ...request.env },
      });

      let stdout = '';
      let stderr = '';
      let settled = false;

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        child.kill('SIGKILL');
        reject(
          new GitCommandError(
            { command, args, exitCode: null, stdout, stderr },
            `timed out after ${timeoutMs}ms`
          )
        );
      }, timeoutMs);

      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (data: string) => {
        stdout += data;
      });
      child.stderr.on('data', (data: string) => {
        stderr += data;
      });

      child.on('error', (err) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        reject(
          new GitCommandError(
            { command, args, exitCode: null, stdout, stderr },
            `failed to start: ${err.message}`,
            { cause: err }
          )
        );
      });

      child.on('close', (code, signal) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (code === null) {
          reject(
            new GitCommandError(
              { command, args, exitCode: null, stdout, stderr },
              `terminated by signal ${signal ?? 'unknown'}`
            )
          );
          return;
        }
        this.logger?.debug({ command, args, exitCode: code }, 'command finished');
        resolve({ exitCode: code, stdout, stderr });
      });
    });
  }
}
