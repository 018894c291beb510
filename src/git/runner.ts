import { spawn } from 'child_process';
import { GitNotFoundError } from './errors.js';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd: string;
  /** Hand the terminal's stdin to the child so credential prompts reach the user. */
  interactive?: boolean;
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: RunOptions
) => Promise<CommandResult>;

/**
 * Run a command without a shell and collect its output.
 *
 * Resolves with the exit status whatever it is; rejects only when the
 * process cannot be started.
 */
export const spawnRunner: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, [...args], {
      cwd: options.cwd,
      stdio: [options.interactive ? 'inherit' : 'ignore', 'pipe', 'pipe'],
      env: options.interactive ? process.env : { ...process.env, GIT_TERMINAL_PROMPT: '0' },
    });

    let stdout = '';
    let stderr = '';
    child.stdout?.setEncoding('utf-8');
    child.stderr?.setEncoding('utf-8');
    child.stdout?.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr?.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', (error) => {
      if ('code' in error && error.code === 'ENOENT') {
        reject(new GitNotFoundError(command));
        return;
      }
      reject(error);
    });

    child.on('close', (code) => {
      resolve({ exitCode: code ?? 1, stdout, stderr });
    });
  });
