import { access } from 'fs/promises';
import { resolve } from 'path';
import { logger } from '../utils/logger.js';
import { GitCommandError, describeError } from './errors.js';
import { spawnRunner, type CommandResult, type CommandRunner } from './runner.js';
import type { VersionControl } from './types.js';

export interface CliGitOptions {
  cwd: string;
  binary?: string;
  runner?: CommandRunner;
}

interface InvokeOptions {
  /** Exit codes that are answers rather than failures. */
  okExitCodes?: readonly number[];
  interactive?: boolean;
}

/**
 * {@link VersionControl} backed by the git command-line client.
 */
export class CliGit implements VersionControl {
  readonly cwd: string;
  readonly binary: string;
  private readonly runner: CommandRunner;

  constructor(options: CliGitOptions) {
    this.cwd = options.cwd;
    this.binary = options.binary ?? 'git';
    this.runner = options.runner ?? spawnRunner;
  }

  async isAvailable(): Promise<boolean> {
    try {
      const { stdout } = await this.invoke(['--version']);
      logger.debug(`Using ${stdout.trim()}`);
      return true;
    } catch (error) {
      logger.debug(`Git is not usable: ${describeError(error)}`);
      return false;
    }
  }

  async isInitialized(): Promise<boolean> {
    try {
      await access(resolve(this.cwd, '.git'));
      return true;
    } catch {
      return false;
    }
  }

  async init(): Promise<void> {
    await this.invoke(['init']);
  }

  async stageAll(): Promise<void> {
    await this.invoke(['add', '-A']);
  }

  async commit(message: string): Promise<void> {
    await this.invoke(['commit', '-m', message]);
  }

  async hasChanges(): Promise<boolean> {
    const { stdout } = await this.invoke(['status', '--porcelain']);
    return stdout.trim().length > 0;
  }

  async hasStagedChanges(): Promise<boolean> {
    // Exits 1 when the index differs from HEAD, including on an unborn branch
    const { exitCode } = await this.invoke(['diff', '--cached', '--quiet'], { okExitCodes: [1] });
    return exitCode === 1;
  }

  async getRemoteUrl(remote: string): Promise<string | undefined> {
    // `git config --get` exits 1 when the key is unset
    const { exitCode, stdout } = await this.invoke(['config', '--get', `remote.${remote}.url`], {
      okExitCodes: [1],
    });
    const url = stdout.trim();
    return exitCode === 0 && url.length > 0 ? url : undefined;
  }

  async getCurrentBranch(): Promise<string> {
    // Works on an unborn branch; exits 1 with --quiet when HEAD is detached
    const { exitCode, stdout } = await this.invoke(['symbolic-ref', '--quiet', '--short', 'HEAD'], {
      okExitCodes: [1],
    });
    return exitCode === 0 ? stdout.trim() : '';
  }

  async renameBranch(name: string): Promise<void> {
    await this.invoke(['branch', '-M', name]);
  }

  async pushWithUpstream(remote: string, branch: string): Promise<void> {
    const { stderr } = await this.invoke(['push', '-u', remote, branch], { interactive: true });
    if (stderr.trim()) {
      logger.debug(stderr.trim());
    }
  }

  private async invoke(args: readonly string[], options: InvokeOptions = {}): Promise<CommandResult> {
    logger.debug(`Running: ${this.binary} ${args.join(' ')}`);
    const result = await this.runner(this.binary, args, {
      cwd: this.cwd,
      interactive: options.interactive,
    });

    const ok = result.exitCode === 0 || (options.okExitCodes ?? []).includes(result.exitCode);
    if (!ok) {
      throw new GitCommandError(args, result.exitCode, result.stdout, result.stderr);
    }
    return result;
  }
}
