import { basename } from 'path';
import { logger } from '../utils/logger.js';
import { describeError, type VersionControl } from '../git/index.js';
import { INSTALL_HINT, buildManualCommands, toRepositoryName } from './templates.js';
import type { PublishReport, PublishStage, StepName, StepRecord } from './report.js';

/**
 * Where a run happens. Publisher never reads the process's cwd or PATH.
 */
export interface PublishContext {
  cwd: string;
  git: VersionControl;
}

export interface PublishOptions {
  /** Account or organization name for the suggested remote URL. */
  remoteHint?: string;
  branch: string;
  remote: string;
  commitMessage: string;
  repository: {
    host: string;
    protocol: 'https' | 'ssh';
    /** Defaults to the working directory's base name. */
    name?: string;
  };
}

class StageFailure extends Error {
  constructor(
    readonly stage: PublishStage,
    readonly reason: unknown
  ) {
    super(`${stage} failed: ${describeError(reason)}`);
    this.name = 'StageFailure';
  }
}

async function atStage<T>(stage: PublishStage, action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (error) {
    throw new StageFailure(stage, error);
  }
}

/**
 * Bring the working directory to a committed and pushed state, doing only
 * what is still missing.
 *
 * Every outcome, failures included, comes back as a {@link PublishReport}.
 * Failed steps are not retried and earlier steps are not rolled back.
 */
export async function publish(
  context: PublishContext,
  options: PublishOptions
): Promise<PublishReport> {
  const { git, cwd } = context;
  const steps: StepRecord[] = [];

  const record = (step: StepName, outcome: StepRecord['outcome'], detail: string) => {
    steps.push({ step, outcome, detail });
    if (outcome === 'done') {
      logger.success(detail);
    } else {
      logger.skip(detail);
    }
  };

  let available: boolean;
  try {
    available = await git.isAvailable();
  } catch (error) {
    logger.debug(`Availability check failed: ${describeError(error)}`);
    available = false;
  }
  if (!available) {
    return { kind: 'tool-not-found', installHint: INSTALL_HINT };
  }

  try {
    const initialized = await atStage('init', () => git.isInitialized());
    if (!initialized) {
      await atStage('init', () => git.init());
      record('init', 'done', `Initialized git repository in ${cwd}`);
    } else {
      record('init', 'skipped', 'Git repository already initialized');
    }

    await atStage('stage', () => git.stageAll());
    record('stage', 'done', 'Staged all files');

    const hasStagedChanges = await atStage('commit', () => git.hasStagedChanges());
    if (hasStagedChanges) {
      await atStage('commit', () => git.commit(options.commitMessage));
      record('commit', 'done', `Created commit "${options.commitMessage}"`);
    } else {
      record('commit', 'skipped', 'Nothing to commit');
    }

    const remoteUrl = await atStage('set-remote', () => git.getRemoteUrl(options.remote));
    if (!remoteUrl) {
      logger.debug(`No URL configured for remote "${options.remote}"`);
      return {
        kind: 'manual-action-required',
        suggestedCommands: buildManualCommands({
          remote: options.remote,
          branch: options.branch,
          host: options.repository.host,
          protocol: options.repository.protocol,
          owner: options.remoteHint,
          repository: options.repository.name ?? toRepositoryName(basename(cwd)),
        }),
        steps,
      };
    }

    const currentBranch = await atStage('set-remote', () => git.getCurrentBranch());
    if (currentBranch !== options.branch) {
      await atStage('set-remote', () => git.renameBranch(options.branch));
      record('rename-branch', 'done', `Renamed branch ${currentBranch || 'HEAD'} to ${options.branch}`);
    } else {
      record('rename-branch', 'skipped', `Already on branch ${options.branch}`);
    }

    logger.info(`Pushing ${options.branch} to ${options.remote} (${remoteUrl})...`);
    await atStage('push', () => git.pushWithUpstream(options.remote, options.branch));
    record('push', 'done', `Pushed ${options.branch} to ${options.remote} with upstream tracking`);

    return { kind: 'pushed', remoteUrl, branch: options.branch, steps };
  } catch (error) {
    if (error instanceof StageFailure) {
      return {
        kind: 'action-failed',
        stage: error.stage,
        underlyingMessage: describeError(error.reason),
        steps,
      };
    }
    throw error;
  }
}
