import { z } from 'zod';
import {
  BRANCH_NAME_PATTERN,
  OwnerSchema,
  RepositoryNameSchema,
  type Config,
} from '../config/schema.js';
import { logger } from '../utils/logger.js';
import {
  shellQuote,
  type PublishOptions,
  type PublishReport,
  type PublishStage,
} from '../publish/index.js';

export interface PublishCommandOptions {
  branch?: string;
  remote?: string;
  message?: string;
  name?: string;
  ssh?: boolean;
  failOnManual?: boolean;
}

const FlagsSchema = z.object({
  branch: z.string().regex(BRANCH_NAME_PATTERN, 'Invalid branch name').optional(),
  remote: z.string().regex(BRANCH_NAME_PATTERN, 'Invalid remote name').optional(),
  message: z.string().trim().min(1, 'Commit message must not be empty').optional(),
  name: RepositoryNameSchema.optional(),
  ssh: z.boolean().optional(),
});

export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/**
 * Merge command-line flags over the loaded configuration.
 */
export function resolvePublishOptions(
  config: Config,
  flags: PublishCommandOptions,
  owner?: string
): PublishOptions {
  const parsedFlags = FlagsSchema.safeParse(flags);
  if (!parsedFlags.success) {
    throw new InvalidInputError(parsedFlags.error.issues.map((issue) => issue.message).join('; '));
  }

  let remoteHint: string | undefined;
  if (owner !== undefined) {
    const parsedOwner = OwnerSchema.safeParse(owner);
    if (!parsedOwner.success) {
      throw new InvalidInputError(parsedOwner.error.issues.map((issue) => issue.message).join('; '));
    }
    remoteHint = parsedOwner.data;
  }

  const { branch, remote, message, name, ssh } = parsedFlags.data;
  return {
    remoteHint,
    branch: branch ?? config.publish.branch,
    remote: remote ?? config.publish.remote,
    commitMessage: message ?? config.publish.commitMessage,
    repository: {
      host: config.repository.host,
      protocol: ssh ? 'ssh' : config.repository.protocol,
      name: name ?? config.repository.name,
    },
  };
}

const STAGE_LABELS: Record<PublishStage, string> = {
  init: 'Initializing the repository',
  stage: 'Staging files',
  commit: 'Committing',
  'set-remote': 'Preparing the branch for the remote',
  push: 'Pushing',
};

/**
 * Commands that let the user pick up after a failed stage.
 */
export function remediationFor(stage: PublishStage, options: PublishOptions): string[] {
  switch (stage) {
    case 'init':
      return ['git init'];
    case 'stage':
      return ['git status', 'git add -A'];
    case 'commit':
      return [
        'git config --global user.name "Your Name"',
        'git config --global user.email "you@example.com"',
        `git commit -m ${shellQuote(options.commitMessage)}`,
      ];
    case 'set-remote':
      return ['git remote -v', `git branch -M ${options.branch}`];
    case 'push':
      return [`git push -u ${options.remote} ${options.branch}`];
  }
}

export function printReport(report: PublishReport, options: PublishOptions) {
  switch (report.kind) {
    case 'pushed':
      logger.success(`Published ${report.branch} to ${report.remoteUrl}`);
      return;

    case 'manual-action-required':
      logger.warn(`No "${options.remote}" remote configured, nothing was pushed.`);
      logger.info(`Create the repository on ${options.repository.host}, then run:`);
      report.suggestedCommands.forEach((command, index) => {
        logger.info(`  ${index + 1}. ${command}`);
      });
      return;

    case 'tool-not-found':
      logger.error('Git is not installed or not on PATH.');
      logger.info(report.installHint);
      return;

    case 'action-failed':
      logger.error(`${STAGE_LABELS[report.stage]} failed: ${report.underlyingMessage}`);
      if (report.stage === 'push') {
        logger.info('Local commits are intact. Fix the problem above, then retry with:');
      } else {
        logger.info('Fix the problem above, then continue with:');
      }
      remediationFor(report.stage, options).forEach((command, index) => {
        logger.info(`  ${index + 1}. ${command}`);
      });
      return;
  }
}
