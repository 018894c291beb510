import { Command } from 'commander';
import { logger } from '../utils/logger.js';
import { loadConfig } from '../config/loader.js';
import { CliGit, readRepositoryState } from '../git/index.js';
import { INSTALL_HINT } from '../publish/index.js';

export function createStatusCommand() {
  return new Command('status')
    .description('Show the repository state a publish run would start from')
    .action(async () => {
      try {
        const cwd = process.cwd();
        const config = await loadConfig(cwd);
        const remote = config.publish.remote;

        const git = new CliGit({ cwd, binary: config.git.binary });
        if (!(await git.isAvailable())) {
          logger.error('Git is not installed or not on PATH.');
          logger.info(INSTALL_HINT);
          process.exit(1);
        }

        const state = await readRepositoryState(git, remote);

        logger.info('Repository Status');
        logger.info('=================\n');
        logger.info(`  Directory: ${cwd}`);
        logger.info(`  Initialized: ${state.isInitialized ? 'yes' : 'no'}`);
        if (!state.isInitialized) {
          logger.info('\nRun `repo-publish` to initialize, commit and push.');
          return;
        }

        logger.info(`  Branch: ${state.currentBranch || '(detached HEAD)'}`);
        logger.info(`  Clean: ${state.hasUncommittedChanges ? 'no (uncommitted changes)' : 'yes'}`);
        logger.info(`  Remote (${remote}): ${state.remoteUrl ?? 'not configured'}`);

        if (state.currentBranch && state.currentBranch !== config.publish.branch) {
          logger.warn(`Branch will be renamed to ${config.publish.branch} on push`);
        }
      } catch (error) {
        logger.error('Failed to show status:', error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
