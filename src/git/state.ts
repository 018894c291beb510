import { logger } from '../utils/logger.js';
import type { RepositoryState, VersionControl } from './types.js';

/**
 * Snapshot the working directory's relationship to version control.
 *
 * Always asks git afresh; an uninitialized directory is reported without
 * querying anything else.
 */
export async function readRepositoryState(
  git: VersionControl,
  remote: string
): Promise<RepositoryState> {
  const isInitialized = await git.isInitialized();
  if (!isInitialized) {
    return { isInitialized, hasUncommittedChanges: false, currentBranch: '' };
  }

  const hasUncommittedChanges = await git.hasChanges();
  const remoteUrl = await git.getRemoteUrl(remote);
  const currentBranch = await git.getCurrentBranch();
  logger.debug(`Repository state: branch=${currentBranch || '(detached)'} dirty=${hasUncommittedChanges}`);

  return { isInitialized, hasUncommittedChanges, remoteUrl, currentBranch };
}
