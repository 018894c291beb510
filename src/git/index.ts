export { CliGit, type CliGitOptions } from './cli-git.js';
export { GitCommandError, GitNotFoundError, describeError } from './errors.js';
export { spawnRunner, type CommandResult, type CommandRunner, type RunOptions } from './runner.js';
export { readRepositoryState } from './state.js';
export type { RepositoryState, VersionControl } from './types.js';
