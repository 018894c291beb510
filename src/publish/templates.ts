export const OWNER_PLACEHOLDER = 'YOUR_USERNAME';
export const REPOSITORY_PLACEHOLDER = 'YOUR_REPOSITORY';

export const INSTALL_HINT =
  'Install git from https://git-scm.com/downloads (or your package manager, e.g. `apt install git`, `brew install git`) and make sure it is on PATH.';

/**
 * Quote a value for POSIX shells unless it is made only of safe characters.
 */
export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9._\/:@=+-]+$/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export interface RemoteTemplate {
  host: string;
  protocol: 'https' | 'ssh';
  owner?: string;
  repository: string;
}

/**
 * Turn a directory name into a repository name the way GitHub does: every
 * character outside `[A-Za-z0-9._-]` becomes `-`.
 */
export function toRepositoryName(directoryName: string): string {
  const name = directoryName.replace(/[^A-Za-z0-9._-]/g, '-');
  return name.length > 0 ? name : REPOSITORY_PLACEHOLDER;
}

export function buildRemoteUrl({ host, protocol, owner, repository }: RemoteTemplate): string {
  const path = `${owner ?? OWNER_PLACEHOLDER}/${repository}.git`;
  return protocol === 'ssh' ? `git@${host}:${path}` : `https://${host}/${path}`;
}

export interface ManualCommandsInput extends RemoteTemplate {
  remote: string;
  branch: string;
}

/**
 * The commands that finish publishing once a remote repository exists:
 * add the remote, rename the branch, push with upstream tracking.
 */
export function buildManualCommands(input: ManualCommandsInput): string[] {
  return [
    `git remote add ${input.remote} ${buildRemoteUrl(input)}`,
    `git branch -M ${input.branch}`,
    `git push -u ${input.remote} ${input.branch}`,
  ];
}
