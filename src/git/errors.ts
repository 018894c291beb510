/**
 * The configured git binary could not be started.
 */
export class GitNotFoundError extends Error {
  constructor(readonly binary: string) {
    super(`Git executable "${binary}" was not found on PATH`);
    this.name = 'GitNotFoundError';
  }
}

/**
 * A git invocation exited with a non-zero status.
 */
export class GitCommandError extends Error {
  constructor(
    readonly args: readonly string[],
    readonly exitCode: number,
    readonly stdout: string,
    readonly stderr: string
  ) {
    super(`git ${args.join(' ')} exited with code ${exitCode}`);
    this.name = 'GitCommandError';
  }

  /** What git itself said about the failure, falling back to the exit status. */
  get detail(): string {
    return this.stderr.trim() || this.stdout.trim() || this.message;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof GitCommandError) {
    return error.detail;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
