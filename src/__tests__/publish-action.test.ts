import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, rm } from 'fs/promises';
import { resolve } from 'path';
import { tmpdir } from 'os';
import { createPublishCommand } from '../commands/publish.js';
import { FakeGit } from './helpers/fake-git.js';

class ExitCalled extends Error {
  constructor(readonly code: string | number | null | undefined) {
    super(`process.exit(${code})`);
    this.name = 'ExitCalled';
  }
}

describe('publish action', () => {
  let testDir: string;
  let errorSpy: ReturnType<typeof spyOnError>;

  function spyOnError() {
    return vi.spyOn(console, 'error').mockImplementation(() => {});
  }

  beforeEach(async () => {
    testDir = resolve(tmpdir(), `repo-publish-action-test-${Date.now()}`);
    await mkdir(testDir, { recursive: true });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    errorSpy = spyOnError();
    vi.spyOn(process, 'exit').mockImplementation((code): never => {
      throw new ExitCalled(code);
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  async function runAction(args: string[], git: FakeGit) {
    const createGit = vi.fn(() => git);
    const command = createPublishCommand({ cwd: () => testDir, createGit });
    const outcome = await command.parseAsync(args, { from: 'user' }).catch((error: unknown) => error);
    return { exitCode: outcome instanceof ExitCalled ? outcome.code : outcome, createGit };
  }

  it('should exit 1 on an invalid owner before running git', async () => {
    const git = new FakeGit();

    const { exitCode, createGit } = await runAction(['octo org'], git);

    expect(exitCode).toBe(1);
    expect(createGit).not.toHaveBeenCalled();
    expect(git.calls).toEqual([]);
    expect(errorSpy).toHaveBeenCalledWith(
      '✗ Failed to publish:',
      'Owner may only contain letters, digits, ".", "_" and "-"'
    );
  });

  it('should exit 0 when manual action is required', async () => {
    const git = new FakeGit();

    const { exitCode, createGit } = await runAction(['octo-org'], git);

    expect(exitCode).toBe(0);
    expect(createGit).toHaveBeenCalledWith(testDir, 'git');
    expect(git.calls).not.toContain('pushWithUpstream');
  });

  it('should exit 2 for manual action with --fail-on-manual', async () => {
    const { exitCode } = await runAction(['--fail-on-manual'], new FakeGit());

    expect(exitCode).toBe(2);
  });

  it('should exit 0 after a push', async () => {
    const git = new FakeGit({
      initialized: true,
      modified: ['src/a.ts'],
      remotes: { origin: 'https://example.com/org/repo.git' },
    });

    const { exitCode } = await runAction(['--fail-on-manual'], git);

    expect(exitCode).toBe(0);
    expect(git.pushes).toEqual([{ remote: 'origin', branch: 'main', commitCount: 1 }]);
  });

  it('should exit 1 when git is missing', async () => {
    const { exitCode } = await runAction([], new FakeGit({ available: false }));

    expect(exitCode).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith('✗ Git is not installed or not on PATH.');
  });
});
