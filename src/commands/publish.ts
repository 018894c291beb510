import { Command } from 'commander';
import { logger } from '../utils/logger.js';
import { loadConfig } from '../config/loader.js';
import { CliGit, type VersionControl } from '../git/index.js';
import { exitCodeFor, publish } from '../publish/index.js';
import { printReport, resolvePublishOptions, type PublishCommandOptions } from './publish-helpers.js';

export interface PublishCommandDeps {
  cwd?: () => string;
  createGit?: (cwd: string, binary: string) => VersionControl;
}

export function createPublishCommand(deps: PublishCommandDeps = {}) {
  const getCwd = deps.cwd ?? (() => process.cwd());
  const createGit = deps.createGit ?? ((cwd: string, binary: string) => new CliGit({ cwd, binary }));

  async function run(owner: string | undefined, options: PublishCommandOptions): Promise<number> {
    try {
      const cwd = getCwd();
      const config = await loadConfig(cwd);
      const publishOptions = resolvePublishOptions(config, options, owner);

      logger.info(`Publishing ${cwd}`);
      logger.debug(`Branch: ${publishOptions.branch}, remote: ${publishOptions.remote}`);

      const git = createGit(cwd, config.git.binary);
      const report = await publish({ cwd, git }, publishOptions);

      printReport(report, publishOptions);
      return exitCodeFor(report, { failOnManual: options.failOnManual });
    } catch (error) {
      logger.error('Failed to publish:', error instanceof Error ? error.message : error);
      return 1;
    }
  }

  return new Command('publish')
    .description('Initialize, commit and push the current directory')
    .argument('[owner]', 'Account or organization name used in the suggested remote URL')
    .option('-b, --branch <name>', 'Branch to push (default: main)')
    .option('-r, --remote <name>', 'Remote to push to (default: origin)')
    .option('-m, --message <message>', 'Commit message (default: "Initial commit")')
    .option('-n, --name <repository>', 'Repository name used in the suggested remote URL')
    .option('--ssh', 'Suggest an SSH remote URL instead of HTTPS')
    .option('--fail-on-manual', 'Exit with code 2 when no remote is configured')
    .action(async (owner: string | undefined, options: PublishCommandOptions) => {
      process.exit(await run(owner, options));
    });
}
