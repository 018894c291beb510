#!/usr/bin/env node
import { Command } from 'commander';
import { config } from 'dotenv';
import { logger } from './utils/logger.js';
import { createPublishCommand } from './commands/publish.js';
import { createStatusCommand } from './commands/status.js';

// Load environment variables
config();

const program = new Command();

program
  .name('repo-publish')
  .description('Initialize, commit and push a project directory to its remote')
  .version('0.1.0')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('-q, --quiet', 'Suppress non-error output')
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts();
    if (opts.verbose) {
      logger.setVerbose(true);
    }
    if (opts.quiet) {
      logger.setQuiet(true);
    }
  });

program.addCommand(createPublishCommand(), { isDefault: true });
program.addCommand(createStatusCommand());

await program.parseAsync();
