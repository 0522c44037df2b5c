import { Command } from 'commander';
import { createAuthCommand } from './commands/auth.js';
import { createDocCommand } from './commands/doc.js';
import { createConfigCommand } from './commands/config.js';
import { createDoctorCommand } from './commands/doctor.js';
import { getConfigService } from './services/config.js';
import { setLogLevel } from './lib/logger.js';

/**
 * Build the command tree. Commander keeps parsed option values on the
 * instance, so each parse wants a fresh tree.
 */
export function createCli(): Command {
  const cli = new Command();

  cli
    .name('gdocs')
    .description('Google Docs OAuth setup and document text extraction')
    .version('0.1.0');

  // Global options
  cli
    .option('-f, --format <format>', 'output format: json (default) | text')
    .option('-q, --quiet', 'only log errors')
    .option('-v, --verbose', 'debug logging')
    .option('-c, --config <path>', 'config file (default: ~/.config/gdocs-source/config.json)');

  cli.hook('preAction', (thisCommand) => {
    const options = thisCommand.opts<{ quiet?: boolean; verbose?: boolean; config?: string }>();
    getConfigService(options.config);
    if (options.verbose) {
      setLogLevel('debug');
    } else if (options.quiet) {
      setLogLevel('error');
    }
  });

  cli.addCommand(createAuthCommand());
  cli.addCommand(createDocCommand());
  cli.addCommand(createConfigCommand());
  cli.addCommand(createDoctorCommand());

  return cli;
}
