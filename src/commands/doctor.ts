/**
 * Doctor Command
 * Checks the Google Docs OAuth setup end to end without contacting Google
 */

import { Command } from 'commander';
import { DoctorService } from '../services/doctor.js';
import type { SetupReport } from '../services/doctor.js';
import { getConfigService } from '../services/config.js';
import { resolveFormat } from '../lib/context.js';
import { EXIT_CODES } from '../lib/errors.js';
import { fail, formatChecks, formatJSON, statusEmoji } from '../utils/output.js';

export function createDoctorCommand(): Command {
  return new Command('doctor')
    .description('Check credentials, redirect URI, session token and .gitignore')
    .option('--project-dir <dir>', 'directory whose .gitignore should exclude the secrets')
    .action((options: { projectDir?: string }, cmd: Command) => {
      let report: SetupReport;
      try {
        const format = resolveFormat(cmd);
        const config = getConfigService();
        report = new DoctorService({
          credentialsPath: config.getCredentialsPath(),
          tokenPath: config.getTokenPath(),
          redirectUri: config.getRedirectUri(),
          projectDir: options.projectDir,
        }).run();

        if (format === 'json') {
          console.log(formatJSON(report));
        } else {
          console.log(`\n${statusEmoji(report.status)} ${report.summary}\n`);
          console.log(formatChecks(report.checks));
        }
      } catch (error) {
        fail(error);
      }
      if (report.status === 'error') {
        process.exit(EXIT_CODES.SETUP);
      }
    });
}
