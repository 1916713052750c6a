/**
 * CLI remove-postfix command.
 */

import { Command } from 'commander';
import { ToolError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { removeFilePostfix } from '../../core/rename/remove-postfix.js';
import { cliError, cliOutput } from '../renderers/index.js';
import { renderRemovePostfix } from '../renderers/refactor.js';
import { getRunConfig } from '../run-context.js';

export function registerRemovePostfixCommand(program: Command): void {
  program
    .command('remove-postfix <postfix>')
    .description('Remove a postfix from project file names and update references to them')
    .option('--dry-run', 'Report planned renames and their references without changing anything')
    .option('--no-git', 'Move files without git even inside a work tree')
    .action(async (postfix: string, opts: Record<string, unknown>, cmd: Command) => {
      try {
        const globals = cmd.optsWithGlobals();
        const projectRoot = typeof globals['project'] === 'string' ? globals['project'] : undefined;

        const summary = await removeFilePostfix(postfix, {
          projectRoot,
          config: getRunConfig(),
          dryRun: opts['dryRun'] === true,
        });

        let message: string;
        if (summary.candidates.length === 0) {
          message = `No file names contain "${postfix}"`;
          process.exitCode = ExitCode.NO_CHANGE;
        } else if (summary.dryRun) {
          message = `Would rename ${summary.candidates.length - summary.failedCount} file(s)`;
        } else {
          message = `Renamed ${summary.renamedCount} file(s)`;
        }
        if (summary.failedCount > 0) {
          message += `, ${summary.failedCount} failed`;
          process.exitCode = ExitCode.GENERAL_ERROR;
        }

        cliOutput(summary, { command: 'remove-postfix', message, human: renderRemovePostfix });
      } catch (err) {
        if (err instanceof ToolError) {
          cliError(err, 'remove-postfix');
          process.exit(err.code);
        }
        throw err;
      }
    });
}
