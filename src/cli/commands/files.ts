/**
 * CLI files command - list relevant project files with their type tags.
 */

import { Command } from 'commander';
import { ToolError } from '../../core/errors.js';
import { listProjectFiles } from '../../core/inspect.js';
import { cliError, cliOutput } from '../renderers/index.js';
import { renderFiles } from '../renderers/refactor.js';

export function registerFilesCommand(program: Command): void {
  program
    .command('files')
    .description('List project files whose type can hold references')
    .action(async (_opts: Record<string, unknown>, cmd: Command) => {
      try {
        const globals = cmd.optsWithGlobals();
        const projectRoot = typeof globals['project'] === 'string' ? globals['project'] : undefined;
        const result = await listProjectFiles({ projectRoot });
        cliOutput(result, { command: 'files', human: renderFiles });
      } catch (err) {
        if (err instanceof ToolError) {
          cliError(err, 'files');
          process.exit(err.code);
        }
        throw err;
      }
    });
}
