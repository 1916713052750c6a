/**
 * CLI refs command - list project files that reference a file name.
 */

import { Command } from 'commander';
import { ToolError } from '../../core/errors.js';
import { findReferencesTo } from '../../core/inspect.js';
import { cliError, cliOutput } from '../renderers/index.js';
import { renderRefs } from '../renderers/refactor.js';

export function registerRefsCommand(program: Command): void {
  program
    .command('refs <file>')
    .description('List project files that reference a file name')
    .action(async (file: string, _opts: Record<string, unknown>, cmd: Command) => {
      try {
        const globals = cmd.optsWithGlobals();
        const projectRoot = typeof globals['project'] === 'string' ? globals['project'] : undefined;
        const result = await findReferencesTo(file, { projectRoot });
        cliOutput(result, {
          command: 'refs',
          message: `${result.references.length} file(s) reference ${result.target}`,
          human: renderRefs,
        });
      } catch (err) {
        if (err instanceof ToolError) {
          cliError(err, 'refs');
          process.exit(err.code);
        }
        throw err;
      }
    });
}
