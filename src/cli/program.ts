/**
 * Commander program: global options, preAction hooks and command registration.
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { registerRemovePostfixCommand } from './commands/remove-postfix.js';
import { registerRefsCommand } from './commands/refs.js';
import { registerFilesCommand } from './commands/files.js';
import { resolveFormat } from './middleware/output-format.js';
import { setFormatContext } from './format-context.js';
import { flagOverrides, setRunConfig } from './run-context.js';
import { cliError, cliOutput } from './renderers/index.js';
import { renderVersion } from './renderers/refactor.js';
import { ToolError, errorMessage } from '../core/errors.js';
import { getLogger, initLogger } from '../core/logger.js';
import { loadConfig } from '../core/config.js';
import { findProjectRoot, getToolDir, getToolHome } from '../core/paths.js';

/** Read version from package.json (single source of truth). */
export function getPackageVersion(): string {
  // src/cli/program.ts and dist/cli/program.js both sit two levels below the package root.
  const pkgPath = fileURLToPath(new URL('../../package.json', import.meta.url));
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (err) {
    getLogger('cli').debug({ err: errorMessage(err) }, 'Could not read package version');
  }
  return '0.0.0';
}

/**
 * Build the CLI program. Hooks resolve config, logger and output format
 * once per invocation, before the command action runs.
 */
export function createProgram(): Command {
  const version = getPackageVersion();
  const program = new Command();

  program
    .name('mlproj-refactor')
    .description('Rename project files and keep references to them consistent')
    .version(version)
    .option('--json', 'Output in JSON format (default)')
    .option('--human', 'Output in human-readable format')
    .option('--quiet', 'Suppress non-essential output for scripting')
    .option('--project <dir>', 'Project root (default: nearest directory with a *.prj file)');

  program
    .command('version')
    .description('Display version')
    .action(() => {
      cliOutput({ version }, { command: 'version', human: renderVersion });
    });

  registerRemovePostfixCommand(program);
  registerRefsCommand(program);
  registerFilesCommand(program);

  let initialized = false;
  program.hook('preAction', async (_thisCommand, actionCommand) => {
    if (initialized) return;
    initialized = true;
    const opts = actionCommand.optsWithGlobals();
    const explicitRoot = typeof opts['project'] === 'string' ? resolve(opts['project']) : null;
    const projectRoot = explicitRoot ?? findProjectRoot();

    try {
      // Flags resolve first so a config error is reported in the requested format.
      setFormatContext(resolveFormat(opts));
      const config = await loadConfig(projectRoot ?? undefined, flagOverrides(opts));
      setRunConfig(config);
      setFormatContext(resolveFormat(opts, config.output.defaultFormat));

      try {
        initLogger(projectRoot ? getToolDir(projectRoot) : getToolHome(), config.logging);
      } catch (err) {
        // Logging stays on the stderr fallback.
        getLogger('cli').warn({ err: errorMessage(err) }, 'Could not open log file');
      }
    } catch (err) {
      if (err instanceof ToolError) {
        cliError(err);
        process.exit(err.code);
      }
      throw err;
    }
  });

  return program;
}
