/**
 * Version-control adapter over the git CLI.
 *
 * Every operation is one `git` invocation in the project root, gated on its
 * exit code. Results carry the exit status and combined output; only
 * isAvailable() interprets them.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { getLogger } from '../logger.js';

const execFileAsync = promisify(execFile);

/** Exit status and output of a version-control command. */
export interface CommandResult {
  status: number;
  output: string;
}

/** Version-control operations used while renaming. */
export interface VersionControl {
  isAvailable(): Promise<boolean>;
  move(oldPath: string, newPath: string): Promise<CommandResult>;
  add(filePath: string): Promise<CommandResult>;
  status(): Promise<CommandResult>;
}

/** Exit status of a failed child process; 127 when git could not be spawned. */
function exitStatusOf(err: Error): number {
  if ('code' in err && typeof err.code === 'number') return err.code;
  return 127;
}

function outputOf(err: Error): string {
  const stdout = 'stdout' in err && typeof err.stdout === 'string' ? err.stdout : '';
  const stderr = 'stderr' in err && typeof err.stderr === 'string' ? err.stderr : '';
  return (stdout + stderr).trim() || err.message;
}

export class GitAdapter implements VersionControl {
  readonly cwd: string;

  constructor(cwd: string) {
    this.cwd = cwd;
  }

  /** Run git with arguments, never throwing. */
  async run(args: string[]): Promise<CommandResult> {
    try {
      const result = await execFileAsync('git', args, {
        cwd: this.cwd,
        maxBuffer: 10 * 1024 * 1024,
      });
      return { status: 0, output: (result.stdout + result.stderr).trim() };
    } catch (err) {
      if (!(err instanceof Error)) {
        return { status: 1, output: String(err) };
      }
      const failed = { status: exitStatusOf(err), output: outputOf(err) };
      getLogger('git').debug({ args, status: failed.status }, 'git command failed');
      return failed;
    }
  }

  async isAvailable(): Promise<boolean> {
    const result = await this.run(['rev-parse', '--is-inside-work-tree']);
    return result.status === 0 && result.output === 'true';
  }

  move(oldPath: string, newPath: string): Promise<CommandResult> {
    return this.run(['mv', oldPath, newPath]);
  }

  add(filePath: string): Promise<CommandResult> {
    return this.run(['add', filePath]);
  }

  status(): Promise<CommandResult> {
    return this.run(['status', '--short']);
  }
}
