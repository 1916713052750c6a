/**
 * Remove a postfix from project file names and repair references to them.
 *
 * Candidates are processed one at a time: references are found before the
 * rename, the file is renamed, then each referencing file is rewritten.
 * Paths of files renamed earlier in the run are followed, so a later candidate
 * never scans or edits a stale path.
 */

import { existsSync } from 'node:fs';
import { relative } from 'node:path';
import { ToolError, errorMessage } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getLogger } from '../logger.js';
import { defaultConfig } from '../config.js';
import type { ToolConfig } from '../../types/config.js';
import type { ProjectHandle, RelevantFile } from '../../types/project.js';
import { GitAdapter, type VersionControl } from '../vcs/git.js';
import { openCurrentProject, type ProjectLocation } from '../project/current.js';
import { followRename, listRelevantFiles, pathKey, planRenames, type RenameCandidate } from '../project/enumerate.js';
import { findFileReferences } from '../references/finder.js';
import { updateFileReferences, type ReferenceUpdate } from '../references/updater.js';
import { renameProjectFile } from './renamer.js';

export type CandidateStatus = 'renamed' | 'failed' | 'planned';

/** Outcome for one rename candidate. Paths are relative to the project root. */
export interface CandidateOutcome {
  oldPath: string;
  newPath: string;
  status: CandidateStatus;
  error?: string;
  /** Files found to reference the old name before the rename. */
  references: string[];
  updates: ReferenceUpdate[];
}

export interface RemovePostfixSummary {
  project: string;
  root: string;
  postfix: string;
  dryRun: boolean;
  gitAvailable: boolean;
  relevantFiles: number;
  candidates: CandidateOutcome[];
  renamedCount: number;
  failedCount: number;
  saved: boolean;
  saveError?: string;
  /** `git status --short` after the run; null without git or on a dry run. */
  gitStatus: string | null;
}

export interface RemovePostfixOptions extends ProjectLocation {
  config?: ToolConfig;
  /** Report the plan without touching anything. */
  dryRun?: boolean;
  /** An already opened project; opened from the location otherwise. */
  project?: ProjectHandle;
  /** Version control to use; null disables it. Defaults to git in the project root. */
  vcs?: VersionControl | null;
}

/** Reject postfixes that would match everything or reach outside a file name. */
export function validatePostfix(postfix: string): void {
  if (postfix.length === 0) {
    throw new ToolError(ExitCode.INVALID_INPUT, 'Postfix must not be empty', {
      fix: 'Pass the text to remove, e.g. mlproj-refactor remove-postfix _v1',
    });
  }
  if (/[\\/]/.test(postfix)) {
    throw new ToolError(ExitCode.INVALID_INPUT, `Postfix must not contain a path separator: ${postfix}`);
  }
}

async function detectVersionControl(
  root: string,
  config: ToolConfig,
  vcs: VersionControl | null | undefined,
): Promise<VersionControl | null> {
  const candidate = vcs === undefined ? (config.git.enabled ? new GitAdapter(root) : null) : vcs;
  if (candidate && (await candidate.isAvailable())) {
    getLogger('rename').info({ root }, 'Git is available; using git for file moves');
    return candidate;
  }
  getLogger('rename').warn({ root }, 'Git is not available; using file system moves');
  return null;
}

function toRelative(root: string, filePath: string): string {
  return relative(root, filePath).replace(/\\/g, '/');
}

/**
 * Remove `postfix` from the names of relevant project files and update every
 * reference to the renamed files. Per-file failures are recorded in the
 * summary; only failing to open the project throws.
 */
export async function removeFilePostfix(
  postfix: string,
  options: RemovePostfixOptions = {},
): Promise<RemovePostfixSummary> {
  validatePostfix(postfix);
  const config = options.config ?? defaultConfig();
  const dryRun = options.dryRun ?? false;

  let project: ProjectHandle;
  try {
    project = options.project ?? (await openCurrentProject(options));
  } catch (err) {
    getLogger('rename').error({ err: errorMessage(err) }, 'Failed to get current project');
    throw err;
  }
  getLogger('rename').info({ project: project.name, root: project.root }, 'Working with project');

  const vcs = await detectVersionControl(project.root, config, options.vcs);
  const stagingVcs = config.git.stageUpdatedFiles ? vcs : null;

  let files: RelevantFile[] = listRelevantFiles(project.files);
  const plan = planRenames(files, postfix);
  getLogger('rename').info({ relevant: files.length, candidates: plan.length, postfix }, 'Planned renames');

  const candidates: CandidateOutcome[] = [];
  const plannedTargets = new Map<string, string>();
  for (const candidate of plan) {
    const outcome = await processCandidate(project, candidate, files, {
      dryRun,
      vcs,
      stagingVcs,
      addRetries: config.rename.addRetries,
      plannedTargets,
    });
    candidates.push(outcome);
    if (outcome.status === 'renamed') {
      files = files.map((file) => followRename(file, candidate));
    }
  }

  let saved = false;
  let saveError: string | undefined;
  if (!dryRun) {
    try {
      await project.save();
      saved = true;
    } catch (err) {
      saveError = errorMessage(err);
      getLogger('rename').warn({ err: saveError }, 'Failed to save project');
    }
  }

  let gitStatus: string | null = null;
  if (vcs && !dryRun) {
    const status = await vcs.status();
    if (status.status === 0) {
      gitStatus = status.output;
    } else {
      getLogger('rename').warn({ output: status.output }, 'Failed to read git status');
    }
  }

  const summary: RemovePostfixSummary = {
    project: project.name,
    root: project.root,
    postfix,
    dryRun,
    gitAvailable: vcs !== null,
    relevantFiles: listRelevantFiles(project.files).length,
    candidates,
    renamedCount: candidates.filter((c) => c.status === 'renamed').length,
    failedCount: candidates.filter((c) => c.status === 'failed').length,
    saved,
    ...(saveError !== undefined && { saveError }),
    gitStatus,
  };
  getLogger('rename').info(
    { renamed: summary.renamedCount, failed: summary.failedCount, saved },
    dryRun ? 'Dry run complete' : 'Postfix removal complete',
  );
  return summary;
}

interface CandidateContext {
  dryRun: boolean;
  vcs: VersionControl | null;
  stagingVcs: VersionControl | null;
  addRetries: number;
  /** Dry run only: new paths already planned, keyed by pathKey, to the old file name. */
  plannedTargets: Map<string, string>;
}

async function processCandidate(
  project: ProjectHandle,
  candidate: RenameCandidate,
  files: readonly RelevantFile[],
  ctx: CandidateContext,
): Promise<CandidateOutcome> {
  const outcome: CandidateOutcome = {
    oldPath: toRelative(project.root, candidate.oldPath),
    newPath: toRelative(project.root, candidate.newPath),
    status: ctx.dryRun ? 'planned' : 'renamed',
    references: [],
    updates: [],
  };

  if (candidate.newBaseName.length === 0) {
    outcome.status = 'failed';
    outcome.error = `Removing the postfix from ${candidate.oldFileName} leaves an empty name`;
    getLogger('rename').error({ file: candidate.oldPath }, outcome.error);
    return outcome;
  }

  const referencing = await findFileReferences(files, candidate.oldFileName);
  outcome.references = referencing.map((file) => toRelative(project.root, file.path));

  if (ctx.dryRun) {
    const earlier = ctx.plannedTargets.get(pathKey(candidate.newPath));
    if (existsSync(candidate.newPath)) {
      outcome.status = 'failed';
      outcome.error = `${candidate.newFileName} already exists`;
    } else if (earlier !== undefined) {
      outcome.status = 'failed';
      outcome.error = `${candidate.newFileName} is already the new name of ${earlier}`;
    } else {
      ctx.plannedTargets.set(pathKey(candidate.newPath), candidate.oldFileName);
    }
    return outcome;
  }

  try {
    await renameProjectFile(project, candidate, { vcs: ctx.vcs, addRetries: ctx.addRetries });
  } catch (err) {
    outcome.status = 'failed';
    outcome.error = errorMessage(err);
    getLogger('rename').error({ file: candidate.oldPath, err: outcome.error }, 'Failed to rename file');
    return outcome;
  }

  for (const file of referencing) {
    const target = followRename(file, candidate);
    const update = await updateFileReferences(target, candidate.oldFileName, candidate.newFileName, {
      vcs: ctx.stagingVcs,
    });
    outcome.updates.push({ ...update, file: toRelative(project.root, update.file) });
  }
  return outcome;
}
