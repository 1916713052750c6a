/**
 * mlproj-refactor - rename project files and keep references consistent.
 */

// Types
export { ExitCode } from './types/exit-codes.js';
export type { FileKind, ProjectFile, RelevantFile, RenameRecord, ProjectHandle } from './types/project.js';
export type { ToolConfig } from './types/config.js';

// Core
export { ToolError } from './core/errors.js';
export { formatSuccess, formatError } from './core/output.js';
export { loadConfig, defaultConfig } from './core/config.js';

// Project
export { ProjectStore } from './store/project-store.js';
export { openCurrentProject, resolveProjectRoot } from './core/project/current.js';
export { fileKindOf, SUPPORTED_EXTENSIONS } from './core/project/file-types.js';
export { listRelevantFiles, planRenames, stripPostfix } from './core/project/enumerate.js';

// References
export { NameMatcher } from './core/references/matching.js';
export { findFileReferences } from './core/references/finder.js';
export { updateFileReferences, type ReferenceUpdate } from './core/references/updater.js';

// Rename
export { renameProjectFile } from './core/rename/renamer.js';
export {
  removeFilePostfix,
  type RemovePostfixOptions,
  type RemovePostfixSummary,
  type CandidateOutcome,
} from './core/rename/remove-postfix.js';
export { listProjectFiles, findReferencesTo } from './core/inspect.js';

// Version control
export { GitAdapter, type VersionControl, type CommandResult } from './core/vcs/git.js';
