/**
 * Project, file and rename type definitions.
 */

/** Type tag of a project file, derived from its extension. */
export type FileKind =
  | 'model'
  | 'library'
  | 'script'
  | 'data-dictionary'
  | 'model-reference-link'
  | 'requirements'
  | 'spreadsheet'
  | 'data-archive';

/** A file tracked by the project. */
export interface ProjectFile {
  /** Absolute path on disk. */
  path: string;
  /** Path relative to the project root, forward slashes. */
  relativePath: string;
  /** Type tag, or null when the extension is outside the allow-list. */
  kind: FileKind | null;
}

/** A project file whose extension is in the allow-list. */
export interface RelevantFile extends ProjectFile {
  kind: FileKind;
}

/** Transient (old path, new path) pair for one rename. */
export interface RenameRecord {
  oldPath: string;
  newPath: string;
}

/** Host project system operations used by the renamer. */
export interface ProjectHandle {
  readonly name: string;
  readonly root: string;
  /** File members in project order. */
  readonly files: ProjectFile[];
  hasFile(filePath: string): boolean;
  addFile(filePath: string, metadata?: string): void;
  /** Remove a member; returns the entry metadata it carried. */
  removeFile(filePath: string): string;
  save(): Promise<void>;
}
