/**
 * Human-readable renderers for refactoring commands.
 */

import type { RemovePostfixSummary } from '../../core/rename/remove-postfix.js';
import type { ProjectFilesResult, ReferencesResult } from '../../core/inspect.js';
import { BOLD, DIM, NC, RED, YELLOW, hRule, statusColor, statusSymbol } from './colors.js';

function badge(status: string): string {
  return `${statusColor(status)}${statusSymbol(status)}${NC}`;
}

export function renderRemovePostfix(data: RemovePostfixSummary, quiet: boolean): string {
  if (quiet) {
    return data.candidates
      .filter((c) => c.status !== 'failed')
      .map((c) => `${c.oldPath} -> ${c.newPath}`)
      .join('\n');
  }

  const lines: string[] = [];
  const heading = data.dryRun ? 'Planned renames' : 'Renamed files';
  lines.push(`${BOLD}${heading}${NC} in ${data.project} ${DIM}(postfix "${data.postfix}")${NC}`);
  lines.push(hRule());

  if (data.candidates.length === 0) {
    lines.push(`${DIM}No file names contain "${data.postfix}"${NC}`);
  }

  for (const c of data.candidates) {
    lines.push(`${badge(c.status)} ${c.oldPath} -> ${c.newPath}`);
    if (c.error) lines.push(`    ${RED}${c.error}${NC}`);
    if (data.dryRun) {
      for (const ref of c.references) lines.push(`    ${DIM}referenced by${NC} ${ref}`);
    }
    for (const u of c.updates) {
      const method = u.method ? ` ${DIM}(${u.method})${NC}` : '';
      const error = u.error ? `: ${RED}${u.error}${NC}` : '';
      lines.push(`    ${badge(u.status)} ${u.file}${method}${error}`);
    }
  }

  lines.push(hRule());
  const verb = data.dryRun ? 'planned' : 'renamed';
  const count = data.dryRun ? data.candidates.length - data.failedCount : data.renamedCount;
  lines.push(`${count} ${verb}, ${data.failedCount} failed, ${data.relevantFiles} relevant files`);
  if (!data.dryRun && !data.saved) {
    lines.push(`${YELLOW}Project was not saved${data.saveError ? `: ${data.saveError}` : ''}${NC}`);
  }
  if (data.gitStatus) {
    lines.push('');
    lines.push(`${BOLD}git status${NC}`);
    lines.push(data.gitStatus);
  }
  return lines.join('\n');
}

export function renderRefs(data: ReferencesResult, quiet: boolean): string {
  if (quiet) return data.references.map((r) => r.path).join('\n');
  if (data.references.length === 0) {
    return `${DIM}No project files reference ${data.target}${NC}`;
  }
  const lines = [`${BOLD}Files referencing ${data.target}${NC}`];
  for (const ref of data.references) {
    lines.push(`  ${ref.path} ${DIM}[${ref.kind}]${NC}`);
  }
  return lines.join('\n');
}

export function renderFiles(data: ProjectFilesResult, quiet: boolean): string {
  if (quiet) return data.files.map((f) => f.path).join('\n');
  const lines = [`${BOLD}${data.project}${NC} ${DIM}${data.root}${NC}`];
  const width = Math.max(0, ...data.files.map((f) => f.kind.length));
  for (const file of data.files) {
    lines.push(`  ${file.kind.padEnd(width)}  ${file.path}`);
  }
  lines.push(`${DIM}${data.files.length} of ${data.total} project files are relevant${NC}`);
  return lines.join('\n');
}

export function renderVersion(data: { version: string }): string {
  return data.version;
}
