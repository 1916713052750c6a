/**
 * Tests for human renderers of refactoring results.
 */

import { describe, it, expect } from 'vitest';
import { renderFiles, renderRefs, renderRemovePostfix } from '../refactor.js';
import type { RemovePostfixSummary } from '../../../core/rename/remove-postfix.js';

function summary(overrides: Partial<RemovePostfixSummary> = {}): RemovePostfixSummary {
  return {
    project: 'plant',
    root: '/work/plant',
    postfix: '_v1',
    dryRun: false,
    gitAvailable: false,
    relevantFiles: 4,
    candidates: [
      {
        oldPath: 'models/ctrl_v1.slx',
        newPath: 'models/ctrl.slx',
        status: 'renamed',
        references: ['scripts/run.m'],
        updates: [{ file: 'scripts/run.m', kind: 'script', method: 'text', status: 'updated', staged: false }],
      },
      {
        oldPath: 'scripts/go_v1.m',
        newPath: 'scripts/go.m',
        status: 'failed',
        error: 'Cannot rename go_v1.m: go.m already exists',
        references: [],
        updates: [],
      },
    ],
    renamedCount: 1,
    failedCount: 1,
    saved: true,
    gitStatus: null,
    ...overrides,
  };
}

describe('renderRemovePostfix', () => {
  it('lists renames, updates and the tally', () => {
    const lines = renderRemovePostfix(summary(), false).split('\n');
    expect(lines[0]).toBe('Renamed files in plant (postfix "_v1")');
    expect(lines.some((l) => l.endsWith(' models/ctrl_v1.slx -> models/ctrl.slx'))).toBe(true);
    expect(lines.some((l) => l.endsWith(' scripts/run.m (text)'))).toBe(true);
    expect(lines).toContain('    Cannot rename go_v1.m: go.m already exists');
    expect(lines[lines.length - 1]).toBe('1 renamed, 1 failed, 4 relevant files');
  });

  it('prints only successful renames when quiet', () => {
    expect(renderRemovePostfix(summary(), true)).toBe('models/ctrl_v1.slx -> models/ctrl.slx');
  });

  it('shows references on a dry run', () => {
    const plan = summary({
      dryRun: true,
      saved: false,
      renamedCount: 0,
      failedCount: 0,
      candidates: [
        { oldPath: 'a_v1.m', newPath: 'a.m', status: 'planned', references: ['b.m'], updates: [] },
      ],
    });
    const lines = renderRemovePostfix(plan, false).split('\n');
    expect(lines[0]).toBe('Planned renames in plant (postfix "_v1")');
    expect(lines).toContain('    referenced by b.m');
    expect(lines[lines.length - 1]).toBe('1 planned, 0 failed, 4 relevant files');
  });

  it('warns when the project was not saved', () => {
    const text = renderRemovePostfix(summary({ saved: false, saveError: 'lock held' }), false);
    expect(text.split('\n')).toContain('Project was not saved: lock held');
  });

  it('appends git status', () => {
    const text = renderRemovePostfix(summary({ gitStatus: 'R  a_v1.m -> a.m' }), false);
    expect(text.endsWith('git status\nR  a_v1.m -> a.m')).toBe(true);
  });

  it('says when nothing matched', () => {
    const text = renderRemovePostfix(summary({ candidates: [], renamedCount: 0, failedCount: 0 }), false);
    expect(text.split('\n')).toContain('No file names contain "_v1"');
  });
});

describe('renderRefs', () => {
  it('lists referencing files with their type', () => {
    expect(
      renderRefs({ project: 'plant', target: 'ctrl_v1.slx', references: [{ path: 'scripts/run.m', kind: 'script' }] }, false),
    ).toBe('Files referencing ctrl_v1.slx\n  scripts/run.m [script]');
  });

  it('says when nothing references the file', () => {
    expect(renderRefs({ project: 'plant', target: 'x.m', references: [] }, false)).toBe(
      'No project files reference x.m',
    );
  });
});

describe('renderFiles', () => {
  it('aligns type tags', () => {
    const text = renderFiles(
      {
        project: 'plant',
        root: '/work/plant',
        total: 3,
        files: [
          { path: 'models/ctrl.slx', kind: 'model' },
          { path: 'scripts/run.m', kind: 'script' },
        ],
      },
      false,
    );
    expect(text).toBe(
      'plant /work/plant\n  model   models/ctrl.slx\n  script  scripts/run.m\n2 of 3 project files are relevant',
    );
  });
});
