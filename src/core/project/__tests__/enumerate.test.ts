/**
 * Tests for file enumeration and rename planning.
 */

import { describe, it, expect } from 'vitest';
import { followRename, listRelevantFiles, planRenames, samePath, stripPostfix } from '../enumerate.js';
import { fileKindOf, splitFileName } from '../file-types.js';
import type { ProjectFile, RelevantFile } from '../../../types/project.js';

function member(relativePath: string): ProjectFile {
  return { path: `/p/${relativePath}`, relativePath, kind: fileKindOf(relativePath) };
}

describe('fileKindOf', () => {
  it('maps allow-listed extensions case-insensitively', () => {
    expect(fileKindOf('a.SLX')).toBe('model');
    expect(fileKindOf('a.mdl')).toBe('model');
    expect(fileKindOf('a.lib')).toBe('library');
    expect(fileKindOf('a.sldd')).toBe('data-dictionary');
    expect(fileKindOf('a.slmx')).toBe('model-reference-link');
    expect(fileKindOf('a.slreqx')).toBe('requirements');
    expect(fileKindOf('a.xlsx')).toBe('spreadsheet');
    expect(fileKindOf('a.mldatx')).toBe('data-archive');
    expect(fileKindOf('a.txt')).toBeNull();
  });

  it('splits base name and extension', () => {
    expect(splitFileName('models/ctrl_v1.slx')).toEqual({ base: 'ctrl_v1', ext: '.slx' });
  });
});

describe('planRenames', () => {
  const files = listRelevantFiles([
    member('README_v1.txt'),
    member('models/ctrl_v1.slx'),
    member('models/plant.slx'),
    member('scripts/run_V1.m'),
  ]);

  it('keeps only allow-listed files', () => {
    expect(files.map((f) => f.relativePath)).toEqual(['models/ctrl_v1.slx', 'models/plant.slx', 'scripts/run_V1.m']);
  });

  it('selects base names containing the postfix, case-sensitively', () => {
    const plan = planRenames(files, '_v1');
    expect(plan.map((c) => [c.oldFileName, c.newFileName, c.newPath])).toEqual([
      ['ctrl_v1.slx', 'ctrl.slx', '/p/models/ctrl.slx'],
    ]);
  });

  it('does not match the postfix inside the extension', () => {
    expect(planRenames(listRelevantFiles([member('a.mldatx')]), 'dat')).toEqual([]);
  });

  it('strips every occurrence', () => {
    expect(stripPostfix('x_v1_v1.m', '_v1')).toBe('x.m');
  });

  it('records an empty new base name', () => {
    const [candidate] = planRenames(listRelevantFiles([member('_v1.m')]), '_v1');
    expect(candidate?.newBaseName).toBe('');
  });
});

describe('followRename', () => {
  const file: RelevantFile = { path: '/p/models/ctrl_v1.slx', relativePath: 'models/ctrl_v1.slx', kind: 'model' };

  it('moves the renamed file to its new path', () => {
    expect(followRename(file, { oldPath: '/p/models/ctrl_v1.slx', newPath: '/p/models/ctrl.slx' })).toEqual({
      path: '/p/models/ctrl.slx',
      relativePath: 'models/ctrl.slx',
      kind: 'model',
    });
  });

  it('leaves other files alone', () => {
    expect(followRename(file, { oldPath: '/p/a_v1.m', newPath: '/p/a.m' })).toBe(file);
  });

  it('compares paths ignoring case and separators', () => {
    expect(samePath('C:\\P\\a.m', 'c:/p/A.m')).toBe(true);
  });
});
