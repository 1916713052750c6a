/**
 * Tests for filename matching and substitution.
 */

import { describe, it, expect } from 'vitest';
import { NameMatcher } from '../matching.js';

describe('NameMatcher', () => {
  const matcher = new NameMatcher('ctrl_v1.slx');

  it('splits the base name', () => {
    expect(matcher.baseName).toBe('ctrl_v1');
  });

  it('matches the full name and the base name', () => {
    expect(matcher.matches("open_system('ctrl_v1.slx')")).toBe(true);
    expect(matcher.matches('ctrl_v1/Gain')).toBe(true);
  });

  it('matches only at identifier boundaries', () => {
    expect(matcher.matches('ctrl_v10')).toBe(false);
    expect(matcher.matches('my_ctrl_v1')).toBe(false);
    expect(matcher.matches('ctrl_v1x.slx')).toBe(false);
  });

  it('leaves the base name alone when another extension follows', () => {
    expect(matcher.matches("load('ctrl_v1.mat')")).toBe(false);
    expect(matcher.matches('see ctrl_v1.')).toBe(true);
    expect(matcher.replace("open_system('ctrl_v1'); load('ctrl_v1.mat'); ctrl_v1.slx", 'ctrl.slx')).toBe(
      "open_system('ctrl'); load('ctrl_v1.mat'); ctrl.slx",
    );
  });

  it('is case-sensitive unless asked', () => {
    expect(matcher.matches('CTRL_V1')).toBe(false);
    expect(new NameMatcher('ctrl_v1.slx', { ignoreCase: true }).matches('CTRL_V1/Gain')).toBe(true);
  });

  it('can be reused across calls', () => {
    expect(matcher.matches('ctrl_v1')).toBe(true);
    expect(matcher.matches('ctrl_v1')).toBe(true);
  });

  it('replaces full names, then base names', () => {
    expect(matcher.replace("load('ctrl_v1.slx'); sim('ctrl_v1'); ctrl_v10", 'ctrl.slx')).toBe(
      "load('ctrl.slx'); sim('ctrl'); ctrl_v10",
    );
  });

  it('treats regex characters in names literally', () => {
    const dotted = new NameMatcher('a+b_v1.m');
    expect(dotted.matches('a+b_v1')).toBe(true);
    expect(dotted.matches('aab_v1')).toBe(false);
  });
});
