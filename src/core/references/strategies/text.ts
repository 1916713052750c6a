/**
 * Plain substring scan and text substitution.
 *
 * Used for scripts, requirement sets and data archives, and as the fallback
 * of every structured strategy. Packaged artifacts are handled part by part.
 */

import { Artifact } from '../../artifacts/artifact.js';
import { NameMatcher } from '../matching.js';
import type { ReferenceStrategy, StrategyUpdate } from '../strategy.js';

/**
 * Whether any text part (optionally filtered) of an opened artifact mentions the target.
 */
export function artifactMentions(
  artifact: Artifact,
  matcher: NameMatcher,
  filter?: (partName: string) => boolean,
): boolean {
  return artifact.textParts(filter).some((part) => matcher.matches(part.text));
}

/**
 * Substitute the old name in every text part (optionally filtered) of an
 * opened artifact. Returns the number of parts changed; the caller saves.
 */
export function substituteInArtifact(
  artifact: Artifact,
  matcher: NameMatcher,
  newFileName: string,
  filter?: (partName: string) => boolean,
): number {
  return artifact.transformParts((text) => matcher.replace(text, newFileName), filter);
}

export const textStrategy: ReferenceStrategy = {
  name: 'text',

  async references(filePath: string, targetFileName: string): Promise<boolean> {
    const artifact = await Artifact.open(filePath);
    return artifactMentions(artifact, new NameMatcher(targetFileName));
  },

  async update(filePath: string, oldFileName: string, newFileName: string): Promise<StrategyUpdate> {
    const artifact = await Artifact.open(filePath);
    substituteInArtifact(artifact, new NameMatcher(oldFileName), newFileName);
    return { method: 'text', changed: await artifact.save() };
  },
};
