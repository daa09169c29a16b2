import { ConfigError, toError } from '../types/Errors.js';

/**
 * Which resource names count as face textures.
 *
 * - `named`: the four suffixes FaceDiffuse, FaceHeadDiffuse, FaceHeadNormalMap, FaceNormalMap
 * - `generic`: any Face...Diffuse or Face...NormalMap combination
 * - `custom`: a caller-supplied expression
 */
export type MatchPolicy = 'named' | 'generic' | 'custom';

export const MATCH_POLICIES: readonly MatchPolicy[] = ['named', 'generic', 'custom'];

export const DEFAULT_MATCH_POLICY: MatchPolicy = 'generic';

const RESOURCE_PATTERNS = {
  named: String.raw`Resource\w*(?:FaceDiffuse|FaceHeadDiffuse|FaceHeadNormalMap|FaceNormalMap)(?:[.\w]*)?`,
  generic: String.raw`Resource\w*Face\w*(?:Diffuse|NormalMap)(?:[.\w]*)?`,
} as const;

/**
 * Build the slot line pattern. Group 1 captures the resource identifier.
 */
export function buildSlotPattern(policy: MatchPolicy, customPattern?: string): RegExp {
  if (policy === 'custom') {
    if (!customPattern) {
      throw new ConfigError("Match policy 'custom' needs a pattern");
    }
    return compileCustomPattern(customPattern);
  }
  const resource = RESOURCE_PATTERNS[policy];
  return new RegExp(String.raw`^\s*ps-t\d+\s*=\s*(${resource})\s*$`, 'i');
}

/**
 * Compile a user pattern; it must have a capture group for the resource.
 */
export function compileCustomPattern(source: string): RegExp {
  let regex: RegExp;
  try {
    regex = new RegExp(source, 'i');
  } catch (error) {
    throw new ConfigError(`Invalid slot pattern '${source}'`, toError(error));
  }
  if (countGroups(source) < 1) {
    throw new ConfigError(`Slot pattern '${source}' has no capture group for the resource`);
  }
  return regex;
}

export function isMatchPolicy(value: string): value is MatchPolicy {
  return (MATCH_POLICIES as readonly string[]).includes(value);
}

function countGroups(source: string): number {
  const match = new RegExp(`${source}|`).exec('');
  return match ? match.length - 1 : 0;
}
