/**
 * Deformer kinds and the name suffixes that select them
 */

import type { AttributeValue, DeformerKind } from '../../engine/SceneHost.types';
import type { SuffixAssociation } from '../config/types';

/** Last `_` token of a deformer name */
export function nameSuffix(name: string): string {
  const tokens = name.split('_');
  return tokens[tokens.length - 1];
}

export function kindForName(name: string, associations: SuffixAssociation[]): DeformerKind | null {
  const suffix = nameSuffix(name);
  return associations.find((a) => a.suffix === suffix)?.type ?? null;
}

export function suffixesForKind(kind: DeformerKind, associations: SuffixAssociation[]): string[] {
  return associations.filter((a) => a.type === kind).map((a) => a.suffix);
}

/** Attributes a freshly created deformer of each kind starts with */
export const DEFAULT_DEFORMER_ATTRIBUTES: Partial<Record<DeformerKind, Record<string, AttributeValue>>> = {
  wrap: {
    maxDistance: 1,
    autoWeightThreshold: 1,
  },
  shrinkWrap: {
    projection: 2,
    closestIfNoIntersection: 1,
    reverse: 0,
    bidirectional: 1,
    boundingBoxCenter: 1,
    axisReference: 1,
    alongX: 0,
    alongY: 0,
    alongZ: 1,
    offset: 0,
    targetInflation: 0,
    targetSmoothLevel: 0,
    falloff: 0,
    falloffIterations: 1,
    shapePreservationEnable: 0,
    shapePreservationSteps: 1,
  },
};
