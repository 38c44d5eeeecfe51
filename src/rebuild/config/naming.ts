/**
 * Naming rules shared by the hierarchy composer and the configuration store.
 */

import type { DeformerStackEntry, GroupKind, ModelingHierarchyEntry, RigConfig } from './types';
import { SIDE, assertUnique, expandSides, resolveMeshKey } from './placeholders';

export interface IndexedGroup {
  kind: GroupKind;
  /** Token inserted into copy names, e.g. `rig` or `rig02` */
  label: string;
}

/**
 * Label every target group; a kind listed more than once is numbered
 * from 01 in order of appearance.
 */
export function indexGroups(targetGroups: GroupKind[]): IndexedGroup[] {
  const seen = new Map<GroupKind, number>();
  return targetGroups.map((kind) => {
    const occurrence = (seen.get(kind) ?? 0) + 1;
    seen.set(kind, occurrence);
    const repeated = targetGroups.filter((k) => k === kind).length > 1;
    return { kind, label: repeated ? `${kind}${String(occurrence).padStart(2, '0')}` : kind };
  });
}

/**
 * Name of a duplicated node: the label goes before the last `_` token and
 * any `geo` token becomes `mesh`. `M_body_geo` + `rig` -> `M_body_rig_mesh`.
 */
export function copyName(sourceName: string, label: string): string {
  const tokens = sourceName.split('_');
  tokens.splice(Math.max(tokens.length - 1, 0), 0, label);
  return tokens.map((t) => (t === 'geo' ? 'mesh' : t)).join('_');
}

/** Concrete reference geometries of a part, one per side for `{}` references */
export function partReferences(entry: ModelingHierarchyEntry, sides: string[]): string[] {
  return expandSides(entry.referenceGeometry, sides);
}

/** Top-level names the composer produces for a part: the references and their copies */
export function partOutputNames(entry: ModelingHierarchyEntry, sides: string[]): string[] {
  const names: string[] = [];
  for (const reference of partReferences(entry, sides)) {
    names.push(reference);
    for (const group of indexGroups(entry.targetGroups)) {
      if (group.kind !== 'geometry') names.push(copyName(reference, group.label));
    }
  }
  return names;
}

/**
 * Concrete mesh (or group) names of a stack key. A `{side}` key has no
 * invocation side during a full build, so it is invoked once per side.
 */
export function stackKeyNames(key: string, entry: DeformerStackEntry, config: RigConfig): string[] {
  const referenceGeometry = entry.part ? config.modelingHierarchy[entry.part]?.referenceGeometry : undefined;
  const invocations: Array<string | undefined> = key.includes(SIDE) ? config.sides : [undefined];
  const names = invocations.flatMap((side) =>
    resolveMeshKey(key, { sides: config.sides, side, referenceGeometry })
  );
  return assertUnique(names, key);
}
