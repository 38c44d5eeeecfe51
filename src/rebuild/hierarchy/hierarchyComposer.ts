/**
 * Hierarchy Composer
 *
 * Builds the group hierarchy and places every part's reference geometry into
 * its target groups: the geometry group receives the reference itself, every
 * other group a renamed copy. Re-running on a scene that already holds the
 * copies fails before touching anything.
 */

import type { SceneHost } from '../../engine/SceneHost.types';
import { ResourceAlreadyExists } from '../errors';
import type { IssueLog } from '../issues';
import { isGroupKind, type GroupKind, type RigConfig } from '../config/types';
import { copyName, indexGroups, partReferences } from '../config/naming';
import { meshesUnder } from '../deformers/stackTargets';

export interface HierarchySetupResult {
  /** Groups created by this run */
  groups: string[];
  /** Reference -> group kind -> placed nodes (the reference or its copies) */
  created: Record<string, Partial<Record<GroupKind, string[]>>>;
  /** References absent from the scene */
  missing: string[];
  /** `blendShape <- source mesh` links made between groups */
  blendShapeLinks: Array<{ blendShape: string; source: string; target: string }>;
}

const ROOT_KEY = 'root';

function planGroups(host: SceneHost, config: RigConfig, collisions: string[]): Array<{ name: string; parent?: string }> {
  const root: string | undefined = config.groupsHierarchy[ROOT_KEY];
  const planned: Array<{ name: string; parent?: string }> = [];
  const ordered = Object.entries(config.groupsHierarchy).sort(([a], [b]) => Number(b === ROOT_KEY) - Number(a === ROOT_KEY));

  for (const [key, name] of ordered) {
    if (planned.some((g) => g.name === name)) continue;
    const kind = host.nodeKind(name);
    if (kind === 'group') continue;
    if (kind !== null) {
      collisions.push(name);
      continue;
    }
    planned.push({ name, parent: key === ROOT_KEY ? undefined : root });
  }
  return planned;
}

function planCopies(host: SceneHost, config: RigConfig, collisions: string[]): void {
  const claimed = new Set<string>();
  for (const entry of Object.values(config.modelingHierarchy)) {
    for (const reference of partReferences(entry, config.sides)) {
      if (host.nodeKind(reference) === null) continue;
      const sources = [reference, ...host.listDescendants(reference)];
      for (const group of indexGroups(entry.targetGroups)) {
        if (group.kind === 'geometry') continue;
        for (const name of sources.map((s) => copyName(s, group.label))) {
          if (host.exists(name) || claimed.has(name)) collisions.push(name);
          claimed.add(name);
        }
      }
    }
  }
}

function linkBlendShapes(host: SceneHost, config: RigConfig, result: HierarchySetupResult, log: IssueLog): void {
  for (const [reference, byKind] of Object.entries(result.created)) {
    for (const [sourceKind, targetKinds] of Object.entries(config.blendshapeConnections)) {
      if (!isGroupKind(sourceKind)) continue;
      const sources = byKind[sourceKind] ?? [];
      for (const targetKind of targetKinds) {
        const targets = byKind[targetKind] ?? [];
        if (sources.length === 0 || targets.length === 0) continue;
        const targetMeshes = targets.flatMap((t) => meshesUnder(host, t));

        for (const source of sources) {
          const sourceMeshes = meshesUnder(host, source);
          const pairs = Math.min(sourceMeshes.length, targetMeshes.length);
          if (sourceMeshes.length !== targetMeshes.length) {
            log.warn('TopologyMismatch', reference, `${source} has ${sourceMeshes.length} mesh(es) but ${targetKind} copies have ${targetMeshes.length}; linking ${pairs}`);
          }
          for (let i = 0; i < pairs; i++) {
            const target = targetMeshes[i];
            try {
              const blendShape =
                host.listDeformers(target).find((d) => d.kind === 'blendShape')?.name ??
                host.createDeformer({ name: `${target}_blendShape`, kind: 'blendShape', geometry: target }).name;
              host.addBlendShapeTarget(blendShape, sourceMeshes[i], 1);
              result.blendShapeLinks.push({ blendShape, source: sourceMeshes[i], target });
            } catch (err) {
              log.fromError(err, target);
            }
          }
        }
      }
    }
  }
}

export function baseMeshesSetup(host: SceneHost, config: RigConfig, log: IssueLog): HierarchySetupResult {
  const collisions: string[] = [];
  const groups = planGroups(host, config, collisions);
  planCopies(host, config, collisions);
  if (collisions.length > 0) throw new ResourceAlreadyExists([...new Set(collisions)]);

  const result: HierarchySetupResult = { groups: [], created: {}, missing: [], blendShapeLinks: [] };
  for (const group of groups) {
    result.groups.push(host.createNode({ name: group.name, kind: 'group', parent: group.parent }));
  }

  for (const [part, entry] of Object.entries(config.modelingHierarchy)) {
    for (const reference of partReferences(entry, config.sides)) {
      if (host.nodeKind(reference) === null) {
        log.warn('NomenclatureMismatch', reference, `Part "${part}": reference geometry "${reference}" is not in the scene, skipped`, {
          expected: reference,
          found: 'nothing',
        });
        result.missing.push(reference);
        continue;
      }

      const placed: Partial<Record<GroupKind, string[]>> = {};
      result.created[reference] = placed;
      for (const group of indexGroups(entry.targetGroups)) {
        const groupName = config.groupsHierarchy[group.kind];
        try {
          let node: string;
          if (group.kind === 'geometry') {
            if (host.parentOf(reference) !== groupName) host.parent(reference, groupName);
            node = reference;
          } else {
            node = host.duplicate(reference, {
              parent: groupName,
              rename: (source) => copyName(source, group.label),
            })[0];
          }
          (placed[group.kind] ??= []).push(node);
        } catch (err) {
          log.fromError(err, reference);
        }
      }
    }
  }

  linkBlendShapes(host, config, result, log);

  const placedCount = Object.values(result.created).reduce(
    (sum, byKind) => sum + Object.values(byKind).reduce((n, nodes) => n + (nodes?.length ?? 0), 0),
    0
  );
  log.info(`Placed ${placedCount} node(s) for ${Object.keys(result.created).length} reference(s), ${result.missing.length} missing`);
  return result;
}
