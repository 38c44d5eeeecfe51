/**
 * Nomenclature normalization
 *
 * Runs before every export so that names read back at rebuild time match the
 * configuration: explicit renames first, then each mesh's skin binding takes
 * its configured slot name, then deformers get the suffix of their kind.
 * A rename onto a name that is already taken is reported and skipped.
 */

import type { SceneHost } from '../../engine/SceneHost.types';
import type { IssueLog } from '../issues';
import type { RigConfig } from '../config/types';
import { resolveDeformerName } from '../config/placeholders';
import { nameSuffix, suffixesForKind } from '../deformers/deformerKinds';
import { resolveStackTargets } from '../deformers/stackTargets';

export interface Rename {
  from: string;
  to: string;
}

function tryRename(host: SceneHost, from: string, to: string, log: IssueLog, renames: Rename[]): boolean {
  if (from === to) return false;
  if (host.exists(to)) {
    log.warn('ResourceAlreadyExists', from, `Cannot rename "${from}" to "${to}": the name is taken`, {
      expected: to,
      found: from,
    });
    return false;
  }
  host.rename(from, to);
  renames.push({ from, to });
  return true;
}

export function normalizeNomenclature(host: SceneHost, config: RigConfig, log: IssueLog): Rename[] {
  const renames: Rename[] = [];

  for (const [from, to] of Object.entries(config.renameMap)) {
    if (host.exists(from)) tryRename(host, from, to, log, renames);
  }

  const targets = resolveStackTargets(host, config);

  for (const { entry, meshes } of targets) {
    const skinSlot = entry.deformers.find((slot) => slot.params.type === 'skinBinding');
    if (!skinSlot) continue;
    for (const mesh of meshes) {
      const skins = host.listDeformers(mesh).filter((d) => d.kind === 'skinCluster');
      if (skins.length === 0) continue;
      if (skins.length > 1) {
        log.error('NomenclatureMismatch', mesh, `One skin binding is expected on "${mesh}"`, {
          expected: '1 skin binding',
          found: skins.map((s) => s.name).join(', '),
        });
        continue;
      }
      const [expected] = resolveDeformerName(skinSlot.name, mesh, config.sides);
      tryRename(host, skins[0].name, expected, log, renames);
    }
  }

  for (const { meshes } of targets) {
    for (const mesh of meshes) {
      for (const deformer of host.listDeformers(mesh)) {
        const suffixes = suffixesForKind(deformer.kind, config.suffixAssociations);
        const suffix = nameSuffix(deformer.name);
        if (suffixes.length === 0 || suffixes.includes(suffix)) continue;
        const tokens = deformer.name.split('_');
        const renamed = tokens.length > 1 ? [...tokens.slice(0, -1), suffixes[0]].join('_') : `${deformer.name}_${suffixes[0]}`;
        tryRename(host, deformer.name, renamed, log, renames);
      }
    }
  }

  if (renames.length > 0) log.info(`Renamed ${renames.length} node(s)`);
  return renames;
}
