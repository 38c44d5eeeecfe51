/**
 * Data/Weight Importer
 *
 * Snapshots are restored by exact name. Weights are restored by position:
 * each map goes to whatever deformer occupies its index in the rebuilt stack,
 * which is only meaningful when the rebuilt stack has the exported shape.
 * A mesh whose stack count, kinds or names differ receives nothing, and a map
 * is only applied when it was written for the stack now in the manifest.
 */

import type { AttributeValue, SceneHost } from '../../engine/SceneHost.types';
import { ArtifactStore } from '../../services/artifactStore';
import { errorMessage } from '../errors';
import type { IssueLog } from '../issues';
import type { RigConfig } from '../config/types';
import { resolveStackTargets } from '../deformers/stackTargets';
import {
  ARTIFACT_FILES,
  controlPointFileZ,
  deformerWeightMapZ,
  manifestFile,
  stackManifestZ,
  transformFileZ,
  weightMapFile,
} from '../artifacts';

export interface ImportDataOptions {
  importCtrl?: boolean;
  importTransforms?: boolean;
  importCvs?: boolean;
  directory: string;
}

export interface ImportDataResult {
  /** Entities found in the scene and restored (attributes or points) */
  restored: number;
  /** Entities named in the artifacts but absent from the scene */
  missing: number;
  /** Controllers whose control points were left alone */
  skipped: number;
}

export type WeightImportStatus = 'applied' | 'partial' | 'skipped' | 'stackMismatch' | 'missingManifest';

export interface MeshWeightOutcome {
  status: WeightImportStatus;
  /** Stack indices whose weights were applied */
  applied: number[];
  /** Stack indices reported as failed */
  failed: number[];
}

function restoreAttributes(
  host: SceneHost,
  node: string,
  attributes: Record<string, AttributeValue>,
  log: IssueLog
): void {
  for (const [attr, value] of Object.entries(attributes)) {
    const plug = `${node}.${attr}`;
    if (!host.hasAttribute(node, attr)) {
      log.warn('NomenclatureMismatch', plug, `Attribute ${plug} does not exist`, { expected: plug, found: 'nothing' });
      continue;
    }
    const locked = host.isLocked(node, attr);
    try {
      if (locked) host.setLocked(node, attr, false);
      host.setAttribute(node, attr, value);
    } catch (err) {
      log.warn('HostFailure', plug, `Failed to set attribute ${plug}: ${errorMessage(err)}`);
    } finally {
      if (locked) host.setLocked(node, attr, true);
    }
  }
}

export function importData(host: SceneHost, options: ImportDataOptions, log: IssueLog): ImportDataResult {
  const { importCtrl = true, importTransforms = true, importCvs = true } = options;
  const store = new ArtifactStore(options.directory);
  const result: ImportDataResult = { restored: 0, missing: 0, skipped: 0 };

  const snapshotFiles = [
    ...(importCtrl ? [ARTIFACT_FILES.controllers] : []),
    ...(importTransforms ? [ARTIFACT_FILES.transforms] : []),
  ];
  for (const file of snapshotFiles) {
    const read = store.readJson(file, transformFileZ);
    if (!read.ok) {
      log.error('MissingArtifact', file, read.message);
      continue;
    }
    for (const [name, snapshot] of Object.entries(read.value)) {
      if (!host.exists(name)) {
        log.warn('NomenclatureMismatch', name, `${name} does not exist in the scene`, { expected: name, found: 'nothing' });
        result.missing++;
        continue;
      }
      restoreAttributes(host, name, snapshot.attributes, log);
      result.restored++;
    }
  }

  if (importCvs) {
    const read = store.readJson(ARTIFACT_FILES.cvs, controlPointFileZ);
    if (!read.ok) {
      log.error('MissingArtifact', ARTIFACT_FILES.cvs, read.message);
    } else {
      for (const [name, snapshot] of Object.entries(read.value)) {
        if (!host.exists(name)) {
          log.warn('NomenclatureMismatch', name, `${name} does not exist in the scene`, { expected: name, found: 'nothing' });
          result.missing++;
          continue;
        }
        const current = host.getControlPoints(name);
        if (current.length !== snapshot.points.length) {
          log.warn('TopologyMismatch', name, `Control point count of ${name} changed, skipping`, {
            expected: String(snapshot.points.length),
            found: String(current.length),
          });
          result.skipped++;
          continue;
        }
        try {
          host.setControlPoints(name, snapshot.points);
          result.restored++;
        } catch (err) {
          log.warn('HostFailure', name, `Failed to set control points of ${name}: ${errorMessage(err)}`);
          result.skipped++;
        }
      }
    }
  }

  log.info(`Import data completed from ${options.directory}: ${result.restored} restored, ${result.missing} missing, ${result.skipped} skipped`);
  return result;
}

function importMeshWeights(host: SceneHost, store: ArtifactStore, mesh: string, log: IssueLog): MeshWeightOutcome {
  const outcome: MeshWeightOutcome = { status: 'applied', applied: [], failed: [] };

  const manifest = store.readJson(manifestFile(mesh), stackManifestZ);
  if (!manifest.ok) {
    log.error('MissingArtifact', mesh, manifest.message);
    return { ...outcome, status: 'missingManifest' };
  }

  const live = host.listDeformers(mesh);
  const exported = manifest.value.stack;
  const expectedShape = exported.map((d) => d.kind).join(', ');
  const liveShape = live.map((d) => d.kind).join(', ');
  if (live.length !== exported.length) {
    log.error(
      'StackIndexMismatch',
      mesh,
      `Stack of "${mesh}" has ${live.length} deformer(s) where ${exported.length} were exported; no weights applied`,
      { expected: `[${expectedShape}]`, found: `[${liveShape}]` }
    );
    return { ...outcome, status: 'stackMismatch' };
  }
  if (expectedShape !== liveShape) {
    log.error(
      'StackIndexMismatch',
      mesh,
      `Stack of "${mesh}" runs [${liveShape}] where [${expectedShape}] was exported; no weights applied`,
      { expected: `[${expectedShape}]`, found: `[${liveShape}]` }
    );
    return { ...outcome, status: 'stackMismatch' };
  }
  const expectedNames = exported.map((d) => d.name).join(', ');
  const liveNames = live.map((d) => d.name).join(', ');
  if (expectedNames !== liveNames) {
    log.error(
      'StackIndexMismatch',
      mesh,
      `Stack of "${mesh}" holds [${liveNames}] where [${expectedNames}] was exported; no weights applied`,
      { expected: `[${expectedNames}]`, found: `[${liveNames}]` }
    );
    return { ...outcome, status: 'stackMismatch' };
  }

  const vertexCount = host.vertexCount(mesh);
  live.forEach((deformer, index) => {
    const read = store.readJson(weightMapFile(mesh, index), deformerWeightMapZ);
    if (!read.ok) {
      log.error('MissingArtifact', `${mesh}[${index}]`, read.message);
      outcome.failed.push(index);
      return;
    }
    const map = read.value;
    if (map.index !== index || map.mesh !== mesh) {
      log.error('StackIndexMismatch', `${mesh}[${index}]`, `Weight map ${weightMapFile(mesh, index)} is labelled ${map.mesh}[${map.index}]`, {
        expected: `${mesh}[${index}]`,
        found: `${map.mesh}[${map.index}]`,
      });
      outcome.failed.push(index);
      return;
    }
    const mapShape = map.fingerprint.join(', ');
    if (map.deformer.kind !== deformer.kind || map.deformer.name !== deformer.name || mapShape !== liveShape) {
      log.error('StackIndexMismatch', `${mesh}[${index}]`, `Weight map ${weightMapFile(mesh, index)} was exported for another stack`, {
        expected: `${deformer.name} (${deformer.kind}) in [${liveShape}]`,
        found: `${map.deformer.name} (${map.deformer.kind}) in [${mapShape}]`,
      });
      outcome.failed.push(index);
      return;
    }
    if (map.vertexCount !== vertexCount) {
      log.error('TopologyMismatch', `${mesh}[${index}]`, `"${mesh}" has ${vertexCount} vertices, ${deformer.name} weights were exported for ${map.vertexCount}`, {
        expected: String(map.vertexCount),
        found: String(vertexCount),
      });
      outcome.failed.push(index);
      return;
    }
    if (map.weights.type === 'skin') {
      const influences = host.listInfluences(deformer.name);
      const absent = map.weights.influences.map((i) => i.joint).filter((joint) => !influences.includes(joint));
      if (absent.length > 0) {
        log.error('NomenclatureMismatch', `${mesh}[${index}]`, `${deformer.name} lacks influence(s) ${absent.join(', ')}`, {
          expected: absent.join(', '),
          found: influences.join(', '),
        });
        outcome.failed.push(index);
        return;
      }
    }
    try {
      host.setWeights(deformer.name, mesh, map.weights);
      outcome.applied.push(index);
    } catch (err) {
      log.fromError(err, `${mesh}[${index}]`);
      outcome.failed.push(index);
    }
  });

  if (outcome.failed.length > 0) outcome.status = 'partial';
  return outcome;
}

export function importWeights(
  host: SceneHost,
  config: RigConfig,
  directory: string,
  skipMeshes: string[],
  log: IssueLog
): Record<string, MeshWeightOutcome> {
  const store = new ArtifactStore(directory);
  const skip = new Set(skipMeshes);
  const outcomes: Record<string, MeshWeightOutcome> = {};

  for (const target of resolveStackTargets(host, config)) {
    for (const name of target.missing) {
      log.warn('NomenclatureMismatch', name, `Stack "${target.key}": "${name}" is not in the scene`, { expected: name, found: 'nothing' });
    }
    for (const mesh of target.meshes) {
      if (outcomes[mesh]) continue;
      if (skip.has(mesh)) {
        outcomes[mesh] = { status: 'skipped', applied: [], failed: [] };
        continue;
      }
      outcomes[mesh] = importMeshWeights(host, store, mesh, log);
      if (outcomes[mesh].status === 'applied') log.info(`Weights imported for ${mesh}`);
    }
  }
  return outcomes;
}
