/**
 * Export Adapter
 *
 * Walks a finished rig and writes the artifacts a rebuild consumes:
 * name-keyed snapshots of controllers, transforms and control points, and
 * one weight map per (mesh, stack index) with a manifest of the stack shape.
 */

import type { AttributeValue, NodeKind, SceneHost } from '../../engine/SceneHost.types';
import { ArtifactStore } from '../../services/artifactStore';
import { NomenclatureMismatch } from '../errors';
import type { IssueLog } from '../issues';
import type { RigConfig } from '../config/types';
import { resolveStackTargets } from '../deformers/stackTargets';
import {
  ARTIFACT_FILES,
  manifestFile,
  transferTemplateFile,
  weightMapFile,
  type ControlPointSnapshot,
  type DeformerWeightMap,
  type StackManifest,
  type TransformSnapshot,
} from '../artifacts';
import { normalizeNomenclature, type Rename } from './nomenclature';

export interface ExportDataOptions {
  exportCtrl?: boolean;
  exportTransforms?: boolean;
  exportCvs?: boolean;
  directory: string;
}

export interface ExportWeightsOptions {
  /** Report a missing mesh as a warning instead of throwing */
  skipMissing?: boolean;
  exportTransferNodes?: boolean;
}

export interface ExportResult {
  files: string[];
  renames: Rename[];
}

export interface ExportWeightsResult extends ExportResult {
  /** Mesh -> number of weight maps written */
  meshes: Record<string, number>;
  /** Meshes whose stack could not be read; nothing is written for them */
  failedMeshes: string[];
  /** Scene path of the exported transfer nodes, when any were exported */
  transferTemplate: string | null;
}

const TRANSFORM_KINDS: NodeKind[] = ['group', 'mesh', 'joint', 'curve', 'locator'];

function readAttributes(host: SceneHost, node: string, attributes: string[]): Record<string, AttributeValue> {
  return Object.fromEntries(attributes.map((attr) => [attr, host.getAttribute(node, attr)]));
}

function snapshot(host: SceneHost, node: string, attributes: string[]): TransformSnapshot {
  return { name: node, attributes: readAttributes(host, node, attributes) };
}

export function exportData(host: SceneHost, config: RigConfig, options: ExportDataOptions, log: IssueLog): ExportResult {
  const { exportCtrl = true, exportTransforms = true, exportCvs = true } = options;
  const { controllerPattern, ignoredAttributes, constraintKinds } = config.exportFilters;
  const store = new ArtifactStore(options.directory);
  const renames = normalizeNomenclature(host, config, log);
  const files: string[] = [];

  const ignored = new Set(ignoredAttributes);
  const controllers = host.ls(controllerPattern, TRANSFORM_KINDS);

  if (exportCtrl) {
    const data: Record<string, TransformSnapshot> = {};
    for (const ctrl of controllers) {
      const attributes = host.listAttributes(ctrl, 'userDefined').filter((a) => !ignored.has(a));
      if (attributes.length === 0) continue;
      data[ctrl] = snapshot(host, ctrl, attributes);
    }
    files.push(store.writeJson(ARTIFACT_FILES.controllers, data));
    log.info(`Exported ${Object.keys(data).length} controller(s)`);
  }

  if (exportTransforms) {
    const excluded = new Set(controllers);
    const nodes = host.ls('*', [...TRANSFORM_KINDS, ...constraintKinds]).filter((n) => !excluded.has(n));
    const data: Record<string, TransformSnapshot> = {};
    for (const node of nodes) {
      const attributes = host.listAttributes(node, 'keyable').filter((a) => !ignored.has(a));
      data[node] = snapshot(host, node, attributes);
    }
    files.push(store.writeJson(ARTIFACT_FILES.transforms, data));
    log.info(`Exported ${nodes.length} transform(s) and constraint(s)`);
  }

  if (exportCvs) {
    const data: Record<string, ControlPointSnapshot> = {};
    for (const ctrl of controllers) {
      const points = host.getControlPoints(ctrl);
      if (points.length === 0) {
        log.info(`No control points found for controller ${ctrl}`);
        continue;
      }
      data[ctrl] = { name: ctrl, points };
    }
    files.push(store.writeJson(ARTIFACT_FILES.cvs, data));
  }

  log.info(`Export data completed to ${options.directory}`);
  return { files, renames };
}

export function exportWeights(
  host: SceneHost,
  config: RigConfig,
  directory: string,
  options: ExportWeightsOptions,
  log: IssueLog
): ExportWeightsResult {
  const { skipMissing = true, exportTransferNodes = true } = options;
  const store = new ArtifactStore(directory);
  const renames = normalizeNomenclature(host, config, log);
  const files: string[] = [];
  const meshes: Record<string, number> = {};
  const failedMeshes: string[] = [];

  for (const target of resolveStackTargets(host, config)) {
    for (const name of target.missing) {
      const message = `Stack "${target.key}": "${name}" is not in the scene`;
      if (!skipMissing) {
        throw new NomenclatureMismatch(message, { entity: name, expected: name, found: 'nothing' });
      }
      log.warn('NomenclatureMismatch', name, `${message}, skipped`, { expected: name, found: 'nothing' });
    }

    for (const mesh of target.meshes) {
      if (meshes[mesh] !== undefined || failedMeshes.includes(mesh)) continue;
      try {
        const stack = host.listDeformers(mesh);
        const vertexCount = host.vertexCount(mesh);
        const fingerprint = stack.map((d) => d.kind);
        const maps: DeformerWeightMap[] = stack.map((deformer, index) => ({
          mesh,
          index,
          deformer: { name: deformer.name, kind: deformer.kind },
          fingerprint,
          vertexCount,
          weights: host.getWeights(deformer.name, mesh),
        }));
        const manifest: StackManifest = {
          mesh,
          vertexCount,
          stack: stack.map((d, index) => ({ index, name: d.name, kind: d.kind })),
        };

        // Maps first, manifest last: a manifest never describes maps that were not written
        store.remove(manifestFile(mesh));
        for (const map of maps) files.push(store.writeJson(weightMapFile(mesh, map.index), map));
        files.push(store.writeJson(manifestFile(mesh), manifest));
        meshes[mesh] = stack.length;
      } catch (err) {
        log.fromError(err, mesh);
        failedMeshes.push(mesh);
      }
    }
  }

  let transferTemplate: string | null = null;
  if (exportTransferNodes) {
    const nodes = host.ls('*', 'transfer');
    if (nodes.length > 0) {
      transferTemplate =
        config.templateScenes.bcs ?? store.path(transferTemplateFile(config.projectInfo.asset));
      host.exportScene(nodes, transferTemplate);
      log.info(`Exported ${nodes.length} transfer node(s) to ${transferTemplate}`);
    }
  }

  log.info(`Exported weights of ${Object.keys(meshes).length} mesh(es) to ${directory}, ${failedMeshes.length} failed`);
  return { files, renames, meshes, failedMeshes, transferTemplate };
}
