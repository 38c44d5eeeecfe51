/**
 * Deformer Stack Builder
 *
 * Creates each mesh's deformer chain in configured order. A mesh is planned
 * completely before anything is created on it: one unresolved joint, source
 * or template deformer fails that mesh only, since a skipped slot would shift
 * every later stack index and corrupt weight import.
 */

import type { DeformerHandle, DeformerKind, SceneHost } from '../../engine/SceneHost.types';
import type { DeformerStackEntry, RigConfig, SkinBindingParams } from '../config/types';
import type { IssueCode, IssueLog } from '../issues';
import { SIDE, sideOf } from '../config/placeholders';
import { DEFAULT_DEFORMER_ATTRIBUTES } from './deformerKinds';
import { resolveSlots, resolveStackTargets } from './stackTargets';

type SlotAction =
  | { type: 'createSkin'; name: string; joints: string[]; envelope: number }
  | { type: 'extendSkin'; name: string; joints: string[]; envelope: number }
  | { type: 'create'; name: string; kind: DeformerKind; driver: string }
  | { type: 'attach'; name: string; kind: DeformerKind };

interface Problem {
  code: IssueCode;
  entity: string;
  message: string;
  expected?: string;
  found?: string;
}

export interface StackBuildResult {
  /** Mesh -> handles in stack order */
  stacks: Record<string, DeformerHandle[]>;
  failedMeshes: string[];
}

function assertNever(value: never): never {
  throw new Error(`Unhandled deformer parameters: ${JSON.stringify(value)}`);
}

/** `{side}` in a joint or source name takes the side of the mesh being built */
function onSideOf(mesh: string, name: string): string {
  return name.split(SIDE).join(sideOf(mesh));
}

function skinJoints(host: SceneHost, mesh: string, params: SkinBindingParams, problems: Problem[]): string[] {
  const joints: string[] = [];
  for (const joint of params.joints.map((j) => onSideOf(mesh, j))) {
    const kind = host.nodeKind(joint);
    if (kind !== 'joint') {
      problems.push({
        code: 'NomenclatureMismatch',
        entity: joint,
        message: `Joint "${joint}" is not in the scene`,
        expected: 'joint',
        found: kind ?? 'nothing',
      });
      continue;
    }
    joints.push(joint);
    if (params.useHierarchy) {
      joints.push(...host.listDescendants(joint).filter((d) => host.nodeKind(d) === 'joint'));
    }
  }
  return [...new Set(joints)];
}

function planMesh(host: SceneHost, config: RigConfig, entry: DeformerStackEntry, mesh: string) {
  const problems: Problem[] = [];
  const actions: SlotAction[] = [];
  const boundSkins = host.listDeformers(mesh).filter((d) => d.kind === 'skinCluster');

  for (const slot of resolveSlots(entry, mesh, config)) {
    const { name, kind, params } = slot;
    if (kind === null) {
      problems.push({ code: 'ConfigurationError', entity: name, message: `No suffix association matches "${name}"` });
      continue;
    }
    const existingKind = host.deformerKind(name);
    if (existingKind === null && host.exists(name)) {
      problems.push({
        code: 'ResourceAlreadyExists',
        entity: name,
        message: `"${name}" is taken by a node that is not a deformer`,
        expected: kind,
        found: host.nodeKind(name) ?? 'unknown',
      });
      continue;
    }
    if (existingKind !== null && existingKind !== kind) {
      problems.push({
        code: 'NomenclatureMismatch',
        entity: name,
        message: `"${name}" exists as ${existingKind}`,
        expected: kind,
        found: existingKind,
      });
      continue;
    }

    switch (params.type) {
      case 'skinBinding': {
        const joints = skinJoints(host, mesh, params, problems);
        if (existingKind) {
          actions.push({ type: 'extendSkin', name, joints, envelope: params.envelope });
        } else if (boundSkins.length > 0) {
          problems.push({
            code: 'ResourceAlreadyExists',
            entity: mesh,
            message: `"${mesh}" is already bound by ${boundSkins.map((s) => s.name).join(', ')}`,
            expected: name,
            found: boundSkins.map((s) => s.name).join(', '),
          });
        } else {
          actions.push({ type: 'createSkin', name, joints, envelope: params.envelope });
        }
        break;
      }
      case 'generic': {
        if (existingKind) {
          actions.push({ type: 'attach', name, kind });
          break;
        }
        const source = onSideOf(mesh, params.source);
        const sourceKind = host.nodeKind(source);
        if (sourceKind !== 'mesh') {
          problems.push({
            code: 'NomenclatureMismatch',
            entity: source,
            message: `Source "${source}" of "${name}" is not in the scene`,
            expected: 'mesh',
            found: sourceKind ?? 'nothing',
          });
          break;
        }
        actions.push({ type: 'create', name, kind, driver: source });
        break;
      }
      case 'none':
        if (!existingKind) {
          problems.push({
            code: 'NomenclatureMismatch',
            entity: name,
            message: `Template deformer "${name}" is not in the scene`,
            expected: kind,
            found: 'nothing',
          });
          break;
        }
        actions.push({ type: 'attach', name, kind });
        break;
      default:
        assertNever(params);
    }
  }
  return { actions, problems };
}

function applyAction(host: SceneHost, mesh: string, action: SlotAction): DeformerHandle {
  switch (action.type) {
    case 'createSkin':
      return host.createDeformer({
        name: action.name,
        kind: 'skinCluster',
        geometry: mesh,
        influences: action.joints,
        attributes: { envelope: action.envelope },
      });
    case 'extendSkin':
      host.addInfluences(action.name, action.joints);
      host.attachDeformer(action.name, mesh);
      host.setAttribute(action.name, 'envelope', action.envelope);
      return { name: action.name, kind: 'skinCluster' };
    case 'create':
      return host.createDeformer({
        name: action.name,
        kind: action.kind,
        geometry: mesh,
        driver: action.driver,
        attributes: DEFAULT_DEFORMER_ATTRIBUTES[action.kind],
      });
    case 'attach':
      host.attachDeformer(action.name, mesh);
      return { name: action.name, kind: action.kind };
    default:
      return assertNever(action);
  }
}

export function createAllDeformers(host: SceneHost, config: RigConfig, log: IssueLog): StackBuildResult {
  const stacks: Record<string, DeformerHandle[]> = {};
  const failedMeshes: string[] = [];
  const seen = new Map<string, string>();

  for (const target of resolveStackTargets(host, config)) {
    for (const name of target.missing) {
      log.error('NomenclatureMismatch', name, `Stack "${target.key}": "${name}" is not in the scene`, {
        expected: name,
        found: 'nothing',
      });
      failedMeshes.push(name);
    }
    if (target.nodes.length > 0 && target.meshes.length === 0) {
      log.warn('NomenclatureMismatch', target.key, `Stack "${target.key}" matched no mesh under ${target.nodes.join(', ')}`);
    }

    for (const mesh of target.meshes) {
      const owner = seen.get(mesh);
      if (owner) {
        log.error('ConfigurationError', mesh, `"${mesh}" is claimed by stacks "${owner}" and "${target.key}"`);
        failedMeshes.push(mesh);
        continue;
      }
      seen.set(mesh, target.key);

      const { actions, problems } = planMesh(host, config, target.entry, mesh);
      if (problems.length > 0) {
        for (const p of problems) {
          log.error(p.code, p.entity, `${mesh}: ${p.message}`, { expected: p.expected, found: p.found });
        }
        failedMeshes.push(mesh);
        continue;
      }

      const handles: DeformerHandle[] = [];
      try {
        for (const action of actions) handles.push(applyAction(host, mesh, action));
        host.reorderDeformers(mesh, handles.map((h) => h.name));
        stacks[mesh] = handles;
      } catch (err) {
        log.fromError(err, mesh);
        log.error('HostFailure', mesh, `Stack on "${mesh}" is incomplete after ${handles.length} of ${actions.length} deformers`);
        failedMeshes.push(mesh);
      }
    }
  }

  log.info(`Built ${Object.keys(stacks).length} stack(s), ${failedMeshes.length} failed`);
  return { stacks, failedMeshes };
}
