/**
 * Resolution of stack keys to the live meshes they apply to
 *
 * A key names a mesh or a group; a group applies the stack to each child
 * mesh. Export, import and the builder all enumerate meshes this way so
 * they agree on which stacks exist.
 */

import type { DeformerKind, SceneHost } from '../../engine/SceneHost.types';
import type { DeformerSlot, DeformerStackEntry, RigConfig } from '../config/types';
import { stackKeyNames } from '../config/naming';
import { resolveDeformerName } from '../config/placeholders';
import { kindForName } from './deformerKinds';

export interface StackTarget {
  key: string;
  entry: DeformerStackEntry;
  /** Concrete names the key resolved to that exist in the scene */
  nodes: string[];
  /** Concrete names absent from the scene */
  missing: string[];
  /** Meshes the stack applies to, in resolution order */
  meshes: string[];
}

export interface ResolvedSlot {
  /** Position of the slot in the configured stack */
  slot: number;
  name: string;
  kind: DeformerKind | null;
  params: DeformerSlot['params'];
}

/** Child meshes of a group, or the node itself when it is a mesh */
export function meshesUnder(host: SceneHost, node: string): string[] {
  if (host.nodeKind(node) === 'mesh') return [node];
  return host.listChildren(node).filter((child) => host.nodeKind(child) === 'mesh');
}

export function resolveStackTargets(host: SceneHost, config: RigConfig): StackTarget[] {
  return Object.entries(config.deformersStack).map(([key, entry]) => {
    const names = stackKeyNames(key, entry, config);
    const nodes = names.filter((name) => host.nodeKind(name) !== null);
    return {
      key,
      entry,
      nodes,
      missing: names.filter((name) => host.nodeKind(name) === null),
      meshes: nodes.flatMap((node) => meshesUnder(host, node)),
    };
  });
}

/** Every slot of an entry resolved against one mesh, in stack order */
export function resolveSlots(entry: DeformerStackEntry, mesh: string, config: RigConfig): ResolvedSlot[] {
  return entry.deformers.flatMap((slot, index) =>
    resolveDeformerName(slot.name, mesh, config.sides).map((name) => ({
      slot: index,
      name,
      kind: kindForName(name, config.suffixAssociations),
      params: slot.params,
    }))
  );
}
