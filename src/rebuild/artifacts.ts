/**
 * Exported artifact shapes
 *
 * Snapshots are keyed by entity name. Weight maps are keyed by
 * (mesh, stack index); the index is a field of each map and the manifest
 * records the stack shape it was exported from.
 */

import { join, parse } from 'node:path';
import { z } from 'zod';
import { deformerKindZ } from './config/types';

const vec3Z = z.tuple([z.number(), z.number(), z.number()]);
const attributeValueZ = z.union([z.number(), z.boolean(), z.string(), z.array(z.number())]);

export const transformSnapshotZ = z.object({
  name: z.string(),
  attributes: z.record(attributeValueZ),
});

export const controlPointSnapshotZ = z.object({
  name: z.string(),
  points: z.array(vec3Z),
});

export const stackManifestZ = z.object({
  mesh: z.string(),
  vertexCount: z.number().int().nonnegative(),
  stack: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      name: z.string(),
      kind: deformerKindZ,
    })
  ),
});

export const weightPayloadZ = z.discriminatedUnion('type', [
  z.object({ type: z.literal('scalar'), values: z.array(z.number()) }),
  z.object({
    type: z.literal('skin'),
    influences: z.array(z.object({ joint: z.string(), values: z.array(z.number()) })),
  }),
]);

export const deformerWeightMapZ = z.object({
  mesh: z.string(),
  index: z.number().int().nonnegative(),
  deformer: z.object({ name: z.string(), kind: deformerKindZ }),
  /** Kinds of the whole stack at export time, in order */
  fingerprint: z.array(deformerKindZ),
  vertexCount: z.number().int().nonnegative(),
  weights: weightPayloadZ,
});

/** Controller names of a reference rig */
export const controllerListZ = z.array(z.string());

export const transformFileZ = z.record(transformSnapshotZ);
export const controlPointFileZ = z.record(controlPointSnapshotZ);

export type TransformSnapshot = z.infer<typeof transformSnapshotZ>;
export type ControlPointSnapshot = z.infer<typeof controlPointSnapshotZ>;
export type StackManifest = z.infer<typeof stackManifestZ>;
export type DeformerWeightMap = z.infer<typeof deformerWeightMapZ>;

export const ARTIFACT_FILES = {
  controllers: 'controllers_data.json',
  transforms: 'transforms_data.json',
  cvs: 'cvs_data.json',
} as const;

export const WEIGHTS_FOLDER = 'weights';

export function manifestFile(mesh: string): string {
  return `${WEIGHTS_FOLDER}/${mesh}.stack.json`;
}

export function weightMapFile(mesh: string, index: number): string {
  return `${WEIGHTS_FOLDER}/${mesh}.${index}.weights.json`;
}

/** Reference controller list kept beside a scene: `controller.scene` -> `controller_data.json` */
export function controllerListFile(scenePath: string): string {
  const { dir, name } = parse(scenePath);
  return join(dir, `${name}_data.json`);
}

/** Default path of the exported transfer-node template */
export function transferTemplateFile(asset: string): string {
  return `${asset}_bcs_nodes.scene`;
}
