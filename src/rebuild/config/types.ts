/**
 * Rig Configuration Types
 *
 * Zod schemas for the declarative rig description. Parsed configurations are
 * fully defaulted; the inferred types are what every rebuild step consumes.
 */

import { z } from 'zod';

export const GROUP_KINDS = ['geometry', 'compilation', 'rig', 'blendshape', 'tool'] as const;
export type GroupKind = (typeof GROUP_KINDS)[number];

export const groupKindZ = z.enum(GROUP_KINDS);

export function isGroupKind(key: string): key is GroupKind {
  return GROUP_KINDS.some((kind) => kind === key);
}

export const deformerKindZ = z.enum([
  'skinCluster',
  'cluster',
  'ffd',
  'blendShape',
  'wrap',
  'proximityWrap',
  'shrinkWrap',
  'wire',
  'bend',
]);

export const nodeKindZ = z.enum(['group', 'mesh', 'joint', 'curve', 'constraint', 'locator', 'transfer']);

export const projectInfoZ = z.object({
  asset: z.string().min(1),
  projectDirectory: z.string().min(1),
  subFolders: z.array(z.string().min(1)).default([]),
});

export const modelingEntryZ = z.object({
  /** Authoritative source mesh (or group of meshes); may start with `{}` */
  referenceGeometry: z.string().min(1),
  /** Group kinds the reference lands in; a repeated kind is indexed (rig01, rig02) */
  targetGroups: z.array(groupKindZ).min(1),
});

export const skinBindingParamsZ = z.object({
  type: z.literal('skinBinding'),
  joints: z.array(z.string().min(1)).min(1),
  useHierarchy: z.boolean().default(true),
  envelope: z.number().min(0).max(1).default(1),
});

export const genericParamsZ = z.object({
  type: z.literal('generic'),
  source: z.string().min(1),
});

export const noParamsZ = z.object({
  type: z.literal('none'),
});

export const deformerParamsZ = z.discriminatedUnion('type', [skinBindingParamsZ, genericParamsZ, noParamsZ]);

export const deformerSlotZ = z.object({
  name: z.string().min(1),
  params: deformerParamsZ.default({ type: 'none' }),
});

export const stackEntryZ = z.object({
  /** Modeling part whose reference geometry feeds `{name}` */
  part: z.string().min(1).optional(),
  /** Application order; also the index used to match exported weights */
  deformers: z.array(deformerSlotZ),
});

export const connectionsZ = z.object({
  /** Transfer node -> mesh it drives */
  bcs: z.record(z.string().min(1)).default({}),
  /** Template key -> destination node -> source plug -> destination attribute */
  templates: z.record(z.record(z.record(z.string().min(1)))).default({}),
});

export const suffixAssociationZ = z.object({
  suffix: z.string().min(1),
  type: deformerKindZ,
});

export const exportFiltersZ = z.object({
  controllerPattern: z.string().min(1).default('*_ctrl'),
  /** Controllers left out of the controller count */
  skipControllers: z.array(z.string()).default([]),
  ignoredAttributes: z.array(z.string()).default(['stimUuid']),
  /** Node kinds exported as constraints next to plain transforms */
  constraintKinds: z.array(nodeKindZ).default(['constraint']),
});

export const DEFAULT_SUFFIX_ASSOCIATIONS: Array<z.infer<typeof suffixAssociationZ>> = [
  { suffix: 'skinCluster', type: 'skinCluster' },
  { suffix: 'cluster', type: 'cluster' },
  { suffix: 'ffd', type: 'ffd' },
  { suffix: 'blendShape', type: 'blendShape' },
  { suffix: 'wrap', type: 'wrap' },
  { suffix: 'proximityWrap', type: 'proximityWrap' },
  { suffix: 'shrinkWrap', type: 'shrinkWrap' },
  { suffix: 'wire', type: 'wire' },
  { suffix: 'bend', type: 'bend' },
];

export const rigConfigZ = z.object({
  projectInfo: projectInfoZ,
  sides: z.array(z.string().min(1)).min(1).default(['L', 'R']),
  /** Group kind (or auxiliary key such as `root`, `clusters`) -> group node name */
  groupsHierarchy: z.record(z.string().min(1)),
  modelingHierarchy: z.record(modelingEntryZ),
  deformersStack: z.record(stackEntryZ).default({}),
  connections: connectionsZ.default({}),
  /** Source group kind -> group kinds whose meshes receive it as a blend-shape target */
  blendshapeConnections: z.record(z.array(groupKindZ)).default({}),
  suffixAssociations: z.array(suffixAssociationZ).default(DEFAULT_SUFFIX_ASSOCIATIONS),
  /** Template key -> scene path */
  templateScenes: z.record(z.string().min(1)).default({}),
  /** Exact renames applied before export */
  renameMap: z.record(z.string().min(1)).default({}),
  exportFilters: exportFiltersZ.default({}),
});

export type ProjectInfo = z.infer<typeof projectInfoZ>;
export type ModelingHierarchyEntry = z.infer<typeof modelingEntryZ>;
export type SkinBindingParams = z.infer<typeof skinBindingParamsZ>;
export type GenericDeformerParams = z.infer<typeof genericParamsZ>;
export type DeformerParams = z.infer<typeof deformerParamsZ>;
export type DeformerSlot = z.infer<typeof deformerSlotZ>;
export type DeformerStackEntry = z.infer<typeof stackEntryZ>;
export type SuffixAssociation = z.infer<typeof suffixAssociationZ>;
export type ExportFilters = z.infer<typeof exportFiltersZ>;
export type RigConfig = z.infer<typeof rigConfigZ>;
/** Raw configuration as authored, before defaults */
export type RigConfigInput = z.input<typeof rigConfigZ>;
