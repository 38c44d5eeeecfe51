/**
 * SceneHost - Type definitions for the host scene the rebuild runs against
 *
 * The rebuild agencies decide WHAT to create, rename, bind and restore and in
 * WHICH order; the host decides HOW those primitives land in its scene.
 *
 * Separated from any implementation so the agencies never import a concrete
 * scene graph.
 */

export type Vec3 = [number, number, number];

/** Node categories the rebuild distinguishes */
export type NodeKind =
  | 'group'
  | 'mesh'
  | 'joint'
  | 'curve'
  | 'constraint'
  | 'locator'
  | 'transfer';

export type AttributeValue = number | boolean | string | number[];

export type DeformerKind =
  | 'skinCluster'
  | 'cluster'
  | 'ffd'
  | 'blendShape'
  | 'wrap'
  | 'proximityWrap'
  | 'shrinkWrap'
  | 'wire'
  | 'bend';

export const DEFORMER_KINDS: readonly DeformerKind[] = [
  'skinCluster',
  'cluster',
  'ffd',
  'blendShape',
  'wrap',
  'proximityWrap',
  'shrinkWrap',
  'wire',
  'bend',
];

/** A deformer as seen on one mesh's stack */
export type DeformerHandle = {
  name: string;
  kind: DeformerKind;
};

/**
 * Per-vertex weights of one deformer on one mesh.
 * Skin bindings carry one array per influence, in influence order.
 */
export type WeightPayload =
  | { type: 'scalar'; values: number[] }
  | { type: 'skin'; influences: Array<{ joint: string; values: number[] }> };

export type DeformerSpec = {
  name: string;
  kind: DeformerKind;
  /** Mesh the deformer is created on */
  geometry: string;
  /** Driver geometry for wrap-style deformers */
  driver?: string;
  /** Influences for skin bindings */
  influences?: string[];
  attributes?: Record<string, AttributeValue>;
};

/** Serializable node description used by template fragments */
export type NodeSpec = {
  name: string;
  kind: NodeKind;
  parent?: string;
  translate?: Vec3;
  rotate?: Vec3;
  scale?: Vec3;
  /** Vertex positions for meshes, control points for curves */
  points?: Vec3[];
  attributes?: Record<string, { value: AttributeValue; keyable?: boolean; locked?: boolean }>;
};

/** A partial scene imported or exported as a unit */
export type SceneFragment = {
  nodes: NodeSpec[];
  deformers?: Array<DeformerSpec & { members?: string[] }>;
};

export type DuplicateOptions = {
  parent?: string;
  /** Maps each source node name (root first, then descendants) to its copy's name */
  rename: (sourceName: string) => string;
};

/**
 * SceneHost - the scene primitives the rebuild depends on
 *
 * Every method is synchronous: the host scene is a single mutable resource and
 * each call completes before the next begins. Methods that cannot honour a
 * request throw an Error naming the offending node or plug.
 */
export interface SceneHost {
  // ---------- Nodes ----------
  exists(name: string): boolean;
  nodeKind(name: string): NodeKind | null;
  /**
   * List node names matching a glob (`*` wildcard), optionally filtered by kind.
   * Results follow scene traversal order.
   */
  ls(pattern: string, kinds?: NodeKind | NodeKind[]): string[];
  /** Direct children, excluding shape-only helpers */
  listChildren(name: string): string[];
  /** All descendants, depth first */
  listDescendants(name: string): string[];
  parentOf(name: string): string | null;
  createNode(spec: NodeSpec): string;
  /** Reparent a node; `null` moves it under the scene root */
  parent(name: string, parentName: string | null): void;
  rename(name: string, newName: string): string;
  /** Duplicate a node and its descendants; returns copy names, root first */
  duplicate(name: string, options: DuplicateOptions): string[];
  deleteNode(name: string): void;

  // ---------- Attributes ----------
  listAttributes(name: string, filter: 'userDefined' | 'keyable'): string[];
  hasAttribute(name: string, attribute: string): boolean;
  getAttribute(name: string, attribute: string): AttributeValue;
  /** Throws when the attribute is locked */
  setAttribute(name: string, attribute: string, value: AttributeValue): void;
  isLocked(name: string, attribute: string): boolean;
  setLocked(name: string, attribute: string, locked: boolean): void;

  // ---------- Control points ----------
  /** World-space control points of a curve node; empty for other kinds */
  getControlPoints(name: string): Vec3[];
  setControlPoints(name: string, points: Vec3[]): void;
  vertexCount(mesh: string): number;

  // ---------- Deformers ----------
  /** The mesh's deformer chain in application order */
  listDeformers(mesh: string): DeformerHandle[];
  deformerKind(name: string): DeformerKind | null;
  createDeformer(spec: DeformerSpec): DeformerHandle;
  /** Add a mesh to an existing deformer's membership (appends to its stack) */
  attachDeformer(deformer: string, mesh: string): void;
  /**
   * Put the named deformers of a mesh's chain in the given relative order.
   * They keep the chain positions they already occupy; other deformers stay put.
   */
  reorderDeformers(mesh: string, order: string[]): void;
  addInfluences(skin: string, joints: string[]): void;
  listInfluences(skin: string): string[];
  getWeights(deformer: string, mesh: string): WeightPayload;
  setWeights(deformer: string, mesh: string, weights: WeightPayload): void;
  addBlendShapeTarget(blendShape: string, source: string, weight: number): void;

  // ---------- Wiring ----------
  /** Connect `node.attribute` plugs; throws when either side is missing */
  connectAttr(source: string, destination: string, force?: boolean): void;
  /** Route a transfer node's output onto a mesh */
  linkTransferNode(node: string, mesh: string): void;

  // ---------- Scenes ----------
  /** Merge a fragment; names that clash are prefixed with `<label>_` */
  importScene(path: string, label: string): string[];
  exportScene(nodes: string[], path: string): void;
}
