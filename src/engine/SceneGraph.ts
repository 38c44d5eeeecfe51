import * as THREE from 'three';
import type {
  AttributeValue,
  DeformerHandle,
  DeformerKind,
  DeformerSpec,
  DuplicateOptions,
  NodeKind,
  NodeSpec,
  SceneFragment,
  SceneHost,
  Vec3,
  WeightPayload,
} from './SceneHost.types';

/**
 * SceneGraph - in-memory SceneHost backed by three.js
 *
 * Transforms live in a THREE.Scene (groups, meshes with vertex buffers, bones,
 * curve controllers as lines). Deformers are not scene objects: they sit in a
 * registry and each mesh keeps its chain in application order.
 *
 * Nodes are tracked by uuid so renames never invalidate deformer membership.
 */

type UserAttribute = {
  value: AttributeValue;
  keyable: boolean;
  locked: boolean;
};

type NodeMeta = {
  kind: NodeKind;
  attributes: Map<string, UserAttribute>;
  lockedChannels: Set<string>;
  transferTarget: string | null;
};

type DeformerRecord = {
  name: string;
  kind: DeformerKind;
  driver: string | null;
  /** Influence joint uuids, skin bindings only */
  influences: string[];
  attributes: Map<string, AttributeValue>;
  /** Member mesh uuid -> weights */
  weights: Map<string, WeightPayload>;
};

type Connection = { source: string; destination: string };

const CHANNELS: Record<string, { prop: 'position' | 'rotation' | 'scale'; axis: 'x' | 'y' | 'z' }> = {
  translateX: { prop: 'position', axis: 'x' },
  translateY: { prop: 'position', axis: 'y' },
  translateZ: { prop: 'position', axis: 'z' },
  rotateX: { prop: 'rotation', axis: 'x' },
  rotateY: { prop: 'rotation', axis: 'y' },
  rotateZ: { prop: 'rotation', axis: 'z' },
  scaleX: { prop: 'scale', axis: 'x' },
  scaleY: { prop: 'scale', axis: 'y' },
  scaleZ: { prop: 'scale', axis: 'z' },
};
const TRANSFORM_ATTRIBUTES = [...Object.keys(CHANNELS), 'visibility'];

const globToRegExp = (pattern: string) =>
  new RegExp(
    '^' + pattern.split('*').map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&')).join('.*') + '$'
  );

const splitPlug = (plug: string): [string, string] => {
  const dot = plug.indexOf('.');
  if (dot <= 0) throw new Error(`Malformed plug "${plug}", expected node.attribute`);
  return [plug.slice(0, dot), plug.slice(dot + 1)];
};

function geometryOf(obj: THREE.Object3D): THREE.BufferGeometry | null {
  if (obj instanceof THREE.Mesh || obj instanceof THREE.Line) {
    const geometry: THREE.BufferGeometry = obj.geometry;
    return geometry;
  }
  return null;
}

function pointsGeometry(points: Vec3[]): THREE.BufferGeometry {
  const geometry = new THREE.BufferGeometry();
  geometry.setAttribute('position', new THREE.Float32BufferAttribute(points.flat(), 3));
  return geometry;
}

function copyWeights(weights: WeightPayload): WeightPayload {
  if (weights.type === 'scalar') return { type: 'scalar', values: [...weights.values] };
  return {
    type: 'skin',
    influences: weights.influences.map((inf) => ({ joint: inf.joint, values: [...inf.values] })),
  };
}

export class SceneGraph implements SceneHost {
  readonly scene = new THREE.Scene();

  private meta = new Map<string, NodeMeta>();
  private deformers = new Map<string, DeformerRecord>();
  /** Mesh uuid -> deformer chain, application order */
  private chains = new Map<string, DeformerRecord[]>();
  private links: Connection[] = [];
  private library = new Map<string, SceneFragment>();

  constructor(fragment?: SceneFragment) {
    if (fragment) this.loadFragment(fragment);
  }

  // ============================================================================
  // Lookup helpers
  // ============================================================================

  private find(name: string): THREE.Object3D | null {
    if (!name) return null;
    const obj = this.scene.getObjectByName(name);
    return obj && obj !== this.scene ? obj : null;
  }

  private require(name: string): THREE.Object3D {
    const obj = this.find(name);
    if (!obj) throw new Error(`Node "${name}" does not exist`);
    return obj;
  }

  private metaOf(obj: THREE.Object3D): NodeMeta {
    const meta = this.meta.get(obj.uuid);
    if (!meta) throw new Error(`Node "${obj.name}" is not tracked by this scene`);
    return meta;
  }

  private requireMesh(name: string): THREE.Object3D {
    const obj = this.require(name);
    if (this.metaOf(obj).kind !== 'mesh') throw new Error(`Node "${name}" is not a mesh`);
    return obj;
  }

  private requireDeformer(name: string): DeformerRecord {
    const record = this.deformers.get(name);
    if (!record) throw new Error(`Deformer "${name}" does not exist`);
    return record;
  }

  private nameOfUuid(uuid: string): string {
    return this.scene.getObjectByProperty('uuid', uuid)?.name ?? '';
  }

  private defaultWeights(record: DeformerRecord, meshUuid: string): WeightPayload {
    const obj = this.scene.getObjectByProperty('uuid', meshUuid);
    const count = obj ? (geometryOf(obj)?.getAttribute('position')?.count ?? 0) : 0;
    if (record.kind !== 'skinCluster') {
      return { type: 'scalar', values: new Array<number>(count).fill(1) };
    }
    return {
      type: 'skin',
      influences: record.influences.map((uuid, i) => ({
        joint: this.nameOfUuid(uuid),
        values: new Array<number>(count).fill(i === 0 ? 1 : 0),
      })),
    };
  }

  // ============================================================================
  // Nodes
  // ============================================================================

  exists(name: string): boolean {
    return this.find(name) !== null || this.deformers.has(name);
  }

  nodeKind(name: string): NodeKind | null {
    const obj = this.find(name);
    return obj ? this.metaOf(obj).kind : null;
  }

  ls(pattern: string, kinds?: NodeKind | NodeKind[]): string[] {
    const regex = globToRegExp(pattern);
    const allowed = kinds === undefined ? null : new Set(Array.isArray(kinds) ? kinds : [kinds]);
    const names: string[] = [];
    this.scene.traverse((obj) => {
      if (obj === this.scene || !regex.test(obj.name)) return;
      if (allowed && !allowed.has(this.metaOf(obj).kind)) return;
      names.push(obj.name);
    });
    return names;
  }

  listChildren(name: string): string[] {
    return this.require(name).children.map((child) => child.name);
  }

  listDescendants(name: string): string[] {
    const root = this.require(name);
    const names: string[] = [];
    root.traverse((obj) => {
      if (obj !== root) names.push(obj.name);
    });
    return names;
  }

  parentOf(name: string): string | null {
    const parent = this.require(name).parent;
    return parent && parent !== this.scene ? parent.name : null;
  }

  createNode(spec: NodeSpec): string {
    if (this.exists(spec.name)) throw new Error(`Node "${spec.name}" already exists`);
    const parent = spec.parent ? this.require(spec.parent) : this.scene;

    let obj: THREE.Object3D;
    switch (spec.kind) {
      case 'mesh':
        obj = new THREE.Mesh(pointsGeometry(spec.points ?? []));
        break;
      case 'curve':
        obj = new THREE.Line(pointsGeometry(spec.points ?? []));
        break;
      case 'joint':
        obj = new THREE.Bone();
        break;
      case 'group':
        obj = new THREE.Group();
        break;
      default:
        obj = new THREE.Object3D();
    }
    obj.name = spec.name;
    if (spec.translate) obj.position.set(...spec.translate);
    if (spec.rotate) {
      const [x, y, z] = spec.rotate.map((d) => THREE.MathUtils.degToRad(d));
      obj.rotation.set(x, y, z);
    }
    if (spec.scale) obj.scale.set(...spec.scale);

    const attributes = new Map<string, UserAttribute>();
    if (spec.kind === 'transfer') {
      attributes.set('freezeInput', { value: 0, keyable: false, locked: false });
    }
    for (const [attr, def] of Object.entries(spec.attributes ?? {})) {
      attributes.set(attr, { value: def.value, keyable: def.keyable ?? true, locked: def.locked ?? false });
    }
    this.meta.set(obj.uuid, {
      kind: spec.kind,
      attributes,
      lockedChannels: new Set(),
      transferTarget: null,
    });
    parent.add(obj);
    return obj.name;
  }

  parent(name: string, parentName: string | null): void {
    const obj = this.require(name);
    const target = parentName === null ? this.scene : this.require(parentName);
    let cursor: THREE.Object3D | null = target;
    while (cursor) {
      if (cursor === obj) throw new Error(`Cannot parent "${name}" under its own descendant "${parentName}"`);
      cursor = cursor.parent;
    }
    target.attach(obj);
  }

  rename(name: string, newName: string): string {
    if (name === newName) return newName;
    if (this.exists(newName)) throw new Error(`Cannot rename "${name}": "${newName}" already exists`);
    const record = this.deformers.get(name);
    if (record) {
      this.deformers.delete(name);
      record.name = newName;
      this.deformers.set(newName, record);
      return newName;
    }
    this.require(name).name = newName;
    return newName;
  }

  duplicate(name: string, options: DuplicateOptions): string[] {
    const source = this.require(name);
    const sources: THREE.Object3D[] = [];
    source.traverse((obj) => sources.push(obj));

    const names = sources.map((obj) => options.rename(obj.name));
    const taken = names.filter((n, i) => this.exists(n) || names.indexOf(n) !== i);
    if (taken.length > 0) {
      throw new Error(`Cannot duplicate "${name}": ${taken.join(', ')} already exist`);
    }
    const parent = options.parent ? this.require(options.parent) : source.parent ?? this.scene;

    const copy = source.clone(true);
    const copies: THREE.Object3D[] = [];
    copy.traverse((obj) => copies.push(obj));
    copies.forEach((obj, i) => {
      const original = sources[i];
      const sourceGeometry = geometryOf(original);
      if (sourceGeometry && (obj instanceof THREE.Mesh || obj instanceof THREE.Line)) {
        obj.geometry = sourceGeometry.clone();
      }
      const meta = this.metaOf(original);
      this.meta.set(obj.uuid, {
        kind: meta.kind,
        attributes: new Map(
          Array.from(meta.attributes, ([attr, def]): [string, UserAttribute] => [attr, { ...def }])
        ),
        lockedChannels: new Set(meta.lockedChannels),
        transferTarget: null,
      });
      obj.name = names[i];
    });
    // the copy starts where the source sits, then keeps its world transform under the new parent
    (source.parent ?? this.scene).add(copy);
    if (parent !== copy.parent) parent.attach(copy);
    return names;
  }

  deleteNode(name: string): void {
    const record = this.deformers.get(name);
    if (record) {
      this.deformers.delete(name);
      for (const [mesh, chain] of this.chains) {
        this.chains.set(mesh, chain.filter((r) => r !== record));
      }
      return;
    }
    const obj = this.require(name);
    obj.traverse((child) => {
      this.meta.delete(child.uuid);
      this.chains.get(child.uuid)?.forEach((r) => r.weights.delete(child.uuid));
      this.chains.delete(child.uuid);
    });
    obj.removeFromParent();
  }

  // ============================================================================
  // Attributes
  // ============================================================================

  listAttributes(name: string, filter: 'userDefined' | 'keyable'): string[] {
    const meta = this.metaOf(this.require(name));
    const user = Array.from(meta.attributes.entries());
    if (filter === 'userDefined') return user.map(([attr]) => attr);
    const channels = meta.kind === 'constraint' ? [] : TRANSFORM_ATTRIBUTES;
    return [...channels, ...user.filter(([, def]) => def.keyable).map(([attr]) => attr)];
  }

  hasAttribute(name: string, attribute: string): boolean {
    const record = this.deformers.get(name);
    if (record) return record.attributes.has(attribute);
    const obj = this.find(name);
    if (!obj) return false;
    const meta = this.metaOf(obj);
    if (meta.attributes.has(attribute)) return true;
    return meta.kind !== 'constraint' && TRANSFORM_ATTRIBUTES.includes(attribute);
  }

  getAttribute(name: string, attribute: string): AttributeValue {
    const record = this.deformers.get(name);
    if (record) {
      const value = record.attributes.get(attribute);
      if (value === undefined) throw new Error(`Attribute "${name}.${attribute}" does not exist`);
      return value;
    }
    const obj = this.require(name);
    const user = this.metaOf(obj).attributes.get(attribute);
    if (user) return Array.isArray(user.value) ? [...user.value] : user.value;
    if (!this.hasAttribute(name, attribute)) {
      throw new Error(`Attribute "${name}.${attribute}" does not exist`);
    }
    if (attribute === 'visibility') return obj.visible;
    const channel = CHANNELS[attribute];
    const raw = obj[channel.prop][channel.axis];
    return channel.prop === 'rotation' ? THREE.MathUtils.radToDeg(raw) : raw;
  }

  setAttribute(name: string, attribute: string, value: AttributeValue): void {
    const record = this.deformers.get(name);
    if (record) {
      record.attributes.set(attribute, value);
      return;
    }
    const obj = this.require(name);
    const meta = this.metaOf(obj);
    if (this.isLocked(name, attribute)) throw new Error(`Attribute "${name}.${attribute}" is locked`);
    const user = meta.attributes.get(attribute);
    if (user) {
      user.value = Array.isArray(value) ? [...value] : value;
      return;
    }
    if (!this.hasAttribute(name, attribute)) {
      throw new Error(`Attribute "${name}.${attribute}" does not exist`);
    }
    if (attribute === 'visibility') {
      obj.visible = Boolean(value);
      return;
    }
    if (typeof value !== 'number') {
      throw new Error(`Attribute "${name}.${attribute}" expects a number, got ${JSON.stringify(value)}`);
    }
    const channel = CHANNELS[attribute];
    obj[channel.prop][channel.axis] = channel.prop === 'rotation' ? THREE.MathUtils.degToRad(value) : value;
  }

  isLocked(name: string, attribute: string): boolean {
    const obj = this.find(name);
    if (!obj) return false;
    const meta = this.metaOf(obj);
    return meta.attributes.get(attribute)?.locked ?? meta.lockedChannels.has(attribute);
  }

  setLocked(name: string, attribute: string, locked: boolean): void {
    const meta = this.metaOf(this.require(name));
    const user = meta.attributes.get(attribute);
    if (user) {
      user.locked = locked;
    } else if (locked) {
      meta.lockedChannels.add(attribute);
    } else {
      meta.lockedChannels.delete(attribute);
    }
  }

  // ============================================================================
  // Control points
  // ============================================================================

  getControlPoints(name: string): Vec3[] {
    const obj = this.require(name);
    if (this.metaOf(obj).kind !== 'curve') return [];
    const position = geometryOf(obj)?.getAttribute('position');
    if (!position) return [];
    obj.updateWorldMatrix(true, false);
    const points: Vec3[] = [];
    const v = new THREE.Vector3();
    for (let i = 0; i < position.count; i++) {
      v.fromBufferAttribute(position, i).applyMatrix4(obj.matrixWorld);
      points.push([v.x, v.y, v.z]);
    }
    return points;
  }

  setControlPoints(name: string, points: Vec3[]): void {
    const obj = this.require(name);
    const position = geometryOf(obj)?.getAttribute('position');
    if (!position || this.metaOf(obj).kind !== 'curve') {
      throw new Error(`Node "${name}" has no control points`);
    }
    if (position.count !== points.length) {
      throw new Error(`Node "${name}" has ${position.count} control points, got ${points.length}`);
    }
    obj.updateWorldMatrix(true, false);
    const inverse = obj.matrixWorld.clone().invert();
    const v = new THREE.Vector3();
    points.forEach((p, i) => {
      v.set(...p).applyMatrix4(inverse);
      position.setXYZ(i, v.x, v.y, v.z);
    });
    position.needsUpdate = true;
  }

  vertexCount(mesh: string): number {
    const obj = this.requireMesh(mesh);
    return geometryOf(obj)?.getAttribute('position')?.count ?? 0;
  }

  // ============================================================================
  // Deformers
  // ============================================================================

  listDeformers(mesh: string): DeformerHandle[] {
    const obj = this.requireMesh(mesh);
    return (this.chains.get(obj.uuid) ?? []).map((r) => ({ name: r.name, kind: r.kind }));
  }

  deformerKind(name: string): DeformerKind | null {
    return this.deformers.get(name)?.kind ?? null;
  }

  createDeformer(spec: DeformerSpec): DeformerHandle {
    if (this.exists(spec.name)) throw new Error(`Node "${spec.name}" already exists`);
    const mesh = this.requireMesh(spec.geometry);
    if (spec.driver !== undefined) this.require(spec.driver);

    const influences = (spec.influences ?? []).map((joint) => {
      const obj = this.require(joint);
      if (this.metaOf(obj).kind !== 'joint') throw new Error(`Influence "${joint}" is not a joint`);
      return obj.uuid;
    });
    if (spec.kind === 'skinCluster' && influences.length === 0) {
      throw new Error(`Skin binding "${spec.name}" needs at least one influence`);
    }

    const record: DeformerRecord = {
      name: spec.name,
      kind: spec.kind,
      driver: spec.driver ?? null,
      influences,
      attributes: new Map<string, AttributeValue>([['envelope', 1], ...Object.entries(spec.attributes ?? {})]),
      weights: new Map(),
    };
    this.deformers.set(spec.name, record);
    this.attachRecord(record, mesh.uuid);
    return { name: record.name, kind: record.kind };
  }

  private attachRecord(record: DeformerRecord, meshUuid: string) {
    if (record.weights.has(meshUuid)) return;
    record.weights.set(meshUuid, this.defaultWeights(record, meshUuid));
    const chain = this.chains.get(meshUuid) ?? [];
    chain.push(record);
    this.chains.set(meshUuid, chain);
  }

  attachDeformer(deformer: string, mesh: string): void {
    this.attachRecord(this.requireDeformer(deformer), this.requireMesh(mesh).uuid);
  }

  reorderDeformers(mesh: string, order: string[]): void {
    const obj = this.requireMesh(mesh);
    const chain = this.chains.get(obj.uuid) ?? [];
    const records = order.map((name) => {
      const record = chain.find((r) => r.name === name);
      if (!record) throw new Error(`Mesh "${mesh}" is not deformed by "${name}"`);
      return record;
    });
    const slots = chain
      .map((record, index) => (records.includes(record) ? index : -1))
      .filter((index) => index >= 0);
    slots.forEach((slot, i) => {
      chain[slot] = records[i];
    });
  }

  addInfluences(skin: string, joints: string[]): void {
    const record = this.requireDeformer(skin);
    if (record.kind !== 'skinCluster') throw new Error(`Deformer "${skin}" is not a skin binding`);
    for (const joint of joints) {
      const obj = this.require(joint);
      if (this.metaOf(obj).kind !== 'joint') throw new Error(`Influence "${joint}" is not a joint`);
      if (record.influences.includes(obj.uuid)) continue;
      record.influences.push(obj.uuid);
      for (const weights of record.weights.values()) {
        if (weights.type !== 'skin') continue;
        const count = weights.influences[0]?.values.length ?? 0;
        weights.influences.push({ joint, values: new Array<number>(count).fill(0) });
      }
    }
  }

  listInfluences(skin: string): string[] {
    return this.requireDeformer(skin).influences.map((uuid) => this.nameOfUuid(uuid));
  }

  getWeights(deformer: string, mesh: string): WeightPayload {
    const record = this.requireDeformer(deformer);
    const obj = this.requireMesh(mesh);
    const weights = record.weights.get(obj.uuid);
    if (!weights) throw new Error(`Mesh "${mesh}" is not deformed by "${deformer}"`);
    if (weights.type === 'skin') {
      // joint names are resolved on read so renamed joints stay current
      return {
        type: 'skin',
        influences: weights.influences.map((inf, i) => ({
          joint: this.nameOfUuid(record.influences[i]) || inf.joint,
          values: [...inf.values],
        })),
      };
    }
    return copyWeights(weights);
  }

  setWeights(deformer: string, mesh: string, weights: WeightPayload): void {
    const record = this.requireDeformer(deformer);
    const obj = this.requireMesh(mesh);
    if (!record.weights.has(obj.uuid)) throw new Error(`Mesh "${mesh}" is not deformed by "${deformer}"`);
    const count = this.vertexCount(mesh);

    if (weights.type === 'scalar') {
      if (record.kind === 'skinCluster') throw new Error(`Skin binding "${deformer}" needs skin weights`);
      if (weights.values.length !== count) {
        throw new Error(`"${deformer}" on "${mesh}" expects ${count} weights, got ${weights.values.length}`);
      }
      record.weights.set(obj.uuid, copyWeights(weights));
      return;
    }

    if (record.kind !== 'skinCluster') throw new Error(`Deformer "${deformer}" is not a skin binding`);
    const names = this.listInfluences(deformer);
    for (const inf of weights.influences) {
      if (!names.includes(inf.joint)) throw new Error(`"${inf.joint}" is not an influence of "${deformer}"`);
      if (inf.values.length !== count) {
        throw new Error(`"${deformer}" on "${mesh}" expects ${count} weights for "${inf.joint}", got ${inf.values.length}`);
      }
    }
    record.weights.set(obj.uuid, {
      type: 'skin',
      influences: names.map((joint) => ({
        joint,
        values: [...(weights.influences.find((inf) => inf.joint === joint)?.values ?? new Array<number>(count).fill(0))],
      })),
    });
  }

  addBlendShapeTarget(blendShape: string, source: string, weight: number): void {
    const record = this.requireDeformer(blendShape);
    if (record.kind !== 'blendShape') throw new Error(`Deformer "${blendShape}" is not a blend shape`);
    this.requireMesh(source);
    record.attributes.set(source, weight);
  }

  // ============================================================================
  // Wiring
  // ============================================================================

  connectAttr(source: string, destination: string, force = false): void {
    for (const plug of [source, destination]) {
      const [node, attribute] = splitPlug(plug);
      if (!this.hasAttribute(node, attribute)) throw new Error(`Plug "${plug}" does not exist`);
    }
    const existing = this.links.findIndex((c) => c.destination === destination);
    if (existing >= 0) {
      if (!force) throw new Error(`Plug "${destination}" is already connected`);
      this.links.splice(existing, 1);
    }
    this.links.push({ source, destination });
  }

  /** Incoming connection of a plug, if any */
  sourceOf(destination: string): string | null {
    return this.links.find((c) => c.destination === destination)?.source ?? null;
  }

  listConnections(): Connection[] {
    return this.links.map((c) => ({ ...c }));
  }

  linkTransferNode(node: string, mesh: string): void {
    const obj = this.require(node);
    const meta = this.metaOf(obj);
    if (meta.kind !== 'transfer') throw new Error(`Node "${node}" is not a transfer node`);
    meta.transferTarget = this.requireMesh(mesh).uuid;
  }

  /** Mesh a transfer node currently routes to */
  transferTarget(node: string): string | null {
    const target = this.metaOf(this.require(node)).transferTarget;
    return target ? this.nameOfUuid(target) || null : null;
  }

  // ============================================================================
  // Scenes
  // ============================================================================

  /** Make a fragment available to importScene under a path */
  registerScene(path: string, fragment: SceneFragment) {
    this.library.set(path, fragment);
  }

  getScene(path: string): SceneFragment | null {
    return this.library.get(path) ?? null;
  }

  importScene(path: string, label: string): string[] {
    const fragment = this.library.get(path);
    if (!fragment) throw new Error(`Scene "${path}" was not found`);
    return this.loadFragment(fragment, label);
  }

  /** Merge a fragment into the scene; clashing names get `<label>_` prepended */
  loadFragment(fragment: SceneFragment, label = ''): string[] {
    const mapping = new Map<string, string>();
    const claim = (name: string) => {
      let resolved = name;
      if (this.exists(resolved) || Array.from(mapping.values()).includes(resolved)) {
        if (!label) throw new Error(`Node "${name}" already exists`);
        resolved = `${label}_${name}`;
      }
      if (this.exists(resolved)) throw new Error(`Node "${resolved}" already exists`);
      mapping.set(name, resolved);
      return resolved;
    };

    for (const node of fragment.nodes) claim(node.name);
    const created: string[] = [];
    for (const node of fragment.nodes) {
      const parent = node.parent === undefined ? undefined : mapping.get(node.parent) ?? node.parent;
      created.push(this.createNode({ ...node, name: mapping.get(node.name) ?? node.name, parent }));
    }

    for (const deformer of fragment.deformers ?? []) {
      const name = this.exists(deformer.name) && label ? `${label}_${deformer.name}` : deformer.name;
      const remap = (n: string) => mapping.get(n) ?? n;
      this.createDeformer({
        ...deformer,
        name,
        geometry: remap(deformer.geometry),
        driver: deformer.driver === undefined ? undefined : remap(deformer.driver),
        influences: deformer.influences?.map(remap),
      });
      for (const member of deformer.members ?? []) this.attachDeformer(name, remap(member));
    }
    return created;
  }

  exportScene(nodes: string[], path: string): void {
    const exported = new Set<string>();
    const specs: NodeSpec[] = [];
    for (const root of nodes) {
      for (const name of [root, ...this.listDescendants(root)]) {
        if (exported.has(name)) continue;
        exported.add(name);
        specs.push(this.toSpec(name, exported));
      }
    }
    this.library.set(path, { nodes: specs });
  }

  private toSpec(name: string, exported: Set<string>): NodeSpec {
    const obj = this.require(name);
    const meta = this.metaOf(obj);
    const parent = this.parentOf(name);
    const position = meta.kind === 'mesh' || meta.kind === 'curve' ? geometryOf(obj)?.getAttribute('position') : undefined;
    const points: Vec3[] = [];
    for (let i = 0; position && i < position.count; i++) {
      points.push([position.getX(i), position.getY(i), position.getZ(i)]);
    }
    return {
      name,
      kind: meta.kind,
      parent: parent !== null && exported.has(parent) ? parent : undefined,
      translate: [obj.position.x, obj.position.y, obj.position.z],
      rotate: [
        THREE.MathUtils.radToDeg(obj.rotation.x),
        THREE.MathUtils.radToDeg(obj.rotation.y),
        THREE.MathUtils.radToDeg(obj.rotation.z),
      ],
      scale: [obj.scale.x, obj.scale.y, obj.scale.z],
      points: position ? points : undefined,
      attributes: Object.fromEntries(
        Array.from(meta.attributes, ([attr, def]) => [attr, { value: def.value, keyable: def.keyable, locked: def.locked }])
      ),
    };
  }
}
