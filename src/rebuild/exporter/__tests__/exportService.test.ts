import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { SceneGraph } from '../../../engine/SceneGraph';
import { ArtifactStore } from '../../../services/artifactStore';
import { NomenclatureMismatch } from '../../errors';
import { IssueLog } from '../../issues';
import type { RigConfig } from '../../config/types';
import { exportData, exportWeights } from '../exportService';
import { normalizeNomenclature } from '../nomenclature';
import { QUAD, jointNode, makeTempDir, meshNode, rigConfig, silenceConsole } from '../../__tests__/fixtures';

function readJson(path: string): Record<string, unknown> {
  return z.record(z.unknown()).parse(JSON.parse(readFileSync(path, 'utf8')));
}

const SKIN_STACK = {
  M_head_rig_mesh: {
    deformers: [
      { name: '{name}_skinCluster', params: { type: 'skinBinding' as const, joints: ['M_head_jnt'] } },
      { name: 'M_brow_cluster' },
    ],
  },
};

describe('Nomenclature normalization', () => {
  let scene: SceneGraph;
  let log: IssueLog;

  beforeEach(() => {
    silenceConsole();
    scene = new SceneGraph({ nodes: [meshNode('M_head_rig_mesh'), jointNode('M_old_jnt')] });
    log = new IssueLog('ExportAdapter');
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should apply renames, skin names and kind suffixes in that order', () => {
    scene.createDeformer({ name: 'skinCluster1', kind: 'skinCluster', geometry: 'M_head_rig_mesh', influences: ['M_old_jnt'] });
    scene.createDeformer({ name: 'M_brow_clstr', kind: 'cluster', geometry: 'M_head_rig_mesh' });
    const config = rigConfig({ deformersStack: SKIN_STACK, renameMap: { M_old_jnt: 'M_head_jnt' } });

    expect(normalizeNomenclature(scene, config, log)).toEqual([
      { from: 'M_old_jnt', to: 'M_head_jnt' },
      { from: 'skinCluster1', to: 'M_head_rig_mesh_skinCluster' },
      { from: 'M_brow_clstr', to: 'M_brow_cluster' },
    ]);
    expect(scene.listInfluences('M_head_rig_mesh_skinCluster')).toEqual(['M_head_jnt']);
  });

  it('should report a rename onto a taken name and skip it', () => {
    scene.createNode(meshNode('M_proxy_geo'));
    scene.createDeformer({ name: 'M_brow_cluster', kind: 'cluster', geometry: 'M_proxy_geo' });
    scene.createDeformer({ name: 'M_brow_clstr', kind: 'cluster', geometry: 'M_head_rig_mesh' });

    const renames = normalizeNomenclature(scene, rigConfig({ deformersStack: SKIN_STACK }), log);

    expect(renames).toEqual([]);
    expect(log.issues.map((i) => [i.severity, i.code, i.entity])).toEqual([['warning', 'ResourceAlreadyExists', 'M_brow_clstr']]);
  });

  it('should flag meshes with more than one skin binding', () => {
    scene.createDeformer({ name: 'a_skinCluster', kind: 'skinCluster', geometry: 'M_head_rig_mesh', influences: ['M_old_jnt'] });
    scene.createDeformer({ name: 'b_skinCluster', kind: 'skinCluster', geometry: 'M_head_rig_mesh', influences: ['M_old_jnt'] });

    normalizeNomenclature(scene, rigConfig({ deformersStack: SKIN_STACK }), log);

    expect(log.errors).toEqual([
      {
        severity: 'error',
        code: 'NomenclatureMismatch',
        entity: 'M_head_rig_mesh',
        message: 'One skin binding is expected on "M_head_rig_mesh"',
        expected: '1 skin binding',
        found: 'a_skinCluster, b_skinCluster',
      },
    ]);
  });
});

describe('ExportAdapter', () => {
  let scene: SceneGraph;
  let config: RigConfig;
  let log: IssueLog;
  let dir: ReturnType<typeof makeTempDir>;

  beforeEach(() => {
    silenceConsole();
    dir = makeTempDir();
    scene = new SceneGraph({
      nodes: [
        meshNode('M_head_rig_mesh'),
        jointNode('M_head_jnt'),
        jointNode('M_jaw_jnt', 'M_head_jnt'),
        {
          name: 'L_brow_ctrl',
          kind: 'curve',
          translate: [1, 0, 0],
          points: QUAD,
          attributes: { stimUuid: { value: 'placeholder-id' }, smile: { value: 0.25 } },
        },
        { name: 'M_jaw_ctrl', kind: 'curve', points: QUAD },
        { name: 'M_head_parentConstraint', kind: 'constraint', attributes: { w0: { value: 1 } } },
        { name: 'M_lips_bcs', kind: 'transfer' },
      ],
    });
    scene.createDeformer({
      name: 'M_head_rig_mesh_skinCluster',
      kind: 'skinCluster',
      geometry: 'M_head_rig_mesh',
      influences: ['M_head_jnt', 'M_jaw_jnt'],
    });
    scene.createDeformer({ name: 'M_brow_cluster', kind: 'cluster', geometry: 'M_head_rig_mesh' });
    scene.setWeights('M_brow_cluster', 'M_head_rig_mesh', { type: 'scalar', values: [0, 0.25, 0.5, 1] });
    config = rigConfig({ deformersStack: SKIN_STACK });
    log = new IssueLog('ExportAdapter');
  });

  afterEach(() => {
    dir.cleanup();
    vi.restoreAllMocks();
  });

  describe('exportData', () => {
    it('should export controllers with user attributes only', () => {
      exportData(scene, config, { directory: dir.path }, log);

      const data = readJson(join(dir.path, 'controllers_data.json'));
      expect(Object.keys(data)).toEqual(['L_brow_ctrl']);
      expect(data).toMatchObject({ L_brow_ctrl: { name: 'L_brow_ctrl', attributes: { smile: 0.25 } } });
      expect(data).not.toHaveProperty(['L_brow_ctrl', 'attributes', 'stimUuid']);
    });

    it('should export transforms and constraints by keyable attributes', () => {
      exportData(scene, config, { directory: dir.path }, log);

      const data = readJson(join(dir.path, 'transforms_data.json'));
      expect(Object.keys(data)).toEqual([
        'M_head_rig_mesh',
        'M_head_jnt',
        'M_jaw_jnt',
        'M_head_parentConstraint',
      ]);
      expect(data).toMatchObject({ M_head_parentConstraint: { attributes: { w0: 1 } } });
    });

    it('should export world-space control points of every controller', () => {
      exportData(scene, config, { exportCtrl: false, exportTransforms: false, directory: dir.path }, log);

      const data = readJson(join(dir.path, 'cvs_data.json'));
      expect(data).toMatchObject({
        L_brow_ctrl: { points: [[1, 0, 0], [2, 0, 0], [2, 1, 0], [1, 1, 0]] },
        M_jaw_ctrl: { points: QUAD },
      });
    });
  });

  describe('exportWeights', () => {
    it('should write a manifest and one map per stack index', () => {
      const result = exportWeights(scene, config, dir.path, {}, log);

      expect(result.meshes).toEqual({ M_head_rig_mesh: 2 });
      expect(readJson(join(dir.path, 'weights', 'M_head_rig_mesh.stack.json'))).toEqual({
        mesh: 'M_head_rig_mesh',
        vertexCount: 4,
        stack: [
          { index: 0, name: 'M_head_rig_mesh_skinCluster', kind: 'skinCluster' },
          { index: 1, name: 'M_brow_cluster', kind: 'cluster' },
        ],
      });
      expect(readJson(join(dir.path, 'weights', 'M_head_rig_mesh.1.weights.json'))).toEqual({
        mesh: 'M_head_rig_mesh',
        index: 1,
        deformer: { name: 'M_brow_cluster', kind: 'cluster' },
        fingerprint: ['skinCluster', 'cluster'],
        vertexCount: 4,
        weights: { type: 'scalar', values: [0, 0.25, 0.5, 1] },
      });
    });

    it('should report a mesh whose weights cannot be read and export the others', () => {
      scene.createNode(meshNode('M_nose_mesh'));
      scene.createDeformer({ name: 'M_nose_cluster', kind: 'cluster', geometry: 'M_nose_mesh' });
      const getWeights = scene.getWeights.bind(scene);
      vi.spyOn(scene, 'getWeights').mockImplementation((deformer, mesh) => {
        if (mesh === 'M_nose_mesh') throw new Error('Weights of M_nose_cluster are unreadable');
        return getWeights(deformer, mesh);
      });
      const withNose = rigConfig({
        deformersStack: { ...SKIN_STACK, M_nose_mesh: { deformers: [{ name: 'M_nose_cluster' }] } },
      });

      const result = exportWeights(scene, withNose, dir.path, { exportTransferNodes: false }, log);

      expect(result.meshes).toEqual({ M_head_rig_mesh: 2 });
      expect(result.failedMeshes).toEqual(['M_nose_mesh']);
      expect(log.errors.map(({ code, entity, message }) => ({ code, entity, message }))).toEqual([
        { code: 'HostFailure', entity: 'M_nose_mesh', message: 'Weights of M_nose_cluster are unreadable' },
      ]);
      expect(existsSync(join(dir.path, 'weights', 'M_nose_mesh.stack.json'))).toBe(false);
      expect(existsSync(join(dir.path, 'weights', 'M_head_rig_mesh.stack.json'))).toBe(true);
    });

    it('should drop an earlier manifest before rewriting the maps it describes', () => {
      exportWeights(scene, config, dir.path, { exportTransferNodes: false }, log);
      const remove = vi.spyOn(ArtifactStore.prototype, 'remove');
      const writeJson = vi.spyOn(ArtifactStore.prototype, 'writeJson');

      exportWeights(scene, config, dir.path, { exportTransferNodes: false }, log);

      expect(remove).toHaveBeenCalledWith('weights/M_head_rig_mesh.stack.json');
      expect(writeJson.mock.calls.map(([file]) => file)).toEqual([
        'weights/M_head_rig_mesh.0.weights.json',
        'weights/M_head_rig_mesh.1.weights.json',
        'weights/M_head_rig_mesh.stack.json',
      ]);
      expect(remove.mock.invocationCallOrder[0]).toBeLessThan(writeJson.mock.invocationCallOrder[0]);
    });

    it('should export transfer nodes into the asset template path', () => {
      const result = exportWeights(scene, config, dir.path, {}, log);

      expect(result.transferTemplate).toBe(join(dir.path, 'face_bcs_nodes.scene'));
      expect(scene.getScene(join(dir.path, 'face_bcs_nodes.scene'))?.nodes.map((n) => n.name)).toEqual(['M_lips_bcs']);
    });

    it('should warn about missing meshes or throw when asked to', () => {
      const withMissing = rigConfig({
        deformersStack: { ...SKIN_STACK, M_nose_mesh: { deformers: [{ name: 'M_nose_cluster' }] } },
      });

      exportWeights(scene, withMissing, dir.path, { exportTransferNodes: false }, log);
      expect(log.warnings.map((i) => [i.code, i.entity])).toEqual([['NomenclatureMismatch', 'M_nose_mesh']]);

      expect(() => exportWeights(scene, withMissing, dir.path, { skipMissing: false }, log)).toThrow(NomenclatureMismatch);
    });
  });
});
