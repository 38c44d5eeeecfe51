import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'node:path';
import { SceneGraph } from '../../../engine/SceneGraph';
import { ConfigurationError, RigBuildError } from '../../errors';
import type { Issue } from '../../issues';
import type { RigConfig } from '../../config/types';
import { createRigBuildService, type RigBuildServiceAPI } from '../buildService';
import type { RigBuildEvent } from '../buildEvents';
import { REBUILD_ORDER } from '../types';
import { QUAD, jointNode, makeTempDir, meshNode, rigConfig, silenceConsole } from '../../__tests__/fixtures';

function headScene() {
  return new SceneGraph({ nodes: [meshNode('M_head_geo'), jointNode('M_head_jnt')] });
}

describe('RigBuildService', () => {
  let config: RigConfig;
  let service: RigBuildServiceAPI;
  let events: RigBuildEvent[];
  let consoleSpies: ReturnType<typeof silenceConsole>;

  beforeEach(() => {
    consoleSpies = silenceConsole();
    config = rigConfig({
      modelingHierarchy: { head: { referenceGeometry: 'M_head_geo', targetGroups: ['geometry', 'rig'] } },
      deformersStack: {
        M_head_rig_mesh: {
          deformers: [{ name: '{name}_skinCluster', params: { type: 'skinBinding', joints: ['M_head_jnt'] } }],
        },
      },
    });
    service = createRigBuildService({ host: headScene(), config });
    events = [];
    service.events.subscribe((event) => events.push(event));
  });

  afterEach(() => {
    service.dispose();
    vi.restoreAllMocks();
  });

  it('should need a config or a config store', () => {
    expect(() => createRigBuildService({ host: headScene() })).toThrow(RigBuildError);
  });

  it('should report a step start and completion on the event stream', () => {
    const report = service.baseMeshesSetup();

    expect(report.issues).toEqual([]);
    expect(events.map((e) => e.type)).toEqual(['STEP_STARTED', 'STEP_COMPLETED']);
    expect(events[0]).toMatchObject({ step: 'baseMeshesSetup', configVersion: 0 });
    expect(events[1]).toMatchObject({ step: 'baseMeshesSetup', issues: 0 });
    expect(service.getState().steps.baseMeshesSetup).toBe('completed');
  });

  it('should stream issues as steps report them', () => {
    const issues: Issue[] = [];
    service.issues.subscribe((issue) => issues.push(issue));
    const emptyService = createRigBuildService({ host: new SceneGraph(), config });
    const emptyIssues: Issue[] = [];
    emptyService.issues.subscribe((issue) => emptyIssues.push(issue));

    const report = emptyService.baseMeshesSetup();

    expect(emptyIssues).toEqual(report.issues);
    expect(emptyIssues.map((i) => [i.code, i.entity])).toEqual([['NomenclatureMismatch', 'M_head_geo']]);
    expect(issues).toEqual([]);
    emptyService.dispose();
  });

  it('should warn and proceed when a rebuild step runs out of order', () => {
    const report = service.createAllDeformers();

    expect(events.map((e) => e.type)).toEqual(['STEP_OUT_OF_ORDER', 'STEP_STARTED', 'ISSUE_REPORTED', 'STEP_COMPLETED']);
    expect(events[0]).toMatchObject({
      step: 'createAllDeformers',
      pending: ['baseMeshesSetup', 'importTemplateScenes', 'importData'],
    });
    expect(consoleSpies.warn).toHaveBeenCalledWith(
      '[RigBuild] createAllDeformers started before baseMeshesSetup, importTemplateScenes, importData'
    );
    expect(report.failedMeshes).toEqual(['M_head_rig_mesh']);
  });

  it('should record a failed step and rethrow its error', () => {
    expect(() => service.importData()).toThrow(ConfigurationError);

    expect(service.isRunning()).toBe(false);
    expect(service.getState().steps.importData).toBe('failed');
    expect(events.map((e) => e.type)).toContain('STEP_FAILED');
    expect(service.getState().history).toEqual([
      {
        step: 'importData',
        status: 'failed',
        configVersion: 0,
        issues: 0,
        error: 'Asset directory /nonexistent/project/face does not exist, check the asset name',
      },
    ]);
  });

  it('should refuse a step started while another one runs', () => {
    let nested: unknown;
    const subscription = service.events.subscribe((event) => {
      if (event.type !== 'STEP_STARTED' || event.step !== 'baseMeshesSetup') return;
      try {
        service.createAllDeformers();
      } catch (err) {
        nested = err;
      }
    });

    service.baseMeshesSetup();
    subscription.unsubscribe();

    expect(nested).toBeInstanceOf(RigBuildError);
    expect(nested instanceof Error && nested.message).toBe('Cannot start createAllDeformers while baseMeshesSetup is running');
    expect(service.getState().steps.createAllDeformers).toBe('pending');
  });

  it('should follow configuration edits', () => {
    service.configStore.setTransferConnection('M_lips_bcs', 'M_head_rig_mesh');
    service.updateConfig(config);

    expect(events.map((e) => (e.type === 'CONFIG_CHANGED' ? [e.version, e.change] : e.type))).toEqual([
      [1, 'setTransferConnection M_lips_bcs'],
      [2, 'replace face'],
    ]);
    expect(service.getState().configVersion).toBe(2);

    service.baseMeshesSetup();
    expect(service.getState().history[0].configVersion).toBe(2);
  });

  it('should clear step progress on reset', () => {
    service.baseMeshesSetup();
    service.reset();

    expect(service.getState().steps.baseMeshesSetup).toBe('pending');
    expect(service.getState().history).toEqual([]);
  });

  it('should complete the event stream on dispose', () => {
    const complete = vi.fn();
    service.events.subscribe({ complete });

    service.dispose();
    service.configStore.setTransferConnection('M_lips_bcs', 'M_head_rig_mesh');

    expect(complete).toHaveBeenCalledTimes(1);
    expect(events).toEqual([]);
  });

  describe('rebuild', () => {
    let dir: ReturnType<typeof makeTempDir>;

    beforeEach(() => {
      dir = makeTempDir();
    });

    afterEach(() => {
      dir.cleanup();
    });

    it('should import templates without an asset folder when nothing reads from it', () => {
      const report = service.importTemplateScenes({ templates: [] });

      expect(report.issues).toEqual([]);
      expect(service.getState().steps.importTemplateScenes).toBe('completed');
    });

    it('should look for transfer nodes in the directory it is given', () => {
      const target = headScene();
      target.registerScene(join(dir.path, 'face_bcs_nodes.scene'), { nodes: [{ name: 'M_lips_bcs', kind: 'transfer' }] });
      const rebuilder = createRigBuildService({ host: target, config });

      const report = rebuilder.importTemplateScenes({ directory: dir.path, templates: ['bcs'] });

      expect(report.issues).toEqual([]);
      expect(report.imported).toEqual({ bcs: ['M_lips_bcs'] });
      expect(target.getAttribute('M_lips_bcs', 'freezeInput')).toBe(1);
      rebuilder.dispose();
    });

    it('should check rebuilt controllers against the exported list', () => {
      const withControllers = rigConfig({ templateScenes: { controller: join(dir.path, 'controller.scene') } });
      const source = new SceneGraph({ nodes: [{ name: 'M_jaw_ctrl', kind: 'curve', points: QUAD }] });
      const exporter = createRigBuildService({ host: source, config: withControllers });
      expect(exporter.exportControllerList().controllers).toEqual(['M_jaw_ctrl']);
      exporter.dispose();

      const checker = createRigBuildService({ host: headScene(), config: withControllers });
      const report = checker.checkControllersMatch();

      expect(report.missing).toEqual(['M_jaw_ctrl']);
      expect(report.issues.map((i) => [i.severity, i.code, i.entity])).toEqual([['warning', 'NomenclatureMismatch', 'M_jaw_ctrl']]);
      expect(checker.getState().steps.checkControllersMatch).toBe('completed');
      checker.dispose();
    });

    it('should rebuild an exported rig step by step', () => {
      const source = headScene();
      const exporter = createRigBuildService({ host: source, config, artifactDirectory: dir.path });
      exporter.baseMeshesSetup();
      exporter.createAllDeformers();
      source.setAttribute('M_head_jnt', 'translateY', 2);
      exporter.exportData();
      exporter.exportWeights({ exportTransferNodes: false });
      exporter.dispose();

      const target = headScene();
      const rebuilder = createRigBuildService({ host: target, config });
      const report = rebuilder.rebuild({ directory: dir.path, templates: { templates: [] } });

      expect(report.issues).toEqual([]);
      expect(report.weights.meshes).toEqual({ M_head_rig_mesh: { status: 'applied', applied: [0], failed: [] } });
      expect(target.listDeformers('M_head_rig_mesh')).toEqual([{ name: 'M_head_rig_mesh_skinCluster', kind: 'skinCluster' }]);
      expect(target.getAttribute('M_head_jnt', 'translateY')).toBe(2);
      expect(rebuilder.getState().history.map((r) => r.step)).toEqual([...REBUILD_ORDER]);
      rebuilder.dispose();
    });
  });
});
