/**
 * Rig Build Service
 * One session over one scene: runs rebuild and export steps against the
 * current configuration, tracks their progress in the build machine and
 * reports everything on an rxjs event stream.
 */

import { createActor } from 'xstate';
import type { Observable } from 'rxjs';
import type { SceneHost } from '../../engine/SceneHost.types';
import { resolveAssetDirectory } from '../../services/artifactStore';
import { RigBuildError } from '../errors';
import { IssueLog, type Issue } from '../issues';
import { RigConfigStore } from '../config/configStore';
import type { RigConfig } from '../config/types';
import { baseMeshesSetup, type HierarchySetupResult } from '../hierarchy/hierarchyComposer';
import { createAllDeformers, type StackBuildResult } from '../deformers/stackBuilder';
import { connectTemplateScenes, type ConnectOptions, type ConnectResult } from '../connections/connectionWirer';
import {
  importData,
  importWeights,
  type ImportDataResult,
  type MeshWeightOutcome,
} from '../importer/importService';
import {
  exportData,
  exportWeights,
  type ExportResult,
  type ExportWeightsResult,
} from '../exporter/exportService';
import {
  importTemplateScenes,
  reorderHierarchy,
  type ImportTemplatesOptions,
  type ImportTemplatesResult,
  type ReorderOptions,
  type ReorderResult,
} from '../templates/templateScenes';
import {
  checkControllersMatch,
  exportControllerList,
  type ControllerCheckResult,
  type ControllerListResult,
} from '../templates/controllerCheck';
import { buildMachine } from './buildMachine';
import { BuildEventEmitter, type RigBuildEvent } from './buildEvents';
import {
  REBUILD_ORDER,
  isRebuildStep,
  type BuildContext,
  type BuildStep,
  type StepReport,
} from './types';

export interface RigBuildServiceOptions {
  host: SceneHost;
  /** Ignored when `store` is given */
  config?: RigConfig;
  store?: RigConfigStore;
  /** Overrides `projectDirectory/asset/subFolders` for every artifact step */
  artifactDirectory?: string;
}

export interface DataTransferOptions {
  directory?: string;
}

export type ImportTemplatesStepOptions = ImportTemplatesOptions & DataTransferOptions;

export interface ImportDataStepOptions extends DataTransferOptions {
  importCtrl?: boolean;
  importTransforms?: boolean;
  importCvs?: boolean;
}

export interface ExportDataStepOptions extends DataTransferOptions {
  exportCtrl?: boolean;
  exportTransforms?: boolean;
  exportCvs?: boolean;
}

export interface ImportWeightsStepOptions extends DataTransferOptions {
  skipMeshes?: string[];
}

export interface ExportWeightsStepOptions extends DataTransferOptions {
  skipMissing?: boolean;
  exportTransferNodes?: boolean;
}

export interface RebuildOptions {
  directory?: string;
  templates?: ImportTemplatesStepOptions;
  connections?: ConnectOptions;
  reorder?: ReorderOptions;
}

export interface RebuildReport {
  hierarchy: StepReport<HierarchySetupResult>;
  templates: StepReport<ImportTemplatesResult>;
  data: StepReport<ImportDataResult>;
  deformers: StepReport<StackBuildResult>;
  connections: StepReport<ConnectResult>;
  reorder: StepReport<ReorderResult>;
  weights: StepReport<{ meshes: Record<string, MeshWeightOutcome> }>;
  issues: Issue[];
}

export interface RigBuildServiceAPI {
  baseMeshesSetup: () => StepReport<HierarchySetupResult>;
  importTemplateScenes: (options?: ImportTemplatesStepOptions) => StepReport<ImportTemplatesResult>;
  importData: (options?: ImportDataStepOptions) => StepReport<ImportDataResult>;
  createAllDeformers: () => StepReport<StackBuildResult>;
  connectTemplateScenes: (options?: ConnectOptions) => StepReport<ConnectResult>;
  reorderHierarchy: (options?: ReorderOptions) => StepReport<ReorderResult>;
  importWeights: (options?: ImportWeightsStepOptions) => StepReport<{ meshes: Record<string, MeshWeightOutcome> }>;
  exportData: (options?: ExportDataStepOptions) => StepReport<ExportResult>;
  exportWeights: (options?: ExportWeightsStepOptions) => StepReport<ExportWeightsResult>;
  exportControllerList: () => StepReport<ControllerListResult>;
  checkControllersMatch: () => StepReport<ControllerCheckResult>;
  /** Every rebuild step in order; meshes whose stack failed get no weights */
  rebuild: (options?: RebuildOptions) => RebuildReport;
  readonly events: Observable<RigBuildEvent>;
  readonly issues: Observable<Issue>;
  readonly configStore: RigConfigStore;
  getState: () => BuildContext;
  isRunning: () => boolean;
  updateConfig: (config: RigConfig) => void;
  reset: () => void;
  dispose: () => void;
}

const STEP_TAGS: Record<BuildStep, string> = {
  baseMeshesSetup: 'HierarchyComposer',
  importTemplateScenes: 'TemplateScenes',
  importData: 'DataImporter',
  createAllDeformers: 'StackBuilder',
  connectTemplateScenes: 'ConnectionWirer',
  reorderHierarchy: 'TemplateScenes',
  importWeights: 'WeightImporter',
  exportData: 'ExportAdapter',
  exportWeights: 'ExportAdapter',
  exportControllerList: 'ControllerCheck',
  checkControllersMatch: 'ControllerCheck',
};

export function createRigBuildService(options: RigBuildServiceOptions): RigBuildServiceAPI {
  const { host, artifactDirectory } = options;
  const store = options.store ?? createStore(options.config);

  const machine = createActor(buildMachine).start();
  const emitter = new BuildEventEmitter();

  machine.send({ type: 'CONFIG_UPDATED', version: store.version });
  const unsubscribeStore = store.subscribe((change) => {
    machine.send({ type: 'CONFIG_UPDATED', version: change.version });
    emitter.emitConfigChanged(change.version, `${change.kind} ${change.key}`);
  });

  const directoryFor = (config: RigConfig, directory?: string): string =>
    directory ?? artifactDirectory ?? resolveAssetDirectory(config.projectInfo);

  function runStep<T extends object>(step: BuildStep, body: (config: RigConfig, log: IssueLog) => T): StepReport<T> {
    const snapshot = machine.getSnapshot();
    if (snapshot.matches('running')) {
      const current = snapshot.context.current ?? 'unknown';
      throw new RigBuildError(`Cannot start ${step} while ${current} is running`, {
        entity: step,
        expected: 'idle',
        found: current,
      });
    }

    if (isRebuildStep(step)) {
      const pending = REBUILD_ORDER.slice(0, REBUILD_ORDER.indexOf(step)).filter(
        (earlier) => snapshot.context.steps[earlier] !== 'completed'
      );
      if (pending.length > 0) {
        console.warn(`[RigBuild] ${step} started before ${pending.join(', ')}`);
        emitter.emitStepOutOfOrder(step, pending);
      }
    }

    const config = store.config;
    const log = new IssueLog(STEP_TAGS[step], (issue) => emitter.emitIssue(step, issue));
    const started = Date.now();

    machine.send({ type: 'STEP_START', step });
    emitter.emitStepStarted(step, store.version);

    let result: T;
    try {
      result = body(config, log);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      machine.send({ type: 'STEP_FAIL', step, issues: log.count(), error: error.message });
      emitter.emitStepFailed(step, error);
      console.error(`[RigBuild] ${step} failed: ${error.message}`);
      throw error;
    }

    const issues = log.issues;
    machine.send({ type: 'STEP_DONE', step, issues: issues.length });
    emitter.emitStepCompleted(step, issues.length, Date.now() - started);
    console.info(`[RigBuild] ${step} done: ${log.errors.length} error(s), ${log.warnings.length} warning(s)`);
    return { ...result, issues };
  }

  const api: RigBuildServiceAPI = {
    baseMeshesSetup() {
      return runStep('baseMeshesSetup', (config, log) => baseMeshesSetup(host, config, log));
    },

    importTemplateScenes(stepOptions = {}) {
      const { directory, ...templateOptions } = stepOptions;
      return runStep('importTemplateScenes', (config, log) =>
        importTemplateScenes(host, config, () => directoryFor(config, directory), templateOptions, log)
      );
    },

    importData(stepOptions = {}) {
      const { importCtrl = true, importTransforms = true, importCvs = true, directory } = stepOptions;
      return runStep('importData', (config, log) =>
        importData(host, { importCtrl, importTransforms, importCvs, directory: directoryFor(config, directory) }, log)
      );
    },

    createAllDeformers() {
      return runStep('createAllDeformers', (config, log) => createAllDeformers(host, config, log));
    },

    connectTemplateScenes(stepOptions = {}) {
      return runStep('connectTemplateScenes', (config, log) => connectTemplateScenes(host, config, stepOptions, log));
    },

    reorderHierarchy(stepOptions = {}) {
      return runStep('reorderHierarchy', (config, log) => reorderHierarchy(host, config, stepOptions, log));
    },

    importWeights(stepOptions = {}) {
      const { skipMeshes = [], directory } = stepOptions;
      return runStep('importWeights', (config, log) => ({
        meshes: importWeights(host, config, directoryFor(config, directory), skipMeshes, log),
      }));
    },

    exportData(stepOptions = {}) {
      const { exportCtrl = true, exportTransforms = true, exportCvs = true, directory } = stepOptions;
      return runStep('exportData', (config, log) =>
        exportData(host, config, { exportCtrl, exportTransforms, exportCvs, directory: directoryFor(config, directory) }, log)
      );
    },

    exportWeights(stepOptions = {}) {
      const { skipMissing = true, exportTransferNodes = true, directory } = stepOptions;
      return runStep('exportWeights', (config, log) =>
        exportWeights(host, config, directoryFor(config, directory), { skipMissing, exportTransferNodes }, log)
      );
    },

    exportControllerList() {
      return runStep('exportControllerList', (config, log) => exportControllerList(host, config, log));
    },

    checkControllersMatch() {
      return runStep('checkControllersMatch', (config, log) => checkControllersMatch(host, config, log));
    },

    rebuild(rebuildOptions = {}) {
      const { directory } = rebuildOptions;
      const hierarchy = api.baseMeshesSetup();
      const templates = api.importTemplateScenes({ directory, ...rebuildOptions.templates });
      const data = api.importData({ directory });
      const deformers = api.createAllDeformers();
      const connections = api.connectTemplateScenes(rebuildOptions.connections);
      const reorder = api.reorderHierarchy(rebuildOptions.reorder);
      const weights = api.importWeights({ directory, skipMeshes: deformers.failedMeshes });
      const reports = [hierarchy, templates, data, deformers, connections, reorder, weights];
      return {
        hierarchy,
        templates,
        data,
        deformers,
        connections,
        reorder,
        weights,
        issues: reports.flatMap((report) => report.issues),
      };
    },

    get events() {
      return emitter.events;
    },

    get issues() {
      return emitter.issues;
    },

    configStore: store,

    getState() {
      return machine.getSnapshot().context;
    },

    isRunning() {
      return machine.getSnapshot().matches('running');
    },

    updateConfig(config: RigConfig) {
      store.replace(config);
    },

    reset() {
      machine.send({ type: 'RESET' });
    },

    dispose() {
      unsubscribeStore();
      machine.stop();
      emitter.complete();
    },
  };

  return api;
}

function createStore(config: RigConfig | undefined): RigConfigStore {
  if (!config) {
    throw new RigBuildError('A build session needs a config or a config store', {
      entity: 'config',
      expected: 'RigConfig',
      found: 'nothing',
    });
  }
  return new RigConfigStore(config);
}
