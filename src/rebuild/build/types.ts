/**
 * Build Session Types
 *
 * Step names, machine context and events for a rebuild session.
 */

import type { Issue } from '../issues';

/** Rebuild steps in the order a full rebuild runs them */
export const REBUILD_ORDER = [
  'baseMeshesSetup',
  'importTemplateScenes',
  'importData',
  'createAllDeformers',
  'connectTemplateScenes',
  'reorderHierarchy',
  'importWeights',
] as const;

export type RebuildStep = (typeof REBUILD_ORDER)[number];
export type ExportStep = 'exportData' | 'exportWeights' | 'exportControllerList';
/** Read-only checks of a rebuilt scene */
export type CheckStep = 'checkControllersMatch';
export type BuildStep = RebuildStep | ExportStep | CheckStep;

export type StepStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface StepRecord {
  step: BuildStep;
  status: 'completed' | 'failed';
  configVersion: number;
  issues: number;
  error?: string;
}

export interface BuildContext {
  steps: Record<BuildStep, StepStatus>;
  current: BuildStep | null;
  configVersion: number;
  history: StepRecord[];
}

export type BuildEvent =
  | { type: 'STEP_START'; step: BuildStep }
  | { type: 'STEP_DONE'; step: BuildStep; issues: number }
  | { type: 'STEP_FAIL'; step: BuildStep; issues: number; error: string }
  | { type: 'CONFIG_UPDATED'; version: number }
  | { type: 'RESET' };

/** Result of any step: its own payload plus the issues it reported */
export type StepReport<T> = T & { issues: Issue[] };

export function initialSteps(): Record<BuildStep, StepStatus> {
  return {
    baseMeshesSetup: 'pending',
    importTemplateScenes: 'pending',
    importData: 'pending',
    createAllDeformers: 'pending',
    connectTemplateScenes: 'pending',
    reorderHierarchy: 'pending',
    importWeights: 'pending',
    exportData: 'pending',
    exportWeights: 'pending',
    exportControllerList: 'pending',
    checkControllersMatch: 'pending',
  };
}

export function isRebuildStep(step: BuildStep): step is RebuildStep {
  return REBUILD_ORDER.some((s) => s === step);
}
