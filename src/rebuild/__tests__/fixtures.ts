/**
 * Shared scene and configuration builders for the rebuild tests
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import type { NodeSpec, Vec3 } from '../../engine/SceneHost.types';
import { parseRigConfig } from '../config/loader';
import type { RigConfig, RigConfigInput } from '../config/types';

/** Four-vertex unit quad */
export const QUAD: Vec3[] = [
  [0, 0, 0],
  [1, 0, 0],
  [1, 1, 0],
  [0, 1, 0],
];

export function meshNode(name: string, parent?: string, points: Vec3[] = QUAD): NodeSpec {
  return { name, kind: 'mesh', parent, points };
}

export function jointNode(name: string, parent?: string, translate?: Vec3): NodeSpec {
  return { name, kind: 'joint', parent, translate };
}

export const GROUPS = {
  root: 'face_grp',
  geometry: 'geometry_grp',
  rig: 'rig_grp',
  blendshape: 'blendshape_grp',
};

/** Parse a configuration with a throwaway project and the standard groups */
export function rigConfig(input: Partial<RigConfigInput> = {}): RigConfig {
  return parseRigConfig({
    projectInfo: { asset: 'face', projectDirectory: '/nonexistent/project' },
    groupsHierarchy: GROUPS,
    modelingHierarchy: {},
    ...input,
  });
}

export function makeTempDir(): { path: string; cleanup: () => void } {
  const path = mkdtempSync(join(tmpdir(), 'rig-rebuild-'));
  return { path, cleanup: () => rmSync(path, { recursive: true, force: true }) };
}

/** Silence step logging; returns the spies so tests can assert on lines */
export function silenceConsole() {
  return {
    info: vi.spyOn(console, 'info').mockImplementation(() => undefined),
    warn: vi.spyOn(console, 'warn').mockImplementation(() => undefined),
    error: vi.spyOn(console, 'error').mockImplementation(() => undefined),
  };
}
