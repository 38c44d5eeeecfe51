/**
 * Controller check
 *
 * Compares the controllers of the scene with the reference list kept beside
 * the controller template, so a rebuilt rig can be checked before cleanup.
 */

import { basename, dirname } from 'node:path';
import type { SceneHost } from '../../engine/SceneHost.types';
import { ArtifactStore } from '../../services/artifactStore';
import { ConfigurationError } from '../errors';
import type { IssueLog } from '../issues';
import type { RigConfig } from '../config/types';
import { controllerListFile, controllerListZ } from '../artifacts';

export const CONTROLLER_TEMPLATE = 'controller';

export interface ControllerListResult {
  file: string;
  controllers: string[];
}

export interface ControllerCheckResult {
  /** Reference list the scene was checked against */
  file: string;
  expected: string[];
  /** Controllers in the scene, without the skipped ones */
  current: string[];
  /** Expected controllers absent from the scene */
  missing: string[];
}

function controllerListStore(config: RigConfig): { store: ArtifactStore; file: string } {
  const template = config.templateScenes[CONTROLLER_TEMPLATE];
  if (template === undefined) {
    throw new ConfigurationError(`No scene path configured for template "${CONTROLLER_TEMPLATE}"`, {
      entity: CONTROLLER_TEMPLATE,
      expected: `templateScenes.${CONTROLLER_TEMPLATE}`,
      found: 'nothing',
    });
  }
  const path = controllerListFile(template);
  return { store: new ArtifactStore(dirname(path)), file: basename(path) };
}

/** Write the controllers of the scene as the reference list of the controller template */
export function exportControllerList(host: SceneHost, config: RigConfig, log: IssueLog): ControllerListResult {
  const { store, file } = controllerListStore(config);
  const controllers = host.ls(config.exportFilters.controllerPattern);
  const written = store.writeJson(file, controllers);
  log.info(`Exported ${controllers.length} controller name(s) to ${written}`);
  return { file: written, controllers };
}

export function checkControllersMatch(host: SceneHost, config: RigConfig, log: IssueLog): ControllerCheckResult {
  const { store, file } = controllerListStore(config);
  const path = store.path(file);
  const skipped = new Set(config.exportFilters.skipControllers);
  const current = host.ls(config.exportFilters.controllerPattern).filter((ctrl) => !skipped.has(ctrl));

  const read = store.readJson(file, controllerListZ);
  if (!read.ok) {
    log.error('MissingArtifact', path, read.message);
    return { file: path, expected: [], current, missing: [] };
  }

  const expected = read.value;
  const missing = expected.filter((ctrl) => !host.exists(ctrl));
  for (const ctrl of missing) {
    log.warn('NomenclatureMismatch', ctrl, `No match found for controller "${ctrl}"`, { expected: ctrl, found: 'nothing' });
  }

  log.info(`Controllers read from ${path}`);
  log.info(`${expected.length} controllers are expected and ${current.length} are in the scene`);
  if (missing.length === 0) log.info('All controllers match');
  return { file: path, expected, current, missing };
}
