import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'node:path';
import { SceneGraph } from '../../../engine/SceneGraph';
import { ConfigurationError } from '../../errors';
import { IssueLog } from '../../issues';
import type { RigConfig } from '../../config/types';
import { checkControllersMatch, exportControllerList } from '../controllerCheck';
import { QUAD, makeTempDir, rigConfig, silenceConsole } from '../../__tests__/fixtures';

function controllerScene(names: string[]) {
  return new SceneGraph({ nodes: names.map((name) => ({ name, kind: 'curve' as const, points: QUAD })) });
}

describe('ControllerCheck', () => {
  let dir: ReturnType<typeof makeTempDir>;
  let config: RigConfig;
  let log: IssueLog;
  let consoleSpies: ReturnType<typeof silenceConsole>;

  beforeEach(() => {
    consoleSpies = silenceConsole();
    dir = makeTempDir();
    config = rigConfig({
      templateScenes: { controller: join(dir.path, 'controller.scene') },
      exportFilters: { skipControllers: ['M_debug_ctrl'] },
    });
    log = new IssueLog('ControllerCheck');
  });

  afterEach(() => {
    dir.cleanup();
    vi.restoreAllMocks();
  });

  it('should write the scene controllers beside the controller template', () => {
    const result = exportControllerList(controllerScene(['L_brow_ctrl', 'M_jaw_ctrl', 'M_head_jnt']), config, log);

    expect(result).toEqual({
      file: join(dir.path, 'controller_data.json'),
      controllers: ['L_brow_ctrl', 'M_jaw_ctrl'],
    });
  });

  it('should warn about every expected controller missing from the scene', () => {
    exportControllerList(controllerScene(['L_brow_ctrl', 'M_jaw_ctrl', 'M_debug_ctrl']), config, log);

    const result = checkControllersMatch(controllerScene(['L_brow_ctrl', 'M_debug_ctrl']), config, log);

    expect(result).toEqual({
      file: join(dir.path, 'controller_data.json'),
      expected: ['L_brow_ctrl', 'M_jaw_ctrl', 'M_debug_ctrl'],
      current: ['L_brow_ctrl'],
      missing: ['M_jaw_ctrl'],
    });
    expect(log.warnings.map(({ code, entity, message }) => ({ code, entity, message }))).toEqual([
      { code: 'NomenclatureMismatch', entity: 'M_jaw_ctrl', message: 'No match found for controller "M_jaw_ctrl"' },
    ]);
    expect(consoleSpies.info).toHaveBeenCalledWith('[ControllerCheck] 3 controllers are expected and 1 are in the scene');
  });

  it('should report a full match', () => {
    exportControllerList(controllerScene(['L_brow_ctrl', 'M_jaw_ctrl']), config, log);

    const result = checkControllersMatch(controllerScene(['L_brow_ctrl', 'M_jaw_ctrl']), config, log);

    expect(result.missing).toEqual([]);
    expect(log.issues).toEqual([]);
    expect(consoleSpies.info).toHaveBeenCalledWith('[ControllerCheck] All controllers match');
  });

  it('should report a missing reference list', () => {
    const result = checkControllersMatch(controllerScene(['L_brow_ctrl']), config, log);

    expect(result).toEqual({
      file: join(dir.path, 'controller_data.json'),
      expected: [],
      current: ['L_brow_ctrl'],
      missing: [],
    });
    expect(log.errors.map(({ code, entity }) => ({ code, entity }))).toEqual([
      { code: 'MissingArtifact', entity: join(dir.path, 'controller_data.json') },
    ]);
  });

  it('should need a controller template', () => {
    expect(() => checkControllersMatch(controllerScene([]), rigConfig(), log)).toThrow(ConfigurationError);
  });
});
