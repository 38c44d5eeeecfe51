import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConfigurationError } from '../../errors';
import { RigConfigStore, type ConfigChange } from '../configStore';
import { rigConfig, silenceConsole } from '../../__tests__/fixtures';

describe('RigConfigStore', () => {
  let store: RigConfigStore;

  beforeEach(() => {
    silenceConsole();
    store = new RigConfigStore(
      rigConfig({
        modelingHierarchy: { head: { referenceGeometry: 'M_head_geo', targetGroups: ['geometry', 'rig'] } },
        deformersStack: { M_head_rig_mesh: { deformers: [{ name: '{name}_cluster' }] } },
      })
    );
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should start at version 0', () => {
    expect(store.version).toBe(0);
  });

  it('should hand out copies of the configuration', () => {
    const copy = store.config;
    copy.sides.push('M');
    expect(store.config.sides).toEqual(['L', 'R']);
  });

  it('should find stacks that depend on a part through its names', () => {
    expect(store.dependentStacks('head')).toEqual(['M_head_rig_mesh']);
    expect(store.dependentStacks('unknown')).toEqual([]);
  });

  it('should refuse to remove a part that stacks still use', () => {
    expect(() => store.removePart('head')).toThrow('still used by stacks M_head_rig_mesh');
    expect(store.version).toBe(0);
    expect(Object.keys(store.config.modelingHierarchy)).toEqual(['head']);
  });

  it('should cascade part removal to dependent stacks and notify subscribers', () => {
    const changes: ConfigChange[] = [];
    store.subscribe((change) => changes.push(change));

    store.removePart('head', { cascade: true });

    expect(store.version).toBe(1);
    expect(store.config.deformersStack).toEqual({});
    expect(changes.map(({ kind, key, version }) => ({ kind, key, version }))).toEqual([
      { kind: 'removePart', key: 'head', version: 1 },
    ]);
  });

  it('should add parts and reject duplicates or malformed entries', () => {
    store.addPart('eyes', { referenceGeometry: '{}_eye_geo', targetGroups: ['rig'] });
    expect(store.config.modelingHierarchy.eyes).toEqual({ referenceGeometry: '{}_eye_geo', targetGroups: ['rig'] });

    expect(() => store.addPart('eyes', { referenceGeometry: 'x_geo', targetGroups: ['rig'] })).toThrow('already exists');
    expect(() => store.addPart('teeth', { referenceGeometry: 'M_teeth_geo', targetGroups: [] })).toThrow(
      'Invalid entry "teeth"'
    );
    expect(store.version).toBe(1);
  });

  it('should leave the store untouched when an edit fails validation', () => {
    expect(() => store.addStack('M_eye_geo', { part: 'missing', deformers: [] })).toThrow(ConfigurationError);
    expect(store.version).toBe(0);
    expect(Object.keys(store.config.deformersStack)).toEqual(['M_head_rig_mesh']);
  });

  it('should edit transfer connections', () => {
    store.setTransferConnection('M_lips_bcs', 'M_head_rig_mesh');
    expect(store.config.connections.bcs).toEqual({ M_lips_bcs: 'M_head_rig_mesh' });

    store.removeTransferConnection('M_lips_bcs');
    expect(store.config.connections.bcs).toEqual({});
    expect(() => store.removeTransferConnection('M_lips_bcs')).toThrow('has no connection');
    expect(store.version).toBe(2);
  });

  it('should stop notifying after unsubscribe', () => {
    const listener = vi.fn();
    const unsubscribe = store.subscribe(listener);
    store.removeStack('M_head_rig_mesh');
    unsubscribe();
    store.setTransferConnection('M_lips_bcs', 'M_head_rig_mesh');
    expect(listener).toHaveBeenCalledTimes(1);
  });
});
