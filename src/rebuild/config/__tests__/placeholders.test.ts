import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../errors';
import { referenceBaseName, resolveDeformerName, resolveMeshKey, sideOf } from '../placeholders';
import { copyName, indexGroups, partOutputNames, stackKeyNames } from '../naming';
import { rigConfig } from '../../__tests__/fixtures';

const SIDES = ['L', 'R'];

describe('Placeholders', () => {
  describe('resolveMeshKey', () => {
    it('should expand {} once per side', () => {
      expect(resolveMeshKey('{}_eye_rig_mesh', { sides: SIDES })).toEqual(['L_eye_rig_mesh', 'R_eye_rig_mesh']);
    });

    it('should substitute {name} before expanding sides', () => {
      expect(resolveMeshKey('{name}_rig_mesh', { sides: SIDES, referenceGeometry: '{}_eye_geo' })).toEqual([
        'L_eye_rig_mesh',
        'R_eye_rig_mesh',
      ]);
    });

    it('should take {side} from the invocation', () => {
      expect(resolveMeshKey('{side}_lid_mesh', { sides: SIDES, side: 'L' })).toEqual(['L_lid_mesh']);
      expect(() => resolveMeshKey('{side}_lid_mesh', { sides: SIDES })).toThrow(ConfigurationError);
    });

    it('should reject {name} without a part and unknown tokens', () => {
      expect(() => resolveMeshKey('{name}_rig_mesh', { sides: SIDES })).toThrow('has no part');
      expect(() => resolveMeshKey('{bogus}_mesh', { sides: SIDES })).toThrow('Unknown placeholder {bogus}');
    });

    it('should leave concrete keys alone', () => {
      expect(resolveMeshKey('M_head_rig_mesh', { sides: SIDES })).toEqual(['M_head_rig_mesh']);
    });
  });

  describe('resolveDeformerName', () => {
    it('should substitute the mesh and its side', () => {
      expect(resolveDeformerName('{name}_skinCluster', 'L_eye_rig_mesh', SIDES)).toEqual(['L_eye_rig_mesh_skinCluster']);
      expect(resolveDeformerName('{side}_lid_cluster', 'R_eye_rig_mesh', SIDES)).toEqual(['R_lid_cluster']);
    });

    it('should expand {} into one deformer per side', () => {
      expect(resolveDeformerName('{}_brow_cluster', 'M_head_rig_mesh', SIDES)).toEqual(['L_brow_cluster', 'R_brow_cluster']);
    });
  });

  it('should read the side token and strip geometry suffixes', () => {
    expect(sideOf('L_eye_rig_mesh')).toBe('L');
    expect(referenceBaseName('M_head_geo')).toBe('M_head');
    expect(referenceBaseName('M_head')).toBe('M_head');
  });
});

describe('Naming', () => {
  it('should insert the group label and turn geo into mesh', () => {
    expect(copyName('M_body_geo', 'rig')).toBe('M_body_rig_mesh');
    expect(copyName('L_eye_lash_geo', 'rig02')).toBe('L_eye_lash_rig02_mesh');
  });

  it('should number repeated group kinds', () => {
    expect(indexGroups(['geometry', 'rig', 'rig'])).toEqual([
      { kind: 'geometry', label: 'geometry' },
      { kind: 'rig', label: 'rig01' },
      { kind: 'rig', label: 'rig02' },
    ]);
  });

  it('should list every name a part produces', () => {
    expect(partOutputNames({ referenceGeometry: '{}_eye_geo', targetGroups: ['geometry', 'rig'] }, SIDES)).toEqual([
      'L_eye_geo',
      'L_eye_rig_mesh',
      'R_eye_geo',
      'R_eye_rig_mesh',
    ]);
  });

  it('should invoke {side} stack keys once per configured side', () => {
    const config = rigConfig();
    expect(stackKeyNames('{side}_lid_mesh', { deformers: [] }, config)).toEqual(['L_lid_mesh', 'R_lid_mesh']);
  });
});
