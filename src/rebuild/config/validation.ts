/**
 * Validation for rig configurations
 *
 * Structural checks the schema cannot express: cross references between
 * sections, placeholder tokens, suffix associations and name collisions.
 * Errors abort a build before anything touches the scene.
 */

import { ConfigurationError, errorMessage } from '../errors';
import { kindForName } from '../deformers/deformerKinds';
import { GROUP_KINDS, isGroupKind, type RigConfig } from './types';
import { PER_SIDE, SIDE, resolveDeformerName, unknownTokens } from './placeholders';
import { partOutputNames, stackKeyNames } from './naming';

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

const SIDE_ONLY = new Set([PER_SIDE]);
const MESH_SIDE_ONLY = new Set([SIDE]);

function validateSides(config: RigConfig, errors: string[]): void {
  const seen = new Set<string>();
  for (const side of config.sides) {
    if (seen.has(side)) errors.push(`Side "${side}" is listed twice`);
    if (side.includes('_')) errors.push(`Side "${side}" must not contain "_"`);
    seen.add(side);
  }
}

function validateGroups(config: RigConfig, errors: string[], warnings: string[]): void {
  const byName = new Map<string, string>();
  for (const [kind, name] of Object.entries(config.groupsHierarchy)) {
    const other = byName.get(name);
    if (other) warnings.push(`Groups "${other}" and "${kind}" share the node "${name}"`);
    byName.set(name, kind);
  }

  for (const [source, targets] of Object.entries(config.blendshapeConnections)) {
    if (!isGroupKind(source)) {
      errors.push(`Blend-shape connection source "${source}" is not a group kind (${GROUP_KINDS.join(', ')})`);
    }
    for (const target of targets) {
      if (target === source) errors.push(`Blend-shape connection "${source}" targets itself`);
    }
  }
}

function validateModeling(config: RigConfig, errors: string[]): void {
  const owners = new Map<string, string>();
  for (const [part, entry] of Object.entries(config.modelingHierarchy)) {
    const unknown = unknownTokens(entry.referenceGeometry, SIDE_ONLY);
    if (unknown.length > 0) {
      errors.push(`Part "${part}": reference geometry "${entry.referenceGeometry}" uses ${unknown.join(', ')}; only {} is allowed`);
      continue;
    }
    for (const kind of entry.targetGroups) {
      if (config.groupsHierarchy[kind] === undefined) {
        errors.push(`Part "${part}" targets group "${kind}" which groupsHierarchy does not name`);
      }
    }
    for (const name of partOutputNames(entry, config.sides)) {
      const owner = owners.get(name);
      if (owner) errors.push(`Parts "${owner}" and "${part}" both produce "${name}"`);
      owners.set(name, part);
    }
  }
}

function validateStacks(config: RigConfig, errors: string[], warnings: string[]): void {
  const owners = new Map<string, string>();

  for (const [key, entry] of Object.entries(config.deformersStack)) {
    if (entry.part !== undefined && config.modelingHierarchy[entry.part] === undefined) {
      errors.push(`Stack "${key}" refers to unknown part "${entry.part}"`);
      continue;
    }

    let meshes: string[];
    try {
      meshes = stackKeyNames(key, entry, config);
    } catch (err) {
      errors.push(`Stack "${key}": ${errorMessage(err)}`);
      continue;
    }
    for (const mesh of meshes) {
      const owner = owners.get(mesh);
      if (owner) errors.push(`Stacks "${owner}" and "${key}" both resolve to "${mesh}"`);
      owners.set(mesh, key);
    }

    if (entry.deformers.length === 0) warnings.push(`Stack "${key}" declares no deformers`);

    for (const slot of entry.deformers) {
      const kind = kindForName(slot.name, config.suffixAssociations);
      if (kind === null) {
        errors.push(`Stack "${key}": no suffix association matches deformer "${slot.name}"`);
        continue;
      }
      if (slot.params.type === 'skinBinding' && kind !== 'skinCluster') {
        errors.push(`Stack "${key}": "${slot.name}" has skin binding parameters but its suffix selects ${kind}`);
      }
      if (slot.params.type === 'generic' && kind === 'skinCluster') {
        errors.push(`Stack "${key}": skin binding "${slot.name}" needs skinBinding parameters`);
      }
      const referenced =
        slot.params.type === 'skinBinding' ? slot.params.joints : slot.params.type === 'generic' ? [slot.params.source] : [];
      for (const name of referenced) {
        if (unknownTokens(name, MESH_SIDE_ONLY).length > 0) {
          errors.push(`Stack "${key}": "${name}" of "${slot.name}" may only use {side}`);
        }
      }
    }

    // every slot must land on a distinct deformer for each concrete mesh
    for (const mesh of meshes) {
      try {
        const names = entry.deformers.flatMap((slot) => resolveDeformerName(slot.name, mesh, config.sides));
        const duplicates = names.filter((n, i) => names.indexOf(n) !== i);
        if (duplicates.length > 0) {
          errors.push(`Stack "${key}" resolves to duplicate deformers on "${mesh}": ${[...new Set(duplicates)].join(', ')}`);
        }
      } catch (err) {
        errors.push(`Stack "${key}": ${errorMessage(err)}`);
        break;
      }
    }
  }
}

function validateConnections(config: RigConfig, errors: string[]): void {
  for (const [template, destinations] of Object.entries(config.connections.templates)) {
    for (const [destination, plugs] of Object.entries(destinations)) {
      if (unknownTokens(destination, SIDE_ONLY).length > 0) {
        errors.push(`Template "${template}": destination "${destination}" may only use {}`);
      }
      for (const [source, attribute] of Object.entries(plugs)) {
        if (!source.includes('.')) errors.push(`Template "${template}": source plug "${source}" has no attribute`);
        if (unknownTokens(source, SIDE_ONLY).length > 0 || unknownTokens(attribute, SIDE_ONLY).length > 0) {
          errors.push(`Template "${template}": "${source}" -> "${destination}.${attribute}" may only use {}`);
        }
      }
    }
  }
}

function validateSuffixes(config: RigConfig, errors: string[]): void {
  const seen = new Set<string>();
  for (const { suffix } of config.suffixAssociations) {
    if (seen.has(suffix)) errors.push(`Suffix "${suffix}" is associated twice`);
    if (suffix.includes('_')) errors.push(`Suffix "${suffix}" must be a single name token`);
    seen.add(suffix);
  }
}

export function validateRigConfig(config: RigConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  validateSides(config, errors);
  validateSuffixes(config, errors);
  validateGroups(config, errors, warnings);
  validateModeling(config, errors);
  validateStacks(config, errors, warnings);
  validateConnections(config, errors);

  return { valid: errors.length === 0, errors, warnings };
}

export function assertValidRigConfig(config: RigConfig): void {
  const result = validateRigConfig(config);
  for (const warning of result.warnings) console.warn(`[RigConfig] ${warning}`);
  if (!result.valid) {
    throw new ConfigurationError(`Invalid rig configuration:\n  ${result.errors.join('\n  ')}`, {
      entity: config.projectInfo.asset,
      expected: 'a self-consistent configuration',
      found: `${result.errors.length} error(s)`,
    });
  }
}
