/**
 * Template scenes
 *
 * Prebuilt rig fragments (joints, controllers, clusters, lattices, transfer
 * nodes) are merged into the build through the host, then their `*_template`
 * holder groups are dissolved into the real hierarchy.
 */

import { join } from 'node:path';
import type { SceneHost } from '../../engine/SceneHost.types';
import { errorMessage } from '../errors';
import type { IssueLog } from '../issues';
import type { RigConfig } from '../config/types';
import { transferTemplateFile } from '../artifacts';

export const TRANSFER_TEMPLATE = 'bcs';
export const DEFAULT_TEMPLATES = ['joint', 'controller', 'cluster', 'lattice', TRANSFER_TEMPLATE];

export interface ImportTemplatesOptions {
  templates?: string[];
  /** Overrides the transfer-node template path */
  bcsPath?: string;
}

export interface ImportTemplatesResult {
  /** Template key -> imported node names */
  imported: Record<string, string[]>;
  failed: string[];
}

export interface ReorderOptions {
  templateSuffix?: string;
}

export interface ReorderResult {
  moved: number;
  removed: string[];
}

/** `artifactDirectory` is only resolved when the transfer template falls back to it */
export function templateScenePath(
  config: RigConfig,
  template: string,
  artifactDirectory: () => string,
  bcsPath?: string
): string | undefined {
  if (template === TRANSFER_TEMPLATE) {
    return bcsPath ?? config.templateScenes[TRANSFER_TEMPLATE] ?? join(artifactDirectory(), transferTemplateFile(config.projectInfo.asset));
  }
  return config.templateScenes[template];
}

export function importTemplateScenes(
  host: SceneHost,
  config: RigConfig,
  artifactDirectory: () => string,
  options: ImportTemplatesOptions,
  log: IssueLog
): ImportTemplatesResult {
  const { templates = DEFAULT_TEMPLATES, bcsPath } = options;
  const result: ImportTemplatesResult = { imported: {}, failed: [] };

  for (const template of templates) {
    let path: string | undefined;
    try {
      path = templateScenePath(config, template, artifactDirectory, bcsPath);
    } catch (err) {
      log.fromError(err, template);
      result.failed.push(template);
      continue;
    }
    if (path === undefined) {
      log.error('ConfigurationError', template, `No scene path configured for template "${template}"`);
      result.failed.push(template);
      continue;
    }
    try {
      result.imported[template] = host.importScene(path, template);
    } catch (err) {
      log.fromError(err, path);
      result.failed.push(template);
      continue;
    }

    if (template === TRANSFER_TEMPLATE) {
      for (const node of host.ls('*', 'transfer')) host.setAttribute(node, 'freezeInput', 1);
    }
    log.info(`The ${template} template is imported from ${path}`);
  }

  log.info(`${Object.keys(result.imported).length} template(s) imported, ${result.failed.length} failed`);
  return result;
}

/**
 * Hand the children of every `<name>_<suffix>` group to the node `<name>`,
 * ignoring a leading `<templateKey>_` clash prefix, then delete the groups.
 */
export function reorderHierarchy(
  host: SceneHost,
  config: RigConfig,
  options: ReorderOptions,
  log: IssueLog
): ReorderResult {
  const { templateSuffix = 'template' } = options;
  const prefixes = new Set([
    ...DEFAULT_TEMPLATES,
    ...Object.keys(config.templateScenes),
    ...Object.keys(config.connections.templates),
  ]);
  const groups = host.ls(`*_${templateSuffix}`);
  const result: ReorderResult = { moved: 0, removed: [] };

  for (const group of groups) {
    if (!host.exists(group)) continue;
    let tokens = group.split('_').slice(0, -1);
    if (tokens.length > 1 && prefixes.has(tokens[0])) tokens = tokens.slice(1);
    const parent = tokens.join('_');

    for (const child of host.listChildren(group)) {
      if (child.endsWith(templateSuffix)) continue;
      try {
        host.parent(child, parent);
        result.moved++;
      } catch (err) {
        log.warn('NomenclatureMismatch', child, `${child} -> ${parent} can not be parented: ${errorMessage(err)}`, {
          expected: parent,
          found: host.exists(parent) ? parent : 'nothing',
        });
      }
    }
  }

  for (const group of groups) {
    if (!host.exists(group)) continue;
    host.deleteNode(group);
    result.removed.push(group);
  }

  log.info(`Moved ${result.moved} node(s) out of ${result.removed.length} template group(s)`);
  return result;
}
