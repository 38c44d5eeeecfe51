/**
 * Connection Wirer
 *
 * Applies the connection graphs once template scenes are merged: transfer
 * nodes are routed onto their meshes, then plug templates are connected.
 * Each pair or plug fails on its own; the rest of the graph is still applied.
 */

import type { SceneHost } from '../../engine/SceneHost.types';
import type { IssueLog } from '../issues';
import type { RigConfig } from '../config/types';
import { PER_SIDE, expandSides, sideOf } from '../config/placeholders';

export interface ConnectOptions {
  /** Plug template keys to wire; defaults to every configured template */
  templates?: string[];
  transferNodes?: boolean;
}

export interface ConnectResult {
  /** Links made: transfer routes plus plug connections */
  wired: number;
  failed: number;
}

export interface PlugLink {
  source: string;
  destination: string;
}

const MIDDLE = 'M';

/**
 * Concrete plug links of one template destination.
 *
 * A `{}` destination expands per side. A `{}` source takes the destination's
 * side, or every side when the destination sits in the middle. A destination
 * attribute ending in `{}` takes the source plug's side.
 */
export function expandTemplateLinks(
  destinationTemplate: string,
  plugs: Record<string, string>,
  sides: string[]
): PlugLink[] {
  const links: PlugLink[] = [];
  for (const destination of expandSides(destinationTemplate, sides)) {
    const destinationSide = sideOf(destination);
    for (const [sourceTemplate, attributeTemplate] of Object.entries(plugs)) {
      let sources = [sourceTemplate];
      if (sourceTemplate.startsWith(PER_SIDE)) {
        if (sides.includes(destinationSide)) {
          sources = [sourceTemplate.split(PER_SIDE).join(destinationSide)];
        } else if (destinationSide === MIDDLE) {
          sources = expandSides(sourceTemplate, sides);
        }
      }
      for (const source of sources) {
        const attribute = attributeTemplate.endsWith(PER_SIDE)
          ? attributeTemplate.slice(0, -PER_SIDE.length) + sideOf(source)
          : attributeTemplate;
        links.push({ source, destination: `${destination}.${attribute}` });
      }
    }
  }
  return links;
}

function wireTransferNodes(host: SceneHost, config: RigConfig, log: IssueLog, result: ConnectResult): void {
  for (const [node, mesh] of Object.entries(config.connections.bcs)) {
    const absent = [node, mesh].filter((name) => !host.exists(name));
    if (absent.length > 0) {
      log.error('NomenclatureMismatch', node, `Cannot route ${node} -> ${mesh}: ${absent.join(', ')} not in the scene`, {
        expected: absent.join(', '),
        found: 'nothing',
      });
      result.failed++;
      continue;
    }
    try {
      host.linkTransferNode(node, mesh);
      const carrier = `${node}_geo`;
      if (host.exists(carrier)) host.deleteNode(carrier);
      result.wired++;
    } catch (err) {
      log.fromError(err, node);
      result.failed++;
    }
  }
}

export function connectTemplateScenes(
  host: SceneHost,
  config: RigConfig,
  options: ConnectOptions,
  log: IssueLog
): ConnectResult {
  const { templates = Object.keys(config.connections.templates), transferNodes = true } = options;
  const result: ConnectResult = { wired: 0, failed: 0 };

  if (transferNodes) wireTransferNodes(host, config, log, result);

  for (const template of templates) {
    const destinations = config.connections.templates[template];
    if (!destinations) {
      log.error('ConfigurationError', template, `No connection template named "${template}"`);
      continue;
    }
    let failed = 0;
    for (const [destination, plugs] of Object.entries(destinations)) {
      for (const link of expandTemplateLinks(destination, plugs, config.sides)) {
        if (link.source.includes(PER_SIDE) || link.destination.includes(PER_SIDE)) {
          log.error('ConfigurationError', link.destination, `Cannot resolve the side of ${link.source} -> ${link.destination}`);
          failed++;
          continue;
        }
        try {
          host.connectAttr(link.source, link.destination, true);
          result.wired++;
        } catch (err) {
          log.fromError(err, `${link.source} -> ${link.destination}`);
          failed++;
        }
      }
    }
    result.failed += failed;
    log.info(`${template.toUpperCase()} template connections: ${failed} error(s)`);
  }

  log.info(`Wired ${result.wired} link(s), ${result.failed} failed`);
  return result;
}
