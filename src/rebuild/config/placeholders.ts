/**
 * Placeholder grammar for mesh keys and deformer names
 *
 *   {}      once per side, in `sides` order
 *   {side}  the current side letter
 *   {name}  a base name (part reference for mesh keys, target mesh for deformers)
 *
 * Any other `{...}` token is a configuration error, and every resolution is
 * checked for duplicate results.
 */

import { ConfigurationError } from '../errors';

export const PER_SIDE = '{}';
export const SIDE = '{side}';
export const NAME = '{name}';

const KNOWN_TOKENS = new Set([PER_SIDE, SIDE, NAME]);
const TOKEN_RE = /\{[^{}]*\}/g;
const GEOMETRY_TOKENS = new Set(['geo', 'mesh']);

export function tokensOf(template: string): string[] {
  return template.match(TOKEN_RE) ?? [];
}

export function hasPlaceholder(template: string): boolean {
  return tokensOf(template).length > 0;
}

export function unknownTokens(template: string, allowed: ReadonlySet<string> = KNOWN_TOKENS): string[] {
  return tokensOf(template).filter((t) => !allowed.has(t));
}

export function assertKnownTokens(template: string, allowed: ReadonlySet<string> = KNOWN_TOKENS) {
  const unknown = unknownTokens(template, allowed);
  if (unknown.length > 0) {
    throw new ConfigurationError(`Unknown placeholder ${unknown.join(', ')} in "${template}"`, {
      entity: template,
      expected: Array.from(allowed).join(' '),
      found: unknown.join(' '),
    });
  }
}

export function assertUnique(names: string[], context: string): string[] {
  const duplicates = names.filter((n, i) => names.indexOf(n) !== i);
  if (duplicates.length > 0) {
    throw new ConfigurationError(`"${context}" resolves to duplicate names: ${[...new Set(duplicates)].join(', ')}`, {
      entity: context,
      expected: 'unique names',
      found: names.join(', '),
    });
  }
  return names;
}

/** Reference geometry without its trailing `_geo` / `_mesh` token */
export function referenceBaseName(referenceGeometry: string): string {
  const tokens = referenceGeometry.split('_');
  if (tokens.length > 1 && GEOMETRY_TOKENS.has(tokens[tokens.length - 1])) tokens.pop();
  return tokens.join('_');
}

/** Expand a leading-or-anywhere `{}` once per side */
export function expandSides(template: string, sides: string[]): string[] {
  if (!template.includes(PER_SIDE)) return [template];
  return sides.map((side) => template.split(PER_SIDE).join(side).split(SIDE).join(side));
}

export interface MeshKeyContext {
  sides: string[];
  /** Invocation side, required by `{side}` */
  side?: string;
  /** Reference geometry of the entry's part, required by `{name}` */
  referenceGeometry?: string;
}

/**
 * Resolve a mesh key to its concrete names.
 * `{name}` is substituted first so a per-side reference still expands per side.
 */
export function resolveMeshKey(key: string, ctx: MeshKeyContext): string[] {
  assertKnownTokens(key);
  let template = key;

  if (template.includes(NAME)) {
    if (ctx.referenceGeometry === undefined) {
      throw new ConfigurationError(`"${key}" uses {name} but its stack entry has no part`, {
        entity: key,
        expected: 'a part with reference geometry',
        found: 'no part',
      });
    }
    template = template.split(NAME).join(referenceBaseName(ctx.referenceGeometry));
    assertKnownTokens(template);
  }

  if (template.includes(PER_SIDE)) {
    return assertUnique(expandSides(template, ctx.sides), key);
  }

  if (template.includes(SIDE)) {
    if (ctx.side === undefined) {
      throw new ConfigurationError(`"${key}" uses {side} but no side was given`, {
        entity: key,
        expected: `one of ${ctx.sides.join(', ')}`,
        found: 'no side',
      });
    }
    return [template.split(SIDE).join(ctx.side)];
  }

  return [template];
}

/** Side letter of a concrete node name, its first `_` token */
export function sideOf(name: string): string {
  return name.split('_')[0];
}

/**
 * Resolve a deformer name against the concrete mesh it lands on.
 * `{}` yields one deformer per side, in side order.
 */
export function resolveDeformerName(template: string, mesh: string, sides: string[]): string[] {
  assertKnownTokens(template);
  const named = template.split(NAME).join(mesh).split(SIDE).join(sideOf(mesh));
  return assertUnique(expandSides(named, sides), template);
}
