/**
 * RigConfigStore - the versioned configuration of a build session
 *
 * Edits go through explicit operations. Each one builds the next
 * configuration, validates it and only then commits it and bumps `version`,
 * so a rejected edit leaves the store untouched.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors';
import {
  modelingEntryZ,
  stackEntryZ,
  type DeformerStackEntry,
  type ModelingHierarchyEntry,
  type RigConfig,
} from './types';
import { assertValidRigConfig } from './validation';
import { partOutputNames, stackKeyNames } from './naming';

export type ConfigChangeKind =
  | 'addPart'
  | 'removePart'
  | 'addStack'
  | 'removeStack'
  | 'setTransferConnection'
  | 'removeTransferConnection'
  | 'replace';

export interface ConfigChange {
  kind: ConfigChangeKind;
  /** Part, stack or transfer node the edit was about; the asset for `replace` */
  key: string;
  version: number;
  config: RigConfig;
}

export interface RemovePartOptions {
  /** Also remove the stacks that depend on the part */
  cascade?: boolean;
}

function parseSection<T extends z.ZodTypeAny>(schema: T, input: unknown, entity: string): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid entry "${entity}": ${result.error.issues.map((i) => `${i.path.join('.') || '(root)'} ${i.message}`).join('; ')}`, {
      entity,
    });
  }
  return result.data;
}

export class RigConfigStore {
  private current: RigConfig;
  private _version = 0;
  private listeners = new Set<(change: ConfigChange) => void>();

  constructor(config: RigConfig) {
    assertValidRigConfig(config);
    this.current = structuredClone(config);
  }

  get version(): number {
    return this._version;
  }

  /** Current configuration; callers get a copy they are free to mutate */
  get config(): RigConfig {
    return structuredClone(this.current);
  }

  subscribe(listener: (change: ConfigChange) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Stack keys that depend on a part, explicitly or through its naming pattern */
  dependentStacks(partKey: string): string[] {
    const entry = this.current.modelingHierarchy[partKey];
    if (!entry) return [];
    const produced = new Set(partOutputNames(entry, this.current.sides));

    return Object.entries(this.current.deformersStack)
      .filter(([key, stack]) => {
        if (stack.part === partKey) return true;
        if (stack.part !== undefined) return false;
        return stackKeyNames(key, stack, this.current).some((name) => produced.has(name));
      })
      .map(([key]) => key);
  }

  addPart(key: string, input: z.input<typeof modelingEntryZ>): void {
    if (this.current.modelingHierarchy[key]) {
      throw new ConfigurationError(`Part "${key}" already exists`, { entity: key, expected: 'a new part key', found: key });
    }
    const entry: ModelingHierarchyEntry = parseSection(modelingEntryZ, input, key);
    this.commit('addPart', key, (next) => {
      next.modelingHierarchy[key] = entry;
    });
  }

  removePart(key: string, options: RemovePartOptions = {}): void {
    if (!this.current.modelingHierarchy[key]) {
      throw new ConfigurationError(`Part "${key}" does not exist`, { entity: key, expected: key, found: 'nothing' });
    }
    const dependents = this.dependentStacks(key);
    if (dependents.length > 0 && !options.cascade) {
      throw new ConfigurationError(
        `Part "${key}" is still used by stacks ${dependents.join(', ')}; remove them first or pass { cascade: true }`,
        { entity: key, expected: 'no dependent stacks', found: dependents.join(', ') }
      );
    }
    this.commit('removePart', key, (next) => {
      delete next.modelingHierarchy[key];
      for (const stack of dependents) delete next.deformersStack[stack];
    });
  }

  addStack(key: string, input: z.input<typeof stackEntryZ>): void {
    if (this.current.deformersStack[key]) {
      throw new ConfigurationError(`Stack "${key}" already exists`, { entity: key, expected: 'a new mesh key', found: key });
    }
    const entry: DeformerStackEntry = parseSection(stackEntryZ, input, key);
    this.commit('addStack', key, (next) => {
      next.deformersStack[key] = entry;
    });
  }

  removeStack(key: string): void {
    if (!this.current.deformersStack[key]) {
      throw new ConfigurationError(`Stack "${key}" does not exist`, { entity: key, expected: key, found: 'nothing' });
    }
    this.commit('removeStack', key, (next) => {
      delete next.deformersStack[key];
    });
  }

  setTransferConnection(node: string, mesh: string): void {
    this.commit('setTransferConnection', node, (next) => {
      next.connections.bcs[node] = mesh;
    });
  }

  removeTransferConnection(node: string): void {
    if (this.current.connections.bcs[node] === undefined) {
      throw new ConfigurationError(`Transfer node "${node}" has no connection`, { entity: node });
    }
    this.commit('removeTransferConnection', node, (next) => {
      delete next.connections.bcs[node];
    });
  }

  replace(config: RigConfig): void {
    this.commit('replace', config.projectInfo.asset, () => structuredClone(config));
  }

  private commit(kind: ConfigChangeKind, key: string, edit: (next: RigConfig) => RigConfig | void): void {
    const draft = structuredClone(this.current);
    const next = edit(draft) ?? draft;
    assertValidRigConfig(next);
    this.current = next;
    this._version += 1;
    console.info(`[RigConfigStore] ${kind} "${key}" -> version ${this._version}`);
    const change: ConfigChange = { kind, key, version: this._version, config: structuredClone(next) };
    this.listeners.forEach((listener) => listener(change));
  }
}
