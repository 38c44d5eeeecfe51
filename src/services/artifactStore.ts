/**
 * Artifact Store
 * JSON persistence for exported rig data under one per-asset directory.
 */

import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { z } from 'zod';
import { ConfigurationError, errorMessage } from '../rebuild/errors';
import type { ProjectInfo } from '../rebuild/config/types';

export type ReadResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: 'missing' | 'invalid'; message: string };

/**
 * `projectDirectory/asset/...subFolders`. The asset folder must already
 * exist (a missing one usually means a misspelled asset); sub folders are created.
 */
export function resolveAssetDirectory(projectInfo: ProjectInfo): string {
  const assetPath = join(projectInfo.projectDirectory, projectInfo.asset);
  if (!existsSync(assetPath)) {
    throw new ConfigurationError(`Asset directory ${assetPath} does not exist, check the asset name`, {
      entity: projectInfo.asset,
      expected: assetPath,
      found: 'nothing',
    });
  }
  const directory = join(assetPath, ...projectInfo.subFolders);
  mkdirSync(directory, { recursive: true });
  return directory;
}

export class ArtifactStore {
  constructor(readonly directory: string) {}

  path(file: string): string {
    return join(this.directory, file);
  }

  exists(file: string): boolean {
    return existsSync(this.path(file));
  }

  /** Write pretty-printed JSON; returns the absolute path */
  writeJson(file: string, data: unknown): string {
    const target = this.path(file);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, JSON.stringify(data, null, 2) + '\n', 'utf8');
    return target;
  }

  remove(file: string): void {
    rmSync(this.path(file), { force: true });
  }

  readJson<S extends z.ZodTypeAny>(file: string, schema: S): ReadResult<z.infer<S>> {
    const target = this.path(file);
    if (!existsSync(target)) {
      return { ok: false, reason: 'missing', message: `${target} does not exist` };
    }
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(target, 'utf8'));
    } catch (err) {
      return { ok: false, reason: 'invalid', message: `${target} is not valid JSON: ${errorMessage(err)}` };
    }
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      return {
        ok: false,
        reason: 'invalid',
        message: `${target}: ${parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'} ${i.message}`).join('; ')}`,
      };
    }
    return { ok: true, value: parsed.data };
  }
}
