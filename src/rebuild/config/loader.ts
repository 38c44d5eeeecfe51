import { readFileSync } from 'node:fs';
import { ConfigurationError, errorMessage } from '../errors';
import { rigConfigZ, type RigConfig } from './types';
import { assertValidRigConfig } from './validation';

/**
 * Validate raw configuration data and fill in defaults.
 * Throws ConfigurationError listing every schema problem.
 */
export function parseRigConfig(input: unknown): RigConfig {
  const result = rigConfigZ.safeParse(input);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid rig configuration:\n  ${problems.join('\n  ')}`, {
      entity: problems[0] ?? 'configuration',
      expected: 'a configuration matching the rig schema',
      found: `${problems.length} problem(s)`,
    });
  }
  assertValidRigConfig(result.data);
  return result.data;
}

export function loadRigConfig(path: string): RigConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new ConfigurationError(`Cannot read rig configuration ${path}: ${errorMessage(err)}`, { entity: path });
  }
  return parseRigConfig(raw);
}
