/**
 * Rebuild Error Classes
 *
 * Every failure names the offending entity and, where it applies, the
 * nomenclature that was expected against what was found.
 */

export interface ErrorDetails {
  entity: string;
  expected?: string;
  found?: string;
}

export class RigBuildError extends Error {
  readonly entity: string;
  readonly expected?: string;
  readonly found?: string;

  constructor(message: string, details: ErrorDetails) {
    super(message);
    this.name = 'RigBuildError';
    this.entity = details.entity;
    this.expected = details.expected;
    this.found = details.found;
  }
}

/**
 * Malformed or self-inconsistent configuration.
 * Raised before any scene mutation.
 */
export class ConfigurationError extends RigBuildError {
  constructor(message: string, details: ErrorDetails) {
    super(message, details);
    this.name = 'ConfigurationError';
  }
}

/** A name expected in the scene is absent or spelled differently */
export class NomenclatureMismatch extends RigBuildError {
  constructor(message: string, details: ErrorDetails) {
    super(message, details);
    this.name = 'NomenclatureMismatch';
  }
}

/** The rebuilt deformer stack differs from the exported one */
export class StackIndexMismatch extends RigBuildError {
  constructor(message: string, details: ErrorDetails) {
    super(message, details);
    this.name = 'StackIndexMismatch';
  }
}

export class ResourceAlreadyExists extends RigBuildError {
  readonly names: string[];

  constructor(names: string[]) {
    super(`Already in the scene: ${names.join(', ')}. Delete them before running again`, {
      entity: names[0] ?? '',
      expected: 'absent',
      found: names.join(', '),
    });
    this.name = 'ResourceAlreadyExists';
    this.names = names;
  }
}

/** Vertex or control point counts no longer line up */
export class TopologyMismatch extends RigBuildError {
  constructor(message: string, details: ErrorDetails) {
    super(message, details);
    this.name = 'TopologyMismatch';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
