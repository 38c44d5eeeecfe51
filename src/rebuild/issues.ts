/**
 * IssueLog - per-entity problems collected during a step
 *
 * One bad mesh must not abort a whole character rebuild, so entity-level
 * failures are logged here and returned with the step report instead of thrown.
 */

import { RigBuildError, errorMessage } from './errors';

export type IssueSeverity = 'warning' | 'error';

export type IssueCode =
  | 'ConfigurationError'
  | 'NomenclatureMismatch'
  | 'StackIndexMismatch'
  | 'ResourceAlreadyExists'
  | 'TopologyMismatch'
  | 'MissingArtifact'
  | 'HostFailure';

export interface Issue {
  severity: IssueSeverity;
  code: IssueCode;
  /** Node, mesh, plug or file the issue is about */
  entity: string;
  message: string;
  expected?: string;
  found?: string;
}

type IssueExtras = Pick<Issue, 'expected' | 'found'>;

const ERROR_CODES: Record<string, IssueCode> = {
  ConfigurationError: 'ConfigurationError',
  NomenclatureMismatch: 'NomenclatureMismatch',
  StackIndexMismatch: 'StackIndexMismatch',
  ResourceAlreadyExists: 'ResourceAlreadyExists',
  TopologyMismatch: 'TopologyMismatch',
};

export class IssueLog {
  private entries: Issue[] = [];

  constructor(
    private readonly tag: string,
    private readonly onIssue?: (issue: Issue) => void
  ) {}

  warn(code: IssueCode, entity: string, message: string, extras: IssueExtras = {}): Issue {
    return this.push({ severity: 'warning', code, entity, message, ...extras });
  }

  error(code: IssueCode, entity: string, message: string, extras: IssueExtras = {}): Issue {
    return this.push({ severity: 'error', code, entity, message, ...extras });
  }

  /** Record a caught error; rig errors keep their code, anything else is a host failure */
  fromError(err: unknown, entity: string, severity: IssueSeverity = 'error'): Issue {
    if (err instanceof RigBuildError) {
      return this.push({
        severity,
        code: ERROR_CODES[err.name] ?? 'HostFailure',
        entity: err.entity || entity,
        message: err.message,
        expected: err.expected,
        found: err.found,
      });
    }
    return this.push({ severity, code: 'HostFailure', entity, message: errorMessage(err) });
  }

  get issues(): Issue[] {
    return [...this.entries];
  }

  get errors(): Issue[] {
    return this.entries.filter((i) => i.severity === 'error');
  }

  get warnings(): Issue[] {
    return this.entries.filter((i) => i.severity === 'warning');
  }

  count(code?: IssueCode): number {
    return code ? this.entries.filter((i) => i.code === code).length : this.entries.length;
  }

  info(message: string) {
    console.info(`[${this.tag}] ${message}`);
  }

  private push(issue: Issue): Issue {
    this.entries.push(issue);
    const detail =
      issue.expected !== undefined || issue.found !== undefined
        ? ` (expected ${issue.expected ?? '-'}, found ${issue.found ?? '-'})`
        : '';
    const line = `[${this.tag}] ${issue.code}: ${issue.message}${detail}`;
    if (issue.severity === 'error') {
      console.error(line);
    } else {
      console.warn(line);
    }
    this.onIssue?.(issue);
    return issue;
  }
}
