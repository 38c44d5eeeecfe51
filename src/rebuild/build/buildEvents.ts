/**
 * Build Event Types and RxJS emitter
 *
 * Discrete notifications about a build session: steps starting, finishing or
 * failing, issues as they are reported, and configuration edits.
 */

import { Subject, Observable } from 'rxjs';
import { filter, map } from 'rxjs/operators';
import type { Issue } from '../issues';
import type { BuildStep, RebuildStep } from './types';

// ============ Core Event Types ============

interface BuildEventBase {
  timestamp: number;
}

export interface StepStartedEvent extends BuildEventBase {
  type: 'STEP_STARTED';
  step: BuildStep;
  configVersion: number;
}

export interface StepCompletedEvent extends BuildEventBase {
  type: 'STEP_COMPLETED';
  step: BuildStep;
  issues: number;
  durationMs: number;
}

export interface StepFailedEvent extends BuildEventBase {
  type: 'STEP_FAILED';
  step: BuildStep;
  error: Error;
}

/** A rebuild step started before the steps it depends on completed */
export interface StepOutOfOrderEvent extends BuildEventBase {
  type: 'STEP_OUT_OF_ORDER';
  step: RebuildStep;
  pending: RebuildStep[];
}

export interface IssueReportedEvent extends BuildEventBase {
  type: 'ISSUE_REPORTED';
  step: BuildStep;
  issue: Issue;
}

export interface ConfigChangedEvent extends BuildEventBase {
  type: 'CONFIG_CHANGED';
  version: number;
  change: string;
}

export type RigBuildEvent =
  | StepStartedEvent
  | StepCompletedEvent
  | StepFailedEvent
  | StepOutOfOrderEvent
  | IssueReportedEvent
  | ConfigChangedEvent;

/**
 * One emitter per build session; sessions never share a stream.
 */
export class BuildEventEmitter {
  private event$ = new Subject<RigBuildEvent>();

  /** Observable stream of discrete build events */
  get events(): Observable<RigBuildEvent> {
    return this.event$.asObservable();
  }

  /** Issues only, as they are reported */
  get issues(): Observable<Issue> {
    return this.event$.pipe(
      filter((e): e is IssueReportedEvent => e.type === 'ISSUE_REPORTED'),
      map((e) => e.issue)
    );
  }

  // ============ Event Emitters ============

  emitStepStarted(step: BuildStep, configVersion: number) {
    this.event$.next({ type: 'STEP_STARTED', step, configVersion, timestamp: Date.now() });
  }

  emitStepCompleted(step: BuildStep, issues: number, durationMs: number) {
    this.event$.next({ type: 'STEP_COMPLETED', step, issues, durationMs, timestamp: Date.now() });
  }

  emitStepFailed(step: BuildStep, error: Error) {
    this.event$.next({ type: 'STEP_FAILED', step, error, timestamp: Date.now() });
  }

  emitStepOutOfOrder(step: RebuildStep, pending: RebuildStep[]) {
    this.event$.next({ type: 'STEP_OUT_OF_ORDER', step, pending, timestamp: Date.now() });
  }

  emitIssue(step: BuildStep, issue: Issue) {
    this.event$.next({ type: 'ISSUE_REPORTED', step, issue, timestamp: Date.now() });
  }

  emitConfigChanged(version: number, change: string) {
    this.event$.next({ type: 'CONFIG_CHANGED', version, change, timestamp: Date.now() });
  }

  complete() {
    this.event$.complete();
  }
}
