/**
 * Build State Machine
 *
 * XState machine tracking which step is running and how every step of the
 * session ended. Steps are synchronous, so `running` is left again before
 * the step call returns.
 */

import { setup, assign } from 'xstate';
import { initialSteps, type BuildContext, type BuildEvent, type BuildStep, type StepStatus } from './types';

function withStatus(steps: Record<BuildStep, StepStatus>, step: BuildStep, status: StepStatus) {
  const next = { ...steps };
  next[step] = status;
  return next;
}

export const buildMachine = setup({
  types: {
    context: {} as BuildContext,
    events: {} as BuildEvent,
  },
  actions: {
    startStep: assign(({ context, event }) => {
      if (event.type !== 'STEP_START') return {};
      return {
        current: event.step,
        steps: withStatus(context.steps, event.step, 'running'),
      };
    }),

    completeStep: assign(({ context, event }) => {
      if (event.type !== 'STEP_DONE') return {};
      return {
        current: null,
        steps: withStatus(context.steps, event.step, 'completed'),
        history: [
          ...context.history,
          { step: event.step, status: 'completed' as const, configVersion: context.configVersion, issues: event.issues },
        ],
      };
    }),

    failStep: assign(({ context, event }) => {
      if (event.type !== 'STEP_FAIL') return {};
      return {
        current: null,
        steps: withStatus(context.steps, event.step, 'failed'),
        history: [
          ...context.history,
          {
            step: event.step,
            status: 'failed' as const,
            configVersion: context.configVersion,
            issues: event.issues,
            error: event.error,
          },
        ],
      };
    }),

    setConfigVersion: assign({
      configVersion: ({ context, event }) => (event.type === 'CONFIG_UPDATED' ? event.version : context.configVersion),
    }),

    reset: assign({
      steps: () => initialSteps(),
      current: null,
      history: [],
    }),
  },
}).createMachine({
  id: 'rigBuild',
  initial: 'idle',
  context: {
    steps: initialSteps(),
    current: null,
    configVersion: 0,
    history: [],
  },
  states: {
    idle: {
      on: {
        STEP_START: {
          target: 'running',
          actions: 'startStep',
        },
        CONFIG_UPDATED: {
          actions: 'setConfigVersion',
        },
        RESET: {
          actions: 'reset',
        },
      },
    },
    running: {
      on: {
        STEP_DONE: {
          target: 'idle',
          actions: 'completeStep',
        },
        STEP_FAIL: {
          target: 'idle',
          actions: 'failStep',
        },
        CONFIG_UPDATED: {
          actions: 'setConfigVersion',
        },
      },
    },
  },
});

export type BuildMachine = typeof buildMachine;
