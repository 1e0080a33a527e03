// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

export const STEP_NAMES = [
  'settings',
  'services',
  'uuid',
  'mysql',
  'repositories',
  'git-hooks',
  'pages',
  'assets',
  'storage',
  'hookshot',
  'saml-keys',
  'elasticsearch',
  'config-apply',
  'ssh-host-keys',
] as const;

export type StepName = (typeof STEP_NAMES)[number];

/**
 * Restore steps in the `main` phase run while the status reads `restoring`, `after-complete` ones once `complete` has
 * been published. Backup steps are all `main`.
 */
export type StepPhase = 'main' | 'after-complete';

/**
 * One independently restorable unit of target state. `S` is the session type the step is selected against.
 */
export interface DatastoreStep<S> {
  readonly name: StepName;
  /** Why the step sits where it does in the order. */
  readonly rationale: string;
  /** Steps that must run earlier whenever they apply to the same session. */
  readonly dependsOn: readonly StepName[];
  readonly phase: StepPhase;
  /** A failure is logged as a warning instead of ending the session. */
  readonly bestEffort?: boolean;
  applies(session: S): boolean;
}

/**
 * Selects the steps that apply to `session`, keeping the table order.
 * @throws IllegalArgumentError when a step is listed twice or an applicable dependency is not ordered before it
 */
export function buildPlan<S>(steps: readonly DatastoreStep<S>[], session: S): DatastoreStep<S>[] {
  const plan: DatastoreStep<S>[] = steps.filter((step): boolean => step.applies(session));
  const applicable: Set<StepName> = new Set(plan.map((step): StepName => step.name));
  const seen: Set<StepName> = new Set();

  for (const step of plan) {
    if (seen.has(step.name)) {
      throw new IllegalArgumentError(`Step '${step.name}' is listed more than once`, step.name);
    }
    for (const dependency of step.dependsOn) {
      if (applicable.has(dependency) && !seen.has(dependency)) {
        throw new IllegalArgumentError(`Step '${step.name}' must run after '${dependency}'`, step.name);
      }
    }
    seen.add(step.name);
  }
  return plan;
}
