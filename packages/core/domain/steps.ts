/**
 * Step Conditions & Navigation
 *
 * Decides which declared steps are active for the current request and answers
 * first / next / previous / last queries over the active steps only.
 * Conditions may read wizard state, so nothing here is cached across requests.
 */

import type { StepsView } from '../ports/responses.js';
import { NoActiveStepsError } from './errors.js';
import type { StepCollection } from './wizard.js';

// =============================================================================
// Conditions
// =============================================================================

/**
 * A step condition: a fixed flag or a predicate over the wizard.
 */
export type StepCondition<W> = boolean | ((wizard: W) => boolean);

/**
 * Conditions keyed by step name. Steps without an entry are active.
 */
export type ConditionDict<W> = Readonly<Record<string, StepCondition<W>>>;

/**
 * Check whether a step is active.
 *
 * @param step - Step name
 * @param conditions - Declared conditions
 * @param wizard - Wizard passed to predicates
 */
export function isStepActive<W>(step: string, conditions: ConditionDict<W>, wizard: W): boolean {
  const condition = conditions[step];
  if (condition === undefined) {
    return true;
  }
  return typeof condition === 'function' ? condition(wizard) : condition;
}

/**
 * Get the active steps, in declaration order.
 */
export function getActiveSteps<W>(
  steps: StepCollection,
  conditions: ConditionDict<W>,
  wizard: W
): string[] {
  return [...steps.keys()].filter((step) => isStepActive(step, conditions, wizard));
}

// =============================================================================
// Step Navigator
// =============================================================================

/**
 * Navigation over the active steps.
 *
 * `current` is the stored current step, falling back to the first active step
 * when the wizard has not started.
 */
export class StepNavigator {
  constructor(
    private readonly resolveActive: () => string[],
    private readonly resolveStored: () => string | null
  ) {}

  get all(): string[] {
    return this.resolveActive();
  }

  get count(): number {
    return this.all.length;
  }

  /**
   * @throws NoActiveStepsError if no step is active
   */
  get first(): string {
    const [first] = this.all;
    if (first === undefined) {
      throw new NoActiveStepsError();
    }
    return first;
  }

  get last(): string {
    const all = this.all;
    const last = all[all.length - 1];
    if (last === undefined) {
      throw new NoActiveStepsError();
    }
    return last;
  }

  get current(): string {
    return this.resolveStored() ?? this.first;
  }

  /** Zero-based index of the current step among active steps (-1 if inactive) */
  get index(): number {
    return this.all.indexOf(this.current);
  }

  get next(): string | null {
    return this.relative(1);
  }

  get prev(): string | null {
    return this.relative(-1);
  }

  get step0(): number {
    return this.index;
  }

  get step1(): number {
    return this.index + 1;
  }

  /**
   * Snapshot for templates.
   */
  toView(): StepsView {
    return {
      all: this.all,
      count: this.count,
      current: this.current,
      first: this.first,
      last: this.last,
      next: this.next,
      prev: this.prev,
      index: this.index,
      step0: this.step0,
      step1: this.step1,
    };
  }

  private relative(offset: number): string | null {
    const all = this.all;
    const index = all.indexOf(this.current);
    if (index < 0) {
      return null;
    }
    return all[index + offset] ?? null;
  }
}
