/**
 * Step tree traversal.
 */

import { MAX_STEP_DEPTH, type Run, type Step } from './schema.js';

export interface StepVisit {
  step: Step;
  /** 0 for top-level steps */
  depth: number;
  parentId: string | null;
  /** Position among the parent's children */
  index: number;
}

/**
 * Visit every step of the run once, in pre-order (root to leaf, left to right).
 * Uses an explicit stack, so nesting depth never grows the call stack.
 */
export function walkSteps(run: Pick<Run, 'steps'>): StepVisit[] {
  const visits: StepVisit[] = [];
  const stack: StepVisit[] = [];

  for (let index = run.steps.length - 1; index >= 0; index -= 1) {
    stack.push({ step: run.steps[index], depth: 0, parentId: null, index });
  }

  while (stack.length > 0) {
    const visit = stack.pop();
    if (!visit) break;
    if (visit.depth >= MAX_STEP_DEPTH) {
      throw new Error(`Step tree deeper than ${MAX_STEP_DEPTH} levels at step "${visit.step.id}"`);
    }
    visits.push(visit);

    const children = visit.step.sub_steps;
    for (let index = children.length - 1; index >= 0; index -= 1) {
      stack.push({ step: children[index], depth: visit.depth + 1, parentId: visit.step.id, index });
    }
  }

  return visits;
}

/**
 * Find a step anywhere in the tree by id.
 */
export function findStep(run: Run, stepId: string): Step | null {
  return walkSteps(run).find((visit) => visit.step.id === stepId)?.step ?? null;
}

/**
 * A run is complete once every step in its tree has an end time.
 */
export function isRunComplete(run: Run): boolean {
  return walkSteps(run).every((visit) => visit.step.end_time !== undefined);
}
