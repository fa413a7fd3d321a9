/**
 * CORE: Transition Rules
 * Pure validation logic.
 */

import { TransitionError, WorkflowError } from './errors';
import type { RunAction, RunState } from './machine';

export function validateAction(state: RunState, action: RunAction): void {
    if (state.phase !== 'running') {
        throw new TransitionError(`Cannot apply ${action.type} to a run in state: ${state.phase}`);
    }

    switch (action.type) {
        case 'STEP_STARTED':
            if (state.inFlight) {
                throw new TransitionError(`Cannot start ${action.stepId}: ${state.currentStep} is still running`);
            }
            if (action.stepId !== state.currentStep) {
                throw new TransitionError(`Step mismatch: expected ${state.currentStep}, got ${action.stepId}`);
            }
            break;

        case 'STEP_SUCCEEDED':
        case 'STEP_PARSE_FAILED':
            if (!state.inFlight) {
                throw new TransitionError(`Cannot record ${action.type} for ${action.stepId}: no step is running`);
            }
            if (action.stepId !== state.currentStep) {
                throw new TransitionError(`Step mismatch: expected ${state.currentStep}, got ${action.stepId}`);
            }
            if (action.type === 'STEP_SUCCEEDED' && action.nextStep.trim() === '') {
                throw new TransitionError(`Step ${action.stepId} succeeded without a next step`);
            }
            break;

        case 'EXECUTION_FAILED':
            // Allowed between steps too: cancellation is noticed before the next step starts
            break;
    }
}

/** Rejects a step ceiling that is not a positive integer. */
export function validateMaxSteps(maxSteps: number): void {
    if (Number.isInteger(maxSteps) && maxSteps > 0) return;
    throw new WorkflowError(
        `Step ceiling must be a positive integer, got ${maxSteps}`,
        'orchestrator_invalid_max_steps',
        'Set maxSteps to a whole number of 1 or more'
    );
}
