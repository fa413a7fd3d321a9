/**
 * CORE: Run State Machine Reducer
 * Pure function: (State, Action) -> State
 * Rules validates transitions; throws on invalid.
 */

import { StepId, isTerminalStep } from './models';
import { validateAction } from './rules';

export type RunPhase = 'running' | 'done' | 'circuit_broken' | 'failed';

export type ParseFailurePolicy = 'fail' | 'retry-once';

export interface RunState {
    phase: RunPhase;
    currentStep: StepId;
    stepCount: number;
    maxSteps: number;
    /** True between STEP_STARTED and the step's outcome. */
    inFlight: boolean;
    /** Step already re-run once after a parse failure. */
    retriedStep?: StepId;
}

export type RunAction =
    | { type: 'STEP_STARTED'; stepId: StepId }
    | { type: 'STEP_SUCCEEDED'; stepId: StepId; nextStep: StepId }
    | { type: 'STEP_PARSE_FAILED'; stepId: StepId; policy: ParseFailurePolicy }
    | { type: 'EXECUTION_FAILED'; stepId: StepId };

export function initialRunState(entryStep: StepId, maxSteps: number): RunState {
    return {
        phase: 'running',
        currentStep: entryStep,
        stepCount: 0,
        maxSteps,
        inFlight: false,
    };
}

export function isTerminalPhase(phase: RunPhase): boolean {
    return phase !== 'running';
}

export function reducer(state: RunState, action: RunAction): RunState {
    validateAction(state, action);

    switch (action.type) {
        case 'STEP_STARTED': {
            const stepCount = state.stepCount + 1;
            // Circuit breaker: the step past the ceiling never runs
            if (stepCount > state.maxSteps) {
                return { ...state, phase: 'circuit_broken', inFlight: false };
            }
            return { ...state, stepCount, inFlight: true };
        }

        case 'STEP_SUCCEEDED': {
            if (isTerminalStep(action.nextStep)) {
                return { ...state, phase: 'done', inFlight: false };
            }
            return {
                ...state,
                currentStep: action.nextStep,
                inFlight: false,
                retriedStep: undefined,
            };
        }

        case 'STEP_PARSE_FAILED': {
            if (action.policy === 'retry-once' && state.retriedStep !== state.currentStep) {
                return { ...state, inFlight: false, retriedStep: state.currentStep };
            }
            return { ...state, phase: 'failed', inFlight: false };
        }

        case 'EXECUTION_FAILED':
            return { ...state, phase: 'failed', inFlight: false };

        default:
            return state;
    }
}
