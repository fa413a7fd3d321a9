/**
 * EVAL: Step Sequence Validation
 * Compares the step ids a run executed with the sequence an eval case expects.
 *
 * Rules:
 * 1. No expected steps: passes (validation is opt-in per case)
 * 2. Empty expected steps: fails
 * 3. Order matters, every position must match exactly
 * 4. Extra steps fail
 * 5. Stopping early is allowed when the last executed step is a valid final step
 */

import { DEFAULT_FINAL_STEPS } from '../core/config';

export interface StepValidationResult {
    passed: boolean;
    failures: string[];
    expectedSteps: string[];
    actualSteps: string[];
    stepDiff: string;
}

const ARROW = ' → ';

export function validateStepSequence(
    expectedSteps: string[] | undefined,
    actualSteps: string[],
    finalSteps: readonly string[] = DEFAULT_FINAL_STEPS
): StepValidationResult {
    if (expectedSteps === undefined) {
        return {
            passed: true,
            failures: [],
            expectedSteps: [],
            actualSteps,
            stepDiff: 'Step validation not enabled for this test case',
        };
    }

    if (expectedSteps.length === 0) {
        return {
            passed: false,
            failures: ['Expected steps cannot be empty when step validation is enabled'],
            expectedSteps: [],
            actualSteps,
            stepDiff: '',
        };
    }

    const failures: string[] = [];

    if (actualSteps.length > expectedSteps.length) {
        failures.push(`Too many steps executed: expected ${expectedSteps.length}, got ${actualSteps.length}`);
        failures.push(`Unexpected steps: ${actualSteps.slice(expectedSteps.length).join(', ')}`);
    }

    for (let i = 0; i < expectedSteps.length; i++) {
        if (i >= actualSteps.length) {
            const lastActual = actualSteps[actualSteps.length - 1];
            if (lastActual === undefined || !finalSteps.includes(lastActual)) {
                failures.push(
                    `Missing steps: expected ${expectedSteps.slice(i).join(', ')}, workflow ended at '${lastActual ?? 'none'}'`
                );
            }
            break;
        }

        if (actualSteps[i] !== expectedSteps[i]) {
            failures.push(`Step ${i + 1} mismatch: expected '${expectedSteps[i]}', got '${actualSteps[i]}'`);
        }
    }

    return {
        passed: failures.length === 0,
        failures,
        expectedSteps,
        actualSteps,
        stepDiff: buildStepDiff(expectedSteps, actualSteps),
    };
}

/**
 * Expected: a → b → c
 * Actual:   a → x
 *               ^ mismatch
 */
export function buildStepDiff(expected: string[], actual: string[]): string {
    if (expected.length === 0 && actual.length === 0) {
        return 'No steps';
    }

    const lines = [
        `Expected: ${expected.length ? expected.join(ARROW) : '(none)'}`,
        `Actual:   ${actual.length ? actual.join(ARROW) : '(none)'}`,
    ];

    const shared = Math.min(expected.length, actual.length);
    const mismatch = Array.from({ length: shared }, (_, i) => i).find(i => expected[i] !== actual[i]);
    if (mismatch !== undefined) {
        const prefix = ' '.repeat('Actual:   '.length + actual.slice(0, mismatch).map(step => step + ARROW).join('').length);
        lines.push(`${prefix}${'^'.repeat(actual[mismatch].length)} mismatch`);
    }

    return lines.join('\n');
}

export function formatStepValidationFailure(result: StepValidationResult): string {
    if (result.passed) {
        return '';
    }

    return [
        'Step validation failed:',
        '',
        result.stepDiff,
        '',
        ...result.failures.map(failure => `  • ${failure}`),
    ].join('\n');
}
