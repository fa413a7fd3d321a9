/**
 * EVAL: Suite Runner
 * Runs each case against scripted replies and checks status, serial and step sequence.
 */

import { createStepContext } from '../core/context';
import { WorkflowConfig } from '../core/config';
import { InstructionStore } from '../core/instruction-store';
import { WorkflowLogger } from '../core/logger';
import { OrchestrationResult, traceStepIds } from '../core/models';
import { PromptRenderer } from '../core/prompt-manager';
import { ScriptedReasoningClient } from '../shell/reasoning-client';
import { createRunner } from '../shell/runner';
import { EvalCase } from './cases';
import { StepValidationResult, validateStepSequence } from './step-validator';

export interface EvalDeps {
    config: WorkflowConfig;
    instructions: InstructionStore;
    renderer: PromptRenderer;
    logger?: WorkflowLogger;
}

export interface EvalResult {
    caseId: string;
    passed: boolean;
    failures: string[];
    validation: StepValidationResult;
    run: OrchestrationResult;
}

export interface EvalSummary {
    results: EvalResult[];
    passed: number;
    total: number;
    /** Percentage, 0-100. */
    passRate: number;
    meetsThreshold: boolean;
}

export async function runEvalCase(evalCase: EvalCase, deps: EvalDeps): Promise<EvalResult> {
    const runner = createRunner(deps.config, {
        instructions: deps.instructions,
        client: new ScriptedReasoningClient(evalCase.responses),
        renderer: deps.renderer,
        logger: deps.logger,
    });

    const run = await runner.run({
        entryStep: evalCase.entryStep,
        context: createStepContext({ emailId: evalCase.email.id, emailContent: evalCase.email.content }),
    });

    const validation = validateStepSequence(evalCase.expectedSteps, traceStepIds(run), deps.config.eval.finalSteps);
    const failures = [...validation.failures];

    if (evalCase.expectedStatus && run.status !== evalCase.expectedStatus) {
        failures.push(`Status mismatch: expected '${evalCase.expectedStatus}', got '${run.status}'`);
    }
    if (evalCase.expectedSerial !== undefined && run.context.serialNumber !== evalCase.expectedSerial) {
        failures.push(`Serial mismatch: expected '${evalCase.expectedSerial}', got '${run.context.serialNumber ?? 'none'}'`);
    }

    return {
        caseId: evalCase.id,
        passed: failures.length === 0,
        failures,
        validation,
        run,
    };
}

export async function runEvalSuite(cases: EvalCase[], deps: EvalDeps): Promise<EvalSummary> {
    const results: EvalResult[] = [];
    // Sequential: keeps log output per case readable
    for (const evalCase of cases) {
        results.push(await runEvalCase(evalCase, deps));
    }

    const passed = results.filter(r => r.passed).length;
    const total = results.length;
    const passRate = total === 0 ? 0 : (passed / total) * 100;

    return {
        results,
        passed,
        total,
        passRate,
        meetsThreshold: total > 0 && passRate >= deps.config.eval.passThreshold,
    };
}

export function formatEvalResult(result: EvalResult): string {
    const status = result.passed ? '✓' : '✗';
    const line = `${status} ${result.caseId} [${result.run.status}] ${traceStepIds(result.run).join(' → ') || '(no steps)'}`;
    if (result.passed) return line;
    return [line, ...result.failures.map(f => `    • ${f}`)].join('\n');
}
