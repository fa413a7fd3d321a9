/**
 * EVAL: Case Files
 * One JSON file per scenario: the email, the scripted model replies, and what the run should do.
 */

import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { WorkflowError, describeError } from '../core/errors';

export const EvalCaseSchema = z.object({
    id: z.string().min(1),
    description: z.string().default(''),
    email: z.object({
        id: z.string().min(1),
        content: z.string(),
    }),
    entryStep: z.string().min(1).optional(),
    responses: z.array(z.string()),
    expectedSteps: z.array(z.string()).optional(),
    expectedStatus: z.enum(['completed', 'circuit-broken', 'failed']).optional(),
    expectedSerial: z.string().optional(),
});

export type EvalCase = z.infer<typeof EvalCaseSchema>;

export function parseEvalCase(raw: unknown, source: string): EvalCase {
    const parsed = EvalCaseSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new WorkflowError(`Invalid eval case ${source}: ${issues}`, 'eval_invalid_case');
    }
    return parsed.data;
}

export async function loadEvalCases(dir: string): Promise<EvalCase[]> {
    if (!await fs.pathExists(dir)) {
        throw new WorkflowError(
            `Eval cases directory not found: ${dir}`,
            'eval_dir_not_found',
            'Point eval.casesDir at a directory of *.json cases.'
        );
    }

    const files = (await fs.readdir(dir)).filter(f => f.endsWith('.json')).sort();
    const cases: EvalCase[] = [];
    for (const file of files) {
        const filePath = path.join(dir, file);
        let raw: unknown;
        try {
            raw = await fs.readJson(filePath);
        } catch (error) {
            throw new WorkflowError(`Could not read eval case ${file}: ${describeError(error)}`, 'eval_invalid_case');
        }
        cases.push(parseEvalCase(raw, file));
    }
    return cases;
}
