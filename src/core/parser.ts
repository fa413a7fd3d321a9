/*
 * Parses the routing decision out of a free-text model reply.
 * Expected reply lines:
 * NEXT_STEP: <step-id | DONE>   (mandatory)
 * SERIAL: <serial number>
 * REASON: <short explanation>
 * WARRANTY: <lookup result>
 * TICKET: <ticket id>
 */

import type { StepFields } from './context';
import { TERMINAL_STEP, StepId } from './models';

export interface RoutingDecision {
    /** null when the reply has no usable NEXT_STEP line. Never guessed. */
    nextStep: StepId | null;
    fields: StepFields;
}

export interface RoutingParser {
    parse(text: string): RoutingDecision;
}

type Marker = 'next' | keyof StepFields;

const MARKERS: Array<[RegExp, Marker]> = [
    [/^NEXT[_ -]?STEP$/i, 'next'],
    [/^SERIAL(?:[_ -]?NUMBER)?$/i, 'serial'],
    [/^REASON$/i, 'reason'],
    [/^WARRANTY(?:[_ -]?STATUS)?$/i, 'warranty'],
    [/^TICKET(?:[_ -]?ID)?$/i, 'ticket'],
];

// Tolerates bullets and markdown emphasis: "- **NEXT_STEP:** 02-check-warranty"
const LINE_REGEX = /^\s*(?:[-*>]\s+)?(?:\*\*|__)?\s*([A-Za-z][A-Za-z _-]*?)\s*(?:\*\*|__)?\s*:\s*(?:\*\*|__)?\s*(.*?)\s*(?:\*\*|__)?\s*$/;

function markerFor(name: string): Marker | undefined {
    const match = MARKERS.find(([pattern]) => pattern.test(name));
    return match?.[1];
}

function normalizeStepId(value: string): string | null {
    const token = value.split(/\s+/)[0]?.replace(/^[`'"]+|[`'".,;]+$/g, '') ?? '';
    if (!token) return null;
    return token.toUpperCase() === TERMINAL_STEP ? TERMINAL_STEP : token;
}

export class MarkerRoutingParser implements RoutingParser {
    parse(text: string): RoutingDecision {
        const decision: RoutingDecision = { nextStep: null, fields: {} };
        let sawNext = false;

        for (const line of text.split(/\r?\n/)) {
            const match = line.match(LINE_REGEX);
            if (!match) continue;

            const marker = markerFor(match[1]);
            const value = match[2];
            if (!marker || !value) continue;

            if (marker === 'next') {
                // First NEXT_STEP wins
                if (sawNext) continue;
                const stepId = normalizeStepId(value);
                if (stepId) {
                    decision.nextStep = stepId;
                    sawNext = true;
                }
                continue;
            }

            if (decision.fields[marker] === undefined) {
                decision.fields[marker] = value;
            }
        }

        return decision;
    }
}
