import type { TimetablePayload } from '../schemas.js';
import type { Selection } from '../types.js';

export type Status = { text: string; danger: boolean };

export const NOTHING_TO_EXPORT: Status = {
    text: 'Nothing selected to export.',
    danger: true,
};

export function selectionSummary(payload: TimetablePayload, selection: Selection): string {
    const chosen = payload.subjects.filter((s) => Object.hasOwn(selection, s.code));
    const credits = chosen.reduce((sum, s) => sum + s.credits, 0);
    return `Selected classes: ${chosen.length}. Credits: ${credits}.`;
}

/** Text of the status bar: the last action's message, then the summary */
export function statusLine(status: Status | null, summary: string): string {
    return status ? `${status.text} ${summary}` : summary;
}
