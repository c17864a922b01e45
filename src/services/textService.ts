import type { Selection, Subject, Timetable } from '../types.js';
import { formatSlot } from '../utils/dates.js';
import { selectedCredits } from '../utils/selection.js';

function formatSubject(subject: Subject, selection?: Selection): string[] {
    const chosen =
        selection && Object.hasOwn(selection, subject.code)
            ? selection[subject.code]
            : undefined;
    const lines = [
        `Subject: ${subject.name} (${subject.code}, ${subject.credits} credits)`,
    ];
    for (const course of subject.courses) {
        const times = course.slots.map(formatSlot).join('; ');
        const mark = course.code === chosen ? ' [selected]' : '';
        lines.push(`Course ${course.code} at ${times}${mark}`);
    }
    return lines;
}

/**
 * Plain-text dump of a timetable. With a selection the chosen courses are
 * marked and the selected credit total is appended.
 */
export function formatTimetable(timetable: Timetable, selection?: Selection): string {
    const lines = timetable.subjects.flatMap((s) => formatSubject(s, selection));
    if (selection) {
        lines.push(`Selected credits: ${selectedCredits(timetable, selection)}`);
    }
    return lines.join('\n');
}
