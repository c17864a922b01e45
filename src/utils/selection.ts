import { SelectionError } from '../server/errors.js';
import type { Selection, Timetable } from '../types.js';

export const SELECTION_HASH_KEY = 'sel';

/**
 * Prototype-free map, so any subject code (`__proto__` included) is stored
 * as an ordinary key.
 */
export function emptySelection(): Selection {
    return Object.create(null);
}

/**
 * Select `courseCode` for `subjectCode`, replacing any other course of the
 * same subject. Toggling the course that is already selected clears it.
 */
export function toggleCourse(
    selection: Selection,
    subjectCode: string,
    courseCode: string
): Selection {
    const next = Object.assign(emptySelection(), selection);
    if (Object.hasOwn(next, subjectCode) && next[subjectCode] === courseCode) {
        delete next[subjectCode];
        return next;
    }
    next[subjectCode] = courseCode;
    return next;
}

/**
 * Text form used in the page URL and on the command line:
 * `SUBJ:COURSE,SUBJ2:COURSE2`, each component URI-encoded.
 */
export function encodeSelection(selection: Selection): string {
    return Object.entries(selection)
        .map(
            ([subject, course]) =>
                `${encodeURIComponent(subject)}:${encodeURIComponent(course)}`
        )
        .join(',');
}

export function decodeSelection(text: string): Selection {
    const selection = emptySelection();
    for (const part of text.split(',')) {
        const entry = part.trim();
        if (!entry) continue;
        const sep = entry.indexOf(':');
        if (sep <= 0 || sep === entry.length - 1) {
            throw new SelectionError(
                `Invalid selection entry '${entry}' (expected SUBJECT:COURSE)`
            );
        }
        let subject: string;
        let course: string;
        try {
            subject = decodeURIComponent(entry.slice(0, sep));
            course = decodeURIComponent(entry.slice(sep + 1));
        } catch {
            throw new SelectionError(`Invalid encoding in selection entry '${entry}'`);
        }
        if (Object.hasOwn(selection, subject)) {
            throw new SelectionError(`Subject '${subject}' is selected twice`);
        }
        selection[subject] = course;
    }
    return selection;
}

/**
 * Check every entry against the timetable; unknown subjects or courses are
 * rejected. Returns a copy ordered like the timetable's subjects.
 */
export function resolveSelection(
    timetable: Timetable,
    selection: Selection
): Selection {
    const resolved = emptySelection();
    for (const subjectCode of Object.keys(selection)) {
        if (!timetable.subjects.some((s) => s.code === subjectCode)) {
            throw new SelectionError(`Unknown subject '${subjectCode}' in selection`);
        }
    }
    for (const subject of timetable.subjects) {
        if (!Object.hasOwn(selection, subject.code)) continue;
        const courseCode = selection[subject.code];
        if (!subject.courses.some((c) => c.code === courseCode)) {
            throw new SelectionError(
                `Unknown course '${courseCode}' for subject '${subject.code}'`
            );
        }
        resolved[subject.code] = courseCode;
    }
    return resolved;
}

export function selectedCredits(timetable: Timetable, selection: Selection) {
    return timetable.subjects
        .filter((s) => Object.hasOwn(selection, s.code))
        .reduce((sum, s) => sum + s.credits, 0);
}

export function readSelectionFromHash(hash: string): Selection | null {
    // Components are already URI-encoded, so the raw value is read without
    // another round of decoding
    const prefix = `${SELECTION_HASH_KEY}=`;
    const entry = hash
        .replace(/^#/, '')
        .split('&')
        .find((part) => part.startsWith(prefix));
    if (entry === undefined) return null;
    return decodeSelection(entry.slice(prefix.length));
}

export function selectionToHash(selection: Selection): string {
    const encoded = encodeSelection(selection);
    return encoded ? `#${SELECTION_HASH_KEY}=${encoded}` : '';
}

/** Page URL with the selection in its hash; an empty selection drops the hash */
export function selectionUrl(pathname: string, search: string, selection: Selection) {
    return `${pathname}${search}${selectionToHash(selection)}`;
}

/**
 * Starting selection for the page: the URL hash wins over the embedded one.
 * Entries that no longer match a subject or course are dropped.
 */
export function initialSelection(
    subjects: ReadonlyArray<{ code: string; courses: string[] }>,
    embedded: Selection,
    hash: string
): Selection {
    let fromHash: Selection | null = null;
    try {
        fromHash = readSelectionFromHash(hash);
    } catch (e) {
        if (!(e instanceof SelectionError)) throw e;
        console.warn('[selection] ignoring malformed URL hash:', e.message);
    }
    const source = fromHash ?? embedded;
    const result = emptySelection();
    for (const subject of subjects) {
        if (!Object.hasOwn(source, subject.code)) continue;
        const course = source[subject.code];
        if (subject.courses.includes(course)) result[subject.code] = course;
    }
    return result;
}
