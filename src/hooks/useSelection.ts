import { useCallback, useEffect, useState } from 'react';
import type { SubjectView } from '../schemas.js';
import type { Selection } from '../types.js';
import {
    emptySelection,
    initialSelection,
    selectionUrl,
    toggleCourse,
} from '../utils/selection.js';

/**
 * Selection state mirrored into the URL hash so a reload (or a shared
 * link) restores the chosen courses.
 */
export function useSelection(subjects: SubjectView[], embedded: Selection) {
    const [selection, setSelection] = useState<Selection>(() =>
        initialSelection(subjects, embedded, window.location.hash)
    );

    useEffect(() => {
        const { pathname, search } = window.location;
        window.history.replaceState(null, '', selectionUrl(pathname, search, selection));
    }, [selection]);

    const toggle = useCallback((subjectCode: string, courseCode: string) => {
        setSelection((prev) => toggleCourse(prev, subjectCode, courseCode));
    }, []);

    const clear = useCallback(() => setSelection(emptySelection()), []);

    return { selection, toggle, clear };
}
