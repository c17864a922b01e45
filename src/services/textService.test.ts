import { describe, expect, it } from 'vitest';
import { parseTimetableCsv } from './csvService.js';
import { formatTimetable } from './textService.js';

const timetable = parseTimetableCsv(
    'Analysis I,MAT101,5,A1,H:08:00-09:30,A2,SZE:10:15-11:45\nPhysics,FIZ110,3,E1,H:08:30-10:00;CS:14:00-15:30\n'
);

describe('formatTimetable', () => {
    it('prints every subject and course', () => {
        expect(formatTimetable(timetable)).toBe(
            [
                'Subject: Analysis I (MAT101, 5 credits)',
                'Course A1 at H:08:00-09:30',
                'Course A2 at SZE:10:15-11:45',
                'Subject: Physics (FIZ110, 3 credits)',
                'Course E1 at H:08:30-10:00; CS:14:00-15:30',
            ].join('\n')
        );
    });

    it('marks the selected courses and totals their credits', () => {
        const lines = formatTimetable(timetable, { MAT101: 'A2' }).split('\n');
        expect(lines[1]).toBe('Course A1 at H:08:00-09:30');
        expect(lines[2]).toBe('Course A2 at SZE:10:15-11:45 [selected]');
        expect(lines[lines.length - 1]).toBe('Selected credits: 5');
    });
});
