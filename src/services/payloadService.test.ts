import { describe, expect, it } from 'vitest';
import { loadConfig } from '../server/config.js';
import { parseTimetableCsv } from './csvService.js';
import { buildPayload } from './payloadService.js';

const timetable = parseTimetableCsv(
    'Analysis I,MAT101,5,A1,H:08:00-09:30,A2,SZE:10:15-11:45\nPhysics,FIZ110,3,E1,H:08:30-10:00;CS:14:00-15:30\n',
    'sample.csv'
);

describe('buildPayload', () => {
    const payload = buildPayload(timetable, loadConfig({}), { MAT101: 'A2' });

    it('describes the grid range and the week', () => {
        expect(payload.meta).toEqual({
            title: 'Weekly timetable',
            source: 'sample.csv',
            startMin: 480,
            endMin: 960,
            days: [
                { key: 'H', label: 'H' },
                { key: 'K', label: 'K' },
                { key: 'SZE', label: 'SZE' },
                { key: 'CS', label: 'CS' },
                { key: 'P', label: 'P' },
            ],
        });
    });

    it('assigns palette colors in subject order', () => {
        expect(payload.subjects).toEqual([
            {
                code: 'MAT101',
                name: 'Analysis I',
                credits: 5,
                color: '#4E79A7',
                courses: ['A1', 'A2'],
            },
            {
                code: 'FIZ110',
                name: 'Physics',
                credits: 3,
                color: '#F28E2B',
                courses: ['E1'],
            },
        ]);
    });

    it('emits one block per slot sorted by day and time', () => {
        expect(payload.blocks.map((b) => b.id)).toEqual([
            'MAT101__A1__0__0',
            'FIZ110__E1__0__0',
            'MAT101__A2__1__0',
            'FIZ110__E1__0__1',
        ]);
        expect(payload.blocks[3]).toEqual({
            id: 'FIZ110__E1__0__1',
            courseId: 'FIZ110__E1__0',
            subjectCode: 'FIZ110',
            subjectName: 'Physics',
            subjectCredits: 3,
            courseCode: 'E1',
            day: 'CS',
            startMin: 840,
            endMin: 930,
            timeStr: 'CS:14:00-15:30',
        });
    });

    it('carries the initial selection', () => {
        expect(payload.selection).toEqual({ MAT101: 'A2' });
    });

    it('uses the default range for an empty timetable', () => {
        const empty = buildPayload({ source: 'empty.csv', subjects: [] }, loadConfig({}));
        expect([empty.meta.startMin, empty.meta.endMin]).toEqual([480, 1200]);
        expect(empty.blocks).toEqual([]);
    });
});
