import { tmpdir } from 'os';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { AppError, CsvParseError } from '../server/errors.js';
import {
    loadTimetableFromCsv,
    parseSubjectRow,
    parseTimeSlot,
    parseTimetableCsv,
    readCsvRecords,
} from './csvService.js';

function parseError(text: string): CsvParseError {
    try {
        parseTimetableCsv(text);
    } catch (e) {
        if (e instanceof CsvParseError) return e;
        throw e;
    }
    throw new Error('expected a CsvParseError');
}

describe('readCsvRecords', () => {
    it('splits records and keeps the starting line of each', () => {
        expect(readCsvRecords('a,"x\ny",b\nc,d\n')).toEqual([
            { line: 1, cells: ['a', 'x\ny', 'b'] },
            { line: 3, cells: ['c', 'd'] },
        ]);
    });

    it('handles CRLF, doubled quotes and a missing final newline', () => {
        expect(readCsvRecords('a,"say ""hi"""\r\nc,d')).toEqual([
            { line: 1, cells: ['a', 'say "hi"'] },
            { line: 2, cells: ['c', 'd'] },
        ]);
    });

    it('strips a leading byte order mark', () => {
        expect(readCsvRecords('\uFEFFa,b')).toEqual([{ line: 1, cells: ['a', 'b'] }]);
    });

    it('rejects an unterminated quote', () => {
        expect(() => readCsvRecords('ok,1\n"abc,1,2\n', 'x.csv')).toThrow(
            'x.csv: row 2: unterminated quoted field'
        );
    });

    it('counts lone CR line breaks, inside quotes as well', () => {
        expect(readCsvRecords('"a\rb",x\rc,d')).toEqual([
            { line: 1, cells: ['a\rb', 'x'] },
            { line: 3, cells: ['c', 'd'] },
        ]);
    });

    it('keeps a quote that does not start a cell as text', () => {
        expect(readCsvRecords('Intro to "C" programming,S1\nScreen 12" lab,S2')).toEqual([
            { line: 1, cells: ['Intro to "C" programming', 'S1'] },
            { line: 2, cells: ['Screen 12" lab', 'S2'] },
        ]);
    });
});

describe('parseTimeSlot', () => {
    it('parses day and minute offsets', () => {
        expect(parseTimeSlot('CS:10:15-12:00')).toEqual({
            day: 'CS',
            startMin: 615,
            endMin: 720,
        });
    });

    it('accepts lower-case days and single-digit hours', () => {
        expect(parseTimeSlot(' sze:8:05-9:40 ')).toEqual({
            day: 'SZE',
            startMin: 485,
            endMin: 580,
        });
    });

    it('reports an unknown day', () => {
        expect(parseTimeSlot('X:10:00-11:00')).toBe(
            "invalid day 'X' in course time 'X:10:00-11:00' (expected one of H, K, SZE, CS, P)"
        );
    });

    it('reports malformed times', () => {
        expect(parseTimeSlot('H:1000-1100')).toBe(
            "malformed course time 'H:1000-1100' (expected DAY:HH:MM-HH:MM)"
        );
        expect(parseTimeSlot('H:10:00')).toBe(
            "malformed course time 'H:10:00' (expected DAY:HH:MM-HH:MM)"
        );
        expect(parseTimeSlot('H:10:75-11:00')).toBe(
            "malformed course time 'H:10:75-11:00' (expected DAY:HH:MM-HH:MM)"
        );
    });

    it('requires the start to come before the end', () => {
        expect(parseTimeSlot('K:12:00-10:00')).toBe(
            "course time 'K:12:00-10:00' ends before it starts"
        );
        expect(parseTimeSlot('K:12:00-12:00')).toBe(
            "course time 'K:12:00-12:00' ends before it starts"
        );
    });
});

describe('parseSubjectRow', () => {
    it('builds a subject with the exact code, credits and courses', () => {
        const subject = parseSubjectRow({
            line: 1,
            cells: [
                'Analysis I',
                'MAT101',
                '5',
                'A1',
                'H:08:00-09:30',
                'A2',
                'SZE:10:15-11:45',
                'A3',
                'CS:14:00-15:30',
            ],
        });
        expect(subject?.name).toBe('Analysis I');
        expect(subject?.code).toBe('MAT101');
        expect(subject?.credits).toBe(5);
        expect(subject?.courses.map((c) => c.code)).toEqual(['A1', 'A2', 'A3']);
        expect(subject?.courses[0].slots).toEqual([
            { day: 'H', startMin: 480, endMin: 570 },
        ]);
    });

    it('reads several slots from one time cell', () => {
        const subject = parseSubjectRow({
            line: 1,
            cells: ['Programming', 'INF102', '4', 'L1', 'K:10:15-12:00;CS:08:00-09:30'],
        });
        expect(subject?.courses[0].slots).toEqual([
            { day: 'K', startMin: 615, endMin: 720 },
            { day: 'CS', startMin: 480, endMin: 570 },
        ]);
    });

    it('skips fully blank course pairs', () => {
        const subject = parseSubjectRow({
            line: 1,
            cells: ['S', 'S1', '3', 'C1', 'H:08:00-09:00', '', '', ' ', ''],
        });
        expect(subject?.courses).toHaveLength(1);
    });

    it('returns null for blank rows', () => {
        expect(parseSubjectRow({ line: 4, cells: ['', ' ', ''] })).toBeNull();
    });
});

describe('parseTimetableCsv', () => {
    it('parses a file with quoted names, blank lines and a BOM', () => {
        const timetable = parseTimetableCsv(
            '\uFEFFAnalysis I,MAT101,5,A1,H:08:00-09:30\n\n,,\n"Technical English, intermediate",NYE201,2,G1,SZE:12:15-13:45\n',
            'plan.csv'
        );
        expect(timetable.source).toBe('plan.csv');
        expect(timetable.subjects.map((s) => s.code)).toEqual(['MAT101', 'NYE201']);
        expect(timetable.subjects[1].name).toBe('Technical English, intermediate');
    });

    it('names the row for an invalid day code', () => {
        const err = parseError('Ok,O1,1,C1,H:08:00-09:00\nBad,B1,2,X1,X:10:00-11:00\n');
        expect(err.row).toBe(2);
        expect(err.message).toBe(
            "csv: row 2: course 'X1': invalid day 'X' in course time 'X:10:00-11:00' (expected one of H, K, SZE, CS, P)"
        );
    });

    it('names the row for a malformed time', () => {
        const err = parseError('Bad,B1,2,X1,H:1000-1100\n');
        expect(err.row).toBe(1);
        expect(err.message).toContain("malformed course time 'H:1000-1100'");
    });

    it('rejects a course code without a time', () => {
        expect(parseError('S,S1,3,C1\n').message).toBe(
            "csv: row 1: mismatched course-code/time pair 1: course 'C1' has no time"
        );
    });

    it('rejects a time without a course code', () => {
        expect(parseError('S,S1,3,C1,H:08:00-09:00,,K:08:00-09:00\n').message).toBe(
            "csv: row 1: mismatched course-code/time pair 2: time 'K:08:00-09:00' has no course code"
        );
    });

    it('rejects non-numeric credits', () => {
        expect(parseError('S,S1,five,C1,H:08:00-09:00\n').message).toBe(
            "csv: row 1: credits must be a non-negative integer ('five')"
        );
    });

    it('rejects rows that are too short', () => {
        expect(parseError('S,S1\n').message).toBe(
            'csv: row 1: expected at least name, code and credits, got 2 column(s)'
        );
    });

    it('rejects duplicate subject and course codes', () => {
        const dupSubject = parseError(
            'A,S1,1,C1,H:08:00-09:00\nB,S1,1,C1,K:08:00-09:00\n'
        );
        expect(dupSubject.row).toBe(2);
        expect(dupSubject.message).toBe("csv: row 2: duplicate subject code 'S1'");

        expect(parseError('A,S1,1,C1,H:08:00-09:00,C1,K:08:00-09:00\n').message).toBe(
            "csv: row 1: duplicate course code 'C1' in subject 'S1'"
        );
    });

    it('keeps quotes inside unquoted subject names', () => {
        const timetable = parseTimetableCsv(
            'Intro to "C" programming,INF101,4,L1,H:08:00-09:30\nScreen 12" lab,LAB12,2,G1,K:10:00-11:00\n'
        );
        expect(timetable.subjects.map((s) => s.name)).toEqual([
            'Intro to "C" programming',
            'Screen 12" lab',
        ]);
        expect(timetable.subjects[1].courses[0].code).toBe('G1');
    });
});

describe('loadTimetableFromCsv', () => {
    it('reports an unreadable file as an AppError', async () => {
        const missing = path.join(tmpdir(), 'timetable-missing-dir', 'missing.csv');
        const err = await loadTimetableFromCsv(missing).catch((e: unknown) => e);
        expect(err).toBeInstanceOf(AppError);
        expect(err).not.toBeInstanceOf(CsvParseError);
        expect(err).toHaveProperty('exitCode', 1);
        expect(err).toHaveProperty('message', expect.stringMatching(/^Cannot read .*missing\.csv: ENOENT/));
    });
});
