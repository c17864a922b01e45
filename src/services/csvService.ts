import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { AppError, CsvParseError } from '../server/errors.js';
import { DAYS, isDay } from '../types.js';
import type { Course, Subject, Timetable, TimeSlot } from '../types.js';
import { parseHM } from '../utils/dates.js';

// Row layout:
// <Subject_name>,<subject_code>,<Credits>,<Course_code_1>,<Course_time_1>,<Course_code_2>,<Course_time_2>,...
// Course time: "CS:10:15-12:00", several slots separated by ';'

export interface CsvRecord {
    line: number;
    cells: string[];
}

/**
 * Split CSV text into records. Quoted fields may contain commas, doubled
 * quotes and line breaks; `line` is where the record starts. A quote only
 * opens a quoted field as the first character of a cell, elsewhere it is
 * kept as text.
 */
export function readCsvRecords(text: string, source = 'csv'): CsvRecord[] {
    const input = text.startsWith('\uFEFF') ? text.slice(1) : text;
    const records: CsvRecord[] = [];
    let cells: string[] = [];
    let field = '';
    let inQuotes = false;
    let line = 1;
    let recordLine = 1;
    let quoteLine = 1;
    let atCellStart = true;

    const endRecord = () => {
        cells.push(field);
        records.push({ line: recordLine, cells });
        cells = [];
        field = '';
        atCellStart = true;
    };

    for (let i = 0; i < input.length; i++) {
        const ch = input[i];
        if (inQuotes) {
            if (ch === '"') {
                if (input[i + 1] === '"') {
                    field += '"';
                    i++;
                } else {
                    inQuotes = false;
                }
            } else {
                // a lone CR is a line break too; CRLF counts once, at the LF
                if (ch === '\n' || (ch === '\r' && input[i + 1] !== '\n')) line++;
                field += ch;
            }
            continue;
        }
        if (ch === '"' && atCellStart) {
            inQuotes = true;
            quoteLine = line;
            atCellStart = false;
        } else if (ch === ',') {
            cells.push(field);
            field = '';
            atCellStart = true;
        } else if (ch === '\r' || ch === '\n') {
            if (ch === '\r' && input[i + 1] === '\n') i++;
            endRecord();
            line++;
            recordLine = line;
        } else {
            field += ch;
            atCellStart = false;
        }
    }
    if (inQuotes) {
        throw new CsvParseError(source, quoteLine, 'unterminated quoted field');
    }
    if (field !== '' || cells.length > 0) endRecord();
    return records;
}

const TIME_SLOT_RE = /^([^:]+):(.+)-(.+)$/;

/**
 * Parse one slot such as "CS:10:15-12:00". Returns the reason as a string
 * when the value is malformed.
 */
export function parseTimeSlot(value: string): TimeSlot | string {
    const trimmed = value.trim();
    const match = TIME_SLOT_RE.exec(trimmed);
    if (!match) {
        return `malformed course time '${trimmed}' (expected DAY:HH:MM-HH:MM)`;
    }
    const day = match[1].trim().toUpperCase();
    if (!isDay(day)) {
        return `invalid day '${match[1].trim()}' in course time '${trimmed}' (expected one of ${DAYS.join(', ')})`;
    }
    const startMin = parseHM(match[2]);
    const endMin = parseHM(match[3], true);
    if (startMin === null || endMin === null) {
        return `malformed course time '${trimmed}' (expected DAY:HH:MM-HH:MM)`;
    }
    if (startMin >= endMin) {
        return `course time '${trimmed}' ends before it starts`;
    }
    return { day, startMin, endMin };
}

const subjectHeaderSchema = z.object({
    name: z.string().trim().min(1, 'subject name is empty'),
    code: z.string().trim().min(1, 'subject code is empty'),
    credits: z
        .string()
        .trim()
        .regex(/^\d+$/, 'credits must be a non-negative integer')
        .transform(Number),
});

function isBlankRecord(record: CsvRecord) {
    return record.cells.every((cell) => cell.trim() === '');
}

/**
 * Turn one CSV record into a Subject. Returns null for blank rows.
 */
export function parseSubjectRow(
    record: CsvRecord,
    source = 'csv'
): Subject | null {
    if (isBlankRecord(record)) return null;
    const fail = (detail: string): never => {
        throw new CsvParseError(source, record.line, detail);
    };
    const { cells } = record;
    if (cells.length < 3) {
        fail(
            `expected at least name, code and credits, got ${cells.length} column(s)`
        );
    }

    const header = subjectHeaderSchema.safeParse({
        name: cells[0],
        code: cells[1],
        credits: cells[2],
    });
    if (!header.success) {
        const issue = header.error.issues[0];
        const shown =
            issue.path[0] === 'credits' ? ` ('${cells[2].trim()}')` : '';
        return fail(`${issue.message}${shown}`);
    }

    const courses: Course[] = [];
    for (let i = 3; i < cells.length; i += 2) {
        const code = cells[i].trim();
        const time = i + 1 < cells.length ? cells[i + 1].trim() : '';
        if (!code && !time) continue;
        const pairNo = (i - 3) / 2 + 1;
        if (!code || !time) {
            fail(
                `mismatched course-code/time pair ${pairNo}: ` +
                    (code
                        ? `course '${code}' has no time`
                        : `time '${time}' has no course code`)
            );
        }
        if (courses.some((c) => c.code === code)) {
            fail(`duplicate course code '${code}' in subject '${header.data.code}'`);
        }
        const slots: TimeSlot[] = [];
        for (const part of time.split(';')) {
            if (!part.trim()) continue;
            const slot = parseTimeSlot(part);
            if (typeof slot === 'string') fail(`course '${code}': ${slot}`);
            else slots.push(slot);
        }
        if (slots.length === 0) {
            fail(`course '${code}' has no time`);
        }
        courses.push({ code, slots });
    }

    return { ...header.data, courses };
}

export function parseTimetableCsv(text: string, source = 'csv'): Timetable {
    const subjects: Subject[] = [];
    const seen = new Set<string>();
    for (const record of readCsvRecords(text, source)) {
        const subject = parseSubjectRow(record, source);
        if (!subject) continue;
        if (seen.has(subject.code)) {
            throw new CsvParseError(
                source,
                record.line,
                `duplicate subject code '${subject.code}'`
            );
        }
        seen.add(subject.code);
        subjects.push(subject);
    }
    return { source, subjects };
}

export async function loadTimetableFromCsv(filePath: string): Promise<Timetable> {
    let text: string;
    try {
        text = await readFile(filePath, 'utf-8');
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new AppError(`Cannot read ${filePath}: ${reason}`, 1, 'READ_FAILED');
    }
    return parseTimetableCsv(text, path.basename(filePath));
}
