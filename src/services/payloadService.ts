import type { TimetableConfig } from '../server/config.js';
import { timetablePayloadSchema } from '../schemas.js';
import type { CourseBlock, TimetablePayload } from '../schemas.js';
import { DAYS, DAY_LABELS } from '../types.js';
import type { Selection, Timetable } from '../types.js';
import { paletteColor } from '../utils/colors.js';
import { formatSlot } from '../utils/dates.js';
import { computeGridRange, computeTimeBounds } from '../utils/layout.js';

export function courseId(subjectCode: string, courseCode: string, index: number) {
    return `${subjectCode}__${courseCode}__${index}`;
}

/**
 * One block per time slot, sorted for deterministic rendering
 */
export function buildCourseBlocks(timetable: Timetable): CourseBlock[] {
    const blocks: CourseBlock[] = [];
    for (const subject of timetable.subjects) {
        subject.courses.forEach((course, index) => {
            const id = courseId(subject.code, course.code, index);
            course.slots.forEach((slot, slotIndex) => {
                blocks.push({
                    id: `${id}__${slotIndex}`,
                    courseId: id,
                    subjectCode: subject.code,
                    subjectName: subject.name,
                    subjectCredits: subject.credits,
                    courseCode: course.code,
                    day: slot.day,
                    startMin: slot.startMin,
                    endMin: slot.endMin,
                    timeStr: formatSlot(slot),
                });
            });
        });
    }
    return blocks.sort(
        (a, b) =>
            DAYS.indexOf(a.day) - DAYS.indexOf(b.day) ||
            a.startMin - b.startMin ||
            a.endMin - b.endMin ||
            a.subjectCode.localeCompare(b.subjectCode) ||
            a.courseCode.localeCompare(b.courseCode)
    );
}

export function buildPayload(
    timetable: Timetable,
    config: TimetableConfig,
    selection: Selection = {}
): TimetablePayload {
    const range = computeGridRange(computeTimeBounds(timetable), {
        stepMinutes: config.gridStepMinutes,
        earliestMin: config.earliestMin,
        latestMin: config.latestMin,
        defaultStartMin: config.defaultStartMin,
        defaultEndMin: config.defaultEndMin,
    });

    return timetablePayloadSchema.parse({
        meta: {
            title: config.title,
            source: timetable.source,
            startMin: range.startMin,
            endMin: range.endMin,
            days: DAYS.map((key) => ({ key, label: DAY_LABELS[key] })),
        },
        subjects: timetable.subjects.map((subject, i) => ({
            code: subject.code,
            name: subject.name,
            credits: subject.credits,
            color: paletteColor(config.palette, i),
            courses: subject.courses.map((c) => c.code),
        })),
        blocks: buildCourseBlocks(timetable),
        selection,
    });
}
