import { z } from 'zod';
import { DAYS } from './types.js';

export const daySchema = z.enum(DAYS);

export const subjectViewSchema = z.object({
    code: z.string().min(1),
    name: z.string(),
    credits: z.number().int().nonnegative(),
    color: z.string().regex(/^#[0-9A-Fa-f]{6}$/, 'Invalid hex color format'),
    courses: z.array(z.string().min(1)),
});

export const courseBlockSchema = z.object({
    id: z.string(),
    courseId: z.string(),
    subjectCode: z.string(),
    subjectName: z.string(),
    subjectCredits: z.number().int().nonnegative(),
    courseCode: z.string(),
    day: daySchema,
    startMin: z.number().int().nonnegative(),
    endMin: z.number().int().positive(),
    timeStr: z.string(),
});

export const timetablePayloadSchema = z.object({
    meta: z.object({
        title: z.string(),
        source: z.string(),
        startMin: z.number().int(),
        endMin: z.number().int(),
        days: z.array(z.object({ key: daySchema, label: z.string() })),
    }),
    subjects: z.array(subjectViewSchema),
    blocks: z.array(courseBlockSchema),
    selection: z.record(z.string()),
});

export type SubjectView = z.infer<typeof subjectViewSchema>;
export type CourseBlock = z.infer<typeof courseBlockSchema>;
export type TimetablePayload = z.infer<typeof timetablePayloadSchema>;
