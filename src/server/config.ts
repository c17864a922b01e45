import { z } from 'zod';
import { parseHM } from '../utils/dates.js';
import { ConfigError } from './errors.js';

export const DEFAULT_PALETTE = [
    '#4E79A7',
    '#F28E2B',
    '#E15759',
    '#76B7B2',
    '#59A14F',
    '#EDC948',
    '#B07AA1',
    '#FF9DA7',
    '#9C755F',
    '#BAB0AC',
];

export interface TimetableConfig {
    title: string;
    gridStepMinutes: number;
    earliestMin: number;
    latestMin: number;
    defaultStartMin: number;
    defaultEndMin: number;
    palette: string[];
}

const clockTime = (fallback: string) =>
    z
        .string()
        .default(fallback)
        .transform((value, ctx) => {
            const minutes = parseHM(value, true);
            if (minutes === null) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `expected HH:MM, got '${value}'`,
                });
                return z.NEVER;
            }
            return minutes;
        });

const envSchema = z.object({
    TIMETABLE_TITLE: z.string().min(1).default('Weekly timetable'),
    TIMETABLE_GRID_STEP_MINUTES: z.coerce
        .number()
        .int()
        .min(5)
        .max(240)
        .default(60),
    TIMETABLE_EARLIEST: clockTime('06:00'),
    TIMETABLE_LATEST: clockTime('22:00'),
    TIMETABLE_DEFAULT_START: clockTime('08:00'),
    TIMETABLE_DEFAULT_END: clockTime('20:00'),
    TIMETABLE_PALETTE: z
        .string()
        .optional()
        .transform((value) =>
            value
                ? value
                      .split(',')
                      .map((c) => c.trim())
                      .filter(Boolean)
                : DEFAULT_PALETTE
        )
        .pipe(
            z
                .array(
                    z
                        .string()
                        .regex(/^#[0-9A-Fa-f]{6}$/, 'Invalid hex color format')
                )
                .min(1)
        ),
});

/**
 * Read the timetable settings from the environment. Callers load `.env`
 * (dotenv) before calling this; unset variables fall back to defaults.
 */
export function loadConfig(
    env: Record<string, string | undefined> = process.env
): TimetableConfig {
    // Empty strings count as unset so a blank line in .env keeps the default
    const cleaned = Object.fromEntries(
        Object.entries(env).filter(
            ([key, value]) => key.startsWith('TIMETABLE_') && value !== ''
        )
    );
    const parsed = envSchema.safeParse(cleaned);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((i) => `${i.path.join('.')}: ${i.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration: ${issues}`);
    }
    const e = parsed.data;
    if (e.TIMETABLE_EARLIEST >= e.TIMETABLE_LATEST) {
        throw new ConfigError(
            'Invalid configuration: TIMETABLE_EARLIEST must be before TIMETABLE_LATEST'
        );
    }
    if (e.TIMETABLE_DEFAULT_START >= e.TIMETABLE_DEFAULT_END) {
        throw new ConfigError(
            'Invalid configuration: TIMETABLE_DEFAULT_START must be before TIMETABLE_DEFAULT_END'
        );
    }
    return {
        title: e.TIMETABLE_TITLE,
        gridStepMinutes: e.TIMETABLE_GRID_STEP_MINUTES,
        earliestMin: e.TIMETABLE_EARLIEST,
        latestMin: e.TIMETABLE_LATEST,
        defaultStartMin: e.TIMETABLE_DEFAULT_START,
        defaultEndMin: e.TIMETABLE_DEFAULT_END,
        palette: e.TIMETABLE_PALETTE,
    };
}
