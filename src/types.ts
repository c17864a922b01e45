export const DAYS = ['H', 'K', 'SZE', 'CS', 'P'] as const;

export type Day = (typeof DAYS)[number];

export const DAY_LABELS: Record<Day, string> = {
    H: 'H',
    K: 'K',
    SZE: 'SZE',
    CS: 'CS',
    P: 'P',
};

export function isDay(value: string): value is Day {
    return (DAYS as readonly string[]).includes(value);
}

export interface TimeSlot {
    day: Day;
    startMin: number; // minutes from midnight
    endMin: number;
}

export interface Course {
    code: string;
    slots: TimeSlot[];
}

export interface Subject {
    name: string;
    code: string;
    credits: number;
    courses: Course[];
}

export interface Timetable {
    source: string;
    subjects: Subject[];
}

/** subject code -> course code */
export type Selection = Record<string, string>;

export interface TimeBounds {
    startMin: number;
    endMin: number;
}
