import type { TimeSlot } from '../types.js';

export function pad(n: number) {
    return n < 10 ? `0${n}` : String(n);
}

export function fmtHM(totalMin: number) {
    const h = Math.floor(totalMin / 60);
    const m = totalMin % 60;
    return `${pad(h)}:${pad(m)}`;
}

/**
 * Parse "HH:MM" (one or two hour digits) into minutes from midnight.
 * Returns null when the text is not a valid clock time. "24:00" is only
 * accepted when `allowEndOfDay` is set.
 */
export function parseHM(value: string, allowEndOfDay = false): number | null {
    const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
    if (!match) return null;
    const h = Number(match[1]);
    const m = Number(match[2]);
    if (m > 59) return null;
    if (h === 24 && m === 0 && allowEndOfDay) return 24 * 60;
    if (h > 23) return null;
    return h * 60 + m;
}

export function formatSlot(slot: TimeSlot) {
    return `${slot.day}:${fmtHM(slot.startMin)}-${fmtHM(slot.endMin)}`;
}

export function formatRange(startMin: number, endMin: number) {
    return `${fmtHM(startMin)}–${fmtHM(endMin)}`;
}

export function hourMarks(startMin: number, endMin: number) {
    const marks: Array<{ min: number; label: string }> = [];
    let m = Math.ceil(startMin / 60) * 60;
    for (; m <= endMin; m += 60) marks.push({ min: m, label: fmtHM(m) });
    return marks;
}

export function clamp(v: number, a: number, b: number) {
    return Math.max(a, Math.min(b, v));
}
