import type { Subject, TimeBounds, TimeSlot, Timetable } from '../types.js';
import { clamp } from './dates.js';

/**
 * Exact vertical extent of the timetable: earliest start to latest end over
 * every slot. Null when there is nothing to place.
 */
export function computeTimeBounds(
    source: Timetable | Subject[] | TimeSlot[]
): TimeBounds | null {
    const slots = collectSlots(source);
    if (slots.length === 0) return null;
    let startMin = Infinity;
    let endMin = -Infinity;
    for (const s of slots) {
        startMin = Math.min(startMin, s.startMin);
        endMin = Math.max(endMin, s.endMin);
    }
    return { startMin, endMin };
}

function collectSlots(source: Timetable | Subject[] | TimeSlot[]): TimeSlot[] {
    const list = Array.isArray(source) ? source : source.subjects;
    const slots: TimeSlot[] = [];
    for (const entry of list) {
        if ('courses' in entry) {
            for (const course of entry.courses) slots.push(...course.slots);
        } else {
            slots.push(entry);
        }
    }
    return slots;
}

export interface GridRangeOptions {
    stepMinutes: number;
    earliestMin: number;
    latestMin: number;
    defaultStartMin: number;
    defaultEndMin: number;
}

/**
 * Display range of the grid: bounds padded out to whole steps and clamped
 * to the configured day window.
 */
export function computeGridRange(
    bounds: TimeBounds | null,
    opts: GridRangeOptions
): TimeBounds {
    if (!bounds) {
        return { startMin: opts.defaultStartMin, endMin: opts.defaultEndMin };
    }
    const step = opts.stepMinutes;
    let startMin = Math.floor(bounds.startMin / step) * step;
    let endMin = Math.ceil(bounds.endMin / step) * step;
    startMin = Math.max(opts.earliestMin, startMin);
    endMin = Math.min(opts.latestMin, endMin);
    if (endMin <= startMin) endMin = startMin + step;
    return { startMin, endMin };
}

export interface Timed {
    startMin: number;
    endMin: number;
}

/**
 * A positioned item in a day column
 */
export interface Block<T> {
    item: T;
    startMin: number;
    endMin: number;
    colIndex: number;
    colCount: number;
}

interface ClusterEvent<T> {
    item: T;
    startMin: number;
    endMin: number;
}

/**
 * Clamp items to the visible range and sort them by start, then end
 */
export function toEvents<T extends Timed>(
    items: T[],
    START_MIN: number,
    END_MIN: number
): ClusterEvent<T>[] {
    return items
        .map((item) => {
            const s = clamp(item.startMin, START_MIN, END_MIN);
            const e = Math.max(s, clamp(item.endMin, START_MIN, END_MIN));
            return { item, startMin: s, endMin: e };
        })
        .sort((a, b) => a.startMin - b.startMin || a.endMin - b.endMin);
}

/**
 * Group sorted events into runs that overlap transitively
 */
export function clusterOverlappingEvents<T>(
    events: ClusterEvent<T>[]
): Array<ClusterEvent<T>[]> {
    const clusters: Array<ClusterEvent<T>[]> = [];
    let current: ClusterEvent<T>[] = [];
    let curMaxEnd = -1;

    for (const ev of events) {
        if (current.length === 0 || ev.startMin < curMaxEnd) {
            current.push(ev);
            curMaxEnd = Math.max(curMaxEnd, ev.endMin);
        } else {
            clusters.push(current);
            current = [ev];
            curMaxEnd = ev.endMin;
        }
    }

    if (current.length) clusters.push(current);
    return clusters;
}

/**
 * Arrange events within a cluster into non-overlapping columns
 */
export function arrangeClusterIntoColumns<T>(cluster: ClusterEvent<T>[]): {
    blocks: Block<T>[];
    colCount: number;
} {
    const columnEnds: number[] = [];
    const placement: number[] = [];

    for (const ev of cluster) {
        let col = columnEnds.findIndex((end) => ev.startMin >= end);
        if (col === -1) {
            columnEnds.push(ev.endMin);
            col = columnEnds.length - 1;
        } else {
            columnEnds[col] = ev.endMin;
        }
        placement.push(col);
    }

    const colCount = Math.max(1, columnEnds.length);
    const blocks: Block<T>[] = cluster.map((ev, i) => ({
        item: ev.item,
        startMin: ev.startMin,
        endMin: ev.endMin,
        colIndex: placement[i],
        colCount,
    }));

    return { blocks, colCount };
}

/**
 * Layout for one day: clamp, cluster, then split each cluster into columns
 */
export function calculateBlockLayout<T extends Timed>(
    items: T[],
    START_MIN: number,
    END_MIN: number
): Block<T>[] {
    const events = toEvents(items, START_MIN, END_MIN);
    const allBlocks: Block<T>[] = [];
    for (const cluster of clusterOverlappingEvents(events)) {
        allBlocks.push(...arrangeClusterIntoColumns(cluster).blocks);
    }
    return allBlocks;
}

export const MIN_BLOCK_HEIGHT = 16;
const GAP_BUDGET = 2;

export interface BlockPosition {
    topPx: number;
    heightPx: number;
    widthPercent: number;
    leftPercent: number;
}

export function calculateBlockPosition<T>(
    block: Block<T>,
    START_MIN: number,
    SCALE: number
): BlockPosition {
    const topPx = (block.startMin - START_MIN) * SCALE;
    const endPx = (block.endMin - START_MIN) * SCALE;
    return {
        topPx,
        heightPx: Math.max(MIN_BLOCK_HEIGHT, endPx - topPx - GAP_BUDGET),
        widthPercent: (1 / block.colCount) * 100,
        leftPercent: (block.colIndex / block.colCount) * 100,
    };
}

/**
 * Pixels per minute so the grid lands near `targetHeight`, kept readable
 * for very short or very long days
 */
export function calculateGridScale(totalMinutes: number, targetHeight = 640): number {
    if (totalMinutes <= 0) return 1;
    return clamp(targetHeight / totalMinutes, 0.6, 2);
}
