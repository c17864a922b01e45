import { forwardRef, useMemo } from 'react';
import type { CourseBlock, TimetablePayload } from '../schemas.js';
import type { Selection } from '../types.js';
import { calculateGridScale } from '../utils/layout.js';
import DayColumn from './DayColumn.js';
import TimeAxis from './TimeAxis.js';

const DAY_HEADER_PX = 36;
const BOTTOM_PAD_PX = 12;

export type TimetableProps = {
    payload: TimetablePayload;
    hiddenSubjects: ReadonlySet<string>;
    selection: Selection;
    onBlockClick: (block: CourseBlock) => void;
    exportMode?: boolean;
};

/**
 * Week grid: time axis plus one column per day. The forwarded ref points at
 * the element captured by the PNG export.
 */
const Timetable = forwardRef<HTMLDivElement, TimetableProps>(
    ({ payload, hiddenSubjects, selection, onBlockClick, exportMode = false }, ref) => {
        const { startMin: START_MIN, endMin: END_MIN } = payload.meta;
        const SCALE = calculateGridScale(END_MIN - START_MIN);

        const subjectColors = useMemo(
            () =>
                Object.fromEntries(payload.subjects.map((s) => [s.code, s.color])),
            [payload.subjects]
        );

        const byDay = useMemo(() => {
            const map = new Map<string, CourseBlock[]>();
            for (const b of payload.blocks) {
                if (hiddenSubjects.has(b.subjectCode)) continue;
                const list = map.get(b.day) ?? [];
                list.push(b);
                map.set(b.day, list);
            }
            return map;
        }, [payload.blocks, hiddenSubjects]);

        return (
            <div
                className="grid grid-cols-[64px_repeat(5,minmax(150px,1fr))] gap-1.5 rounded-xl bg-[#0b0e14] p-2"
                ref={ref}
            >
                <TimeAxis
                    START_MIN={START_MIN}
                    END_MIN={END_MIN}
                    SCALE={SCALE}
                    DAY_HEADER_PX={DAY_HEADER_PX}
                    BOTTOM_PAD_PX={BOTTOM_PAD_PX}
                />
                {payload.meta.days.map((d) => (
                    <DayColumn
                        key={d.key}
                        label={d.label}
                        items={byDay.get(d.key) ?? []}
                        START_MIN={START_MIN}
                        END_MIN={END_MIN}
                        SCALE={SCALE}
                        DAY_HEADER_PX={DAY_HEADER_PX}
                        BOTTOM_PAD_PX={BOTTOM_PAD_PX}
                        subjectColors={subjectColors}
                        selection={selection}
                        onBlockClick={onBlockClick}
                        exportMode={exportMode}
                    />
                ))}
            </div>
        );
    }
);

Timetable.displayName = 'Timetable';

export default Timetable;
