import type { FC } from 'react';
import type { CourseBlock } from '../schemas.js';
import type { Selection } from '../types.js';
import { FALLBACK_SUBJECT_COLOR, getContrastTextColor } from '../utils/colors.js';
import { formatRange } from '../utils/dates.js';
import { calculateBlockLayout, calculateBlockPosition } from '../utils/layout.js';

export type DayColumnProps = {
    label: string;
    items: CourseBlock[];
    START_MIN: number;
    END_MIN: number;
    SCALE: number;
    DAY_HEADER_PX: number;
    BOTTOM_PAD_PX: number;
    subjectColors: Record<string, string>;
    selection: Selection;
    onBlockClick: (block: CourseBlock) => void;
    /** Lay out and draw only the selected sections, for the PNG export */
    exportMode?: boolean;
};

export function blockTooltip(b: CourseBlock): string {
    return [
        `(${b.courseCode}) ${b.subjectName}`,
        `(${b.subjectCode}) · ${b.subjectCredits} credits`,
        formatRange(b.startMin, b.endMin),
    ].join('\n');
}

const DayColumn: FC<DayColumnProps> = ({
    label,
    items,
    START_MIN,
    END_MIN,
    SCALE,
    DAY_HEADER_PX,
    BOTTOM_PAD_PX,
    subjectColors,
    selection,
    onBlockClick,
    exportMode = false,
}) => {
    const containerHeight =
        (END_MIN - START_MIN) * SCALE + BOTTOM_PAD_PX + DAY_HEADER_PX;
    // 30-minute grid lines
    const slotPx = 30 * SCALE;
    const isSelected = (c: CourseBlock) =>
        Object.hasOwn(selection, c.subjectCode) &&
        selection[c.subjectCode] === c.courseCode;
    // Columns are computed from what is drawn, so exported sections get the
    // full width their hidden neighbours would otherwise share
    const visible = exportMode ? items.filter(isSelected) : items;
    const blocks = calculateBlockLayout(visible, START_MIN, END_MIN);

    return (
        <div
            className="relative overflow-hidden rounded-xl border border-white/10 bg-white/[0.02]"
            style={{ height: containerHeight }}
        >
            <div
                className="flex items-center bg-white/[0.03] px-2.5 text-[13px] font-semibold"
                style={{ height: DAY_HEADER_PX }}
            >
                {label}
            </div>
            <div
                className="pointer-events-none absolute inset-x-0 bottom-0"
                style={{
                    top: DAY_HEADER_PX,
                    backgroundImage: `repeating-linear-gradient(to bottom, transparent, transparent ${
                        slotPx - 1
                    }px, rgba(255,255,255,0.08) ${slotPx - 1}px, rgba(255,255,255,0.08) ${slotPx}px)`,
                }}
            />
            {blocks.map((b) => {
                const c = b.item;
                const pos = calculateBlockPosition(b, START_MIN, SCALE);
                const selected = isSelected(c);
                const color = subjectColors[c.subjectCode] ?? FALLBACK_SUBJECT_COLOR;
                return (
                    <button
                        key={c.id}
                        type="button"
                        className={`course-block${
                            selected ? ' selected' : ''
                        } absolute flex cursor-pointer flex-col gap-0.5 overflow-hidden rounded-[10px] px-2 py-1.5 text-left text-xs ${
                            selected
                                ? `border-2 border-white/80 ${exportMode ? 'opacity-100' : 'opacity-95'}`
                                : 'border border-dashed border-white/30 opacity-[0.35] hover:opacity-60'
                        }`}
                        data-course-id={c.courseId}
                        title={blockTooltip(c)}
                        aria-pressed={selected}
                        onClick={() => onBlockClick(c)}
                        style={{
                            top: DAY_HEADER_PX + pos.topPx,
                            height: pos.heightPx,
                            left: `${pos.leftPercent}%`,
                            width: `${pos.widthPercent}%`,
                            background: color,
                            color: getContrastTextColor(color),
                        }}
                    >
                        <span className="truncate font-bold">
                            ({c.courseCode}) {c.subjectName}
                        </span>
                        <span className="truncate font-semibold">({c.subjectCode})</span>
                        <span className="truncate">
                            {formatRange(c.startMin, c.endMin)}
                        </span>
                    </button>
                );
            })}
        </div>
    );
};

export default DayColumn;
