import type { FC } from 'react';
import { hourMarks } from '../utils/dates.js';

type TimeAxisProps = {
    START_MIN: number;
    END_MIN: number;
    SCALE: number;
    DAY_HEADER_PX: number;
    BOTTOM_PAD_PX: number;
};

const TimeAxis: FC<TimeAxisProps> = ({
    START_MIN,
    END_MIN,
    SCALE,
    DAY_HEADER_PX,
    BOTTOM_PAD_PX,
}) => {
    const timesHeight = (END_MIN - START_MIN) * SCALE;
    return (
        <div
            className="relative"
            style={{ height: DAY_HEADER_PX + timesHeight + BOTTOM_PAD_PX }}
        >
            {hourMarks(START_MIN, END_MIN).map((m) => (
                <div
                    key={m.min}
                    className="absolute left-0 right-2 -translate-y-1/2 text-right text-[11px] text-slate-400"
                    style={{ top: DAY_HEADER_PX + (m.min - START_MIN) * SCALE }}
                >
                    {m.label}
                </div>
            ))}
        </div>
    );
};

export default TimeAxis;
