import type { FC } from 'react';
import type { SubjectView } from '../schemas.js';
import type { Selection } from '../types.js';

type SubjectListProps = {
    subjects: SubjectView[];
    hiddenSubjects: ReadonlySet<string>;
    selection: Selection;
    onToggleVisible: (code: string, visible: boolean) => void;
};

const SubjectList: FC<SubjectListProps> = ({
    subjects,
    hiddenSubjects,
    selection,
    onToggleVisible,
}) => {
    if (subjects.length === 0) {
        return <p className="text-xs text-slate-400">No subjects in this file.</p>;
    }
    return (
        <ul className="m-0 list-none space-y-2.5 p-0">
            {subjects.map((sub) => {
                const chosen = Object.hasOwn(selection, sub.code)
                    ? selection[sub.code]
                    : null;
                return (
                    <li
                        key={sub.code}
                        className="grid grid-cols-[18px_1fr] gap-2.5 rounded-[10px] border border-white/10 bg-white/[0.03] p-2.5"
                    >
                        <span
                            className="mt-[3px] h-3.5 w-3.5 rounded border border-white/25"
                            style={{ background: sub.color }}
                        />
                        <label className="flex cursor-pointer items-start gap-2">
                            <input
                                type="checkbox"
                                checked={!hiddenSubjects.has(sub.code)}
                                onChange={(e) =>
                                    onToggleVisible(sub.code, e.target.checked)
                                }
                            />
                            <span>
                                <span className="block font-semibold">{sub.name}</span>
                                <span className="block text-xs text-slate-400">
                                    {sub.code} · {sub.credits} credits ·{' '}
                                    {sub.courses.length} section
                                    {sub.courses.length === 1 ? '' : 's'}
                                </span>
                                <span className="block text-xs text-slate-400">
                                    {chosen ? `Selected: ${chosen}` : 'Nothing selected'}
                                </span>
                            </span>
                        </label>
                    </li>
                );
            })}
        </ul>
    );
};

export default SubjectList;
