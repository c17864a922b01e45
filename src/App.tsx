import { useCallback, useMemo, useRef, useState } from 'react';
import { flushSync } from 'react-dom';
import SubjectList from './components/SubjectList.js';
import Timetable from './components/Timetable.js';
import { useSelection } from './hooks/useSelection.js';
import type { CourseBlock, TimetablePayload } from './schemas.js';
import { formatRange } from './utils/dates.js';
import { captureElementToPng, downloadDataUrl } from './utils/exportPng.js';
import { exportFileName } from './utils/files.js';
import { encodeSelection } from './utils/selection.js';
import { NOTHING_TO_EXPORT, selectionSummary, statusLine } from './utils/status.js';
import type { Status } from './utils/status.js';

const BUTTON_CLASS =
    'rounded-lg border border-white/10 bg-white/[0.06] px-3 py-2 text-slate-200 hover:border-sky-400/50 disabled:cursor-default disabled:opacity-50';

export default function App({ payload }: { payload: TimetablePayload }) {
    const { selection, toggle, clear } = useSelection(
        payload.subjects,
        payload.selection
    );
    const [hiddenSubjects, setHiddenSubjects] = useState<Set<string>>(
        () => new Set()
    );
    const [status, setStatus] = useState<Status | null>(null);
    const [isExporting, setIsExporting] = useState(false);
    const gridRef = useRef<HTMLDivElement>(null);

    const summary = useMemo(
        () => selectionSummary(payload, selection),
        [payload, selection]
    );

    const onBlockClick = useCallback(
        (block: CourseBlock) => {
            const wasSelected = selection[block.subjectCode] === block.courseCode;
            toggle(block.subjectCode, block.courseCode);
            setStatus({
                text: `${wasSelected ? 'Deselected' : 'Selected'} ${block.subjectCode} / ${block.courseCode}.`,
                danger: false,
            });
        },
        [selection, toggle]
    );

    const onToggleVisible = useCallback((code: string, visible: boolean) => {
        setHiddenSubjects((prev) => {
            const next = new Set(prev);
            if (visible) next.delete(code);
            else next.add(code);
            return next;
        });
    }, []);

    const onClear = () => {
        clear();
        setStatus({ text: 'Cleared selection.', danger: false });
    };

    const onCopy = async () => {
        const code = encodeSelection(selection);
        if (!code) {
            setStatus({ text: 'Nothing selected to copy.', danger: true });
            return;
        }
        try {
            await navigator.clipboard.writeText(code);
            setStatus({ text: `Copied selection code: ${code}`, danger: false });
        } catch (e) {
            console.error('[clipboard] copy failed', e);
            setStatus({ text: `Selection code: ${code}`, danger: false });
        }
    };

    const onExport = async () => {
        if (Object.keys(selection).length === 0) {
            setStatus(NOTHING_TO_EXPORT);
            return;
        }
        const grid = gridRef.current;
        if (!grid || isExporting) return;
        // The grid must be laid out for export before html2canvas reads it
        flushSync(() => setIsExporting(true));
        try {
            const dataUrl = await captureElementToPng(grid);
            downloadDataUrl(dataUrl, exportFileName(payload.meta.source));
            setStatus({ text: 'Exported PNG.', danger: false });
        } catch (e) {
            console.error('[export] PNG export failed', e);
            setStatus({
                text: `Export failed: ${e instanceof Error ? e.message : String(e)}`,
                danger: true,
            });
        } finally {
            setIsExporting(false);
        }
    };

    return (
        <div className="grid h-screen grid-cols-[320px_1fr]">
            <aside className="overflow-auto border-r border-white/10 bg-gray-900 p-4">
                <p className="mb-3 text-xs leading-snug text-slate-400">
                    Toggle subjects to show/hide. Click a class block to select
                    it; one section per subject. Export saves your selected
                    schedule as a PNG.
                </p>
                <SubjectList
                    subjects={payload.subjects}
                    hiddenSubjects={hiddenSubjects}
                    selection={selection}
                    onToggleVisible={onToggleVisible}
                />
            </aside>
            <section className="grid grid-rows-[auto_1fr_auto] overflow-hidden">
                <div className="flex items-center gap-3 border-b border-white/10 bg-gray-900/65 px-4 py-3">
                    <div>
                        <div className="font-semibold">{payload.meta.title}</div>
                        <div className="text-xs text-slate-400">
                            {payload.meta.source} ·{' '}
                            {formatRange(payload.meta.startMin, payload.meta.endMin)}
                        </div>
                    </div>
                    <div className="flex-1" />
                    <button type="button" className={BUTTON_CLASS} onClick={onClear}>
                        Clear selection
                    </button>
                    <button
                        type="button"
                        className={BUTTON_CLASS}
                        onClick={() => void onCopy()}
                    >
                        Copy selection code
                    </button>
                    <button
                        type="button"
                        className={BUTTON_CLASS}
                        disabled={isExporting}
                        onClick={() => void onExport()}
                    >
                        {isExporting ? 'Exporting…' : 'Export PNG'}
                    </button>
                </div>
                <div className="overflow-auto p-4">
                    <Timetable
                        ref={gridRef}
                        payload={payload}
                        hiddenSubjects={hiddenSubjects}
                        selection={selection}
                        onBlockClick={onBlockClick}
                        exportMode={isExporting}
                    />
                </div>
                <div className="border-t border-white/10 px-4 py-2.5 text-xs text-slate-400">
                    <span className={status?.danger ? 'text-red-500' : undefined}>
                        {statusLine(status, summary)}
                    </span>
                </div>
            </section>
        </div>
    );
}
