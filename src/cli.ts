import { parseArgs } from 'util';
import { loadConfig } from './server/config.js';
import { AppError, UsageError } from './server/errors.js';
import { loadTimetableFromCsv } from './services/csvService.js';
import { generateHtml } from './services/htmlService.js';
import type { ClientAssets } from './services/htmlService.js';
import { formatTimetable } from './services/textService.js';
import { decodeSelection, resolveSelection } from './utils/selection.js';

export const RENDER_USAGE =
    'Usage: timetable-render --csv <path> --out <path> [--select SUBJ:COURSE,...]';
export const PRINT_USAGE =
    'Usage: timetable-print --csv <path> [--select SUBJ:COURSE,...]';

interface CliArgs {
    csv: string;
    out?: string;
    select?: string;
}

function readArgs(argv: string[], needsOut: boolean): CliArgs {
    let values: { csv?: string; out?: string; select?: string };
    try {
        ({ values } = parseArgs({
            args: argv,
            options: {
                csv: { type: 'string' },
                out: { type: 'string' },
                select: { type: 'string' },
            },
            allowPositionals: false,
            strict: true,
        }));
    } catch (e) {
        throw new UsageError(e instanceof Error ? e.message : String(e));
    }
    if (!values.csv) throw new UsageError('Missing required option --csv');
    if (needsOut && !values.out) throw new UsageError('Missing required option --out');
    if (!needsOut && values.out !== undefined) {
        throw new UsageError('Unknown option --out');
    }
    return { csv: values.csv, out: values.out, select: values.select };
}

function reportError(tag: string, usage: string, e: unknown): number {
    if (e instanceof UsageError) {
        console.error(`[${tag}] ${e.message}`);
        console.error(usage);
        return e.exitCode;
    }
    if (e instanceof AppError) {
        console.error(`[${tag}] ${e.message}`);
        return e.exitCode;
    }
    console.error(`[${tag}] unexpected error`, e);
    return 1;
}

export interface RenderDeps {
    env?: Record<string, string | undefined>;
    bundle?: () => Promise<ClientAssets>;
}

export async function runRender(argv: string[], deps: RenderDeps = {}): Promise<number> {
    try {
        const args = readArgs(argv, true);
        const config = loadConfig(deps.env);
        const result = await generateHtml({
            csvPath: args.csv,
            outPath: args.out ?? '',
            config,
            selection: args.select,
            bundle: deps.bundle,
        });
        console.log(
            `[render] ${result.subjects} subjects, ${result.courses} courses, ${result.blocks} time slots`
        );
        console.log(`Wrote ${result.outPath}`);
        console.log("Open it in a browser. Use 'Export PNG' to save the selected schedule.");
        return 0;
    } catch (e) {
        return reportError('render', RENDER_USAGE, e);
    }
}

export async function runPrint(argv: string[]): Promise<number> {
    try {
        const args = readArgs(argv, false);
        const timetable = await loadTimetableFromCsv(args.csv);
        const selection = args.select
            ? resolveSelection(timetable, decodeSelection(args.select))
            : undefined;
        console.log(formatTimetable(timetable, selection));
        return 0;
    } catch (e) {
        return reportError('print', PRINT_USAGE, e);
    }
}
