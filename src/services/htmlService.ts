import autoprefixer from 'autoprefixer';
import * as esbuild from 'esbuild';
import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import postcss from 'postcss';
import { createElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import tailwindcss from 'tailwindcss';
import { fileURLToPath } from 'url';
import Document from '../components/Document.js';
import type { TimetableConfig } from '../server/config.js';
import { AppError } from '../server/errors.js';
import type { TimetablePayload } from '../schemas.js';
import { decodeSelection, resolveSelection } from '../utils/selection.js';
import { loadTimetableFromCsv } from './csvService.js';
import { buildPayload } from './payloadService.js';

// Resolved against the source tree from both src/services and dist/services
const CLIENT_ENTRY = fileURLToPath(new URL('../../src/main.tsx', import.meta.url));
const TAILWIND_CONFIG = fileURLToPath(new URL('../../tailwind.config.ts', import.meta.url));

export interface ClientAssets {
    script: string;
    css: string;
}

/**
 * Runs stylesheets through PostCSS so the `@tailwind` directives expand to
 * the utilities the components use.
 */
export function tailwindPlugin(config: string = TAILWIND_CONFIG): esbuild.Plugin {
    const processor = postcss([tailwindcss({ config }), autoprefixer()]);
    return {
        name: 'tailwind',
        setup(build) {
            build.onLoad({ filter: /\.css$/ }, async (args) => {
                const source = await readFile(args.path, 'utf-8');
                const result = await processor.process(source, { from: args.path });
                return { contents: result.css, loader: 'css' };
            });
        },
    };
}

/**
 * Bundle the browser app and its stylesheet into strings for inlining.
 */
export async function bundleClient(entry: string = CLIENT_ENTRY): Promise<ClientAssets> {
    const result = await esbuild.build({
        entryPoints: [entry],
        bundle: true,
        write: false,
        outdir: 'out',
        format: 'iife',
        platform: 'browser',
        target: ['es2020'],
        minify: true,
        jsx: 'automatic',
        define: { 'process.env.NODE_ENV': '"production"' },
        logLevel: 'silent',
        plugins: [tailwindPlugin()],
    });
    const script = result.outputFiles.find((f) => f.path.endsWith('.js'));
    const css = result.outputFiles.find((f) => f.path.endsWith('.css'));
    if (!script) {
        throw new AppError(`Bundling ${entry} produced no script output`);
    }
    return { script: script.text, css: css?.text ?? '' };
}

/**
 * JSON for a `<script type="application/json">` element. `<`, `>` and `&`
 * are escaped so the text can never close the element early.
 */
export function serializePayload(payload: TimetablePayload): string {
    return JSON.stringify(payload)
        .replace(/</g, '\\u003c')
        .replace(/>/g, '\\u003e')
        .replace(/&/g, '\\u0026');
}

export function renderDocument(payload: TimetablePayload, assets: ClientAssets): string {
    const markup = renderToStaticMarkup(
        createElement(Document, {
            title: `${payload.meta.title} · ${payload.meta.source}`,
            payloadJson: serializePayload(payload),
            script: assets.script.replace(/<\/script/gi, '<\\/script'),
            css: assets.css.replace(/<\/style/gi, '<\\/style'),
        })
    );
    // React emits its own doctype for an <html> root on some versions
    return `<!doctype html>\n${markup.replace(/^<!doctype html>/i, '')}\n`;
}

export interface GenerateHtmlOptions {
    csvPath: string;
    outPath: string;
    config: TimetableConfig;
    /** Encoded selection (`SUBJ:COURSE,...`) to start the page with */
    selection?: string;
    bundle?: () => Promise<ClientAssets>;
}

export interface GenerateHtmlResult {
    outPath: string;
    subjects: number;
    courses: number;
    blocks: number;
    selected: number;
}

export async function generateHtml(options: GenerateHtmlOptions): Promise<GenerateHtmlResult> {
    const timetable = await loadTimetableFromCsv(options.csvPath);
    const selection = options.selection
        ? resolveSelection(timetable, decodeSelection(options.selection))
        : {};
    const payload = buildPayload(timetable, options.config, selection);
    const assets = await (options.bundle ?? bundleClient)();
    const html = renderDocument(payload, assets);

    const outPath = path.resolve(options.outPath);
    await mkdir(path.dirname(outPath), { recursive: true });
    await writeFile(outPath, html, 'utf-8');

    return {
        outPath,
        subjects: timetable.subjects.length,
        courses: timetable.subjects.reduce((n, s) => n + s.courses.length, 0),
        blocks: payload.blocks.length,
        selected: Object.keys(selection).length,
    };
}
