import { describe, expect, it } from 'vitest';
import { loadConfig } from '../server/config.js';
import { parseTimetableCsv } from '../services/csvService.js';
import { buildPayload } from '../services/payloadService.js';
import { NOTHING_TO_EXPORT, selectionSummary, statusLine } from './status.js';

const payload = buildPayload(
    parseTimetableCsv(
        'Analysis I,MAT101,5,A1,H:08:00-09:30,A2,SZE:10:15-11:45\nPhysics,FIZ110,3,E1,H:08:30-10:00\n',
        'plan.csv'
    ),
    loadConfig({})
);

describe('selectionSummary', () => {
    it('counts selected classes and their credits', () => {
        expect(selectionSummary(payload, { MAT101: 'A2', FIZ110: 'E1' })).toBe(
            'Selected classes: 2. Credits: 8.'
        );
    });

    it('ignores subjects that are not in the page', () => {
        expect(selectionSummary(payload, { GONE: 'X1' })).toBe(
            'Selected classes: 0. Credits: 0.'
        );
    });
});

describe('statusLine', () => {
    it('shows only the summary before any action', () => {
        expect(statusLine(null, 'Selected classes: 0. Credits: 0.')).toBe(
            'Selected classes: 0. Credits: 0.'
        );
    });

    it('reports an export with nothing selected', () => {
        const summary = selectionSummary(payload, {});
        expect(NOTHING_TO_EXPORT.danger).toBe(true);
        expect(statusLine(NOTHING_TO_EXPORT, summary)).toBe(
            'Nothing selected to export. Selected classes: 0. Credits: 0.'
        );
    });
});
