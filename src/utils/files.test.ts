import { describe, expect, it } from 'vitest';
import { exportFileName } from './files.js';

describe('exportFileName', () => {
    it('derives a safe name from the CSV file', () => {
        expect(exportFileName('spring 2025.csv')).toBe('timetable_spring_2025_csv.png');
        expect(exportFileName('')).toBe('timetable_export.png');
    });
});
