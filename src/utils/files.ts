/**
 * File name for the PNG export, derived from the CSV name
 */
export function exportFileName(source: string): string {
    const safe = source.replace(/[^a-z0-9_-]+/gi, '_');
    return `timetable_${safe || 'export'}.png`;
}
