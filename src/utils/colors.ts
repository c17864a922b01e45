/**
 * Validate if a color is a valid hex color
 */
export function isValidHexColor(color: string): boolean {
    return /^#[0-9A-Fa-f]{6}$/.test(color);
}

/**
 * Relative luminance (0..1) of a hex color, per the sRGB formula
 */
function luminance(hex: string): number {
    const channel = (offset: number) => {
        const c = parseInt(hex.slice(offset, offset + 2), 16) / 255;
        return c <= 0.03928 ? c / 12.92 : Math.pow((c + 0.055) / 1.055, 2.4);
    };
    return 0.2126 * channel(1) + 0.7152 * channel(3) + 0.0722 * channel(5);
}

/**
 * Generate a good contrast text color (near-black or white) for a given background color
 */
export function getContrastTextColor(backgroundColor: string): string {
    if (!isValidHexColor(backgroundColor)) {
        return '#ffffff'; // default to white
    }
    return luminance(backgroundColor) > 0.35 ? '#111827' : '#ffffff';
}

/**
 * Pick a color for the subject at `index`; the palette wraps around
 */
export function paletteColor(palette: readonly string[], index: number): string {
    return palette[index % palette.length];
}

export const FALLBACK_SUBJECT_COLOR = '#6b7280';
