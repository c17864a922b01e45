import html2canvas from 'html2canvas';

/**
 * Render the grid to a PNG data URL. The caller puts the grid in export
 * mode first, so only the selected sections are laid out and drawn.
 */
export async function captureElementToPng(element: HTMLElement): Promise<string> {
    const canvas = await html2canvas(element, {
        backgroundColor: '#0b0e14',
        scale: 2,
    });
    return canvas.toDataURL('image/png');
}

export function downloadDataUrl(dataUrl: string, fileName: string) {
    const link = document.createElement('a');
    link.href = dataUrl;
    link.download = fileName;
    document.body.appendChild(link);
    link.click();
    link.remove();
}
