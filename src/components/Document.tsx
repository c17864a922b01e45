import type { FC } from 'react';

type DocumentProps = {
    title: string;
    payloadJson: string;
    script: string;
    css: string;
};

/**
 * Static shell of the generated page. Rendered once on the command line;
 * the inlined bundle mounts the interactive app into #root.
 */
const Document: FC<DocumentProps> = ({ title, payloadJson, script, css }) => (
    <html lang="en">
        <head>
            <meta charSet="utf-8" />
            <meta
                name="viewport"
                content="width=device-width,initial-scale=1"
            />
            <title>{title}</title>
            <style dangerouslySetInnerHTML={{ __html: css }} />
        </head>
        <body>
            <div id="root" />
            <noscript>Enable JavaScript to use the interactive timetable.</noscript>
            <script
                id="timetable-data"
                type="application/json"
                dangerouslySetInnerHTML={{ __html: payloadJson }}
            />
            <script dangerouslySetInnerHTML={{ __html: script }} />
        </body>
    </html>
);

export default Document;
