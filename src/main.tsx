import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import './index.css';
import App from './App.js';
import { timetablePayloadSchema } from './schemas.js';

const dataEl = document.getElementById('timetable-data');
const rootEl = document.getElementById('root');
if (!dataEl || !rootEl) {
    throw new Error('Timetable page is missing #timetable-data or #root');
}

const payload = timetablePayloadSchema.parse(
    JSON.parse(dataEl.textContent ?? 'null')
);

createRoot(rootEl).render(
    <StrictMode>
        <App payload={payload} />
    </StrictMode>
);
