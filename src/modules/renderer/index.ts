/* ===================================================================
 * renderer/ — Markdown → safe HTML for the explanation pane.
 * =================================================================== */

import { marked } from 'marked';
import { sanitizeHtml } from '@lib/sanitize';

/**
 * Render model output as Markdown. The text itself is not altered;
 * only its HTML form is sanitised.
 */
export function renderExplanation(text: string): string {
    const html = marked.parse(text, { async: false, gfm: true, breaks: false });
    if (typeof html !== 'string') {
        throw new Error('Markdown renderer returned a promise in sync mode');
    }
    return sanitizeHtml(html);
}
