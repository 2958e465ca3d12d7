/* ===================================================================
 * Page script — the two-pane explainer.
 *
 * Left: settings, samples, code input. Right: explain + output.
 * All state lives in one ExplainerSession owned by the mounted page.
 * =================================================================== */

import { handleExplain } from '@modules/controller';
import { renderExplanation } from '@modules/renderer';
import { SAMPLES, SAMPLE_IDS, isSampleId } from '@modules/samples';
import {
    clearCode, createSession, loadSample, setCode, setCredential, setLanguage, setTier,
} from '@modules/session';
import { COMPLEXITY_TIERS, LANGUAGES } from '@shared/types';
import type { AppConfig, ChatClient, ExplainerSession } from '@shared/types';

export interface PageOptions {
    config: AppConfig;
    createClient?: (apiKey: string) => ChatClient;
}

export interface PageHandle {
    session: ExplainerSession;
    /** Same as clicking "Explain Code". Never rejects. */
    explain(): Promise<void>;
}

type StatusKind = 'info' | 'success' | 'warning' | 'error';

function required<T extends Element>(doc: Document, selector: string, ctor: new () => T): T {
    const found = doc.querySelector(selector);
    if (!(found instanceof ctor)) {
        throw new Error(`Page element missing: ${selector}`);
    }
    return found;
}

export function mountPage(doc: Document, options: PageOptions): PageHandle {
    // ─── DOM refs ───────────────────────────────────────────────────
    const keyStatus = required(doc, '#api-key-status', HTMLParagraphElement);
    const keyField = required(doc, '#api-key-field', HTMLDivElement);
    const keyInput = required(doc, '#api-key', HTMLInputElement);
    const languageSelect = required(doc, '#language', HTMLSelectElement);
    const tierSelect = required(doc, '#tier', HTMLSelectElement);
    const samplesEl = required(doc, '#samples', HTMLDivElement);
    const codeInput = required(doc, '#code', HTMLTextAreaElement);
    const btnClear = required(doc, '#btn-clear', HTMLButtonElement);
    const btnExplain = required(doc, '#btn-explain', HTMLButtonElement);
    const statusEl = required(doc, '#status', HTMLParagraphElement);
    const outputEl = required(doc, '#output', HTMLDivElement);

    const session = createSession({ credential: options.config.apiKey });
    const keyFromConfig = session.credential !== '';

    // ─── Status helpers ─────────────────────────────────────────────

    function setStatus(text: string, kind: StatusKind = 'info') {
        statusEl.textContent = text;
        statusEl.className = `status status-${kind}`;
    }

    function fillSelect(select: HTMLSelectElement, values: readonly string[], selected: string) {
        select.replaceChildren(...values.map(value => {
            const opt = doc.createElement('option');
            opt.value = value;
            opt.textContent = value;
            return opt;
        }));
        select.value = selected;
    }

    // ─── Settings pane ──────────────────────────────────────────────

    if (keyFromConfig) {
        keyStatus.textContent = 'API key loaded';
        keyStatus.className = 'status status-success';
        keyField.classList.add('hidden');
    } else {
        keyStatus.textContent = 'No API key configured. Enter one below.';
        keyStatus.className = 'status status-warning';
    }

    fillSelect(languageSelect, LANGUAGES, session.language);
    fillSelect(tierSelect, COMPLEXITY_TIERS, session.tier);

    samplesEl.replaceChildren(...SAMPLE_IDS.map(id => {
        const btn = doc.createElement('button');
        btn.type = 'button';
        btn.className = 'btn btn-secondary sample-btn';
        btn.dataset.sample = id;
        btn.textContent = SAMPLES[id].label;
        return btn;
    }));

    // ─── Event handlers ─────────────────────────────────────────────

    keyInput.addEventListener('input', () => setCredential(session, keyInput.value));
    languageSelect.addEventListener('change', () => setLanguage(session, languageSelect.value));
    tierSelect.addEventListener('change', () => setTier(session, tierSelect.value));
    codeInput.addEventListener('input', () => setCode(session, codeInput.value));

    samplesEl.addEventListener('click', (e) => {
        const target = e.target;
        if (!(target instanceof HTMLElement)) return;
        const id = target.dataset.sample;
        if (!id || !isSampleId(id)) return;

        loadSample(session, id);
        setLanguage(session, SAMPLES[id].language);
        codeInput.value = session.code;
        languageSelect.value = session.language;
    });

    btnClear.addEventListener('click', () => {
        clearCode(session);
        codeInput.value = session.code;
        outputEl.replaceChildren();
        codeInput.focus();
    });

    // Controls are the source of truth at the moment of the click.
    function syncFromControls() {
        setCode(session, codeInput.value);
        setLanguage(session, languageSelect.value);
        setTier(session, tierSelect.value);
        if (!keyFromConfig) setCredential(session, keyInput.value);
    }

    async function explain(): Promise<void> {
        btnExplain.disabled = true;
        setStatus('Analyzing your code...', 'info');

        try {
            syncFromControls();
            const outcome = await handleExplain(session, { createClient: options.createClient });
            switch (outcome.kind) {
                case 'warning':
                    setStatus(outcome.message, 'warning');
                    outputEl.replaceChildren();
                    break;
                case 'error':
                    setStatus(outcome.message, 'error');
                    outputEl.replaceChildren();
                    break;
                case 'explanation':
                    setStatus('');
                    outputEl.innerHTML = renderExplanation(outcome.text);
                    break;
            }
        } catch (err) {
            console.error('[page] explain failed:', err);
            setStatus(err instanceof Error ? err.message : String(err), 'error');
        } finally {
            btnExplain.disabled = false;
        }
    }

    btnExplain.addEventListener('click', () => {
        void explain();
    });

    return { session, explain };
}
