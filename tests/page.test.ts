import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import { EMPTY_CODE_WARNING, MISSING_KEY_ERROR } from '../src/modules/controller';
import { TIER_INSTRUCTIONS } from '../src/modules/prompt';
import { SAMPLES } from '../src/modules/samples';
import { mountPage } from '../src/page/page';
import type { ChatClient } from '../src/shared/types';
import PAGE_HTML from '../src/page/index.html?raw';

// Helper to load the page markup into the test document
function loadPage(): void {
    const parsed = new DOMParser().parseFromString(PAGE_HTML, 'text/html');
    document.body.innerHTML = parsed.body.innerHTML;
}

function el<T extends Element>(selector: string, ctor: new () => T): T {
    const found = document.querySelector(selector);
    if (!(found instanceof ctor)) throw new Error(`missing ${selector}`);
    return found;
}

function typeInto(input: HTMLInputElement | HTMLTextAreaElement, value: string): void {
    input.value = value;
    input.dispatchEvent(new Event('input'));
}

describe('Explainer page', () => {
    let complete: Mock<ChatClient['complete']>;
    let createClient: Mock<(apiKey: string) => ChatClient>;

    beforeEach(() => {
        loadPage();
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        complete = vi.fn<ChatClient['complete']>();
        createClient = vi.fn((_apiKey: string): ChatClient => ({ complete }));
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should fill the selectors from the enumerations', () => {
        mountPage(document, { config: { apiKey: '' }, createClient });

        const language = el('#language', HTMLSelectElement);
        const tier = el('#tier', HTMLSelectElement);
        expect(language.options).toHaveLength(13);
        expect(language.value).toBe('Python');
        expect(Array.from(tier.options).map(o => o.value)).toEqual(['Beginner', 'Intermediate', 'Advanced']);
    });

    it('should hide the key field when the key comes from config', () => {
        mountPage(document, { config: { apiKey: 'test-key' }, createClient });

        expect(el('#api-key-status', HTMLParagraphElement).textContent).toBe('API key loaded');
        expect(el('#api-key-field', HTMLDivElement).classList.contains('hidden')).toBe(true);
    });

    it('should show the key field when no key is configured', () => {
        mountPage(document, { config: { apiKey: '' }, createClient });

        expect(el('#api-key-field', HTMLDivElement).classList.contains('hidden')).toBe(false);
    });

    it('should load a sample into the code box', () => {
        const page = mountPage(document, { config: { apiKey: '' }, createClient });
        const code = el('#code', HTMLTextAreaElement);
        typeInto(code, 'old code');

        el('button[data-sample="javascript-function"]', HTMLButtonElement).click();

        expect(code.value).toBe(SAMPLES['javascript-function'].code);
        expect(page.session.code).toBe(SAMPLES['javascript-function'].code);
        expect(el('#language', HTMLSelectElement).value).toBe('JavaScript');
    });

    it('should empty the code box on clear', () => {
        const page = mountPage(document, { config: { apiKey: '' }, createClient });
        const code = el('#code', HTMLTextAreaElement);
        typeInto(code, 'x = 1');

        el('#btn-clear', HTMLButtonElement).click();

        expect(code.value).toBe('');
        expect(page.session.code).toBe('');
    });

    it('should drop the previous explanation on clear', async () => {
        complete.mockResolvedValue('FIRST ANSWER');
        const page = mountPage(document, { config: { apiKey: 'test-key' }, createClient });
        typeInto(el('#code', HTMLTextAreaElement), 'x = 1');
        await page.explain();
        expect(el('#output', HTMLDivElement).textContent?.trim()).toBe('FIRST ANSWER');

        el('#btn-clear', HTMLButtonElement).click();

        expect(el('#output', HTMLDivElement).innerHTML).toBe('');
    });

    it('should drop the previous explanation when blank code is submitted', async () => {
        complete.mockResolvedValue('FIRST ANSWER');
        const page = mountPage(document, { config: { apiKey: 'test-key' }, createClient });
        const code = el('#code', HTMLTextAreaElement);
        typeInto(code, 'x = 1');
        await page.explain();

        typeInto(code, '  ');
        await page.explain();

        expect(el('#status', HTMLParagraphElement).textContent).toBe(EMPTY_CODE_WARNING);
        expect(el('#output', HTMLDivElement).innerHTML).toBe('');
        expect(complete).toHaveBeenCalledTimes(1);
    });

    it('should drop the previous explanation when the key check fails', async () => {
        complete.mockResolvedValue('FIRST ANSWER');
        const page = mountPage(document, { config: { apiKey: '' }, createClient });
        const key = el('#api-key', HTMLInputElement);
        typeInto(key, 'test-key');
        typeInto(el('#code', HTMLTextAreaElement), 'x = 1');
        await page.explain();

        typeInto(key, '');
        await page.explain();

        expect(el('#status', HTMLParagraphElement).textContent).toBe(MISSING_KEY_ERROR);
        expect(el('#output', HTMLDivElement).innerHTML).toBe('');
    });

    it('should warn on blank code and leave the output unset', async () => {
        const page = mountPage(document, { config: { apiKey: 'test-key' }, createClient });
        typeInto(el('#code', HTMLTextAreaElement), '   ');

        await page.explain();

        const status = el('#status', HTMLParagraphElement);
        expect(status.textContent).toBe(EMPTY_CODE_WARNING);
        expect(status.className).toBe('status status-warning');
        expect(el('#output', HTMLDivElement).innerHTML).toBe('');
        expect(createClient).not.toHaveBeenCalled();
    });

    it('should refuse to call the API without a key', async () => {
        const page = mountPage(document, { config: { apiKey: '' }, createClient });
        typeInto(el('#code', HTMLTextAreaElement), 'x = 1');

        await page.explain();

        expect(el('#status', HTMLParagraphElement).textContent).toBe(MISSING_KEY_ERROR);
        expect(createClient).not.toHaveBeenCalled();
        expect(complete).not.toHaveBeenCalled();
    });

    it('should render the explanation as Markdown', async () => {
        complete.mockResolvedValue('## Overview\n\nIt **adds** two numbers.');
        const page = mountPage(document, { config: { apiKey: '' }, createClient });
        typeInto(el('#api-key', HTMLInputElement), 'test-key');
        typeInto(el('#code', HTMLTextAreaElement), 'a + b');
        el('#tier', HTMLSelectElement).value = 'Advanced';

        await page.explain();

        const output = el('#output', HTMLDivElement);
        expect(output.querySelector('h2')?.textContent).toBe('Overview');
        expect(output.querySelector('strong')?.textContent).toBe('adds');
        expect(el('#status', HTMLParagraphElement).textContent).toBe('');
        expect(el('#btn-explain', HTMLButtonElement).disabled).toBe(false);
        expect(createClient).toHaveBeenCalledWith('test-key');
        const userMessage = complete.mock.calls[0]?.[0].messages[1]?.content ?? '';
        expect(userMessage.startsWith(TIER_INSTRUCTIONS.Advanced)).toBe(true);
    });

    it('should show remote failures in the output pane', async () => {
        complete.mockRejectedValue(new Error('timed out'));
        const page = mountPage(document, { config: { apiKey: 'test-key' }, createClient });
        typeInto(el('#code', HTMLTextAreaElement), 'x = 1');

        await page.explain();

        expect(el('#output', HTMLDivElement).textContent?.trim()).toBe('Error explaining code: timed out');
        expect(el('#btn-explain', HTMLButtonElement).disabled).toBe(false);
    });
});
