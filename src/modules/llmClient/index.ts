/* ===================================================================
 * llmClient/ — Thin Groq REST wrapper.
 * All chat-completion calls go through the client built here.
 * =================================================================== */

import type { ChatClient, ChatCompletionRequest } from '@shared/types';

export const GROQ_API_URL = 'https://api.groq.com/openai/v1/chat/completions';

export interface HttpResponse {
    ok: boolean;
    status: number;
    text(): Promise<string>;
    json(): Promise<unknown>;
}

export type FetchLike = (
    url: string,
    init: { method: string; headers: Record<string, string>; body: string },
) => Promise<HttpResponse>;

export interface GroqClientOptions {
    fetch?: FetchLike;
    endpoint?: string;
}

export class ClientInitError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ClientInitError';
    }
}

export class LlmApiError extends Error {
    constructor(public readonly status: number, detail: string) {
        super(`Groq API error (${status}): ${detail}`);
        this.name = 'LlmApiError';
    }
}

export class LlmResponseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'LlmResponseError';
    }
}

/**
 * Build a chat client bound to one API key.
 * Throws ClientInitError when the key cannot be sent as a bearer token.
 */
export function createGroqClient(apiKey: string, options: GroqClientOptions = {}): ChatClient {
    if (!apiKey.trim()) {
        throw new ClientInitError('API key is empty');
    }
    if (/\s/.test(apiKey)) {
        throw new ClientInitError('API key must not contain whitespace');
    }

    const doFetch: FetchLike = options.fetch ?? ((url, init) => fetch(url, init));
    const endpoint = options.endpoint ?? GROQ_API_URL;

    return {
        async complete(req: ChatCompletionRequest): Promise<string> {
            const response = await doFetch(endpoint, {
                method: 'POST',
                headers: {
                    'Authorization': `Bearer ${apiKey}`,
                    'Content-Type': 'application/json',
                },
                body: JSON.stringify({
                    model: req.model,
                    messages: req.messages,
                    temperature: req.temperature,
                    max_tokens: req.max_tokens,
                }),
            });

            if (!response.ok) {
                const body = await response.text();
                throw new LlmApiError(response.status, errorDetail(body));
            }

            return extractContent(await response.json());
        },
    };
}

// ─── Response parsing ───────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

/**
 * Pull the first choice's message content out of a completion body.
 */
export function extractContent(data: unknown): string {
    const choices = isRecord(data) ? data.choices : undefined;
    if (!Array.isArray(choices) || choices.length === 0) {
        throw new LlmResponseError('Groq response missing choices');
    }
    const first: unknown = choices[0];
    const message = isRecord(first) ? first.message : undefined;
    const content = isRecord(message) ? message.content : undefined;
    if (typeof content !== 'string') {
        throw new LlmResponseError('Unexpected Groq response format');
    }
    return content;
}

/**
 * Prefer the provider's `error.message`; otherwise a snippet of the raw body.
 */
function errorDetail(body: string): string {
    const parsed = parseJson(body);
    if (isRecord(parsed) && isRecord(parsed.error) && typeof parsed.error.message === 'string') {
        return parsed.error.message;
    }
    return body.slice(0, 400);
}

function parseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}
