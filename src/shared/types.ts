/* ===================================================================
 * Shared types — the stable data contract for all modules.
 * Every module imports from here; never define ad-hoc shapes.
 * =================================================================== */

// ─── Languages ──────────────────────────────────────────────────────
export const LANGUAGES = [
    'Python', 'JavaScript', 'Java', 'C++', 'C', 'C#', 'Go',
    'Rust', 'Ruby', 'PHP', 'Swift', 'Kotlin', 'Other',
] as const;

export type Language = (typeof LANGUAGES)[number];

const LANGUAGE_SET: ReadonlySet<string> = new Set<string>(LANGUAGES);

export function isLanguage(value: string): value is Language {
    return LANGUAGE_SET.has(value);
}

// ─── Complexity tiers ───────────────────────────────────────────────
export const COMPLEXITY_TIERS = ['Beginner', 'Intermediate', 'Advanced'] as const;

export type ComplexityTier = (typeof COMPLEXITY_TIERS)[number];

const TIER_SET: ReadonlySet<string> = new Set<string>(COMPLEXITY_TIERS);

export function isComplexityTier(value: string): value is ComplexityTier {
    return TIER_SET.has(value);
}

// ─── Session ────────────────────────────────────────────────────────
export interface ExplainerSession {
    credential: string;
    code: string;
    language: Language;
    tier: ComplexityTier;
}

export type SessionSnapshot = Readonly<ExplainerSession>;

// ─── Requests & results ─────────────────────────────────────────────
export interface ExplainRequest {
    code: string;
    language: Language;
    tier: ComplexityTier;
}

export type ExplainResult =
    | { ok: true; text: string }
    | { ok: false; error: string };

/** What the explain action hands back to the page. */
export type ExplainOutcome =
    | { kind: 'warning'; message: string }
    | { kind: 'error'; message: string }
    | { kind: 'explanation'; text: string };

// ─── Chat completion ────────────────────────────────────────────────
export interface ChatMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface ChatCompletionRequest {
    model: string;
    messages: ChatMessage[];
    temperature: number;
    max_tokens: number;
}

export interface ChatClient {
    /** Returns the text of the first completion choice. */
    complete(req: ChatCompletionRequest): Promise<string>;
}

export const COMPLETION_SETTINGS = {
    model: 'llama3-8b-8192',
    temperature: 0.3,
    maxTokens: 1500,
} as const;

// ─── Config ─────────────────────────────────────────────────────────
export interface AppConfig {
    apiKey: string;
}
