/* ===================================================================
 * controller/ — The "Explain Code" action.
 *
 * Checks inputs before any network call, builds the client, then
 * hands off to the explainer.
 * =================================================================== */

import { explainCode } from '@modules/explainer';
import { createGroqClient } from '@modules/llmClient';
import { snapshot } from '@modules/session';
import type { ChatClient, ExplainOutcome, ExplainerSession } from '@shared/types';

export const EMPTY_CODE_WARNING = 'Please enter some code to explain!';
export const MISSING_KEY_ERROR = 'Please enter your Groq API key in the settings panel!';

export interface ExplainDeps {
    createClient?: (apiKey: string) => ChatClient;
}

export async function handleExplain(
    session: ExplainerSession,
    deps: ExplainDeps = {},
): Promise<ExplainOutcome> {
    const { code, language, tier, credential } = snapshot(session);

    if (!code.trim()) {
        return { kind: 'warning', message: EMPTY_CODE_WARNING };
    }
    if (!credential) {
        return { kind: 'error', message: MISSING_KEY_ERROR };
    }

    let client: ChatClient;
    try {
        client = (deps.createClient ?? createGroqClient)(credential);
    } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        return {
            kind: 'error',
            message: `Failed to initialize Groq client: ${detail}. Please check your API key.`,
        };
    }

    const text = await explainCode(client, { code, language, tier });
    return { kind: 'explanation', text };
}
