/* ===================================================================
 * explainer/ — One request, one explanation.
 *
 * Failures come back as content ("Error explaining code: …") so the
 * caller always gets a string. requestExplanation() keeps the tagged
 * result for callers that want to branch on it.
 * =================================================================== */

import { SYSTEM_PROMPT, buildExplainPrompt } from '@modules/prompt';
import { COMPLETION_SETTINGS } from '@shared/types';
import type { ChatClient, ExplainRequest, ExplainResult } from '@shared/types';

export const EXPLAIN_ERROR_PREFIX = 'Error explaining code: ';

export async function requestExplanation(
    client: ChatClient,
    req: ExplainRequest,
): Promise<ExplainResult> {
    try {
        const text = await client.complete({
            model: COMPLETION_SETTINGS.model,
            messages: [
                { role: 'system', content: SYSTEM_PROMPT },
                { role: 'user', content: buildExplainPrompt(req) },
            ],
            temperature: COMPLETION_SETTINGS.temperature,
            max_tokens: COMPLETION_SETTINGS.maxTokens,
        });
        return { ok: true, text };
    } catch (err) {
        console.warn('[explainer] completion failed:', err);
        return { ok: false, error: err instanceof Error ? err.message : String(err) };
    }
}

/**
 * Explain a code snippet. Never rejects.
 */
export async function explainCode(client: ChatClient, req: ExplainRequest): Promise<string> {
    const result = await requestExplanation(client, req);
    return result.ok ? result.text : EXPLAIN_ERROR_PREFIX + result.error;
}
