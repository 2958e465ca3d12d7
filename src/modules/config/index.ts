/* ===================================================================
 * config/ — Startup configuration from the Vite environment.
 * =================================================================== */

import type { AppConfig } from '@shared/types';

export const API_KEY_ENV = 'VITE_GROQ_API_KEY';

/**
 * Read the config once at page start. A blank key means "not supplied".
 */
export function loadConfig(env: Readonly<Record<string, unknown>>): AppConfig {
    const raw = env[API_KEY_ENV];
    return {
        apiKey: typeof raw === 'string' ? raw.trim() : '',
    };
}
