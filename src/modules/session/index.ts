/* ===================================================================
 * session/ — Per-page input state.
 *
 * One ExplainerSession per page, passed explicitly; nothing here is
 * persisted. Language and tier only ever hold enumerated values.
 * =================================================================== */

import { SAMPLES } from '@modules/samples';
import type { SampleId } from '@modules/samples';
import { isComplexityTier, isLanguage } from '@shared/types';
import type { ExplainerSession, SessionSnapshot } from '@shared/types';

export class InvalidSelectionError extends Error {
    constructor(field: 'language' | 'tier', value: string) {
        super(`Unknown ${field}: ${value}`);
        this.name = 'InvalidSelectionError';
    }
}

export function createSession(init: Partial<ExplainerSession> = {}): ExplainerSession {
    return {
        credential: init.credential ?? '',
        code: init.code ?? '',
        language: init.language ?? 'Python',
        tier: init.tier ?? 'Beginner',
    };
}

export function setCode(session: ExplainerSession, code: string): void {
    session.code = code;
}

export function setCredential(session: ExplainerSession, credential: string): void {
    session.credential = credential.trim();
}

export function setLanguage(session: ExplainerSession, value: string): void {
    if (!isLanguage(value)) throw new InvalidSelectionError('language', value);
    session.language = value;
}

export function setTier(session: ExplainerSession, value: string): void {
    if (!isComplexityTier(value)) throw new InvalidSelectionError('tier', value);
    session.tier = value;
}

/** Overwrite the code with a canned snippet. */
export function loadSample(session: ExplainerSession, id: SampleId): void {
    session.code = SAMPLES[id].code;
}

export function clearCode(session: ExplainerSession): void {
    session.code = '';
}

export function snapshot(session: ExplainerSession): SessionSnapshot {
    return Object.freeze({ ...session });
}
