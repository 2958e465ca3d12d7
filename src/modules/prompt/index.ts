/* ===================================================================
 * prompt/ — Fixed prompt templates for code explanations.
 *
 * The tier → instruction mapping is data, not branching, so every
 * tier has exactly one template.
 * =================================================================== */

import type { ComplexityTier, ExplainRequest } from '@shared/types';

export const SYSTEM_PROMPT =
    'You are an expert programming instructor who excels at explaining code in clear, understandable language. Always be encouraging and educational.';

export const TIER_INSTRUCTIONS: Readonly<Record<ComplexityTier, string>> = {
    Beginner:
        'Explain this code in very simple terms, as if talking to someone who just started programming. Use everyday language and avoid technical jargon.',
    Intermediate:
        'Explain this code clearly, including the main concepts and how different parts work together. Use some technical terms but explain them.',
    Advanced:
        'Provide a detailed technical explanation of this code, including algorithms, design patterns, and performance considerations.',
};

const RESPONSE_STRUCTURE = `Please provide:
1. A brief overview of what the code does
2. Step-by-step explanation of each part
3. Key concepts or techniques used
4. Any potential improvements or considerations (if applicable)

Format your response in a clear, easy-to-read manner.`;

/**
 * Compose the user message for one explanation request.
 * Language label and code are inserted verbatim.
 */
export function buildExplainPrompt(req: ExplainRequest): string {
    return `${TIER_INSTRUCTIONS[req.tier]}

Programming Language: ${req.language}

Code to explain:
\`\`\`${req.language.toLowerCase()}
${req.code}
\`\`\`

${RESPONSE_STRUCTURE}`;
}
