/* ===================================================================
 * samples/ — Canned snippets behind the "Sample Code" buttons.
 * =================================================================== */

import type { Language } from '@shared/types';

export interface CodeSample {
    id: SampleId;
    label: string;
    language: Language;
    code: string;
}

export type SampleId = 'python-list-comprehension' | 'javascript-function' | 'python-class';

export const SAMPLES: Readonly<Record<SampleId, CodeSample>> = {
    'python-list-comprehension': {
        id: 'python-list-comprehension',
        label: 'Python List Comprehension',
        language: 'Python',
        code: `numbers = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10]
even_squares = [x**2 for x in numbers if x % 2 == 0]
print(even_squares)`,
    },
    'javascript-function': {
        id: 'javascript-function',
        label: 'JavaScript Function',
        language: 'JavaScript',
        code: `function fibonacci(n) {
    if (n <= 1) return n;
    return fibonacci(n - 1) + fibonacci(n - 2);
}

console.log(fibonacci(10));`,
    },
    'python-class': {
        id: 'python-class',
        label: 'Python Class',
        language: 'Python',
        // Blank lines inside the class keep their indentation.
        code: [
            'class Calculator:',
            '    def __init__(self):',
            '        self.history = []',
            '    ',
            '    def add(self, a, b):',
            '        result = a + b',
            '        self.history.append(f"{a} + {b} = {result}")',
            '        return result',
            '        ',
            'calc = Calculator()',
            'print(calc.add(5, 3))',
        ].join('\n'),
    },
};

export const SAMPLE_IDS = Object.keys(SAMPLES).filter(isSampleId);

export function isSampleId(value: string): value is SampleId {
    return Object.prototype.hasOwnProperty.call(SAMPLES, value);
}
