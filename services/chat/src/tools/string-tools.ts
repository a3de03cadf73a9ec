import { z } from 'zod';
import { defineTool, staticProvider } from './define-tool.js';
import type { ToolProvider } from '../tool-registry.js';

const PROVIDER = 'string';

const textInput = z.object({ text: z.string().describe('The input text') });

export const stringTools = [
  defineTool(PROVIDER, {
    name: 'uppercase',
    description: 'Convert text to uppercase.',
    schema: textInput,
    run: ({ text }) => text.toUpperCase(),
  }),
  defineTool(PROVIDER, {
    name: 'lowercase',
    description: 'Convert text to lowercase.',
    schema: textInput,
    run: ({ text }) => text.toLowerCase(),
  }),
  defineTool(PROVIDER, {
    name: 'reverse_string',
    description: 'Reverse a string.',
    schema: textInput,
    // by code point so surrogate pairs survive
    run: ({ text }) => [...text].reverse().join(''),
  }),
  defineTool(PROVIDER, {
    name: 'count_words',
    description: 'Count the whitespace-separated words in a text.',
    schema: textInput,
    run: ({ text }) => text.split(/\s+/).filter(Boolean).length,
  }),
];

export function createStringTools(): ToolProvider {
  return staticProvider(PROVIDER, stringTools);
}
