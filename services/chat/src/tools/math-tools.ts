import { z } from 'zod';
import { defineTool, staticProvider } from './define-tool.js';
import type { ToolProvider } from '../tool-registry.js';

const PROVIDER = 'math';

const pair = z.object({
  a: z.number().describe('First number'),
  b: z.number().describe('Second number'),
});
const single = z.object({ number: z.number().describe('The input number') });

export const mathTools = [
  defineTool(PROVIDER, {
    name: 'multiply',
    description: 'Multiply two numbers together.',
    schema: pair,
    run: ({ a, b }) => a * b,
  }),
  defineTool(PROVIDER, {
    name: 'add',
    description: 'Add two numbers together.',
    schema: pair,
    run: ({ a, b }) => a + b,
  }),
  defineTool(PROVIDER, {
    name: 'subtract',
    description: 'Subtract the second number from the first.',
    schema: pair,
    run: ({ a, b }) => a - b,
  }),
  defineTool(PROVIDER, {
    name: 'divide',
    description: 'Divide the first number by the second.',
    schema: pair,
    run: ({ a, b }) => (b === 0 ? 'Error: Division by zero' : a / b),
  }),
  defineTool(PROVIDER, {
    name: 'power',
    description: 'Raise a base to an exponent.',
    schema: z.object({
      base: z.number().describe('The base number'),
      exponent: z.number().describe('The exponent'),
    }),
    run: ({ base, exponent }) => base ** exponent,
  }),
  defineTool(PROVIDER, {
    name: 'square_root',
    description: 'Calculate the square root of a number.',
    schema: single,
    run: ({ number }) =>
      number < 0 ? 'Error: Cannot calculate square root of negative number' : Math.sqrt(number),
  }),
  defineTool(PROVIDER, {
    name: 'absolute',
    description: 'Get the absolute value of a number.',
    schema: single,
    run: ({ number }) => Math.abs(number),
  }),
  defineTool(PROVIDER, {
    name: 'round_number',
    description: 'Round a number to a given number of decimal places (default 2).',
    schema: z.object({
      number: z.number().describe('The number to round'),
      decimal_places: z.number().int().min(0).max(15).default(2).describe('Decimal places to keep'),
    }),
    run: ({ number, decimal_places }) => {
      const factor = 10 ** decimal_places;
      return Math.round(number * factor) / factor;
    },
  }),
];

export function createMathTools(): ToolProvider {
  return staticProvider(PROVIDER, mathTools);
}
