/**
 * Simple calculator app
 *
 * Run with:
 *   npm run example
 *
 * Connect to:
 *   - http://localhost:8000/sse for the event stream
 *   - POST http://localhost:8000/mcp to send messages
 *   - POST http://localhost:8000/tools/add with {"a": 2, "b": 3}
 */

import { McpServer } from '@plinth/hub';
import { z } from 'zod';

export const server = new McpServer({ name: 'simple-calculator', version: '1.0.0' });

const operands = { a: z.number(), b: z.number() };

server
  .tool({
    name: 'add',
    description: 'Add two numbers together.',
    params: operands,
    handler: ({ a, b }) => a + b
  })
  .tool({
    name: 'power',
    description: 'Raise base to the power of exponent.',
    tags: ['math', 'advanced'],
    params: { base: z.number(), exponent: z.number() },
    wantsContext: true,
    handler: ({ base, exponent }, ctx) => {
      ctx.info(`Computing ${base}^${exponent}`);
      return base ** exponent;
    }
  })
  .tool({
    name: 'subtract',
    description: 'Subtract b from a.',
    params: operands,
    handler: ({ a, b }) => a - b
  })
  .tool({
    name: 'multiply',
    description: 'Multiply two numbers.',
    params: operands,
    handler: ({ a, b }) => a * b
  })
  .tool({
    name: 'divide',
    description: 'Divide a by b.',
    params: operands,
    handler: ({ a, b }) => {
      if (b === 0) {
        throw new Error('Cannot divide by zero');
      }
      return a / b;
    }
  })
  .resource({
    uri: 'config://calculator/settings',
    name: 'settings',
    description: 'Get calculator settings.',
    mimeType: 'application/json',
    handler: () => ({
      precision: 10,
      max_value: 1e308,
      supported_operations: ['add', 'subtract', 'multiply', 'divide', 'power']
    })
  })
  .prompt({
    name: 'calculate',
    description: 'Generate a calculation prompt.',
    params: { expression: z.string().describe('Expression to evaluate') },
    handler: ({ expression }) => [
      { role: 'user', content: { type: 'text', text: `Please calculate: ${expression}` } }
    ]
  });

export default server;
