/**
 * Tests for CapabilityRegistry - key uniqueness, ordering and sealing
 */

import { DuplicateKeyError, NotFoundError, RegistrySealedError } from '@plinth/core';
import { beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { definePrompt, defineResource, defineTool } from './definitions.js';
import { CapabilityRegistry } from './registry.js';

const tool = (name: string) => defineTool({ name, params: {}, handler: () => name });

describe('CapabilityRegistry', () => {
  let registry: CapabilityRegistry;

  beforeEach(() => {
    registry = new CapabilityRegistry();
  });

  it('should start empty', () => {
    expect(registry.list('tool')).toEqual([]);
    expect(registry.size('resource')).toBe(0);
    expect(registry.sealed).toBe(false);
  });

  it('should list definitions in registration order', () => {
    registry.register(tool('zeta'));
    registry.register(tool('alpha'));
    registry.register(tool('mid'));

    expect(registry.list('tool').map((d) => d.name)).toEqual(['zeta', 'alpha', 'mid']);
  });

  it('should reject duplicate names within a category', () => {
    registry.register(tool('add'));
    expect(() => registry.register(tool('add'))).toThrow(DuplicateKeyError);
    expect(registry.size('tool')).toBe(1);
  });

  it('should allow the same key in different categories', () => {
    registry.register(tool('greet'));
    registry.register(definePrompt({ name: 'greet', params: {}, handler: () => 'hi' }));

    expect(registry.has('tool', 'greet')).toBe(true);
    expect(registry.has('prompt', 'greet')).toBe(true);
  });

  it('should key resources by URI', () => {
    registry.register(defineResource({ uri: 'config://app', handler: () => ({}) }));

    expect(registry.get('resource', 'config://app')?.name).toBe('config://app');
    expect(registry.get('resource', 'app')).toBeUndefined();
    expect(() =>
      registry.register(defineResource({ uri: 'config://app', name: 'other', handler: () => 1 }))
    ).toThrow('Resource already registered: config://app');
  });

  it('should raise NotFoundError from require', () => {
    expect(() => registry.require('prompt', 'missing')).toThrow(NotFoundError);
    expect(() => registry.require('prompt', 'missing')).toThrow('Prompt not found: missing');
  });

  it('should refuse registration once sealed', () => {
    registry.register(tool('before'));
    registry.seal();

    expect(registry.sealed).toBe(true);
    expect(() => registry.register(tool('after'))).toThrow(RegistrySealedError);
    expect(registry.list('tool').map((d) => d.name)).toEqual(['before']);
  });
});

describe('definitions', () => {
  it('should derive the input schema of a tool', () => {
    const add = defineTool({
      name: 'add',
      description: 'Add two numbers',
      params: { a: z.number(), b: z.number() },
      handler: ({ a, b }) => a + b
    });

    expect(add.inputSchema).toEqual({
      type: 'object',
      properties: { a: { type: 'number' }, b: { type: 'number' } },
      required: ['a', 'b']
    });
    expect(add.wantsContext).toBe(false);
    expect(Object.isFrozen(add)).toBe(true);
  });

  it('should let an explicit schema override derivation', () => {
    const inputSchema = { type: 'object' as const, properties: { q: { type: 'string' } } };
    const search = defineTool({
      name: 'search',
      params: { q: z.string(), limit: z.number().default(10) },
      inputSchema,
      handler: ({ q }) => q
    });

    expect(search.inputSchema).toBe(inputSchema);
    expect(search.parameters.map((p) => p.name)).toEqual(['q', 'limit']);
  });

  it('should default a tool description to an empty string', () => {
    expect(tool('bare').description).toBe('');
  });

  it('should bind arguments before calling the handler', async () => {
    const add = defineTool({
      name: 'add',
      params: { a: z.number(), b: z.number().default(10) },
      handler: ({ a, b }) => a + b
    });
    const noContext = () => {
      throw new Error('context should not be built');
    };

    await expect(add.invoke({ a: 1 }, noContext)).resolves.toBe(11);
    await expect(add.invoke({}, noContext)).rejects.toThrow('Missing required argument: a');
  });

  it('should copy tags and metadata', () => {
    const tags = ['math'];
    const add = defineTool({ name: 'add', params: {}, tags, meta: { owner: 'tests' }, handler: () => 0 });
    tags.push('later');

    expect(add.tags).toEqual(['math']);
    expect(add.meta).toEqual({ owner: 'tests' });
  });

  it('should derive prompt arguments', () => {
    const prompt = definePrompt({
      name: 'calculate',
      params: { expression: z.string() },
      handler: ({ expression }) => `Evaluate ${expression}`
    });

    expect(prompt.arguments).toEqual([{ name: 'expression', required: true }]);
    expect(prompt.description).toBeUndefined();
  });
});
