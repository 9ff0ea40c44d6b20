import { ArgumentError } from '@plinth/core';
import { z } from 'zod';
import { describeParameters } from './derive.js';

/** Arguments as a handler receives them: declared names typed, the rest passed through */
export type BoundArgs<S extends z.ZodRawShape> = z.output<z.ZodObject<S, 'passthrough'>>;

/**
 * Match caller arguments to declared parameters by name.
 * Applies defaults; undeclared names pass through untouched. A required
 * parameter is missing when its name is absent or undefined, even if its
 * schema (`z.unknown()`, `z.any()`) would accept undefined.
 */
export function bindArguments<S extends z.ZodRawShape>(shape: S, args: unknown): BoundArgs<S> {
  const input = args ?? {};
  if (typeof input !== 'object' || Array.isArray(input)) {
    throw new ArgumentError('Arguments must be a JSON object');
  }

  const provided = new Map(Object.entries(input));
  for (const parameter of describeParameters(shape)) {
    if (parameter.required && provided.get(parameter.name) === undefined) {
      throw new ArgumentError(`Missing required argument: ${parameter.name}`, { argument: parameter.name });
    }
  }

  const parsed = z.object(shape).passthrough().safeParse(input);
  if (parsed.success) {
    return parsed.data;
  }

  const [issue] = parsed.error.issues;
  if (!issue) {
    throw new ArgumentError(parsed.error.message, { cause: parsed.error });
  }
  const name = String(issue.path[0] ?? '');
  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === z.ZodParsedType.undefined) {
    throw new ArgumentError(`Missing required argument: ${name}`, { argument: name });
  }
  throw new ArgumentError(`Invalid value for argument '${name}': ${issue.message}`, {
    argument: name,
    cause: parsed.error
  });
}
