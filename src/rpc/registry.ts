/**
 * MethodRegistry: explicit name → handler table for the dispatcher.
 *
 * Each method declares its parameters as an ordered zod shape. The order gives
 * positional binding; the shape checks arity and types for named binding.
 */

import { z } from 'zod';
import { InvalidParamsError } from './errors.js';
import type { JsonRpcParams } from './types.js';
import * as log from '../utils/logger.js';

export type MethodArgs<S extends z.ZodRawShape> = z.infer<z.ZodObject<S, 'strict'>>;

export interface MethodDefinition<S extends z.ZodRawShape> {
  params: S;
  handler: (args: MethodArgs<S>) => unknown;
}

export interface RegisteredMethod {
  name: string;
  paramNames: readonly string[];
  invoke(params: JsonRpcParams | undefined): Promise<unknown>;
}

export class MethodRegistry {
  private methods = new Map<string, RegisteredMethod>();

  register<S extends z.ZodRawShape>(name: string, definition: MethodDefinition<S>): void {
    if (this.methods.has(name)) {
      log.warn(`Method "${name}" already registered, overwriting`);
    }

    const schema = z.object(definition.params).strict();
    const paramNames = Object.keys(definition.params);

    this.methods.set(name, {
      name,
      paramNames,
      invoke: async (params) => {
        const parsed = schema.safeParse(bindArguments(name, paramNames, params));
        if (!parsed.success) {
          throw new InvalidParamsError(`${name}: ${formatIssues(parsed.error)}`);
        }
        return definition.handler(parsed.data);
      },
    });
    log.debug(`Registered method: ${name}(${paramNames.join(', ')})`);
  }

  get(name: string): RegisteredMethod | undefined {
    return this.methods.get(name);
  }

  names(): string[] {
    return Array.from(this.methods.keys());
  }

  get size(): number {
    return this.methods.size;
  }
}

/** Positional params are keyed by declaration order; named params pass through. */
function bindArguments(
  method: string,
  paramNames: readonly string[],
  params: JsonRpcParams | undefined,
): Record<string, unknown> {
  if (params === undefined) return {};
  if (!Array.isArray(params)) return params;

  if (params.length > paramNames.length) {
    throw new InvalidParamsError(
      `${method}: expected ${paramNames.length} argument(s), got ${params.length}`,
    );
  }

  const named: Record<string, unknown> = {};
  params.forEach((value, i) => {
    named[paramNames[i]] = value;
  });
  return named;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
