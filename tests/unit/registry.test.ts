import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { MethodRegistry } from '../../src/rpc/registry.js';
import { InvalidParamsError } from '../../src/rpc/errors.js';

describe('MethodRegistry', () => {
  let registry: MethodRegistry;

  beforeEach(() => {
    registry = new MethodRegistry();
    registry.register('concat', {
      params: { left: z.string(), right: z.string() },
      handler: ({ left, right }) => left + right,
    });
    registry.register('ping', {
      params: {},
      handler: () => 'pong',
    });
  });

  it('keeps parameter names in declaration order', () => {
    expect(registry.get('concat')?.paramNames).toEqual(['left', 'right']);
    expect(registry.names()).toEqual(['concat', 'ping']);
    expect(registry.size).toBe(2);
  });

  it('binds positional params by declaration order', async () => {
    await expect(registry.get('concat')?.invoke(['a', 'b'])).resolves.toBe('ab');
  });

  it('binds named params by key', async () => {
    await expect(registry.get('concat')?.invoke({ right: 'b', left: 'a' })).resolves.toBe('ab');
  });

  it('invokes with no arguments when params are absent', async () => {
    await expect(registry.get('ping')?.invoke(undefined)).resolves.toBe('pong');
    await expect(registry.get('ping')?.invoke([])).resolves.toBe('pong');
    await expect(registry.get('ping')?.invoke({})).resolves.toBe('pong');
  });

  it('rejects too many positional arguments', async () => {
    await expect(registry.get('ping')?.invoke([1])).rejects.toThrow(
      'ping: expected 0 argument(s), got 1',
    );
  });

  it('rejects missing arguments', async () => {
    await expect(registry.get('concat')?.invoke(['a'])).rejects.toThrow('concat: right: Required');
  });

  it('rejects unknown named arguments', async () => {
    await expect(registry.get('ping')?.invoke({ extra: true })).rejects.toBeInstanceOf(InvalidParamsError);
  });

  it('rejects arguments of the wrong type', async () => {
    await expect(registry.get('concat')?.invoke([1, 'b'])).rejects.toThrow(
      'concat: left: Expected string, received number',
    );
  });

  it('returns undefined for unknown methods', () => {
    expect(registry.get('nope')).toBeUndefined();
  });
});
