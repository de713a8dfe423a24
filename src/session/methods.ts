/**
 * The RPC surface: binds each Session operation into a MethodRegistry.
 */

import { z } from 'zod';
import type { MethodRegistry } from '../rpc/registry.js';
import type { Session } from './session.js';

export function registerSessionMethods(registry: MethodRegistry, session: Session): void {
  registry.register('tables', {
    params: {},
    handler: () => session.tables(),
  });

  registry.register('views', {
    params: {},
    handler: () => session.views(),
  });

  registry.register('columns', {
    params: {
      catalog: z.string().nullable(),
      schema: z.string().nullable(),
      table: z.string(),
    },
    handler: ({ catalog, schema, table }) => session.columns(catalog, schema, table),
  });

  registry.register('execute', {
    params: { sql: z.string() },
    handler: ({ sql }) => session.execute(sql),
  });

  registry.register('metadata', {
    params: {},
    handler: () => session.metadata(),
  });

  registry.register('count', {
    params: {},
    handler: () => session.count(),
  });

  registry.register('page', {
    params: { max: z.number() },
    handler: ({ max }) => session.page(max),
  });

  registry.register('finish', {
    params: {},
    handler: () => session.finish(),
  });

  registry.register('quit', {
    params: {},
    handler: () => session.quit(),
  });
}
