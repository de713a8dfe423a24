import { z } from 'zod';
import { LOG_LEVELS } from '../utils/logger.js';

const TlsSchema = z.object({
  key: z.string().min(1),
  cert: z.string().min(1),
  passphrase: z.string().optional(),
});

const ServerSchema = z.object({
  host: z.string().default('localhost'),
  port: z.coerce.number().int().min(0).max(65_535).default(1995),
  maxBodyBytes: z.number().int().positive().default(10 * 1024 * 1024),
  tls: TlsSchema.optional(),
});

const DatabaseSchema = z.object({
  path: z.string().min(1).optional(),
  readonly: z.boolean().default(false),
  busyTimeoutMs: z.number().int().nonnegative().default(5_000),
});

const LogSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
});

export const RowpagerConfigSchema = z.object({
  server: ServerSchema.optional().transform(v => ServerSchema.parse(v ?? {})),
  database: DatabaseSchema.optional().transform(v => DatabaseSchema.parse(v ?? {})),
  log: LogSchema.optional().transform(v => LogSchema.parse(v ?? {})),
});

export type RowpagerConfig = z.infer<typeof RowpagerConfigSchema>;
