import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';
import { InvalidInputError } from '../../core/errors.js';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
const EnvSchema = z.enum(['dev', 'prod', 'test']);

// Table names are interpolated into DDL, so only plain identifiers are accepted.
const IdentifierSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain SQL identifier');

const LiveSchema = z.object({
  roomId: z.coerce.string().regex(/^\d+$/, 'room id must be numeric'),
  onlineMsg: z.string().default('开播了'),
  offlineMsg: z.string().default('下播了'),
  pollIntervalSec: z.number().int().positive().default(60),
});

const GroupSchema = z.object({
  id: z.number().int().nonnegative(),
  // userId -> display name
  knownMembers: z.record(z.string()).default({}),
  live: LiveSchema.optional(),
  command: z
    .object({
      adminIds: z.array(z.number().int()).default([]),
    })
    .optional(),
});

const AppConfigSchema = z.object({
  app: z
    .object({
      name: z.string().default('SegmentLiveBot'),
      env: EnvSchema.default('prod'),
    })
    .default({}),
  logging: z
    .object({
      level: LogLevelSchema.default('info'),
      color: z.boolean().default(true),
      persistLevel: LogLevelSchema.default('info'),
    })
    .default({}),
  adapters: z
    .object({
      qq: z
        .object({
          enabled: z.boolean().default(true),
          wsPort: z.number().int().positive().default(6090),
          token: z.coerce.string().optional(),
          apiTimeoutMs: z.number().int().positive().default(10_000),
        })
        .default({}),
    })
    .default({}),
  database: z
    .object({
      path: z.string().default('./data/store.db'),
      groupTablePrefix: IdentifierSchema.default('message'),
      logTableName: IdentifierSchema.default('bot_log'),
      utcOffsetHours: z.number().min(-12).max(14).default(8),
    })
    .default({}),
  storage: z
    .object({
      exportDir: z.string().default('./data/exports'),
    })
    .default({}),
  liveApi: z
    .object({
      baseUrl: z.string().url().default('https://api.live.bilibili.com'),
      timeoutMs: z.number().int().positive().default(10_000),
    })
    .default({}),
  objectStorage: z
    .object({
      scriptPath: z.string(),
    })
    .optional(),
  groups: z.array(GroupSchema).default([]),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type GroupConfig = z.infer<typeof GroupSchema>;
export type LiveConfig = z.infer<typeof LiveSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Validate a raw (already parsed) config object and apply defaults and env overrides.
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = AppConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new InvalidInputError(`Invalid config: ${issues}`);
  }
  const cfg = parsed.data;

  const envName = EnvSchema.safeParse(env.NODE_ENV);
  if (envName.success) {
    cfg.app.env = envName.data;
  }
  if (!cfg.adapters.qq.token && env.QQ_ADAPTER_TOKEN) {
    cfg.adapters.qq.token = env.QQ_ADAPTER_TOKEN;
  }

  // Auto-disable QQ adapter if token is missing in prod (warn instead of fail)
  if (cfg.adapters.qq.enabled && cfg.app.env === 'prod' && !cfg.adapters.qq.token) {
    console.warn(
      '[CONFIG] QQ adapter enabled in prod but no token configured. Disabling adapter. Set adapters.qq.token or QQ_ADAPTER_TOKEN to enable.',
    );
    cfg.adapters.qq.enabled = false;
  }

  const seen = new Set<number>();
  for (const group of cfg.groups) {
    if (seen.has(group.id)) {
      throw new InvalidInputError(`Invalid config: group ${group.id} is declared twice`);
    }
    seen.add(group.id);
  }
  return cfg;
}

export function loadConfig(filePath?: string): AppConfig {
  const path = filePath ?? process.env.BOT_CONFIG ?? resolve(process.cwd(), 'config', 'default.yaml');
  const raw: unknown = parse(readFileSync(path, 'utf-8'));
  return parseConfig(raw);
}

export function findGroup(cfg: Pick<AppConfig, 'groups'>, groupId: number): GroupConfig | undefined {
  return cfg.groups.find((g) => g.id === groupId);
}
