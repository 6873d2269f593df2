import { z } from 'zod';

export interface UserCredentials {
  id: string;
  password: string;
}

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface ServerConfig {
  host: string;
  port: number;
  prefix: string;
  realm: string;
  logLevel: LogLevel;
  logPretty: boolean;
  users: UserCredentials[];
  maxInstances: number;
  productId?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const userList = z.string().transform((value, ctx) => {
  const users: UserCredentials[] = [];
  for (const entry of value.split(',')) {
    const trimmed = entry.trim();
    if (!trimmed) continue;
    const colon = trimmed.indexOf(':');
    if (colon <= 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected user:password, got '${trimmed}'`,
      });
      return z.NEVER;
    }
    users.push({ id: trimmed.slice(0, colon), password: trimmed.slice(colon + 1) });
  }
  return users;
});

const environmentSchema = z.object({
  CALDAV_HOST: z.string().min(1).default('127.0.0.1'),
  CALDAV_PORT: z.coerce.number().int().min(0).max(65535).default(5232),
  CALDAV_PREFIX: z.string().startsWith('/').default('/'),
  CALDAV_REALM: z.string().min(1).default('davlane'),
  CALDAV_LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  CALDAV_LOG_PRETTY: flag.default('false'),
  CALDAV_USERS: userList.default(''),
  CALDAV_MAX_INSTANCES: z.coerce.number().int().positive().default(1000),
  CALDAV_PRODUCT_ID: z.string().min(1).optional(),
});

/** Reads the server configuration from `CALDAV_*` environment variables. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = environmentSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new ConfigError(`invalid configuration: ${problems.join('; ')}`);
  }

  const values = result.data;
  return {
    host: values.CALDAV_HOST,
    port: values.CALDAV_PORT,
    prefix: values.CALDAV_PREFIX,
    realm: values.CALDAV_REALM,
    logLevel: values.CALDAV_LOG_LEVEL,
    logPretty: values.CALDAV_LOG_PRETTY,
    users: values.CALDAV_USERS,
    maxInstances: values.CALDAV_MAX_INSTANCES,
    productId: values.CALDAV_PRODUCT_ID,
  };
}
