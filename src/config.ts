import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_USER_COLUMN_MAPPING } from './config/mapping';
import { SourceError, describeError } from './errors';

// ---------------------------------------------------------------------------
// Process environment
// ---------------------------------------------------------------------------

export const env = {
  logLevel: process.env.LOG_LEVEL ?? 'info',
  configPath: process.env.IDENTITY_SYNC_CONFIG ?? null,
} as const;

// ---------------------------------------------------------------------------
// Run configuration document
// ---------------------------------------------------------------------------

const NextcloudSchema = z.object({
  url: z.string().url(),
  username: z.string().min(1),
  password: z.string(),
});

const ColumnsSchema = z
  .object({
    identifier: z.string().min(1),
    first_name: z.string().min(1),
    last_name: z.string().min(1),
    roles: z.string().min(1),
    department: z.string().min(1),
  })
  .partial();

export const UsersProviderSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('file'),
    path: z.string().min(1),
  }),
  z.object({
    type: z.literal('nextcloud_table'),
    nextcloud: NextcloudSchema,
    table_id: z.number().int().nonnegative(),
    columns: ColumnsSchema.default({}),
    email_domain: z.string().min(1).default(DEFAULT_USER_COLUMN_MAPPING.emailDomain),
  }),
]);

export const KeycloakConfigSchema = z.object({
  url: z.string().url(),
  realm: z.string().min(1),
  username: z.string().min(1),
  password: z.string(),
  client_id: z.string().min(1),
  /** Realm the admin account authenticates against. */
  auth_realm: z.string().min(1).default('master'),
  /** What happens to realm users absent from the desired state. */
  removal: z.enum(['delete', 'disable']).default('delete'),
});

export const AuthentikConfigSchema = z.object({
  url: z.string().url(),
  token: z.string().min(1),
  /** Only users under this path are managed; everything else is left alone. */
  path: z.string().min(1).default('users'),
});

export const GitLabConfigSchema = z.object({
  url: z.string().url(),
  token: z.string().min(1),
  group_id: z.number().int().positive(),
  owner_role: z.string().min(1),
  maintainer_role: z.string().min(1),
});

export const SyncConfigSchema = z.object({
  users_provider: UsersProviderSchema,
  keycloak: KeycloakConfigSchema.optional(),
  authentik: AuthentikConfigSchema.optional(),
  gitlab: GitLabConfigSchema.optional(),
  audit: z.object({ database: z.string().min(1) }).optional(),
  request_timeout_ms: z.number().int().positive().default(30_000),
});

export type UsersProviderConfig = z.infer<typeof UsersProviderSchema>;
export type KeycloakConfig = z.infer<typeof KeycloakConfigSchema>;
export type AuthentikConfig = z.infer<typeof AuthentikConfigSchema>;
export type GitLabConfig = z.infer<typeof GitLabConfigSchema>;
export type SyncConfig = z.infer<typeof SyncConfigSchema>;

/**
 * Validates a parsed configuration document.  Relative file paths inside it
 * are resolved against `baseDir`.
 */
export function parseConfig(json: unknown, baseDir: string): SyncConfig {
  const parsed = SyncConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new SourceError(`Invalid configuration: ${parsed.error.message}`);
  }

  const config = parsed.data;
  return {
    ...config,
    users_provider:
      config.users_provider.type === 'file'
        ? { ...config.users_provider, path: path.resolve(baseDir, config.users_provider.path) }
        : config.users_provider,
    audit: config.audit && { database: path.resolve(baseDir, config.audit.database) },
  };
}

export function loadConfig(configPath: string): SyncConfig {
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (err) {
    throw new SourceError(`Cannot read configuration ${configPath}: ${describeError(err)}`, {
      cause: err,
    });
  }
  return parseConfig(json, path.dirname(path.resolve(configPath)));
}
