// ---------------------------------------------------------------------------
// Inline users file
//
// A JSON object keyed by identifier:
//   { "jdoe": { "first_name": "Jane", "last_name": "Doe",
//               "email": "jdoe@example.org", "roles": ["CS"] } }
// ---------------------------------------------------------------------------

import fs from 'fs';
import { z } from 'zod';
import { SourceError, describeError } from '../errors';
import type { CanonicalUser, DesiredState } from '../types';

const FileUserSchema = z.object({
  first_name: z.string(),
  last_name: z.string(),
  email: z.string(),
  matrix_id: z.string().nullish(),
  roles: z.array(z.string()),
  enabled: z.boolean().default(true),
});

const UsersFileSchema = z.record(z.string().min(1), FileUserSchema);

export function parseUsersFile(json: unknown): DesiredState {
  const parsed = UsersFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new SourceError(`Invalid users file: ${parsed.error.message}`);
  }

  const users = new Map<string, CanonicalUser>();
  for (const [identifier, user] of Object.entries(parsed.data)) {
    users.set(identifier, {
      identifier,
      firstName: user.first_name,
      lastName: user.last_name,
      email: user.email,
      matrixId: user.matrix_id ?? null,
      roles: user.roles,
      enabled: user.enabled,
    });
  }
  return users;
}

export async function readUsersFile(filePath: string): Promise<DesiredState> {
  let json: unknown;
  try {
    json = JSON.parse(await fs.promises.readFile(filePath, 'utf8'));
  } catch (err) {
    throw new SourceError(`Cannot read users file ${filePath}: ${describeError(err)}`, {
      cause: err,
    });
  }
  return parseUsersFile(json);
}
