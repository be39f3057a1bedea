#!/usr/bin/env node
// ---------------------------------------------------------------------------
// identity-sync entry point
// ---------------------------------------------------------------------------

import fs from 'fs';
import path from 'path';
import { parseArgs } from 'util';
import { env, loadConfig } from './config';
import { createLogger } from './logger';
import { runSync } from './run';

const USAGE = `Usage: identity-sync [--config <path>]

Converges Keycloak, Authentik and GitLab accounts to the configured user list.

Options:
  -c, --config <path>  Run configuration (default: $IDENTITY_SYNC_CONFIG)
  -h, --help           Show this help
  -v, --version        Show the version`;

function readVersion(): string {
  const pkg: unknown = JSON.parse(
    fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8'),
  );
  if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return 'unknown';
}

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      config: { type: 'string', short: 'c' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }
  if (values.version) {
    console.log(readVersion());
    return 0;
  }

  const configPath = values.config ?? env.configPath;
  if (!configPath) {
    console.error(USAGE);
    return 2;
  }

  const logger = createLogger(env.logLevel);
  try {
    const reports = await runSync(loadConfig(configPath), { logger });
    logger.info({ backends: reports.length }, 'Synchronization finished');
    return 0;
  } catch (err) {
    logger.error({ err }, 'Synchronization failed');
    return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  },
);
