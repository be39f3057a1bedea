import type { BackendAdapter } from '../backend';
import type { SyncConfig } from '../config';
import type { HttpClientOptions } from '../http';
import { AuthentikBackend } from './authentik';
import { GitLabBackend } from './gitlab';
import { KeycloakBackend } from './keycloak';

export type SharedHttpOptions = Omit<HttpClientOptions, 'backend' | 'baseUrl' | 'authorize'>;

/** Configured backends, in the fixed order they are converged. */
export function createBackends(config: SyncConfig, http: SharedHttpOptions): BackendAdapter[] {
  const backends: BackendAdapter[] = [];
  if (config.keycloak) backends.push(new KeycloakBackend(config.keycloak, http));
  if (config.authentik) backends.push(new AuthentikBackend(config.authentik, http));
  if (config.gitlab) backends.push(new GitLabBackend(config.gitlab, http));
  return backends;
}

export { AuthentikBackend, GitLabBackend, KeycloakBackend };
