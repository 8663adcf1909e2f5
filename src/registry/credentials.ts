/**
 * Registry credential resolution
 *
 * ## Resolution Order (per registry host)
 *
 * 1. IMAGE_RETAG_USERNAME / IMAGE_RETAG_PASSWORD environment variables
 * 2. Docker config (`$DOCKER_CONFIG/config.json`, default `~/.docker/config.json`):
 *    a) `credHelpers[<host>]`: run `docker-credential-<helper> get`
 *    b) `credsStore`: same, with the global helper
 *    c) `auths[<host>]`: `auth` (base64 user:password), `username`/`password`,
 *       or `identitytoken`
 * 3. Anonymous access
 *
 * This module only reads credentials; it never stores or prompts for them.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { execFile } from 'node:child_process';
import { logger as defaultLogger, type RetagLogger } from '../api/logger.js';
import { CancelledError } from './errors.js';
import { DOCKER_HUB_REGISTRY } from './reference.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Authentication material for one registry host
 */
export type Credential =
  | { readonly kind: 'basic'; readonly username: string; readonly password: string }
  /** OAuth2 refresh token, exchanged at the token realm */
  | { readonly kind: 'identity-token'; readonly username?: string; readonly token: string }
  /** Ready-to-use bearer token */
  | { readonly kind: 'registry-token'; readonly token: string };

/**
 * Supplies per-registry credentials to the registry transport
 */
export interface CredentialProvider {
  resolve(registry: string, signal?: AbortSignal): Promise<Credential | undefined>;
}

/**
 * Subset of ~/.docker/config.json this module reads
 */
export interface DockerConfigFile {
  auths?: Record<string, DockerAuthEntry>;
  credsStore?: string;
  credHelpers?: Record<string, string>;
}

export interface DockerAuthEntry {
  auth?: string;
  username?: string;
  password?: string;
  identitytoken?: string;
  registrytoken?: string;
}

/**
 * Runs `docker-credential-<helper> get` with the server URL on stdin and returns stdout
 */
export type CredentialHelperRunner = (
  helper: string,
  serverUrl: string,
  signal?: AbortSignal
) => Promise<string>;

export interface KeychainOptions {
  env?: NodeJS.ProcessEnv;
  /** Directory holding config.json (default: $DOCKER_CONFIG or ~/.docker) */
  configDir?: string;
  runHelper?: CredentialHelperRunner;
  logger?: RetagLogger;
}

// =============================================================================
// Constants
// =============================================================================

const DOCKER_HUB_KEYS = [
  'https://index.docker.io/v1/',
  'index.docker.io',
  'docker.io',
  'registry-1.docker.io',
];

const HELPER_TIMEOUT_MS = 15000;

/** Username docker credential helpers return for identity tokens */
const TOKEN_USERNAME = '<token>';

// =============================================================================
// Helpers
// =============================================================================

/**
 * Strip scheme and path from a docker config key ("https://host/v1/" -> "host")
 */
export function normalizeAuthKey(key: string): string {
  return key.replace(/^[a-z]+:\/\//i, '').replace(/\/.*$/, '').toLowerCase();
}

/**
 * Keys under which a registry may appear in a docker config, most specific first
 */
export function candidateKeys(registry: string): string[] {
  if (registry === DOCKER_HUB_REGISTRY) {
    return DOCKER_HUB_KEYS;
  }
  return [registry, `https://${registry}`, `http://${registry}`];
}

function defaultConfigDir(env: NodeJS.ProcessEnv): string {
  return env.DOCKER_CONFIG ?? path.join(os.homedir(), '.docker');
}

/**
 * Load the docker config file; a missing file yields an empty config
 */
export function loadDockerConfig(configDir: string, log: RetagLogger = defaultLogger): DockerConfigFile {
  const configPath = path.join(configDir, 'config.json');
  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch {
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return isRecord(parsed) ? toDockerConfig(parsed) : {};
  } catch (error) {
    log.warn(`Ignoring unreadable docker config ${configPath}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return {};
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function toDockerConfig(raw: Record<string, unknown>): DockerConfigFile {
  const config: DockerConfigFile = {};

  if (isRecord(raw.auths)) {
    config.auths = {};
    for (const [key, entry] of Object.entries(raw.auths)) {
      if (!isRecord(entry)) continue;
      config.auths[key] = {
        auth: optionalString(entry.auth),
        username: optionalString(entry.username),
        password: optionalString(entry.password),
        identitytoken: optionalString(entry.identitytoken),
        registrytoken: optionalString(entry.registrytoken),
      };
    }
  }

  config.credsStore = optionalString(raw.credsStore);

  if (isRecord(raw.credHelpers)) {
    config.credHelpers = {};
    for (const [key, helper] of Object.entries(raw.credHelpers)) {
      const name = optionalString(helper);
      if (name) config.credHelpers[key] = name;
    }
  }

  return config;
}

/**
 * Decode a docker config auth entry
 */
export function credentialFromAuthEntry(entry: DockerAuthEntry): Credential | undefined {
  if (entry.registrytoken) {
    return { kind: 'registry-token', token: entry.registrytoken };
  }

  let username = entry.username;
  let password = entry.password;

  if (entry.auth) {
    const decoded = Buffer.from(entry.auth, 'base64').toString('utf-8');
    const separator = decoded.indexOf(':');
    if (separator > 0) {
      username = decoded.substring(0, separator);
      password = decoded.substring(separator + 1);
    }
  }

  if (entry.identitytoken) {
    return { kind: 'identity-token', username, token: entry.identitytoken };
  }

  if (username && password) {
    return { kind: 'basic', username, password };
  }

  return undefined;
}

/**
 * Parse credential helper output ({ ServerURL, Username, Secret })
 */
export function credentialFromHelperOutput(output: string): Credential | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(output);
  } catch {
    return undefined;
  }
  if (!isRecord(parsed)) return undefined;

  const username = optionalString(parsed.Username);
  const secret = optionalString(parsed.Secret);
  if (!secret) return undefined;

  if (username === TOKEN_USERNAME || !username) {
    return { kind: 'identity-token', token: secret };
  }
  return { kind: 'basic', username, password: secret };
}

/**
 * Default helper runner: `docker-credential-<helper> get`
 */
export const runCredentialHelper: CredentialHelperRunner = (helper, serverUrl, signal) =>
  new Promise((resolve, reject) => {
    const child = execFile(
      `docker-credential-${helper}`,
      ['get'],
      { encoding: 'utf-8', timeout: HELPER_TIMEOUT_MS, signal },
      (error, stdout) => {
        if (error) {
          reject(error);
        } else {
          resolve(stdout);
        }
      }
    );
    // A helper that is missing or exits early closes stdin under us
    child.stdin?.on('error', reject);
    child.stdin?.end(serverUrl);
  });

function findByHost<T>(entries: Record<string, T> | undefined, registry: string): [string, T] | undefined {
  if (!entries) return undefined;

  for (const key of candidateKeys(registry)) {
    const entry = entries[key];
    if (entry !== undefined) return [key, entry];
  }

  const wanted = new Set(candidateKeys(registry).map(normalizeAuthKey));
  for (const [key, entry] of Object.entries(entries)) {
    if (wanted.has(normalizeAuthKey(key))) return [key, entry];
  }

  return undefined;
}

// =============================================================================
// Providers
// =============================================================================

/**
 * Provider that never supplies credentials
 */
export const anonymousCredentials: CredentialProvider = {
  async resolve(): Promise<Credential | undefined> {
    return undefined;
  },
};

/**
 * Provider with fixed credentials per registry host (useful for embedding and tests)
 */
export function staticCredentials(entries: Record<string, Credential>): CredentialProvider {
  return {
    async resolve(registry: string): Promise<Credential | undefined> {
      return findByHost(entries, registry)?.[1];
    },
  };
}

/**
 * Environment + docker config keychain
 */
export function createDefaultKeychain(options: KeychainOptions = {}): CredentialProvider {
  const env = options.env ?? process.env;
  const runHelper = options.runHelper ?? runCredentialHelper;
  const log = options.logger ?? defaultLogger;

  return {
    async resolve(registry: string, signal?: AbortSignal): Promise<Credential | undefined> {
      const envUsername = optionalString(env.IMAGE_RETAG_USERNAME);
      const envPassword = optionalString(env.IMAGE_RETAG_PASSWORD);
      if (envUsername && envPassword) {
        log.debug('Using credentials from environment', { registry });
        return { kind: 'basic', username: envUsername, password: envPassword };
      }

      const config = loadDockerConfig(options.configDir ?? defaultConfigDir(env), log);

      const helperEntry = findByHost(config.credHelpers, registry);
      const helper = helperEntry?.[1] ?? config.credsStore;
      if (helper) {
        const serverUrl = helperEntry?.[0] ?? candidateKeys(registry)[0] ?? registry;
        if (signal?.aborted) {
          throw new CancelledError(signal.reason);
        }
        try {
          const credential = credentialFromHelperOutput(await runHelper(helper, serverUrl, signal));
          if (credential) {
            log.debug('Using credentials from credential helper', { registry, helper });
            return credential;
          }
        } catch (error) {
          if (signal?.aborted) {
            throw new CancelledError(signal.reason);
          }
          // Helpers exit non-zero when they hold nothing for the host
          log.debug('Credential helper returned no credentials', {
            registry,
            helper,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }

      const authEntry = findByHost(config.auths, registry);
      if (authEntry) {
        const credential = credentialFromAuthEntry(authEntry[1]);
        if (credential) {
          log.debug('Using credentials from docker config', { registry, key: authEntry[0] });
          return credential;
        }
      }

      log.debug('No credentials found, using anonymous access', { registry });
      return undefined;
    },
  };
}
