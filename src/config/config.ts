import dotenv from 'dotenv';
import { readFileSync } from 'fs';
import { UpstreamAuthScheme } from '../types/enums.js';
import type { UpstreamCredentials } from '../types/gateway.types.js';
import {
  DEFAULT_MAX_ACTIVE_SESSIONS,
  DEFAULT_SESSION_TTL_SECONDS,
  DEFAULT_UPSTREAM_AUTH_TIMEOUT_MS,
  DEFAULT_UPSTREAM_TIMEOUT_MS,
} from './sessionConfig.js';

dotenv.config();

interface PackageInfo {
  name: string;
  version: string;
}

function readPackageInfo(): PackageInfo {
  // src/config and dist/src/config both sit two or three levels under the root
  for (const candidate of ['../../package.json', '../../../package.json']) {
    try {
      const raw = readFileSync(new URL(candidate, import.meta.url), 'utf8');
      const parsed: unknown = JSON.parse(raw);
      if (parsed && typeof parsed === 'object' && 'name' in parsed && 'version' in parsed) {
        return {
          name: String(parsed.name),
          version: String(parsed.version),
        };
      }
    } catch {
      continue;
    }
  }
  return { name: 'onec-gateway', version: '0.0.0' };
}

const packageInfo = readPackageInfo();

/**
 * Application basic information configuration
 * Read from package.json to ensure global consistency
 */
export const APP_INFO = {
  name: packageInfo.name,
  version: packageInfo.version,
} as const;

export interface AssistantConfig {
  baseUrl: string;
  token: string;
  timeoutMs: number;
  uiLanguage: string;
  programmingLanguage: string;
  scriptLanguage: string;
  maxActiveConversations: number;
  conversationTtlSeconds: number;
}

export interface GatewayConfig {
  port: number;
  basePath: string;
  upstream: {
    baseUrl: string;
    authScheme: UpstreamAuthScheme;
    probePath: string;
    timeoutMs: number;
    authTimeoutMs: number;
    serviceCredentials?: UpstreamCredentials;
  };
  sessions: {
    ttlSeconds: number;
    maxActive: number;
  };
  resourceMappingPath: string;
  shutdownTimeoutMs: number;
  /** Present only when ONEC_AI_TOKEN is set */
  assistant?: AssistantConfig;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number, min = 1): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readScheme(raw: string | undefined): UpstreamAuthScheme {
  if (!raw) {
    return UpstreamAuthScheme.Basic;
  }
  const scheme = Object.values(UpstreamAuthScheme).find((value) => value === raw.toLowerCase());
  if (!scheme) {
    throw new ConfigError(
      `UPSTREAM_AUTH_SCHEME must be one of ${Object.values(UpstreamAuthScheme).join(', ')}, got "${raw}"`
    );
  }
  return scheme;
}

function normalizeBasePath(raw: string | undefined): string {
  const value = (raw ?? '/api').trim();
  if (value === '' || value === '/') {
    return '/';
  }
  return '/' + value.replace(/^\/+|\/+$/g, '');
}

function readServiceCredentials(env: NodeJS.ProcessEnv, scheme: UpstreamAuthScheme): UpstreamCredentials | undefined {
  if (scheme === UpstreamAuthScheme.Token) {
    return env.UPSTREAM_TOKEN ? { kind: 'token', token: env.UPSTREAM_TOKEN } : undefined;
  }
  if (env.UPSTREAM_USERNAME) {
    return { kind: 'basic', username: env.UPSTREAM_USERNAME, password: env.UPSTREAM_PASSWORD ?? '' };
  }
  return undefined;
}

/**
 * Parse the process environment into a frozen gateway configuration
 */
export function loadGatewayConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const authScheme = readScheme(env.UPSTREAM_AUTH_SCHEME);
  const ttlSeconds = readInt(env, 'SESSION_TTL', DEFAULT_SESSION_TTL_SECONDS);
  const maxActive = readInt(env, 'MAX_ACTIVE_SESSIONS', DEFAULT_MAX_ACTIVE_SESSIONS);

  const baseUrl = (env.UPSTREAM_BASE_URL || 'http://localhost/base/odata/standard.odata').replace(/\/+$/, '');
  try {
    new URL(baseUrl);
  } catch {
    throw new ConfigError(`UPSTREAM_BASE_URL is not a valid URL: "${baseUrl}"`);
  }

  const assistant: AssistantConfig | undefined = env.ONEC_AI_TOKEN
    ? {
        baseUrl: (env.ONEC_AI_BASE_URL || 'https://code.1c.ai').replace(/\/+$/, ''),
        token: env.ONEC_AI_TOKEN,
        timeoutMs: readInt(env, 'ONEC_AI_TIMEOUT', 30) * 1000,
        uiLanguage: env.ONEC_AI_UI_LANGUAGE || 'russian',
        programmingLanguage: env.ONEC_AI_PROGRAMMING_LANGUAGE || '',
        scriptLanguage: env.ONEC_AI_SCRIPT_LANGUAGE || '',
        maxActiveConversations: maxActive,
        conversationTtlSeconds: ttlSeconds,
      }
    : undefined;

  const config: GatewayConfig = {
    port: readInt(env, 'PORT', 8000, 0),
    basePath: normalizeBasePath(env.GATEWAY_BASE_PATH),
    upstream: {
      baseUrl,
      authScheme,
      probePath: env.UPSTREAM_PROBE_PATH ?? '',
      timeoutMs: readInt(env, 'UPSTREAM_TIMEOUT_MS', DEFAULT_UPSTREAM_TIMEOUT_MS),
      authTimeoutMs: readInt(env, 'UPSTREAM_AUTH_TIMEOUT_MS', DEFAULT_UPSTREAM_AUTH_TIMEOUT_MS),
      serviceCredentials: readServiceCredentials(env, authScheme),
    },
    sessions: { ttlSeconds, maxActive },
    resourceMappingPath: env.RESOURCE_MAPPING_PATH || 'config/resources.json',
    shutdownTimeoutMs: readInt(env, 'SHUTDOWN_TIMEOUT_MS', 10000),
    assistant,
  };

  return Object.freeze(config);
}
