import { z } from 'zod';
import { EngineConfigError } from './errors';
import type { EngineEndpoint, EngineProtocol, HttpScheme } from './types';

export const DEFAULT_ENGINE_HOST = 'unix:///var/run/engine.sock';
export const DEFAULT_API_VERSION = '1.24';

const flagSchema = (fallback: boolean) =>
  z
    .enum(['1', '0', 'true', 'false', ''])
    .optional()
    .transform((value) => (value === undefined || value === '' ? fallback : value === '1' || value === 'true'));

// An exported but empty variable counts as unset.
const emptyAsUnset = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === '' ? undefined : value), schema);

export const engineEnvSchema = z.object({
  ENGINE_HOST: emptyAsUnset(z.string().default(DEFAULT_ENGINE_HOST)),
  ENGINE_API_VERSION: emptyAsUnset(
    z
      .string()
      .regex(/^\d+\.\d+$/, 'API version must look like "1.24"')
      .default(DEFAULT_API_VERSION),
  ),
  ENGINE_HTTP_RETRY: z.coerce.number().int().min(0).default(0),
  // Present-but-empty is meaningful: it strips the User-Agent header.
  ENGINE_USER_AGENT: z.string().optional(),
  ENGINE_TLS: flagSchema(false),
  ENGINE_TLS_VERIFY: flagSchema(true),
  ENGINE_CERT_PATH: emptyAsUnset(z.string().optional()),
});

export interface ParsedHost {
  protocol: EngineProtocol;
  address: string;
  basePath: string;
}

export interface EngineConfig {
  endpoint: EngineEndpoint;
  retries: number;
  userAgentOverride?: string;
  tlsVerify: boolean;
  certPath?: string;
}

/**
 * Splits `tcp://host:port[/base]` or `unix:///path/to.sock` into its parts.
 */
export function parseEngineHost(host: string): ParsedHost {
  const separator = host.indexOf('://');
  if (separator <= 0) {
    throw new EngineConfigError(`invalid daemon host "${host}"`, [
      { path: 'ENGINE_HOST', message: 'expected <protocol>://<address>' },
    ]);
  }
  const protocol = host.slice(0, separator);
  const rest = host.slice(separator + 3);

  if (protocol === 'unix') {
    if (!rest.startsWith('/')) {
      throw new EngineConfigError(`invalid unix socket host "${host}"`, [
        { path: 'ENGINE_HOST', message: 'socket path must be absolute' },
      ]);
    }
    return { protocol: 'unix', address: rest, basePath: '' };
  }

  if (protocol === 'tcp') {
    const slash = rest.indexOf('/');
    const address = slash === -1 ? rest : rest.slice(0, slash);
    const basePath = slash === -1 ? '' : rest.slice(slash).replace(/\/+$/, '');
    if (!address) {
      throw new EngineConfigError(`invalid tcp host "${host}"`, [{ path: 'ENGINE_HOST', message: 'missing address' }]);
    }
    return { protocol: 'tcp', address, basePath };
  }

  throw new EngineConfigError(`unsupported protocol "${protocol}" in daemon host "${host}"`, [
    { path: 'ENGINE_HOST', message: 'protocol must be tcp or unix' },
  ]);
}

/**
 * Reads client settings from the environment. This is the only place the
 * environment is consulted; the client itself takes explicit options.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = engineEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new EngineConfigError(
      `invalid engine configuration: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ')}`,
      issues,
    );
  }

  const values = parsed.data;
  const host = parseEngineHost(values.ENGINE_HOST);
  const scheme: HttpScheme = values.ENGINE_TLS ? 'https' : 'http';
  if (host.protocol === 'unix' && scheme === 'https') {
    throw new EngineConfigError('TLS is not supported over a unix socket', [
      { path: 'ENGINE_TLS', message: 'unix sockets are plaintext' },
    ]);
  }

  return {
    endpoint: {
      protocol: host.protocol,
      address: host.address,
      basePath: host.basePath,
      scheme,
      apiVersion: values.ENGINE_API_VERSION,
    },
    retries: values.ENGINE_HTTP_RETRY,
    userAgentOverride: values.ENGINE_USER_AGENT,
    tlsVerify: values.ENGINE_TLS_VERIFY,
    certPath: values.ENGINE_CERT_PATH,
  };
}
