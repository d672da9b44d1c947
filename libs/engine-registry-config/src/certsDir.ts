import path from 'node:path';

export const CERTS_DIR_ENV = 'ENGINE_REGISTRY_CERTS_PATH';
export const DEFAULT_POSIX_CERTS_DIR = '/etc/engine/certs.d';

/**
 * Directory holding per-registry trust material (`<dir>/<registry-host>/`).
 * The environment override wins when it is non-empty.
 */
export function resolveCertsDir(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): string {
  const override = env[CERTS_DIR_ENV];
  if (override) {
    return override;
  }
  if (platform === 'win32') {
    const programData = env.ProgramData ?? 'C:\\ProgramData';
    return path.win32.join(programData, 'engine', 'certs.d');
  }
  return DEFAULT_POSIX_CERTS_DIR;
}

/**
 * Makes a URL-ish registry name such as `https:/registry.local/v1` usable as
 * a directory name. Windows forbids `:` in path segments.
 */
export function cleanPath(value: string, platform: NodeJS.Platform = process.platform): string {
  if (platform === 'win32') {
    return value.replaceAll(':', '').replaceAll('/', '\\');
  }
  return value;
}

/** Trust material directory for one registry host. */
export function registryCertsDir(
  registryHost: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): string {
  const base = resolveCertsDir(env, platform);
  const joiner = platform === 'win32' ? path.win32 : path.posix;
  return joiner.join(base, cleanPath(registryHost, platform));
}
