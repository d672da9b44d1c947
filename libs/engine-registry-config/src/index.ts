export { CERTS_DIR_ENV, DEFAULT_POSIX_CERTS_DIR, cleanPath, registryCertsDir, resolveCertsDir } from './certsDir';
