import type { ImporterConfigInput } from './ImporterConfig.js';

const readEnv = (env: NodeJS.ProcessEnv, name: string): string | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return undefined;
  return raw.trim();
};

/** Configuration fallbacks read from the environment. Explicit options win over these. */
export const loadEnvDefaults = (env: NodeJS.ProcessEnv = process.env): ImporterConfigInput => ({
  loaderBinary: readEnv(env, 'ZIP2SQLITE_LOADER'),
  initialExponent: readEnv(env, 'ZIP2SQLITE_CHUNK_EXPONENT'),
  logLevel: readEnv(env, 'LOG_LEVEL'),
});
