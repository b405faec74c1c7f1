import { config as loadDotenv } from 'dotenv';

export interface EnvConfig {
  readonly sourceDir: string | undefined;
  readonly profilePath: string | undefined;
  readonly commentPrefix: string | undefined;
  readonly verbose: boolean;
}

/** Loads `.env` from the working directory (or the given path) into process.env. */
export function loadEnvFile(path?: string): void {
  loadDotenv(path ? { path } : {});
}

function parseFlag(raw: string | undefined): boolean {
  const v = (raw ?? '').trim().toLowerCase();
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return {
    sourceDir: env.CONFBUNDLE_SOURCE_DIR?.trim() || undefined,
    profilePath: env.CONFBUNDLE_PROFILE?.trim() || undefined,
    // Not trimmed: a prefix such as `-- ` carries its trailing space.
    commentPrefix: env.CONFBUNDLE_COMMENT_PREFIX,
    verbose: parseFlag(env.CONFBUNDLE_VERBOSE),
  };
}
