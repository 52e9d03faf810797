import type { ArtifactPaths } from "./artifacts";

export const DEFAULT_MODEL_PATH = "models/diabetes-model.json";
export const DEFAULT_SCALER_PATH = "models/scaler.json";
const DEFAULT_PORT = 3000;
const DEFAULT_SESSION_TTL_MINUTES = 60;

export type ServerConfig = {
  artifacts: ArtifactPaths;
  port: number;
  sessionTtlMs: number;
  dev: boolean;
};

type Env = Record<string, string | undefined>;

function envString(env: Env, name: string): string | null {
  const v = env[name];
  return v && v.trim() ? v.trim() : null;
}

/**
 * Positive integer from the environment, or the fallback when unset or
 * unparseable.
 */
function envPositiveInt(env: Env, name: string, fallback: number): number {
  const v = envString(env, name);
  if (!v) return fallback;
  const n = Number.parseInt(v, 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export function artifactPathsFromEnv(env: Env = process.env): ArtifactPaths {
  return {
    modelPath: envString(env, "DIABETES_MODEL_PATH") ?? DEFAULT_MODEL_PATH,
    scalerPath: envString(env, "DIABETES_SCALER_PATH") ?? DEFAULT_SCALER_PATH,
  };
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  return {
    artifacts: artifactPathsFromEnv(env),
    port: envPositiveInt(env, "PORT", DEFAULT_PORT),
    sessionTtlMs:
      envPositiveInt(env, "SESSION_TTL_MINUTES", DEFAULT_SESSION_TTL_MINUTES) *
      60_000,
    dev: env.NODE_ENV !== "production",
  };
}
