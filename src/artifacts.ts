import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { ZodType } from "zod";
import { ArtifactLoadError, describeError } from "./errors";
import {
  classifierArtifactSchema,
  createClassifier,
  standardScalerSchema,
  StandardScaler,
  type Classifier,
  type Scaler,
} from "./model";

export type ArtifactPaths = {
  modelPath: string;
  scalerPath: string;
};

export type LoadedArtifacts = {
  model: Classifier;
  scaler: Scaler;
};

export type ArtifactState =
  | ({ status: "ready" } & LoadedArtifacts)
  | { status: "unavailable"; error: ArtifactLoadError };

function readArtifact<T>(path: string, schema: ZodType<T>, what: string): T {
  const absolutePath = resolve(path);

  let raw: string;
  try {
    raw = readFileSync(absolutePath, "utf8");
  } catch (err) {
    throw new ArtifactLoadError(
      absolutePath,
      `Berkas ${what} tidak dapat dibaca (${absolutePath}): ` +
        describeError(err),
      { cause: err }
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ArtifactLoadError(
      absolutePath,
      `Berkas ${what} rusak, bukan JSON yang valid (${absolutePath}).`,
      { cause: err }
    );
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where =
      issue && issue.path.length > 0 ? ` di ${issue.path.join(".")}` : "";
    const reason = issue?.message ?? "unknown";
    throw new ArtifactLoadError(
      absolutePath,
      `Berkas ${what} tidak sesuai format${where}: ` +
        `${reason} (${absolutePath}).`,
      { cause: parsed.error }
    );
  }
  return parsed.data;
}

/**
 * Reads and validates the exported model and scaler.
 *
 * Throws `ArtifactLoadError` for the first file that is missing, unreadable,
 * not JSON, or not a supported export.
 */
export function loadArtifacts(paths: ArtifactPaths): LoadedArtifacts {
  const scaler = new StandardScaler(
    readArtifact(paths.scalerPath, standardScalerSchema, "scaler")
  );
  const model = createClassifier(
    readArtifact(paths.modelPath, classifierArtifactSchema, "model")
  );
  return { model, scaler };
}

export type ArtifactCache = {
  get(): ArtifactState;
  reset(): void;
};

/**
 * Loads the artifacts on first use and keeps the outcome, success or
 * failure, until `reset()`.
 */
export function createArtifactCache(
  paths: ArtifactPaths,
  load: (paths: ArtifactPaths) => LoadedArtifacts = loadArtifacts
): ArtifactCache {
  let state: ArtifactState | null = null;

  return {
    get(): ArtifactState {
      if (state) return state;
      try {
        state = { status: "ready", ...load(paths) };
      } catch (err) {
        if (!(err instanceof ArtifactLoadError)) throw err;
        state = { status: "unavailable", error: err };
      }
      return state;
    },
    reset(): void {
      state = null;
    },
  };
}
