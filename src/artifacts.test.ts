import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import {
  createArtifactCache,
  loadArtifacts,
  type LoadedArtifacts,
} from "./artifacts";
import { DEFAULT_MODEL_PATH, DEFAULT_SCALER_PATH } from "./config";
import { ArtifactLoadError } from "./errors";
import { defaultPatientInput, FEATURE_COLUMNS } from "./input";
import { predict } from "./predict";

const SHIPPED = {
  modelPath: DEFAULT_MODEL_PATH,
  scalerPath: DEFAULT_SCALER_PATH,
};

function tempFile(name: string, contents: string): string {
  const dir = mkdtempSync(join(tmpdir(), "screening-artifacts-"));
  const path = join(dir, name);
  writeFileSync(path, contents, "utf8");
  return path;
}

function forestFile(nodes: unknown[]): string {
  return tempFile(
    "model.json",
    JSON.stringify({
      kind: "random_forest",
      features: [...FEATURE_COLUMNS],
      classes: [0, 1],
      trees: [{ nodes }],
    })
  );
}

function loadErrorOf(fn: () => unknown): ArtifactLoadError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ArtifactLoadError) return err;
    throw err;
  }
  throw new Error("expected an ArtifactLoadError");
}

/** Loads `modelPath` beside the bundled scaler. */
function modelOnly(modelPath: string): () => LoadedArtifacts {
  return () => loadArtifacts({ modelPath, scalerPath: DEFAULT_SCALER_PATH });
}

describe("loadArtifacts", () => {
  test("loads the bundled exports", () => {
    const { model, scaler } = loadArtifacts(SHIPPED);
    const result = predict(model, scaler, defaultPatientInput());
    expect(result.label).toBe("NonDiabetic");
    // Leaves [90,5], [120,18] and [150,30], averaged.
    expect(result.probabilities[1]).toBeCloseTo(
      (5 / 95 + 18 / 138 + 30 / 180) / 3,
      10
    );
    expect(model.featureImportances?.[1]).toBe(0.32);
  });

  test("high glucose and BMI come out diabetic", () => {
    const { model, scaler } = loadArtifacts(SHIPPED);
    const result = predict(model, scaler, {
      pregnancies: 5,
      glucose: 250,
      bloodPressure: 70,
      skinThickness: 20,
      insulin: 200,
      bmi: 40,
      diabetesPedigree: 1.2,
      age: 60,
    });
    expect(result.label).toBe("Diabetic");
    expect(result.probabilities[1]).toBeCloseTo(
      (60 / 70 + 35 / 50 + 55 / 67) / 3,
      10
    );
  });

  test("the bundled scaler is order-sensitive", () => {
    const { scaler } = loadArtifacts(SHIPPED);
    const vector = [1, 120, 70, 20, 80, 25, 0.5, 30];
    const permuted = [120, 1, 70, 20, 80, 25, 30, 0.5];
    expect(scaler.transform(permuted)).not.toEqual(scaler.transform(vector));
  });

  test("missing file names the path", () => {
    const err = loadErrorOf(() =>
      loadArtifacts({
        modelPath: DEFAULT_MODEL_PATH,
        scalerPath: "does/not/exist.json",
      })
    );
    expect(err.code).toBe("ARTIFACT_LOAD_FAILED");
    expect(err.path.endsWith(join("does", "not", "exist.json"))).toBe(true);
    expect(err.message.startsWith("Berkas scaler tidak dapat dibaca")).toBe(
      true
    );
  });

  test("corrupt JSON", () => {
    const modelPath = tempFile("model.json", "{ not json");
    const err = loadErrorOf(modelOnly(modelPath));
    expect(err.path).toBe(modelPath);
    expect(err.message).toBe(
      `Berkas model rusak, bukan JSON yang valid (${modelPath}).`
    );
  });

  test("wrong feature order is rejected at load", () => {
    const scalerPath = tempFile(
      "scaler.json",
      JSON.stringify({
        kind: "standard_scaler",
        features: [...FEATURE_COLUMNS].reverse(),
        mean: [0, 0, 0, 0, 0, 0, 0, 0],
        scale: [1, 1, 1, 1, 1, 1, 1, 1],
      })
    );
    const err = loadErrorOf(() =>
      loadArtifacts({ modelPath: DEFAULT_MODEL_PATH, scalerPath })
    );
    expect(err.message).toMatch(
      /^Berkas scaler tidak sesuai format di features:/
    );
  });

  test("dangling child index is a load error", () => {
    const modelPath = forestFile([
      { feature: 1, threshold: 0, left: 7, right: 9 },
    ]);
    const cache = createArtifactCache({
      modelPath,
      scalerPath: DEFAULT_SCALER_PATH,
    });
    const state = cache.get();
    expect(state.status).toBe("unavailable");
    if (state.status !== "unavailable") return;
    expect(state.error).toBeInstanceOf(ArtifactLoadError);
    expect(state.error.message).toBe(
      "Berkas model tidak sesuai format di trees.0.nodes.0.left: " +
        `child 7 must be between 1 and 0 (${modelPath}).`
    );
  });

  test("cycles and empty leaves are load errors", () => {
    const cyclic = forestFile([
      { feature: 1, threshold: 0, left: 1, right: 2 },
      { feature: 0, threshold: 0, left: 0, right: 2 },
      { value: [3, 1] },
    ]);
    expect(loadErrorOf(modelOnly(cyclic)).message).toContain(
      "di trees.0.nodes.1.left:"
    );

    const empty = forestFile([
      { feature: 1, threshold: 0, left: 1, right: 2 },
      { value: [0, 0] },
      { value: [3, 1] },
    ]);
    expect(loadErrorOf(modelOnly(empty)).message).toContain(
      "di trees.0.nodes.1.value: leaf has an empty class distribution"
    );
  });

  test("unsupported model kind", () => {
    const modelPath = tempFile("model.json", JSON.stringify({ kind: "svm" }));
    const err = loadErrorOf(modelOnly(modelPath));
    expect(err.message).toMatch(/^Berkas model tidak sesuai format di kind:/);
  });
});

describe("createArtifactCache", () => {
  test("loads once and keeps the result", () => {
    let calls = 0;
    const cache = createArtifactCache(SHIPPED, (paths) => {
      calls += 1;
      return loadArtifacts(paths);
    });
    const first = cache.get();
    const second = cache.get();
    expect(first.status).toBe("ready");
    expect(second).toBe(first);
    expect(calls).toBe(1);
  });

  test("keeps a load failure as unavailable until reset", () => {
    let fail = true;
    const loaded: LoadedArtifacts = loadArtifacts(SHIPPED);
    const cache = createArtifactCache(SHIPPED, (paths) => {
      if (fail) {
        throw new ArtifactLoadError(paths.modelPath, "Berkas model tidak ada.");
      }
      return loaded;
    });

    const state = cache.get();
    expect(state.status).toBe("unavailable");
    if (state.status === "unavailable") {
      expect(state.error.message).toBe("Berkas model tidak ada.");
    }

    fail = false;
    expect(cache.get().status).toBe("unavailable");
    cache.reset();
    expect(cache.get().status).toBe("ready");
  });

  test("unexpected errors are not cached", () => {
    const cache = createArtifactCache(SHIPPED, () => {
      throw new TypeError("boom");
    });
    expect(() => cache.get()).toThrow("boom");
  });
});
