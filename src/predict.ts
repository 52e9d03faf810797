import { describeError, PredictionError } from "./errors";
import { FEATURE_ORDER, getFieldSpec, toFeatureVector } from "./input";
import type { Classifier, Scaler } from "./model";
import type {
  FeatureContribution,
  PatientInput,
  PredictionResult,
} from "./types";

const PROBABILITY_TOLERANCE = 1e-6;

function isFiniteVector(values: unknown, length: number): values is number[] {
  return (
    Array.isArray(values) &&
    values.length === length &&
    values.every((v) => typeof v === "number" && Number.isFinite(v))
  );
}

/**
 * Runs one already-validated input through the scaler and classifier.
 *
 * The input must have passed `buildPatientInput(...)`; nothing here checks
 * ranges. Throws `PredictionError` when either artifact is missing, throws,
 * or returns something that is not a two-class prediction.
 */
export function predict(
  model: Classifier | null | undefined,
  scaler: Scaler | null | undefined,
  input: PatientInput
): PredictionResult {
  if (!model) throw new PredictionError("Model belum dimuat.");
  if (!scaler) throw new PredictionError("Scaler belum dimuat.");

  const vector = toFeatureVector(input);

  let scaled: number[];
  try {
    scaled = scaler.transform(vector);
  } catch (err) {
    throw new PredictionError(`Scaler menolak input: ${describeError(err)}`, {
      cause: err,
    });
  }
  if (!isFiniteVector(scaled, FEATURE_ORDER.length)) {
    throw new PredictionError(
      "Scaler mengembalikan vektor tidak valid " +
        `(diharapkan ${FEATURE_ORDER.length} angka).`
    );
  }

  let rawLabel: number;
  let rawProbabilities: number[];
  try {
    rawLabel = model.predict(scaled);
    rawProbabilities = model.predictProbability(scaled);
  } catch (err) {
    throw new PredictionError(`Model menolak input: ${describeError(err)}`, {
      cause: err,
    });
  }

  if (rawLabel !== 0 && rawLabel !== 1) {
    throw new PredictionError(
      `Model mengembalikan label tidak dikenal: ${rawLabel}.`
    );
  }
  if (!isFiniteVector(rawProbabilities, 2)) {
    throw new PredictionError(
      "Model tidak mengembalikan distribusi dua kelas."
    );
  }

  const [p0, p1] = rawProbabilities;
  if (p0 < 0 || p1 < 0 || Math.abs(p0 + p1 - 1) > PROBABILITY_TOLERANCE) {
    throw new PredictionError(
      `Distribusi probabilitas tidak valid: [${p0}, ${p1}].`
    );
  }

  const classIndex = rawLabel === 1 ? 1 : 0;
  return {
    label: classIndex === 0 ? "NonDiabetic" : "Diabetic",
    classIndex,
    probabilities: [p0, p1],
  };
}

/**
 * Labelled feature importances, ascending, for models that expose them.
 *
 * Returns `null` when the model has no importances or they don't line up
 * with the feature order.
 */
export function featureContributions(
  model: Classifier
): FeatureContribution[] | null {
  const weights = model.featureImportances;
  if (!weights || !isFiniteVector([...weights], FEATURE_ORDER.length)) {
    return null;
  }

  return FEATURE_ORDER.map((key, i) => ({
    key,
    label: getFieldSpec(key).label,
    importance: weights[i],
  })).sort((a, b) => a.importance - b.importance);
}
