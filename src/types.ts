/**
 * The eight measurements the classifier was trained on.
 *
 * Key order matches the feature order; see `FEATURE_ORDER` in `./input`.
 */
export type PatientInput = {
  pregnancies: number;
  glucose: number;
  bloodPressure: number;
  skinThickness: number;
  insulin: number;
  bmi: number;
  diabetesPedigree: number;
  age: number;
};

export type FieldKey = keyof PatientInput;

export type RiskTier = "Low" | "Medium" | "High";

export type ColorHint = "green" | "orange" | "red";

export type GlucoseBand = "Normal" | "Prediabetes" | "Diabetes";

/**
 * Which measurement context the thresholds assume:
 * after an 8 hour fast, or 2 hours into an OGTT.
 */
export type GlucoseContext = "fasting" | "two_hour";

export type GlucoseCategory = {
  band: GlucoseBand;
  context: GlucoseContext;
  label: string;
  colorHint: ColorHint;
  risk: RiskTier;
};

export type BmiCategory = "Underweight" | "Normal" | "Overweight" | "Obese";

export type BloodPressureCategory =
  | "Normal"
  | "Prehypertension"
  | "Hypertension Stage 1"
  | "Hypertension Stage 2";

export type RecommendationTier = "normal" | "prediabetes" | "diabetes";

export type ClassLabel = "NonDiabetic" | "Diabetic";

/**
 * Output of one model invocation.
 *
 * `probabilities` is indexed by class: `[nonDiabetic, diabetic]`.
 */
export type PredictionResult = {
  label: ClassLabel;
  classIndex: 0 | 1;
  probabilities: readonly [number, number];
};

/**
 * One submission, as kept in a session's history.
 *
 * `category` uses the 2-hour (OGTT) thresholds, which is how the Glucose
 * feature is measured; `detailedCategory` is the five-band reading that also
 * covers fasting values.
 */
export type HistoryEntry = Readonly<{
  id: string;
  createdAt: string;
  input: Readonly<PatientInput>;
  result: Readonly<PredictionResult>;
  category: Readonly<GlucoseCategory>;
  detailedCategory: Readonly<GlucoseCategory>;
}>;

export type FeatureContribution = {
  key: FieldKey;
  label: string;
  importance: number;
};
