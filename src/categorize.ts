import type {
  BloodPressureCategory,
  BmiCategory,
  GlucoseBand,
  GlucoseCategory,
  RiskTier,
} from "./types";

/**
 * Five-band glucose reading covering both measurement contexts.
 *
 * Bands are half-open and checked in ascending order:
 * - `< 100`: normal fasting value
 * - `100..125`: prediabetes (fasting)
 * - `126..139`: diabetes (fasting)
 * - `140..199`: prediabetes (2-hour)
 * - `>= 200`: diabetes (2-hour)
 *
 * Keep this separate from `glucoseStatus(...)`: the two disagree on where
 * "Diabetes" starts (126 fasting vs 200 post-load) on purpose.
 */
export function categorizeGlucose(glucose: number): GlucoseCategory {
  if (glucose < 100)
    return {
      band: "Normal",
      context: "fasting",
      label: "Normal (Puasa)",
      colorHint: "green",
      risk: "Low",
    };
  if (glucose < 126)
    return {
      band: "Prediabetes",
      context: "fasting",
      label: "Prediabetes (Puasa)",
      colorHint: "orange",
      risk: "Medium",
    };
  if (glucose < 140)
    return {
      band: "Diabetes",
      context: "fasting",
      label: "Diabetes (Puasa)",
      colorHint: "red",
      risk: "High",
    };
  if (glucose < 200)
    return {
      band: "Prediabetes",
      context: "two_hour",
      label: "Prediabetes (2 jam)",
      colorHint: "orange",
      risk: "Medium",
    };
  return {
    band: "Diabetes",
    context: "two_hour",
    label: "Diabetes (2 jam)",
    colorHint: "red",
    risk: "High",
  };
}

/**
 * Three-band status using the 2-hour OGTT thresholds only.
 *
 * Drives the live sidebar indicator and the category stored with each
 * history entry.
 */
export function glucoseStatus(glucose: number): GlucoseCategory {
  if (glucose < 140)
    return {
      band: "Normal",
      context: "two_hour",
      label: "Normal (2 jam)",
      colorHint: "green",
      risk: "Low",
    };
  if (glucose < 200)
    return {
      band: "Prediabetes",
      context: "two_hour",
      label: "Prediabetes (2 jam)",
      colorHint: "orange",
      risk: "Medium",
    };
  return {
    band: "Diabetes",
    context: "two_hour",
    label: "Diabetes (2 jam)",
    colorHint: "red",
    risk: "High",
  };
}

const BMI_LABELS: Record<BmiCategory, string> = {
  Underweight: "Kurus",
  Normal: "Normal",
  Overweight: "Gemuk",
  Obese: "Obesitas",
};

/**
 * BMI band, for display only; the model consumes the raw value.
 */
export function categorizeBmi(bmi: number): {
  category: BmiCategory;
  label: string;
} {
  let category: BmiCategory;
  if (bmi < 18.5) category = "Underweight";
  else if (bmi < 25) category = "Normal";
  else if (bmi < 30) category = "Overweight";
  else category = "Obese";
  return { category, label: BMI_LABELS[category] };
}

/**
 * Diastolic blood pressure band.
 */
export function categorizeBloodPressure(
  diastolic: number
): BloodPressureCategory {
  if (diastolic < 80) return "Normal";
  if (diastolic < 90) return "Prehypertension";
  if (diastolic < 100) return "Hypertension Stage 1";
  return "Hypertension Stage 2";
}

/**
 * Family-history risk from the diabetes pedigree function.
 * 0.5 and 1.0 both fall in the middle tier.
 */
export function interpretPedigree(dpf: number): RiskTier {
  if (dpf < 0.5) return "Low";
  if (dpf <= 1.0) return "Medium";
  return "High";
}

export type GlucoseChecklist = {
  fasting: Record<GlucoseBand, boolean>;
  twoHour: Record<GlucoseBand, boolean>;
};

/**
 * Marks which band the value would fall into under each measurement context.
 * Exactly one entry per context is `true`.
 */
export function glucoseChecklist(glucose: number): GlucoseChecklist {
  return {
    fasting: {
      Normal: glucose < 100,
      Prediabetes: glucose >= 100 && glucose < 126,
      Diabetes: glucose >= 126,
    },
    twoHour: {
      Normal: glucose < 140,
      Prediabetes: glucose >= 140 && glucose < 200,
      Diabetes: glucose >= 200,
    },
  };
}

export type GlucoseScaleBand = {
  start: number;
  end: number;
  label: string;
  color: string;
};

export const GLUCOSE_SCALE_MAX = 400;

export const GLUCOSE_SCALE: readonly GlucoseScaleBand[] = [
  { start: 0, end: 100, label: "Normal (Puasa)", color: "#28a745" },
  { start: 100, end: 126, label: "Prediabetes (Puasa)", color: "#ffc107" },
  { start: 126, end: 140, label: "Diabetes (Puasa)", color: "#dc3545" },
  { start: 140, end: 200, label: "Prediabetes (2 jam)", color: "#ffc107" },
  {
    start: 200,
    end: GLUCOSE_SCALE_MAX,
    label: "Diabetes (2 jam)",
    color: "#dc3545",
  },
];

export const GLUCOSE_THRESHOLDS: readonly number[] = [100, 126, 140, 200];
