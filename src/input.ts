import { ValidationError } from "./errors";
import type { FieldKey, PatientInput } from "./types";

export type FieldSpec = {
  key: FieldKey;
  /** Column name the scaler and model were fit with. */
  column: string;
  label: string;
  unit: string | null;
  min: number;
  max: number;
  step: number;
  /** 0 for integer fields. */
  decimals: number;
  defaultValue: number;
  help: string;
};

/**
 * Field definitions in feature order.
 *
 * The order is load-bearing: the scaler and model were fit on exactly this
 * column sequence and produce wrong results, without failing, if it changes.
 */
export const FIELD_SPECS: readonly FieldSpec[] = [
  {
    key: "pregnancies",
    column: "Pregnancies",
    label: "Kehamilan",
    unit: null,
    min: 0,
    max: 20,
    step: 1,
    decimals: 0,
    defaultValue: 1,
    help: "Jumlah kali hamil",
  },
  {
    key: "glucose",
    column: "Glucose",
    label: "Glukosa",
    unit: "mg/dL",
    min: 50,
    max: 400,
    step: 1,
    decimals: 0,
    defaultValue: 120,
    help: "Konsentrasi glukosa plasma 2 jam dalam tes toleransi glukosa oral",
  },
  {
    key: "bloodPressure",
    column: "BloodPressure",
    label: "Tekanan Darah",
    unit: "mm Hg",
    min: 40,
    max: 180,
    step: 1,
    decimals: 0,
    defaultValue: 70,
    help: "Tekanan darah diastolik",
  },
  {
    key: "skinThickness",
    column: "SkinThickness",
    label: "Ketebalan Kulit",
    unit: "mm",
    min: 0,
    max: 99,
    step: 1,
    decimals: 0,
    defaultValue: 20,
    help: "Ketebalan lipatan kulit trisep (normal: 10-40 mm)",
  },
  {
    key: "insulin",
    column: "Insulin",
    label: "Insulin",
    unit: "µU/mL",
    min: 0,
    max: 1000,
    step: 1,
    decimals: 0,
    defaultValue: 80,
    help: "Insulin serum 2 jam",
  },
  {
    key: "bmi",
    column: "BMI",
    label: "BMI",
    unit: "kg/m²",
    min: 10,
    max: 60,
    step: 0.1,
    decimals: 1,
    defaultValue: 25,
    help: "Indeks Massa Tubuh",
  },
  {
    key: "diabetesPedigree",
    column: "DiabetesPedigreeFunction",
    label: "Riwayat Diabetes Keluarga",
    unit: null,
    min: 0.08,
    max: 2.5,
    step: 0.01,
    decimals: 2,
    defaultValue: 0.5,
    help: "Fungsi silsilah diabetes (DPF)",
  },
  {
    key: "age",
    column: "Age",
    label: "Usia",
    unit: "tahun",
    min: 0,
    max: 100,
    step: 1,
    decimals: 0,
    defaultValue: 30,
    help: "Usia pasien",
  },
];

export const FEATURE_ORDER: readonly FieldKey[] = FIELD_SPECS.map((f) => f.key);

export const FEATURE_COLUMNS: readonly string[] = FIELD_SPECS.map(
  (f) => f.column
);

export function getFieldSpec(key: FieldKey): FieldSpec {
  const spec = FIELD_SPECS.find((f) => f.key === key);
  if (!spec) throw new Error(`Unknown field: ${key}`);
  return spec;
}

/**
 * Alternate keys accepted for each field, so that payloads using the
 * training column names (`Glucose`, `DiabetesPedigreeFunction`, ...) work
 * as well as the camelCase ones.
 */
function fieldAliases(spec: FieldSpec): string[] {
  const aliases = [spec.key, spec.column];
  if (spec.key === "diabetesPedigree") aliases.push("DiabetesPedigree");
  return aliases;
}

function pickField(fields: Record<string, unknown>, keys: string[]): unknown {
  for (const k of keys) {
    if (fields[k] !== undefined) return fields[k];
  }
  return undefined;
}

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Strictly parses a number from a form or JSON value.
 *
 * Strings must be plain decimals: trailing units ("120mg"), hex ("0x78")
 * and exponents ("1e2") are rejected.
 */
function parseNumeric(value: unknown): {
  value: number | null;
  present: boolean;
} {
  if (value === null || value === undefined) {
    return { value: null, present: false };
  }
  if (typeof value === "number") {
    return { value: Number.isFinite(value) ? value : null, present: true };
  }
  if (typeof value !== "string") return { value: null, present: true };

  const s = value.trim();
  if (!s) return { value: null, present: false };
  if (!DECIMAL_PATTERN.test(s)) return { value: null, present: true };
  return { value: Number(s), present: true };
}

function hasAtMostDecimals(value: number, decimals: number): boolean {
  const factor = 10 ** decimals;
  return Math.abs(Math.round(value * factor) - value * factor) < 1e-6;
}

function formatRange(spec: FieldSpec): string {
  const min = spec.min.toFixed(spec.decimals);
  return `${min}-${spec.max.toFixed(spec.decimals)}`;
}

function readField(fields: Record<string, unknown>, key: FieldKey): number {
  const spec = getFieldSpec(key);
  const parsed = parseNumeric(pickField(fields, fieldAliases(spec)));
  if (!parsed.present) {
    throw new ValidationError(key, `${spec.label} wajib diisi.`);
  }
  if (parsed.value === null) {
    throw new ValidationError(key, `${spec.label} harus berupa angka.`);
  }

  const n = parsed.value;
  if (!hasAtMostDecimals(n, spec.decimals)) {
    throw new ValidationError(
      key,
      spec.decimals === 0
        ? `${spec.label} harus bilangan bulat.`
        : `${spec.label} maksimal ${spec.decimals} angka desimal.`
    );
  }
  if (n < spec.min || n > spec.max) {
    throw new ValidationError(
      key,
      `${spec.label} harus di antara ${formatRange(spec)}, diterima ${n}.`
    );
  }
  return n;
}

/**
 * Validates raw field values and returns a `PatientInput`.
 *
 * Throws `ValidationError` naming the first offending field (in feature
 * order) when a value is missing, not a number, has too many decimal places,
 * or lies outside the field's closed range.
 */
export function buildPatientInput(
  fields: Record<string, unknown>
): PatientInput {
  return {
    pregnancies: readField(fields, "pregnancies"),
    glucose: readField(fields, "glucose"),
    bloodPressure: readField(fields, "bloodPressure"),
    skinThickness: readField(fields, "skinThickness"),
    insulin: readField(fields, "insulin"),
    bmi: readField(fields, "bmi"),
    diabetesPedigree: readField(fields, "diabetesPedigree"),
    age: readField(fields, "age"),
  };
}

export function defaultPatientInput(): PatientInput {
  return {
    pregnancies: 1,
    glucose: 120,
    bloodPressure: 70,
    skinThickness: 20,
    insulin: 80,
    bmi: 25,
    diabetesPedigree: 0.5,
    age: 30,
  };
}

/**
 * Encodes the input as the fixed-order vector the scaler expects.
 */
export function toFeatureVector(input: PatientInput): number[] {
  return FEATURE_ORDER.map((key) => input[key]);
}
