import { describe, expect, test } from "vitest";
import { ValidationError } from "./errors";
import {
  buildPatientInput,
  defaultPatientInput,
  FEATURE_COLUMNS,
  FEATURE_ORDER,
  FIELD_SPECS,
  toFeatureVector,
} from "./input";

const VALID = {
  pregnancies: 2,
  glucose: 150,
  bloodPressure: 72,
  skinThickness: 35,
  insulin: 0,
  bmi: 33.6,
  diabetesPedigree: 0.63,
  age: 50,
};

function validationErrorFor(fields: Record<string, unknown>): ValidationError {
  try {
    buildPatientInput(fields);
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error("expected a ValidationError");
}

function messageFor(fields: Record<string, unknown>): string {
  return validationErrorFor(fields).message;
}

describe("buildPatientInput", () => {
  test("accepts camelCase keys", () => {
    expect(buildPatientInput(VALID)).toEqual(VALID);
  });

  test("accepts training column names", () => {
    expect(
      buildPatientInput({
        Pregnancies: 1,
        Glucose: 120,
        BloodPressure: 70,
        SkinThickness: 20,
        Insulin: 80,
        BMI: 25.0,
        DiabetesPedigree: 0.5,
        Age: 30,
      })
    ).toEqual(defaultPatientInput());

    const aliased = buildPatientInput({
      ...defaultPatientInput(),
      diabetesPedigree: undefined,
      DiabetesPedigreeFunction: 1.25,
    });
    expect(aliased.diabetesPedigree).toBe(1.25);
  });

  test("accepts numeric strings from form posts", () => {
    const input = buildPatientInput({
      ...VALID,
      glucose: " 180 ",
      bmi: "41.2",
    });
    expect(input).toMatchObject({ glucose: 180, bmi: 41.2 });
  });

  test("inclusive bounds", () => {
    const low = Object.fromEntries(FIELD_SPECS.map((f) => [f.key, f.min]));
    const high = Object.fromEntries(FIELD_SPECS.map((f) => [f.key, f.max]));
    expect(buildPatientInput(low).diabetesPedigree).toBe(0.08);
    expect(buildPatientInput(high).insulin).toBe(1000);
  });

  test("rejects missing field and names it", () => {
    const { glucose: _omit, ...rest } = VALID;
    const err = validationErrorFor(rest);
    expect(err.field).toBe("glucose");
    expect(err.code).toBe("VALIDATION_FAILED");
    expect(err.message).toBe("Glukosa wajib diisi.");
  });

  test("empty string counts as missing", () => {
    expect(messageFor({ ...VALID, age: "" })).toBe("Usia wajib diisi.");
  });

  test("rejects non-numeric values", () => {
    expect(validationErrorFor({ ...VALID, insulin: "120mg" }).field).toBe(
      "insulin"
    );
    expect(messageFor({ ...VALID, bmi: Number.NaN })).toBe(
      "BMI harus berupa angka."
    );
    expect(validationErrorFor({ ...VALID, age: true }).field).toBe("age");
  });

  test("only plain decimal strings count as numbers", () => {
    for (const raw of ["0x78", "1e2", "0b1", "+120", "120.", ".5"]) {
      expect(messageFor({ ...VALID, glucose: raw })).toBe(
        "Glukosa harus berupa angka."
      );
    }
    expect(messageFor({ ...VALID, pregnancies: "-1" })).toBe(
      "Kehamilan harus di antara 0-20, diterima -1."
    );
  });

  test("rejects out of range values", () => {
    const err = validationErrorFor({ ...VALID, glucose: 401 });
    expect(err.field).toBe("glucose");
    expect(err.message).toBe("Glukosa harus di antara 50-400, diterima 401.");

    expect(messageFor({ ...VALID, diabetesPedigree: 0.07 })).toBe(
      "Riwayat Diabetes Keluarga harus di antara 0.08-2.50, diterima 0.07."
    );
    expect(validationErrorFor({ ...VALID, pregnancies: -1 }).field).toBe(
      "pregnancies"
    );
  });

  test("rejects fractions on integer fields and extra decimals", () => {
    expect(messageFor({ ...VALID, age: 30.5 })).toBe(
      "Usia harus bilangan bulat."
    );
    expect(messageFor({ ...VALID, bmi: 25.05 })).toBe(
      "BMI maksimal 1 angka desimal."
    );
  });

  test("reports the first bad field in feature order", () => {
    const err = validationErrorFor({ ...VALID, age: 500, pregnancies: 99 });
    expect(err.field).toBe("pregnancies");
  });
});

describe("feature vector", () => {
  test("fixed order", () => {
    expect(FEATURE_ORDER).toEqual([
      "pregnancies",
      "glucose",
      "bloodPressure",
      "skinThickness",
      "insulin",
      "bmi",
      "diabetesPedigree",
      "age",
    ]);
    expect(FEATURE_COLUMNS[6]).toBe("DiabetesPedigreeFunction");
  });

  test("toFeatureVector follows the order regardless of key order", () => {
    const shuffled = {
      age: 50,
      bmi: 33.6,
      glucose: 150,
      insulin: 0,
      pregnancies: 2,
      diabetesPedigree: 0.63,
      skinThickness: 35,
      bloodPressure: 72,
    };
    expect(toFeatureVector(shuffled)).toEqual([
      2, 150, 72, 35, 0, 33.6, 0.63, 50,
    ]);
  });

  test("defaults match the field specs", () => {
    const defaults = defaultPatientInput();
    for (const f of FIELD_SPECS) {
      expect(defaults[f.key]).toBe(f.defaultValue);
    }
  });
});
