import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { ArtifactPaths } from "./artifacts";
import { FIELD_SPECS } from "./input";

export type CliOptions = {
  inputPath: string | null;
  /** Field values given as flags, e.g. `--glucose 150`. */
  overrides: Record<string, string>;
  artifacts: ArtifactPaths;
  pretty: boolean;
  help: boolean;
};

/**
 * Reads a flag value from argv.
 *
 * Supports both styles:
 * - `--glucose 150`
 * - `--glucose=150`
 *
 * Returns `null` if the flag is not present or has no value.
 */
export function getArgValue(
  argv: readonly string[],
  flag: string
): string | null {
  const idx = argv.findIndex((a) => a === flag || a.startsWith(`${flag}=`));
  if (idx === -1) return null;
  const a = argv[idx];
  if (a.includes("=")) return a.split("=").slice(1).join("=");
  const next = argv[idx + 1];
  return next && !next.startsWith("--") ? next : null;
}

export function hasFlag(argv: readonly string[], flag: string): boolean {
  return argv.some((a) => a === flag || a.startsWith(`${flag}=`));
}

/**
 * `bloodPressure` -> `--blood-pressure`.
 */
export function fieldFlag(key: string): string {
  return `--${key.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`)}`;
}

export function parseCliArgs(
  argv: readonly string[],
  defaults: ArtifactPaths
): CliOptions {
  const overrides: Record<string, string> = {};
  for (const spec of FIELD_SPECS) {
    const v = getArgValue(argv, fieldFlag(spec.key));
    if (v !== null) overrides[spec.key] = v;
  }

  return {
    inputPath: getArgValue(argv, "--input"),
    overrides,
    artifacts: {
      modelPath: getArgValue(argv, "--model") ?? defaults.modelPath,
      scalerPath: getArgValue(argv, "--scaler") ?? defaults.scalerPath,
    },
    pretty: !hasFlag(argv, "--compact"),
    help: hasFlag(argv, "--help") || hasFlag(argv, "-h"),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads an input JSON file. Either a bare field object or `{ "input": {...} }`.
 */
export function loadInputFile(path: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(readFileSync(resolve(path), "utf8"));
  if (isRecord(parsed) && isRecord(parsed.input)) return parsed.input;
  if (isRecord(parsed)) return parsed;
  throw new Error(`Input file ${path} must contain a JSON object.`);
}

/**
 * Defaults, then file values, then flags.
 */
export function mergeFields(
  defaults: Record<string, unknown>,
  fromFile: Record<string, unknown> | null,
  overrides: Record<string, string>
): Record<string, unknown> {
  return { ...defaults, ...(fromFile ?? {}), ...overrides };
}

export function usage(): string {
  const fieldFlags = FIELD_SPECS.map(
    (f) => `[${fieldFlag(f.key)} <${f.min}-${f.max}>]`
  ).join(" ");
  return [
    "Usage:",
    `  npm run predict -- [--input <path-to-json>] ${fieldFlags}` +
      " [--model <path>] [--scaler <path>] [--compact]",
    "",
    "Example:",
    "  npm run predict -- --glucose 150 --bmi 31.2 --age 45",
  ].join("\n");
}
