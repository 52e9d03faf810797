import type { ArtifactState } from "./artifacts";
import { createHistoryEntry, type SessionContext } from "./history";
import { buildPatientInput } from "./input";
import { predict } from "./predict";
import type { HistoryEntry } from "./types";

/**
 * Submit pipeline for one interaction.
 *
 * 1) Validate the raw fields (`ValidationError`).
 * 2) Require loaded artifacts (`ArtifactLoadError`).
 * 3) Predict (`PredictionError`).
 * 4) Record the entry in the session's history and return it.
 *
 * Nothing is appended when any step fails.
 */
export function runAssessment(
  session: SessionContext,
  artifacts: ArtifactState,
  fields: Record<string, unknown>,
  now: Date = new Date()
): HistoryEntry {
  const input = buildPatientInput(fields);
  if (artifacts.status === "unavailable") throw artifacts.error;

  const result = predict(artifacts.model, artifacts.scaler, input);
  const entry = createHistoryEntry(input, result, now);
  session.history.append(entry);
  return entry;
}
