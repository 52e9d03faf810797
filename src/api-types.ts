import type { GlucoseScaleBand } from "./categorize";
import type { ScreeningCopyPack, TierCopy } from "./copy/id";
import type { FieldSpec } from "./input";
import type {
  FeatureContribution,
  FieldKey,
  HistoryEntry,
  RecommendationTier,
} from "./types";

export const SESSION_HEADER = "x-session-id";

/**
 * JSON bodies exchanged between the page and the server.
 */
export type ArtifactStatus = {
  ready: boolean;
  message: string | null;
};

export type MetaResponse = {
  fields: FieldSpec[];
  glucoseScale: GlucoseScaleBand[];
  glucoseThresholds: number[];
  historyLimit: number;
  artifacts: ArtifactStatus;
};

export type PredictResponse = {
  entry: HistoryEntry;
  recommendations: TierCopy & { tier: RecommendationTier };
  warning: ScreeningCopyPack["criticalWarning"] | null;
  featureContributions: FeatureContribution[] | null;
};

export type HistoryResponse = {
  entries: HistoryEntry[];
  total: number;
  limit: number;
};

export type ErrorResponse = {
  error: string;
  code?: string;
  field?: FieldKey;
};
