import {
  buildIndonesianCopyPack,
  type ScreeningCopyPack,
  type TierCopy,
} from "./copy/id";
import type { RecommendationTier } from "./types";

const copy = buildIndonesianCopyPack();

/**
 * Guidance tier from the 2-hour thresholds (`>= 200`, `>= 140`, else normal).
 */
export function recommendationTier(glucose: number): RecommendationTier {
  if (glucose >= 200) return "diabetes";
  if (glucose >= 140) return "prediabetes";
  return "normal";
}

export function recommendationsFor(
  glucose: number
): TierCopy & { tier: RecommendationTier } {
  const tier = recommendationTier(glucose);
  return { tier, ...copy.tiers[tier] };
}

export function criticalGlucoseWarning(
  glucose: number
): ScreeningCopyPack["criticalWarning"] | null {
  return glucose >= 200 ? copy.criticalWarning : null;
}

export function sidebarGlucoseWarning(glucose: number): string | null {
  return glucose >= 200 ? copy.sidebarWarning : null;
}

export function disclaimerLines(): string[] {
  return [...copy.disclaimer];
}

/**
 * `0.8` -> `"80.0%"`.
 */
export function formatPercent(p: number): string {
  return `${(p * 100).toFixed(1)}%`;
}
