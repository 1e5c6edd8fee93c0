// src/utils/directAttainment.ts
import {
  ASSESSMENT_CATEGORIES,
  AssessmentCategory,
  AttainmentWarning,
  LevelThreshold,
} from "../types/attainment";
import { classifyLevel } from "./thresholdClassifier";
import { compareIds, PERCENT_DIGITS, roundTo } from "./precision";

export interface DirectAttainment {
  coId: string;
  percentage: number;
  level: number;
}

// category -> coId -> percentage; only categories the course actually has
export type CategoryPercentages = ReadonlyMap<AssessmentCategory, ReadonlyMap<string, number>>;

/**
 * Weighted Direct CO percentage across IA1, IA2 and END.
 *
 * - A CO absent from a category the course has contributes 0 to that term.
 * - A category the course does not have is dropped and the remaining
 *   weights are renormalized.
 * - Weights are divided by their (present) sum, so a set that does not add
 *   up to 100 is scaled proportionally.
 */
export function aggregateDirect(
  coIds: ReadonlyArray<string>,
  byCategory: CategoryPercentages,
  weights: Readonly<Record<AssessmentCategory, number>>,
  thresholds: ReadonlyArray<LevelThreshold>
): { direct: DirectAttainment[]; warnings: AttainmentWarning[] } {
  const present = ASSESSMENT_CATEGORIES.filter((c) => byCategory.has(c));
  const totalWeight = present.reduce((sum, c) => sum + weights[c], 0);

  if (totalWeight <= 0) {
    return {
      direct: [],
      warnings: [
        {
          code: "EMPTY_DENOMINATOR",
          message: present.length
            ? `Assessment categories ${present.join(", ")} carry no weight; no Direct attainment computed`
            : "Course has no assessments; no Direct attainment computed",
          context: { categories: present.join(",") || "none" },
        },
      ],
    };
  }

  const direct = [...coIds].sort(compareIds).map((coId) => {
    const weighted = present.reduce((sum, c) => sum + weights[c] * (byCategory.get(c)?.get(coId) ?? 0), 0);
    const percentage = roundTo(weighted / totalWeight, PERCENT_DIGITS);
    return { coId, percentage, level: classifyLevel(percentage, thresholds) };
  });

  return { direct, warnings: [] };
}
