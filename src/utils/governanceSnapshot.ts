// src/utils/governanceSnapshot.ts
import {
  ASSESSMENT_CATEGORIES,
  AssessmentCategory,
  AttainmentWarning,
  GovernanceSnapshot,
  LevelThreshold,
} from "../types/attainment";
import { InvalidInputError } from "../lib/attainmentErrors";
import { roundTo } from "./precision";

const WEIGHT_TOLERANCE = 1e-6;

export interface GovernanceFields {
  version: number;
  categoryWeights: Record<AssessmentCategory, number>;
  directWeight: number;
  indirectWeight: number;
  levelThresholds: LevelThreshold[];
  poTarget: number;
}

const isNonNegative = (n: unknown): n is number => typeof n === "number" && Number.isFinite(n) && n >= 0;

/**
 * Checks the shape of a governance version. Returns the list of problems
 * rather than throwing so the HTTP layer can report all of them at once.
 */
export function validateGovernanceFields(fields: Omit<GovernanceFields, "version">): string[] {
  const problems: string[] = [];

  for (const category of ASSESSMENT_CATEGORIES) {
    if (!isNonNegative(fields.categoryWeights?.[category])) {
      problems.push(`categoryWeights.${category} must be a non-negative number`);
    }
  }
  if (!isNonNegative(fields.directWeight)) problems.push("directWeight must be a non-negative number");
  if (!isNonNegative(fields.indirectWeight)) problems.push("indirectWeight must be a non-negative number");
  if (!isNonNegative(fields.poTarget) || fields.poTarget > 3) problems.push("poTarget must be between 0 and 3");

  if (!Array.isArray(fields.levelThresholds) || fields.levelThresholds.length === 0) {
    problems.push("levelThresholds must be a non-empty list");
  } else {
    const seen = new Set<number>();
    fields.levelThresholds.forEach((t, i) => {
      if (!Number.isInteger(t?.level) || t.level < 1) problems.push(`levelThresholds[${i}].level must be a positive integer`);
      if (!isNonNegative(t?.minPercent) || t.minPercent > 100) {
        problems.push(`levelThresholds[${i}].minPercent must be between 0 and 100`);
      }
      if (seen.has(t?.level)) problems.push(`levelThresholds[${i}].level ${t.level} is duplicated`);
      seen.add(t?.level);
    });
  }

  return problems;
}

/**
 * Freezes a governance version into the snapshot a computation run reads.
 * Thresholds are copied and sorted descending by minimum percentage; the
 * caller's objects are never shared with the run.
 */
export function captureGovernance(fields: GovernanceFields): GovernanceSnapshot {
  const problems = validateGovernanceFields(fields);
  if (problems.length) {
    throw new InvalidInputError("Governance configuration is malformed", { version: fields.version, problems }, 422);
  }

  const thresholds = [...fields.levelThresholds]
    .map((t) => Object.freeze({ level: t.level, minPercent: t.minPercent }))
    .sort((a, b) => b.minPercent - a.minPercent || b.level - a.level);

  return Object.freeze({
    version: fields.version,
    categoryWeights: Object.freeze({
      IA1: fields.categoryWeights.IA1,
      IA2: fields.categoryWeights.IA2,
      END: fields.categoryWeights.END,
    }),
    directWeight: fields.directWeight,
    indirectWeight: fields.indirectWeight,
    levelThresholds: Object.freeze(thresholds),
    poTarget: fields.poTarget,
  });
}

/**
 * Weight sums that drift from their expected totals are accepted (and scaled
 * where the formula allows) but surfaced to the caller.
 */
export function governanceWarnings(snapshot: GovernanceSnapshot): AttainmentWarning[] {
  const warnings: AttainmentWarning[] = [];

  const categorySum = roundTo(ASSESSMENT_CATEGORIES.reduce((sum, c) => sum + snapshot.categoryWeights[c], 0), 6);
  if (Math.abs(categorySum - 100) > WEIGHT_TOLERANCE) {
    warnings.push({
      code: "CONFIG_INCONSISTENCY",
      message: `Assessment category weights sum to ${categorySum}, expected 100; weights are scaled proportionally`,
      context: { governanceVersion: snapshot.version, categoryWeightSum: categorySum },
    });
  }

  const blendSum = roundTo(snapshot.directWeight + snapshot.indirectWeight, 6);
  if (Math.abs(blendSum - 1) > WEIGHT_TOLERANCE) {
    warnings.push({
      code: "CONFIG_INCONSISTENCY",
      message: `Direct and indirect weights sum to ${blendSum}, expected 1.0; they are applied as given`,
      context: { governanceVersion: snapshot.version, blendWeightSum: blendSum },
    });
  }

  return warnings;
}
