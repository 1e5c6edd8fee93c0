// src/utils/finalAttainment.ts
import type { AttainmentWarning, CoFinalAttainment, GovernanceSnapshot } from "../types/attainment";
import type { DirectAttainment } from "./directAttainment";
import { classifyLevel } from "./thresholdClassifier";
import { percentToScore, roundTo, scoreToPercent, SCORE_DIGITS } from "./precision";

/**
 * Final = Direct (rescaled to 0–3) × directWeight + Indirect × indirectWeight.
 *
 * Without survey data for the CO, Final is the rescaled Direct value on its
 * own: the indirect share moves to the direct side for that CO only.
 */
export function combineFinal(
  direct: DirectAttainment,
  indirect: number | null,
  governance: GovernanceSnapshot
): { final: CoFinalAttainment; warning?: AttainmentWarning } {
  const directScore = percentToScore(direct.percentage);

  const finalValue =
    indirect === null
      ? directScore
      : roundTo(directScore * governance.directWeight + indirect * governance.indirectWeight, SCORE_DIGITS);

  const final: CoFinalAttainment = {
    coId: direct.coId,
    directPercentage: direct.percentage,
    directLevel: direct.level,
    indirectScore: indirect,
    finalValue,
    level: classifyLevel(scoreToPercent(finalValue), governance.levelThresholds),
  };

  if (indirect !== null) return { final };

  return {
    final,
    warning: {
      code: "MISSING_INDIRECT_DATA",
      message: `No survey data for ${direct.coId}; final attainment uses Direct only`,
      context: { coId: direct.coId },
    },
  };
}
