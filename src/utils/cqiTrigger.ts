// src/utils/cqiTrigger.ts
import type { CoFinalAttainment, CqiActionRequest } from "../types/attainment";
import { roundTo, SCORE_DIGITS } from "./precision";

/**
 * One CQI action request per CO whose Final value is strictly below the
 * target. Lifecycle of the request is owned by whoever receives it.
 */
export function decideCqi(finals: ReadonlyArray<CoFinalAttainment>, poTarget: number): CqiActionRequest[] {
  return finals
    .filter((f) => f.finalValue < poTarget)
    .map((f) => ({
      coId: f.coId,
      finalValue: f.finalValue,
      target: poTarget,
      shortfall: roundTo(poTarget - f.finalValue, SCORE_DIGITS),
    }));
}
