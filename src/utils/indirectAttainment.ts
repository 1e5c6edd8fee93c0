// src/utils/indirectAttainment.ts
import type { AttainmentWarning, SurveySummaryInput } from "../types/attainment";
import { InvalidInputError } from "../lib/attainmentErrors";
import { roundTo, SCORE_DIGITS } from "./precision";

export const LIKERT_SCALE = {
  "Strongly Agree": 3,
  Agree: 2,
  Neutral: 1,
  Disagree: 0,
} as const;

export type LikertAnswer = keyof typeof LIKERT_SCALE;

const isLikertAnswer = (value: string): value is LikertAnswer => Object.prototype.hasOwnProperty.call(LIKERT_SCALE, value);

export interface IndirectScore {
  coId: string;
  score: number; // 0–3
  warning?: AttainmentWarning;
}

/**
 * Average Likert score on the 0–3 scale. An empty survey scores exactly 0.
 */
export function computeIndirect(summary: SurveySummaryInput): IndirectScore {
  const counted = summary.stronglyAgree + summary.agree + summary.neutral + summary.disagree;
  const points =
    summary.stronglyAgree * LIKERT_SCALE["Strongly Agree"] +
    summary.agree * LIKERT_SCALE.Agree +
    summary.neutral * LIKERT_SCALE.Neutral +
    summary.disagree * LIKERT_SCALE.Disagree;

  let denominator = summary.totalRespondents;
  let warning: AttainmentWarning | undefined;

  if (counted > denominator) {
    warning = {
      code: "SURVEY_COUNT_MISMATCH",
      message: `Survey for ${summary.coId} has ${counted} answers but ${summary.totalRespondents} respondents; using the answer count`,
      context: { coId: summary.coId, answers: counted, totalRespondents: summary.totalRespondents },
    };
    denominator = counted;
  }

  const score = denominator > 0 ? roundTo(points / denominator, SCORE_DIGITS) : 0;
  return warning ? { coId: summary.coId, score, warning } : { coId: summary.coId, score };
}

export type SurveyResponseRow = Record<string, string | undefined>;

/**
 * Tallies individual survey responses into one summary per CO. Each row maps
 * a CO id (the question column) to a Likert answer. Rows with no answers at
 * all are skipped; any other blank or unknown answer rejects the upload, and
 * so does an upload with no answered row at all.
 */
export function tallySurveyResponses(coIds: ReadonlyArray<string>, rows: ReadonlyArray<SurveyResponseRow>): SurveySummaryInput[] {
  const summaries = new Map<string, SurveySummaryInput>(
    coIds.map((coId) => [coId, { coId, stronglyAgree: 0, agree: 0, neutral: 0, disagree: 0, totalRespondents: 0 }])
  );
  const errors: string[] = [];
  let answeredRows = 0;

  rows.forEach((row, index) => {
    const rowNum = index + 1;
    if (!coIds.some((coId) => (row[coId] ?? "").trim() !== "")) return;
    answeredRows++;

    for (const coId of coIds) {
      const answer = (row[coId] ?? "").trim();
      const summary = summaries.get(coId);
      if (!summary) continue;
      if (!isLikertAnswer(answer)) {
        errors.push(`Row ${rowNum}: ${coId} has invalid response "${answer}"`);
        continue;
      }
      summary.totalRespondents++;
      if (answer === "Strongly Agree") summary.stronglyAgree++;
      else if (answer === "Agree") summary.agree++;
      else if (answer === "Neutral") summary.neutral++;
      else summary.disagree++;
    }
  });

  if (errors.length) {
    throw new InvalidInputError("Survey responses rejected", { errors }, 422);
  }
  if (!answeredRows) {
    throw new InvalidInputError("Survey upload needs at least one response", { rows: rows.length, coIds: [...coIds] }, 422);
  }

  return [...summaries.values()];
}
