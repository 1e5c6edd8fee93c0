// src/routes/surveys.ts
import { Router } from "express";
import CourseOutcome from "../models/CourseOutcome";
import SurveySummary from "../models/SurveySummary";
import { asyncHandler } from "../middleware/asyncHandler";
import { logAudit } from "../lib/auditLogger";
import { loadEditableCourse } from "../lib/courseAccess";
import { ConflictError, InvalidInputError } from "../lib/attainmentErrors";
import { SurveyResponseRow, tallySurveyResponses } from "../utils/indirectAttainment";
import { compareIds } from "../utils/precision";
import { isRecord, toList } from "../utils/requestFields";
import type { AppDeps } from "../app";

const readResponses = (body: unknown): SurveyResponseRow[] =>
  toList(isRecord(body) ? body.responses : undefined).map((row) => {
    const answers: SurveyResponseRow = {};
    if (isRecord(row)) {
      for (const [key, value] of Object.entries(row)) {
        answers[key.trim().toUpperCase()] = typeof value === "string" ? value : undefined;
      }
    }
    return answers;
  });

export const createSurveyRouter = ({ audit }: AppDeps) => {
  const router = Router();

  /**
   * UPLOAD course exit survey responses. Each response maps a CO id to one of
   * Strongly Agree / Agree / Neutral / Disagree. Summaries are written once
   * per course and never edited afterwards.
   */
  router.post(
    "/:courseId",
    asyncHandler(async (req, res) => {
      const course = await loadEditableCourse(req.params.courseId);
      const courseId = course._id.toString();

      if (await SurveySummary.exists({ course: course._id })) {
        throw new ConflictError("Survey data for this course was already uploaded", { courseId });
      }

      const outcomes = await CourseOutcome.find({ course: course._id }).select("coId").lean();
      if (!outcomes.length) throw new InvalidInputError("Course has no outcomes to survey", { courseId }, 422);
      const outcomeByCo = new Map(outcomes.map((o) => [o.coId, o._id]));
      const coIds = [...outcomeByCo.keys()].sort(compareIds);

      const summaries = tallySurveyResponses(coIds, readResponses(req.body));
      await SurveySummary.insertMany(
        summaries.flatMap(({ coId, ...counts }) => {
          const courseOutcome = outcomeByCo.get(coId);
          return courseOutcome ? [{ ...counts, course: course._id, courseOutcome }] : [];
        })
      );

      const respondents = Math.max(0, ...summaries.map((s) => s.totalRespondents));
      await logAudit(req, audit, { action: "survey_uploaded", details: { courseId, outcomes: summaries.length, respondents } });

      res.status(201).json({ data: summaries });
    })
  );

  return router;
};
