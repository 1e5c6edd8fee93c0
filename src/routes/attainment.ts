// src/routes/attainment.ts
import { Router } from "express";
import { asyncHandler } from "../middleware/asyncHandler";
import { computeRateLimiter } from "../middleware/security";
import { InvalidInputError, NotFoundError } from "../lib/attainmentErrors";
import type { CourseRunRecord, ProgramRunRecord } from "../services/attainmentStore";
import { toText } from "../utils/requestFields";
import type { AppDeps } from "../app";

const present = ({ result, version, computedAt, inputChecksum, outputChecksum }: CourseRunRecord | ProgramRunRecord) => ({
  ...result,
  version,
  computedAt: computedAt.toISOString(),
  inputChecksum,
  outputChecksum,
});

const semesterParam = (value: unknown) => {
  const semesterId = toText(value);
  if (!semesterId) throw new InvalidInputError("semester query parameter is required");
  return semesterId;
};

export const createAttainmentRouter = ({ store, runner }: AppDeps) => {
  const router = Router();

  /**
   * Recomputes a course and stores the result as a new version.
   * 423 when its semester is locked; nothing is written in that case.
   */
  router.post(
    "/courses/:courseId/compute",
    computeRateLimiter,
    asyncHandler(async (req, res) => {
      const record = await runner.runCourse(req.params.courseId);
      res.status(201).json({ data: present(record) });
    })
  );

  router.get(
    "/courses/:courseId",
    asyncHandler(async (req, res) => {
      const record = await store.latestCourseRun(req.params.courseId);
      if (!record) throw new NotFoundError("Course attainment", req.params.courseId);
      res.json({ data: present(record) });
    })
  );

  router.post(
    "/programs/:programId/compute",
    computeRateLimiter,
    asyncHandler(async (req, res) => {
      const record = await runner.runProgram(req.params.programId, semesterParam(req.query.semester));
      res.status(201).json({ data: present(record) });
    })
  );

  router.get(
    "/programs/:programId",
    asyncHandler(async (req, res) => {
      const semesterId = semesterParam(req.query.semester);
      const record = await store.latestProgramRun(req.params.programId, semesterId);
      if (!record) throw new NotFoundError("Program attainment", `${req.params.programId}/${semesterId}`);
      res.json({ data: present(record) });
    })
  );

  return router;
};
