// src/routes/semesters.ts
import { Router } from "express";
import { asyncHandler } from "../middleware/asyncHandler";
import { logAudit } from "../lib/auditLogger";
import { InvalidInputError, NotFoundError } from "../lib/attainmentErrors";
import { toText } from "../utils/requestFields";
import type { AppDeps } from "../app";

export const createSemesterRouter = ({ store, audit }: AppDeps) => {
  const router = Router();

  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const name = toText(req.body?.name);
      if (!name) throw new InvalidInputError("Semester name is required");

      const semester = await store.createSemester(name);
      await logAudit(req, audit, { action: "semester_created", details: { semesterId: semester.id, name } });

      res.status(201).json({ data: semester });
    })
  );

  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      const semester = await store.findSemester(req.params.id);
      if (!semester) throw new NotFoundError("Semester", req.params.id);
      res.json({ data: semester });
    })
  );

  /**
   * Locking a semester freezes every course and program result in it:
   * later compute requests are refused until it is unlocked.
   */
  router.patch(
    "/:id/lock",
    asyncHandler(async (req, res) => {
      const locked: unknown = req.body?.locked;
      if (typeof locked !== "boolean") throw new InvalidInputError("locked must be true or false", { locked: locked ?? null });

      const semester = await store.setSemesterLock(req.params.id, locked);
      if (!semester) throw new NotFoundError("Semester", req.params.id);

      await logAudit(req, audit, {
        action: locked ? "semester_locked" : "semester_unlocked",
        details: { semesterId: semester.id, name: semester.name },
      });

      res.json({ data: semester });
    })
  );

  return router;
};
