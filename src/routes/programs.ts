// src/routes/programs.ts
import { Router } from "express";
import Program from "../models/Program";
import ProgramOutcome from "../models/ProgramOutcome";
import { asyncHandler } from "../middleware/asyncHandler";
import { logAudit } from "../lib/auditLogger";
import { isDuplicateKey } from "../lib/mongoSession";
import { ConflictError, InvalidInputError } from "../lib/attainmentErrors";
import { compareIds } from "../utils/precision";
import { toText } from "../utils/requestFields";
import type { AppDeps } from "../app";

export const createProgramRouter = ({ audit }: AppDeps) => {
  const router = Router();

  /**
   * CREATE Program
   */
  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const code = toText(req.body?.code).toUpperCase();
      const name = toText(req.body?.name);
      if (!code || !name) throw new InvalidInputError("Program code and name are required");

      try {
        const program = await Program.create({ code, name });
        await logAudit(req, audit, { action: "program_created", details: { programId: program._id.toString(), code } });
        res.status(201).json({ data: program });
      } catch (err) {
        if (isDuplicateKey(err)) throw new ConflictError(`Program code ${code} already exists`, { code });
        throw err;
      }
    })
  );

  /**
   * GET All Programs
   */
  router.get(
    "/",
    asyncHandler(async (_req, res) => {
      const programs = await Program.find().sort({ code: 1 }).lean();
      res.json({ data: programs });
    })
  );

  /**
   * GET Program Outcomes (PO1–PO12)
   */
  router.get(
    "/outcomes",
    asyncHandler(async (_req, res) => {
      const outcomes = await ProgramOutcome.find().lean();
      res.json({ data: outcomes.sort((a, b) => compareIds(a.code, b.code)) });
    })
  );

  return router;
};
