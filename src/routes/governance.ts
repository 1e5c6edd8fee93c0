// src/routes/governance.ts
import { Router } from "express";
import { asyncHandler } from "../middleware/asyncHandler";
import { logAudit } from "../lib/auditLogger";
import { InvalidInputError, NotFoundError } from "../lib/attainmentErrors";
import {
  GovernanceFields,
  captureGovernance,
  governanceWarnings,
  validateGovernanceFields,
} from "../utils/governanceSnapshot";
import { isRecord, toList, toNumber } from "../utils/requestFields";
import type { AppDeps } from "../app";

const readFields = (body: unknown): Omit<GovernanceFields, "version"> => {
  const src: Record<string, unknown> = isRecord(body) ? body : {};
  const weights: Record<string, unknown> = isRecord(src.categoryWeights) ? src.categoryWeights : {};

  return {
    categoryWeights: { IA1: toNumber(weights.IA1), IA2: toNumber(weights.IA2), END: toNumber(weights.END) },
    directWeight: toNumber(src.directWeight),
    indirectWeight: toNumber(src.indirectWeight),
    levelThresholds: toList(src.levelThresholds).map((t) => ({
      level: toNumber(isRecord(t) ? t.level : undefined),
      minPercent: toNumber(isRecord(t) ? t.minPercent : undefined),
    })),
    poTarget: toNumber(src.poTarget),
  };
};

export const createGovernanceRouter = ({ store, audit }: AppDeps) => {
  const router = Router();

  /**
   * Current governance version, with any weight-sum inconsistencies.
   */
  router.get(
    "/",
    asyncHandler(async (_req, res) => {
      const current = await store.latestGovernance();
      if (!current) throw new NotFoundError("Governance configuration", "current");

      res.json({ data: current, warnings: governanceWarnings(captureGovernance(current)) });
    })
  );

  /**
   * Publishes a new governance version. Earlier versions stay untouched so
   * stored results can always be traced to the parameters they used.
   */
  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const fields = readFields(req.body);
      const problems = validateGovernanceFields(fields);
      if (problems.length) {
        throw new InvalidInputError("Governance configuration is malformed", { problems }, 422);
      }

      const saved = await store.saveGovernance(fields);
      const warnings = governanceWarnings(captureGovernance(saved));

      await logAudit(req, audit, {
        action: "governance_version_created",
        details: { version: saved.version, warnings: warnings.map((w) => w.message) },
      });

      res.status(201).json({ data: saved, warnings });
    })
  );

  return router;
};
