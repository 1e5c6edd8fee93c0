// src/routes/auditLogs.ts
import { Router } from "express";
import { FilterQuery } from "mongoose";
import AuditLog, { IAuditLog } from "../models/AuditLog";
import { asyncHandler } from "../middleware/asyncHandler";
import { InvalidInputError } from "../lib/attainmentErrors";
import { toDate, toText } from "../utils/requestFields";

const router = Router();

router.get(
  "/",
  asyncHandler(async (req, res) => {
    const action = toText(req.query.action);
    const from = toDate(req.query.fromDate);
    const to = toDate(req.query.toDate);
    if (from === null) throw new InvalidInputError("fromDate is not a valid date", { fromDate: toText(req.query.fromDate) });
    if (to === null) throw new InvalidInputError("toDate is not a valid date", { toDate: toText(req.query.toDate) });
    const page = Math.max(1, Number(req.query.page) || 1);
    const limit = Math.min(100, Math.max(1, Number(req.query.limit) || 10));
    const sort = req.query.sort === "asc" ? 1 : -1;

    const filter: FilterQuery<IAuditLog> = {};
    if (action) filter.action = action;
    if (from || to) {
      filter.createdAt = {
        ...(from ? { $gte: from } : {}),
        ...(to ? { $lte: to } : {}),
      };
    }

    const [logs, total] = await Promise.all([
      AuditLog.find(filter)
        .sort({ createdAt: sort })
        .skip((page - 1) * limit)
        .limit(limit)
        .lean(),
      AuditLog.countDocuments(filter),
    ]);

    res.json({
      data: logs,
      total,
      page,
      pages: Math.ceil(total / limit),
    });
  })
);

export default router;
