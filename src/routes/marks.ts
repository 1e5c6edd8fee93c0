// src/routes/marks.ts
import { Router } from "express";
import { Types } from "mongoose";
import Assessment from "../models/Assessment";
import AssessmentComponent from "../models/AssessmentComponent";
import Enrollment from "../models/Enrollment";
import StudentMark from "../models/StudentMark";
import { asyncHandler } from "../middleware/asyncHandler";
import { logAudit } from "../lib/auditLogger";
import { loadEditableCourse } from "../lib/courseAccess";
import { NotFoundError } from "../lib/attainmentErrors";
import { MarkRow, buildMarkRecords } from "../utils/markRows";
import { isRecord, toList, toText } from "../utils/requestFields";
import type { AppDeps } from "../app";

const readRows = (body: unknown): MarkRow[] =>
  toList(isRecord(body) ? body.rows : undefined).map((row) => {
    const marks: MarkRow["marks"] = {};
    const raw = isRecord(row) && isRecord(row.marks) ? row.marks : {};
    for (const [key, value] of Object.entries(raw)) {
      marks[key] = typeof value === "number" || typeof value === "string" || value === null ? value : undefined;
    }
    return { studentId: toText(isRecord(row) ? row.studentId : undefined), marks };
  });

export const createMarksRouter = ({ audit }: AppDeps) => {
  const router = Router();

  /**
   * UPLOAD marks for one assessment. Rows are { studentId, marks: { Q1: 7, … } }.
   * A single bad cell rejects the upload; nothing is written in that case.
   */
  router.post(
    "/:assessmentId",
    asyncHandler(async (req, res) => {
      const { assessmentId } = req.params;
      const assessment = Types.ObjectId.isValid(assessmentId) ? await Assessment.findById(assessmentId).lean() : null;
      if (!assessment) throw new NotFoundError("Assessment", assessmentId);

      const course = await loadEditableCourse(assessment.course.toString());
      const [components, enrollments] = await Promise.all([
        AssessmentComponent.find({ assessment: assessment._id }).lean(),
        Enrollment.find({ course: course._id }).select("studentId").lean(),
      ]);

      const records = buildMarkRecords(
        assessmentId,
        components.map((c) => ({ componentId: c._id.toString(), componentNumber: c.componentNumber, maxMarks: c.maxMarks })),
        enrollments.map((e) => e.studentId),
        readRows(req.body)
      );

      if (records.length) {
        await StudentMark.bulkWrite(
          records.map((r) => ({
            updateOne: {
              filter: { studentId: r.studentId, component: new Types.ObjectId(r.componentId) },
              update: { $set: { marks: r.marks } },
              upsert: true,
            },
          }))
        );
      }

      const students = new Set(records.map((r) => r.studentId)).size;
      console.log(`[Marks] ${assessment.category} of course ${course.code}: ${records.length} marks for ${students} students`);
      await logAudit(req, audit, {
        action: "marks_uploaded",
        details: { courseId: course._id.toString(), assessmentId, category: assessment.category, marks: records.length, students },
      });

      res.json({ data: { assessmentId, marks: records.length, students } });
    })
  );

  return router;
};
