// src/routes/courses.ts
import { Router } from "express";
import { Types } from "mongoose";
import Course from "../models/Course";
import Program from "../models/Program";
import Semester from "../models/Semester";
import CourseOutcome from "../models/CourseOutcome";
import Assessment from "../models/Assessment";
import AssessmentComponent from "../models/AssessmentComponent";
import Enrollment from "../models/Enrollment";
import COPOMapping from "../models/COPOMapping";
import ProgramOutcome from "../models/ProgramOutcome";
import SurveySummary from "../models/SurveySummary";
import { asyncHandler } from "../middleware/asyncHandler";
import { logAudit } from "../lib/auditLogger";
import { loadEditableCourse, openCourseScope } from "../lib/courseAccess";
import { inTransaction, isDuplicateKey } from "../lib/mongoSession";
import { ConflictError, InvalidInputError, NotFoundError } from "../lib/attainmentErrors";
import { isMappingLevel } from "../types/attainment";
import { readAssessment } from "../utils/assessmentRows";
import { assertOutcomeUnreferenced, assertSemesterOpen, readNewOutcome, readOutcomeChanges, readStudentIds } from "../utils/courseRules";
import { summarizeCourseProgress } from "../utils/courseProgress";
import { compareIds } from "../utils/precision";
import { field, rejectIfProblems, toList, toNumber, toText } from "../utils/requestFields";
import type { AppDeps } from "../app";

export const createCourseRouter = ({ store, audit }: AppDeps) => {
  const router = Router();

  /**
   * CREATE Course (one offering of a course code in a semester)
   */
  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const code = toText(req.body?.code).toUpperCase();
      const name = toText(req.body?.name);
      const programId = toText(req.body?.programId);
      const semesterId = toText(req.body?.semesterId);
      if (!code || !name) throw new InvalidInputError("Course code and name are required");

      if (!Types.ObjectId.isValid(programId) || !(await Program.exists({ _id: programId }))) {
        throw new NotFoundError("Program", programId);
      }
      const semester = Types.ObjectId.isValid(semesterId) ? await Semester.findById(semesterId).lean() : null;
      if (!semester) throw new NotFoundError("Semester", semesterId);
      assertSemesterOpen(semester, { semesterId }, "no courses can be added");

      try {
        const course = await Course.create({ code, name, program: programId, semester: semesterId });
        await logAudit(req, audit, { action: "course_created", details: { courseId: course._id.toString(), code, semesterId } });
        res.status(201).json({ data: course });
      } catch (err) {
        if (isDuplicateKey(err)) throw new ConflictError(`Course ${code} already exists in this semester`, { code, semesterId });
        throw err;
      }
    })
  );

  /**
   * GET Course with its outcomes and assessment structure
   */
  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      const { id } = req.params;
      const course = Types.ObjectId.isValid(id) ? await Course.findById(id).lean() : null;
      if (!course) throw new NotFoundError("Course", id);

      const [outcomes, assessments, enrolled] = await Promise.all([
        CourseOutcome.find({ course: course._id }).lean(),
        Assessment.find({ course: course._id }).lean(),
        Enrollment.countDocuments({ course: course._id }),
      ]);
      const components = await AssessmentComponent.find({ assessment: { $in: assessments.map((a) => a._id) } }).lean();
      const coIdByOid = new Map(outcomes.map((o) => [o._id.toString(), o.coId]));

      res.json({
        data: {
          ...course,
          enrolled,
          outcomes: outcomes.sort((a, b) => compareIds(a.coId, b.coId)),
          assessments: assessments.map((a) => ({
            ...a,
            components: components
              .filter((c) => c.assessment.equals(a._id))
              .sort((x, y) => compareIds(x.componentNumber, y.componentNumber))
              .map((c) => ({ ...c, coId: coIdByOid.get(c.courseOutcome.toString()) ?? null })),
          })),
        },
      });
    })
  );

  /**
   * ADD Course Outcome
   */
  router.post(
    "/:id/outcomes",
    asyncHandler(async (req, res) => {
      const course = await loadEditableCourse(req.params.id);
      const draft = readNewOutcome(req.params.id, req.body);
      const { coId } = draft;

      try {
        const outcome = await CourseOutcome.create({ course: course._id, ...draft });
        await logAudit(req, audit, { action: "course_outcome_created", details: { courseId: req.params.id, coId } });
        res.status(201).json({ data: outcome });
      } catch (err) {
        if (isDuplicateKey(err)) throw new ConflictError(`${coId} already exists for this course`, { courseId: req.params.id, coId });
        throw err;
      }
    })
  );

  /**
   * UPDATE Course Outcome. Frozen once any assessment component is tagged with it.
   */
  router.patch(
    "/:id/outcomes/:coId",
    asyncHandler(async (req, res) => {
      const course = await loadEditableCourse(req.params.id);
      const coId = req.params.coId.toUpperCase();
      const outcome = await CourseOutcome.findOne({ course: course._id, coId });
      if (!outcome) throw new NotFoundError("Course outcome", `${req.params.id}/${coId}`);

      const usedBy = await AssessmentComponent.countDocuments({ courseOutcome: outcome._id });
      assertOutcomeUnreferenced(req.params.id, coId, usedBy, "changed");
      const changes = readOutcomeChanges(req.params.id, coId, req.body);

      outcome.set(changes);
      await outcome.save();
      await logAudit(req, audit, { action: "course_outcome_updated", details: { courseId: req.params.id, coId, changes } });
      res.json({ data: outcome });
    })
  );

  /**
   * DELETE Course Outcome that no component uses yet, with its PO mappings
   * and survey summary.
   */
  router.delete(
    "/:id/outcomes/:coId",
    asyncHandler(async (req, res) => {
      const course = await loadEditableCourse(req.params.id);
      const courseId = course._id.toString();
      const coId = req.params.coId.toUpperCase();
      const outcome = await CourseOutcome.findOne({ course: course._id, coId }).select("_id").lean();
      if (!outcome) throw new NotFoundError("Course outcome", `${courseId}/${coId}`);

      const usedBy = await AssessmentComponent.countDocuments({ courseOutcome: outcome._id });
      assertOutcomeUnreferenced(courseId, coId, usedBy, "deleted");

      const removed = await inTransaction(async (session) => {
        const mappings = await COPOMapping.deleteMany({ courseOutcome: outcome._id }, { session });
        const surveys = await SurveySummary.deleteMany({ courseOutcome: outcome._id }, { session });
        await CourseOutcome.deleteOne({ _id: outcome._id }, { session });
        return { poMappingsDeleted: mappings.deletedCount, surveySummariesDeleted: surveys.deletedCount };
      });

      await logAudit(req, audit, { action: "course_outcome_deleted", details: { courseId, coId, ...removed } });
      res.json({ data: { courseId, coId, ...removed } });
    })
  );

  /**
   * CREATE Assessment with its components. Every component must be tagged
   * with one of the course's outcomes.
   */
  router.post(
    "/:id/assessments",
    asyncHandler(async (req, res) => {
      const course = await loadEditableCourse(req.params.id);
      const courseId = course._id.toString();
      const outcomes = await CourseOutcome.find({ course: course._id }).select("coId").lean();
      const outcomeByCo = new Map(outcomes.map((o) => [o.coId, o._id]));
      const { category, maxMarks, components } = readAssessment(courseId, req.body, [...outcomeByCo.keys()]);

      if (await Assessment.exists({ course: course._id, category })) {
        throw new ConflictError(`Course already has a ${category} assessment`, { courseId, category });
      }

      const assessment = await inTransaction(async (session) => {
        const [created] = await Assessment.create([{ course: course._id, category, maxMarks }], { session });
        await AssessmentComponent.insertMany(
          components.flatMap((c) => {
            const courseOutcome = outcomeByCo.get(c.coId);
            return courseOutcome
              ? [{ assessment: created._id, componentNumber: c.componentNumber, courseOutcome, maxMarks: c.maxMarks }]
              : [];
          }),
          { session }
        );
        return created;
      });

      await logAudit(req, audit, {
        action: "assessment_created",
        details: { courseId, assessmentId: assessment._id.toString(), category, components: components.length },
      });
      res.status(201).json({ data: assessment });
    })
  );

  /**
   * REPLACE the course's CO→PO mapping matrix
   */
  router.put(
    "/:id/po-mappings",
    asyncHandler(async (req, res) => {
      const course = await loadEditableCourse(req.params.id);
      const courseId = course._id.toString();
      const rows = toList(req.body?.mappings).map((m) => ({
        coId: toText(field(m, "coId")).toUpperCase(),
        poId: toText(field(m, "poId")).toUpperCase(),
        level: toNumber(field(m, "level")),
      }));

      const [outcomes, programOutcomes] = await Promise.all([
        CourseOutcome.find({ course: course._id }).select("coId").lean(),
        ProgramOutcome.find({ code: { $in: rows.map((r) => r.poId) } }).select("code").lean(),
      ]);
      const outcomeByCo = new Map(outcomes.map((o) => [o.coId, o._id]));
      const poByCode = new Map(programOutcomes.map((p) => [p.code, p._id]));

      const problems: string[] = [];
      const seen = new Set<string>();
      const docs = rows.flatMap((r, i) => {
        const courseOutcome = outcomeByCo.get(r.coId);
        const programOutcome = poByCode.get(r.poId);
        const key = `${r.coId}->${r.poId}`;
        if (!courseOutcome) problems.push(`mappings[${i}]: unknown course outcome ${r.coId}`);
        if (!programOutcome) problems.push(`mappings[${i}]: unknown program outcome ${r.poId}`);
        if (!isMappingLevel(r.level)) problems.push(`mappings[${i}]: level must be 1, 2 or 3`);
        if (seen.has(key)) problems.push(`mappings[${i}]: ${key} is repeated`);
        seen.add(key);
        return courseOutcome && programOutcome && isMappingLevel(r.level)
          ? [{ course: course._id, courseOutcome, programOutcome, level: r.level }]
          : [];
      });
      rejectIfProblems("CO-PO mappings are malformed", problems, { courseId });

      await inTransaction(async (session) => {
        await COPOMapping.deleteMany({ course: course._id }, { session });
        await COPOMapping.insertMany(docs, { session });
      });

      await logAudit(req, audit, { action: "po_mappings_replaced", details: { courseId, mappings: docs.length } });
      res.json({ data: rows });
    })
  );

  /**
   * DELETE Assessment with its components and every mark recorded on them
   */
  router.delete(
    "/:id/assessments/:assessmentId",
    asyncHandler(async (req, res) => {
      const { courseId } = await openCourseScope(store, req.params.id);
      const removal = await store.removeAssessment(courseId, req.params.assessmentId);
      if (!removal) throw new NotFoundError("Assessment", req.params.assessmentId);

      await logAudit(req, audit, { action: "assessment_deleted", details: { courseId, ...removal } });
      res.json({ data: removal });
    })
  );

  /**
   * REPLACE the course roster. Marks of students who leave it are deleted.
   */
  router.put(
    "/:id/enrollment",
    asyncHandler(async (req, res) => {
      const { courseId } = await openCourseScope(store, req.params.id);
      const studentIds = readStudentIds(courseId, req.body?.studentIds);

      const update = await store.replaceRoster(courseId, studentIds);
      if (!update) throw new NotFoundError("Course", courseId);

      if (update.marksDeleted) {
        console.log(`[Courses] ${courseId}: deleted ${update.marksDeleted} mark(s) of ${update.removed.join(", ")}`);
      }
      await logAudit(req, audit, {
        action: "enrollment_replaced",
        details: {
          courseId,
          students: update.studentIds.length,
          added: update.added,
          removed: update.removed,
          marksDeleted: update.marksDeleted,
        },
      });
      res.json({ data: { courseId, ...update } });
    })
  );

  /**
   * GET setup progress: outcomes, assessments, marks, survey, mappings,
   * latest computation and whether CQI is needed
   */
  router.get(
    "/:id/progress",
    asyncHandler(async (req, res) => {
      const dataset = await store.loadCourseDataset(req.params.id);
      if (!dataset) throw new NotFoundError("Course", req.params.id);
      const latest = await store.latestCourseRun(req.params.id);
      res.json({ data: { courseId: dataset.courseId, ...summarizeCourseProgress(dataset, latest) } });
    })
  );

  return router;
};
