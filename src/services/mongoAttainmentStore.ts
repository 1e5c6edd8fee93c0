// src/services/mongoAttainmentStore.ts
import mongoose, { Types } from "mongoose";
import Semester from "../models/Semester";
import Program from "../models/Program";
import Course from "../models/Course";
import CourseOutcome from "../models/CourseOutcome";
import Assessment from "../models/Assessment";
import AssessmentComponent from "../models/AssessmentComponent";
import Enrollment from "../models/Enrollment";
import StudentMark from "../models/StudentMark";
import SurveySummary from "../models/SurveySummary";
import COPOMapping from "../models/COPOMapping";
import ProgramOutcome from "../models/ProgramOutcome";
import GovernanceConfig, { IGovernanceConfig } from "../models/GovernanceConfig";
import AttainmentRun, { IAttainmentRun } from "../models/AttainmentRun";
import COAttainment from "../models/COAttainment";
import COFinalAttainment from "../models/COFinalAttainment";
import CoursePOAttainment from "../models/CoursePOAttainment";
import ProgramPOAttainment from "../models/ProgramPOAttainment";
import { ConflictError } from "../lib/attainmentErrors";
import { inTransaction, isDuplicateKey } from "../lib/mongoSession";
import {
  ASSESSMENT_CATEGORIES,
  AssessmentCategory,
  CourseAttainmentResult,
  ProgramAttainmentResult,
} from "../types/attainment";
import type { GovernanceFields } from "../utils/governanceSnapshot";
import { decideCqi } from "../utils/cqiTrigger";
import { compareIds } from "../utils/precision";
import { diffRoster } from "../utils/courseRules";
import {
  AssessmentRemoval,
  AttainmentStore,
  CourseDataset,
  CourseRecord,
  CourseRunRecord,
  ProgramRunRecord,
  RosterUpdate,
  RunMeta,
  SemesterRecord,
  courseScopeKey,
  programScopeKey,
} from "./attainmentStore";

const isId = (id: string) => Types.ObjectId.isValid(id);
const oid = (id: string) => new Types.ObjectId(id);

const byCategoryThenCo = (a: { category: AssessmentCategory; coId: string }, b: { category: AssessmentCategory; coId: string }) =>
  ASSESSMENT_CATEGORIES.indexOf(a.category) - ASSESSMENT_CATEGORIES.indexOf(b.category) || compareIds(a.coId, b.coId);

const toSemester = (doc: { _id: Types.ObjectId; name: string; isLocked: boolean }): SemesterRecord => ({
  id: doc._id.toString(),
  name: doc.name,
  isLocked: doc.isLocked,
});

const toGovernance = (doc: Pick<IGovernanceConfig, "version" | "categoryWeights" | "directWeight" | "indirectWeight" | "levelThresholds" | "poTarget">): GovernanceFields => ({
  version: doc.version,
  categoryWeights: { IA1: doc.categoryWeights.IA1, IA2: doc.categoryWeights.IA2, END: doc.categoryWeights.END },
  directWeight: doc.directWeight,
  indirectWeight: doc.indirectWeight,
  levelThresholds: doc.levelThresholds.map((t) => ({ level: t.level, minPercent: t.minPercent })),
  poTarget: doc.poTarget,
});

/**
 * Writes a run header and its rows in one transaction. The unique
 * (scopeKey, version) index turns a concurrent writer of the same version
 * into a conflict instead of interleaved rows.
 */
async function writeRun(
  header: Omit<IAttainmentRun, keyof mongoose.Document | "version">,
  writeRows: (version: number, session: mongoose.ClientSession) => Promise<unknown>
): Promise<number> {
  const latest = await AttainmentRun.findOne({ scopeKey: header.scopeKey }).sort({ version: -1 }).select("version").lean();
  const version = (latest?.version ?? 0) + 1;

  try {
    return await inTransaction(async (session) => {
      await AttainmentRun.create([{ ...header, version }], { session });
      await writeRows(version, session);
      return version;
    });
  } catch (err) {
    if (isDuplicateKey(err)) {
      throw new ConflictError(`Another computation already wrote version ${version} of ${header.scopeKey}`, {
        scopeKey: header.scopeKey,
        version,
      });
    }
    throw err;
  }
}

export class MongoAttainmentStore implements AttainmentStore {
  async createSemester(name: string): Promise<SemesterRecord> {
    try {
      const doc = await Semester.create({ name });
      return toSemester(doc);
    } catch (err) {
      if (isDuplicateKey(err)) throw new ConflictError(`Semester ${name} already exists`, { name });
      throw err;
    }
  }

  async findSemester(semesterId: string): Promise<SemesterRecord | null> {
    if (!isId(semesterId)) return null;
    const doc = await Semester.findById(semesterId).lean();
    return doc ? toSemester(doc) : null;
  }

  async setSemesterLock(semesterId: string, locked: boolean): Promise<SemesterRecord | null> {
    if (!isId(semesterId)) return null;
    const doc = await Semester.findByIdAndUpdate(
      semesterId,
      locked ? { $set: { isLocked: true, lockedAt: new Date() } } : { $set: { isLocked: false }, $unset: { lockedAt: 1 } },
      { new: true }
    ).lean();
    return doc ? toSemester(doc) : null;
  }

  async latestGovernance(): Promise<GovernanceFields | null> {
    const doc = await GovernanceConfig.findOne().sort({ version: -1 }).lean();
    return doc ? toGovernance(doc) : null;
  }

  async saveGovernance(fields: Omit<GovernanceFields, "version">): Promise<GovernanceFields> {
    const latest = await GovernanceConfig.findOne().sort({ version: -1 }).select("version").lean();
    try {
      const doc = await GovernanceConfig.create({ ...fields, version: (latest?.version ?? 0) + 1 });
      return toGovernance(doc);
    } catch (err) {
      if (isDuplicateKey(err)) throw new ConflictError("Governance was changed concurrently; retry");
      throw err;
    }
  }

  async findCourse(courseId: string): Promise<CourseRecord | null> {
    if (!isId(courseId)) return null;
    const course = await Course.findById(courseId).select("semester program").lean();
    return course ? { courseId, semesterId: course.semester.toString(), programId: course.program.toString() } : null;
  }

  async loadCourseDataset(courseId: string): Promise<CourseDataset | null> {
    if (!isId(courseId)) return null;
    const course = await Course.findById(courseId).lean();
    if (!course) return null;

    const [outcomes, assessments, enrollments, surveys, mappings] = await Promise.all([
      CourseOutcome.find({ course: course._id }).sort({ _id: 1 }).lean(),
      Assessment.find({ course: course._id }).sort({ _id: 1 }).lean(),
      Enrollment.find({ course: course._id }).sort({ _id: 1 }).lean(),
      SurveySummary.find({ course: course._id }).sort({ _id: 1 }).lean(),
      COPOMapping.find({ course: course._id }).sort({ _id: 1 }).lean(),
    ]);

    const components = await AssessmentComponent.find({ assessment: { $in: assessments.map((a) => a._id) } }).sort({ _id: 1 }).lean();
    const [marks, programOutcomes] = await Promise.all([
      StudentMark.find({ component: { $in: components.map((c) => c._id) } }).sort({ _id: 1 }).lean(),
      ProgramOutcome.find({ _id: { $in: mappings.map((m) => m.programOutcome) } }).lean(),
    ]);

    // Stable read order keeps the input checksum reproducible
    const coIdByOid = new Map(outcomes.map((o) => [o._id.toString(), o.coId]));
    const poCodeByOid = new Map(programOutcomes.map((p) => [p._id.toString(), p.code]));

    return {
      courseId,
      semesterId: course.semester.toString(),
      programId: course.program.toString(),
      outcomes: outcomes.map((o) => ({
        coId: o.coId,
        bloomLevel: o.bloomLevel,
        expectedProficiency: o.expectedProficiency,
      })),
      assessments: assessments.map((a) => ({
        assessmentId: a._id.toString(),
        category: a.category,
        maxMarks: a.maxMarks,
        components: components
          .filter((c) => c.assessment.equals(a._id))
          .map((c) => ({
            componentId: c._id.toString(),
            componentNumber: c.componentNumber,
            coId: coIdByOid.get(c.courseOutcome?.toString() ?? "") ?? null,
            maxMarks: c.maxMarks,
          })),
      })),
      roster: enrollments.map((e) => e.studentId),
      marks: marks.map((m) => ({ studentId: m.studentId, componentId: m.component.toString(), marks: m.marks })),
      surveys: surveys.flatMap((s) => {
        const coId = coIdByOid.get(s.courseOutcome.toString());
        return coId
          ? [{ coId, stronglyAgree: s.stronglyAgree, agree: s.agree, neutral: s.neutral, disagree: s.disagree, totalRespondents: s.totalRespondents }]
          : [];
      }),
      mappings: mappings.flatMap((m) => {
        const coId = coIdByOid.get(m.courseOutcome.toString());
        const poId = poCodeByOid.get(m.programOutcome.toString());
        return coId && poId ? [{ coId, poId, level: m.level }] : [];
      }),
    };
  }

  async replaceRoster(courseId: string, studentIds: string[]): Promise<RosterUpdate | null> {
    if (!isId(courseId)) return null;
    const course = await Course.findById(courseId).select("_id").lean();
    if (!course) return null;

    const [enrollments, componentIds] = await Promise.all([
      Enrollment.find({ course: course._id }).select("studentId").lean(),
      this.courseComponentIds(course._id),
    ]);
    const { added, removed } = diffRoster(enrollments.map((e) => e.studentId), studentIds);

    const marksDeleted = await inTransaction(async (session) => {
      await Enrollment.deleteMany({ course: course._id }, { session });
      await Enrollment.insertMany(studentIds.map((studentId) => ({ course: course._id, studentId })), { session });
      if (!removed.length) return 0;
      const { deletedCount } = await StudentMark.deleteMany(
        { studentId: { $in: removed }, component: { $in: componentIds } },
        { session }
      );
      return deletedCount;
    });

    return { studentIds: [...studentIds].sort(compareIds), added, removed, marksDeleted };
  }

  async removeAssessment(courseId: string, assessmentId: string): Promise<AssessmentRemoval | null> {
    if (!isId(courseId) || !isId(assessmentId)) return null;
    const assessment = await Assessment.findOne({ _id: assessmentId, course: oid(courseId) }).select("category").lean();
    if (!assessment) return null;

    const components = await AssessmentComponent.find({ assessment: assessment._id }).select("_id").lean();
    const componentIds = components.map((c) => c._id);

    const marksDeleted = await inTransaction(async (session) => {
      const { deletedCount } = await StudentMark.deleteMany({ component: { $in: componentIds } }, { session });
      await AssessmentComponent.deleteMany({ assessment: assessment._id }, { session });
      await Assessment.deleteOne({ _id: assessment._id }, { session });
      return deletedCount;
    });

    return { assessmentId, category: assessment.category, componentsDeleted: componentIds.length, marksDeleted };
  }

  async listProgramCourseIds(programId: string, semesterId: string): Promise<string[] | null> {
    if (!isId(programId) || !isId(semesterId)) return null;
    const program = await Program.exists({ _id: programId });
    if (!program) return null;
    const courses = await Course.find({ program: oid(programId), semester: oid(semesterId) }).select("_id").lean();
    return courses.map((c) => c._id.toString());
  }

  async saveCourseRun(result: CourseAttainmentResult, meta: RunMeta): Promise<CourseRunRecord> {
    const { courseId, semesterId } = result.scope;
    const scopeKey = courseScopeKey(courseId);
    const course = oid(courseId);

    const version = await writeRun(
      {
        scopeType: "COURSE",
        scopeKey,
        course,
        semester: oid(semesterId),
        governanceVersion: result.governanceVersion,
        warnings: result.warnings,
        ...meta,
      },
      async (v, session) => {
        await COAttainment.insertMany(
          result.coAssessments.map((r) => ({ ...r, scopeKey, version: v, course, assessment: oid(r.assessmentId) })),
          { session }
        );
        await COFinalAttainment.insertMany(result.coFinals.map((r) => ({ ...r, scopeKey, version: v, course })), { session });
        await CoursePOAttainment.insertMany(result.coursePos.map((r) => ({ ...r, scopeKey, version: v, course })), { session });
      }
    );

    return { version, result, ...meta };
  }

  async latestCourseRun(courseId: string): Promise<CourseRunRecord | null> {
    if (!isId(courseId)) return null;
    const scopeKey = courseScopeKey(courseId);
    const run = await AttainmentRun.findOne({ scopeKey }).sort({ version: -1 }).lean();
    if (!run) return null;

    const rowFilter = { scopeKey, version: run.version };
    const [coRows, finalRows, poRows] = await Promise.all([
      COAttainment.find(rowFilter).lean(),
      COFinalAttainment.find(rowFilter).lean(),
      CoursePOAttainment.find(rowFilter).lean(),
    ]);
    const poTarget = await this.poTargetFor(run.governanceVersion);

    const coFinals = finalRows.sort((a, b) => compareIds(a.coId, b.coId)).map((r) => ({
      coId: r.coId,
      directPercentage: r.directPercentage,
      directLevel: r.directLevel,
      indirectScore: r.indirectScore ?? null,
      finalValue: r.finalValue,
      level: r.level,
    }));

    const result: CourseAttainmentResult = {
      scope: { courseId, semesterId: run.semester.toString() },
      governanceVersion: run.governanceVersion,
      coAssessments: coRows.sort(byCategoryThenCo).map((r) => ({
        assessmentId: r.assessment.toString(),
        category: r.category,
        coId: r.coId,
        percentage: r.percentage,
        level: r.level,
        studentsMeeting: r.studentsMeeting,
        studentsTotal: r.studentsTotal,
      })),
      coFinals,
      coursePos: poRows.sort((a, b) => compareIds(a.poId, b.poId)).map((r) => ({ poId: r.poId, value: r.value })),
      cqiRequests: poTarget === null ? [] : decideCqi(coFinals, poTarget),
      warnings: run.warnings,
    };

    return {
      version: run.version,
      inputChecksum: run.inputChecksum,
      outputChecksum: run.outputChecksum,
      computedAt: run.computedAt,
      result,
    };
  }

  async saveProgramRun(result: ProgramAttainmentResult, meta: RunMeta): Promise<ProgramRunRecord> {
    const { programId, semesterId } = result.scope;
    const scopeKey = programScopeKey(programId, semesterId);
    const program = oid(programId);
    const semester = oid(semesterId);

    const version = await writeRun(
      {
        scopeType: "PROGRAM",
        scopeKey,
        program,
        semester,
        governanceVersion: result.governanceVersion,
        warnings: result.warnings,
        ...meta,
      },
      (v, session) =>
        ProgramPOAttainment.insertMany(
          result.programPos.map((r) => ({ ...r, scopeKey, version: v, program, semester })),
          { session }
        )
    );

    return { version, result, ...meta };
  }

  async latestProgramRun(programId: string, semesterId: string): Promise<ProgramRunRecord | null> {
    if (!isId(programId) || !isId(semesterId)) return null;
    const scopeKey = programScopeKey(programId, semesterId);
    const run = await AttainmentRun.findOne({ scopeKey }).sort({ version: -1 }).lean();
    if (!run) return null;

    const rows = await ProgramPOAttainment.find({ scopeKey, version: run.version }).lean();

    return {
      version: run.version,
      inputChecksum: run.inputChecksum,
      outputChecksum: run.outputChecksum,
      computedAt: run.computedAt,
      result: {
        scope: { programId, semesterId },
        governanceVersion: run.governanceVersion,
        programPos: rows.sort((a, b) => compareIds(a.poId, b.poId)).map((r) => ({ poId: r.poId, value: r.value, contributingCourses: r.contributingCourses })),
        warnings: run.warnings,
      },
    };
  }

  private async courseComponentIds(course: Types.ObjectId): Promise<Types.ObjectId[]> {
    const assessments = await Assessment.find({ course }).select("_id").lean();
    const components = await AssessmentComponent.find({ assessment: { $in: assessments.map((a) => a._id) } }).select("_id").lean();
    return components.map((c) => c._id);
  }

  private async poTargetFor(governanceVersion: number): Promise<number | null> {
    const doc = await GovernanceConfig.findOne({ version: governanceVersion }).select("poTarget").lean();
    return doc ? doc.poTarget : null;
  }
}
