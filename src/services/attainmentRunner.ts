// src/services/attainmentRunner.ts
import {
  AttainmentWarning,
  CoursePoReport,
  GovernanceSnapshot,
} from "../types/attainment";
import { AttainmentError, NotFoundError } from "../lib/attainmentErrors";
import type { AuditEmitter } from "../lib/auditLogger";
import type { CqiSink, CqiSubmission } from "../lib/cqiSink";
import { ScopeLock } from "../lib/scopeLock";
import { checksum } from "../lib/checksum";
import { captureGovernance } from "../utils/governanceSnapshot";
import { computeCourseAttainment, computeProgramAttainment } from "./attainmentEngine";
import {
  AttainmentStore,
  CourseRunRecord,
  ProgramRunRecord,
  courseScopeKey,
  programScopeKey,
} from "./attainmentStore";

export interface RunnerDeps {
  store: AttainmentStore;
  audit: AuditEmitter;
  cqi: CqiSink;
  locks?: ScopeLock;
  now?: () => Date;
}

type RunOutcome = "SUCCESS" | "REFUSED" | "FAILED";
type CqiHandoff = "SUBMITTED" | "FAILED";

interface RunAuditContext {
  scope: Record<string, string>;
  startedAt: Date;
  governanceVersion?: number;
  inputChecksum?: string;
}

/**
 * Drives one computation per call: load inputs, capture governance, run the
 * pure engine, persist a new result version, hand off CQI requests and emit
 * exactly one audit event, whether the run succeeds or not. The success event
 * records whether the CQI hand-off went through.
 */
export class AttainmentRunner {
  private readonly store: AttainmentStore;
  private readonly audit: AuditEmitter;
  private readonly cqi: CqiSink;
  private readonly locks: ScopeLock;
  private readonly now: () => Date;

  constructor({ store, audit, cqi, locks = new ScopeLock(), now = () => new Date() }: RunnerDeps) {
    this.store = store;
    this.audit = audit;
    this.cqi = cqi;
    this.locks = locks;
    this.now = now;
  }

  async runCourse(courseId: string): Promise<CourseRunRecord> {
    return this.locks.runExclusive(courseScopeKey(courseId), async () => {
      const ctx: RunAuditContext = { scope: { courseId }, startedAt: this.now() };
      const { record, programId } = await this.guard("attainment_course", ctx, () => this.computeCourse(courseId, ctx));
      const { result } = record;
      const { semesterId } = result.scope;

      console.log(
        `[AttainmentRunner] course ${courseId} (program ${programId}) v${record.version}: ` +
          `${result.coFinals.length} COs, ${result.coursePos.length} POs, ${result.cqiRequests.length} CQI requests`
      );
      const cqiHandoff = await this.handOffCqi({ courseId, semesterId, runVersion: record.version, requests: result.cqiRequests });
      await this.emit("attainment_course_computed", "SUCCESS", ctx, {
        version: record.version,
        outputChecksum: record.outputChecksum,
        warnings: result.warnings,
        cqiRequests: result.cqiRequests.length,
        cqiHandoff,
      });
      return record;
    });
  }

  async runProgram(programId: string, semesterId: string): Promise<ProgramRunRecord> {
    return this.locks.runExclusive(programScopeKey(programId, semesterId), async () => {
      const ctx: RunAuditContext = { scope: { programId, semesterId }, startedAt: this.now() };
      const { record, courseCount } = await this.guard("attainment_program", ctx, () =>
        this.computeProgram(programId, semesterId, ctx)
      );

      console.log(
        `[AttainmentRunner] program ${programId} semester ${semesterId} v${record.version}: ` +
          `${courseCount} courses, ${record.result.programPos.length} POs`
      );
      await this.emit("attainment_program_computed", "SUCCESS", ctx, {
        version: record.version,
        outputChecksum: record.outputChecksum,
        warnings: record.result.warnings,
      });
      return record;
    });
  }

  private async computeCourse(courseId: string, ctx: RunAuditContext) {
    const dataset = await this.store.loadCourseDataset(courseId);
    if (!dataset) throw new NotFoundError("Course", courseId);
    const { semesterId, programId, ...data } = dataset;
    ctx.scope = { courseId, semesterId };

    const semester = await this.store.findSemester(semesterId);
    if (!semester) throw new NotFoundError("Semester", semesterId);

    const governance = await this.captureCurrentGovernance();
    ctx.governanceVersion = governance.version;

    const input = {
      scope: { courseId, semesterId, locked: semester.isLocked },
      outcomes: data.outcomes,
      assessments: data.assessments,
      roster: data.roster,
      marks: data.marks,
      surveys: data.surveys,
      mappings: data.mappings,
    };
    const inputChecksum = checksum({ input, governance });
    ctx.inputChecksum = inputChecksum;

    const result = computeCourseAttainment(input, governance);
    const record = await this.store.saveCourseRun(result, {
      inputChecksum,
      outputChecksum: checksum(result),
      computedAt: ctx.startedAt,
    });
    return { record, programId };
  }

  private async computeProgram(programId: string, semesterId: string, ctx: RunAuditContext) {
    const semester = await this.store.findSemester(semesterId);
    if (!semester) throw new NotFoundError("Semester", semesterId);

    const courseIds = await this.store.listProgramCourseIds(programId, semesterId);
    if (!courseIds) throw new NotFoundError("Program", programId);

    const governance = await this.captureCurrentGovernance();
    ctx.governanceVersion = governance.version;

    const courses: CoursePoReport[] = [];
    const extraWarnings: AttainmentWarning[] = [];

    for (const courseId of courseIds) {
      const run = await this.store.latestCourseRun(courseId);
      if (!run) {
        extraWarnings.push({
          code: "EMPTY_DENOMINATOR",
          message: `Course ${courseId} has no computed attainment; excluded from program POs`,
          context: { courseId },
        });
        continue;
      }
      if (run.result.governanceVersion !== governance.version) {
        extraWarnings.push({
          code: "CONFIG_INCONSISTENCY",
          message: `Course ${courseId} was computed under governance v${run.result.governanceVersion}, current is v${governance.version}`,
          context: { courseId, courseGovernanceVersion: run.result.governanceVersion },
        });
      }
      courses.push({ courseId, pos: run.result.coursePos });
    }

    const input = { scope: { programId, semesterId, locked: semester.isLocked }, courses };
    const inputChecksum = checksum({ input, governance });
    ctx.inputChecksum = inputChecksum;

    const computed = computeProgramAttainment(input, governance);
    const result = { ...computed, warnings: [...computed.warnings, ...extraWarnings] };

    const record = await this.store.saveProgramRun(result, {
      inputChecksum,
      outputChecksum: checksum(result),
      computedAt: ctx.startedAt,
    });
    return { record, courseCount: courses.length };
  }

  /**
   * The run is already stored when CQI requests are handed off, so a failing
   * sink is logged and recorded in the audit event instead of failing the run.
   */
  private async handOffCqi(submission: CqiSubmission): Promise<CqiHandoff> {
    try {
      await this.cqi.submit(submission);
      return "SUBMITTED";
    } catch (err) {
      console.error(
        `[AttainmentRunner] CQI hand-off failed for course ${submission.courseId} v${submission.runVersion}:`,
        err
      );
      return "FAILED";
    }
  }

  private async captureCurrentGovernance(): Promise<GovernanceSnapshot> {
    const fields = await this.store.latestGovernance();
    if (!fields) throw new NotFoundError("Governance configuration", "current");
    return captureGovernance(fields);
  }

  /** Runs the computing part of a run; any failure is audited, then rethrown. */
  private async guard<T>(prefix: string, ctx: RunAuditContext, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (err) {
      await this.emitFailure(prefix, ctx, err);
      throw err;
    }
  }

  private async emitFailure(prefix: string, ctx: RunAuditContext, err: unknown) {
    const refused = err instanceof AttainmentError && err.code === "LOCKED_SCOPE";
    const outcome: RunOutcome = refused ? "REFUSED" : "FAILED";

    if (!refused) console.error(`[AttainmentRunner] ${prefix} failed for ${JSON.stringify(ctx.scope)}:`, err);

    try {
      await this.emit(`${prefix}_${refused ? "refused" : "failed"}`, outcome, ctx, {
        errorCode: err instanceof AttainmentError ? err.code : "INTERNAL",
        error: err instanceof Error ? err.message : String(err),
      });
    } catch (auditErr) {
      // the run's own error is what the caller needs to see
      console.error(`[AttainmentRunner] audit of failed ${prefix} run failed:`, auditErr);
    }
  }

  private async emit(action: string, outcome: RunOutcome, ctx: RunAuditContext, extra: Record<string, unknown>) {
    await this.audit.record({
      action,
      details: {
        outcome,
        scope: ctx.scope,
        timestamp: ctx.startedAt.toISOString(),
        governanceVersion: ctx.governanceVersion ?? null,
        inputChecksum: ctx.inputChecksum ?? null,
        ...extra,
      },
    });
  }
}
