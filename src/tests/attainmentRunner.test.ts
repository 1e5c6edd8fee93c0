// src/tests/attainmentRunner.test.ts
import type { AuditEntry, AuditEmitter } from "../lib/auditLogger";
import type { CqiSink, CqiSubmission } from "../lib/cqiSink";
import { LockedScopeError, NotFoundError } from "../lib/attainmentErrors";
import { AttainmentRunner } from "../services/attainmentRunner";
import { MemoryAttainmentStore } from "./helpers/memoryStore";
import { governanceFields, sampleDataset } from "./helpers/fixtures";

const NOW = new Date("2024-03-01T10:00:00.000Z");

const setup = async () => {
  const store = new MemoryAttainmentStore();
  const entries: AuditEntry[] = [];
  const submissions: CqiSubmission[] = [];
  const audit: AuditEmitter = {
    async record(entry) {
      entries.push(entry);
    },
  };
  const cqi: CqiSink = {
    async submit(submission) {
      submissions.push(submission);
    },
  };

  const { version: _version, ...fields } = governanceFields();
  await store.saveGovernance(fields);
  const semester = await store.createSemester("2024 ODD");
  store.programs.add("prog-1");
  store.courses.set("course-1", sampleDataset("course-1", semester.id));

  const runner = new AttainmentRunner({ store, audit, cqi, now: () => NOW });
  return { store, entries, submissions, runner, semesterId: semester.id };
};

describe("Attainment runner", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should store a course run, audit it and hand off CQI requests", async () => {
    const { store, entries, submissions, runner, semesterId } = await setup();

    const record = await runner.runCourse("course-1");

    expect(record.version).toBe(1);
    expect(record.computedAt).toEqual(NOW);
    expect(record.inputChecksum).toMatch(/^[0-9a-f]{64}$/);
    expect(record.result.coFinals.map((f) => f.finalValue)).toEqual([1.76, 2.25]);
    expect((await store.latestCourseRun("course-1"))?.version).toBe(1);

    expect(entries).toHaveLength(1);
    expect(entries[0]).toEqual({
      action: "attainment_course_computed",
      details: {
        outcome: "SUCCESS",
        scope: { courseId: "course-1", semesterId },
        timestamp: "2024-03-01T10:00:00.000Z",
        governanceVersion: 1,
        inputChecksum: record.inputChecksum,
        version: 1,
        outputChecksum: record.outputChecksum,
        warnings: record.result.warnings,
        cqiRequests: 1,
        cqiHandoff: "SUBMITTED",
      },
    });
    expect(submissions).toEqual([
      {
        courseId: "course-1",
        semesterId,
        runVersion: 1,
        requests: [{ coId: "CO1", finalValue: 1.76, target: 2.1, shortfall: 0.34 }],
      },
    ]);
  });

  it("should keep a stored run when the CQI hand-off fails", async () => {
    const { store, entries } = await setup();
    const runner = new AttainmentRunner({
      store,
      audit: {
        async record(entry) {
          entries.push(entry);
        },
      },
      cqi: {
        async submit() {
          throw new Error("cqi queue down");
        },
      },
      now: () => NOW,
    });

    const record = await runner.runCourse("course-1");

    expect(record.version).toBe(1);
    expect(store.courseRuns.get("course:course-1")).toHaveLength(1);
    expect(entries).toHaveLength(1);
    expect(entries[0].action).toBe("attainment_course_computed");
    expect(entries[0].details).toMatchObject({ outcome: "SUCCESS", version: 1, cqiRequests: 1, cqiHandoff: "FAILED" });
    expect(console.error).toHaveBeenCalledWith(
      "[AttainmentRunner] CQI hand-off failed for course course-1 v1:",
      expect.any(Error)
    );
  });

  it("should append a new version on every run with the same checksums", async () => {
    const { store, runner } = await setup();

    const first = await runner.runCourse("course-1");
    const second = await runner.runCourse("course-1");

    expect(second.version).toBe(2);
    expect(second.inputChecksum).toBe(first.inputChecksum);
    expect(second.outputChecksum).toBe(first.outputChecksum);
    expect(store.courseRuns.get("course:course-1")?.map((r) => r.version)).toEqual([1, 2]);
  });

  it("should serialize concurrent runs of one course", async () => {
    const { store, runner } = await setup();

    const versions = await Promise.all([runner.runCourse("course-1"), runner.runCourse("course-1"), runner.runCourse("course-1")]);

    expect(versions.map((r) => r.version)).toEqual([1, 2, 3]);
    expect(store.courseRuns.get("course:course-1")).toHaveLength(3);
  });

  it("should refuse a locked semester, write nothing and audit the refusal", async () => {
    const { store, entries, submissions, runner, semesterId } = await setup();
    await store.setSemesterLock(semesterId, true);

    await expect(runner.runCourse("course-1")).rejects.toThrow(LockedScopeError);

    expect(store.courseRuns.size).toBe(0);
    expect(submissions).toEqual([]);
    expect(entries).toHaveLength(1);
    expect(entries[0].action).toBe("attainment_course_refused");
    expect(entries[0].details).toMatchObject({
      outcome: "REFUSED",
      scope: { courseId: "course-1", semesterId },
      governanceVersion: 1,
      errorCode: "LOCKED_SCOPE",
    });
  });

  it("should audit a failed run and rethrow its error", async () => {
    const { entries, runner } = await setup();

    await expect(runner.runCourse("missing")).rejects.toThrow(NotFoundError);

    expect(entries).toHaveLength(1);
    expect(entries[0].action).toBe("attainment_course_failed");
    expect(entries[0].details).toMatchObject({ outcome: "FAILED", scope: { courseId: "missing" }, errorCode: "NOT_FOUND" });
  });

  it("should keep the run's error when the failure audit cannot be written", async () => {
    const { store } = await setup();
    const broken = new AttainmentRunner({
      store,
      audit: {
        async record() {
          throw new Error("audit store down");
        },
      },
      cqi: { submit: async () => undefined },
    });

    await expect(broken.runCourse("missing")).rejects.toThrow(NotFoundError);
  });

  it("should aggregate program POs from the latest course runs", async () => {
    const { store, entries, runner, semesterId } = await setup();
    store.courses.set("course-2", sampleDataset("course-2", semesterId));
    store.courses.set("course-3", sampleDataset("course-3", semesterId));
    await runner.runCourse("course-1");
    await runner.runCourse("course-2");

    const record = await runner.runProgram("prog-1", semesterId);

    expect(record.version).toBe(1);
    expect(record.result.programPos).toEqual([
      { poId: "PO1", value: 1.956, contributingCourses: 2 },
      { poId: "PO2", value: 2.25, contributingCourses: 2 },
    ]);
    expect(record.result.warnings).toEqual([
      {
        code: "EMPTY_DENOMINATOR",
        message: "Course course-3 has no computed attainment; excluded from program POs",
        context: { courseId: "course-3" },
      },
    ]);
    expect(entries.map((e) => e.action)).toEqual([
      "attainment_course_computed",
      "attainment_course_computed",
      "attainment_program_computed",
    ]);
  });

  it("should flag courses computed under an older governance version", async () => {
    const { store, runner, semesterId } = await setup();
    await runner.runCourse("course-1");
    const { version: _version, ...fields } = governanceFields({ poTarget: 2.4 });
    await store.saveGovernance(fields);

    const record = await runner.runProgram("prog-1", semesterId);

    expect(record.result.governanceVersion).toBe(2);
    expect(record.result.warnings).toEqual([
      {
        code: "CONFIG_INCONSISTENCY",
        message: "Course course-1 was computed under governance v1, current is v2",
        context: { courseId: "course-1", courseGovernanceVersion: 1 },
      },
    ]);
  });

  it("should refuse a program run in a locked semester", async () => {
    const { store, entries, runner, semesterId } = await setup();
    await store.setSemesterLock(semesterId, true);

    await expect(runner.runProgram("prog-1", semesterId)).rejects.toThrow(LockedScopeError);
    expect(store.programRuns.size).toBe(0);
    expect(entries.map((e) => e.action)).toEqual(["attainment_program_refused"]);
  });

  it("should report an unknown program", async () => {
    const { runner, semesterId } = await setup();
    await expect(runner.runProgram("prog-9", semesterId)).rejects.toThrow(NotFoundError);
  });
});
