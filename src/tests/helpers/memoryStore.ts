// src/tests/helpers/memoryStore.ts
// In-process AttainmentStore for tests; same versioning rules as the Mongo store.
import type { CourseAttainmentResult, ProgramAttainmentResult } from "../../types/attainment";
import type { GovernanceFields } from "../../utils/governanceSnapshot";
import { ConflictError } from "../../lib/attainmentErrors";
import { diffRoster } from "../../utils/courseRules";
import { compareIds } from "../../utils/precision";
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
} from "../../services/attainmentStore";

export class MemoryAttainmentStore implements AttainmentStore {
  readonly semesters = new Map<string, SemesterRecord>();
  readonly programs = new Set<string>();
  readonly courses = new Map<string, CourseDataset>();
  readonly governance: GovernanceFields[] = [];
  readonly courseRuns = new Map<string, CourseRunRecord[]>();
  readonly programRuns = new Map<string, ProgramRunRecord[]>();

  private nextId = 1;

  async createSemester(name: string): Promise<SemesterRecord> {
    if ([...this.semesters.values()].some((s) => s.name === name)) {
      throw new ConflictError(`Semester ${name} already exists`, { name });
    }
    const semester = { id: `sem-${this.nextId++}`, name, isLocked: false };
    this.semesters.set(semester.id, semester);
    return { ...semester };
  }

  async findSemester(semesterId: string): Promise<SemesterRecord | null> {
    const semester = this.semesters.get(semesterId);
    return semester ? { ...semester } : null;
  }

  async setSemesterLock(semesterId: string, locked: boolean): Promise<SemesterRecord | null> {
    const semester = this.semesters.get(semesterId);
    if (!semester) return null;
    semester.isLocked = locked;
    return { ...semester };
  }

  async latestGovernance(): Promise<GovernanceFields | null> {
    const latest = this.governance[this.governance.length - 1];
    return latest ? structuredClone(latest) : null;
  }

  async saveGovernance(fields: Omit<GovernanceFields, "version">): Promise<GovernanceFields> {
    const saved = { ...structuredClone(fields), version: this.governance.length + 1 };
    this.governance.push(saved);
    return structuredClone(saved);
  }

  async findCourse(courseId: string): Promise<CourseRecord | null> {
    const dataset = this.courses.get(courseId);
    return dataset ? { courseId, semesterId: dataset.semesterId, programId: dataset.programId } : null;
  }

  async loadCourseDataset(courseId: string): Promise<CourseDataset | null> {
    const dataset = this.courses.get(courseId);
    return dataset ? structuredClone(dataset) : null;
  }

  async replaceRoster(courseId: string, studentIds: string[]): Promise<RosterUpdate | null> {
    const dataset = this.courses.get(courseId);
    if (!dataset) return null;
    const { added, removed } = diffRoster(dataset.roster, studentIds);
    const kept = dataset.marks.filter((m) => !removed.includes(m.studentId));
    const marksDeleted = dataset.marks.length - kept.length;

    dataset.roster = [...studentIds];
    dataset.marks = kept;
    return { studentIds: [...studentIds].sort(compareIds), added, removed, marksDeleted };
  }

  async removeAssessment(courseId: string, assessmentId: string): Promise<AssessmentRemoval | null> {
    const dataset = this.courses.get(courseId);
    const assessment = dataset?.assessments.find((a) => a.assessmentId === assessmentId);
    if (!dataset || !assessment) return null;
    const componentIds = new Set(assessment.components.map((c) => c.componentId));
    const kept = dataset.marks.filter((m) => !componentIds.has(m.componentId));
    const marksDeleted = dataset.marks.length - kept.length;

    dataset.assessments = dataset.assessments.filter((a) => a !== assessment);
    dataset.marks = kept;
    return { assessmentId, category: assessment.category, componentsDeleted: componentIds.size, marksDeleted };
  }

  async listProgramCourseIds(programId: string, semesterId: string): Promise<string[] | null> {
    if (!this.programs.has(programId)) return null;
    return [...this.courses.values()]
      .filter((c) => c.programId === programId && c.semesterId === semesterId)
      .map((c) => c.courseId);
  }

  async saveCourseRun(result: CourseAttainmentResult, meta: RunMeta): Promise<CourseRunRecord> {
    const runs = this.runsFor(this.courseRuns, courseScopeKey(result.scope.courseId));
    const record = { version: runs.length + 1, result: structuredClone(result), ...meta };
    runs.push(record);
    return structuredClone(record);
  }

  async latestCourseRun(courseId: string): Promise<CourseRunRecord | null> {
    const runs = this.courseRuns.get(courseScopeKey(courseId)) ?? [];
    const latest = runs[runs.length - 1];
    return latest ? structuredClone(latest) : null;
  }

  async saveProgramRun(result: ProgramAttainmentResult, meta: RunMeta): Promise<ProgramRunRecord> {
    const { programId, semesterId } = result.scope;
    const runs = this.runsFor(this.programRuns, programScopeKey(programId, semesterId));
    const record = { version: runs.length + 1, result: structuredClone(result), ...meta };
    runs.push(record);
    return structuredClone(record);
  }

  async latestProgramRun(programId: string, semesterId: string): Promise<ProgramRunRecord | null> {
    const runs = this.programRuns.get(programScopeKey(programId, semesterId)) ?? [];
    const latest = runs[runs.length - 1];
    return latest ? structuredClone(latest) : null;
  }

  private runsFor<T>(map: Map<string, T[]>, key: string): T[] {
    let runs = map.get(key);
    if (!runs) {
      runs = [];
      map.set(key, runs);
    }
    return runs;
  }
}
