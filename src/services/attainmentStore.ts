// src/services/attainmentStore.ts
import type {
  AssessmentCategory,
  CourseAttainmentInput,
  CourseAttainmentResult,
  ProgramAttainmentResult,
} from "../types/attainment";
import type { GovernanceFields } from "../utils/governanceSnapshot";

export interface SemesterRecord {
  id: string;
  name: string;
  isLocked: boolean;
}

export interface CourseRecord {
  courseId: string;
  semesterId: string;
  programId: string;
}

/** Everything a course computation reads, minus the lock flag. */
export interface CourseDataset extends CourseRecord, Omit<CourseAttainmentInput, "scope"> {}

export interface RosterUpdate {
  studentIds: string[];
  added: string[];
  removed: string[];
  /** marks of removed students deleted with them */
  marksDeleted: number;
}

export interface AssessmentRemoval {
  assessmentId: string;
  category: AssessmentCategory;
  componentsDeleted: number;
  marksDeleted: number;
}

export interface RunMeta {
  inputChecksum: string;
  outputChecksum: string;
  computedAt: Date;
}

export interface CourseRunRecord extends RunMeta {
  version: number;
  result: CourseAttainmentResult;
}

export interface ProgramRunRecord extends RunMeta {
  version: number;
  result: ProgramAttainmentResult;
}

/**
 * Persistence seen by the attainment runner and the HTTP layer. Run records
 * are append-only: saving assigns the next version for the scope and never
 * touches earlier versions.
 */
export interface AttainmentStore {
  createSemester(name: string): Promise<SemesterRecord>;
  findSemester(semesterId: string): Promise<SemesterRecord | null>;
  setSemesterLock(semesterId: string, locked: boolean): Promise<SemesterRecord | null>;

  latestGovernance(): Promise<GovernanceFields | null>;
  saveGovernance(fields: Omit<GovernanceFields, "version">): Promise<GovernanceFields>;

  findCourse(courseId: string): Promise<CourseRecord | null>;
  loadCourseDataset(courseId: string): Promise<CourseDataset | null>;
  /**
   * Replaces the roster and, in the same write, deletes every mark the
   * removed students hold on the course's components. null when the course
   * does not exist.
   */
  replaceRoster(courseId: string, studentIds: string[]): Promise<RosterUpdate | null>;
  /** Deletes an assessment of the course with its components and their marks; null when it is not there. */
  removeAssessment(courseId: string, assessmentId: string): Promise<AssessmentRemoval | null>;
  /** null when the program does not exist */
  listProgramCourseIds(programId: string, semesterId: string): Promise<string[] | null>;

  saveCourseRun(result: CourseAttainmentResult, meta: RunMeta): Promise<CourseRunRecord>;
  latestCourseRun(courseId: string): Promise<CourseRunRecord | null>;

  saveProgramRun(result: ProgramAttainmentResult, meta: RunMeta): Promise<ProgramRunRecord>;
  latestProgramRun(programId: string, semesterId: string): Promise<ProgramRunRecord | null>;
}

export const courseScopeKey = (courseId: string) => `course:${courseId}`;
export const programScopeKey = (programId: string, semesterId: string) => `program:${programId}:${semesterId}`;
