// src/types/attainment.ts
// Shapes shared by the attainment pipeline. Everything here is plain data so
// the engine stays independent of Mongoose documents.

export const ASSESSMENT_CATEGORIES = ["IA1", "IA2", "END"] as const;
export type AssessmentCategory = (typeof ASSESSMENT_CATEGORIES)[number];

export const isAssessmentCategory = (value: string): value is AssessmentCategory =>
  ASSESSMENT_CATEGORIES.some((c) => c === value);

export type MappingLevel = 1 | 2 | 3;

export const isMappingLevel = (value: number): value is MappingLevel => value === 1 || value === 2 || value === 3;

export interface LevelThreshold {
  level: number;
  minPercent: number;
}

export interface GovernanceSnapshot {
  version: number;
  categoryWeights: Readonly<Record<AssessmentCategory, number>>;
  directWeight: number;
  indirectWeight: number;
  levelThresholds: ReadonlyArray<Readonly<LevelThreshold>>;
  poTarget: number; // 0–3 scale
}

export interface CourseOutcomeInput {
  coId: string;
  bloomLevel?: number;
  expectedProficiency: number; // percent
}

export interface ComponentInput {
  componentId: string;
  componentNumber: string;
  coId: string | null;
  maxMarks: number;
}

export interface AssessmentInput {
  assessmentId: string;
  category: AssessmentCategory;
  maxMarks: number;
  components: ComponentInput[];
}

export interface StudentMarkInput {
  studentId: string;
  componentId: string;
  marks: number;
}

export interface SurveySummaryInput {
  coId: string;
  stronglyAgree: number;
  agree: number;
  neutral: number;
  disagree: number;
  totalRespondents: number;
}

export interface CoPoMappingInput {
  coId: string;
  poId: string;
  level: number;
}

export interface CourseScope {
  courseId: string;
  semesterId: string;
  locked: boolean;
}

export interface ProgramScope {
  programId: string;
  semesterId: string;
  locked: boolean;
}

export interface CourseAttainmentInput {
  scope: CourseScope;
  outcomes: CourseOutcomeInput[];
  assessments: AssessmentInput[];
  roster: string[];
  marks: StudentMarkInput[];
  surveys: SurveySummaryInput[];
  mappings: CoPoMappingInput[];
}

export type WarningCode =
  | "CONFIG_INCONSISTENCY"
  | "EMPTY_DENOMINATOR"
  | "MISSING_INDIRECT_DATA"
  | "SURVEY_COUNT_MISMATCH"
  | "NO_STUDENTS";

export interface AttainmentWarning {
  code: WarningCode;
  message: string;
  context?: Record<string, string | number>;
}

export interface CoAssessmentAttainment {
  assessmentId: string;
  category: AssessmentCategory;
  coId: string;
  percentage: number;
  level: number;
  studentsMeeting: number;
  studentsTotal: number;
}

export interface CoFinalAttainment {
  coId: string;
  directPercentage: number;
  directLevel: number;
  indirectScore: number | null;
  finalValue: number; // 0–3 scale
  level: number;
}

export interface PoAttainment {
  poId: string;
  value: number; // 0–3 scale
}

export interface ProgramPoAttainment extends PoAttainment {
  contributingCourses: number;
}

export interface CqiActionRequest {
  coId: string;
  finalValue: number;
  target: number;
  shortfall: number;
}

export interface CourseAttainmentResult {
  scope: { courseId: string; semesterId: string };
  governanceVersion: number;
  coAssessments: CoAssessmentAttainment[];
  coFinals: CoFinalAttainment[];
  coursePos: PoAttainment[];
  cqiRequests: CqiActionRequest[];
  warnings: AttainmentWarning[];
}

export interface CoursePoReport {
  courseId: string;
  pos: PoAttainment[];
}

export interface ProgramAttainmentInput {
  scope: ProgramScope;
  courses: CoursePoReport[];
}

export interface ProgramAttainmentResult {
  scope: { programId: string; semesterId: string };
  governanceVersion: number;
  programPos: ProgramPoAttainment[];
  warnings: AttainmentWarning[];
}
