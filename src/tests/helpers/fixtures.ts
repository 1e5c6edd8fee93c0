// src/tests/helpers/fixtures.ts
import type { CourseAttainmentInput } from "../../types/attainment";
import type { CourseDataset } from "../../services/attainmentStore";
import { GovernanceFields, captureGovernance } from "../../utils/governanceSnapshot";

export const governanceFields = (overrides: Partial<GovernanceFields> = {}): GovernanceFields => ({
  version: 1,
  categoryWeights: { IA1: 20, IA2: 20, END: 60 },
  directWeight: 0.8,
  indirectWeight: 0.2,
  levelThresholds: [
    { level: 3, minPercent: 85 },
    { level: 2, minPercent: 70 },
    { level: 1, minPercent: 60 },
  ],
  poTarget: 2.1,
  ...overrides,
});

export const governance = (overrides: Partial<GovernanceFields> = {}) => captureGovernance(governanceFields(overrides));

const mark = (studentId: string, componentId: string, marks: number) => ({ studentId, componentId, marks });

/**
 * Two COs, four students, IA1 and END (no IA2).
 *
 *   IA1 CO1 25 %  CO2 75 %     END CO1 75 %  CO2 75 %
 *   Direct CO1 62.5  CO2 75    Final CO1 1.76  CO2 2.25 (no survey)
 *   PO1 1.956  PO2 2.25
 */
export const sampleDataset = (courseId = "course-1", semesterId = "sem-1", programId = "prog-1"): CourseDataset => ({
  courseId,
  semesterId,
  programId,
  outcomes: [
    { coId: "CO1", bloomLevel: 2, expectedProficiency: 60 },
    { coId: "CO2", bloomLevel: 3, expectedProficiency: 50 },
  ],
  assessments: [
    {
      assessmentId: `${courseId}-ia1`,
      category: "IA1",
      maxMarks: 30,
      components: [
        { componentId: `${courseId}-ia1-q1`, componentNumber: "Q1", coId: "CO1", maxMarks: 10 },
        { componentId: `${courseId}-ia1-q2`, componentNumber: "Q2", coId: "CO1", maxMarks: 10 },
        { componentId: `${courseId}-ia1-q3`, componentNumber: "Q3", coId: "CO2", maxMarks: 10 },
      ],
    },
    {
      assessmentId: `${courseId}-end`,
      category: "END",
      maxMarks: 20,
      components: [
        { componentId: `${courseId}-end-q1`, componentNumber: "Q1", coId: "CO1", maxMarks: 10 },
        { componentId: `${courseId}-end-q2`, componentNumber: "Q2", coId: "CO2", maxMarks: 10 },
      ],
    },
  ],
  roster: ["S1", "S2", "S3", "S4"],
  marks: [
    mark("S1", `${courseId}-ia1-q1`, 8),
    mark("S1", `${courseId}-ia1-q2`, 7),
    mark("S1", `${courseId}-ia1-q3`, 5),
    mark("S2", `${courseId}-ia1-q1`, 5),
    mark("S2", `${courseId}-ia1-q2`, 5),
    mark("S2", `${courseId}-ia1-q3`, 6),
    mark("S3", `${courseId}-ia1-q1`, 6),
    mark("S3", `${courseId}-ia1-q2`, 5),
    mark("S3", `${courseId}-ia1-q3`, 7),
    mark("S4", `${courseId}-ia1-q1`, 3),
    mark("S4", `${courseId}-ia1-q2`, 2),
    mark("S4", `${courseId}-ia1-q3`, 2),
    mark("S1", `${courseId}-end-q1`, 9),
    mark("S1", `${courseId}-end-q2`, 4),
    mark("S2", `${courseId}-end-q1`, 6),
    mark("S2", `${courseId}-end-q2`, 5),
    mark("S3", `${courseId}-end-q1`, 8),
    mark("S3", `${courseId}-end-q2`, 10),
    mark("S4", `${courseId}-end-q2`, 5),
  ],
  surveys: [{ coId: "CO1", stronglyAgree: 2, agree: 3, neutral: 1, disagree: 4, totalRespondents: 10 }],
  mappings: [
    { coId: "CO1", poId: "PO1", level: 3 },
    { coId: "CO2", poId: "PO1", level: 2 },
    { coId: "CO2", poId: "PO2", level: 2 },
  ],
});

export const sampleInput = (locked = false): CourseAttainmentInput => {
  const d = sampleDataset();
  return {
    scope: { courseId: d.courseId, semesterId: d.semesterId, locked },
    outcomes: d.outcomes,
    assessments: d.assessments,
    roster: d.roster,
    marks: d.marks,
    surveys: d.surveys,
    mappings: d.mappings,
  };
};
