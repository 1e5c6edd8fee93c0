// src/utils/attainmentValidator.ts
import {
  ASSESSMENT_CATEGORIES,
  AssessmentInput,
  CourseAttainmentInput,
  StudentMarkInput,
} from "../types/attainment";
import {
  IncompleteMappingError,
  InvalidInputError,
  InvalidMarkError,
  InvalidMarkRow,
  UnmappedComponent,
} from "../lib/attainmentErrors";

const isCount = (n: number) => Number.isInteger(n) && n >= 0;

/**
 * Bounds check for one mark against its component. Returns the reason the
 * mark is invalid, or null when it is fine.
 */
export function checkMark(marks: number, maxMarks: number): string | null {
  if (typeof marks !== "number" || !Number.isFinite(marks)) return "mark is not a number";
  if (marks < 0) return "mark is negative";
  if (marks > maxMarks) return `mark exceeds component max of ${maxMarks}`;
  return null;
}

function checkOutcomes(input: CourseAttainmentInput) {
  const seen = new Set<string>();
  const problems: string[] = [];
  for (const co of input.outcomes) {
    if (seen.has(co.coId)) problems.push(`duplicate course outcome ${co.coId}`);
    seen.add(co.coId);
    if (!Number.isFinite(co.expectedProficiency) || co.expectedProficiency < 0 || co.expectedProficiency > 100) {
      problems.push(`${co.coId} expected proficiency must be between 0 and 100`);
    }
  }
  if (problems.length) {
    throw new InvalidInputError("Course outcomes are malformed", { courseId: input.scope.courseId, problems }, 422);
  }
  return seen;
}

function checkAssessments(input: CourseAttainmentInput, coIds: Set<string>) {
  const { courseId } = input.scope;
  const problems: string[] = [];
  const categories = new Set<string>();
  const componentIds = new Set<string>();
  const unmapped: UnmappedComponent[] = [];

  for (const a of input.assessments) {
    if (!ASSESSMENT_CATEGORIES.includes(a.category)) problems.push(`assessment ${a.assessmentId} has unknown category ${a.category}`);
    if (categories.has(a.category)) problems.push(`course has more than one ${a.category} assessment`);
    categories.add(a.category);

    const numbers = new Set<string>();
    for (const c of a.components) {
      if (numbers.has(c.componentNumber)) problems.push(`assessment ${a.assessmentId} repeats component ${c.componentNumber}`);
      numbers.add(c.componentNumber);
      if (componentIds.has(c.componentId)) problems.push(`component ${c.componentId} appears twice`);
      componentIds.add(c.componentId);
      if (!Number.isFinite(c.maxMarks) || c.maxMarks < 0) {
        problems.push(`component ${c.componentNumber} of assessment ${a.assessmentId} has invalid max marks`);
      }
      if (!c.coId || !coIds.has(c.coId)) {
        unmapped.push({
          assessmentId: a.assessmentId,
          componentId: c.componentId,
          componentNumber: c.componentNumber,
          coId: c.coId,
        });
      }
    }
  }

  if (problems.length) {
    throw new InvalidInputError("Assessments are malformed", { courseId, problems }, 422);
  }
  if (unmapped.length) {
    throw new IncompleteMappingError(courseId, unmapped);
  }
}

/**
 * Every mark must belong to a known component and an enrolled student and
 * lie within [0, maxMarks]. One bad record rejects the whole assessment; all
 * offending records are reported together.
 */
export function checkMarks(
  scopeId: string,
  assessments: ReadonlyArray<AssessmentInput>,
  roster: ReadonlyArray<string>,
  marks: ReadonlyArray<StudentMarkInput>
) {
  const componentInfo = new Map<string, { assessmentId: string; maxMarks: number }>();
  for (const a of assessments) {
    for (const c of a.components) componentInfo.set(c.componentId, { assessmentId: a.assessmentId, maxMarks: c.maxMarks });
  }
  const enrolled = new Set(roster);
  const seen = new Set<string>();
  const invalid: InvalidMarkRow[] = [];

  marks.forEach((m, index) => {
    const info = componentInfo.get(m.componentId);
    const base = { studentId: m.studentId, componentId: m.componentId, marks: m.marks, row: index + 1 };
    if (!info) {
      invalid.push({ ...base, assessmentId: "unknown", reason: "component does not belong to this course" });
      return;
    }
    const key = `${m.studentId}\u0000${m.componentId}`;
    const reason = !enrolled.has(m.studentId)
      ? "student is not enrolled in the course"
      : seen.has(key)
        ? "duplicate mark for student and component"
        : checkMark(m.marks, info.maxMarks);
    seen.add(key);
    if (reason) invalid.push({ ...base, assessmentId: info.assessmentId, reason });
  });

  if (invalid.length) {
    throw new InvalidMarkError(scopeId, invalid);
  }
}

function checkSurveysAndMappings(input: CourseAttainmentInput, coIds: Set<string>) {
  const problems: string[] = [];

  const surveyed = new Set<string>();
  for (const s of input.surveys) {
    if (!coIds.has(s.coId)) problems.push(`survey references unknown outcome ${s.coId}`);
    if (surveyed.has(s.coId)) problems.push(`more than one survey summary for ${s.coId}`);
    surveyed.add(s.coId);
    const counts = [s.stronglyAgree, s.agree, s.neutral, s.disagree, s.totalRespondents];
    if (!counts.every(isCount)) problems.push(`survey counts for ${s.coId} must be non-negative integers`);
  }

  const pairs = new Set<string>();
  for (const m of input.mappings) {
    if (!coIds.has(m.coId)) problems.push(`PO mapping references unknown outcome ${m.coId}`);
    if (![1, 2, 3].includes(m.level)) problems.push(`mapping ${m.coId}->${m.poId} has level ${m.level}, expected 1, 2 or 3`);
    const key = `${m.coId}->${m.poId}`;
    if (pairs.has(key)) problems.push(`mapping ${key} is duplicated`);
    pairs.add(key);
  }

  if (problems.length) {
    throw new InvalidInputError("Survey summaries or PO mappings are malformed", { courseId: input.scope.courseId, problems }, 422);
  }
}

/**
 * Hard preconditions of a course computation. Throws the first failing
 * category (outcomes, assessments, mapping, marks, surveys and PO mappings,
 * in that order) with every offending record of that category.
 */
export function validateCourseInput(input: CourseAttainmentInput): void {
  const coIds = checkOutcomes(input);
  checkAssessments(input, coIds);
  checkMarks(`course ${input.scope.courseId}`, input.assessments, input.roster, input.marks);
  checkSurveysAndMappings(input, coIds);
}
