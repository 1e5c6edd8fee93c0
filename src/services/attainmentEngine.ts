// src/services/attainmentEngine.ts
// Pure attainment pipeline: marks/surveys -> per-assessment CO -> Direct /
// Indirect -> Final CO -> Course PO, and Course PO -> Program PO.
// No I/O and no clock; identical input and governance give identical output.
import {
  ASSESSMENT_CATEGORIES,
  AssessmentCategory,
  AttainmentWarning,
  CoAssessmentAttainment,
  CoFinalAttainment,
  CourseAttainmentInput,
  CourseAttainmentResult,
  GovernanceSnapshot,
  ProgramAttainmentInput,
  ProgramAttainmentResult,
} from "../types/attainment";
import { InvalidInputError, LockedScopeError } from "../lib/attainmentErrors";
import { validateCourseInput } from "../utils/attainmentValidator";
import { governanceWarnings } from "../utils/governanceSnapshot";
import { indexMarks, scoreAssessment } from "../utils/coScorer";
import { aggregateDirect } from "../utils/directAttainment";
import { computeIndirect } from "../utils/indirectAttainment";
import { combineFinal } from "../utils/finalAttainment";
import { aggregateProgramPo, projectCoursePo } from "../utils/poAttainment";
import { decideCqi } from "../utils/cqiTrigger";
import { compareIds } from "../utils/precision";

const categoryOrder = (c: AssessmentCategory) => ASSESSMENT_CATEGORIES.indexOf(c);

export function computeCourseAttainment(
  input: CourseAttainmentInput,
  governance: GovernanceSnapshot
): CourseAttainmentResult {
  const { courseId, semesterId, locked } = input.scope;
  if (locked) throw new LockedScopeError({ courseId, semesterId });

  validateCourseInput(input);

  const warnings: AttainmentWarning[] = [...governanceWarnings(governance)];
  const thresholds = governance.levelThresholds;
  const proficiencyByCo = new Map(input.outcomes.map((co) => [co.coId, co.expectedProficiency]));
  const marks = indexMarks(input.marks);
  const roster = [...new Set(input.roster)].sort(compareIds);

  // 1. Per-assessment CO attainment
  const coAssessments: CoAssessmentAttainment[] = [];
  const byCategory = new Map<AssessmentCategory, Map<string, number>>();

  const assessments = [...input.assessments].sort((a, b) => categoryOrder(a.category) - categoryOrder(b.category));
  for (const assessment of assessments) {
    const scored = scoreAssessment(assessment, roster, marks, proficiencyByCo, thresholds);
    coAssessments.push(...scored.results);
    warnings.push(...scored.warnings);
    byCategory.set(assessment.category, new Map(scored.results.map((r) => [r.coId, r.percentage])));
  }

  // 2. Direct
  const coIds = input.outcomes.map((co) => co.coId);
  const direct = aggregateDirect(coIds, byCategory, governance.categoryWeights, thresholds);
  warnings.push(...direct.warnings);

  // 3. Indirect
  const indirectByCo = new Map<string, number>();
  for (const summary of input.surveys) {
    const indirect = computeIndirect(summary);
    indirectByCo.set(indirect.coId, indirect.score);
    if (indirect.warning) warnings.push(indirect.warning);
  }

  // 4. Final
  const coFinals: CoFinalAttainment[] = direct.direct.map((d) => {
    const combined = combineFinal(d, indirectByCo.get(d.coId) ?? null, governance);
    if (combined.warning) warnings.push(combined.warning);
    return combined.final;
  });

  // 5. Course PO
  const mappings = [...input.mappings].sort((a, b) => compareIds(a.poId, b.poId) || compareIds(a.coId, b.coId));
  const projected = projectCoursePo(coFinals, mappings);
  warnings.push(...projected.warnings);

  return {
    scope: { courseId, semesterId },
    governanceVersion: governance.version,
    coAssessments,
    coFinals,
    coursePos: projected.pos,
    cqiRequests: decideCqi(coFinals, governance.poTarget),
    warnings,
  };
}

export function computeProgramAttainment(
  input: ProgramAttainmentInput,
  governance: GovernanceSnapshot
): ProgramAttainmentResult {
  const { programId, semesterId, locked } = input.scope;
  if (locked) throw new LockedScopeError({ programId, semesterId });

  const courseIds = input.courses.map((c) => c.courseId);
  const duplicates = courseIds.filter((id, i) => courseIds.indexOf(id) !== i);
  if (duplicates.length) {
    throw new InvalidInputError("Course reported more than once for the program", { programId, semesterId, duplicates });
  }

  const warnings: AttainmentWarning[] = [];
  if (input.courses.length === 0) {
    warnings.push({
      code: "EMPTY_DENOMINATOR",
      message: `No course attainment results for program ${programId} in semester ${semesterId}`,
      context: { programId, semesterId },
    });
  }

  const courses = [...input.courses].sort((a, b) => compareIds(a.courseId, b.courseId));

  return {
    scope: { programId, semesterId },
    governanceVersion: governance.version,
    programPos: aggregateProgramPo(courses),
    warnings,
  };
}
