// src/utils/coScorer.ts
import type {
  AssessmentInput,
  AttainmentWarning,
  CoAssessmentAttainment,
  ComponentInput,
  LevelThreshold,
} from "../types/attainment";
import { classifyLevel } from "./thresholdClassifier";
import { compareIds, PERCENT_DIGITS, roundTo } from "./precision";

// componentId -> studentId -> marks
export type MarksByComponent = ReadonlyMap<string, ReadonlyMap<string, number>>;

export interface AssessmentScore {
  results: CoAssessmentAttainment[];
  warnings: AttainmentWarning[];
}

/**
 * Share of the roster that reaches each CO's expected proficiency on one
 * assessment. A student's CO percentage is the sum of their marks on the
 * components tagged with that CO over the sum of those components' max
 * marks; absent marks count as 0.
 *
 * A CO whose components carry no marks at all (total max 0) is left out of
 * this assessment's results instead of being reported as 0 %.
 */
export function scoreAssessment(
  assessment: AssessmentInput,
  roster: ReadonlyArray<string>,
  marks: MarksByComponent,
  proficiencyByCo: ReadonlyMap<string, number>,
  thresholds: ReadonlyArray<LevelThreshold>
): AssessmentScore {
  const warnings: AttainmentWarning[] = [];
  const componentsByCo = new Map<string, ComponentInput[]>();

  for (const component of assessment.components) {
    if (!component.coId) continue; // rejected upstream as an incomplete mapping
    const list = componentsByCo.get(component.coId) ?? [];
    list.push(component);
    componentsByCo.set(component.coId, list);
  }

  if (roster.length === 0 && componentsByCo.size > 0) {
    warnings.push({
      code: "NO_STUDENTS",
      message: `No enrolled students for assessment ${assessment.assessmentId}; its CO attainment is 0%`,
      context: { assessmentId: assessment.assessmentId },
    });
  }

  const results: CoAssessmentAttainment[] = [];
  const coIds = [...componentsByCo.keys()].sort(compareIds);

  for (const coId of coIds) {
    const components = componentsByCo.get(coId) ?? [];
    const totalMax = components.reduce((sum, c) => sum + c.maxMarks, 0);

    if (totalMax <= 0) {
      warnings.push({
        code: "EMPTY_DENOMINATOR",
        message: `${coId} has zero total max marks in assessment ${assessment.assessmentId}; excluded from it`,
        context: { assessmentId: assessment.assessmentId, coId },
      });
      continue;
    }

    const proficiency = proficiencyByCo.get(coId) ?? 60;
    let meeting = 0;

    for (const studentId of roster) {
      const obtained = components.reduce((sum, c) => sum + (marks.get(c.componentId)?.get(studentId) ?? 0), 0);
      // obtained / totalMax * 100 >= proficiency, without the division
      if (obtained * 100 >= proficiency * totalMax) meeting++;
    }

    const percentage = roster.length > 0 ? roundTo((meeting / roster.length) * 100, PERCENT_DIGITS) : 0;

    results.push({
      assessmentId: assessment.assessmentId,
      category: assessment.category,
      coId,
      percentage,
      level: classifyLevel(percentage, thresholds),
      studentsMeeting: meeting,
      studentsTotal: roster.length,
    });
  }

  return { results, warnings };
}

/** Index mark rows by component, then student. */
export function indexMarks(rows: ReadonlyArray<{ studentId: string; componentId: string; marks: number }>): MarksByComponent {
  const index = new Map<string, Map<string, number>>();
  for (const row of rows) {
    const byStudent = index.get(row.componentId) ?? new Map<string, number>();
    byStudent.set(row.studentId, row.marks);
    index.set(row.componentId, byStudent);
  }
  return index;
}
