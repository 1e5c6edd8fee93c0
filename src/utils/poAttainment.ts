// src/utils/poAttainment.ts
import type {
  AttainmentWarning,
  CoFinalAttainment,
  CoPoMappingInput,
  CoursePoReport,
  PoAttainment,
  ProgramPoAttainment,
} from "../types/attainment";
import { compareIds, roundTo, SCORE_DIGITS } from "./precision";

/**
 * Course PO = Σ(final CO value × mapping level) / Σ(mapping level), over the
 * COs of the course that have a Final value and map to the PO. A PO whose
 * total mapping level is 0 is left out of the course's PO set.
 */
export function projectCoursePo(
  finals: ReadonlyArray<CoFinalAttainment>,
  mappings: ReadonlyArray<CoPoMappingInput>
): { pos: PoAttainment[]; warnings: AttainmentWarning[] } {
  const finalByCo = new Map(finals.map((f) => [f.coId, f.finalValue]));
  const sums = new Map<string, { weighted: number; levels: number }>();

  for (const m of mappings) {
    const acc = sums.get(m.poId) ?? { weighted: 0, levels: 0 };
    const final = finalByCo.get(m.coId);
    if (final !== undefined) {
      acc.weighted += final * m.level;
      acc.levels += m.level;
    }
    sums.set(m.poId, acc);
  }

  const pos: PoAttainment[] = [];
  const warnings: AttainmentWarning[] = [];

  for (const poId of [...sums.keys()].sort(compareIds)) {
    const { weighted, levels } = sums.get(poId) ?? { weighted: 0, levels: 0 };
    if (levels <= 0) {
      warnings.push({
        code: "EMPTY_DENOMINATOR",
        message: `${poId} has no contributing mapping level in this course; excluded`,
        context: { poId },
      });
      continue;
    }
    pos.push({ poId, value: roundTo(weighted / levels, SCORE_DIGITS) });
  }

  return { pos, warnings };
}

/**
 * Program PO = mean of the Course PO values of the courses that report the
 * PO. Courses without that PO count in neither numerator nor denominator.
 */
export function aggregateProgramPo(courses: ReadonlyArray<CoursePoReport>): ProgramPoAttainment[] {
  const sums = new Map<string, { total: number; count: number }>();

  for (const course of courses) {
    for (const po of course.pos) {
      const acc = sums.get(po.poId) ?? { total: 0, count: 0 };
      acc.total += po.value;
      acc.count += 1;
      sums.set(po.poId, acc);
    }
  }

  return [...sums.entries()]
    .sort(([a], [b]) => compareIds(a, b))
    .map(([poId, { total, count }]) => ({
      poId,
      value: roundTo(total / count, SCORE_DIGITS),
      contributingCourses: count,
    }));
}
