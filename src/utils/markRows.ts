// src/utils/markRows.ts
import type { StudentMarkInput } from "../types/attainment";
import { InvalidMarkError, InvalidMarkRow } from "../lib/attainmentErrors";
import { checkMark } from "./attainmentValidator";

export interface MarkRow {
  studentId: string;
  marks: Record<string, number | string | null | undefined>; // componentNumber -> mark
}

export interface ComponentRef {
  componentId: string;
  componentNumber: string;
  maxMarks: number;
}

const normalizeStudent = (id: string) => String(id ?? "").trim().toUpperCase();

/**
 * Turns uploaded mark rows for one assessment into StudentMark records.
 * Blank cells become 0. Any unknown component column, non-numeric cell,
 * out-of-range mark or student outside the roster rejects the whole upload,
 * with every offending cell listed by row number (first data row is 1).
 */
export function buildMarkRecords(
  assessmentId: string,
  components: ReadonlyArray<ComponentRef>,
  roster: ReadonlyArray<string>,
  rows: ReadonlyArray<MarkRow>
): StudentMarkInput[] {
  const byNumber = new Map(components.map((c) => [c.componentNumber, c]));
  const enrolled = new Set(roster.map(normalizeStudent));
  const seenStudents = new Set<string>();
  const records: StudentMarkInput[] = [];
  const invalid: InvalidMarkRow[] = [];

  rows.forEach((row, index) => {
    const rowNum = index + 1;
    const studentId = normalizeStudent(row.studentId);
    const reject = (componentId: string, marks: number, reason: string) =>
      invalid.push({ assessmentId, studentId, componentId, marks, reason, row: rowNum });

    if (!studentId) {
      reject("", 0, "student id is missing");
      return;
    }
    if (!enrolled.has(studentId)) {
      reject("", 0, "student is not enrolled in the course");
      return;
    }
    if (seenStudents.has(studentId)) {
      reject("", 0, "student appears more than once");
      return;
    }
    seenStudents.add(studentId);

    for (const [componentNumber, raw] of Object.entries(row.marks ?? {})) {
      const component = byNumber.get(componentNumber.trim());
      const blank = raw === null || raw === undefined || (typeof raw === "string" && raw.trim() === "");
      const value = blank ? 0 : Number(raw);

      if (!component) {
        reject(componentNumber, Number.isFinite(value) ? value : 0, `unknown component ${componentNumber}`);
        continue;
      }
      const reason = checkMark(value, component.maxMarks);
      if (reason) {
        reject(component.componentId, Number.isFinite(value) ? value : 0, `${componentNumber}: ${reason}`);
        continue;
      }
      records.push({ studentId, componentId: component.componentId, marks: value });
    }
  });

  if (invalid.length) {
    throw new InvalidMarkError(`assessment ${assessmentId}`, invalid);
  }
  return records;
}
