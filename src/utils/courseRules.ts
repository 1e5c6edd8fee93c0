// src/utils/courseRules.ts
import { ConflictError, InvalidInputError, LockedScopeError } from "../lib/attainmentErrors";
import { compareIds } from "./precision";
import { field, rejectIfProblems, toList, toNumber, toText } from "./requestFields";

export const DEFAULT_EXPECTED_PROFICIENCY = 60;

/** Course data in a locked semester is read-only. */
export function assertSemesterOpen(
  semester: { isLocked: boolean } | null | undefined,
  scope: { semesterId: string; courseId?: string },
  refused = "course data is read-only"
): void {
  if (semester?.isLocked) throw new LockedScopeError(scope, refused);
}

/** A course outcome is frozen once any assessment component is tagged with it. */
export function assertOutcomeUnreferenced(courseId: string, coId: string, components: number, change: "changed" | "deleted"): void {
  if (components > 0) {
    throw new ConflictError(`${coId} is used by ${components} assessment component(s) and can no longer be ${change}`, {
      courseId,
      coId,
      components,
    });
  }
}

export interface OutcomeDraft {
  coId: string;
  description: string;
  expectedProficiency: number;
  bloomLevel?: number;
}

export type OutcomeChanges = Partial<Omit<OutcomeDraft, "coId">>;

const proficiencyProblem = (value: number) =>
  !Number.isFinite(value) || value < 0 || value > 100 ? "expectedProficiency must be between 0 and 100" : null;

const bloomProblem = (value: number) =>
  !Number.isInteger(value) || value < 1 || value > 6 ? "bloomLevel must be an integer from 1 to 6" : null;

export function readNewOutcome(courseId: string, body: unknown): OutcomeDraft {
  const coId = toText(field(body, "coId")).toUpperCase();
  const description = toText(field(body, "description"));
  const proficiencyRaw = field(body, "expectedProficiency");
  const expectedProficiency = proficiencyRaw === undefined ? DEFAULT_EXPECTED_PROFICIENCY : toNumber(proficiencyRaw);
  const bloomRaw = field(body, "bloomLevel");
  const bloomLevel = bloomRaw === undefined ? undefined : toNumber(bloomRaw);

  const problems: string[] = [];
  if (!coId) problems.push("coId is required");
  const proficiency = proficiencyProblem(expectedProficiency);
  if (proficiency) problems.push(proficiency);
  const bloom = bloomLevel === undefined ? null : bloomProblem(bloomLevel);
  if (bloom) problems.push(bloom);
  rejectIfProblems("Course outcome is malformed", problems, { courseId });

  return bloomLevel === undefined ? { coId, description, expectedProficiency } : { coId, description, expectedProficiency, bloomLevel };
}

/** Only the fields present in the body change. */
export function readOutcomeChanges(courseId: string, coId: string, body: unknown): OutcomeChanges {
  const changes: OutcomeChanges = {};
  const problems: string[] = [];
  const description = field(body, "description");
  const proficiencyRaw = field(body, "expectedProficiency");
  const bloomRaw = field(body, "bloomLevel");

  if (description !== undefined) changes.description = toText(description);
  if (proficiencyRaw !== undefined) {
    const value = toNumber(proficiencyRaw);
    const problem = proficiencyProblem(value);
    if (problem) problems.push(problem);
    else changes.expectedProficiency = value;
  }
  if (bloomRaw !== undefined) {
    const value = toNumber(bloomRaw);
    const problem = bloomProblem(value);
    if (problem) problems.push(problem);
    else changes.bloomLevel = value;
  }
  rejectIfProblems("Course outcome is malformed", problems, { courseId, coId });
  return changes;
}

/** Trimmed, upper-cased, de-duplicated student ids in request order. */
export function readStudentIds(courseId: string, value: unknown): string[] {
  const studentIds = [...new Set(toList(value).map((s) => toText(s).toUpperCase()))];
  if (studentIds.some((s) => !s)) throw new InvalidInputError("studentIds must be non-empty strings", { courseId }, 422);
  return studentIds;
}

export interface RosterDiff {
  added: string[];
  removed: string[];
}

export function diffRoster(current: ReadonlyArray<string>, next: ReadonlyArray<string>): RosterDiff {
  const before = new Set(current);
  const after = new Set(next);
  return {
    added: [...after].filter((s) => !before.has(s)).sort(compareIds),
    removed: [...before].filter((s) => !after.has(s)).sort(compareIds),
  };
}
