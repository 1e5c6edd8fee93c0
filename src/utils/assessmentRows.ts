// src/utils/assessmentRows.ts
import { AssessmentCategory, isAssessmentCategory } from "../types/attainment";
import { IncompleteMappingError, InvalidInputError } from "../lib/attainmentErrors";
import { field, rejectIfProblems, toList, toNumber, toText } from "./requestFields";

export interface ComponentDraft {
  componentNumber: string;
  coId: string;
  maxMarks: number;
}

export interface AssessmentDraft {
  category: AssessmentCategory;
  maxMarks: number;
  components: ComponentDraft[];
}

/**
 * Reads a new assessment with its components. Every component must be
 * tagged with one of `coIds` (the course's outcomes), and the component max
 * marks may not add up to more than the assessment's own max.
 */
export function readAssessment(courseId: string, body: unknown, coIds: ReadonlyArray<string>): AssessmentDraft {
  const category = toText(field(body, "category")).toUpperCase();
  const maxMarks = toNumber(field(body, "maxMarks"));
  const components = toList(field(body, "components")).map((c) => ({
    componentNumber: toText(field(c, "componentNumber")),
    coId: toText(field(c, "coId")).toUpperCase(),
    maxMarks: toNumber(field(c, "maxMarks")),
  }));

  if (!isAssessmentCategory(category)) {
    throw new InvalidInputError("category must be one of IA1, IA2, END", { courseId, category }, 422);
  }

  const problems: string[] = [];
  if (!Number.isFinite(maxMarks) || maxMarks < 0) problems.push("maxMarks must be a non-negative number");
  if (!components.length) problems.push("at least one component is required");
  const numbers = new Set<string>();
  components.forEach((c, i) => {
    if (!c.componentNumber) problems.push(`components[${i}].componentNumber is required`);
    else if (numbers.has(c.componentNumber)) problems.push(`component ${c.componentNumber} is repeated`);
    numbers.add(c.componentNumber);
    if (!Number.isFinite(c.maxMarks) || c.maxMarks < 0) problems.push(`component ${c.componentNumber} has invalid maxMarks`);
  });
  const componentTotal = components.reduce((sum, c) => sum + (Number.isFinite(c.maxMarks) ? c.maxMarks : 0), 0);
  if (Number.isFinite(maxMarks) && componentTotal > maxMarks) {
    problems.push(`component max marks add up to ${componentTotal}, above the assessment max of ${maxMarks}`);
  }
  rejectIfProblems("Assessment is malformed", problems, { courseId });

  const known = new Set(coIds);
  const unmapped = components.filter((c) => !known.has(c.coId));
  if (unmapped.length) {
    throw new IncompleteMappingError(
      courseId,
      unmapped.map((c) => ({ assessmentId: category, componentId: "", componentNumber: c.componentNumber, coId: c.coId || null }))
    );
  }

  return { category, maxMarks, components };
}
