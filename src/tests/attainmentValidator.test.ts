// src/tests/attainmentValidator.test.ts
import {
  AttainmentError,
  IncompleteMappingError,
  InvalidInputError,
  InvalidMarkError,
} from "../lib/attainmentErrors";
import { checkMark, validateCourseInput } from "../utils/attainmentValidator";
import { sampleInput } from "./helpers/fixtures";

const captureError = (fn: () => void): AttainmentError => {
  try {
    fn();
  } catch (err) {
    if (err instanceof AttainmentError) return err;
    throw err;
  }
  throw new Error("expected an AttainmentError");
};

describe("Attainment input validation", () => {
  it("should accept a complete course", () => {
    expect(() => validateCourseInput(sampleInput())).not.toThrow();
  });

  it("should bound-check single marks", () => {
    expect(checkMark(0, 10)).toBeNull();
    expect(checkMark(10, 10)).toBeNull();
    expect(checkMark(-1, 10)).toBe("mark is negative");
    expect(checkMark(10.5, 10)).toBe("mark exceeds component max of 10");
    expect(checkMark(NaN, 10)).toBe("mark is not a number");
  });

  it("should refuse a component without a course outcome", () => {
    const input = sampleInput();
    input.assessments[0].components[1].coId = null;
    input.assessments[1].components[0].coId = "CO7";

    const err = captureError(() => validateCourseInput(input));

    expect(err).toBeInstanceOf(IncompleteMappingError);
    expect(err.statusCode).toBe(422);
    expect(err.details).toEqual({
      courseId: "course-1",
      components: [
        { assessmentId: "course-1-ia1", componentId: "course-1-ia1-q2", componentNumber: "Q2", coId: null },
        { assessmentId: "course-1-end", componentId: "course-1-end-q1", componentNumber: "Q1", coId: "CO7" },
      ],
    });
  });

  it("should reject the run and list every invalid mark", () => {
    const input = sampleInput();
    input.marks.push(
      { studentId: "S1", componentId: "course-1-end-q1", marks: 3 },
      { studentId: "S9", componentId: "course-1-end-q2", marks: 1 },
      { studentId: "S4", componentId: "course-1-end-q1", marks: 11 },
      { studentId: "S4", componentId: "missing", marks: 1 }
    );

    const err = captureError(() => validateCourseInput(input));

    expect(err).toBeInstanceOf(InvalidMarkError);
    expect(err.code).toBe("INVALID_MARK");
    expect(err.details).toEqual({
      scopeId: "course course-1",
      rows: [
        { assessmentId: "course-1-end", studentId: "S1", componentId: "course-1-end-q1", marks: 3, row: 20, reason: "duplicate mark for student and component" },
        { assessmentId: "course-1-end", studentId: "S9", componentId: "course-1-end-q2", marks: 1, row: 21, reason: "student is not enrolled in the course" },
        { assessmentId: "course-1-end", studentId: "S4", componentId: "course-1-end-q1", marks: 11, row: 22, reason: "mark exceeds component max of 10" },
        { assessmentId: "unknown", studentId: "S4", componentId: "missing", marks: 1, row: 23, reason: "component does not belong to this course" },
      ],
    });
  });

  it("should reject a negative mark", () => {
    const input = sampleInput();
    input.marks[0].marks = -2;
    const err = captureError(() => validateCourseInput(input));
    expect(err).toBeInstanceOf(InvalidMarkError);
    expect(err.message).toBe("1 mark record(s) rejected for course course-1; the whole assessment was refused");
  });

  it("should reject two assessments in one category", () => {
    const input = sampleInput();
    input.assessments[1].category = "IA1";
    const err = captureError(() => validateCourseInput(input));
    expect(err).toBeInstanceOf(InvalidInputError);
    expect(err.details).toEqual({ courseId: "course-1", problems: ["course has more than one IA1 assessment"] });
  });

  it("should reject an out-of-range expected proficiency", () => {
    const input = sampleInput();
    input.outcomes[1].expectedProficiency = 120;
    const err = captureError(() => validateCourseInput(input));
    expect(err.details).toEqual({ courseId: "course-1", problems: ["CO2 expected proficiency must be between 0 and 100"] });
  });

  it("should reject malformed surveys and mapping levels together", () => {
    const input = sampleInput();
    input.surveys.push({ coId: "CO5", stronglyAgree: 1, agree: 0, neutral: 0, disagree: 0, totalRespondents: 1.5 });
    input.mappings.push({ coId: "CO1", poId: "PO1", level: 2 });

    const err = captureError(() => validateCourseInput(input));

    expect(err).toBeInstanceOf(InvalidInputError);
    expect(err.details).toEqual({
      courseId: "course-1",
      problems: [
        "survey references unknown outcome CO5",
        "survey counts for CO5 must be non-negative integers",
        "mapping CO1->PO1 is duplicated",
      ],
    });
  });
});
