// src/tests/assessmentRows.test.ts
import { IncompleteMappingError, InvalidInputError } from "../lib/attainmentErrors";
import { readAssessment } from "../utils/assessmentRows";

const coIds = ["CO1", "CO2"];

describe("Assessment body", () => {
  it("should read the category, max marks and components", () => {
    const draft = readAssessment(
      "c1",
      {
        category: "ia1",
        maxMarks: "30",
        components: [
          { componentNumber: "Q1", coId: "co1", maxMarks: 10 },
          { componentNumber: " Q2 ", coId: "CO2", maxMarks: "20" },
        ],
      },
      coIds
    );

    expect(draft).toEqual({
      category: "IA1",
      maxMarks: 30,
      components: [
        { componentNumber: "Q1", coId: "CO1", maxMarks: 10 },
        { componentNumber: "Q2", coId: "CO2", maxMarks: 20 },
      ],
    });
  });

  it("should reject an unknown category", () => {
    expect.assertions(2);
    try {
      readAssessment("c1", { category: "QUIZ", maxMarks: 10, components: [] }, coIds);
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInputError);
      if (err instanceof InvalidInputError) expect(err.details).toEqual({ courseId: "c1", category: "QUIZ" });
    }
  });

  it("should refuse components worth more than the assessment", () => {
    expect.assertions(2);
    try {
      readAssessment(
        "c1",
        {
          category: "END",
          maxMarks: 25,
          components: [
            { componentNumber: "Q1", coId: "CO1", maxMarks: 15 },
            { componentNumber: "Q2", coId: "CO2", maxMarks: 15 },
          ],
        },
        coIds
      );
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInputError);
      if (err instanceof InvalidInputError) {
        expect(err.details).toEqual({
          courseId: "c1",
          problems: ["component max marks add up to 30, above the assessment max of 25"],
        });
      }
    }
  });

  it("should list every malformed component", () => {
    expect.assertions(2);
    try {
      readAssessment(
        "c1",
        {
          category: "IA2",
          maxMarks: 20,
          components: [
            { componentNumber: "Q1", coId: "CO1", maxMarks: 5 },
            { componentNumber: "Q1", coId: "CO1", maxMarks: -1 },
            { coId: "CO2", maxMarks: 5 },
          ],
        },
        coIds
      );
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInputError);
      if (err instanceof InvalidInputError) {
        expect(err.details).toEqual({
          courseId: "c1",
          problems: ["component Q1 is repeated", "component Q1 has invalid maxMarks", "components[2].componentNumber is required"],
        });
      }
    }
  });

  it("should require at least one component", () => {
    expect(() => readAssessment("c1", { category: "IA1", maxMarks: 10 }, coIds)).toThrow("Assessment is malformed");
  });

  it("should refuse components not mapped to a course outcome", () => {
    expect.assertions(3);
    try {
      readAssessment(
        "c1",
        {
          category: "IA1",
          maxMarks: 20,
          components: [
            { componentNumber: "Q1", coId: "CO1", maxMarks: 5 },
            { componentNumber: "Q2", coId: "CO9", maxMarks: 5 },
            { componentNumber: "Q3", maxMarks: 5 },
          ],
        },
        coIds
      );
    } catch (err) {
      expect(err).toBeInstanceOf(IncompleteMappingError);
      if (err instanceof IncompleteMappingError) {
        expect(err.statusCode).toBe(422);
        expect(err.details).toEqual({
          courseId: "c1",
          components: [
            { assessmentId: "IA1", componentId: "", componentNumber: "Q2", coId: "CO9" },
            { assessmentId: "IA1", componentId: "", componentNumber: "Q3", coId: null },
          ],
        });
      }
    }
  });
});
