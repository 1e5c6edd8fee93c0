// src/tests/markRows.test.ts
import { InvalidMarkError } from "../lib/attainmentErrors";
import { buildMarkRecords } from "../utils/markRows";

const components = [
  { componentId: "c-q1", componentNumber: "Q1", maxMarks: 10 },
  { componentId: "c-q2", componentNumber: "Q2", maxMarks: 5 },
];
const roster = ["S1", "S2"];

describe("Mark upload rows", () => {
  it("should turn rows into mark records and read blank cells as 0", () => {
    const records = buildMarkRecords("a1", components, roster, [
      { studentId: " s1 ", marks: { Q1: 7, Q2: "4.5" } },
      { studentId: "S2", marks: { Q1: "", Q2: null } },
    ]);

    expect(records).toEqual([
      { studentId: "S1", componentId: "c-q1", marks: 7 },
      { studentId: "S1", componentId: "c-q2", marks: 4.5 },
      { studentId: "S2", componentId: "c-q1", marks: 0 },
      { studentId: "S2", componentId: "c-q2", marks: 0 },
    ]);
  });

  it("should reject the whole upload with every offending cell", () => {
    expect.assertions(2);
    try {
      buildMarkRecords("a1", components, roster, [
        { studentId: "S1", marks: { Q1: 12, Q3: 1 } },
        { studentId: "S7", marks: { Q1: 1 } },
        { studentId: "S2", marks: { Q2: "abc" } },
        { studentId: "S1", marks: { Q1: 1 } },
      ]);
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidMarkError);
      if (err instanceof InvalidMarkError) {
        expect(err.details).toEqual({
          scopeId: "assessment a1",
          rows: [
            { assessmentId: "a1", studentId: "S1", componentId: "c-q1", marks: 12, reason: "Q1: mark exceeds component max of 10", row: 1 },
            { assessmentId: "a1", studentId: "S1", componentId: "Q3", marks: 1, reason: "unknown component Q3", row: 1 },
            { assessmentId: "a1", studentId: "S7", componentId: "", marks: 0, reason: "student is not enrolled in the course", row: 2 },
            { assessmentId: "a1", studentId: "S2", componentId: "c-q2", marks: 0, reason: "Q2: mark is not a number", row: 3 },
            { assessmentId: "a1", studentId: "S1", componentId: "", marks: 0, reason: "student appears more than once", row: 4 },
          ],
        });
      }
    }
  });
});
