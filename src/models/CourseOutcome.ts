// src/models/CourseOutcome.ts
import mongoose, { Schema, Document, Types } from "mongoose";

export interface ICourseOutcome extends Document<Types.ObjectId> {
  course: mongoose.Types.ObjectId;
  coId: string;                 // CO1, CO2 …
  description: string;
  bloomLevel?: number;          // 1 (remember) … 6 (create)
  expectedProficiency: number;  // % of a CO's marks a student must reach
}

const schema = new Schema<ICourseOutcome>(
  {
    course: { type: Schema.Types.ObjectId, ref: "Course", required: true },
    coId: { type: String, required: true, uppercase: true, trim: true },
    description: { type: String, default: "" },
    bloomLevel: { type: Number, min: 1, max: 6 },
    expectedProficiency: { type: Number, default: 60, min: 0, max: 100 },
  },
  { timestamps: true }
);

schema.index({ course: 1, coId: 1 }, { unique: true });

export default mongoose.model<ICourseOutcome>("CourseOutcome", schema);
