// src/models/COPOMapping.ts
import mongoose, { Schema, Document, Types } from "mongoose";
import type { MappingLevel } from "../types/attainment";

export interface ICOPOMapping extends Document<Types.ObjectId> {
  course: mongoose.Types.ObjectId;
  courseOutcome: mongoose.Types.ObjectId;
  programOutcome: mongoose.Types.ObjectId;
  level: MappingLevel; // 1 low, 2 moderate, 3 high
}

const schema = new Schema<ICOPOMapping>(
  {
    course: { type: Schema.Types.ObjectId, ref: "Course", required: true },
    courseOutcome: { type: Schema.Types.ObjectId, ref: "CourseOutcome", required: true },
    programOutcome: { type: Schema.Types.ObjectId, ref: "ProgramOutcome", required: true },
    level: { type: Number, enum: [1, 2, 3], required: true },
  },
  { timestamps: true }
);

schema.index({ courseOutcome: 1, programOutcome: 1 }, { unique: true });
schema.index({ course: 1 });

export default mongoose.model<ICOPOMapping>("COPOMapping", schema);
