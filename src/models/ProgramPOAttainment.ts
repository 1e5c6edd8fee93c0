// src/models/ProgramPOAttainment.ts
import mongoose, { Schema, Document, Types } from "mongoose";

export interface IProgramPOAttainment extends Document<Types.ObjectId> {
  scopeKey: string;
  version: number;
  program: mongoose.Types.ObjectId;
  semester: mongoose.Types.ObjectId;
  poId: string;
  value: number;
  contributingCourses: number;
}

const schema = new Schema<IProgramPOAttainment>({
  scopeKey: { type: String, required: true },
  version: { type: Number, required: true },
  program: { type: Schema.Types.ObjectId, ref: "Program", required: true },
  semester: { type: Schema.Types.ObjectId, ref: "Semester", required: true },
  poId: { type: String, required: true },
  value: { type: Number, required: true },
  contributingCourses: { type: Number, required: true, min: 1 },
});

schema.index({ scopeKey: 1, version: 1, poId: 1 }, { unique: true });

export default mongoose.model<IProgramPOAttainment>("ProgramPOAttainment", schema);
