// src/models/COAttainment.ts
import mongoose, { Schema, Document, Types } from "mongoose";
import { ASSESSMENT_CATEGORIES, AssessmentCategory } from "../types/attainment";

export interface ICOAttainment extends Document<Types.ObjectId> {
  scopeKey: string;
  version: number;
  course: mongoose.Types.ObjectId;
  assessment: mongoose.Types.ObjectId;
  category: AssessmentCategory;
  coId: string;
  percentage: number;
  level: number;
  studentsMeeting: number;
  studentsTotal: number;
}

const schema = new Schema<ICOAttainment>({
  scopeKey: { type: String, required: true },
  version: { type: Number, required: true },
  course: { type: Schema.Types.ObjectId, ref: "Course", required: true },
  assessment: { type: Schema.Types.ObjectId, ref: "Assessment", required: true },
  category: { type: String, enum: [...ASSESSMENT_CATEGORIES], required: true },
  coId: { type: String, required: true },
  percentage: { type: Number, required: true, min: 0, max: 100 },
  level: { type: Number, required: true },
  studentsMeeting: { type: Number, required: true },
  studentsTotal: { type: Number, required: true },
});

schema.index({ scopeKey: 1, version: 1, category: 1, coId: 1 }, { unique: true });

export default mongoose.model<ICOAttainment>("COAttainment", schema);
