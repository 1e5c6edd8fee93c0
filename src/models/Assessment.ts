// src/models/Assessment.ts
import mongoose, { Schema, Document, Types } from "mongoose";
import { ASSESSMENT_CATEGORIES, AssessmentCategory } from "../types/attainment";

export interface IAssessment extends Document<Types.ObjectId> {
  course: mongoose.Types.ObjectId;
  category: AssessmentCategory;
  maxMarks: number;
}

const schema = new Schema<IAssessment>(
  {
    course: { type: Schema.Types.ObjectId, ref: "Course", required: true },
    category: { type: String, enum: [...ASSESSMENT_CATEGORIES], required: true },
    maxMarks: { type: Number, required: true, min: 0 },
  },
  { timestamps: true }
);

schema.index({ course: 1, category: 1 }, { unique: true });

export default mongoose.model<IAssessment>("Assessment", schema);
