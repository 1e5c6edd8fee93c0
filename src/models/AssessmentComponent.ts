// src/models/AssessmentComponent.ts
import mongoose, { Schema, Document, Types } from "mongoose";

export interface IAssessmentComponent extends Document<Types.ObjectId> {
  assessment: mongoose.Types.ObjectId;
  componentNumber: string;                   // "Q1", "Q2a" …
  courseOutcome: mongoose.Types.ObjectId;    // mandatory CO tag
  maxMarks: number;
}

const schema = new Schema<IAssessmentComponent>(
  {
    assessment: { type: Schema.Types.ObjectId, ref: "Assessment", required: true },
    componentNumber: { type: String, required: true, trim: true },
    courseOutcome: { type: Schema.Types.ObjectId, ref: "CourseOutcome", required: true },
    maxMarks: { type: Number, required: true, min: 0 },
  },
  { timestamps: true }
);

schema.index({ assessment: 1, componentNumber: 1 }, { unique: true });
schema.index({ courseOutcome: 1 });

export default mongoose.model<IAssessmentComponent>("AssessmentComponent", schema);
