// src/models/SurveySummary.ts
import mongoose, { Schema, Document, Types } from "mongoose";

export interface ISurveySummary extends Document<Types.ObjectId> {
  course: mongoose.Types.ObjectId;
  courseOutcome: mongoose.Types.ObjectId;
  stronglyAgree: number;
  agree: number;
  neutral: number;
  disagree: number;
  totalRespondents: number;
  createdAt: Date;
}

// Read-only once produced: there is no update path, and the unique index
// stops a second upload for the same CO.
const schema = new Schema<ISurveySummary>(
  {
    course: { type: Schema.Types.ObjectId, ref: "Course", required: true },
    courseOutcome: { type: Schema.Types.ObjectId, ref: "CourseOutcome", required: true },
    stronglyAgree: { type: Number, required: true, min: 0 },
    agree: { type: Number, required: true, min: 0 },
    neutral: { type: Number, required: true, min: 0 },
    disagree: { type: Number, required: true, min: 0 },
    totalRespondents: { type: Number, required: true, min: 0 },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

schema.index({ course: 1, courseOutcome: 1 }, { unique: true });

export default mongoose.model<ISurveySummary>("SurveySummary", schema);
