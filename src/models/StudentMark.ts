// src/models/StudentMark.ts
import mongoose, { Schema, Document, Types } from "mongoose";

export interface IStudentMark extends Document<Types.ObjectId> {
  studentId: string;
  component: mongoose.Types.ObjectId;
  marks: number;
}

// Bounds against the component's max marks are checked before write
const schema = new Schema<IStudentMark>(
  {
    studentId: { type: String, required: true, uppercase: true, trim: true },
    component: { type: Schema.Types.ObjectId, ref: "AssessmentComponent", required: true },
    marks: { type: Number, required: true, min: 0 },
  },
  { timestamps: true }
);

schema.index({ studentId: 1, component: 1 }, { unique: true });
schema.index({ component: 1 });

export default mongoose.model<IStudentMark>("StudentMark", schema);
