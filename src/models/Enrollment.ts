// src/models/Enrollment.ts
import mongoose, { Schema, Document, Types } from "mongoose";

export interface IEnrollment extends Document<Types.ObjectId> {
  course: mongoose.Types.ObjectId;
  studentId: string;   // roll number
}

const schema = new Schema<IEnrollment>({
  course: { type: Schema.Types.ObjectId, ref: "Course", required: true },
  studentId: { type: String, required: true, uppercase: true, trim: true },
});

schema.index({ course: 1, studentId: 1 }, { unique: true });

export default mongoose.model<IEnrollment>("Enrollment", schema);
