// src/models/Course.ts
import mongoose, { Schema, Document, Types } from "mongoose";

export interface ICourse extends Document<Types.ObjectId> {
  code: string;                          // e.g. "18CSC205J"
  name: string;
  program: mongoose.Types.ObjectId;
  semester: mongoose.Types.ObjectId;
}

const schema = new Schema<ICourse>(
  {
    code: { type: String, required: true, uppercase: true, trim: true },
    name: { type: String, required: true, trim: true },
    program: { type: Schema.Types.ObjectId, ref: "Program", required: true },
    semester: { type: Schema.Types.ObjectId, ref: "Semester", required: true },
  },
  { timestamps: true }
);

// A course code is offered once per semester
schema.index({ code: 1, semester: 1 }, { unique: true });
schema.index({ program: 1, semester: 1 });

export default mongoose.model<ICourse>("Course", schema);
