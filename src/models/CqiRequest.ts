// src/models/CqiRequest.ts
import mongoose, { Schema, Document, Types } from "mongoose";

export interface ICqiRequest extends Document<Types.ObjectId> {
  course: mongoose.Types.ObjectId;
  semester: mongoose.Types.ObjectId;
  runVersion: number;
  coId: string;
  finalValue: number;
  target: number;
  shortfall: number;
  status: "PENDING"; // later states belong to the CQI workflow, not this service
  createdAt: Date;
}

const schema = new Schema<ICqiRequest>(
  {
    course: { type: Schema.Types.ObjectId, ref: "Course", required: true },
    semester: { type: Schema.Types.ObjectId, ref: "Semester", required: true },
    runVersion: { type: Number, required: true },
    coId: { type: String, required: true },
    finalValue: { type: Number, required: true },
    target: { type: Number, required: true },
    shortfall: { type: Number, required: true },
    status: { type: String, default: "PENDING" },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

schema.index({ course: 1, runVersion: 1, coId: 1 }, { unique: true });

export default mongoose.model<ICqiRequest>("CqiRequest", schema);
