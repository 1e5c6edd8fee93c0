// src/models/CoursePOAttainment.ts
import mongoose, { Schema, Document, Types } from "mongoose";

export interface ICoursePOAttainment extends Document<Types.ObjectId> {
  scopeKey: string;
  version: number;
  course: mongoose.Types.ObjectId;
  poId: string;
  value: number;
}

const schema = new Schema<ICoursePOAttainment>({
  scopeKey: { type: String, required: true },
  version: { type: Number, required: true },
  course: { type: Schema.Types.ObjectId, ref: "Course", required: true },
  poId: { type: String, required: true },
  value: { type: Number, required: true },
});

schema.index({ scopeKey: 1, version: 1, poId: 1 }, { unique: true });

export default mongoose.model<ICoursePOAttainment>("CoursePOAttainment", schema);
