// src/models/COFinalAttainment.ts
import mongoose, { Schema, Document, Types } from "mongoose";

export interface ICOFinalAttainment extends Document<Types.ObjectId> {
  scopeKey: string;
  version: number;
  course: mongoose.Types.ObjectId;
  coId: string;
  directPercentage: number;
  directLevel: number;
  indirectScore: number | null;
  finalValue: number;
  level: number;
}

const schema = new Schema<ICOFinalAttainment>({
  scopeKey: { type: String, required: true },
  version: { type: Number, required: true },
  course: { type: Schema.Types.ObjectId, ref: "Course", required: true },
  coId: { type: String, required: true },
  directPercentage: { type: Number, required: true },
  directLevel: { type: Number, required: true },
  indirectScore: { type: Number, default: null },
  finalValue: { type: Number, required: true },
  level: { type: Number, required: true },
});

schema.index({ scopeKey: 1, version: 1, coId: 1 }, { unique: true });

export default mongoose.model<ICOFinalAttainment>("COFinalAttainment", schema);
