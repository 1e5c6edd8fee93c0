// src/models/AttainmentRun.ts
import mongoose, { Schema, Document, Types } from "mongoose";
import type { AttainmentWarning } from "../types/attainment";

export type ScopeType = "COURSE" | "PROGRAM";

export interface IAttainmentRun extends Document<Types.ObjectId> {
  scopeType: ScopeType;
  scopeKey: string;                         // "course:<id>" | "program:<id>:<semesterId>"
  course?: mongoose.Types.ObjectId;
  program?: mongoose.Types.ObjectId;
  semester: mongoose.Types.ObjectId;
  version: number;
  governanceVersion: number;
  inputChecksum: string;
  outputChecksum: string;
  warnings: AttainmentWarning[];
  computedAt: Date;
}

// One row per successful computation. Result rows point at (scopeKey, version);
// nothing here is ever updated.
const schema = new Schema<IAttainmentRun>({
  scopeType: { type: String, enum: ["COURSE", "PROGRAM"], required: true },
  scopeKey: { type: String, required: true },
  course: { type: Schema.Types.ObjectId, ref: "Course" },
  program: { type: Schema.Types.ObjectId, ref: "Program" },
  semester: { type: Schema.Types.ObjectId, ref: "Semester", required: true },
  version: { type: Number, required: true, min: 1 },
  governanceVersion: { type: Number, required: true },
  inputChecksum: { type: String, required: true },
  outputChecksum: { type: String, required: true },
  warnings: [
    {
      _id: false,
      code: { type: String, required: true },
      message: { type: String, required: true },
      context: { type: Schema.Types.Mixed },
    },
  ],
  computedAt: { type: Date, required: true },
});

// Single writer per (scope, version)
schema.index({ scopeKey: 1, version: 1 }, { unique: true });

export default mongoose.model<IAttainmentRun>("AttainmentRun", schema);
