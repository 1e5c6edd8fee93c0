// src/models/GovernanceConfig.ts
import mongoose, { Schema, Document, Types } from "mongoose";

export interface IGovernanceConfig extends Document<Types.ObjectId> {
  version: number;
  categoryWeights: { IA1: number; IA2: number; END: number };  // percent, sum expected 100
  directWeight: number;      // sum with indirectWeight expected 1.0
  indirectWeight: number;
  levelThresholds: Array<{ level: number; minPercent: number }>;
  poTarget: number;          // 0–3 scale
  createdAt: Date;
}

// Append-only: every change is a new version, the highest version is current
const schema = new Schema<IGovernanceConfig>(
  {
    version: { type: Number, required: true, unique: true, min: 1 },
    categoryWeights: {
      IA1: { type: Number, required: true, min: 0 },
      IA2: { type: Number, required: true, min: 0 },
      END: { type: Number, required: true, min: 0 },
    },
    directWeight: { type: Number, required: true, min: 0 },
    indirectWeight: { type: Number, required: true, min: 0 },
    levelThresholds: [
      {
        _id: false,
        level: { type: Number, required: true, min: 1 },
        minPercent: { type: Number, required: true, min: 0, max: 100 },
      },
    ],
    poTarget: { type: Number, required: true, min: 0, max: 3 },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

export default mongoose.model<IGovernanceConfig>("GovernanceConfig", schema);
