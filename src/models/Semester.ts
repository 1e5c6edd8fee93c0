// src/models/Semester.ts
import mongoose, { Schema, Document, Types } from "mongoose";

export interface ISemester extends Document<Types.ObjectId> {
  name: string;             // e.g. "2024-25 ODD"
  isLocked: boolean;
  lockedAt?: Date;
}

const schema = new Schema<ISemester>(
  {
    name: { type: String, required: true, trim: true, unique: true },
    isLocked: { type: Boolean, default: false },
    lockedAt: { type: Date },
  },
  { timestamps: true }
);

export default mongoose.model<ISemester>("Semester", schema);
