// src/models/ProgramOutcome.ts
import mongoose, { Schema, Document, Types } from "mongoose";

export interface IProgramOutcome extends Document<Types.ObjectId> {
  code: string;          // PO1 … PO12
  title: string;         // e.g. "Engineering knowledge"
}

const schema = new Schema<IProgramOutcome>({
  code: { type: String, required: true, uppercase: true, trim: true, unique: true },
  title: { type: String, required: true, trim: true },
});

export default mongoose.model<IProgramOutcome>("ProgramOutcome", schema);
