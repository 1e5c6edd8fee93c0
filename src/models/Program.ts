// src/models/Program.ts
import mongoose, { Schema, Document, Types } from "mongoose";

export interface IProgram extends Document<Types.ObjectId> {
  code: string;
  name: string;
}

const schema = new Schema<IProgram>(
  {
    code: { type: String, required: true, uppercase: true, trim: true, unique: true },
    name: { type: String, required: true, trim: true },
  },
  { timestamps: true }
);

export default mongoose.model<IProgram>("Program", schema);
