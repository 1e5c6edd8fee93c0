// lib/cqiSink.ts
import mongoose from "mongoose";
import CqiRequest from "../models/CqiRequest";
import type { CqiActionRequest } from "../types/attainment";

export interface CqiSubmission {
  courseId: string;
  semesterId: string;
  runVersion: number;
  requests: CqiActionRequest[];
}

/** Hands CQI action requests to the quality-improvement workflow. */
export interface CqiSink {
  submit(submission: CqiSubmission): Promise<void>;
}

export const mongoCqiSink: CqiSink = {
  async submit({ courseId, semesterId, runVersion, requests }) {
    if (requests.length === 0) return;
    await CqiRequest.insertMany(
      requests.map((r) => ({
        course: new mongoose.Types.ObjectId(courseId),
        semester: new mongoose.Types.ObjectId(semesterId),
        runVersion,
        ...r,
      }))
    );
  },
};
