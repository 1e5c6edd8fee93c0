// src/lib/courseAccess.ts
import { Types } from "mongoose";
import Course from "../models/Course";
import Semester from "../models/Semester";
import type { AttainmentStore, CourseRecord } from "../services/attainmentStore";
import { assertSemesterOpen } from "../utils/courseRules";
import { NotFoundError } from "./attainmentErrors";

/**
 * Loads a course whose configuration or raw data is about to change.
 * Courses in a locked semester are read-only.
 */
export async function loadEditableCourse(courseId: string) {
  if (!Types.ObjectId.isValid(courseId)) throw new NotFoundError("Course", courseId);
  const course = await Course.findById(courseId);
  if (!course) throw new NotFoundError("Course", courseId);

  const semester = await Semester.findById(course.semester).select("isLocked").lean();
  assertSemesterOpen(semester, { courseId, semesterId: course.semester.toString() });
  return course;
}

/** Same rule for writes that go through the attainment store. */
export async function openCourseScope(store: AttainmentStore, courseId: string): Promise<CourseRecord> {
  const course = await store.findCourse(courseId);
  if (!course) throw new NotFoundError("Course", courseId);
  assertSemesterOpen(await store.findSemester(course.semesterId), { courseId, semesterId: course.semesterId });
  return course;
}
