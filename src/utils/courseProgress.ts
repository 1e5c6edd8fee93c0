// src/utils/courseProgress.ts
import type { AssessmentCategory, CourseAttainmentInput } from "../types/attainment";
import type { CourseRunRecord } from "../services/attainmentStore";

export interface AssessmentProgress {
  created: boolean;
  componentsMapped: boolean;
  marksUploaded: boolean;
}

export interface CourseProgress {
  outcomesDefined: boolean;
  outcomeCount: number;
  assessments: Record<AssessmentCategory, AssessmentProgress>;
  studentsEnrolled: number;
  surveyUploaded: boolean;
  poMappingsDefined: boolean;
  attainmentComputed: boolean;
  latestVersion: number | null;
  cqiNeeded: boolean;
  cqiRequests: number;
}

/**
 * Setup checklist for one course. CQI is only reported as needed once a run
 * exists and its latest version has a CO below the PO target.
 */
export function summarizeCourseProgress(
  data: Omit<CourseAttainmentInput, "scope">,
  latest: CourseRunRecord | null
): CourseProgress {
  const markedComponents = new Set(data.marks.map((m) => m.componentId));
  const byCategory = (category: AssessmentCategory): AssessmentProgress => {
    const assessment = data.assessments.find((a) => a.category === category);
    if (!assessment) return { created: false, componentsMapped: false, marksUploaded: false };
    return {
      created: true,
      componentsMapped: assessment.components.length > 0 && assessment.components.every((c) => c.coId !== null),
      marksUploaded: assessment.components.some((c) => markedComponents.has(c.componentId)),
    };
  };

  const cqiRequests = latest ? latest.result.cqiRequests.length : 0;
  return {
    outcomesDefined: data.outcomes.length > 0,
    outcomeCount: data.outcomes.length,
    assessments: {
      IA1: byCategory("IA1"),
      IA2: byCategory("IA2"),
      END: byCategory("END"),
    },
    studentsEnrolled: data.roster.length,
    surveyUploaded: data.surveys.length > 0,
    poMappingsDefined: data.mappings.length > 0,
    attainmentComputed: latest !== null,
    latestVersion: latest ? latest.version : null,
    cqiNeeded: cqiRequests > 0,
    cqiRequests,
  };
}
