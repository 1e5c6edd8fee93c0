// src/config/defaultData.ts
import ProgramOutcome from "../models/ProgramOutcome";
import type { AttainmentStore } from "../services/attainmentStore";
import { DEFAULT_LEVEL_THRESHOLDS } from "../utils/thresholdClassifier";
import config from "./config";
import programOutcomes from "./programOutcomes.json";

export const ensureDefaultGovernance = async (store: AttainmentStore) => {
  const current = await store.latestGovernance();
  if (current) return current;

  const created = await store.saveGovernance({
    categoryWeights: { ...config.defaultGovernance.categoryWeights },
    directWeight: config.defaultGovernance.directWeight,
    indirectWeight: config.defaultGovernance.indirectWeight,
    levelThresholds: DEFAULT_LEVEL_THRESHOLDS.map((t) => ({ ...t })),
    poTarget: config.defaultGovernance.poTarget,
  });
  console.log(`Default governance v${created.version} created`);
  return created;
};

// NBA program outcomes PO1–PO12
export const ensureProgramOutcomes = async () => {
  const result = await ProgramOutcome.bulkWrite(
    programOutcomes.map((po) => ({
      updateOne: { filter: { code: po.code }, update: { $setOnInsert: po }, upsert: true },
    }))
  );
  if (result.upsertedCount > 0) console.log(`Seeded ${result.upsertedCount} program outcomes`);
};
