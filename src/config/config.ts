// src/config/config.ts
import dotenv from "dotenv";

dotenv.config();

const num = (value: string | undefined, fallback: number) => {
  const parsed = Number(value);
  return value !== undefined && value !== "" && Number.isFinite(parsed) ? parsed : fallback;
};

const config = Object.freeze({
  port: num(process.env.PORT, 8000),
  databaseURI: process.env.MONGODB_URI || "mongodb://localhost:27017/attainment",
  frontendUrl: process.env.FRONTEND_URL || "http://localhost:3000",
  appName: process.env.APP_NAME || "Outcome Attainment",
  computeRateLimit: num(process.env.COMPUTE_RATE_LIMIT, 60), // compute calls per IP per hour

  // Seed values for governance v1; later versions come from the API
  defaultGovernance: Object.freeze({
    categoryWeights: Object.freeze({
      IA1: num(process.env.DEFAULT_IA1_WEIGHT, 20),
      IA2: num(process.env.DEFAULT_IA2_WEIGHT, 20),
      END: num(process.env.DEFAULT_END_WEIGHT, 60),
    }),
    directWeight: num(process.env.DEFAULT_DIRECT_WEIGHT, 0.8),
    indirectWeight: num(process.env.DEFAULT_INDIRECT_WEIGHT, 0.2),
    poTarget: num(process.env.DEFAULT_PO_TARGET, 2.1),
  }),
});

export default config;
