// src/app.ts
import express from "express";
import cors from "cors";
import helmet from "helmet";
import config from "./config/config";
import { errorHandler } from "./middleware/errorHandler";
import { sanitizeInput } from "./middleware/security";
import type { AuditEmitter } from "./lib/auditLogger";
import type { AttainmentStore } from "./services/attainmentStore";
import type { AttainmentRunner } from "./services/attainmentRunner";

// Routes
import auditLogsRoutes from "./routes/auditLogs";
import { createAttainmentRouter } from "./routes/attainment";
import { createCourseRouter } from "./routes/courses";
import { createGovernanceRouter } from "./routes/governance";
import { createMarksRouter } from "./routes/marks";
import { createProgramRouter } from "./routes/programs";
import { createSemesterRouter } from "./routes/semesters";
import { createSurveyRouter } from "./routes/surveys";

export interface AppDeps {
  store: AttainmentStore;
  audit: AuditEmitter;
  runner: AttainmentRunner;
}

export function createApp(deps: AppDeps) {
  const app = express();

  // Security & Performance Middleware
  app.use(helmet());
  app.use(
    cors({
      origin: [config.frontendUrl, "http://127.0.0.1:3000"],
      credentials: true,
    })
  );
  app.use(express.json({ limit: "10mb" }));
  app.use(sanitizeInput);

  // Health check
  app.get("/health", (req, res) => {
    res.status(200).json({
      status: "OK",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // API Routes
  app.use("/governance", createGovernanceRouter(deps));
  app.use("/semesters", createSemesterRouter(deps));
  app.use("/programs", createProgramRouter(deps));
  app.use("/courses", createCourseRouter(deps));
  app.use("/marks", createMarksRouter(deps));
  app.use("/surveys", createSurveyRouter(deps));
  app.use("/attainment", createAttainmentRouter(deps));
  app.use("/audit-logs", auditLogsRoutes);

  app.use((req, res) => {
    res.status(404).json({
      message: `Route ${req.originalUrl} not found`,
      method: req.method,
    });
  });

  // Global error handler
  app.use(errorHandler);

  return app;
}
