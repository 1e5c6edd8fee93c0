// src/server.ts
import { createApp } from "./app";
import connectDB from "./config/db";
import config from "./config/config";
import { ensureDefaultGovernance, ensureProgramOutcomes } from "./config/defaultData";
import { mongoAuditEmitter } from "./lib/auditLogger";
import { mongoCqiSink } from "./lib/cqiSink";
import { AttainmentRunner } from "./services/attainmentRunner";
import { MongoAttainmentStore } from "./services/mongoAttainmentStore";

const startServer = async () => {
  try {
    // 1. Connect to MongoDB
    await connectDB();

    const store = new MongoAttainmentStore();
    await ensureDefaultGovernance(store);
    await ensureProgramOutcomes();
    console.log("Default data initialized");

    const runner = new AttainmentRunner({ store, audit: mongoAuditEmitter, cqi: mongoCqiSink });
    const app = createApp({ store, audit: mongoAuditEmitter, runner });

    // 2. Start listening
    app.listen(config.port, () => {
      console.log(`${config.appName} server running on http://localhost:${config.port}`);
      console.log(`Frontend: ${config.frontendUrl}`);
      console.log(`Environment: ${process.env.NODE_ENV || "development"}`);
    });
  } catch (error) {
    console.error("Failed to start server:", error);
    process.exit(1);
  }
};

void startServer();
