/**
 * HTTP Server Entry Point
 * Initializes and starts the Express application on a specified port.
 * Handles graceful shutdown on SIGTERM/SIGINT.
 */
import "dotenv/config";
import { createServer } from "http";
import { app } from "./app.js";
import { initializeApp } from "./config/init.js";
import { startExpiredJobsCleanup } from "./jobs/crons/expiredJobsCleanup.js";
import { shutdownDownloads } from "./services/business/downloadService.js";
import { PORT } from "./config/env.js";

/** HTTP server instance wrapping the Express application. */
const server = createServer(app);

/**
 * Initializes the temp root before accepting requests,
 * then starts the server and the cleanup schedule.
 */
initializeApp()
  .then(() => {
    const cleanupTask = startExpiredJobsCleanup();

    server.listen(PORT, "0.0.0.0", () => {
      console.log(`Server running on 0.0.0.0:${PORT}`);
      console.log("✓ Server ready to accept requests\n");
    });

    /**
     * Kills running downloads, removes their files and closes the server.
     */
    const shutdown = (signal: string) => {
      console.log(`${signal} received, shutting down...`);
      cleanupTask.stop();
      server.closeAllConnections();
      shutdownDownloads()
        .catch((error) => console.error("✗ Cleanup during shutdown failed:", error))
        .finally(() => server.close(() => process.exit(0)));
    };

    process.once("SIGTERM", () => shutdown("SIGTERM"));
    process.once("SIGINT", () => shutdown("SIGINT"));
  })
  .catch((error) => {
    console.error("✗ Initialization failed:", error);
    process.exit(1);
  });
