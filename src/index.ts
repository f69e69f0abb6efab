import "dotenv/config";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { BookingRepository } from "./repositories/bookingRepository";

function main() {
  const config = loadConfig();

  // One repository for the life of the process, shared with every handler
  const repository = new BookingRepository(config.SNAPSHOT_PATH);
  repository.restore();

  const server = createApp(repository).listen(config.PORT, () => {
    console.log(`[Server] Booking store running on port ${config.PORT}`);
  });

  // Every mutation is already on disk, so shutdown only drains in-flight requests
  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received — shutting down gracefully`);
    server.close(() => {
      console.log("[Server] Shutdown complete.");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (err) {
  console.error("[Fatal] Failed to start server:", err);
  process.exit(1);
}
