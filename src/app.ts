import express, { Express } from "express";
import { errorHandler } from "./middlewares/errorHandler";
import { BookingRepository } from "./repositories/bookingRepository";
import bookingRoutes from "./routes/bookingRoutes";
import bookingListRoutes from "./routes/bookingListRoutes";

export function createApp(repository: BookingRepository): Express {
  const app = express();

  // ── Core middleware ──────────────────────────────────────────────────────────
  app.use(express.json());

  // ── Health check ─────────────────────────────────────────────────────────────
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  // ── Routes ────────────────────────────────────────────────────────────────────
  app.use("/booking", bookingRoutes(repository));
  app.use("/bookings", bookingListRoutes(repository));

  // ── 404 handler ───────────────────────────────────────────────────────────────
  app.use((_req, res) => {
    res.status(404).json({ error: "Route not found" });
  });

  // ── Global error handler (must be last) ──────────────────────────────────────
  app.use(errorHandler);

  return app;
}
