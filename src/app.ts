import express from "express";
import cors from "cors";
import type { Container } from "./container";
import { errorMiddleware } from "./presentation/middleware/error.middleware";
import { createSessionRoutes, createStatsRoutes } from "./presentation/routes/session.routes";
import { createTtsRoutes } from "./presentation/routes/tts.routes";

export function createApp(container: Container, maxFileSizeBytes: number): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", service: "interview-transcription-service" });
  });

  // Routes
  app.use("/api/sessions", createSessionRoutes(container.sessionController, maxFileSizeBytes));
  app.use("/api/stats", createStatsRoutes(container.sessionController));
  app.use("/api/tts", createTtsRoutes(container.ttsController));

  // Error handling middleware
  app.use(errorMiddleware);

  return app;
}
