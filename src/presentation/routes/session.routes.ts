import { Router } from "express";
import multer from "multer";
import type { SessionController } from "../controllers/session.controller";

export function createSessionRoutes(sessionController: SessionController, maxFileSizeBytes: number): Router {
  const router = Router();

  // File type is checked by the upload use case so the error lists the allowed extensions
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxFileSizeBytes,
      files: 1,
    },
  });

  router.post("/", (req, res) => sessionController.createSession(req, res));

  router.get("/:sessionId", (req, res) => sessionController.getSession(req, res));

  // Upload (or re-upload) one chunk
  router.post(
    "/:sessionId/chunks",
    upload.single("file"),
    (req, res) => sessionController.uploadChunk(req, res)
  );

  router.get("/:sessionId/gaps", (req, res) => sessionController.getGaps(req, res));

  router.get("/:sessionId/transcript", (req, res) => sessionController.getTranscript(req, res));

  router.post("/:sessionId/finalize", (req, res) => sessionController.finalizeSession(req, res));

  return router;
}

export function createStatsRoutes(sessionController: SessionController): Router {
  const router = Router();

  router.get("/storage", (req, res) => sessionController.getStorageStatistics(req, res));

  return router;
}
