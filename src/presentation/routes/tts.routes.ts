import { Router } from "express";
import type { TtsController } from "../controllers/tts.controller";

export function createTtsRoutes(ttsController: TtsController): Router {
  const router = Router();

  router.post("/", (req, res) => ttsController.synthesize(req, res));

  router.get("/files/:key", (req, res) => ttsController.getAudio(req, res));

  router.get("/cache", (req, res) => ttsController.getCacheInfo(req, res));

  router.post("/cache/cleanup", (req, res) => ttsController.cleanupCache(req, res));

  return router;
}
