import type { Request, Response } from "express";
import type { ContentAddressedCache } from "../../application/services/content-addressed.cache";
import type { SpeechSynthesisService } from "../../application/services/speech-synthesis.service";
import { NotFoundError } from "../../domain/errors/app.errors";
import { parseSynthesizeSpeechRequest, toSynthesizeSpeechResponse } from "../dto/tts.dto";
import { sendError } from "../middleware/error.middleware";

export class TtsController {
  constructor(
    private speechSynthesisService: SpeechSynthesisService,
    private cache: ContentAddressedCache
  ) {}

  async synthesize(req: Request, res: Response): Promise<void> {
    try {
      const speech = await this.speechSynthesisService.synthesize(parseSynthesizeSpeechRequest(req.body));
      res.status(speech.cached ? 200 : 201).json(toSynthesizeSpeechResponse(speech));
    } catch (error) {
      sendError(res, error, "Failed to synthesize speech");
    }
  }

  async getAudio(req: Request, res: Response): Promise<void> {
    try {
      const audio = await this.speechSynthesisService.getAudio(req.params.key);
      if (!audio) {
        throw new NotFoundError(`Audio ${req.params.key} not found`);
      }
      res.setHeader("Content-Type", audio.contentType);
      res.setHeader("Content-Length", String(audio.data.length));
      res.send(audio.data);
    } catch (error) {
      sendError(res, error, "Failed to read audio");
    }
  }

  async getCacheInfo(_req: Request, res: Response): Promise<void> {
    try {
      res.json(await this.cache.getInfo());
    } catch (error) {
      sendError(res, error, "Failed to get cache info");
    }
  }

  async cleanupCache(_req: Request, res: Response): Promise<void> {
    try {
      res.json(await this.cache.cleanup());
    } catch (error) {
      sendError(res, error, "Failed to clean up cache");
    }
  }
}
