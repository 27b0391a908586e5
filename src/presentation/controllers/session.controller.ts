import type { Request, Response } from "express";
import type { AggregateSessionUseCase } from "../../application/use-cases/aggregate-session.use-case";
import type { CreateSessionUseCase } from "../../application/use-cases/create-session.use-case";
import type { FinalizeSessionUseCase } from "../../application/use-cases/finalize-session.use-case";
import type { FindGapsUseCase } from "../../application/use-cases/find-gaps.use-case";
import type { GetSessionUseCase } from "../../application/use-cases/get-session.use-case";
import type { GetStorageStatisticsUseCase } from "../../application/use-cases/get-storage-statistics.use-case";
import type { UploadChunkUseCase } from "../../application/use-cases/upload-chunk.use-case";
import { ValidationError } from "../../domain/errors/app.errors";
import { parseUploadChunkForm, toUploadChunkResponse } from "../dto/chunk.dto";
import { toFinalizeSessionResponse, toSessionResponse, toSessionSummaryResponse } from "../dto/session.dto";
import { toTranscriptResponse } from "../dto/transcript.dto";
import { sendError } from "../middleware/error.middleware";

export class SessionController {
  constructor(
    private createSessionUseCase: CreateSessionUseCase,
    private uploadChunkUseCase: UploadChunkUseCase,
    private getSessionUseCase: GetSessionUseCase,
    private findGapsUseCase: FindGapsUseCase,
    private aggregateSessionUseCase: AggregateSessionUseCase,
    private finalizeSessionUseCase: FinalizeSessionUseCase,
    private getStorageStatisticsUseCase: GetStorageStatisticsUseCase
  ) {}

  async createSession(req: Request, res: Response): Promise<void> {
    try {
      const body: unknown = req.body;
      const fields: Record<string, unknown> = typeof body === "object" && body !== null ? { ...body } : {};
      const { sessionId, totalChunksExpected } = fields;
      if (totalChunksExpected !== undefined && typeof totalChunksExpected !== "number") {
        throw new ValidationError("Invalid session", ["totalChunksExpected must be a number"]);
      }

      const { session, created } = await this.createSessionUseCase.execute({
        sessionId: typeof sessionId === "string" ? sessionId : "",
        totalChunksExpected,
      });

      res.status(created ? 201 : 200).json(toSessionResponse(session));
    } catch (error) {
      sendError(res, error, "Failed to create session");
    }
  }

  async uploadChunk(req: Request, res: Response): Promise<void> {
    try {
      if (!req.file) {
        throw new ValidationError("No file uploaded", ["multipart field \"file\" is required"]);
      }

      const form = parseUploadChunkForm(req.body);
      const result = await this.uploadChunkUseCase.execute({
        sessionId: req.params.sessionId,
        file: {
          buffer: req.file.buffer,
          originalName: req.file.originalname,
          mimeType: req.file.mimetype,
        },
        ...form,
      });

      res.status(201).json(toUploadChunkResponse(result));
    } catch (error) {
      sendError(res, error, "Failed to upload chunk");
    }
  }

  async getSession(req: Request, res: Response): Promise<void> {
    try {
      const summary = await this.getSessionUseCase.execute(req.params.sessionId);
      res.json(toSessionSummaryResponse(summary));
    } catch (error) {
      sendError(res, error, "Failed to get session");
    }
  }

  async getGaps(req: Request, res: Response): Promise<void> {
    try {
      const gaps = await this.findGapsUseCase.execute(req.params.sessionId);
      res.json({ sessionId: req.params.sessionId, gaps });
    } catch (error) {
      sendError(res, error, "Failed to find gaps");
    }
  }

  async getTranscript(req: Request, res: Response): Promise<void> {
    try {
      const transcript = await this.aggregateSessionUseCase.execute(req.params.sessionId);
      res.json(toTranscriptResponse(transcript));
    } catch (error) {
      sendError(res, error, "Failed to aggregate transcript");
    }
  }

  async finalizeSession(req: Request, res: Response): Promise<void> {
    try {
      const outcome = await this.finalizeSessionUseCase.execute(req.params.sessionId);
      res.json(toFinalizeSessionResponse(outcome));
    } catch (error) {
      sendError(res, error, "Failed to finalize session");
    }
  }

  async getStorageStatistics(_req: Request, res: Response): Promise<void> {
    try {
      res.json(await this.getStorageStatisticsUseCase.execute());
    } catch (error) {
      sendError(res, error, "Failed to get storage statistics");
    }
  }
}
