import type { Session } from "../../domain/entities/session";
import { ValidationError } from "../../domain/errors/app.errors";
import type { ISessionRepository } from "../../domain/interfaces/isession.repository";
import { validateSessionId } from "../../domain/utils/chunk.validator";

export interface CreateSessionUseCaseParams {
  sessionId: string;
  totalChunksExpected?: number;
}

export class CreateSessionUseCase {
  constructor(private sessionRepository: ISessionRepository) {}

  async execute(params: CreateSessionUseCaseParams): Promise<{ session: Session; created: boolean }> {
    const errors = validateSessionId(params.sessionId);
    if (params.totalChunksExpected !== undefined && !(Number.isInteger(params.totalChunksExpected) && params.totalChunksExpected > 0)) {
      errors.push("totalChunksExpected must be a positive integer");
    }
    if (errors.length > 0) {
      throw new ValidationError("Invalid session", errors);
    }

    const { session, created } = await this.sessionRepository.ensureExists(params.sessionId);

    if (params.totalChunksExpected !== undefined && session.totalChunksExpected !== params.totalChunksExpected) {
      const updated = await this.sessionRepository.updateProgress(session.id, {
        chunkCount: session.chunkCount,
        totalDurationSeconds: session.totalDurationSeconds,
        totalChunksExpected: params.totalChunksExpected,
      });
      return { session: updated ?? session, created };
    }

    if (created) {
      console.log(`[CreateSession] Opened session ${session.id}`);
    }
    return { session, created };
  }
}
