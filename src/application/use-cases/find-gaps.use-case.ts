import type { IChunkRepository } from "../../domain/interfaces/ichunk.repository";
import { findMissingIndices } from "../../domain/utils/gaps";

export class FindGapsUseCase {
  constructor(private chunkRepository: IChunkRepository) {}

  async execute(sessionId: string): Promise<number[]> {
    const indices = await this.chunkRepository.findSequenceIndices(sessionId);
    const gaps = findMissingIndices(indices);
    if (gaps.length > 0) {
      console.warn(`[FindGaps] Session ${sessionId} is missing chunks ${gaps.join(", ")}`);
    }
    return gaps;
  }
}
