import { describe, expect, it, vi } from "vitest";
import { FindGapsUseCase } from "../../../src/application/use-cases/find-gaps.use-case";
import { InMemoryChunkRepository } from "../../../src/infrastructure/database/in-memory/in.memory.chunk.repository";
import { makeChunk } from "../../helpers/fakes";

describe("FindGapsUseCase", () => {
  it("lists the indices missing inside the received range", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const chunks = new InMemoryChunkRepository();
    for (const sequenceIndex of [0, 1, 3, 4]) {
      await chunks.swap(makeChunk({ sequenceIndex }));
    }
    await chunks.swap(makeChunk({ sequenceIndex: 2, sessionId: "other-session", id: "other" }));
    await chunks.swap(makeChunk({ sequenceIndex: 5, sessionId: "other-session", id: "other-5" }));

    const useCase = new FindGapsUseCase(chunks);

    expect(await useCase.execute("session-1")).toEqual([2]);
    expect(await useCase.execute("other-session")).toEqual([3, 4]);
    expect(await useCase.execute("empty-session")).toEqual([]);
    expect(warn).toHaveBeenCalledWith("[FindGaps] Session session-1 is missing chunks 2");
  });
});
