import { BSON } from "mongodb";
import { describe, expect, it } from "vitest";
import { MONGO_CLIENT_OPTIONS } from "../../../src/infrastructure/database/mongodb.connection";
import { makeChunk } from "../../helpers/fakes";

describe("MONGO_CLIENT_OPTIONS", () => {
  it("leaves unset optional chunk fields out of the stored document", () => {
    const chunk = makeChunk({ sequenceIndex: 0, language: undefined });

    const stored = BSON.deserialize(
      BSON.serialize({ ...chunk }, { ignoreUndefined: MONGO_CLIENT_OPTIONS.ignoreUndefined })
    );

    expect(stored).not.toHaveProperty("language");
    expect(stored.sequenceIndex).toBe(0);
  });
});
