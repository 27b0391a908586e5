import { createHash } from "crypto";
import { describe, expect, it } from "vitest";
import { canonicalJson, fingerprint } from "../../../src/domain/utils/fingerprint";

describe("canonicalJson", () => {
  it("sorts object keys at every depth", () => {
    expect(canonicalJson({ b: 1, a: { d: [true, null], c: "x" } })).toBe('{"a":{"c":"x","d":[true,null]},"b":1}');
  });
});

describe("fingerprint", () => {
  it("is a sha-256 digest of the namespace and canonical inputs", () => {
    const expected = createHash("sha256")
      .update('{"inputs":{"format":"mp3","text":"hi"},"namespace":"tts"}')
      .digest("hex");

    expect(fingerprint("tts", { text: "hi", format: "mp3" })).toBe(expected);
  });

  it("ignores key order and separates namespaces", () => {
    const a = fingerprint("tts", { text: "hi", voice: "alloy" });
    const b = fingerprint("tts", { voice: "alloy", text: "hi" });

    expect(a).toBe(b);
    expect(a).toMatch(/^[a-f0-9]{64}$/);
    expect(fingerprint("other", { text: "hi", voice: "alloy" })).not.toBe(a);
  });
});
