import { describe, expect, it } from "vitest";
import { SessionRegistry } from "../../sessions";
import { createPipeline } from "../helpers/fakes";

function registry(limit?: number): SessionRegistry {
  return new SessionRegistry(() => createPipeline().orchestrator, limit);
}

describe("SessionRegistry", () => {
  it("returns the same orchestrator for a session", () => {
    const sessions = registry();
    expect(sessions.get("a")).toBe(sessions.get("a"));
    expect(sessions.get("a")).not.toBe(sessions.get("b"));
  });

  it("keeps memory separate per session", async () => {
    const sessions = registry();
    await sessions.get("a").resolve("loan one");

    expect(sessions.get("a").history).toHaveLength(2);
    expect(sessions.get("b").history).toHaveLength(0);
  });

  it("evicts the least recently used session", () => {
    const sessions = registry(2);
    sessions.get("a");
    sessions.get("b");
    sessions.get("a");
    sessions.get("c");

    expect(sessions.size).toBe(2);
    expect(sessions.has("a")).toBe(true);
    expect(sessions.has("b")).toBe(false);
    expect(sessions.has("c")).toBe(true);
  });

  it("clears a known session and reports unknown ones", async () => {
    const sessions = registry();
    await sessions.get("a").resolve("loan one");

    expect(sessions.clear("a")).toBe(true);
    expect(sessions.get("a").history).toEqual([]);
    expect(sessions.clear("missing")).toBe(false);
  });
});
