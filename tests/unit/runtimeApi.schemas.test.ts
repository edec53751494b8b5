import { normalizeRemoteStatus } from "../../src/infrastructure/runtime-api/runtimeApi.schemas";

describe("normalizeRemoteStatus", () => {
  it.each([
    ["QUEUED", "Queued"],
    ["running", "Running"],
    ["COMPLETED", "Done"],
    ["DONE", "Done"],
    ["CANCELLED", "Cancelled"],
    ["canceled", "Cancelled"],
    ["FAILED", "Failed"],
    ["ERROR", "Failed"],
    [" Queued ", "Queued"]
  ])("maps %p to %p", (raw, expected) => {
    expect(normalizeRemoteStatus(raw)).toBe(expected);
  });

  it("returns undefined for anything else", () => {
    expect(normalizeRemoteStatus("PAUSED")).toBeUndefined();
    expect(normalizeRemoteStatus("")).toBeUndefined();
  });
});
