import { describe, it, expect } from "vitest";
import { computeCandidateWindow, computeCutoff } from "./cutoff";

const HOUR = 60 * 60 * 1000;
const now = new Date("2026-03-10T12:00:00Z");

describe("computeCutoff", () => {
  it("should use the lookback window when there is no previous success", () => {
    expect(computeCutoff(now, null, 36)).toEqual(new Date("2026-03-09T00:00:00Z"));
  });

  it("should clamp the lookback to at least one hour", () => {
    expect(computeCutoff(now, null, 0)).toEqual(new Date(now.getTime() - HOUR));
    expect(computeCutoff(now, null, -5)).toEqual(new Date(now.getTime() - HOUR));
    expect(computeCutoff(now, null, 0.5)).toEqual(new Date(now.getTime() - HOUR));
  });

  it("should keep the lookback when the last run was more recent than it", () => {
    const lastSuccess = new Date(now.getTime() - 24 * HOUR);
    expect(computeCutoff(now, lastSuccess, 36)).toEqual(
      new Date(now.getTime() - 36 * HOUR),
    );
  });

  it("should keep the lookback when elapsed time equals it exactly", () => {
    const lastSuccess = new Date(now.getTime() - 36 * HOUR);
    expect(computeCutoff(now, lastSuccess, 36)).toEqual(lastSuccess);
  });

  it("should widen the window to cover an outage since the last success", () => {
    const lastSuccess = new Date(now.getTime() - 100 * HOUR);
    expect(computeCutoff(now, lastSuccess, 36)).toEqual(lastSuccess);
  });

  it("should treat a last success in the future as zero elapsed time", () => {
    const lastSuccess = new Date(now.getTime() + 5 * HOUR);
    expect(computeCutoff(now, lastSuccess, 36)).toEqual(
      new Date(now.getTime() - 36 * HOUR),
    );
  });
});

describe("computeCandidateWindow", () => {
  it("should pick the recent display window when it reaches further back", () => {
    const window = computeCandidateWindow(now, null, 36, 7);

    expect(window.stateCutoff).toEqual(new Date("2026-03-09T00:00:00Z"));
    expect(window.recentCutoff).toEqual(new Date("2026-03-03T12:00:00Z"));
    expect(window.candidateCutoff).toEqual(window.recentCutoff);
  });

  it("should pick the catch-up cutoff when the outage is longer than the display window", () => {
    const lastSuccess = new Date("2026-02-20T12:00:00Z");
    const window = computeCandidateWindow(now, lastSuccess, 36, 7);

    expect(window.stateCutoff).toEqual(lastSuccess);
    expect(window.candidateCutoff).toEqual(lastSuccess);
  });

  it("should clamp the display window to at least one day", () => {
    const window = computeCandidateWindow(now, null, 1, 0);
    expect(window.recentCutoff).toEqual(new Date("2026-03-09T12:00:00Z"));
    expect(window.candidateCutoff).toEqual(window.recentCutoff);
  });
});
