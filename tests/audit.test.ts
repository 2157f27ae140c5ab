import { describe, it, expect, beforeEach } from "@jest/globals";
import { SynthesisAudit } from "../tooling/lib/audit";

describe("SynthesisAudit", () => {
  let audit: SynthesisAudit;

  beforeEach(() => {
    audit = new SynthesisAudit();
  });

  describe("record", () => {
    it("should count proposals as invoked or deduped", () => {
      audit.record("divide", "boundary", "invoked", [1, 0]);
      audit.record("divide", "boundary", "recorded_failure", [1, 0], { errorKind: "RangeError" });
      audit.record("divide", "random", "deduped", [1, 0]);

      expect(audit.getTargetAudit("divide")).toEqual({
        proposed: 2,
        deduped: 1,
        invoked: 1,
        recordedSuccess: 0,
        recordedFailure: 1,
        discardedTimeout: 0,
      });
    });

    it("should print inputs the way case descriptions do", () => {
      audit.record("greet", "random", "invoked", ["Ada", 3]);

      const [entry] = audit.getEntries();
      expect(entry.inputs).toBe("['Ada', 3]");
      expect(entry.target).toBe("greet");
      expect(entry.phase).toBe("random");
    });

    it("should keep details with the entry", () => {
      audit.record("divide", "boundary", "recorded_failure", [1, 0], { errorKind: "RangeError" });

      expect(audit.getEntries()[0].details).toEqual({ errorKind: "RangeError" });
    });

    it("should have a valid timestamp", () => {
      audit.record("divide", "boundary", "invoked", []);

      const timestamp = new Date(audit.getEntries()[0].timestamp);
      expect(timestamp.getTime()).not.toBeNaN();
    });
  });

  describe("getTimeouts", () => {
    it("should list discarded candidates with their elapsed time", () => {
      audit.record("spin", "boundary", "invoked", [100]);
      audit.record("spin", "boundary", "discarded_timeout", [100], { elapsedMs: 52 });

      expect(audit.getTimeouts()).toEqual([{ target: "spin", phase: "boundary", inputs: "[100]", elapsedMs: 52 }]);
      expect(audit.getTargetAudit("spin")?.discardedTimeout).toBe(1);
    });
  });

  describe("getSummary", () => {
    it("should total recorded, deduped and timed-out candidates", () => {
      audit.record("divide", "boundary", "invoked", [1, 1]);
      audit.record("divide", "boundary", "recorded_success", [1, 1]);
      audit.record("divide", "random", "deduped", [1, 1]);
      audit.record("Counter.constructor", "construction", "recorded_failure", [], { errorKind: "TypeError" });
      audit.record("spin", "boundary", "invoked", [100]);
      audit.record("spin", "boundary", "discarded_timeout", [100], { elapsedMs: 50 });

      expect(audit.getSummary()).toEqual({
        totalEntries: 6,
        totalTargets: 3,
        totalRecorded: 2,
        totalDeduped: 1,
        totalTimeouts: 1,
      });
    });
  });
});
