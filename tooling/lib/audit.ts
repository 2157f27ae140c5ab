/**
 * Synthesis Audit Trail
 * Tracks every candidate from proposal to its terminal state
 */

import { formatInputs } from "./utils";

export type CandidateTransition =
  | "deduped"
  | "invoked"
  | "recorded_success"
  | "recorded_failure"
  | "discarded_timeout";

export type SynthesisPhase = "boundary" | "random" | "construction";

export interface AuditEntry {
  timestamp: string;
  type: CandidateTransition;
  /** Callable key, such as `divide` or `Counter.increment` */
  target: string;
  phase: SynthesisPhase;
  inputs: string;
  details: Record<string, unknown>;
}

export interface TimeoutAudit {
  target: string;
  phase: SynthesisPhase;
  inputs: string;
  elapsedMs: number;
}

export interface TargetAudit {
  proposed: number;
  deduped: number;
  invoked: number;
  recordedSuccess: number;
  recordedFailure: number;
  discardedTimeout: number;
}

export class SynthesisAudit {
  private entries: AuditEntry[] = [];
  private targets: Map<string, TargetAudit> = new Map();
  private timeouts: TimeoutAudit[] = [];

  /**
   * Record one transition of a candidate
   */
  record(
    target: string,
    phase: SynthesisPhase,
    type: CandidateTransition,
    inputs: readonly unknown[],
    details: Record<string, unknown> = {}
  ): void {
    const printed = formatInputs(inputs);
    const audit = this.targetAudit(target);
    switch (type) {
      case "deduped":
        audit.proposed += 1;
        audit.deduped += 1;
        break;
      case "invoked":
        audit.proposed += 1;
        audit.invoked += 1;
        break;
      case "recorded_success":
        audit.recordedSuccess += 1;
        break;
      case "recorded_failure":
        audit.recordedFailure += 1;
        break;
      case "discarded_timeout":
        audit.discardedTimeout += 1;
        this.timeouts.push({
          target,
          phase,
          inputs: printed,
          elapsedMs: typeof details.elapsedMs === "number" ? details.elapsedMs : 0,
        });
        break;
    }

    this.entries.push({
      timestamp: new Date().toISOString(),
      type,
      target,
      phase,
      inputs: printed,
      details,
    });
  }

  private targetAudit(target: string): TargetAudit {
    const existing = this.targets.get(target);
    if (existing) {
      return existing;
    }
    const created: TargetAudit = {
      proposed: 0,
      deduped: 0,
      invoked: 0,
      recordedSuccess: 0,
      recordedFailure: 0,
      discardedTimeout: 0,
    };
    this.targets.set(target, created);
    return created;
  }

  /**
   * Get all entries
   */
  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  getTargetAudit(target: string): TargetAudit | undefined {
    return this.targets.get(target);
  }

  /**
   * Candidates dropped because the oracle ran out of time
   */
  getTimeouts(): TimeoutAudit[] {
    return [...this.timeouts];
  }

  /**
   * Get summary statistics
   */
  getSummary(): {
    totalEntries: number;
    totalTargets: number;
    totalRecorded: number;
    totalDeduped: number;
    totalTimeouts: number;
  } {
    const audits = Array.from(this.targets.values());
    return {
      totalEntries: this.entries.length,
      totalTargets: audits.length,
      totalRecorded: audits.reduce((sum, audit) => sum + audit.recordedSuccess + audit.recordedFailure, 0),
      totalDeduped: audits.reduce((sum, audit) => sum + audit.deduped, 0),
      totalTimeouts: this.timeouts.length,
    };
  }
}

/**
 * Global audit instance
 */
export const globalSynthesisAudit = new SynthesisAudit();
