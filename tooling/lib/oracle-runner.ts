/**
 * Runs target code as its own oracle under a wall-clock deadline.
 *
 * Deadline enforcement is a capability chosen once at start-up:
 * - "vm": synchronous work runs inside a node:vm script with a timeout,
 *   which interrupts runaway loops; a returned promise is raced against the
 *   time left and abandoned once the deadline passes
 * - "none": no enforcement
 *
 * Known limitation: an async target that loops forever after its first
 * `await` runs outside the vm script and blocks the event loop, so the race
 * timer never fires and the process hangs.
 */

import vm from "node:vm";
import { describeThrown, errorKindOf, OracleTimeout } from "./errors";
import { globalLogger, Logger } from "./logger";
import { AnyCallable, DeadlineMode, Outcome } from "./types";

const VM_TIMEOUT_CODE = "ERR_SCRIPT_EXECUTION_TIMEOUT";

export interface Deadline {
  readonly mode: DeadlineMode;
  /** Run synchronous work, throwing OracleTimeout once timeoutMs has passed */
  runSync<T>(work: () => T, timeoutMs: number): T;
  /** Wait for pending work, throwing OracleTimeout once timeoutMs has passed */
  settle(pending: PromiseLike<unknown>, timeoutMs: number): Promise<unknown>;
}

class VmDeadline implements Deadline {
  readonly mode = "vm";
  private sandbox: Record<string, unknown> = {};
  private context = vm.createContext(this.sandbox);
  private script = new vm.Script("__oracleWork()", { filename: "oracle-call.vm" });

  runSync<T>(work: () => T, timeoutMs: number): T {
    let result: { value: T } | undefined;
    this.sandbox.__oracleWork = () => {
      result = { value: work() };
    };
    try {
      this.script.runInContext(this.context, { timeout: Math.max(1, Math.ceil(timeoutMs)) });
    } catch (error) {
      if (isVmTimeout(error)) {
        throw new OracleTimeout(timeoutMs);
      }
      throw error;
    } finally {
      this.sandbox.__oracleWork = undefined;
    }
    if (!result) {
      throw new Error("Oracle work finished without a result");
    }
    return result.value;
  }

  settle(pending: PromiseLike<unknown>, timeoutMs: number): Promise<unknown> {
    return raceDeadline(pending, timeoutMs);
  }
}

class NoDeadline implements Deadline {
  readonly mode = "none";

  runSync<T>(work: () => T): T {
    return work();
  }

  async settle(pending: PromiseLike<unknown>): Promise<unknown> {
    return pending;
  }
}

export function createDeadline(mode: DeadlineMode): Deadline {
  return mode === "none" ? new NoDeadline() : new VmDeadline();
}

function isVmTimeout(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === VM_TIMEOUT_CODE;
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

async function raceDeadline(pending: PromiseLike<unknown>, timeoutMs: number): Promise<unknown> {
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new OracleTimeout(timeoutMs)), Math.max(1, timeoutMs));
  });
  try {
    return await Promise.race([pending, expiry]);
  } finally {
    clearTimeout(timer);
  }
}

export type OracleRunnerOptions = {
  deadline?: Deadline;
  logger?: Logger;
};

export class OracleRunner {
  readonly deadline: Deadline;
  private logger: Logger;

  constructor(options: OracleRunnerOptions = {}) {
    this.deadline = options.deadline ?? createDeadline("vm");
    this.logger = options.logger ?? globalLogger;
  }

  /**
   * Call `callable` with `args`, and `receiver` as `this` when given
   */
  invoke(callable: AnyCallable, args: readonly unknown[], deadlineSeconds: number, receiver?: unknown): Promise<Outcome> {
    return this.run(() => Reflect.apply(callable, receiver, args), deadlineSeconds);
  }

  /**
   * Run a thunk and classify what it did. Never rejects for faults of the
   * target code.
   */
  async run(thunk: () => unknown, deadlineSeconds: number): Promise<Outcome> {
    const timeoutMs = Math.max(1, Math.round(deadlineSeconds * 1000));
    const started = Date.now();
    try {
      const value = this.deadline.runSync(thunk, timeoutMs);
      if (!isPromiseLike(value)) {
        return { status: "returned", value };
      }
      const remaining = timeoutMs - (Date.now() - started);
      const settled = await this.deadline.settle(value, remaining);
      return { status: "returned", value: settled };
    } catch (error) {
      if (error instanceof OracleTimeout) {
        const elapsedMs = Date.now() - started;
        this.logger.debug("Oracle call timed out", { timeoutMs, elapsedMs });
        return { status: "timedOut", elapsedMs };
      }
      return { status: "raised", errorKind: errorKindOf(error), message: describeThrown(error) };
    }
  }
}
