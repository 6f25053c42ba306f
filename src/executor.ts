import type { Connection, QueryResult, StatementCursor } from "./drivers/base.js";
import { ConnectionClosedError, EngineFailureError, ForbiddenError, TimeoutError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { isInsertStatement, validateQuery } from "./safety.js";

export type ExecutionResult =
  | { kind: "rows"; result: QueryResult }
  | { kind: "cursor"; cursor: StatementCursor };

export interface ExecuteOptions {
  /**
   * Run the statement gate first. Only statements the gateway composes itself
   * (introspection, imports) opt out.
   */
  gate?: boolean;
}

interface QueuedCall {
  reject(err: Error): void;
  abandoned: boolean;
}

/**
 * Runs statements against a single connection, one at a time, each under a
 * wall-clock deadline.
 *
 * Statements queue on a serial lane. The deadline starts when a statement
 * reaches the connection, not when it is submitted. On expiry the connection
 * is interrupted (never closed) and the caller gets a TimeoutError; the lane
 * stays held until the engine has actually unwound, so the next statement
 * never overlaps an interrupted one.
 *
 * An interrupted statement gets one more `timeoutMs` to unwind. Past that,
 * every queued call fails with TimeoutError, and new calls fail at once
 * until the engine lets go of the connection.
 */
export class BoundedExecutor {
  private lane: Promise<void> = Promise.resolve();
  private readonly queued = new Set<QueuedCall>();
  private graceTimer: NodeJS.Timeout | undefined;
  private stalled = false;

  constructor(
    private readonly connection: Connection,
    readonly timeoutMs: number,
    private readonly logger: Logger,
  ) {}

  async execute(sql: string, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    if (options.gate !== false) {
      const safety = validateQuery(sql);
      if (!safety.allowed) {
        this.logger.warn("statement blocked", { keywords: safety.keywords });
        throw new ForbiddenError(safety.keywords);
      }
    }
    return this.schedule(() => this.runStatement(sql));
  }

  /** Parse, bind and plan one statement on the lane, under the deadline, without running it. */
  async prepare(sql: string): Promise<void> {
    return this.schedule(() => this.connection.prepare(sql));
  }

  private schedule<T>(work: () => Promise<T>): Promise<T> {
    this.ensureOpen();
    if (this.stalled) return Promise.reject(new TimeoutError(this.timeoutMs));

    return new Promise<T>((resolve, reject) => {
      const call: QueuedCall = { reject, abandoned: false };
      this.queued.add(call);

      this.lane = this.lane.then(async () => {
        this.queued.delete(call);
        if (call.abandoned) return;
        if (this.connection.closed) {
          reject(new ConnectionClosedError(this.connection.path));
          return;
        }

        const start = Date.now();
        let timedOut = false;
        const timer = setTimeout(() => {
          timedOut = true;
          this.interrupt();
          reject(new TimeoutError(this.timeoutMs));
          this.graceTimer = setTimeout(() => this.abandonQueue(), this.timeoutMs);
        }, this.timeoutMs);

        try {
          const value = await work();
          if (!timedOut) {
            this.logger.debug("statement finished", { durationMs: Date.now() - start });
            resolve(value);
          }
        } catch (err) {
          if (timedOut) {
            this.logger.debug("interrupted statement unwound", { error: errorMessage(err) });
          } else {
            reject(EngineFailureError.from(err));
          }
        } finally {
          clearTimeout(timer);
          if (timedOut) this.unwound();
        }
      });
    });
  }

  private abandonQueue(): void {
    this.graceTimer = undefined;
    this.stalled = true;
    this.logger.error("interrupted statement has not unwound, failing queued statements", {
      queued: this.queued.size,
      timeoutMs: this.timeoutMs,
    });
    for (const call of this.queued) {
      call.abandoned = true;
      call.reject(new TimeoutError(this.timeoutMs));
    }
    this.queued.clear();
  }

  private unwound(): void {
    clearTimeout(this.graceTimer);
    this.graceTimer = undefined;
    if (this.stalled) {
      this.stalled = false;
      this.logger.info("interrupted statement finally unwound, lane released");
    }
  }

  /** Execute and return the fetched rows; an INSERT yields its column list and no rows. */
  async query(sql: string, options: ExecuteOptions = {}): Promise<QueryResult> {
    const outcome = await this.execute(sql, options);
    if (outcome.kind === "rows") return outcome.result;
    return { columns: outcome.cursor.columns, rows: [], rowCount: 0 };
  }

  private async runStatement(sql: string): Promise<ExecutionResult> {
    const cursor = await this.connection.run(sql);
    // INSERTs may not produce a meaningful row set; hand back the live cursor
    if (isInsertStatement(sql)) return { kind: "cursor", cursor };
    return { kind: "rows", result: await cursor.fetchAll() };
  }

  private interrupt(): void {
    this.logger.warn("statement exceeded timeout, interrupting", { timeoutMs: this.timeoutMs });
    try {
      this.connection.interrupt();
    } catch (err) {
      this.logger.error("interrupt failed", { error: errorMessage(err) });
    }
  }

  private ensureOpen(): void {
    if (this.connection.closed) throw new ConnectionClosedError(this.connection.path);
  }
}
