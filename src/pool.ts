import {
  ConfigurationError,
  PoolClosedError,
  PoolDegradedError,
  PoolExhaustedError,
  ProvisioningError,
  RenderPoolError,
  SessionNotCheckedOutError,
} from "./errors.js";
import { consoleLogger, debugLogger, errorMessage } from "./logger.js";
import type { Logger } from "./logger.js";
import type { BrowserSession, PoolStats, SessionFactory, SessionPoolConfig } from "./types.js";
import { DEFAULT_CHECKOUT_TIMEOUT_MS, MAX_CHECKOUT_TIMEOUT_MS } from "./config.js";

function checkTimeout(timeoutMs: number): void {
  if (Number.isNaN(timeoutMs) || timeoutMs > MAX_CHECKOUT_TIMEOUT_MS) {
    throw new ConfigurationError(
      `Checkout timeout must be at most ${MAX_CHECKOUT_TIMEOUT_MS}ms, got ${timeoutMs}`
    );
  }
}

interface Waiter {
  resolve: (session: BrowserSession) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Browser session pool
 *
 * Holds a fixed number of sessions, each checked out by at most one caller.
 */
export class SessionPool {
  private available: BrowserSession[] = [];
  private inUse: Set<BrowserSession> = new Set();
  private creating = 0;
  private initialized = false;
  private closed = false;
  private shutdownPromise: Promise<void> | null = null;
  private waitQueue: Waiter[] = [];

  private readonly factory: SessionFactory;
  private readonly size: number;
  private readonly checkoutTimeoutMs: number;
  private readonly logger: Logger;
  private readonly log: Logger;

  constructor(config: SessionPoolConfig) {
    if (!Number.isInteger(config.size) || config.size < 1) {
      throw new ConfigurationError(`Pool size must be a positive integer, got ${config.size}`);
    }
    this.factory = config.factory;
    this.size = config.size;
    this.checkoutTimeoutMs = config.checkoutTimeoutMs ?? DEFAULT_CHECKOUT_TIMEOUT_MS;
    checkTimeout(this.checkoutTimeoutMs);
    this.logger = config.logger ?? consoleLogger;
    this.log = debugLogger(config.debug ?? false, this.logger);
  }

  private get totalCount(): number {
    return this.available.length + this.inUse.size + this.creating;
  }

  /**
   * Fill the pool. Fails as a whole if any session cannot be created.
   */
  async init(): Promise<void> {
    if (this.closed) throw new PoolClosedError();
    if (this.initialized) throw new RenderPoolError("Session pool is already initialized");
    this.initialized = true;

    this.log("[pool] initializing", { size: this.size });

    this.creating += this.size;
    const results = await Promise.allSettled(
      Array.from({ length: this.size }, () => this.factory.create())
    );
    this.creating -= this.size;

    const sessions: BrowserSession[] = [];
    let failure: unknown;
    let failed = false;
    for (const result of results) {
      if (result.status === "fulfilled") {
        sessions.push(result.value);
      } else if (!failed) {
        failed = true;
        failure = result.reason;
      }
    }

    if (failed || this.closed) {
      await Promise.all(sessions.map((s) => this.terminate(s)));
      if (failed) {
        this.logger("[pool] initialization failed", { error: errorMessage(failure) });
        throw failure instanceof ProvisioningError
          ? failure
          : new ProvisioningError(`Failed to create session: ${errorMessage(failure)}`, { cause: failure });
      }
      throw new PoolClosedError();
    }

    for (const session of sessions) {
      this.handOff(session);
    }

    this.log("[pool] initialized", { ...this.stats() });
  }

  private async terminate(session: BrowserSession): Promise<void> {
    try {
      await session.terminate();
      this.log("[session] terminated", { sessionId: session.id });
    } catch (err) {
      this.logger("[session] terminate failed", {
        sessionId: session.id,
        error: errorMessage(err),
      });
    }
  }

  /**
   * Give a session to the first waiter, or park it as idle
   */
  private handOff(session: BrowserSession): void {
    const waiter = this.waitQueue.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      this.inUse.add(session);
      this.log("[pool] session handed to waiter", {
        sessionId: session.id,
        ...this.stats(),
      });
      waiter.resolve(session);
      return;
    }
    this.available.push(session);
  }

  private checkIn(session: BrowserSession): void {
    if (!this.inUse.delete(session)) {
      throw new SessionNotCheckedOutError(session.id);
    }
  }

  private async createForPool(): Promise<BrowserSession> {
    this.creating++;
    let session: BrowserSession;
    try {
      session = await this.factory.create();
    } catch (err) {
      this.creating--;
      const error = new PoolDegradedError(this.totalCount, this.size, err);
      this.logger("[pool] failed to create session", {
        error: errorMessage(err),
        total: error.total,
        maxSize: this.size,
      });
      throw error;
    }
    this.creating--;
    return session;
  }

  /**
   * Acquire a session, waiting up to timeoutMs for one to be released
   */
  async acquire(timeoutMs: number = this.checkoutTimeoutMs): Promise<BrowserSession> {
    if (this.closed) throw new PoolClosedError();
    checkTimeout(timeoutMs);

    const session = this.available.pop();
    if (session) {
      this.inUse.add(session);
      this.log("[pool] acquired", { sessionId: session.id, ...this.stats() });
      return session;
    }

    if (timeoutMs <= 0) {
      throw new PoolExhaustedError(timeoutMs);
    }

    this.log("[pool] at capacity, waiting for session", { timeoutMs, ...this.stats() });

    return new Promise((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          const idx = this.waitQueue.indexOf(waiter);
          if (idx !== -1) this.waitQueue.splice(idx, 1);
          reject(new PoolExhaustedError(timeoutMs));
        }, timeoutMs),
      };
      this.waitQueue.push(waiter);
    });
  }

  /**
   * Release a healthy session back to the pool
   */
  async release(session: BrowserSession): Promise<void> {
    this.checkIn(session);

    if (this.closed) {
      this.log("[pool] released after shutdown", { sessionId: session.id });
      await this.terminate(session);
      return;
    }

    this.handOff(session);
    this.log("[pool] released", { sessionId: session.id, ...this.stats() });
  }

  /**
   * Terminate a broken session and put a fresh one in its place.
   * The broken session is never handed out again.
   */
  async replace(session: BrowserSession): Promise<void> {
    this.checkIn(session);

    if (this.closed) {
      await this.terminate(session);
      return;
    }

    this.log("[pool] replacing session", { sessionId: session.id });

    // keep the slot counted while the old browser goes down
    this.creating++;
    await this.terminate(session);
    this.creating--;

    if (this.closed) return;

    const replacement = await this.createForPool();

    if (this.closed) {
      await this.terminate(replacement);
      return;
    }

    this.handOff(replacement);
    this.log("[pool] session replaced", {
      oldSessionId: session.id,
      sessionId: replacement.id,
      ...this.stats(),
    });
  }

  /**
   * Top the pool back up to its size after a failed replacement.
   * Returns the number of sessions added.
   */
  async replenish(): Promise<number> {
    if (this.closed) throw new PoolClosedError();

    let added = 0;
    while (this.totalCount < this.size) {
      const session = await this.createForPool();
      if (this.closed) {
        await this.terminate(session);
        throw new PoolClosedError();
      }
      this.handOff(session);
      added++;
    }

    if (added > 0) {
      this.log("[pool] replenished", { added, ...this.stats() });
    }
    return added;
  }

  /**
   * Shutdown the pool and terminate idle sessions.
   * Sessions still checked out are terminated when they come back.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.drain();
    }
    return this.shutdownPromise;
  }

  private async drain(): Promise<void> {
    this.closed = true;

    // Reject all waiters
    for (const waiter of this.waitQueue.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(new PoolClosedError());
    }

    const idle = this.available;
    this.available = [];

    this.log("[pool] shutting down", { idle: idle.length, inUse: this.inUse.size });

    await Promise.all(idle.map((s) => this.terminate(s)));

    this.log("[pool] shutdown complete");
  }

  /**
   * Get pool statistics
   */
  stats(): PoolStats {
    return {
      available: this.available.length,
      inUse: this.inUse.size,
      creating: this.creating,
      waiting: this.waitQueue.length,
      total: this.totalCount,
      maxSize: this.size,
      closed: this.closed,
    };
  }
}
