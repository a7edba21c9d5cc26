// Periodic liveness signal to the server.
//
// The loop holds no reference to the socket. Each cycle it asks its target
// to send a heartbeat; the target checks, under the shared socket lock,
// whether the connection still exists and reports `false` once it is gone.

import type { Logger } from "./logging.ts";

export type HeartbeatState = "running" | "stopped";

/** The non-owning view of a connection that the heartbeat loop drives. */
export interface HeartbeatTarget {
  /**
   * Send one zero-length heartbeat chunk.
   * Resolves `false` without writing when the connection has been torn down.
   */
  sendHeartbeat(): Promise<boolean>;
}

export class Heartbeat {
  private state: HeartbeatState = "stopped";
  private stopRequested = false;
  private beats = 0;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private wake: (() => void) | null = null;
  private done: Promise<void> = Promise.resolve();

  constructor(
    private readonly target: HeartbeatTarget,
    private readonly intervalMs: number,
    private readonly logger: Logger,
  ) {}

  getState(): HeartbeatState {
    return this.state;
  }

  /** Heartbeats written since the last `start()`. */
  getBeatCount(): number {
    return this.beats;
  }

  /** Spawn the loop. No-op while running. */
  start(): void {
    if (this.state === "running") return;
    this.state = "running";
    this.stopRequested = false;
    this.beats = 0;
    this.done = this.loop();
  }

  /** Ask the loop to stop; a pending sleep ends immediately. */
  requestStop(): void {
    this.stopRequested = true;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  /** Resolves once the loop has exited. */
  join(): Promise<void> {
    return this.done;
  }

  /** `requestStop()` then `join()`. */
  stop(): Promise<void> {
    this.requestStop();
    return this.join();
  }

  private async loop(): Promise<void> {
    this.logger.debug({ intervalMs: this.intervalMs }, "heartbeat started");
    try {
      while (!this.stopRequested) {
        let sent: boolean;
        try {
          sent = await this.target.sendHeartbeat();
        } catch (error) {
          // The foreground request sees the same socket failure on its next read.
          this.logger.warn({ err: error }, "heartbeat write failed");
          break;
        }
        if (!sent) {
          this.logger.debug("connection gone, heartbeat exiting");
          break;
        }
        this.beats++;
        await this.sleep();
      }
    } finally {
      this.state = "stopped";
      this.logger.debug({ beats: this.beats }, "heartbeat stopped");
    }
  }

  private sleep(): Promise<void> {
    if (this.stopRequested) return Promise.resolve();
    return new Promise((resolve) => {
      this.wake = resolve;
      this.timer = setTimeout(() => {
        this.timer = null;
        this.wake = null;
        resolve();
      }, this.intervalMs);
      // Never holds the process open on its own.
      this.timer.unref();
    });
  }
}
