import type { AppEvent, InputEvent } from "../types/events";
import type { EventQueue } from "./event-queue";
import { log } from "./logger";

export const DEFAULT_TICK_INTERVAL_MS = 250;

export interface ResizeSource {
  readonly columns?: number;
  readonly rows?: number;
  on(event: "resize", listener: () => void): unknown;
  off(event: "resize", listener: () => void): unknown;
}

export interface EventSourceOptions {
  tickIntervalMs?: number;
  now?: () => number;
  resizeSource?: ResizeSource;
}

/**
 * Merges terminal input and a fixed-interval tick into one ordered stream.
 *
 * Input is forwarded the moment it arrives. A tick is emitted whenever the
 * deadline has passed, checked on every timer wakeup and after every input,
 * and the next deadline is measured from the moment that tick went out. A
 * long stall therefore yields a single tick, not one per missed interval.
 *
 * The source stops on its own once the consumer closes the queue.
 */
export class EventSource {
  private readonly tickIntervalMs: number;
  private readonly now: () => number;
  private readonly resizeSource?: ResizeSource;
  private deadline = 0;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private detachClose: (() => void) | null = null;

  constructor(
    private readonly queue: EventQueue<AppEvent>,
    options: EventSourceOptions = {},
  ) {
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.now = options.now ?? (() => performance.now());
    this.resizeSource = options.resizeSource;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running || this.queue.isClosed) return;
    this.running = true;
    this.deadline = this.now() + this.tickIntervalMs;
    this.detachClose = this.queue.onClose(() => this.stop());
    this.resizeSource?.on("resize", this.onResize);
    this.arm();
    log.debug("Event source started", "events", {
      tickIntervalMs: this.tickIntervalMs,
    });
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.resizeSource?.off("resize", this.onResize);
    this.detachClose?.();
    this.detachClose = null;
    log.debug("Event source stopped", "events");
  }

  /**
   * Forward one input event. Returns false once the source has stopped.
   */
  emitInput = (event: InputEvent): boolean => {
    if (!this.running) return false;
    if (!this.send(event)) return false;
    this.checkDeadline();
    return this.running;
  };

  private onResize = (): void => {
    const source = this.resizeSource;
    if (!source) return;
    this.emitInput({
      type: "resize",
      columns: source.columns ?? 80,
      rows: source.rows ?? 24,
    });
  };

  private onTimer = (): void => {
    this.timer = null;
    if (!this.running) return;
    this.checkDeadline();
    if (this.running && this.timer === null) this.arm();
  };

  private checkDeadline(): void {
    const now = this.now();
    if (now < this.deadline) return;
    if (!this.send({ type: "tick" })) return;
    this.deadline = now + this.tickIntervalMs;
    this.arm();
  }

  private arm(): void {
    if (this.timer !== null) clearTimeout(this.timer);
    const remaining = Math.max(0, this.deadline - this.now());
    this.timer = setTimeout(this.onTimer, remaining);
  }

  private send(event: AppEvent): boolean {
    if (this.queue.push(event)) return true;
    this.stop();
    return false;
  }
}
