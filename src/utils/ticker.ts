import { errorMessage } from "../errors.js";
import { createLogger } from "./logger.js";

const log = createLogger("ticker");

/** Repeating timer for status redraws. `stop()` is safe to call more than once. */
export class Ticker {
  private interval: ReturnType<typeof setInterval> | undefined;
  private intervalMs: number;
  private onTick: () => void;

  constructor(intervalMs: number, onTick: () => void) {
    this.intervalMs = intervalMs;
    this.onTick = onTick;
  }

  get running(): boolean {
    return this.interval !== undefined;
  }

  start(): void {
    if (this.interval) return;
    this.interval = setInterval(() => {
      try {
        this.onTick();
      } catch (err) {
        log.warn("Tick handler threw", { error: errorMessage(err) });
      }
    }, this.intervalMs);
  }

  stop(): void {
    if (!this.interval) return;
    clearInterval(this.interval);
    this.interval = undefined;
  }
}
