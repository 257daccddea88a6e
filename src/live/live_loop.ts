import { TradeLogger } from "../logging/trade_logger.js";

/**
 * Runs `pass` every `intervalMs` while started. Passes never overlap; the
 * next one is scheduled after the previous finishes. Outside the trading
 * window (`shouldRun` false) a tick is skipped, not queued.
 */
export class LiveLoop {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private inFlight: Promise<void> | null = null;
  private passes = 0;

  constructor(
    private pass: () => Promise<unknown>,
    private intervalMs: number,
    private logger: TradeLogger,
    private shouldRun: () => boolean = () => true
  ) {}

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.logger.info("LIVE", `Loop started, interval ${this.intervalMs}ms`);
    this.schedule(0);
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.inFlight;
    this.logger.info("LIVE", `Loop stopped after ${this.passes} passes`);
  }

  isRunning(): boolean {
    return this.running;
  }

  get completedPasses(): number {
    return this.passes;
  }

  /** Runs a single pass now. Returns false when skipped outside the window. */
  async runOnce(): Promise<boolean> {
    if (!this.shouldRun()) {
      this.logger.info("LIVE", "Outside trading window, pass skipped");
      return false;
    }
    try {
      await this.pass();
    } catch (err) {
      this.logger.error("LIVE", "Pass failed", err);
    }
    this.passes += 1;
    return true;
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.runOnce().then(() => {
        this.inFlight = null;
        if (this.running) {
          this.schedule(this.intervalMs);
        }
      });
    }, delayMs);
  }
}
