import { OuiDatabase } from "./services/ouiDatabase";
import { AccessPointScanner } from "./services/scanners";
import { SignalHistory } from "./services/signalHistory";
import { AccessPointRow, buildRows, Palette, renderTable } from "./presentation";
import { logger } from "./utils/logger";

/**
 * Where a refresh cycle draws its frame
 */
export interface MonitorOutput {
  clear(): void;
  write(text: string): void;
}

export const terminalOutput: MonitorOutput = {
  clear: () => {
    // eslint-disable-next-line no-console
    console.clear();
  },
  write: (text: string) => {
    process.stdout.write(`${text}\n`);
  },
};

export interface MonitorOptions {
  refreshIntervalMs: number;
  palette?: Palette;
  output?: MonitorOutput;
  now?: () => Date;
}

/**
 * Periodic scan-and-redraw loop.
 *
 * The next cycle is scheduled only once the previous one has finished, so a
 * slow scanning utility delays the loop instead of stacking scans.
 */
export class WifiMonitor {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  // Bumped on every start and stop; a tick from an earlier run must not reschedule
  private generation = 0;
  private readonly palette: Palette;
  private readonly output: MonitorOutput;
  private readonly now: () => Date;

  constructor(
    private readonly scanner: AccessPointScanner,
    private readonly ouiDatabase: OuiDatabase,
    private readonly history: SignalHistory,
    private readonly options: MonitorOptions
  ) {
    this.palette = options.palette ?? Palette.plain();
    this.output = options.output ?? terminalOutput;
    this.now = options.now ?? (() => new Date());
  }

  get isRunning(): boolean {
    return this.running;
  }

  statusLine(): string {
    const seconds = this.options.refreshIntervalMs / 1000;
    return this.palette.dim(
      `Last updated: ${this.now().toISOString()} · refresh every ${seconds}s · Ctrl+C to exit`
    );
  }

  /**
   * Scan once, update history and redraw the table
   */
  async runCycle(): Promise<AccessPointRow[]> {
    const accessPoints = await this.scanner.scan();

    for (const accessPoint of accessPoints) {
      this.history.record(accessPoint.bssid, accessPoint.signal);
    }

    const rows = buildRows(accessPoints, this.history, this.ouiDatabase, this.palette);

    this.output.clear();
    this.output.write(renderTable(rows, this.palette));
    this.output.write(this.statusLine());

    return rows;
  }

  start(): void {
    if (this.running) { return; }

    this.running = true;
    this.generation += 1;
    logger.info(`Starting Wi-Fi monitor using ${this.scanner.name}`, {
      refreshIntervalMs: this.options.refreshIntervalMs,
      historyDepth: this.history.capacity,
    });
    void this.tick(this.generation);
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.running = false;
    this.generation += 1;
  }

  private async tick(generation: number): Promise<void> {
    try {
      await this.runCycle();
    } catch (error) {
      logger.error("Refresh cycle failed", { error });
    }

    if (this.running && generation === this.generation) {
      this.timer = setTimeout(() => {
        void this.tick(generation);
      }, this.options.refreshIntervalMs);
    }
  }
}
