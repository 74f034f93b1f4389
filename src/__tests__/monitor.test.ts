jest.mock("../utils/logger", () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import mockFs from "mock-fs";
import { mock, MockProxy } from "jest-mock-extended";
import { MonitorOutput, WifiMonitor } from "../monitor";
import { OuiDatabase } from "../services/ouiDatabase";
import { AccessPoint, AccessPointScanner } from "../services/scanners";
import { SignalHistory } from "../services/signalHistory";
import { logger } from "../utils/logger";

const FIXED_TIME = new Date("2026-01-15T12:00:00.000Z");

const HOME: AccessPoint = { ssid: "HomeNet", bssid: "aa:bb:cc:11:22:33", signal: 82, channel: "6" };
const CAFE: AccessPoint = { ssid: "Cafe Guest", bssid: "12:34:56:78:9a:bc", signal: 40, channel: "11" };

function recordingOutput(): MonitorOutput & { frames: string[]; clears: number } {
  const frames: string[] = [];
  const output = {
    frames,
    clears: 0,
    clear() {
      output.clears += 1;
    },
    write(text: string) {
      frames.push(text);
    },
  };
  return output;
}

describe("WifiMonitor", () => {
  let scanner: MockProxy<AccessPointScanner>;
  let history: SignalHistory;
  let output: ReturnType<typeof recordingOutput>;
  let monitor: WifiMonitor;

  beforeEach(() => {
    scanner = mock<AccessPointScanner>({ name: "fake" });
    history = new SignalHistory(3);
    output = recordingOutput();
    monitor = new WifiMonitor(
      scanner,
      OuiDatabase.fromEntries([["AA:BB:CC", "Test Corp"]]),
      history,
      { refreshIntervalMs: 5000, output, now: () => FIXED_TIME }
    );
  });

  afterEach(() => {
    monitor.stop();
    jest.useRealTimers();
  });

  describe("runCycle", () => {
    it("should record every access point and build rows", async () => {
      scanner.scan.mockResolvedValue([HOME, CAFE]);

      const rows = await monitor.runCycle();

      expect(history.get(HOME.bssid)).toEqual([82]);
      expect(history.get(CAFE.bssid)).toEqual([40]);
      expect(rows.map((row) => [row.index, row.ssid, row.manufacturer])).toEqual([
        [1, "HomeNet", "Test Corp"],
        [2, "Cafe Guest", "Unknown Manufacturer"],
      ]);
    });

    it("should grow the sparkline across cycles", async () => {
      scanner.scan.mockResolvedValue([HOME]);

      await monitor.runCycle();
      const rows = await monitor.runCycle();

      expect(history.get(HOME.bssid)).toEqual([82, 82]);
      expect(rows[0].sparkline).toBe("▇▇ ");
    });

    it("should clear the screen and draw the table and status line", async () => {
      scanner.scan.mockResolvedValue([HOME]);

      await monitor.runCycle();

      expect(output.clears).toBe(1);
      expect(output.frames).toHaveLength(2);
      expect(output.frames[0]).toContain("│ 1 │ HomeNet │ aa:bb:cc:11:22:33 │ 82%    │");
      expect(output.frames[1]).toBe(
        "Last updated: 2026-01-15T12:00:00.000Z · refresh every 5s · Ctrl+C to exit"
      );
    });

    it("should draw an empty table when the scan finds nothing", async () => {
      scanner.scan.mockResolvedValue([]);

      const rows = await monitor.runCycle();

      expect(rows).toEqual([]);
      expect(output.frames[0].endsWith("No access points found.")).toBe(true);
    });
  });

  describe("start and stop", () => {
    beforeEach(() => {
      jest.useFakeTimers();
      scanner.scan.mockResolvedValue([HOME]);
    });

    it("should scan immediately and then once per interval", async () => {
      monitor.start();
      await jest.advanceTimersByTimeAsync(0);

      expect(monitor.isRunning).toBe(true);
      expect(scanner.scan).toHaveBeenCalledTimes(1);

      await jest.advanceTimersByTimeAsync(4999);
      expect(scanner.scan).toHaveBeenCalledTimes(1);

      await jest.advanceTimersByTimeAsync(1);
      await jest.advanceTimersByTimeAsync(0);
      expect(scanner.scan).toHaveBeenCalledTimes(2);
      expect(history.get(HOME.bssid)).toEqual([82, 82]);
    });

    it("should ignore a second start", async () => {
      monitor.start();
      monitor.start();
      await jest.advanceTimersByTimeAsync(0);

      expect(scanner.scan).toHaveBeenCalledTimes(1);
    });

    it("should stop scheduling cycles after stop", async () => {
      monitor.start();
      await jest.advanceTimersByTimeAsync(0);

      monitor.stop();
      await jest.advanceTimersByTimeAsync(20000);

      expect(monitor.isRunning).toBe(false);
      expect(scanner.scan).toHaveBeenCalledTimes(1);
    });

    it("should keep a single refresh chain when restarted during a cycle", async () => {
      let finishScan: (accessPoints: AccessPoint[]) => void = () => undefined;
      scanner.scan.mockImplementationOnce(
        () => new Promise<AccessPoint[]>((resolve) => {
          finishScan = resolve;
        })
      );

      monitor.start();
      monitor.stop();
      monitor.start();
      await jest.advanceTimersByTimeAsync(0);
      expect(scanner.scan).toHaveBeenCalledTimes(2);

      finishScan([HOME]);
      await jest.advanceTimersByTimeAsync(0);

      await jest.advanceTimersByTimeAsync(5000);
      await jest.advanceTimersByTimeAsync(0);
      expect(scanner.scan).toHaveBeenCalledTimes(3);

      await jest.advanceTimersByTimeAsync(5000);
      await jest.advanceTimersByTimeAsync(0);
      expect(scanner.scan).toHaveBeenCalledTimes(4);
    });

    it("should log a failed cycle and keep going", async () => {
      const failure = new Error("render exploded");
      scanner.scan.mockRejectedValueOnce(failure);

      monitor.start();
      await jest.advanceTimersByTimeAsync(0);

      expect(logger.error).toHaveBeenCalledWith("Refresh cycle failed", { error: failure });

      await jest.advanceTimersByTimeAsync(5000);
      await jest.advanceTimersByTimeAsync(0);
      expect(scanner.scan).toHaveBeenCalledTimes(2);
      expect(history.get(HOME.bssid)).toEqual([82]);
    });
  });

  describe("with an OUI database file", () => {
    afterEach(() => {
      mockFs.restore();
    });

    it("should name the manufacturer of a lower-case address", async () => {
      mockFs({ "/data/manuf": "# OUI list\nAA:BB:CC\tTestCorp\tTest Corp\n" });
      const ouiDatabase = OuiDatabase.load("/data/manuf");
      mockFs.restore();

      scanner.scan.mockResolvedValue([HOME]);
      const fileMonitor = new WifiMonitor(scanner, ouiDatabase, new SignalHistory(), {
        refreshIntervalMs: 5000,
        output,
        now: () => FIXED_TIME,
      });

      const rows = await fileMonitor.runCycle();

      expect(rows[0].manufacturer).toBe("Test Corp");
    });
  });
});
