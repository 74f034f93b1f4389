#!/usr/bin/env node
import "dotenv/config";
import { loadConfig, MonitorConfig } from "./config";
import { WifiMonitor } from "./monitor";
import { Palette, renderList } from "./presentation";
import { OuiDatabase } from "./services/ouiDatabase";
import { createScanner } from "./services/scanners";
import { SignalHistory } from "./services/signalHistory";
import { logger } from "./utils/logger";

export const EXIT_NOTICE = "Exiting Wi-Fi monitor.";

export const USAGE = `wifi-monitor [command]

Commands:
  watch   redraw the access point table every refresh interval (default)
  list    print the visible access points once and exit
  help    show this message

Environment:
  OUI_FILE             OUI database path (default: manuf)
  REFRESH_INTERVAL_MS  delay between refreshes (default: 5000)
  HISTORY_DEPTH        signal samples kept per access point (default: 10)
  LOG_LEVEL            DEBUG, INFO, WARN or ERROR (default: INFO)
  NO_COLOR             disable colors when set
`;

/**
 * Stop the monitor and exit cleanly on Ctrl+C or termination. Returns the
 * installed handler.
 */
export function setupSignalHandlers(monitor: WifiMonitor): () => void {
  const exit = () => {
    monitor.stop();
    // eslint-disable-next-line no-console
    console.log(`\n${EXIT_NOTICE}`);
    process.exit(0);
  };

  process.on("SIGINT", exit);
  process.on("SIGTERM", exit);
  return exit;
}

export async function runList(config: MonitorConfig): Promise<string> {
  const ouiDatabase = OuiDatabase.load(config.ouiFile);
  const accessPoints = await createScanner().scan();
  return renderList(accessPoints, ouiDatabase, Palette.forOutput(config.color));
}

export function runWatch(config: MonitorConfig): WifiMonitor {
  const monitor = new WifiMonitor(
    createScanner(),
    OuiDatabase.load(config.ouiFile),
    new SignalHistory(config.historyDepth),
    {
      refreshIntervalMs: config.refreshIntervalMs,
      palette: Palette.forOutput(config.color),
    }
  );
  setupSignalHandlers(monitor);
  monitor.start();
  return monitor;
}

async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const config = loadConfig();
  logger.setLevel(config.logLevel);

  const command = argv[0] ?? "watch";

  switch (command) {
    case "watch":
      runWatch(config);
      return;
    case "list":
      // eslint-disable-next-line no-console
      console.log(await runList(config));
      return;
    case "help":
    case "--help":
    case "-h":
      // eslint-disable-next-line no-console
      console.log(USAGE);
      return;
    default:
      // eslint-disable-next-line no-console
      console.error(`Unknown command: ${command}\n\n${USAGE}`);
      process.exitCode = 1;
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error("wifi-monitor failed", { error });
    process.exit(1);
  });
}

export { main };
