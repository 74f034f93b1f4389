import { AirportScanner } from "./AirportScanner";
import { NetshScanner } from "./NetshScanner";
import { NmcliScanner } from "./NmcliScanner";
import { UnsupportedPlatformScanner } from "./UnsupportedPlatformScanner";
import { AccessPointScanner } from "./types";

export * from "./types";
export { BaseCommandScanner } from "./BaseCommandScanner";
export { NmcliScanner, AirportScanner, NetshScanner, UnsupportedPlatformScanner };
export { sortBySignal, parsePercent, parseRssi } from "./parsing";

/**
 * Pick the scanner for the host operating system
 */
export function createScanner(platform: NodeJS.Platform = process.platform): AccessPointScanner {
  switch (platform) {
    case "linux":
      return new NmcliScanner();
    case "darwin":
      return new AirportScanner();
    case "win32":
      return new NetshScanner();
    default:
      return new UnsupportedPlatformScanner(platform);
  }
}
