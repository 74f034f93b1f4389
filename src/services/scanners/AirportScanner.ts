import { BaseCommandScanner } from "./BaseCommandScanner";
import { parseRssi, parseTable } from "./parsing";
import { AccessPoint } from "./types";

export const AIRPORT_PATH =
  "/System/Library/PrivateFrameworks/Apple80211.framework/Versions/Current/Resources/airport";

/**
 * macOS scanner using the private `airport -s` utility. The RSSI column is
 * reported in dBm and converted to a percentage.
 */
export class AirportScanner extends BaseCommandScanner {
  readonly name = "airport";
  protected readonly command = AIRPORT_PATH;
  protected readonly args = ["-s"];

  parse(output: string): AccessPoint[] {
    return parseTable(output, parseRssi);
  }
}
