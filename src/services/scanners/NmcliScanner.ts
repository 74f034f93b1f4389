import { BaseCommandScanner } from "./BaseCommandScanner";
import { parseTable } from "./parsing";
import { AccessPoint } from "./types";

/**
 * Linux scanner using NetworkManager's tabular listing:
 *
 * ```
 * SSID        BSSID              SIGNAL  CHAN
 * HomeNet     AA:BB:CC:11:22:33  82      6
 * ```
 */
export class NmcliScanner extends BaseCommandScanner {
  readonly name = "nmcli";
  protected readonly command = "nmcli";
  protected readonly args = ["-f", "SSID,BSSID,SIGNAL,CHAN", "dev", "wifi"];

  parse(output: string): AccessPoint[] {
    return parseTable(output);
  }
}
