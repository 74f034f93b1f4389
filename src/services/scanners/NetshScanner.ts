import { BaseCommandScanner } from "./BaseCommandScanner";
import { NO_CHANNEL, parsePercent } from "./parsing";
import { AccessPoint } from "./types";

/**
 * Windows scanner reading the block layout of `netsh wlan show networks`:
 *
 * ```
 * SSID 1 : HomeNet
 *     BSSID 1                 : aa:bb:cc:11:22:33
 *          Signal             : 82%
 *          Channel            : 6
 * ```
 *
 * Fields accumulate line by line and each `Channel` line emits one record,
 * so an SSID with several radios yields several access points.
 */
export class NetshScanner extends BaseCommandScanner {
  readonly name = "netsh";
  protected readonly command = "netsh";
  protected readonly args = ["wlan", "show", "networks", "mode=bssid"];

  parse(output: string): AccessPoint[] {
    const accessPoints: AccessPoint[] = [];
    let ssid = "";
    let bssid = "";
    let signal = 0;

    for (const line of output.split(/\r?\n/)) {
      const separator = line.indexOf(":");
      if (separator < 0) {continue;}

      const key = line.slice(0, separator).trim();
      const value = line.slice(separator + 1).trim();

      if (/^SSID(?:\s+\d+)?$/.test(key)) {
        ssid = value;
        bssid = "";
        signal = 0;
      } else if (/^BSSID(?:\s+\d+)?$/.test(key)) {
        bssid = value;
        signal = 0;
      } else if (key === "Signal") {
        signal = parsePercent(value);
      } else if (key === "Channel") {
        accessPoints.push({ ssid, bssid, signal, channel: value || NO_CHANNEL });
      }
    }

    return accessPoints;
  }
}
