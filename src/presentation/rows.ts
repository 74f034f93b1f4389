import { OuiDatabase } from "../services/ouiDatabase";
import { AccessPoint } from "../services/scanners";
import { SignalHistory } from "../services/signalHistory";
import { Palette } from "./palette";

export interface AccessPointRow {
  index: number;
  ssid: string;
  bssid: string;
  signal: number;
  channel: string;
  manufacturer: string;
  sparkline: string;
}

/**
 * One display row per access point, numbered from 1 in the given order
 */
export function buildRows(
  accessPoints: readonly AccessPoint[],
  history: SignalHistory,
  ouiDatabase: OuiDatabase,
  palette: Palette = Palette.plain()
): AccessPointRow[] {
  return accessPoints.map((accessPoint, i) => ({
    index: i + 1,
    ssid: accessPoint.ssid,
    bssid: accessPoint.bssid,
    signal: accessPoint.signal,
    channel: accessPoint.channel,
    manufacturer: ouiDatabase.lookup(accessPoint.bssid),
    sparkline: history.render(accessPoint.bssid, palette),
  }));
}
