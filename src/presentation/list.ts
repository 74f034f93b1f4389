import { OuiDatabase } from "../services/ouiDatabase";
import { AccessPoint } from "../services/scanners";
import { Palette } from "./palette";

export const LIST_HEADING = "Available Wi-Fi Networks (sorted by signal):";

/**
 * Plain numbered listing for a single scan. Uses the list banding, where a
 * fair signal is shown as weak.
 */
export function renderList(
  accessPoints: readonly AccessPoint[],
  ouiDatabase: OuiDatabase,
  palette: Palette = Palette.plain()
): string {
  const lines = accessPoints.map((accessPoint, i) => {
    const manufacturer = ouiDatabase.lookup(accessPoint.bssid);
    const line = `${i + 1}. SSID: ${accessPoint.ssid}, Signal: ${accessPoint.signal}%, BSSID: ${accessPoint.bssid}, Manufacturer: ${manufacturer}`;
    return palette.signal(line, accessPoint.signal, "list");
  });

  return [LIST_HEADING, ...lines].join("\n");
}
