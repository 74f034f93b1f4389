import Table from "cli-table3";
import { Palette } from "./palette";
import { AccessPointRow } from "./rows";

export const TABLE_HEAD = ["#", "SSID", "BSSID", "Signal", "Channel", "Manufacturer", "History"];

export const EMPTY_SCAN_MESSAGE = "No access points found.";

/**
 * Render rows as a bordered table. An empty scan renders the header alone
 * followed by a notice line.
 */
export function renderTable(rows: readonly AccessPointRow[], palette: Palette = Palette.plain()): string {
  const table = new Table({
    head: TABLE_HEAD,
    // cli-table3 colors the header red by default
    style: { head: [], border: [] },
  });

  for (const row of rows) {
    table.push([
      String(row.index),
      row.ssid,
      row.bssid,
      palette.signal(`${row.signal}%`, row.signal),
      row.channel,
      row.manufacturer,
      row.sparkline,
    ]);
  }

  const rendered = table.toString();
  return rows.length === 0 ? `${rendered}\n${EMPTY_SCAN_MESSAGE}` : rendered;
}
