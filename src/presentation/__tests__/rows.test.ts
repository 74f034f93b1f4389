import { OuiDatabase } from "../../services/ouiDatabase";
import { AccessPoint } from "../../services/scanners";
import { SignalHistory } from "../../services/signalHistory";
import { buildRows } from "../rows";

const ACCESS_POINTS: AccessPoint[] = [
  { ssid: "HomeNet", bssid: "aa:bb:cc:11:22:33", signal: 82, channel: "6" },
  { ssid: "", bssid: "12:34:56:78:9a:bc", signal: 20, channel: "N/A" },
];

describe("buildRows", () => {
  it("should number rows from 1 and enrich them", () => {
    const history = new SignalHistory(3);
    history.record("aa:bb:cc:11:22:33", 82);
    const ouiDatabase = OuiDatabase.fromEntries([["AA:BB:CC", "Test Corp"]]);

    const rows = buildRows(ACCESS_POINTS, history, ouiDatabase);

    expect(rows).toEqual([
      {
        index: 1,
        ssid: "HomeNet",
        bssid: "aa:bb:cc:11:22:33",
        signal: 82,
        channel: "6",
        manufacturer: "Test Corp",
        sparkline: "▇  ",
      },
      {
        index: 2,
        ssid: "",
        bssid: "12:34:56:78:9a:bc",
        signal: 20,
        channel: "N/A",
        manufacturer: "Unknown Manufacturer",
        sparkline: "   ",
      },
    ]);
  });

  it("should return no rows for an empty scan", () => {
    expect(buildRows([], new SignalHistory(), OuiDatabase.empty())).toEqual([]);
  });
});
