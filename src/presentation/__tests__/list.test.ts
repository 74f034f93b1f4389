import chalk from "chalk";
import { OuiDatabase } from "../../services/ouiDatabase";
import { AccessPoint } from "../../services/scanners";
import { LIST_HEADING, renderList } from "../list";
import { Palette } from "../palette";

const ACCESS_POINTS: AccessPoint[] = [
  { ssid: "HomeNet", bssid: "aa:bb:cc:11:22:33", signal: 82, channel: "6" },
  { ssid: "Cafe Guest", bssid: "12:34:56:78:9a:bc", signal: 40, channel: "11" },
];

describe("renderList", () => {
  const ouiDatabase = OuiDatabase.fromEntries([["AA:BB:CC", "Test Corp"]]);

  it("should list access points in order with their manufacturer", () => {
    expect(renderList(ACCESS_POINTS, ouiDatabase)).toBe(
      [
        "Available Wi-Fi Networks (sorted by signal):",
        "1. SSID: HomeNet, Signal: 82%, BSSID: aa:bb:cc:11:22:33, Manufacturer: Test Corp",
        "2. SSID: Cafe Guest, Signal: 40%, BSSID: 12:34:56:78:9a:bc, Manufacturer: Unknown Manufacturer",
      ].join("\n")
    );
  });

  it("should show a fair signal in the weak color", () => {
    const palette = new Palette(new chalk.Instance({ level: 1 }));

    const lines = renderList(ACCESS_POINTS, ouiDatabase, palette).split("\n");

    expect(lines[1].startsWith("\u001b[32m1. SSID: HomeNet")).toBe(true);
    expect(lines[2].startsWith("\u001b[31m2. SSID: Cafe Guest")).toBe(true);
  });

  it("should print only the heading for an empty scan", () => {
    expect(renderList([], ouiDatabase)).toBe(LIST_HEADING);
  });
});
