import { AccessPoint } from "./types";

export const NO_CHANNEL = "N/A";

const HARDWARE_ADDRESS = /^[0-9a-f]{2}(?::[0-9a-f]{2}){5}$/i;
const INTEGER = /^-?\d+$/;

export type SignalParser = (raw: string | undefined) => number;

/**
 * Whole-field integer, or null for anything else (`7.5`, `72abc`, empty)
 */
function parseInteger(raw: string): number | null {
  const field = raw.trim();
  return INTEGER.test(field) ? parseInt(field, 10) : null;
}

/**
 * Parse a percentage field such as `72` or `72%`. Anything that is not an
 * integer is 0.
 */
export const parsePercent: SignalParser = (raw) => {
  if (raw === undefined) {return 0;}
  const value = parseInteger(raw.trim().replace(/%$/, ""));
  if (value === null) {return 0;}
  return Math.max(0, Math.min(100, value));
};

/**
 * Parse an RSSI field in dBm and convert it to a percentage using
 * `2 * (dBm + 100)`. Non-negative values are already percentages.
 */
export const parseRssi: SignalParser = (raw) => {
  if (raw === undefined) {return 0;}
  const value = parseInteger(raw);
  if (value === null) {return 0;}
  if (value >= 0) {return Math.min(100, value);}
  return Math.max(0, Math.min(100, 2 * (value + 100)));
};

export function isHardwareAddress(token: string): boolean {
  return HARDWARE_ADDRESS.test(token);
}

/**
 * Turn one whitespace-split row of `SSID BSSID SIGNAL [CHANNEL ...]` output
 * into an access point.
 *
 * The first token shaped like a hardware address is the BSSID and every token
 * before it belongs to the SSID, so names containing spaces survive. Rows
 * without such a token are read positionally and need at least three fields.
 */
export function parseColumns(
  tokens: string[],
  parseSignal: SignalParser = parsePercent
): AccessPoint | null {
  const at = tokens.findIndex(isHardwareAddress);

  if (at >= 0) {
    return {
      ssid: tokens.slice(0, at).join(" "),
      bssid: tokens[at],
      signal: parseSignal(tokens[at + 1]),
      channel: tokens[at + 2] ?? NO_CHANNEL,
    };
  }

  if (tokens.length < 3) {return null;}

  const [ssid, bssid, signal, channel] = tokens;
  return {
    ssid,
    bssid,
    signal: parseSignal(signal),
    channel: channel ?? NO_CHANNEL,
  };
}

/**
 * Parse columnar output, skipping the header row and blank lines
 */
export function parseTable(output: string, parseSignal: SignalParser = parsePercent): AccessPoint[] {
  const accessPoints: AccessPoint[] = [];

  for (const line of output.split(/\r?\n/).slice(1)) {
    if (!line.trim()) {continue;}

    const accessPoint = parseColumns(line.trim().split(/\s+/), parseSignal);
    if (accessPoint) {
      accessPoints.push(accessPoint);
    }
  }

  return accessPoints;
}

/**
 * Strongest first. `Array.prototype.sort` is stable, so equal signals keep
 * their scan order.
 */
export function sortBySignal(accessPoints: readonly AccessPoint[]): AccessPoint[] {
  return [...accessPoints].sort((a, b) => b.signal - a.signal);
}
