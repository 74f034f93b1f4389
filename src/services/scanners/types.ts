/**
 * One access point seen in a single scan
 */
export interface AccessPoint {
  ssid: string;
  bssid: string; // XX:XX:XX:XX:XX:XX, identifies the radio for history tracking
  signal: number; // 0-100 percentage
  channel: string; // "N/A" when the utility reports none
}

/**
 * Produces the access points currently visible to this host
 */
export interface AccessPointScanner {
  readonly name: string;
  scan(): Promise<AccessPoint[]>;
}

/**
 * Scan error codes for specific error handling
 */
export enum ScanErrorCode {
  COMMAND_NOT_FOUND = "COMMAND_NOT_FOUND",
  COMMAND_FAILED = "COMMAND_FAILED",
  UNSUPPORTED_PLATFORM = "UNSUPPORTED_PLATFORM",
}

/**
 * Custom error class for scan failures
 */
export class ScanError extends Error {
  constructor(
    message: string,
    public code: ScanErrorCode,
    public details?: string
  ) {
    super(message);
    this.name = "ScanError";
  }
}
