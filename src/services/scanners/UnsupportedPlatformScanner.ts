import { logger } from "../../utils/logger";
import { AccessPoint, AccessPointScanner, ScanError, ScanErrorCode } from "./types";

/**
 * Stand-in for hosts without a known scanning utility. Every scan is empty.
 */
export class UnsupportedPlatformScanner implements AccessPointScanner {
  readonly name = "unsupported";

  constructor(private readonly platform: string) {}

  /**
   * @throws ScanError always, with code UNSUPPORTED_PLATFORM
   */
  async listAccessPoints(): Promise<AccessPoint[]> {
    throw new ScanError(
      `Wi-Fi scanning is not supported on platform: ${this.platform}`,
      ScanErrorCode.UNSUPPORTED_PLATFORM,
      this.platform
    );
  }

  async scan(): Promise<AccessPoint[]> {
    try {
      return await this.listAccessPoints();
    } catch (error) {
      if (error instanceof ScanError) {
        logger.warn(error.message, { code: error.code, details: error.details });
        return [];
      }
      throw error;
    }
  }
}
