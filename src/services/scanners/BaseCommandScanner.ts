import { execFile } from "child_process";
import { promisify } from "util";
import { logger } from "../../utils/logger";
import { AccessPoint, AccessPointScanner, ScanError, ScanErrorCode } from "./types";
import { sortBySignal } from "./parsing";

const execFileAsync = promisify(execFile);

function describeFailure(error: unknown): { code: ScanErrorCode; details: string } {
  if (!(error instanceof Error)) {
    return { code: ScanErrorCode.COMMAND_FAILED, details: String(error) };
  }

  const errno = "code" in error ? error.code : undefined;
  const stderr = "stderr" in error && typeof error.stderr === "string" ? error.stderr.trim() : "";

  return {
    code: errno === "ENOENT" ? ScanErrorCode.COMMAND_NOT_FOUND : ScanErrorCode.COMMAND_FAILED,
    details: stderr || error.message,
  };
}

/**
 * Scanner backed by a platform utility whose text output is parsed into
 * access points.
 *
 * Subclasses supply the command line and the parser; this class runs the
 * command without a shell, sorts the result strongest first and turns any
 * failure into an empty scan so the refresh loop keeps going.
 */
export abstract class BaseCommandScanner implements AccessPointScanner {
  abstract readonly name: string;
  protected abstract readonly command: string;
  protected abstract readonly args: readonly string[];

  abstract parse(output: string): AccessPoint[];

  /**
   * Run the utility and parse its output
   *
   * @throws ScanError if the utility cannot be started or exits non-zero
   */
  async listAccessPoints(): Promise<AccessPoint[]> {
    let stdout: string;
    try {
      ({ stdout } = await execFileAsync(this.command, [...this.args], {
        maxBuffer: 10 * 1024 * 1024,
        windowsHide: true,
      }));
    } catch (error) {
      const { code, details } = describeFailure(error);
      throw new ScanError(`Failed to run ${this.command}`, code, details);
    }

    const accessPoints = sortBySignal(this.parse(stdout));
    logger.debug(`${this.name} scan found ${accessPoints.length} access points`);
    return accessPoints;
  }

  async scan(): Promise<AccessPoint[]> {
    try {
      return await this.listAccessPoints();
    } catch (error) {
      if (error instanceof ScanError) {
        logger.error(`${this.name} scan failed`, {
          code: error.code,
          details: error.details,
        });
        return [];
      }
      throw error;
    }
  }
}
