import { FileSystemService, IFileSystemService } from "./abstractions/FileSystemService";
import { logger } from "../utils/logger";

export const UNKNOWN_MANUFACTURER = "Unknown Manufacturer";

/**
 * Extract the uppercase `XX:XX:XX` prefix of a hardware address.
 * Dash separators are accepted and normalized to colons.
 */
export function ouiPrefix(hardwareAddress: string): string {
  return hardwareAddress
    .trim()
    .replace(/-/g, ":")
    .split(":")
    .slice(0, 3)
    .join(":")
    .toUpperCase();
}

/**
 * Parse the text of a Wireshark-style `manuf` file.
 *
 * Each usable line has at least three whitespace-separated fields: the prefix,
 * a short vendor code (ignored) and the full manufacturer name, which may span
 * several fields. Comment lines, blank lines and lines with fewer than three
 * fields are skipped.
 */
export function parseOuiFile(content: string): Map<string, string> {
  const entries = new Map<string, string>();

  for (const line of content.split(/\r?\n/)) {
    if (line.startsWith("#") || !line.trim()) {continue;}

    const parts = line.trim().split(/\s+/);
    if (parts.length < 3) {continue;}

    const [prefix, , ...name] = parts;
    entries.set(prefix.toUpperCase(), name.join(" "));
  }

  return entries;
}

/**
 * Read-only lookup table from OUI prefix to manufacturer name.
 */
export class OuiDatabase {
  private readonly entries: ReadonlyMap<string, string>;

  private constructor(entries: Map<string, string>) {
    this.entries = entries;
  }

  static fromEntries(entries: Iterable<readonly [string, string]>): OuiDatabase {
    const map = new Map<string, string>();
    for (const [prefix, manufacturer] of entries) {
      map.set(ouiPrefix(prefix), manufacturer);
    }
    return new OuiDatabase(map);
  }

  static empty(): OuiDatabase {
    return new OuiDatabase(new Map());
  }

  /**
   * Load the database from disk. A missing or unreadable file is logged and
   * yields an empty table, so every lookup falls back to the unknown name.
   */
  static load(
    filePath: string,
    fileSystem: IFileSystemService = new FileSystemService()
  ): OuiDatabase {
    try {
      const content = fileSystem.readFileSync(filePath, "utf8");
      const database = new OuiDatabase(parseOuiFile(content));
      logger.info(`Loaded ${database.size} entries from OUI database`, { path: filePath });
      return database;
    } catch (error) {
      logger.error("Error loading OUI database", { path: filePath, error });
      return OuiDatabase.empty();
    }
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(hardwareAddress: string): string {
    return this.entries.get(ouiPrefix(hardwareAddress)) ?? UNKNOWN_MANUFACTURER;
  }
}
