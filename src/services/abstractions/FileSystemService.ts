import fs from "fs";

/**
 * File access used by the OUI loader, kept behind an interface so tests can
 * substitute an in-memory file system.
 */
export interface IFileSystemService {
  readFileSync(path: string, encoding?: BufferEncoding): string;
}

export class FileSystemService implements IFileSystemService {
  readFileSync(filePath: string, encoding: BufferEncoding = "utf8"): string {
    return fs.readFileSync(filePath, encoding);
  }
}
