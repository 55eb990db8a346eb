import * as fs from "fs/promises";
import path from "path";
import { isNodeJSErrnoException } from "@utils/typeGuards";

/**
 * Replaces a file by writing a sibling temp file and renaming it over the
 * original. Writes to the same file run one after another, so the newest
 * content always lands last.
 */
export class AtomicFileWriter {
  private queue: Promise<void> = Promise.resolve();

  constructor(readonly filePath: string) {}

  write(content: string): Promise<void> {
    const run = this.queue.then(() => this.replace(content));
    // Keep the chain alive after a failed write; the caller sees the error
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async replace(content: string): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`;
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(tmpPath, content, "utf-8");
    await fs.rename(tmpPath, this.filePath);
  }
}

/**
 * True for a read that failed because the file does not exist yet
 */
export function isMissingFile(error: unknown): boolean {
  return isNodeJSErrnoException(error) && error.code === "ENOENT";
}
