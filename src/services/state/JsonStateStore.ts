import * as fs from "fs/promises";
import { z } from "zod";
import { Result, failure, success } from "@core/types";
import { StateError } from "@core/errors";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";
import { AtomicFileWriter, isMissingFile } from "./AtomicFileWriter";

const logger = getLogger("JsonStateStore");

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * One JSON document on disk, validated with a zod schema.
 *
 * Fields missing from the file are filled from the defaults, so adding a
 * field never invalidates an existing file.
 */
export class JsonStateStore<T extends object> {
  private readonly writer: AtomicFileWriter;

  constructor(
    readonly filePath: string,
    private readonly schema: z.ZodType<T>,
    private readonly defaults: () => T,
  ) {
    this.writer = new AtomicFileWriter(filePath);
  }

  /**
   * Read the document. A missing file is created from the defaults; an
   * unreadable or invalid one is replaced by the defaults in memory only.
   */
  async load(): Promise<Result<T>> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (!isMissingFile(error)) {
        return failure(StateError.loadFailed(this.filePath, toError(error)));
      }
      const initial = this.defaults();
      const saved = await this.save(initial);
      if (!saved.success) {
        return failure(saved.error);
      }
      logger.info(`Created ${this.filePath} with defaults`);
      return success(initial);
    }

    const parsed = this.parse(content);
    if (!parsed.success) {
      logger.warn(`${parsed.error.message}; using defaults`);
      return success(this.defaults());
    }
    return success(parsed.data);
  }

  async save(data: T): Promise<Result<void>> {
    try {
      await this.writer.write(JSON.stringify(data, null, 2));
      return success(undefined);
    } catch (error) {
      return failure(StateError.saveFailed(this.filePath, toError(error)));
    }
  }

  private parse(content: string): Result<T> {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      return failure(StateError.invalidData(this.filePath, toError(error).message));
    }
    if (!isPlainObject(raw)) {
      return failure(StateError.invalidData(this.filePath, "not a JSON object"));
    }

    const result = this.schema.safeParse({ ...this.defaults(), ...raw });
    if (!result.success) {
      const issue = result.error.issues[0];
      return failure(
        StateError.invalidData(
          this.filePath,
          `${issue.path.join(".")}: ${issue.message}`,
        ),
      );
    }
    return success(result.data);
  }
}
