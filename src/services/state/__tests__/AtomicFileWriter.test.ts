import fs from "fs";
import os from "os";
import path from "path";
import { AtomicFileWriter, isMissingFile } from "../AtomicFileWriter";

describe("AtomicFileWriter", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "atomic-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should create missing directories and leave no temp file", async () => {
    const filePath = path.join(dir, "nested", "state.json");
    const writer = new AtomicFileWriter(filePath);

    await writer.write("{}");

    expect(fs.readFileSync(filePath, "utf-8")).toBe("{}");
    expect(fs.existsSync(`${filePath}.tmp`)).toBe(false);
  });

  describe("isMissingFile", () => {
    it("should match the error of reading a file that does not exist", async () => {
      const read = fs.promises.readFile(path.join(dir, "absent.json"), "utf-8");

      await expect(read).rejects.toMatchObject({ code: "ENOENT" });
      const error: unknown = await read.catch((e: unknown) => e);
      expect(isMissingFile(error)).toBe(true);
    });

    it("should match an ENOENT error that is not an Error instance", () => {
      expect(
        isMissingFile({ message: "ENOENT: no such file", code: "ENOENT" }),
      ).toBe(true);
    });

    it("should not match other failures", () => {
      expect(
        isMissingFile({ message: "EACCES: permission denied", code: "EACCES" }),
      ).toBe(false);
      expect(isMissingFile(new Error("ENOENT"))).toBe(false);
      expect(isMissingFile(null)).toBe(false);
    });
  });
});
