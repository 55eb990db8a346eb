import fs from "fs";
import os from "os";
import path from "path";

/**
 * Lay out the files the kernel would create for exported lines
 */
export const createFakeSysfs = (lines: number[]): string => {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "gpio-"));
  fs.writeFileSync(path.join(root, "export"), "");
  fs.writeFileSync(path.join(root, "unexport"), "");
  for (const line of lines) {
    const dir = path.join(root, `gpio${line}`);
    fs.mkdirSync(dir);
    fs.writeFileSync(path.join(dir, "direction"), "in");
    fs.writeFileSync(path.join(dir, "value"), "0");
  }
  return root;
};

