import { mkdtemp, mkdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileNotFoundError, InvalidInputError } from "../lib/errors";
import { validateInput } from "../lib/validation";

describe("validateInput", () => {
  let workDir = "";

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "scramble-validate-"));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  const writeInput = async (name: string, contents: string): Promise<string> => {
    const path = join(workDir, name);
    await writeFile(path, contents, "utf8");
    return path;
  };

  it("summarizes a valid file", async () => {
    const path = await writeInput("data.csv", "a,b,c\n1,2,3\n4,5,6\n");

    await expect(validateInput(path, [0, 2])).resolves.toEqual({ columnCount: 3, rowCount: 2 });
  });

  it("reports a missing file", async () => {
    const path = join(workDir, "missing.csv");

    await expect(validateInput(path, [0])).rejects.toThrow(FileNotFoundError);
    await expect(validateInput(path, [0])).rejects.toThrow(`File not found: ${path}`);
  });

  it("treats a directory as a missing file", async () => {
    const path = join(workDir, "folder.csv");
    await mkdir(path);

    await expect(validateInput(path, [0])).rejects.toThrow(FileNotFoundError);
  });

  it("checks the file before the column list", async () => {
    await expect(validateInput(join(workDir, "missing.csv"), [])).rejects.toThrow(FileNotFoundError);
  });

  it("rejects an empty column list", async () => {
    const path = await writeInput("data.csv", "a,b\n1,2\n");

    await expect(validateInput(path, [])).rejects.toThrow("No columns provided to scramble.");
  });

  it("rejects an empty file", async () => {
    const path = await writeInput("empty.csv", "");

    await expect(validateInput(path, [0])).rejects.toThrow(`CSV file is empty: ${path}`);
  });

  it("rejects a file holding only blank lines", async () => {
    const path = await writeInput("blank.csv", "\n\n   \n");

    await expect(validateInput(path, [0])).rejects.toThrow(`CSV file is empty: ${path}`);
  });

  it("names the first out-of-range index", async () => {
    const path = await writeInput("data.csv", "a,b,c\n1,2,3\n");

    await expect(validateInput(path, [1, 5, 7])).rejects.toThrow(
      `Column index 5 is out of range for file ${path}.`
    );
  });

  it("rejects negative indices", async () => {
    const path = await writeInput("data.csv", "a,b,c\n1,2,3\n");

    await expect(validateInput(path, [-1])).rejects.toThrow(
      `Column index -1 is out of range for file ${path}.`
    );
  });

  it("wraps other parse failures with their cause", async () => {
    const path = await writeInput("broken.csv", 'a,b\n1,"open\n');

    const error = await validateInput(path, [0]).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(InvalidInputError);
    if (error instanceof InvalidInputError) {
      expect(error.message).toBe(
        "Error validating file or columns. Details Unterminated quoted field starting in line 2"
      );
      expect(error.cause).toBeInstanceOf(Error);
    }
  });
});
