import { stat } from "fs/promises";
import { FileNotFoundError, InvalidInputError, ScrambleError } from "../errors";
import { EmptyTableError, readTable } from "../table";

export type InputSummary = {
  columnCount: number;
  rowCount: number;
};

// Any stat failure (missing path, permissions) counts as "not a file".
const isRegularFile = async (path: string): Promise<boolean> => {
  try {
    const stats = await stat(path);
    return stats.isFile();
  } catch {
    return false;
  }
};

/**
 * Checks the input file and column list. Stops at the first problem. The
 * parsed table is not returned; the scrambler loads the file again.
 */
export const validateInput = async (
  input: string,
  columns: readonly number[]
): Promise<InputSummary> => {
  if (!(await isRegularFile(input))) {
    throw new FileNotFoundError(input);
  }

  if (columns.length === 0) {
    throw InvalidInputError.noColumns();
  }

  try {
    const table = await readTable(input);
    const columnCount = table.headers.length;
    if (columnCount === 0) {
      throw InvalidInputError.emptyFile(input);
    }
    const outOfRange = columns.find((column) => column < 0 || column >= columnCount);
    if (outOfRange !== undefined) {
      throw InvalidInputError.columnOutOfRange(outOfRange, input, columnCount);
    }
    return { columnCount, rowCount: table.rows.length };
  } catch (error) {
    if (error instanceof ScrambleError) {
      throw error;
    }
    if (error instanceof EmptyTableError) {
      throw InvalidInputError.emptyFile(input, error);
    }
    throw InvalidInputError.wrap(error);
  }
};
