import { ShuffleError } from "../errors";
import type { Logger } from "../logging/logger";
import { readTable } from "../table";
import type { Cell, Table } from "../table";
import { createRandom } from "./random";
import type { RandomSource } from "./random";
import { shuffle } from "./shuffle";

export type ScrambleOptions = {
  logger: Logger;
  random?: RandomSource;
};

const extractColumn = (table: Table, columnIndex: number): Cell[] =>
  table.rows.map((row) => row[columnIndex]);

const replaceColumn = (rows: Cell[][], columnIndex: number, values: Cell[]): Cell[][] =>
  rows.map((row, rowIndex) => {
    const next = [...row];
    next[columnIndex] = values[rowIndex];
    return next;
  });

/**
 * Permutes each listed column independently, in order. Repeated indices are
 * shuffled again. Returns a new table; `table` is left as it was.
 */
export const scrambleColumns = (
  table: Table,
  columns: readonly number[],
  random: RandomSource = Math.random
): Table => {
  let rows = table.rows;
  columns.forEach((columnIndex) => {
    if (!Number.isInteger(columnIndex) || columnIndex < 0 || columnIndex >= table.headers.length) {
      throw new ShuffleError(
        `Column index ${columnIndex} does not exist (table has ${table.headers.length} columns).`,
        { details: { column: columnIndex, columnCount: table.headers.length } }
      );
    }
    const values = extractColumn({ ...table, rows }, columnIndex);
    rows = replaceColumn(rows, columnIndex, shuffle(values, random));
  });

  return {
    ...table,
    headers: [...table.headers],
    rows
  };
};

export const scrambleFile = async (
  input: string,
  columns: readonly number[],
  options: ScrambleOptions
): Promise<Table> => {
  const { logger } = options;
  const random = options.random ?? createRandom();
  try {
    const table = await readTable(input);
    logger.debug(`Loaded ${table.rows.length} rows x ${table.headers.length} columns from ${input}`);
    const scrambled = scrambleColumns(table, columns, random);
    columns.forEach((columnIndex) => {
      logger.debug(`Shuffled column ${columnIndex} (${JSON.stringify(table.headers[columnIndex])})`);
    });
    return scrambled;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Error during scrambling: ${message}`);
    if (error instanceof ShuffleError) {
      throw error;
    }
    throw new ShuffleError(message, { cause: error });
  }
};
