import * as XLSX from "xlsx";
import { describe, expect, it } from "vitest";
import { scrambleColumns } from "../lib/scramble";
import { EmptyTableError, buildWorkbookBuffer, parseXlsxBuffer } from "../lib/table";

const displayedColumn = (buffer: Buffer, index: number): string[] => {
  const workbook = XLSX.read(buffer, { type: "buffer" });
  const sheet = workbook.Sheets[workbook.SheetNames[0]];
  const rows = XLSX.utils.sheet_to_json<string[]>(sheet, { header: 1, raw: false, defval: "" });
  return rows.slice(1).map((row) => row[index]);
};

const toBuffer = (workbook: XLSX.WorkBook): Buffer => {
  const output: unknown = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  if (!Buffer.isBuffer(output)) {
    throw new Error("expected a buffer");
  }
  return output;
};

describe("parseXlsxBuffer", () => {
  it("reads the first sheet with its name", () => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.aoa_to_sheet([
        ["time", "label"],
        [0, "start"],
        [1, null]
      ]),
      "Run1"
    );
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([["ignored"]]), "Run2");

    const table = parseXlsxBuffer(toBuffer(workbook));

    expect(table.sheetName).toBe("Run1");
    expect(table.headers).toEqual(["time", "label"]);
    expect(table.rows).toEqual([
      [0, "start"],
      [1, null]
    ]);
  });

  it("rejects a sheet without a header row", () => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([]), "Empty");

    expect(() => parseXlsxBuffer(toBuffer(workbook))).toThrow(EmptyTableError);
  });
});

describe("buildWorkbookBuffer", () => {
  it("writes a single sheet that parses back to the same table", () => {
    const table = {
      sheetName: "Scrambled",
      headers: ["a", "b"],
      rows: [
        [3, "x"],
        [1, "y"]
      ]
    };

    expect(parseXlsxBuffer(buildWorkbookBuffer(table))).toEqual(table);
  });

  it("keeps date cells displayed as dates in columns that were not shuffled", () => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.aoa_to_sheet(
        [
          ["day", "reading"],
          [new Date(2024, 2, 1), 10],
          [new Date(2024, 3, 1), 20]
        ],
        { cellDates: true }
      ),
      "Log"
    );
    const source = toBuffer(workbook);

    const table = parseXlsxBuffer(source);
    expect(table.rows[0][0]).toBeInstanceOf(Date);

    const scrambled = scrambleColumns(table, [1], () => 0);
    const output = buildWorkbookBuffer(scrambled);

    expect(displayedColumn(output, 0)).toEqual(displayedColumn(source, 0));
    expect(displayedColumn(output, 1)).toEqual(["20", "10"]);
  });
});
