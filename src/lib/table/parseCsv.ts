import { CsvSyntaxError, EmptyTableError } from "./types";
import type { Cell, Table } from "./types";

const DELIMITER = ",";

type CsvRecord = {
  line: number;
  fields: string[];
  quoted: boolean;
};

const stripBom = (text: string): string => text.replace(/^\uFEFF/, "");

const isBlankRecord = (record: CsvRecord): boolean =>
  !record.quoted && record.fields.length === 1 && record.fields[0].trim().length === 0;

const readRecords = (text: string): CsvRecord[] => {
  const records: CsvRecord[] = [];
  let fields: string[] = [];
  let current = "";
  let inQuotes = false;
  let quoted = false;
  let line = 1;
  let recordLine = 1;
  let quoteLine = 1;

  const endRecord = () => {
    fields.push(current);
    records.push({ line: recordLine, fields, quoted });
    fields = [];
    current = "";
    quoted = false;
  };

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];

    if (inQuotes) {
      if (char === '"') {
        if (text[index + 1] === '"') {
          current += '"';
          index += 1;
        } else {
          inQuotes = false;
        }
        continue;
      }
      if (char === "\n") {
        line += 1;
      }
      current += char;
      continue;
    }

    if (char === '"') {
      inQuotes = true;
      quoted = true;
      quoteLine = line;
      continue;
    }

    if (char === DELIMITER) {
      fields.push(current);
      current = "";
      continue;
    }

    if (char === "\r" || char === "\n") {
      if (char === "\r" && text[index + 1] === "\n") {
        index += 1;
      }
      endRecord();
      line += 1;
      recordLine = line;
      continue;
    }

    current += char;
  }

  if (inQuotes) {
    throw new CsvSyntaxError(`Unterminated quoted field starting in line ${quoteLine}`, quoteLine);
  }
  if (current.length > 0 || fields.length > 0 || quoted) {
    endRecord();
  }

  return records.filter((record) => !isBlankRecord(record));
};

const toCell = (value: string): Cell => (value.length === 0 ? null : value);

export const parseCsvText = (text: string): Table => {
  const records = readRecords(stripBom(text));
  if (records.length === 0) {
    throw new EmptyTableError("CSV appears to be empty.");
  }

  const [headerRecord, ...dataRecords] = records;
  const headers = headerRecord.fields;
  const rows = dataRecords.map((record) => {
    if (record.fields.length > headers.length) {
      throw new CsvSyntaxError(
        `Expected ${headers.length} fields in line ${record.line}, saw ${record.fields.length}`,
        record.line
      );
    }
    return headers.map((_, index) => toCell(record.fields[index] ?? ""));
  });

  return {
    headers,
    rows
  };
};
