import type { Cell } from "./types.js";

export type RawRow = Record<string, Cell>;

const QUOTE = `"`;

/**
 * Split CSV text into records of string cells. Quoted cells may hold commas,
 * line breaks and doubled quotes; carriage returns outside quotes are dropped.
 */
export function parseCsvRaw(csvText: string): string[][] {
  const text = csvText.startsWith("\uFEFF") ? csvText.slice(1) : csvText;
  const records: string[][] = [];
  let record: string[] = [];
  let pos = 0;

  // Reads one cell starting at `pos` and leaves `pos` on its delimiter.
  const readCell = (): string => {
    let cell = "";
    let quoted = false;
    while (pos < text.length) {
      const ch = text[pos];
      if (quoted) {
        if (ch !== QUOTE) cell += ch;
        else if (text[pos + 1] === QUOTE) {
          cell += QUOTE;
          pos++;
        } else quoted = false;
      } else if (ch === QUOTE) quoted = true;
      else if (ch === "," || ch === "\n") break;
      else if (ch !== "\r") cell += ch;
      pos++;
    }
    return cell;
  };

  while (pos <= text.length) {
    record.push(readCell());
    const delimiter = text[pos];
    pos++;
    if (delimiter !== ",") {
      records.push(record);
      record = [];
    }
  }

  // a final line break leaves one blank record
  const last = records[records.length - 1];
  if (last && last.every((v) => v === "")) records.pop();
  return records;
}

/**
 * Parse CSV text into header-keyed records. Short rows are padded with `null`;
 * empty cells stay as empty strings.
 */
export function parseCsvToRows(csvText: string): RawRow[] {
  const [head, ...body] = parseCsvRaw(csvText);
  const headers = head?.map((h) => h.trim()) ?? [];
  return body.map((values) => {
    const row: RawRow = {};
    headers.forEach((h, idx) => {
      row[h] = values[idx] ?? null;
    });
    return row;
  });
}
