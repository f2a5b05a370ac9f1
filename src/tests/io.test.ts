import { readFileSync } from "node:fs";
import * as XLSX from "xlsx";
import { describe, expect, it, vi } from "vitest";
import { cleanVariableSpelling } from "../cleanVariableSpelling.js";
import { parseCsvRaw, parseCsvToRows } from "../csv.js";
import { datasetFromRows, datasetToRows, getColumn } from "../dataset.js";
import { readDatasetFromBuffer, readWordlistFromBuffer } from "../index.js";
import { readXlsxToRows } from "../xlsx.js";

const toArrayBuffer = (bytes: Uint8Array): ArrayBuffer => {
  const out = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(out).set(bytes);
  return out;
};

const fixture = (name: string): ArrayBuffer =>
  toArrayBuffer(readFileSync(new URL(`./fixtures/${name}`, import.meta.url)));

describe("parseCsvToRows", () => {
  it("handles quoted commas, doubled quotes and empty cells", () => {
    const rows = parseCsvToRows('from,to\n"a, b","say ""hi"""\nc,\n');
    expect(rows).toEqual([
      { from: "a, b", to: 'say "hi"' },
      { from: "c", to: "" },
    ]);
  });

  it("keeps line breaks inside quoted cells", () => {
    expect(parseCsvRaw('a,b\r\n"line 1\nline 2",x')).toEqual([
      ["a", "b"],
      ["line 1\nline 2", "x"],
    ]);
  });

  it("strips a byte order mark", () => {
    expect(parseCsvToRows("\uFEFFfrom,to\r\ny,yes\r\n")).toEqual([{ from: "y", to: "yes" }]);
  });
});

describe("datasetFromRows", () => {
  it("infers column kinds from the values", () => {
    const dataset = datasetFromRows([
      { id: "1", sex: "m", onset: "2020-01-02" },
      { id: "2", sex: "", onset: "" },
    ]);
    expect(dataset.columns).toEqual([
      { name: "id", kind: "number", values: [1, 2] },
      { name: "sex", kind: "text", values: ["m", ""] },
      { name: "onset", kind: "date", values: ["2020-01-02", null] },
    ]);
  });

  it("builds factors with first-seen levels when asked", () => {
    const dataset = datasetFromRows([{ sex: "m" }, { sex: "f" }, { sex: "m" }], { sex: "factor" });
    expect(dataset.columns[0]).toEqual({ name: "sex", kind: "factor", values: ["m", "f", "m"], levels: ["m", "f"] });
  });

  it("writes rows back out", () => {
    const dataset = datasetFromRows([{ a: "x", b: 1 }, { a: null, b: 2 }]);
    expect(datasetToRows(dataset)).toEqual([
      { a: "x", b: 1 },
      { a: null, b: 2 },
    ]);
  });
});

describe("readXlsxToRows", () => {
  it("prefers the wordlist sheet", async () => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet([{ note: "ignore me" }]), "notes");
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.json_to_sheet([
        { from: "y", to: "yes" },
        { from: 1, to: "one" },
      ]),
      "wordlist"
    );
    const bytes: ArrayBuffer = XLSX.write(workbook, { type: "array", bookType: "xlsx" });

    expect(await readXlsxToRows(bytes)).toEqual([
      { from: "y", to: "yes" },
      { from: 1, to: "one" },
    ]);
    expect(await readXlsxToRows(bytes, "notes")).toEqual([{ note: "ignore me" }]);
  });
});

describe("cleaning files end to end", () => {
  it("cleans a line list with a grouped, sorted wordlist", async () => {
    const wordlist = await readWordlistFromBuffer(fixture("wordlist.csv"), "wordlist.csv");
    const dataset = await readDatasetFromBuffer(fixture("linelist.csv"), "linelist.csv");
    const onWarning = vi.fn();

    const { data, report } = cleanVariableSpelling(dataset, wordlist, {
      groupBy: "grp",
      sortBy: "orders",
      warn: true,
      onWarning,
    });

    expect(getColumn(data, "id")).toBe(getColumn(dataset, "id"));
    expect(getColumn(data, "age")?.values).toEqual([34, null, 51, 19]);
    expect(getColumn(data, "readmission")?.values).toEqual(["Yes", "No", "Missing", "Unknown"]);
    expect(getColumn(data, "facility")?.values).toEqual(["Facility 1", "Facility 2", "Unknown", "Unknown"]);
    expect(getColumn(data, "has_symptoms")?.values).toEqual(["yes", "unknown", "yes", "xx"]);

    expect(report?.columns.map((c) => [c.label, c.warnings.map((w) => w.value)])).toEqual([
      ["readmission_", ["y", "n", "u"]],
      ["facility____", ["1", "2", "7", "A"]],
      ["has_symptoms", ["xx"]],
    ]);
    expect(onWarning).toHaveBeenCalledTimes(1);
  });
});
