import { describe, expect, it, vi } from "vitest";
import { planColumnPasses } from "../plan.js";
import { resolveDictionary } from "../resolve.js";
import type { Cell, Wordlist } from "../types.js";
import { resolveWordlist, sortWordlist } from "../wordlist.js";

const pairs = (rows: Cell[][]): Wordlist => ({ columns: ["from", "to"], rows });

const grouped: Wordlist = {
  columns: ["options", "values", "grp", "orders"],
  rows: [
    ["n", "No", "readmission", 2],
    ["y", "Yes", "readmission", 1],
    ["1", "Facility 1", "facility", 1],
    ["oui", "yes", ".global", "Inf"],
    ["y", "yes", ".global", "Inf"],
    ["x", "X", "not_in_data", 1],
  ],
};

describe("resolveDictionary", () => {
  it("splits a grouped wordlist into sorted column tables", () => {
    const resolved = resolveDictionary(
      { type: "table", table: grouped, groupBy: "grp" },
      { eligible: ["facility", "readmission", "sym"], sortBy: "orders" }
    );

    expect(resolved.mode).toBe("perColumn");
    if (resolved.mode !== "perColumn") return;
    expect(resolved.columns).toEqual(["readmission", "facility", "sym"]);
    expect(resolved.tables.get("readmission")?.canonicalOrder).toEqual(["Yes", "No"]);
    expect(resolved.tables.has("not_in_data")).toBe(false);
    expect(resolved.global?.rows.map((r) => r[0])).toEqual(["oui", "y"]);
  });

  it("iterates named tables first, then the other eligible columns when .global exists", () => {
    const resolved = resolveDictionary(
      {
        type: "collection",
        entries: [
          { name: "b", table: pairs([["1", "one"]]) },
          { name: "a", table: pairs([["2", "two"]]) },
          { name: ".global", table: pairs([["y", "yes"]]) },
        ],
      },
      { eligible: ["a", "b", "c"] }
    );
    expect(resolved.columns).toEqual(["b", "a", "c"]);
  });

  it("only iterates named tables without .global", () => {
    const resolved = resolveDictionary(
      { type: "collection", entries: [{ name: "b", table: pairs([["1", "one"]]) }] },
      { eligible: ["a", "b"] }
    );
    expect(resolved.columns).toEqual(["b"]);
  });

  it("uses a single wordlist for every eligible column when there is no group", () => {
    const logger = { warn: vi.fn() };
    const resolved = resolveDictionary(
      { type: "table", table: pairs([["y", "yes"]]), groupBy: null },
      { eligible: ["a", "b"], logger }
    );
    expect(resolved.mode).toBe("shared");
    expect(resolved.columns).toEqual(["a", "b"]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

describe("sortWordlist", () => {
  it("sorts numerically with missing cells last and keeps ties stable", () => {
    const table: Wordlist = {
      columns: ["from", "to", "order"],
      rows: [
        ["a", "A", "10"],
        ["b", "B", null],
        ["c", "C", 2],
        ["d", "D", "2"],
      ],
    };
    expect(sortWordlist(table, "order").rows.map((r) => r[0])).toEqual(["c", "d", "a", "b"]);
    expect(sortWordlist(table, 3).rows.map((r) => r[0])).toEqual(["c", "d", "a", "b"]);
  });

  it("returns tables without the sort column unchanged", () => {
    const table = pairs([["y", "yes"]]);
    expect(sortWordlist(table, "order")).toBe(table);
    expect(sortWordlist(table, 5)).toBe(table);
  });
});

describe("planColumnPasses", () => {
  const specific = resolveWordlist(pairs([["N", "North"]]));
  const global = resolveWordlist(pairs([["N", "no"], ["y", "yes"]]));
  const tables = new Map([["dir", specific]]);

  it("runs the global remainder before the column table", () => {
    const passes = planColumnPasses("dir", { mode: "perColumn", tables, global, columns: ["dir", "sym"] });
    expect(passes).toHaveLength(2);
    expect(passes[0].rows).toEqual([["y", "yes"]]);
    expect(passes[0].canonicalOrder).toEqual(["yes"]);
    expect(passes[1]).toBe(specific);
  });

  it("skips the global pass when the column table covers every global key", () => {
    const covered = resolveWordlist(pairs([["N", "North"], ["y", "Yes"]]));
    const passes = planColumnPasses("dir", {
      mode: "perColumn",
      tables: new Map([["dir", covered]]),
      global,
      columns: ["dir"],
    });
    expect(passes).toEqual([covered]);
  });

  it("uses the global table alone for columns without their own table", () => {
    expect(planColumnPasses("sym", { mode: "perColumn", tables, global, columns: ["dir", "sym"] })).toEqual([global]);
  });

  it("plans nothing for a column with no table at all", () => {
    expect(planColumnPasses("sym", { mode: "perColumn", tables, global: null, columns: ["dir"] })).toEqual([]);
    expect(planColumnPasses("dir", { mode: "perColumn", tables, global: null, columns: ["dir"] })).toEqual([specific]);
  });

  it("uses the shared table for every column", () => {
    expect(planColumnPasses("anything", { mode: "shared", table: global, columns: ["anything"] })).toEqual([global]);
  });
});
