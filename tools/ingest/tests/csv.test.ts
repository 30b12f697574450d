import { describe, expect, test } from "vitest";
import { parseCsv, toRawTable } from "../lib/csv.js";

describe("parseCsv", () => {
  test("handles quoted commas, escaped quotes and CRLF line ends", () => {
    const parsed = parseCsv('Name,Note\r\nAlpha,"gates ""A"", B"\r\nBravo,plain\r\n');
    expect(parsed.headers).toEqual(["Name", "Note"]);
    expect(parsed.rows).toEqual([
      ["Alpha", 'gates "A", B'],
      ["Bravo", "plain"],
    ]);
  });

  test("strips the byte-order mark and skips blank lines", () => {
    const parsed = parseCsv("\uFEFFDate,Status\n\n01/02/24,Dead\n,\n");
    expect(parsed.headers).toEqual(["Date", "Status"]);
    expect(parsed.rows).toEqual([["01/02/24", "Dead"]]);
  });

  test("returns nothing for empty content", () => {
    expect(parseCsv("")).toEqual({ headers: [], rows: [] });
  });
});

describe("toRawTable", () => {
  test("trims labels, names blank labels and keeps cells as text", () => {
    const table = toRawTable(parseCsv(" Name Of Dam , Date ,\nAlpha, 01/02/24 ,x\n"));
    expect(table.headers).toEqual(["Name Of Dam", "Date", "Column 3"]);
    expect(table.rows).toEqual([{ "Name Of Dam": "Alpha", Date: " 01/02/24 ", "Column 3": "x" }]);
  });

  test("turns empty cells into null and pads short rows", () => {
    const table = toRawTable(parseCsv("A,B,C\n1,,\n2\n"));
    expect(table.rows).toEqual([
      { A: "1", B: null, C: null },
      { A: "2", B: null, C: null },
    ]);
  });

  test("keeps the first of two identically labelled columns", () => {
    const table = toRawTable(parseCsv("Date,Date\n01/02/24,02/02/24\n"));
    expect(table.headers).toEqual(["Date"]);
    expect(table.rows).toEqual([{ Date: "01/02/24" }]);
  });
});
