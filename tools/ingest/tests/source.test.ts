import { describe, expect, test } from "vitest";
import { describeSource, toCsvEndpoint } from "../lib/source.js";
import { ResolveError } from "../pipeline/errors.js";

describe("toCsvEndpoint", () => {
  test("turns an edit link into a first-sheet export link", () => {
    expect(
      toCsvEndpoint("https://docs.google.com/spreadsheets/d/abc123XYZ/edit?usp=sharing")
    ).toBe("https://docs.google.com/spreadsheets/d/abc123XYZ/export?format=csv");
  });

  test("carries the gid query parameter into the export link", () => {
    expect(
      toCsvEndpoint("https://docs.google.com/spreadsheets/d/abc123XYZ/edit?gid=987654#gid=987654")
    ).toBe("https://docs.google.com/spreadsheets/d/abc123XYZ/export?format=csv&gid=987654");
  });

  test("reads a gid that only appears in the fragment", () => {
    expect(toCsvEndpoint("https://docs.google.com/spreadsheets/d/abc123XYZ/edit#gid=42")).toBe(
      "https://docs.google.com/spreadsheets/d/abc123XYZ/export?format=csv&gid=42"
    );
  });

  test("returns published and export links unchanged", () => {
    const published = "https://docs.google.com/spreadsheets/d/e/2PACX-test/pub?output=csv";
    const exported = "https://docs.google.com/spreadsheets/d/abc/export?format=csv&gid=3";
    expect(toCsvEndpoint(published)).toBe(published);
    expect(toCsvEndpoint(exported)).toBe(exported);
  });

  test("returns empty for empty or blank input", () => {
    expect(toCsvEndpoint("")).toBe("");
    expect(toCsvEndpoint("   ")).toBe("");
  });

  test("trims surrounding whitespace", () => {
    expect(toCsvEndpoint("  https://docs.google.com/spreadsheets/d/abc/edit  ")).toBe(
      "https://docs.google.com/spreadsheets/d/abc/export?format=csv"
    );
  });

  test("keeps the same document id and selector for every canonical link", () => {
    const ids = ["1a2B3c", "doc_with-dashes", "Z9"];
    const gids = ["0", "15", "2093847"];
    for (const id of ids) {
      for (const gid of gids) {
        const resolution = describeSource(
          `https://docs.google.com/spreadsheets/d/${id}/edit?gid=${gid}`
        );
        expect(resolution.documentId).toBe(id);
        expect(resolution.gid).toBe(gid);
        expect(resolution.endpoint).toContain(`/d/${id}/export?format=csv&gid=${gid}`);
      }
    }
  });
});

describe("describeSource", () => {
  test("classifies direct links", () => {
    expect(describeSource("https://example.com/levels?output=csv")).toEqual({
      kind: "direct",
      endpoint: "https://example.com/levels?output=csv",
    });
  });

  test("passes unrecognised input through with a non-fatal warning", () => {
    const resolution = describeSource("not a link");
    expect(resolution.kind).toBe("passthrough");
    expect(resolution.endpoint).toBe("not a link");
    expect(resolution.warning).toBeInstanceOf(ResolveError);
    expect(resolution.warning?.code).toBe("RESOLVE_ERROR");
  });

  test("does not treat arbitrary deep paths as documents", () => {
    const resolution = describeSource("https://example.com/a/b/c/d");
    expect(resolution.kind).toBe("passthrough");
    expect(resolution.endpoint).toBe("https://example.com/a/b/c/d");
  });

  test("reports empty input", () => {
    expect(describeSource("")).toEqual({ kind: "empty", endpoint: "" });
  });
});
