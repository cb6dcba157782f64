import { describe, expect, it } from "vitest";
import { parseDescriptor, splitPaths } from "./ledger-parser.js";

const PATH = "/opt/fluree-server/data/demo/main.json";

describe("parseDescriptor", () => {
  it("summarizes the first branch's latest commit", () => {
    const content = JSON.stringify({
      ledgerAlias: "demo",
      branches: [{ name: "main", commit: { time: "2024-04-01T08:30:00Z", data: { t: 12, size: 40960 } } }],
    });

    const result = parseDescriptor(PATH, content);

    expect(result.ok && result.detail.summary).toEqual({
      name: "demo",
      commitCount: 12,
      sizeBytes: 40960,
      lastUpdated: "2024-04-01T08:30:00Z",
      descriptorPath: PATH,
    });
  });

  it("keeps unknown fields in the document", () => {
    const result = parseDescriptor(PATH, JSON.stringify({ ledgerAlias: "demo", ns: [{ id: "fluree:file://demo" }] }));
    expect(result.ok && result.detail.document.ns).toEqual([{ id: "fluree:file://demo" }]);
  });

  it("defaults commit details when there are no branches", () => {
    const result = parseDescriptor(PATH, JSON.stringify({ ledgerAlias: "empty" }));
    expect(result.ok && result.detail.summary).toEqual({
      name: "empty",
      commitCount: 0,
      sizeBytes: 0,
      lastUpdated: null,
      descriptorPath: PATH,
    });
  });

  it("rejects content that is not JSON", () => {
    const result = parseDescriptor(PATH, "<html>");
    expect(result.ok).toBe(false);
    expect(!result.ok && result.reason.startsWith("not JSON (")).toBe(true);
  });

  it("names the offending field", () => {
    expect(parseDescriptor(PATH, JSON.stringify({ branches: [] }))).toEqual({
      ok: false,
      reason: "ledgerAlias: Required",
    });
    expect(parseDescriptor(PATH, "[]")).toEqual({ ok: false, reason: "(root): Expected object, received array" });
  });
});

describe("splitPaths", () => {
  it("drops blank lines and surrounding whitespace", () => {
    expect(splitPaths("/a/x.json\n\n  /b/y.json \n")).toEqual(["/a/x.json", "/b/y.json"]);
    expect(splitPaths("")).toEqual([]);
  });
});
