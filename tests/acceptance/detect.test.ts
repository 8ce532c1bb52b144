import { describe, it, expect } from "vitest";
import { DETECT_RULES, detectFileType, detectFromLines } from "../../src/parsers/detect.js";

describe("Format detection", () => {
  it("detects every fixture with a signature", async () => {
    expect(await detectFileType("fixtures/beast.xml")).toBe("beast");
    expect(await detectFileType("fixtures/beast2.xml")).toBe("beast2");
    expect(await detectFileType("fixtures/migrate_parmfile")).toBe("migrate_parm");
    expect(await detectFileType("fixtures/mrbayes.nex")).toBe("bayes");
    expect(await detectFileType("fixtures/garli.conf")).toBe("garli");
  });

  it("never detects a Migrate infile", async () => {
    expect(await detectFileType("fixtures/migrate_infile")).toBe("unknown");
  });

  it("keeps the rule table in priority order", () => {
    expect(DETECT_RULES.map((r) => r.type)).toEqual(["beast", "beast2", "migrate_parm", "bayes", "garli"]);
  });

  it("applies rule priority within a single line", () => {
    expect(detectFromLines(["#NEXUS [general] BEAUTi"])).toBe("beast");
    expect(detectFromLines(["[general] #NEXUS"])).toBe("bayes");
  });

  it("lets the earliest matching line win over rule priority", () => {
    expect(detectFromLines(["[general]", "<!-- Generated by BEAUTi -->"])).toBe("garli");
  });

  it("needs both parts of the BEAST2 signature on one line", () => {
    expect(detectFromLines(['<beast namespace="beast.core"', 'version="2.0">'])).toBe("unknown");
    expect(detectFromLines(['<beast namespace="beast.core" version="2.0">'])).toBe("beast2");
  });

  it("returns unknown when nothing matches", () => {
    expect(detectFromLines(["hello", "world"])).toBe("unknown");
    expect(detectFromLines([])).toBe("unknown");
  });
});
