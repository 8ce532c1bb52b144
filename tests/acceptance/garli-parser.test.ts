import { describe, it, expect } from "vitest";
import { extractGarli, parseGarli } from "../../src/parsers/garli.js";

describe("GARLI extractor", () => {
  it("turns bootstrap replicates into runs", async () => {
    const result = await extractGarli("fixtures/garli.conf");

    expect(result.errCode).toBe(0);
    expect(result.runs).toBe("100");
    expect(result.bootstrapReps).toBe("1");
    expect(result.searchReps).toBe("2");
    expect(result.availableMemory).toBe("512");
  });

  it("turns search replicates into runs when bootstrapreps is 0", () => {
    const result = parseGarli(["bootstrapreps = 0", "searchreps=5", "availablememory = 1024"]);

    expect(result.errCode).toBe(0);
    expect(result.runs).toBe("5");
    expect(result.bootstrapReps).toBe("1");
    expect(result.searchReps).toBe("1");
    expect(result.availableMemory).toBe("1024");
  });

  it("keeps the first value of each key", () => {
    const result = parseGarli([
      "searchreps = 3",
      "bootstrapreps = 7",
      "availablememory = 256",
      "searchreps = 9",
      "bootstrapreps = 0",
    ]);
    expect(result.runs).toBe("7");
    expect(result.searchReps).toBe("3");
  });

  it("only treats a literal 0 as no bootstrapping", () => {
    const result = parseGarli(["bootstrapreps = 00", "searchreps = 5", "availablememory = 64"]);

    expect(result.runs).toBe("00");
    expect(result.bootstrapReps).toBe("1");
    expect(result.searchReps).toBe("5");
  });

  it("keeps large values digit for digit", () => {
    const result = parseGarli(["bootstrapreps = 2", "searchreps = 1", "availablememory = 90071992547409931"]);
    expect(result.availableMemory).toBe("90071992547409931");
  });

  it("flags missing keys and names them", () => {
    const result = parseGarli(["searchreps = 2"]);

    expect(result.errCode).toBe(1);
    expect(result.runs).toBeUndefined();
    expect(result.searchReps).toBe("2");
    expect(result.bootstrapReps).toBeUndefined();
    expect(result.notices).toEqual([
      "garli.conf is missing required values: bootstrapreps, availablememory",
    ]);
  });
});
