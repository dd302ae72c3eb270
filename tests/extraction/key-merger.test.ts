import { describe, it, expect } from "vitest";
import { KeyMerger, mergeByKey, mergeKey } from "../../src/extraction/merging/key-merger.js";
import { makeOpportunity } from "../helpers/fixtures.js";

describe("mergeByKey", () => {
  it("collapses duplicates and keeps the highest confidence", () => {
    const a = makeOpportunity({ match_confidence: 70 });
    const b = makeOpportunity({ match_confidence: 85 });
    const merged = mergeByKey([[a], [b]]);
    expect(merged).toHaveLength(1);
    expect(merged[0]?.match_confidence).toBe(85);
  });

  it("fills blank fields from later duplicates without overwriting earlier values", () => {
    const a = makeOpportunity({ monitoring_frequency: "daily", equipment_needed: "" });
    const b = makeOpportunity({ monitoring_frequency: "weekly", equipment_needed: "geophones" });
    const [merged] = mergeByKey([[a, b]]);
    expect(merged?.monitoring_frequency).toBe("daily");
    expect(merged?.equipment_needed).toBe("geophones");
  });

  it("ignores case and surrounding whitespace in the key", () => {
    const a = makeOpportunity({ job_code: "m-101 ", project_location: "SPRINGFIELD, IL" });
    const b = makeOpportunity();
    expect(mergeKey(a)).toBe(mergeKey(b));
  });

  it("takes the description prefix before trimming", () => {
    const body = "d".repeat(120);
    const indented = makeOpportunity({ job_description: `  ${body} first tail` });
    const flush = makeOpportunity({ job_description: `${body} second tail` });
    const sameStart = makeOpportunity({ job_description: `${body} another tail` });
    expect(mergeKey(indented)).not.toBe(mergeKey(flush));
    expect(mergeKey(flush)).toBe(mergeKey(sameStart));
  });

  it("keeps distinct jobs in first-seen order", () => {
    const first = makeOpportunity({ job_code: "Z-9" });
    const second = makeOpportunity({ job_code: "A-1" });
    const dup = makeOpportunity({ job_code: "Z-9", match_confidence: 90 });
    const merged = mergeByKey([[first], [second, dup]]);
    expect(merged.map((o) => [o.job_code, o.match_confidence])).toEqual([
      ["Z-9", 90],
      ["A-1", 70],
    ]);
  });

  it("keeps a confidence when the other side has none", () => {
    const a = makeOpportunity({ match_confidence: null });
    const b = makeOpportunity({ match_confidence: 40 });
    expect(mergeByKey([[a, b]])[0]?.match_confidence).toBe(40);
  });

  it("is idempotent", () => {
    const input = [
      [makeOpportunity({ match_confidence: 10 }), makeOpportunity({ job_code: "B-2" })],
      [makeOpportunity({ match_confidence: 60, job_summary: "Pile driving" })],
    ];
    const once = mergeByKey(input);
    expect(mergeByKey([once])).toEqual(once);
  });
});

describe("KeyMerger", () => {
  it("returns a single result unchanged", async () => {
    const only = makeOpportunity();
    await expect(new KeyMerger().merge([[], [only]])).resolves.toEqual([only]);
  });

  it("returns an empty list for no results", async () => {
    await expect(new KeyMerger().merge([[], []])).resolves.toEqual([]);
  });
});
