import { describe, it, expect } from "vitest";
import { parseVisitBatch } from "./batch.js";

describe("parseVisitBatch", () => {
  it("parses records and maps source field names", () => {
    const content = JSON.stringify([
      { note: "Ate lunch, good mood", client: "C1", care_pro: "P7", visit_date: "2024-03-01" },
    ]);

    const result = parseVisitBatch(content, "2024-03-01-north");

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.batch.batchId).toBe("2024-03-01-north");
    expect(result.value.batch.records).toEqual([
      {
        index: 0,
        note: "Ate lunch, good mood",
        client: "C1",
        hasClient: true,
        carePro: "P7",
        visitDate: "2024-03-01",
      },
    ]);
    expect(result.value.rejected).toEqual([]);
  });

  it("accepts the carer and date aliases", () => {
    const content = JSON.stringify([{ note: "n", client: "C1", carer: "P2", date: "2024-03-02" }]);

    const result = parseVisitBatch(content, "batch-1");

    if (!result.ok) throw result.error;
    expect(result.value.batch.records[0].carePro).toBe("P2");
    expect(result.value.batch.records[0].visitDate).toBe("2024-03-02");
  });

  it("prefers care_pro over carer when both are present", () => {
    const content = JSON.stringify([{ note: "n", care_pro: "P1", carer: "P2" }]);

    const result = parseVisitBatch(content, "batch-1");

    if (!result.ok) throw result.error;
    expect(result.value.batch.records[0].carePro).toBe("P1");
  });

  it("normalises absent and null fields to empty strings", () => {
    const content = JSON.stringify([{}, { client: null, note: null }]);

    const result = parseVisitBatch(content, "batch-1");

    if (!result.ok) throw result.error;
    for (const record of result.value.batch.records) {
      expect(record.note).toBe("");
      expect(record.client).toBe("");
      expect(record.hasClient).toBe(false);
      expect(record.carePro).toBe("");
      expect(record.visitDate).toBe("");
    }
  });

  it("stringifies numeric and boolean scalars", () => {
    const content = JSON.stringify([{ note: "n", client: 42, care_pro: true }]);

    const result = parseVisitBatch(content, "batch-1");

    if (!result.ok) throw result.error;
    expect(result.value.batch.records[0].client).toBe("42");
    expect(result.value.batch.records[0].carePro).toBe("true");
  });

  it("keeps an existing classification tag", () => {
    const content = JSON.stringify([{ note: "n", classification: "amber" }]);

    const result = parseVisitBatch(content, "batch-1");

    if (!result.ok) throw result.error;
    expect(result.value.batch.records[0].classification).toBe("amber");
  });

  it("rejects unreadable entries individually", () => {
    const content = JSON.stringify([
      1,
      { note: 5 },
      { client: { id: 1 } },
      { note: "still fine" },
    ]);

    const result = parseVisitBatch(content, "batch-1");

    if (!result.ok) throw result.error;
    expect(result.value.rejected).toEqual([
      { index: 0, reason: "entry is not an object" },
      { index: 1, reason: 'field "note" is not a string' },
      { index: 2, reason: 'field "client" is not a scalar' },
    ]);
    expect(result.value.batch.records).toHaveLength(1);
    expect(result.value.batch.records[0].index).toBe(3);
    expect(result.value.entries).toHaveLength(4);
  });

  it("returns an error for invalid JSON", () => {
    const result = parseVisitBatch("[{", "batch-1");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.name).toBe("BatchParseError");
    expect(result.error.message.startsWith("Invalid JSON: ")).toBe(true);
  });

  it("returns an error when the top level is not an array", () => {
    const result = parseVisitBatch('{"note": "n"}', "batch-1");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("Expected a JSON array of visit records");
  });

  it("returns frozen records", () => {
    const result = parseVisitBatch(JSON.stringify([{ note: "n", client: "C1" }]), "batch-1");

    if (!result.ok) throw result.error;
    expect(Object.isFrozen(result.value.batch.records)).toBe(true);
    expect(Object.isFrozen(result.value.batch.records[0])).toBe(true);
  });

  it("parses an empty array into an empty batch", () => {
    const result = parseVisitBatch("[]", "batch-1");

    if (!result.ok) throw result.error;
    expect(result.value.batch.records).toEqual([]);
  });
});
