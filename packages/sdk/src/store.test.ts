import { describe, it, expect, beforeEach } from "vitest";
import { RecordStore, connected, unavailable } from "./store.js";
import { MemoryConnector } from "./connectors/memory.js";
import { MemoryAuditSink, MutationLog } from "./audit.js";
import type { AuditSink } from "./audit.js";
import { createFallbackProvider, DemoFallbackProvider } from "./fallback.js";
import { InvalidInputError } from "./errors.js";
import type { AnimalRecord } from "./types.js";

const seed = (): AnimalRecord[] => [
  { animal_id: "A1", animal_type: "Dog", breed: "Beagle", outcome_type: "Adoption" },
  { animal_id: "A2", animal_type: "Cat", breed: "Siamese", outcome_type: "Transfer" },
  { animal_id: "A3", animal_type: "Dog", breed: "Bulldog", outcome_type: "Transfer" },
];

describe("RecordStore (live)", () => {
  let connector: MemoryConnector;
  let sink: MemoryAuditSink;
  let store: RecordStore;

  beforeEach(() => {
    connector = new MemoryConnector(seed());
    sink = new MemoryAuditSink();
    store = new RecordStore({ handle: connected(connector), audit: new MutationLog(sink) });
  });

  describe("create()", () => {
    it("should append the record and audit it", () => {
      expect(store.create({ animal_id: "A4", animal_type: "Bird" }, { actor: "staff1" })).toBe(true);

      expect(store.read({ animal_id: "A4" })).toEqual([{ animal_id: "A4", animal_type: "Bird" }]);
      expect(sink.byAction("CREATE_RECORD")).toMatchObject([
        { actor: "staff1", detail: "Created animal record A4" },
      ]);
    });

    it("should reject a non-mapping and leave the collection unchanged", () => {
      expect(() => store.create(42)).toThrow(InvalidInputError);
      expect(() => store.create(null)).toThrow(InvalidInputError);
      expect(() => store.create([{ animal_id: "A9" }])).toThrow(InvalidInputError);

      expect(connector.size).toBe(3);
      expect(sink.entries).toEqual([]);
    });

    it("should copy the record on insert", () => {
      const record: AnimalRecord = { animal_id: "A5", name: "Rex" };
      store.create(record);
      record.name = "Changed";

      expect(store.snapshot({ animal_id: "A5" })).toEqual([{ animal_id: "A5", name: "Rex" }]);
    });
  });

  describe("read()", () => {
    it("should return matches in insertion order", () => {
      expect(store.read({ animal_type: "Dog" }).map((r) => r.animal_id)).toEqual(["A1", "A3"]);
    });

    it("should return an empty list when nothing matches", () => {
      expect(store.read({ animal_type: "Horse" })).toEqual([]);
    });

    it("should audit the query under the default actor", () => {
      store.read({ animal_type: "Cat" });

      expect(sink.entries).toMatchObject([
        { actor: "system", action: "READ_RECORDS", detail: 'Query: {"animal_type":"Cat"}' },
      ]);
    });

    it("should hand out copies", () => {
      const [first] = store.read({ animal_id: "A1" });
      if (first) first.breed = "Changed";

      expect(store.snapshot({ animal_id: "A1" })[0]?.breed).toBe("Beagle");
    });

    it("should reject a non-mapping query", () => {
      expect(() => store.read("animal_type=Dog")).toThrow(InvalidInputError);
    });
  });

  describe("snapshot()", () => {
    it("should read without auditing", () => {
      expect(store.snapshot()).toHaveLength(3);
      expect(sink.entries).toEqual([]);
    });
  });

  describe("update()", () => {
    it("should change only the first match by default", () => {
      const count = store.update({ animal_type: "Dog" }, { outcome_type: "Euthanasia" });

      expect(count).toBe(1);
      expect(store.snapshot({ outcome_type: "Euthanasia" }).map((r) => r.animal_id)).toEqual(["A1"]);
      expect(sink.entries).toMatchObject([
        { action: "UPDATE_RECORD", detail: 'Updated record matching {"animal_type":"Dog"}' },
      ]);
    });

    it("should change every match with multiple", () => {
      const count = store.update({ outcome_type: "Transfer" }, { outcome_subtype: "Partner" }, { multiple: true, actor: "analyst1" });

      expect(count).toBe(2);
      expect(sink.entries).toMatchObject([
        { actor: "analyst1", action: "UPDATE_RECORDS", detail: "Updated 2 records" },
      ]);
    });

    it("should add fields that were absent", () => {
      store.update({ animal_id: "A2" }, { name: "Whiskers" });

      expect(store.snapshot({ animal_id: "A2" })[0]).toEqual({
        animal_id: "A2",
        animal_type: "Cat",
        breed: "Siamese",
        outcome_type: "Transfer",
        name: "Whiskers",
      });
    });

    it("should count only records that actually changed", () => {
      const count = store.update({ animal_type: "Dog" }, { animal_type: "Dog" }, { multiple: true });

      expect(count).toBe(0);
      expect(sink.entries).toEqual([]);
    });

    it("should consider only the first match when it is already up to date", () => {
      expect(store.update({ animal_type: "Dog" }, { breed: "Beagle" })).toBe(0);
      expect(store.snapshot({ animal_id: "A3" })[0]?.breed).toBe("Bulldog");
    });

    it("should reject a non-mapping patch", () => {
      expect(() => store.update({ animal_id: "A1" }, "Adoption")).toThrow(InvalidInputError);
      expect(() => store.update(undefined, {})).toThrow(InvalidInputError);
    });
  });

  describe("delete()", () => {
    it("should remove only the first match by default", () => {
      expect(store.delete({ animal_type: "Dog" })).toBe(1);
      expect(store.snapshot().map((r) => r.animal_id)).toEqual(["A2", "A3"]);
      expect(sink.entries).toMatchObject([
        { action: "DELETE_RECORD", detail: 'Deleted record matching {"animal_type":"Dog"}' },
      ]);
    });

    it("should remove every match with multiple", () => {
      expect(store.delete({ outcome_type: "Transfer" }, { multiple: true })).toBe(2);
      expect(store.snapshot().map((r) => r.animal_id)).toEqual(["A1"]);
      expect(sink.byAction("DELETE_RECORDS")[0]?.detail).toBe("Deleted 2 records");
    });

    it("should return 0 and skip the audit when nothing matches", () => {
      expect(store.delete({ animal_id: "missing" }, { multiple: true })).toBe(0);
      expect(connector.size).toBe(3);
      expect(sink.entries).toEqual([]);
    });
  });

  it("should report live mode", () => {
    expect(store.isAvailable()).toBe(true);
    expect(store.mode).toBe("live");
    expect(store.unavailableReason).toBeUndefined();
  });
});

describe("RecordStore (demo mode)", () => {
  let sink: MemoryAuditSink;
  let store: RecordStore;

  beforeEach(() => {
    sink = new MemoryAuditSink();
    store = new RecordStore({ handle: unavailable("no database"), audit: new MutationLog(sink) });
  });

  it("should report demo mode with its reason", () => {
    expect(store.isAvailable()).toBe(false);
    expect(store.mode).toBe("demo");
    expect(store.unavailableReason).toBe("no database");
  });

  it("should serve fallback records filtered by the query", () => {
    const dogs = store.read({ animal_type: "Dog", age_upon_outcome_in_weeks: { $lte: 50 } });

    expect(dogs.map((r) => r.animal_id)).toEqual(["A004", "A007"]);
  });

  it("should serve the whole fallback dataset for an empty query", () => {
    expect(store.read({})).toEqual(new DemoFallbackProvider().records());
  });

  it("should make mutations no-ops", () => {
    expect(store.create({ animal_id: "A100" })).toBe(false);
    expect(store.update({ animal_type: "Dog" }, { name: "x" }, { multiple: true })).toBe(0);
    expect(store.delete({}, { multiple: true })).toBe(0);
    expect(store.read({ animal_id: "A100" })).toEqual([]);
    expect(sink.entries).toEqual([]);
  });

  it("should still validate arguments", () => {
    expect(() => store.create(42)).toThrow(InvalidInputError);
    expect(() => store.update({}, [])).toThrow(InvalidInputError);
    expect(() => store.delete(7)).toThrow(InvalidInputError);
  });

  it("should use a caller-supplied fallback provider", () => {
    const fallback = createFallbackProvider({
      records: [{ animal_id: "F1", animal_type: "Dog" }],
      breedPerformance: [],
      rescueTypeAnalytics: {
        water: { total: 0, breakdown: [] },
        wilderness: { total: 0, breakdown: [] },
        disaster: { total: 0, breakdown: [] },
      },
      adoptionTrends: [],
      demographics: [],
    });
    const custom = new RecordStore({ handle: unavailable("offline"), fallback });

    expect(custom.read({ animal_type: "Dog" })).toEqual([{ animal_id: "F1", animal_type: "Dog" }]);
  });

  it("should treat a connector that reports unavailable as demo mode", () => {
    const connector = new MemoryConnector(seed());
    connector.isAvailable = () => false;
    const offline = new RecordStore({ handle: connected(connector) });

    expect(offline.mode).toBe("demo");
    expect(offline.unavailableReason).toBe("connector reports unavailable");
    expect(offline.create({ animal_id: "A9" })).toBe(false);
    expect(connector.size).toBe(3);
  });
});

describe("RecordStore audit failures", () => {
  it("should not fail a mutation when the sink throws", () => {
    const sink: AuditSink = {
      append: () => {
        throw new Error("disk full");
      },
    };
    const store = new RecordStore({
      handle: connected(new MemoryConnector(seed())),
      audit: new MutationLog(sink),
    });

    expect(store.create({ animal_id: "A4" })).toBe(true);
    expect(store.delete({ animal_id: "A4" })).toBe(1);
  });

  it("should not fail close() when an async sink rejects", async () => {
    const sink: AuditSink = {
      append: () => Promise.reject(new Error("disk full")),
    };
    const store = new RecordStore({
      handle: connected(new MemoryConnector(seed())),
      audit: new MutationLog(sink),
    });

    expect(store.update({ animal_id: "A1" }, { name: "Scout" })).toBe(1);
    await expect(store.close()).resolves.toBeUndefined();
  });
});
