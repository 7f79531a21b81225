import * as fs from "fs";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { episodesOfSeason, intIdFrom, loadCandidates, seasonsOfSeries } from "../candidates";
import { ErrorCounter } from "../counters";
import { keyFrom } from "../entities/shared";
import { MissingInputError } from "../errors";
import { MALFORMED_LOCAL_RECORD, scanExistingStore } from "../existing-state";
import { parseRecord, readLines } from "../ndjson";
import { AtomicMergeWriter } from "../store-writer";
import { buildTargets } from "../targets";
import { encodeKey, type RefreshPolicy } from "../types";
import { TODAY, daysAgo, makeTempDir, readNdjson, removeDir, writeNdjson } from "./helpers";

let dir: string;

beforeEach(() => {
  dir = makeTempDir();
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  removeDir(dir);
});

describe("ndjson", () => {
  it("parses only JSON objects", () => {
    expect(parseRecord('{"id":1}')).toEqual({ id: 1 });
    expect(parseRecord("[1,2]")).toBeNull();
    expect(parseRecord("42")).toBeNull();
    expect(parseRecord("{broken")).toBeNull();
  });

  it("streams lines without their newline, CRLF included", async () => {
    const file = path.join(dir, "lines.ndjson");
    fs.writeFileSync(file, '{"id":1}\r\n\n{"id":2}\n');
    const lines: string[] = [];
    for await (const line of readLines(file)) lines.push(line);
    expect(lines).toEqual(['{"id":1}', "", '{"id":2}']);
  });
});

describe("scanExistingStore", () => {
  const entity = {
    keyOf: keyFrom("id"),
    refresh: { kind: "window", windowDays: 30, dateField: "release_date" } satisfies RefreshPolicy,
  };

  it("treats a missing store as empty", async () => {
    const warnings = new ErrorCounter();
    const state = await scanExistingStore(path.join(dir, "none.ndjson"), entity, TODAY, warnings);
    expect(state.lines).toBe(0);
    expect(state.keys.size).toBe(0);
    expect(warnings.total()).toBe(0);
  });

  it("collects keys, due keys and counts malformed lines once each", async () => {
    const store = path.join(dir, "movie_details.ndjson");
    writeNdjson(store, [
      { id: 1, release_date: daysAgo(5) },
      { id: 2, release_date: daysAgo(400) },
      "not json",
      { title: "no id" },
      "",
      { id: 3 },
    ]);
    const warnings = new ErrorCounter();

    const state = await scanExistingStore(store, entity, TODAY, warnings);

    expect(state.lines).toBe(3);
    expect([...state.keys]).toEqual(["[1]", "[2]", "[3]"]);
    expect([...state.due.values()]).toEqual([[1]]);
    expect(warnings.entries()).toEqual([[MALFORMED_LOCAL_RECORD, 2]]);
  });
});

describe("loadCandidates", () => {
  it("returns one empty key for single-call entities", async () => {
    const load = await loadCandidates({ kind: "single" }, dir);
    expect(load.candidates).toEqual([{ key: [] }]);
  });

  it("deduplicates keys in first-seen order and counts bad lines", async () => {
    writeNdjson(path.join(dir, "movie_dumps.json"), [
      { id: 5, release_date: "2020-01-01" },
      { id: 3 },
      { id: 5, release_date: "2021-01-01" },
      "{oops",
      { id: "7" },
    ]);

    const load = await loadCandidates(
      { kind: "store", file: "movie_dumps.json", extract: intIdFrom("id", "release_date") },
      dir,
    );

    expect(load.candidates).toEqual([
      { key: [5], refDate: "2020-01-01" },
      { key: [3], refDate: null },
    ]);
    expect(load.invalidLines).toBe(1);
    expect(load.unusableLines).toBe(1);
  });

  it("throws MissingInputError when the input is missing", async () => {
    await expect(
      loadCandidates({ kind: "store", file: "absent.json", extract: intIdFrom("id") }, dir),
    ).rejects.toBeInstanceOf(MissingInputError);
  });

  it("throws MissingInputError when the input has no usable key", async () => {
    writeNdjson(path.join(dir, "empty.json"), [{ name: "no id" }]);
    await expect(
      loadCandidates({ kind: "store", file: "empty.json", extract: intIdFrom("id") }, dir),
    ).rejects.toThrow("No candidate keys found");
  });
});

describe("derived candidates", () => {
  it("lists seasons from a series' seasons_index", () => {
    expect(
      seasonsOfSeries({
        id: 10,
        seasons_index: [{ season_number: 0, id: 100 }, { season_number: 1, id: 101 }, { id: 102 }],
      }),
    ).toEqual([{ key: [10, 0] }, { key: [10, 1] }]);
  });

  it("expands 1..episode_count with the season's air_date", () => {
    expect(
      episodesOfSeason({ series_id: 10, season_number: 2, episode_count: 3, air_date: "2026-01-01" }),
    ).toEqual([
      { key: [10, 2, 1], refDate: "2026-01-01" },
      { key: [10, 2, 2], refDate: "2026-01-01" },
      { key: [10, 2, 3], refDate: "2026-01-01" },
    ]);
    expect(episodesOfSeason({ series_id: 10, season_number: 2, episode_count: null })).toEqual([]);
  });
});

describe("buildTargets", () => {
  const existing = (keys: number[], due: number[] = []) => ({
    keys: new Set(keys.map((id) => encodeKey([id]))),
    due: new Map(due.map((id) => [encodeKey([id]), [id]] as const)),
    lines: keys.length,
  });

  it("marks absent keys new and due keys stale, each once", () => {
    const plan = buildTargets(
      [{ key: [1] }, { key: [2] }, { key: [1] }, { key: [3] }],
      existing([2, 3, 9], [3, 9]),
      { kind: "window", windowDays: 30, dateField: "release_date" },
      TODAY,
    );

    expect(plan.targets).toEqual([
      { key: [1], kind: "new" },
      { key: [3], kind: "stale" },
      { key: [9], kind: "stale" },
    ]);
    expect(plan.willAdd).toBe(1);
    expect(plan.willUpdate).toBe(2);
    expect([...plan.keys]).toEqual(["[1]", "[3]", "[9]"]);
  });

  it("refreshes existing children whose parent date is in window", () => {
    const plan = buildTargets(
      [
        { key: [1], refDate: daysAgo(3) },
        { key: [2], refDate: daysAgo(300) },
      ],
      existing([1, 2]),
      { kind: "parent", windowDays: 30 },
      TODAY,
    );

    expect(plan.targets).toEqual([{ key: [1], kind: "stale" }]);
  });

  it("returns nothing when the store is current", () => {
    const plan = buildTargets([{ key: [1] }], existing([1]), { kind: "never" }, TODAY);
    expect(plan.targets).toEqual([]);
  });
});

describe("AtomicMergeWriter", () => {
  const keyOf = keyFrom("id");

  it("keeps retained lines byte for byte and appends new rows on commit", async () => {
    const store = path.join(dir, "out", "movie_details.ndjson");
    writeNdjson(store, ['{"id":1,  "title":"spaced"}', { id: 2, title: "old" }, "garbage"]);

    const writer = await AtomicMergeWriter.open(store);
    const retain = await writer.copyRetained(keyOf, new Set([encodeKey([2])]));
    await Promise.all([writer.append([{ id: 2, title: "new" }]), writer.append([{ id: 4 }])]);

    // Readers still see the old store until commit
    expect(fs.readFileSync(store, "utf-8")).toContain('"old"');
    await writer.commit();

    expect(retain).toEqual({ retained: 1, replaced: 1, skipped: 1 });
    expect(writer.appendedLines).toBe(2);
    expect(fs.readFileSync(store, "utf-8")).toBe(
      '{"id":1,  "title":"spaced"}\n{"id":2,"title":"new"}\n{"id":4}\n',
    );
    expect(fs.existsSync(`${store}.tmp`)).toBe(false);
  });

  it("creates the store when there was none", async () => {
    const store = path.join(dir, "fresh.ndjson");
    const writer = await AtomicMergeWriter.open(store);
    expect(await writer.copyRetained(keyOf, new Set())).toEqual({ retained: 0, replaced: 0, skipped: 0 });
    await writer.append([{ id: 1 }]);
    await writer.commit();
    expect(readNdjson(store)).toEqual([{ id: 1 }]);
  });

  it("leaves the store untouched and removes the temp file on abort", async () => {
    const store = path.join(dir, "movie_details.ndjson");
    writeNdjson(store, [{ id: 1 }]);
    const before = fs.readFileSync(store, "utf-8");

    const writer = await AtomicMergeWriter.open(store);
    await writer.copyRetained(keyOf, new Set());
    await writer.append([{ id: 2 }]);
    await writer.abort();

    expect(fs.readFileSync(store, "utf-8")).toBe(before);
    expect(fs.existsSync(`${store}.tmp`)).toBe(false);
  });
});
