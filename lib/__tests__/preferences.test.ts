import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ValidationError } from "../errors";
import { PreferenceStore } from "../preferences";

let dir: string;
let store: PreferenceStore;

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), "prefs-"));
  store = new PreferenceStore({ cacheDir: dir });
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("preferences", () => {
  it("stores and reads back preferences", async () => {
    await store.storePreference("s1", "bitterness_preference", "high");
    const all = await store.storePreference("s1", "preferred_styles", ["IPA", "Stout"]);

    expect(all).toEqual({
      bitterness_preference: "high",
      preferred_styles: ["IPA", "Stout"],
    });
    expect(await store.getPreferences("s1")).toEqual(all);
    expect(await store.getPreferences("s2")).toEqual({});
  });

  it("writes one JSON file per session", async () => {
    await store.storePreference("s1", "body_preference", "full");
    const raw = await readFile(path.join(dir, "sessions", "s1.json"), "utf-8");

    expect(JSON.parse(raw)).toEqual({
      preferences: { body_preference: "full" },
      evaluations: [],
    });
  });

  it("rejects empty keys and unsafe session ids", async () => {
    await expect(store.storePreference("s1", "  ", "x")).rejects.toThrow(
      "Preference key must be a non-empty string",
    );
    await expect(store.getPreferences("../escape")).rejects.toBeInstanceOf(ValidationError);
  });
});

describe("evaluations", () => {
  it("counts stored evaluations", async () => {
    const first = await store.storeEvaluation("s1", { beerId: "ippolita", overallRating: 4 });
    const second = await store.storeEvaluation("s1", { beerId: "oat-stout", tasteNotes: "café" });

    expect(first.total).toBe(1);
    expect(second.total).toBe(2);
    expect(second.evaluation).toMatchObject({ beerId: "oat-stout", tasteNotes: "café" });

    const evaluations = await store.getEvaluations("s1");
    expect(evaluations.map((e) => e.beerId)).toEqual(["ippolita", "oat-stout"]);
    expect(evaluations[0]?.timestamp).toBeInstanceOf(Date);
  });

  it("keeps every concurrent write", async () => {
    await Promise.all(
      ["a", "b", "c", "d", "e"].map((beerId) => store.storeEvaluation("s1", { beerId })),
    );
    expect(await store.getEvaluations("s1")).toHaveLength(5);
  });

  it("validates the rating", async () => {
    await expect(
      store.storeEvaluation("s1", { beerId: "ippolita", overallRating: 7 }),
    ).rejects.toThrow("Overall rating must be an integer between 1 and 5");
  });
});

describe("analyzePreferences", () => {
  it("needs evaluations first", async () => {
    expect(await store.analyzePreferences("s1")).toEqual({
      ready: false,
      evaluations: [],
      message: "No session data found. User needs to evaluate beers first.",
    });
  });

  it("needs at least two evaluations", async () => {
    await store.storeEvaluation("s1", { beerId: "ippolita" });
    const analysis = await store.analyzePreferences("s1");

    expect(analysis.ready).toBe(false);
    expect(analysis.message).toBe(
      "Only 1 evaluation(s) available. Need at least 2 to analyze patterns.",
    );
  });

  it("is ready with two evaluations", async () => {
    await store.storeEvaluation("s1", { beerId: "ippolita" });
    await store.storeEvaluation("s1", { beerId: "oat-stout" });
    const analysis = await store.analyzePreferences("s1");

    expect(analysis.ready).toBe(true);
    expect(analysis.evaluations).toHaveLength(2);
  });
});
