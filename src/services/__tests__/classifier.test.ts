import path from "node:path";
import { describe, it, expect } from "vitest";
import { ValidationError } from "../../errors";
import {
  DEFAULT_LAND_OVERRIDES,
  classify,
  collectorSegment,
  deriveArtType,
  destinationFor,
  fileNameFor,
  imageExtension,
} from "../classification/classifier";
import { estimateBatch, planFetchJobs, validateFetchJobs } from "../fetch/jobPlanner";
import { makePrint } from "./fixtures";

const segments = (overrides: Parameters<typeof makePrint>[0]) => classify(makePrint(overrides)).segments;

describe("classify", () => {
  it("files basic lands by name", () => {
    expect(segments({ name: "Forest", typeLine: "Basic Land — Forest", isBasicLand: true })).toEqual([
      "lands",
      "basic",
      "forest",
    ]);
  });

  it("recognises dual lands by subtypes or produced colours", () => {
    expect(segments({ typeLine: "Land — Forest Island" })).toEqual(["lands", "nonbasic", "dual"]);
    expect(segments({ typeLine: "Land — Forest Island Mountain" })).toEqual(["lands", "nonbasic", "dual"]);
    expect(segments({ typeLine: "Land", producedMana: ["G", "W"] })).toEqual(["lands", "nonbasic", "dual"]);
    expect(segments({ typeLine: "Land", producedMana: ["C", "G"] })).toEqual(["lands", "nonbasic", "special"]);
  });

  it("applies per-set land overrides before the dual rules", () => {
    expect(DEFAULT_LAND_OVERRIDES.ust).toBe("nonbasic/special");
    expect(segments({ setCode: "UST", typeLine: "Land — Forest Island" })).toEqual(["lands", "nonbasic", "special"]);
  });

  it("files creature tokens by subtype and power/toughness", () => {
    expect(
      segments({ isToken: true, typeLine: "Token Creature — Goblin Warrior", power: "1", toughness: "1" }),
    ).toEqual(["tokens", "creature", "goblin-warrior", "1-1"]);
    expect(segments({ isToken: true, typeLine: "Token Creature — Elemental", power: "*", toughness: "*" })).toEqual([
      "tokens",
      "creature",
      "elemental",
      "x-x",
    ]);
    expect(segments({ isToken: true, typeLine: "Token Creature", power: null, toughness: null })).toEqual([
      "tokens",
      "creature",
      "unknown",
      "unknown",
    ]);
  });

  it("files other tokens by kind", () => {
    expect(segments({ isToken: true, name: "Treasure", typeLine: "Token Artifact — Treasure" })).toEqual([
      "tokens",
      "noncreature",
      "treasure",
    ]);
    expect(segments({ isToken: true, name: "Clue", typeLine: "Token Artifact" })).toEqual([
      "tokens",
      "noncreature",
      "clue",
    ]);
    expect(segments({ isToken: true, name: "Elspeth Emblem", typeLine: "Emblem — Elspeth", layout: "emblem" })).toEqual(
      ["tokens", "noncreature", "emblem"],
    );
    expect(segments({ isToken: true, name: "Ward Sigil", typeLine: "Token Enchantment — Aura" })).toEqual([
      "tokens",
      "noncreature",
      "misc",
    ]);
  });

  it("files everything else by primary type, including missing type lines", () => {
    expect(segments({ typeLine: "Legendary Creature — Elf" })).toEqual(["cards", "creature"]);
    expect(segments({ typeLine: "Artifact Creature — Golem" })).toEqual(["cards", "creature"]);
    expect(segments({ typeLine: "Instant" })).toEqual(["cards", "instant"]);
    expect(segments({ typeLine: "Conspiracy" })).toEqual(["cards", "other"]);
    expect(segments({ typeLine: null })).toEqual(["cards", "other"]);
  });
});

describe("art type and file names", () => {
  it("derives the art type by precedence", () => {
    expect(deriveArtType(makePrint({ textless: true, borderColor: "borderless" }))).toBe("textless");
    expect(deriveArtType(makePrint({ borderColor: "borderless", frameEffects: ["showcase"] }))).toBe("borderless");
    expect(deriveArtType(makePrint({ frameEffects: ["showcase"] }))).toBe("showcase");
    expect(deriveArtType(makePrint({ frameEffects: ["extendedart"] }))).toBe("extended");
    expect(deriveArtType(makePrint({ frame: "1997" }))).toBe("retro");
    expect(deriveArtType(makePrint({ fullArt: true }))).toBe("fullart");
    expect(deriveArtType(makePrint())).toBe("standard");
  });

  it("builds name-art-lang-set-number file names", () => {
    const bolt = makePrint({
      name: "Lightning Bolt",
      setCode: "m10",
      collectorNumber: "146",
      typeLine: "Instant",
      imageUrl: "https://img.example.test/front/lb.jpg?1234",
    });
    expect(fileNameFor(bolt)).toBe("lightning-bolt-standard-en-m10-146.jpg");
    expect(fileNameFor(makePrint({ name: "Star Card", collectorNumber: "12★", imageUrl: null }))).toBe(
      "star-card-standard-en-tst-12_2605_.png",
    );
    expect(destinationFor(bolt, "/out")).toBe(path.join("/out", "cards", "instant", "lightning-bolt-standard-en-m10-146.jpg"));
  });

  it("keeps escaped collector numbers distinct from literal ones", () => {
    expect(collectorSegment("1-")).toBe("1_2d_");
    expect(collectorSegment("12d")).toBe("12d");
    expect(collectorSegment("A-12")).toBe("_41__2d_12");
    expect(collectorSegment("a-12")).toBe("a_2d_12");
    expect(collectorSegment("")).toBe("0");
  });

  it("falls back to png for unknown extensions", () => {
    expect(imageExtension("https://img.example.test/a.webp")).toBe(".webp");
    expect(imageExtension("https://img.example.test/a.gif")).toBe(".png");
    expect(imageExtension("not a url")).toBe(".png");
  });
});

describe("planFetchJobs", () => {
  it("plans one job per print and reports prints without images", () => {
    const withImage = makePrint({ id: "p1", typeLine: "Instant" });
    const noImage = makePrint({ id: "p2", imageUrl: null });
    const plan = planFetchJobs([withImage, noImage, withImage], { outputDir: "/out" });

    expect(plan.jobs).toEqual([
      {
        printId: "p1",
        displayName: "Llanowar Elves (TST 1, en)",
        sourceUri: "https://img.example.test/print-1.jpg",
        destinationPath: path.join("/out", "cards", "instant", "llanowar-elves-standard-en-tst-1.jpg"),
        retryCount: 0,
      },
    ]);
    expect(plan.unplannable.map((print) => print.id)).toEqual(["p2"]);
  });

  it("rejects batches with colliding destinations", () => {
    const job = { printId: "a", displayName: "A", sourceUri: "https://img.example.test/a.jpg", destinationPath: "/out/a.jpg", retryCount: 0 };
    expect(() => validateFetchJobs([job, { ...job, printId: "b" }])).toThrow(ValidationError);
    expect(() => validateFetchJobs([job])).not.toThrow();
  });

  it("estimates batch size and duration from the job count", () => {
    const job = { printId: "a", displayName: "A", sourceUri: "https://img.example.test/a.jpg", destinationPath: "/out/a.jpg", retryCount: 0 };
    expect(estimateBatch([job, { ...job, printId: "b", destinationPath: "/out/b.jpg" }], { concurrency: 4 })).toEqual({
      jobCount: 2,
      estimatedBytes: 1_700_000,
      estimatedSeconds: 0.85,
      concurrency: 4,
    });
    expect(estimateBatch([], { concurrency: 8, averageBytes: 1 })).toEqual({
      jobCount: 0,
      estimatedBytes: 0,
      estimatedSeconds: 0,
      concurrency: 8,
    });
  });
});
