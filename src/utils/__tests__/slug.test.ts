import { describe, it, expect } from "vitest";
import { fileSlug, slugify } from "../slug";
import { anyFaceHasType, frontFace, hasType, parseTypeLine } from "../typeLine";

describe("slugify", () => {
  it("keeps letters and digits and joins words with underscores", () => {
    expect(slugify("Jace, the Mind Sculptor")).toBe("jace_the_mind_sculptor");
  });

  it("strips diacritics and punctuation", () => {
    expect(slugify("Lim-Dûl's Vault")).toBe("lim_duls_vault");
    expect(fileSlug("Lim-Dûl's Vault")).toBe("lim-duls-vault");
  });

  it("collapses and trims separators", () => {
    expect(slugify("  --Fire // Ice--  ")).toBe("fire_ice");
  });

  it("returns an empty slug for empty input", () => {
    expect(slugify(null)).toBe("");
    expect(slugify("")).toBe("");
    expect(slugify("!!!")).toBe("");
  });
});

describe("type lines", () => {
  it("splits types from subtypes on the em dash", () => {
    expect(parseTypeLine("Legendary Creature — Human Wizard")).toEqual({
      types: ["legendary", "creature"],
      subtypes: ["Human", "Wizard"],
    });
  });

  it("accepts a spaced hyphen as the separator", () => {
    expect(parseTypeLine("Basic Land - Forest")).toEqual({ types: ["basic", "land"], subtypes: ["Forest"] });
  });

  it("reads only the front face unless asked for any face", () => {
    expect(frontFace("Instant // Sorcery")).toBe("Instant");
    expect(hasType("Creature — Human // Land", "land")).toBe(false);
    expect(anyFaceHasType("Creature — Human // Land", "land")).toBe(true);
  });

  it("treats a missing type line as having no types", () => {
    expect(parseTypeLine(null)).toEqual({ types: [], subtypes: [] });
    expect(hasType(undefined, "creature")).toBe(false);
  });
});
