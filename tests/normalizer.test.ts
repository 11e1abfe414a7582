/**
 * Identifier Normalizer Tests
 *
 * Verifies:
 * - Kebab-case folding of punctuation, whitespace and diacritics
 * - Per-type prefixes
 * - Determinism and idempotence on its own output
 * - Empty titles are rejected rather than yielding an empty id
 */

import { describe, it, expect } from "vitest";
import { normalize, prefixFor, toKebabCase, topicFileName } from "../src/naming/normalizer.js";
import { EmptyTitleError } from "../src/shared/errors.js";
import { CONTENT_TYPES } from "../src/shared/types.js";

describe("toKebabCase", () => {
  it("lower-cases and hyphenates words", () => {
    expect(toKebabCase("My First Concept!")).toBe("my-first-concept");
  });

  it("collapses runs of separators into one hyphen", () => {
    expect(toKebabCase("  Hello   World  ")).toBe("hello-world");
    expect(toKebabCase("Step_1: Install -- the CLI")).toBe("step-1-install-the-cli");
  });

  it("folds diacritics", () => {
    expect(toKebabCase("Café Crème")).toBe("cafe-creme");
  });

  it("keeps letters from non-Latin scripts", () => {
    expect(toKebabCase("Обзор системы")).toBe("обзор-системы");
    expect(toKebabCase("概要 2")).toBe("概要-2");
    expect(toKebabCase("Straße")).toBe("straße");
  });

  it("returns an empty string when nothing alphanumeric remains", () => {
    expect(toKebabCase("--- !!! ---")).toBe("");
  });
});

describe("normalize", () => {
  it("prefixes the kebab id per content type", () => {
    expect(normalize("concept", "My First Concept!")).toBe("c-my-first-concept");
    expect(normalize("task", "Install the CLI")).toBe("t-install-the-cli");
    expect(normalize("process", "Release Flow")).toBe("pr-release-flow");
    expect(normalize("principle", "Least Privilege")).toBe("pl-least-privilege");
    expect(normalize("reference", "API Limits")).toBe("r-api-limits");
  });

  it("is deterministic", () => {
    expect(normalize("task", "Back up data")).toBe(normalize("task", "Back up data"));
  });

  it("is idempotent when re-applied to its own output", () => {
    const titles = ["My First Concept!", "C Programming", "x", "Über Größe 2", "Обзор"];
    for (const type of CONTENT_TYPES) {
      for (const title of titles) {
        const once = normalize(type, title);
        expect(normalize(type, once)).toBe(once);
      }
    }
  });

  it("accepts titles written in any script", () => {
    expect(normalize("concept", "Обзор системы")).toBe("c-обзор-системы");
    expect(normalize("task", "概要")).toBe("t-概要");
    expect(normalize("reference", "Straße")).toBe("r-straße");
  });

  it("does not double a prefix already present", () => {
    expect(normalize("concept", "c-my-first-concept")).toBe("c-my-first-concept");
  });

  it("rejects empty and whitespace-only titles", () => {
    expect(() => normalize("concept", "")).toThrow(EmptyTitleError);
    expect(() => normalize("task", "   \t ")).toThrow(EmptyTitleError);
    expect(() => normalize("reference", "?!")).toThrow(EmptyTitleError);
  });
});

describe("prefixFor / topicFileName", () => {
  it("maps every content type to a distinct prefix", () => {
    const prefixes = CONTENT_TYPES.map(prefixFor);
    expect(prefixes).toEqual(["c-", "t-", "pr-", "pl-", "r-"]);
  });

  it("appends .xml to the id", () => {
    expect(topicFileName("t-install")).toBe("t-install.xml");
  });
});
