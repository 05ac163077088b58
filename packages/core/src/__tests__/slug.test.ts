import { describe, it, expect } from "vitest";
import { slugify } from "../slug.js";

describe("slugify", () => {
  it("lowercases and hyphenates words", () => {
    expect(slugify("Tips for Home Composting")).toBe("tips-for-home-composting");
  });

  it("strips punctuation and collapses hyphens", () => {
    expect(slugify("C++ & Rust: A Guide!")).toBe("c-rust-a-guide");
  });

  it("trims leading and trailing separators", () => {
    expect(slugify("  --Hello World--  ")).toBe("hello-world");
  });

  it("truncates without leaving a trailing hyphen", () => {
    expect(slugify("abc def", 4)).toBe("abc");
  });

  it("returns an empty string when nothing survives", () => {
    expect(slugify("¿¡!")).toBe("");
  });
});
