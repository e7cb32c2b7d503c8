import { describe, expect, it } from "vitest";
import { getSiteConfig } from "../apps/common/src/sites.js";
import {
  normalizeCategory,
  parseModelJson,
  repairModelText,
  validatePost,
} from "../apps/producer/src/response.js";

const mfo = getSiteConfig("mfo");

function longContent(words: number): string {
  return Array.from({ length: words }, () => "слово").join(" ");
}

describe("parseModelJson", () => {
  it("parses a plain JSON object", () => {
    expect(parseModelJson('{"title":"Займ"}')).toEqual({ ok: true, value: { title: "Займ" } });
  });

  it("repairs fenced JSON", () => {
    const result = parseModelJson('```json\n{"title":"X","content":"Y","excerpt":"Z"}\n```');
    expect(result).toEqual({ ok: true, value: { title: "X", content: "Y", excerpt: "Z" } });
  });

  it("extracts the object from surrounding prose", () => {
    expect(repairModelText('Here it is: {"a":1} thanks')).toBe('{"a":1}');
    expect(parseModelJson('Here it is: {"a":1} thanks')).toEqual({ ok: true, value: { a: 1 } });
  });

  it("rejects arrays", () => {
    const result = parseModelJson("[1,2]");
    expect(result).toEqual({
      ok: false,
      failure: { kind: "parse", message: "expected a JSON object, got an array", snippet: "[1,2]" },
    });
  });

  it("caps the snippet at 500 characters", () => {
    const result = parseModelJson("x".repeat(600));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.snippet).toBe(`${"x".repeat(500)}...`);
    }
  });
});

describe("validatePost", () => {
  it("reports missing required fields and stops", () => {
    const result = validatePost({ title: "T", excerpt: "E" }, mfo);
    expect(result).toEqual({
      valid: false,
      errors: ["missing required field: content"],
      warnings: [],
    });
  });

  it("lists every missing required field in order", () => {
    const result = validatePost({ title: "   " }, mfo);
    expect(result.errors).toEqual([
      "missing required field: title",
      "missing required field: content",
      "missing required field: excerpt",
    ]);
  });

  it("truncates long fields by code points", () => {
    const result = validatePost(
      {
        title: "ё".repeat(75),
        content: longContent(600),
        excerpt: "e".repeat(250),
        meta_title: "m".repeat(70),
      },
      mfo,
    );

    expect(result.valid).toBe(true);
    if (!result.valid) {
      return;
    }
    expect(result.record.title).toBe(`${"ё".repeat(67)}...`);
    expect(Array.from(result.record.title)).toHaveLength(70);
    expect(result.record.excerpt).toBe(`${"e".repeat(197)}...`);
    expect(result.record.metaTitle).toBe("m".repeat(70));
    expect(result.record.metaDescription).toBeUndefined();
    expect(result.warnings).toEqual([
      "title truncated to 70 characters",
      "excerpt truncated to 200 characters",
    ]);
  });

  it("coerces tags, keywords and read time", () => {
    const result = validatePost(
      {
        title: "T",
        content: longContent(500),
        excerpt: "E",
        tags: "займ, кредит,,  ",
        seo_keywords: [" займ ", 3, null, ""],
        read_time: "7",
      },
      mfo,
    );

    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.record.tags).toEqual(["займ", "кредит"]);
      expect(result.record.seoKeywords).toEqual(["займ", "3"]);
      expect(result.record.readTime).toBe(7);
      expect(result.warnings).toEqual([]);
    }
  });

  it("defaults an unreadable read time to 5 and warns about short content", () => {
    const result = validatePost(
      { title: "T", content: "один два три", excerpt: "E", read_time: "soon" },
      mfo,
    );

    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.record.readTime).toBe(5);
      expect(result.record.author).toBeNull();
      expect(result.record.category).toBe("Советы");
      expect(result.warnings).toEqual(["content is short: 3 words"]);
    }
  });
});

describe("normalizeCategory", () => {
  it("keeps an allowed category", () => {
    expect(normalizeCategory("Обзоры", mfo)).toBe("Обзоры");
  });

  it("matches case-insensitively in either direction", () => {
    expect(normalizeCategory("советы", mfo)).toBe("Советы");
    expect(normalizeCategory("Кредитная", mfo)).toBe("Кредитная история");
  });

  it("falls back to the default category", () => {
    expect(normalizeCategory("Погода", mfo)).toBe("Советы");
    expect(normalizeCategory("", mfo)).toBe("Советы");
  });
});
