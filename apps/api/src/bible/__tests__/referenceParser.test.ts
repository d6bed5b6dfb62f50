import { describe, it, expect } from "@jest/globals";
import {
  buildWhereExpression,
  isParseableReference,
  normalizeBookName,
  parseReference,
} from "../referenceParser";

describe("parseReference", () => {
  it("should parse a verse range", () => {
    expect(parseReference("John 1:2-5")).toEqual({
      raw: "John 1:2-5",
      bookKey: "john",
      chapter: 1,
      verseStart: 2,
      verseEnd: 5,
    });
  });

  it("should default the end verse to the start verse", () => {
    const reference = parseReference("1 Corinthians 13:4");

    expect(reference?.bookKey).toBe("1cor");
    expect(reference?.chapter).toBe(13);
    expect([reference?.verseStart, reference?.verseEnd]).toEqual([4, 4]);
  });

  it("should strip surrounding parentheses", () => {
    expect(parseReference("(II Timothy 3:16)")).toEqual({
      raw: "II Timothy 3:16",
      bookKey: "2tim",
      chapter: 3,
      verseStart: 16,
      verseEnd: 16,
    });
  });

  it("should allow spaces around the separators", () => {
    const reference = parseReference("Romans 8 : 28 - 30");

    expect(reference?.bookKey).toBe("rom");
    expect([reference?.chapter, reference?.verseStart, reference?.verseEnd]).toEqual([
      8, 28, 30,
    ]);
  });

  it("should return null for text that is not a citation", () => {
    expect(parseReference("NotABook")).toBeNull();
    expect(parseReference("John 3")).toBeNull();
    expect(parseReference("")).toBeNull();
  });

  it("should reject chapter or verse zero and reversed ranges", () => {
    expect(parseReference("John 0:1")).toBeNull();
    expect(parseReference("John 1:0")).toBeNull();
    expect(parseReference("John 1:5-2")).toBeNull();
  });
});

describe("normalizeBookName", () => {
  it("should map names and abbreviations through the alias table", () => {
    expect(normalizeBookName("Matthew")).toBe("matthew");
    expect(normalizeBookName("Mt")).toBe("matthew");
    expect(normalizeBookName("  I   John ")).toBe("1john");
    expect(normalizeBookName("Psalms")).toBe("ps");
  });

  it("should fall back to the lowercase name without spaces", () => {
    expect(normalizeBookName("Wisdom of Sirach")).toBe("wisdomofsirach");
  });
});

describe("buildWhereExpression", () => {
  it("should select the verse range of the chapter", () => {
    const reference = parseReference("John 1:2-5");

    expect(reference).not.toBeNull();
    if (reference) {
      expect(buildWhereExpression(reference)).toBe(
        "chapter=1 AND verse>=2 AND verse<=5",
      );
    }
  });
});

describe("isParseableReference", () => {
  it("should tell citations from other text", () => {
    expect(isParseableReference("Genesis 1:1")).toBe(true);
    expect(isParseableReference("Genesis")).toBe(false);
  });
});
