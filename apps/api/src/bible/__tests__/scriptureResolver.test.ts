import { describe, it, expect, beforeEach } from "@jest/globals";
import { ScriptureResolver } from "../scriptureResolver";
import { InMemoryPassageClient } from "../../infrastructure/passages/in-memory/InMemoryPassageClient";
import { MockLogger } from "../../infrastructure/logging/__tests__/MockLogger";

const JOHN_1_1 = {
  bookName: "john",
  whereExpr: "chapter=1 AND verse>=1 AND verse<=1",
};

describe("ScriptureResolver", () => {
  let client: InMemoryPassageClient;
  let resolver: ScriptureResolver;

  beforeEach(() => {
    client = new InMemoryPassageClient()
      .addPassage({ ...JOHN_1_1, lang: "en" }, "In the beginning was the Word")
      .addPassage({ ...JOHN_1_1, lang: "hk" }, "太初有道");
    resolver = new ScriptureResolver(client, new MockLogger());
  });

  it("should resolve a citation in the requested language", async () => {
    const result = await resolver.resolve("John 1:1", "hk");

    expect(result).toEqual({
      success: true,
      value: {
        reference: {
          raw: "John 1:1",
          bookKey: "john",
          chapter: 1,
          verseStart: 1,
          verseEnd: 1,
        },
        lang: "hk",
        text: "太初有道",
      },
    });
  });

  it("should use the default language", async () => {
    await resolver.resolve("John 1:1");

    expect(client.queries).toEqual([{ ...JOHN_1_1, lang: "en" }]);
  });

  it("should not query the service for an unparseable citation", async () => {
    const result = await resolver.resolve("NotABook");

    expect(result).toEqual({
      success: false,
      error: {
        reason: "UNPARSEABLE_REFERENCE",
        message: 'Could not parse Bible reference "NotABook"',
      },
    });
    expect(client.queries).toHaveLength(0);
  });

  it("should pass lookup failures through", async () => {
    const result = await resolver.resolve("Mark 1:1");

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.reason).toBe("EMPTY_RESULT");
    }
  });

  it("should fetch by book key and filter expression", async () => {
    const result = await resolver.fetch("john", JOHN_1_1.whereExpr, "en");

    expect(result).toEqual({ success: true, value: "In the beginning was the Word" });
  });
});
