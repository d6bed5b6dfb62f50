import { describe, it, expect, beforeEach } from "@jest/globals";
import { ResolvePassageUseCase } from "../ResolvePassageUseCase";
import { AddFootnotesUseCase } from "../AddFootnotesUseCase";
import { AddFootnotesDto, ResolvePassageDto } from "../../dto/ScriptureDtos";
import { ScriptureResolver } from "../../../../bible/scriptureResolver";
import { FootnoteProcessor } from "../../../../bible/footnoteProcessor";
import { InMemoryPassageClient } from "../../../../infrastructure/passages/in-memory/InMemoryPassageClient";
import { MockLogger } from "../../../../infrastructure/logging/__tests__/MockLogger";
import { testConfig } from "../../../../__tests__/helpers/testConfig";
import {
  PassageLookupError,
  ReferenceParseError,
  ValidationError,
} from "../../../../shared/errors/DomainError";

const JOHN_1_1 = {
  bookName: "john",
  lang: "en",
  whereExpr: "chapter=1 AND verse>=1 AND verse<=1",
};

describe("Scripture use cases", () => {
  let client: InMemoryPassageClient;
  let resolver: ScriptureResolver;

  beforeEach(() => {
    const logger = new MockLogger();
    client = new InMemoryPassageClient().addPassage(JOHN_1_1, "In the beginning was the Word");
    resolver = new ScriptureResolver(client, logger);
  });

  describe("ResolvePassageUseCase", () => {
    it("should default to the source language", async () => {
      const useCase = new ResolvePassageUseCase(resolver, testConfig());

      const passage = await useCase.execute(new ResolvePassageDto("John 1:1"));

      expect(passage.text).toBe("In the beginning was the Word");
      expect(passage.lang).toBe("en");
    });

    it("should throw ReferenceParseError for an unparseable citation", async () => {
      const useCase = new ResolvePassageUseCase(resolver, testConfig());

      await expect(useCase.execute(new ResolvePassageDto("NotABook"))).rejects.toThrow(
        ReferenceParseError,
      );
    });

    it("should throw PassageLookupError when the service has no verses", async () => {
      const useCase = new ResolvePassageUseCase(resolver, testConfig());

      await expect(useCase.execute(new ResolvePassageDto("John 1:1", "ru"))).rejects.toThrow(
        PassageLookupError,
      );
    });
  });

  describe("AddFootnotesUseCase", () => {
    it("should return the footnoted text", async () => {
      const useCase = new AddFootnotesUseCase(new FootnoteProcessor(resolver, new MockLogger()));

      const result = await useCase.execute(new AddFootnotesDto("Word (John 1:1)"));

      expect(result.annotatedText).toBe("Word (John 1:1)[1]");
      expect(result.footnotes).toHaveLength(1);
    });

    it("should throw when footnote processing fails", async () => {
      client.throwOn(JOHN_1_1, new Error("socket hang up"));
      const useCase = new AddFootnotesUseCase(new FootnoteProcessor(resolver, new MockLogger()));

      await expect(useCase.execute(new AddFootnotesDto("Word (John 1:1)"))).rejects.toThrow(
        "socket hang up",
      );
    });
  });

  describe("DTOs", () => {
    it("should reject malformed language codes", () => {
      expect(() => ResolvePassageDto.fromRequest({ reference: "John 1:1", lang: "EN-us" })).toThrow(
        ValidationError,
      );
    });

    it("should reject a missing text", () => {
      expect(() => AddFootnotesDto.fromRequest({})).toThrow("text: Required");
    });
  });
});
