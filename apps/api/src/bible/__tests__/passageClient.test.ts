import { describe, it, expect, beforeEach, jest } from "@jest/globals";
import { HttpPassageClient, joinVerses } from "../passageClient";
import { MockLogger } from "../../infrastructure/logging/__tests__/MockLogger";
import { PassageQuery } from "../types";

const mockRequest = jest.fn<(...args: unknown[]) => Promise<unknown>>();

jest.mock("undici", () => ({
  request: (...args: unknown[]) => mockRequest(...args),
}));

const ENDPOINT = "https://passages.test/pericope";

const QUERY: PassageQuery = {
  bookName: "john",
  lang: "en",
  whereExpr: "chapter=1 AND verse>=1 AND verse<=2",
};

function respond(statusCode: number, body: string): void {
  mockRequest.mockResolvedValueOnce({
    statusCode,
    body: { text: async () => body },
  });
}

describe("joinVerses", () => {
  it("should join verse texts with single spaces", () => {
    expect(joinVerses([{ text: "In the beginning" }, { text: "was the Word." }])).toBe(
      "In the beginning was the Word.",
    );
  });
});

describe("HttpPassageClient", () => {
  let logger: MockLogger;
  let client: HttpPassageClient;

  beforeEach(() => {
    mockRequest.mockReset();
    logger = new MockLogger();
    client = new HttpPassageClient({ endpoint: ENDPOINT, timeoutMs: 5000 }, logger);
  });

  it("should post the query and join the verses", async () => {
    respond(200, JSON.stringify([{ text: "In the beginning", verse: 1 }, { text: "was the Word.", verse: 2 }]));

    const result = await client.fetchPassage(QUERY);

    expect(result).toEqual({ success: true, value: "In the beginning was the Word." });
    expect(mockRequest).toHaveBeenCalledWith(
      ENDPOINT,
      expect.objectContaining({
        method: "POST",
        body: JSON.stringify(QUERY),
        headersTimeout: 5000,
        bodyTimeout: 5000,
      }),
    );
    expect(logger.warnCalls).toHaveLength(0);
  });

  it("should fail on a non-200 status", async () => {
    respond(500, "Internal Server Error");

    const result = await client.fetchPassage(QUERY);

    expect(result).toEqual({
      success: false,
      error: {
        reason: "HTTP_ERROR",
        message: "Passage service responded with status 500",
        statusCode: 500,
      },
    });
    expect(logger.warnCalls[0].message).toBe("Passage lookup failed");
    expect(logger.warnCalls[0].context).toMatchObject({
      bookName: "john",
      reason: "HTTP_ERROR",
    });
  });

  it("should fail on an empty verse list", async () => {
    respond(200, "[]");

    const result = await client.fetchPassage(QUERY);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.reason).toBe("EMPTY_RESULT");
    }
  });

  it("should fail on a body that is not JSON", async () => {
    respond(200, "<html>oops</html>");

    const result = await client.fetchPassage(QUERY);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.reason).toBe("INVALID_RESPONSE");
      expect(result.error.message).toBe("Passage service returned a body that is not JSON");
    }
  });

  it("should fail on verses without text", async () => {
    respond(200, JSON.stringify([{ verse: 1 }]));

    const result = await client.fetchPassage(QUERY);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe("Passage service returned an unexpected payload");
    }
  });

  it("should turn transport errors into a failure result", async () => {
    mockRequest.mockRejectedValueOnce(new Error("connect ECONNREFUSED"));

    const result = await client.fetchPassage(QUERY);

    expect(result).toEqual({
      success: false,
      error: {
        reason: "TRANSPORT_ERROR",
        message: "Passage service unreachable: connect ECONNREFUSED",
      },
    });
  });
});
