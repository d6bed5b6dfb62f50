import { IPassageClient, PassageFailure, PassageResult } from "../../../bible/passageClient";
import { PassageQuery } from "../../../bible/types";
import { fail, ok } from "../../../shared/result";

function keyOf(query: PassageQuery): string {
  return `${query.bookName}|${query.lang}|${query.whereExpr}`;
}

/**
 * In-memory implementation of IPassageClient for testing
 *
 * Serves passages from a Map keyed by book, language and where-expression.
 * Unknown queries answer like the real service does for no rows.
 */
export class InMemoryPassageClient implements IPassageClient {
  private passages: Map<string, string> = new Map();
  private failures: Map<string, PassageFailure> = new Map();
  private thrown: Map<string, Error> = new Map();

  readonly queries: PassageQuery[] = [];

  async fetchPassage(query: PassageQuery): Promise<PassageResult> {
    this.queries.push(query);
    const key = keyOf(query);

    const error = this.thrown.get(key);
    if (error) {
      throw error;
    }

    const failure = this.failures.get(key);
    if (failure) {
      return fail(failure);
    }

    const text = this.passages.get(key);
    if (text === undefined) {
      return fail({
        reason: "EMPTY_RESULT",
        message: `No verses found for ${query.bookName} (${query.whereExpr})`,
      });
    }
    return ok(text);
  }

  addPassage(query: PassageQuery, text: string): this {
    this.passages.set(keyOf(query), text);
    return this;
  }

  failWith(query: PassageQuery, failure: PassageFailure): this {
    this.failures.set(keyOf(query), failure);
    return this;
  }

  throwOn(query: PassageQuery, error: Error): this {
    this.thrown.set(keyOf(query), error);
    return this;
  }

  clear(): void {
    this.passages.clear();
    this.failures.clear();
    this.thrown.clear();
    this.queries.length = 0;
  }
}
