import { describe, it, expect } from "vitest";
import {
  composeClassifiers,
  defaultErrorClassifier,
  extractStatusCode,
  patternClassifier,
} from "../../../src/core/error-classifier.js";
import { ActionError } from "../../../src/core/errors.js";

function errnoError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe("defaultErrorClassifier", () => {
  it("treats network errno codes as transient", () => {
    expect(defaultErrorClassifier(errnoError("connect ECONNREFUSED", "ECONNREFUSED"))).toBe("transient");
    expect(defaultErrorClassifier(errnoError("socket hang up", "ECONNRESET"))).toBe("transient");
  });

  it("treats 429 and 5xx as transient", () => {
    expect(defaultErrorClassifier(new ActionError("slow down", { status: 429 }))).toBe("transient");
    expect(defaultErrorClassifier(new ActionError("bad gateway", { status: 502 }))).toBe("transient");
  });

  it("treats auth and not-found statuses as permanent", () => {
    expect(defaultErrorClassifier(new ActionError("nope", { status: 401 }))).toBe("permanent");
    expect(defaultErrorClassifier(new ActionError("nope", { status: 403 }))).toBe("permanent");
    expect(defaultErrorClassifier(new ActionError("nope", { status: 404 }))).toBe("permanent");
  });

  it("reads status codes from plain error properties", () => {
    const err = Object.assign(new Error("upstream"), { statusCode: 503 });
    expect(extractStatusCode(err)).toBe(503);
    expect(defaultErrorClassifier(err)).toBe("transient");
  });

  it("classifies by message when there is no code", () => {
    expect(defaultErrorClassifier(new Error("Rate limit reached"))).toBe("transient");
    expect(defaultErrorClassifier(new Error("Request timed out"))).toBe("transient");
    expect(defaultErrorClassifier(new Error("Authentication failed"))).toBe("permanent");
  });

  it("honours an explicit category hint", () => {
    expect(
      defaultErrorClassifier(new ActionError("Authentication failed", { category: "transient" }))
    ).toBe("transient");
  });

  it("treats unknown errors as permanent", () => {
    expect(defaultErrorClassifier(new Error("something odd happened"))).toBe("permanent");
  });
});

describe("composeClassifiers", () => {
  it("uses the first classifier with an opinion", () => {
    const classify = composeClassifiers(
      patternClassifier({ transient: ["session expired"], permanent: ["account banned"] }),
      defaultErrorClassifier
    );

    expect(classify(new Error("Session expired, log in again"))).toBe("transient");
    expect(classify(new Error("Account banned (rate limit)"))).toBe("permanent");
    expect(classify(new Error("too many requests"))).toBe("transient");
  });
});
