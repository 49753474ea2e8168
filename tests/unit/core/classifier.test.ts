import { describe, it, expect } from "vitest";
import {
  classificationText,
  classify,
  containsKeyword,
  platformOf,
  routeAction,
  rulesFromConfig,
} from "../../../src/core/classifier.js";
import { parseConfig } from "../../../src/utils/config.js";
import { createTask } from "../../helpers/fixtures.js";

const config = parseConfig({});
const rules = rulesFromConfig(config.classifier);

describe("classify", () => {
  it("classifies a launch request from email as a business post", () => {
    expect(classify("gmail", "Can you post our launch?", rules)).toEqual({
      domain: "business",
      intent: "post",
      priority: "medium",
    });
  });

  it("uses the source's fixed domain regardless of content", () => {
    expect(classify("whatsapp", "client launch campaign", rules).domain).toBe("personal");
    expect(classify("linkedin", "family dinner this weekend", rules).domain).toBe("business");
  });

  it("counts keyword hits for ambiguous sources", () => {
    expect(classify("gmail", "Dinner with family this weekend?", rules)).toEqual({
      domain: "personal",
      intent: "question",
      priority: "low",
    });
  });

  it("falls back to the default domain on a tie", () => {
    expect(classify("inbox", "client birthday", rules).domain).toBe("personal");
    expect(classify("gmail", "hello there", rules).domain).toBe("personal");
  });

  it("falls back to update at low priority when no intent matches", () => {
    expect(classify("gmail", "Postpone the meeting", rules)).toEqual({
      domain: "business",
      intent: "update",
      priority: "low",
    });
  });

  it("takes the first matching intent in rule order", () => {
    // "share" (post) and "please" (request) both match; post comes first
    expect(classify("twitter", "Please share this", rules).intent).toBe("post");
  });

  it("raises the priority for urgent keywords", () => {
    expect(classify("whatsapp", "Please send the invoice ASAP", rules)).toEqual({
      domain: "personal",
      intent: "request",
      priority: "high",
    });
  });

  it("is deterministic", () => {
    const first = classify("gmail", "Need the proposal by Friday", rules);
    const second = classify("gmail", "Need the proposal by Friday", rules);
    expect(second).toEqual(first);
  });
});

describe("containsKeyword", () => {
  it("matches whole words only", () => {
    expect(containsKeyword("can you post this", "post")).toBe(true);
    expect(containsKeyword("postpone it", "post")).toBe(false);
  });

  it("matches multi-word phrases", () => {
    expect(containsKeyword("could you send me the file", "send me")).toBe(true);
  });

  it("matches punctuation as a substring", () => {
    expect(containsKeyword("what's up?", "?")).toBe(true);
    expect(containsKeyword("earned $500", "$")).toBe(true);
  });

  it("ignores empty keywords", () => {
    expect(containsKeyword("anything", "")).toBe(false);
  });
});

describe("routeAction", () => {
  it("maps an intent onto its action steps", () => {
    expect(routeAction("post", config.actions.routes)).toEqual(["social_post"]);
    expect(routeAction("question", config.actions.routes)).toEqual(["reply"]);
  });

  it("falls back to the update route for unknown intents", () => {
    expect(routeAction("greeting", config.actions.routes)).toEqual(["archive"]);
  });
});

describe("platformOf / classificationText", () => {
  it("prefers an explicit platform field over the source", () => {
    expect(platformOf(createTask({ source: "gmail" }))).toBe("gmail");
    expect(
      platformOf(
        createTask({ source: "gmail", payload: { title: "", text: "", fields: { platform: "linkedin" } } })
      )
    ).toBe("linkedin");
  });

  it("joins title and text", () => {
    const task = createTask({ payload: { title: "Launch", text: "Post it", fields: {} } });
    expect(classificationText(task)).toBe("Launch\nPost it");
  });
});
