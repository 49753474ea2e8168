import { describe, it, expect } from "vitest";
import {
  DEFAULT_POLICY,
  actionKey,
  compilePolicy,
  contactOf,
  evaluateApproval,
  requiresApproval,
} from "../../../src/core/approval-gate.js";
import type { ApprovalContext } from "../../../src/core/approval-gate.js";
import { parseConfig } from "../../../src/utils/config.js";
import type { Task } from "../../../src/core/types.js";
import { createTask } from "../../helpers/fixtures.js";

const ctx: ApprovalContext = {
  knownContacts: new Set(["alice@example.com"]),
  completedActions: new Set(["gmail:archive", "gmail:social_post"]),
};

/** A task every default rule lets through except the ones a test changes. */
function routineUpdate(overrides: Partial<Task> = {}, fields: Record<string, string> = {}): Task {
  return createTask({
    domain: "business",
    intent: "update",
    priority: "low",
    action: "archive",
    payload: {
      title: "Status",
      text: "Weekly status notes",
      fields: { contact: "alice@example.com", ...fields },
    },
    ...overrides,
  });
}

describe("evaluateApproval with the default policy", () => {
  it("auto-approves a low-priority update from a known contact", () => {
    expect(evaluateApproval(routineUpdate(), DEFAULT_POLICY, ctx)).toEqual({
      required: false,
      rule: "low_priority_update",
    });
  });

  it("requires approval for sensitive keywords", () => {
    const task = routineUpdate({
      payload: { title: "Status", text: "Payment details attached", fields: { contact: "alice@example.com" } },
    });
    expect(evaluateApproval(task, DEFAULT_POLICY, ctx)).toEqual({
      required: true,
      rule: "sensitive_keyword",
    });
  });

  it("requires approval for batches over ten", () => {
    expect(evaluateApproval(routineUpdate({}, { batch_size: "11" }), DEFAULT_POLICY, ctx).rule).toBe(
      "large_batch"
    );
    expect(evaluateApproval(routineUpdate({}, { batch_size: "10" }), DEFAULT_POLICY, ctx).required).toBe(
      false
    );
  });

  it("requires approval for the first action on a platform", () => {
    const task = routineUpdate({}, { platform: "linkedin" });
    expect(evaluateApproval(task, DEFAULT_POLICY, ctx)).toEqual({
      required: true,
      rule: "first_action_on_platform",
    });
  });

  it("requires approval for a new contact", () => {
    const task = routineUpdate({}, { contact: "Bob@Example.com" });
    expect(evaluateApproval(task, DEFAULT_POLICY, ctx)).toEqual({
      required: true,
      rule: "new_contact",
    });
  });

  it("denies by default when no rule matches", () => {
    const task = routineUpdate({ intent: "post", priority: "medium", action: "social_post" });
    expect(evaluateApproval(task, DEFAULT_POLICY, ctx)).toEqual({ required: true, rule: null });
  });

  it("checks rules in order", () => {
    // Sensitive keyword and new contact both match; the sensitive rule is listed first
    const task = routineUpdate({}, { contact: "mallory@example.com" });
    task.payload.text = "Send the bank details";
    expect(evaluateApproval(task, DEFAULT_POLICY, ctx).rule).toBe("sensitive_keyword");
  });
});

describe("requiresApproval", () => {
  it("returns the verdict as a boolean", () => {
    expect(requiresApproval(routineUpdate(), DEFAULT_POLICY, ctx)).toBe(false);
    expect(requiresApproval(routineUpdate({ priority: "high" }), DEFAULT_POLICY, ctx)).toBe(true);
  });
});

describe("compilePolicy", () => {
  it("builds rules from configuration; all conditions of a rule must hold", () => {
    const config = parseConfig({
      approval: {
        rules: [
          {
            name: "trusted_whatsapp",
            when: [
              { type: "source_in", sources: ["whatsapp"] },
              { type: "domain_is", domain: "personal" },
            ],
            decision: "auto_approve",
          },
          { name: "everything_else", when: [{ type: "always" }], decision: "require" },
        ],
      },
    });
    const policy = compilePolicy(config.approval.rules ?? []);

    const personal = createTask({ source: "whatsapp", domain: "personal" });
    const business = createTask({ source: "whatsapp", domain: "business" });

    expect(evaluateApproval(personal, policy, ctx)).toEqual({ required: false, rule: "trusted_whatsapp" });
    expect(evaluateApproval(business, policy, ctx)).toEqual({ required: true, rule: "everything_else" });
  });
});

describe("actionKey / contactOf", () => {
  it("pairs the platform with the routed action", () => {
    expect(actionKey(routineUpdate())).toBe("gmail:archive");
    expect(actionKey(routineUpdate({}, { platform: "linkedin" }))).toBe("linkedin:archive");
  });

  it("reads the contact from contact or from, lower-cased", () => {
    expect(contactOf(createTask({ payload: { title: "", text: "", fields: { from: "Carol@Example.com" } } }))).toBe(
      "carol@example.com"
    );
    expect(contactOf(createTask())).toBeNull();
  });
});
