import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
  DEFAULT_PROFILE,
  defaultDetectionRules,
  detectProfile,
  matchRule,
} from "../../source/profiles/detector.ts";

describe("detectProfile", () => {
  it("maps well-known model families", () => {
    assert.equal(detectProfile("claude-3-opus-20240229"), "quality");
    assert.equal(detectProfile("claude-3-sonnet-20240229"), "balanced");
    assert.equal(detectProfile("claude-3-haiku-20240307"), "budget");
    assert.equal(detectProfile("mistral-7b"), "tiny");
  });

  it("falls back to balanced for unknown identifiers", () => {
    assert.equal(DEFAULT_PROFILE, "balanced");
    assert.equal(detectProfile("completely-unknown-model"), "balanced");
    assert.equal(detectProfile(""), "balanced");
  });

  it("matches case-insensitively", () => {
    assert.equal(detectProfile("Claude-3-OPUS"), "quality");
    assert.equal(detectProfile("LLAMA-3-70B-Instruct"), "budget");
  });

  it("recognizes context-size markers", () => {
    assert.equal(detectProfile("custom-200k"), "quality");
    assert.equal(detectProfile("custom-100k"), "balanced");
    assert.equal(detectProfile("gpt-4-32k"), "budget");
    assert.equal(detectProfile("tiny-8k"), "tiny");
    assert.equal(detectProfile("llama-3.1-8b-instruct"), "tiny");
  });

  it("lets the first matching rule win", () => {
    // "opus" precedes "7b" in the rule list
    assert.equal(detectProfile("opus-distilled-7b"), "quality");
  });

  it("checks custom rules before the defaults", () => {
    const rules = [{ pattern: "sonnet-lite", profile: "budget" }];
    assert.equal(detectProfile("sonnet-lite-1", { rules }), "budget");
    assert.equal(detectProfile("sonnet-4", { rules }), "balanced");
  });

  it("uses the configured default when nothing matches", () => {
    assert.equal(
      detectProfile("unknown", { defaultProfile: "tiny" }),
      "tiny",
    );
  });
});

describe("matchRule", () => {
  it("returns the matching rule itself", () => {
    assert.deepEqual(matchRule("claude-3-haiku", defaultDetectionRules), {
      pattern: "haiku",
      profile: "budget",
    });
  });

  it("ignores empty patterns", () => {
    assert.equal(
      matchRule("anything", [{ pattern: "", profile: "tiny" }]),
      undefined,
    );
  });
});
