import type { ProfileName } from "./registry.ts";

export interface DetectionRule {
  pattern: string;
  profile: ProfileName;
}

export const DEFAULT_PROFILE: ProfileName = "balanced";

// Evaluated top to bottom; the first rule whose pattern occurs in the
// lower-cased identifier wins.
export const defaultDetectionRules: readonly DetectionRule[] = [
  { pattern: "opus", profile: "quality" },
  { pattern: "200k", profile: "quality" },
  { pattern: "ultra", profile: "quality" },
  { pattern: "sonnet", profile: "balanced" },
  { pattern: "100k", profile: "balanced" },
  { pattern: "haiku", profile: "budget" },
  { pattern: "70b", profile: "budget" },
  { pattern: "32k", profile: "budget" },
  { pattern: "7b", profile: "tiny" },
  { pattern: "8b", profile: "tiny" },
  { pattern: "8k", profile: "tiny" },
];

export interface DetectionOptions {
  /** Checked before the default rules. */
  rules?: readonly DetectionRule[];
  defaultProfile?: ProfileName;
}

export function matchRule(
  modelIdentifier: string,
  rules: readonly DetectionRule[],
): DetectionRule | undefined {
  const id = modelIdentifier.toLowerCase();
  return rules.find(
    (rule) =>
      rule.pattern.length > 0 && id.includes(rule.pattern.toLowerCase()),
  );
}

/**
 * Maps a free-text model identifier to a profile name. Never throws: an
 * unrecognized identifier resolves to the default profile.
 */
export function detectProfile(
  modelIdentifier: string,
  options: DetectionOptions = {},
): ProfileName {
  const rules = [...(options.rules ?? []), ...defaultDetectionRules];
  const match = matchRule(modelIdentifier, rules);
  return match?.profile ?? options.defaultProfile ?? DEFAULT_PROFILE;
}
