import { logger } from "../logger.ts";
import { type DetectionOptions, detectProfile } from "./detector.ts";
import type { Profile, ProfileRegistry } from "./registry.ts";

export interface ProfileSelection {
  profile: Profile;
  source: "override" | "detected" | "default";
}

/**
 * An explicit override is resolved strictly and throws UnknownProfileError
 * when missing. Auto-detection never fails: a detected name that is not
 * registered falls back to the default profile.
 */
export function selectProfile(
  {
    profileOverride,
    model,
  }: { profileOverride?: string | undefined; model?: string | undefined },
  registry: ProfileRegistry,
  detection: DetectionOptions = {},
): ProfileSelection {
  if (profileOverride) {
    return { profile: registry.resolve(profileOverride), source: "override" };
  }

  const fallback = detection.defaultProfile ?? "balanced";

  if (model) {
    const detected = detectProfile(model, detection);
    if (registry.has(detected)) {
      logger.debug({ model, profile: detected }, "Detected profile");
      return { profile: registry.resolve(detected), source: "detected" };
    }
    logger.warn(
      { model, profile: detected },
      "Detected profile is not registered, using default",
    );
  }

  return { profile: registry.resolve(fallback), source: "default" };
}
