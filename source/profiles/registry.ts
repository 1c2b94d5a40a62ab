import { z } from "zod";
import {
  InvalidProfileDefinitionError,
  UnknownProfileError,
} from "../errors.ts";

export const strategies = [
  "full",
  "sparse_balanced",
  "sparse_aggressive",
  "minimal",
] as const;

export type Strategy = (typeof strategies)[number];

export const builtinProfileNames = [
  "quality",
  "balanced",
  "budget",
  "tiny",
] as const;

export type ProfileName = (typeof builtinProfileNames)[number] | (string & {});

export const ProfileSchema = z.object({
  name: z.string().min(1, "name must not be empty"),
  capacityTokens: z
    .number()
    .int("capacityTokens must be an integer")
    .positive("capacityTokens must be positive"),
  targetPercent: z
    .number()
    .int("targetPercent must be an integer")
    .gt(0, "targetPercent must be greater than 0")
    .lte(100, "targetPercent must be at most 100"),
  strategy: z.enum(strategies),
});

export type Profile = Readonly<z.infer<typeof ProfileSchema>>;

export const builtinProfiles: readonly Profile[] = [
  {
    name: "quality",
    capacityTokens: 200_000,
    targetPercent: 30,
    strategy: "full",
  },
  {
    name: "balanced",
    capacityTokens: 100_000,
    targetPercent: 25,
    strategy: "sparse_balanced",
  },
  {
    name: "budget",
    capacityTokens: 32_000,
    targetPercent: 15,
    strategy: "sparse_aggressive",
  },
  {
    name: "tiny",
    capacityTokens: 8_000,
    targetPercent: 8,
    strategy: "minimal",
  },
];

/**
 * Absolute token allowance for delegation payloads. Always derived, never
 * cached on the profile.
 */
export function budgetTokens(profile: Profile): number {
  return Math.floor((profile.capacityTokens * profile.targetPercent) / 100);
}

export class ProfileRegistry {
  private profiles = new Map<string, Profile>();

  constructor(initial: readonly Profile[] = []) {
    for (const profile of initial) {
      this.register(profile);
    }
  }

  /**
   * Inserts or replaces a profile by name. Last write wins.
   * @throws InvalidProfileDefinitionError
   */
  register(profile: Profile): void {
    const result = ProfileSchema.safeParse(profile);
    if (!result.success) {
      throw new InvalidProfileDefinitionError(
        profile.name || "(unnamed)",
        result.error.issues.map((issue) => issue.message),
      );
    }
    this.profiles.set(result.data.name, Object.freeze({ ...result.data }));
  }

  /**
   * @throws UnknownProfileError
   */
  resolve(name: string): Profile {
    const profile = this.profiles.get(name);
    if (!profile) {
      throw new UnknownProfileError(name, this.names());
    }
    return profile;
  }

  has(name: string): boolean {
    return this.profiles.has(name);
  }

  names(): string[] {
    return Array.from(this.profiles.keys());
  }

  snapshot(): readonly Profile[] {
    return Object.freeze(Array.from(this.profiles.values()));
  }
}

export function createDefaultRegistry(): ProfileRegistry {
  return new ProfileRegistry(builtinProfiles);
}
