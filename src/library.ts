import { readFile } from "node:fs/promises";
import { z } from "zod";
import { CatalogError } from "./errors";
import { MOOD_CATEGORIES, type MoodCategory, type MoodProfile } from "./types";

const moodSchema = z.enum(MOOD_CATEGORIES);

const profileSchema = z
  .object({
    description: z.string().default(""),
    tempoRange: z.tuple([z.number().positive(), z.number().positive()]),
    volume: z.number().min(0).max(1),
    duckRatio: z.number().min(0).lt(1),
    searchTerms: z.array(z.string()).default([])
  })
  .refine((p) => p.tempoRange[0] <= p.tempoRange[1], { message: "tempoRange min must not exceed max" });

const librarySchema = z.object({
  version: z.string().optional(),
  defaultMood: moodSchema.nullable().default(null),
  moods: z.object({
    supportive_gentle: profileSchema,
    hopeful_uplifting: profileSchema,
    tense_to_calm: profileSchema,
    reflective_emotional: profileSchema,
    energetic_motivating: profileSchema
  }),
  contentTypes: z.record(z.string(), moodSchema),
  emotionalContexts: z.record(z.string(), moodSchema).default({})
});

export type LibraryConfig = {
  defaultMood: MoodCategory | null;
  profiles: Record<MoodCategory, MoodProfile>;
  contentTypes: Record<string, MoodCategory>;
  emotionalContexts: Record<string, MoodCategory>;
};

export function parseLibraryConfig(input: unknown): LibraryConfig {
  const result = librarySchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join(".")} ${i.message}`).join("; ");
    throw new CatalogError(`Invalid music library config: ${detail}`);
  }
  const { moods, contentTypes, emotionalContexts, defaultMood } = result.data;
  const profiles: Record<MoodCategory, MoodProfile> = {
    supportive_gentle: { mood: "supportive_gentle", ...moods.supportive_gentle },
    hopeful_uplifting: { mood: "hopeful_uplifting", ...moods.hopeful_uplifting },
    tense_to_calm: { mood: "tense_to_calm", ...moods.tense_to_calm },
    reflective_emotional: { mood: "reflective_emotional", ...moods.reflective_emotional },
    energetic_motivating: { mood: "energetic_motivating", ...moods.energetic_motivating }
  };
  return { defaultMood, profiles, contentTypes, emotionalContexts };
}

export async function loadLibraryConfig(filePath: string): Promise<LibraryConfig> {
  const raw = await readFile(filePath, "utf-8");
  return parseLibraryConfig(JSON.parse(raw));
}
