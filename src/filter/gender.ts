import { readFileSync } from "node:fs";
import { z } from "zod";
import type { CreatorRecord, Gender, GenderSplit } from "../creators/types.js";

const GenderSignalsFileSchema = z.object({
  female_names: z.array(z.string()),
  male_names: z.array(z.string()),
  female_bio_signals: z.array(z.string()),
  male_bio_signals: z.array(z.string()),
});

export interface GenderSignals {
  femaleNames: ReadonlySet<string>;
  maleNames: ReadonlySet<string>;
  femaleBio: ReadonlySet<string>;
  maleBio: ReadonlySet<string>;
}

// An audience this skewed towards one gender usually follows a creator of the other.
const AUDIENCE_SKEW_PCT = 65;
const MIN_USERNAME_SEGMENT = 3;
const MIN_PREFIX_NAME = 4;

const lower = (values: string[]) => new Set(values.map((v) => v.trim().toLowerCase()));

export function parseGenderSignals(jsonContent: string): GenderSignals {
  const file = GenderSignalsFileSchema.parse(JSON.parse(jsonContent));
  return {
    femaleNames: lower(file.female_names),
    maleNames: lower(file.male_names),
    femaleBio: lower(file.female_bio_signals),
    maleBio: lower(file.male_bio_signals),
  };
}

export function loadGenderSignals(filePath: string): GenderSignals {
  return parseGenderSignals(readFileSync(filePath, "utf-8"));
}

export function audienceSignal(genders: GenderSplit | null): Gender | null {
  if (!genders) return null;
  if (genders.male > AUDIENCE_SKEW_PCT) return "female";
  if (genders.female > AUDIENCE_SKEW_PCT) return "male";
  return null;
}

export function bioSignal(bio: string | null, signals: GenderSignals): Gender | null {
  if (!bio) return null;
  const tokens = bio.toLowerCase().split(/[^\p{L}\p{N}/]+/u);
  let female = 0;
  let male = 0;
  for (const token of tokens) {
    if (signals.femaleBio.has(token)) female++;
    if (signals.maleBio.has(token)) male++;
  }
  if (female > male) return "female";
  if (male > female) return "male";
  return null;
}

function stripDecorations(word: string): string {
  return word.replace(/^[^\p{L}]+|[^\p{L}]+$/gu, "");
}

export function nameSignal(
  displayName: string | null,
  username: string | null,
  signals: GenderSignals
): Gender | null {
  if (displayName) {
    // NFKC folds the "fancy font" code points people use in display names.
    const normalized = displayName.normalize("NFKC").trim();
    const first = stripDecorations(normalized.split(/[\s|·•\-_]+/u)[0].toLowerCase());
    if (signals.femaleNames.has(first)) return "female";
    if (signals.maleNames.has(first)) return "male";
  }

  if (username) {
    const segment = username.trim().replace(/^_+|_+$/g, "").split(/[_\d.]/)[0].toLowerCase();
    if (segment.length < MIN_USERNAME_SEGMENT) return null;
    if (signals.femaleNames.has(segment)) return "female";
    if (signals.maleNames.has(segment)) return "male";
    for (const name of signals.femaleNames) {
      if (name.length >= MIN_PREFIX_NAME && segment.startsWith(name)) return "female";
    }
    for (const name of signals.maleNames) {
      if (name.length >= MIN_PREFIX_NAME && segment.startsWith(name)) return "male";
    }
  }
  return null;
}

/**
 * A pre-computed gender on the record wins. Otherwise the three signals vote
 * and a tie, including no votes at all, is unknown.
 */
export function inferGender(creator: CreatorRecord, signals: GenderSignals): Gender | null {
  if (creator.gender) return creator.gender;

  const votes = [
    audienceSignal(creator.metrics.audienceGenders),
    bioSignal(creator.bio, signals),
    nameSignal(creator.displayName, creator.username, signals),
  ];
  const female = votes.filter((v) => v === "female").length;
  const male = votes.filter((v) => v === "male").length;
  if (female > male) return "female";
  if (male > female) return "male";
  return null;
}
