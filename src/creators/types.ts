export type Platform = "instagram" | "tiktok";

export type Gender = "male" | "female";

export interface GenderSplit {
  male: number;
  female: number;
}

export interface CreatorMetrics {
  /** Audience credibility, 0-100. Only reported for Instagram. */
  credibilityScore: number | null;
  /** Fraction, e.g. 0.035 for 3.5%. */
  engagementRate: number | null;
  /** Six-month follower growth as a fraction; may be negative. */
  growthRate6m: number | null;
  /** Percentages keyed by gender. */
  audienceGenders: GenderSplit | null;
  /** Percentages keyed by age band ("18-24", "25-34", ...). */
  audienceAges: Record<string, number> | null;
  /** Percentages keyed by ISO 3166-1 alpha-2 code. */
  audienceGeography: Record<string, number> | null;
}

export interface CreatorRecord {
  id: string;
  platform: Platform;
  username: string;
  displayName: string | null;
  bio: string | null;
  /** 0 and null both mean the reach is unknown. */
  followerCount: number | null;
  interests: string[];
  primaryNiche: string | null;
  nicheConfidence: number | null;
  country: string | null;
  gender: Gender | null;
  brandMentions: string[];
  metrics: CreatorMetrics;
  verifiedAt: string | null;
  metricsComplete: boolean;
  externalId: string | null;
  isActive: boolean;
}

export type UnverifiedReason =
  | "failed"
  | "not_found"
  | "timeout"
  | "budget"
  | "upstream_unavailable";

export type VerificationState =
  | { kind: "verified"; source: "cache" | "provider"; verifiedAt: Date }
  | { kind: "unverified"; reason: UnverifiedReason };

export interface Candidate {
  creator: CreatorRecord;
  verification: VerificationState;
}

export const EMPTY_METRICS: CreatorMetrics = {
  credibilityScore: null,
  engagementRate: null,
  growthRate6m: null,
  audienceGenders: null,
  audienceAges: null,
  audienceGeography: null,
};
