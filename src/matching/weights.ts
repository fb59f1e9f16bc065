import { ConfigurationError } from "../shared/errors";
import { MATCH_CATEGORIES, MatchCategory, MatchWeights } from "../shared/types/match.types";

const WEIGHT_SUM_TOLERANCE = 1e-6;

export const DEFAULT_MATCH_WEIGHTS: Readonly<MatchWeights> = Object.freeze({
  skills: 0.4,
  experience: 0.3,
  education: 0.2,
  additional: 0.1,
});

export function validateWeights(weights: Record<string, number>): MatchWeights {
  const unknownKeys = Object.keys(weights).filter((key) => !isMatchCategory(key));
  if (unknownKeys.length > 0) {
    throw new ConfigurationError(`Unknown match weight categories: ${unknownKeys.join(", ")}`);
  }

  const validated: MatchWeights = {
    skills: readWeight(weights, "skills"),
    experience: readWeight(weights, "experience"),
    education: readWeight(weights, "education"),
    additional: readWeight(weights, "additional"),
  };
  const sum = MATCH_CATEGORIES.reduce((total, category) => total + validated[category], 0);

  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new ConfigurationError(`Match weights must sum to 1.0, got ${sum}`);
  }
  return Object.freeze(validated);
}

/**
 * Reads `skills=0.5,experience=0.3,...` or a JSON object. Categories not named
 * keep their default weight; the result is validated as a whole.
 */
export function parseWeightsOverride(raw: string): MatchWeights {
  const text = raw.trim();
  if (!text) {
    return validateWeights({ ...DEFAULT_MATCH_WEIGHTS });
  }

  const overrides: Record<string, number> = {};
  if (text.startsWith("{")) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw new ConfigurationError(`Match weights are not valid JSON: ${text}`);
    }
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new ConfigurationError("Match weights JSON must be an object");
    }
    for (const [key, value] of Object.entries(parsed)) {
      overrides[key.trim().toLowerCase()] = typeof value === "number" ? value : Number.NaN;
    }
  } else {
    for (const pair of text.split(",")) {
      const [key, value] = pair.split("=").map((part) => part.trim());
      if (!key || value === undefined) {
        throw new ConfigurationError(`Malformed match weight entry: "${pair.trim()}"`);
      }
      overrides[key.toLowerCase()] = value === "" ? Number.NaN : Number(value);
    }
  }

  return validateWeights({ ...DEFAULT_MATCH_WEIGHTS, ...overrides });
}

function readWeight(weights: Record<string, number>, category: MatchCategory): number {
  const weight = weights[category];
  if (typeof weight !== "number" || !Number.isFinite(weight)) {
    throw new ConfigurationError(`Missing or non-numeric match weight for ${category}`);
  }
  if (weight < 0) {
    throw new ConfigurationError(`Match weight for ${category} must not be negative: ${weight}`);
  }
  return weight;
}

function isMatchCategory(value: string): value is MatchCategory {
  return MATCH_CATEGORIES.some((category) => category === value);
}
