import { createHash } from "node:crypto";
import { AssessmentReport } from "../shared/types/assessment.types";
import { Decision } from "../shared/types/decision.types";
import { MatchAnalysis } from "../shared/types/match.types";
import { CandidateProfile, JobRequirement } from "../shared/types/profile.types";

export interface IngestedCandidate {
  profile: CandidateProfile;
  requirement: JobRequirement;
  notes: string[];
}

export interface StageArtifacts {
  ingestion: IngestedCandidate;
  matching: MatchAnalysis;
  assessment: AssessmentReport;
  decision: Decision;
}

interface CachedSlot<T> {
  fingerprint: string;
  value: T;
}

type StageSlots = { [S in keyof StageArtifacts]?: CachedSlot<StageArtifacts[S]> };

export const DEFAULT_CACHE_MAX_CANDIDATES = 500;

/**
 * Finished stage artifacts per candidate id, each tagged with a fingerprint
 * of the inputs it was computed from. A lookup with a different fingerprint
 * misses, and the next write replaces the slot. The least recently used
 * candidate is evicted once `maxCandidates` is exceeded.
 */
export class CandidateResultCache {
  private readonly entries = new Map<string, StageSlots>();
  private readonly maxCandidates: number;

  constructor(options: { maxCandidates?: number } = {}) {
    this.maxCandidates = Math.max(1, Math.floor(options.maxCandidates ?? DEFAULT_CACHE_MAX_CANDIDATES));
  }

  get<S extends keyof StageArtifacts>(
    candidateId: string,
    stage: S,
    fingerprint: string,
  ): StageArtifacts[S] | undefined {
    const entry = this.touch(candidateId);
    const slot = entry?.[stage];
    return slot && slot.fingerprint === fingerprint ? slot.value : undefined;
  }

  /** Returns `false` when the slot already holds a value for the same fingerprint. */
  set<S extends keyof StageArtifacts>(
    candidateId: string,
    stage: S,
    fingerprint: string,
    value: StageArtifacts[S],
  ): boolean {
    let entry = this.touch(candidateId);
    if (!entry) {
      entry = {};
      this.entries.set(candidateId, entry);
      this.evict();
    }
    if (entry[stage]?.fingerprint === fingerprint) {
      return false;
    }
    const slot: StageSlots[S] = { fingerprint, value };
    entry[stage] = slot;
    return true;
  }

  get size(): number {
    return this.entries.size;
  }

  private touch(candidateId: string): StageSlots | undefined {
    const entry = this.entries.get(candidateId);
    if (entry) {
      this.entries.delete(candidateId);
      this.entries.set(candidateId, entry);
    }
    return entry;
  }

  private evict(): void {
    for (const candidateId of this.entries.keys()) {
      if (this.entries.size <= this.maxCandidates) {
        return;
      }
      this.entries.delete(candidateId);
    }
  }
}

/** sha256 of the key-sorted JSON form, so property order never changes the fingerprint. */
export function fingerprintOf(value: unknown): string {
  return createHash("sha256").update(stableJson(value)).digest("hex");
}

function stableJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableJson(item)).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const fields = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
      .map(([key, item]) => `${JSON.stringify(key)}:${stableJson(item)}`);
    return `{${fields.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}
