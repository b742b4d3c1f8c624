import { NoCandidatesError, InvalidSelectionError } from '../../lib/errors.js';
import { createChildLogger } from '../../lib/logger.js';
import type { CandidateRecord } from '../metadata/metadata.types.js';
import { normalizeTitle } from '../query/query.normalizer.js';
import type { NormalizedQuery } from '../query/query.types.js';

const logger = createChildLogger('ambiguity-resolver');

export interface RankedCandidate {
  candidate: CandidateRecord;
  score: number;
}

export interface Selection {
  query: NormalizedQuery;
  options: RankedCandidate[];
}

export type Decision =
  | { kind: 'auto'; choice: RankedCandidate }
  | { kind: 'selection'; selection: Selection };

export interface ResolverOptions {
  autoSelectMargin: number;
  maxOptions: number;
}

/** Exact title and year */
const EXACT_TIER = 2;
/** Title match with the year off by at most one, or unknown on either side */
const NEAR_TIER = 1;
/** Score step per tier; larger than any popularity share */
const TIER_WEIGHT = 2;

function tierOf(query: NormalizedQuery, candidate: CandidateRecord): number {
  if (normalizeTitle(candidate.title) !== query.title) return 0;
  if (query.year === undefined || candidate.year === undefined) return NEAR_TIER;

  const distance = Math.abs(candidate.year - query.year);
  if (distance === 0) return EXACT_TIER;
  return distance === 1 ? NEAR_TIER : 0;
}

export class AmbiguityResolver {
  constructor(private readonly options: ResolverOptions) {}

  /**
   * Order candidates by match tier, then popularity, then remote order.
   * The score (tier weight plus popularity share) only feeds the auto-select margin.
   */
  rank(query: NormalizedQuery, candidates: CandidateRecord[]): RankedCandidate[] {
    const maxPopularity = Math.max(0, ...candidates.map((c) => c.popularity));

    return candidates
      .map((candidate, index) => {
        const tier = tierOf(query, candidate);
        const share = maxPopularity > 0 ? candidate.popularity / maxPopularity : 0;
        return { candidate, tier, index, score: tier * TIER_WEIGHT + share };
      })
      .sort((a, b) => b.tier - a.tier || b.candidate.popularity - a.candidate.popularity || a.index - b.index)
      .map(({ candidate, score }) => ({ candidate, score }));
  }

  /** Auto-pick a clear winner, or hand back the top options for a human */
  resolve(query: NormalizedQuery, candidates: CandidateRecord[]): Decision {
    const ranked = this.rank(query, candidates);
    const [top, second] = ranked;

    if (!top) {
      throw new NoCandidatesError(query.title, query.year);
    }

    if (!second || top.score - second.score >= this.options.autoSelectMargin) {
      logger.debug({ query, externalId: top.candidate.externalId, score: top.score }, 'Auto-selected candidate');
      return { kind: 'auto', choice: top };
    }

    logger.debug({ query, options: ranked.length }, 'Candidates too close, selection needed');
    return {
      kind: 'selection',
      selection: { query, options: ranked.slice(0, this.options.maxOptions) },
    };
  }

  /** Validate an externally supplied choice against the offered options */
  pick(queryId: string, selection: Selection, candidateId: string): RankedCandidate {
    const option = selection.options.find((o) => o.candidate.externalId === candidateId);
    if (!option) {
      throw new InvalidSelectionError(queryId, candidateId);
    }
    return option;
  }
}
