import type { NormalizedQuery } from '../query/query.types.js';

export interface CandidateRecord {
  externalId: string;
  title: string;
  year?: number;
  posterSource?: string;
  popularity: number;
}

export interface MetadataRecord {
  externalId: string;
  title: string;
  year?: number;
  synopsis: string;
  rating: number;
  genres: string[];
  posterSource?: string;
  language?: string;
  /** Epoch ms of the remote fetch that produced this record */
  fetchedAt: number;
}

export interface StoredMetadata {
  record: MetadataRecord;
  version: number;
}

/** Remote movie database. */
export interface MovieSource {
  fetchCandidates(query: NormalizedQuery, signal?: AbortSignal): Promise<CandidateRecord[]>;
  fetchFullRecord(externalId: string, signal?: AbortSignal): Promise<MetadataRecord>;
}

/** A MovieSource that can be addressed by name and recognizes its own ids. */
export interface CatalogSource extends MovieSource {
  readonly name: string;
  ownsId(externalId: string): boolean;
}
