import type { MetadataRecord } from '../metadata/metadata.types.js';

export interface PosterAsset {
  externalId: string;
  fingerprint: string;
  image: Buffer;
  mimeType: string;
  renderedAt: number;
  /** fetchedAt of the record the image was rendered from */
  sourceFetchedAt: number;
}

export interface PosterRenderer {
  /** Bumped whenever the layout changes, which invalidates every stored asset */
  readonly templateVersion: string;
  readonly mimeType: string;
  render(record: MetadataRecord): Promise<Buffer>;
}
