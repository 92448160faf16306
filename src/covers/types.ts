export type QueryKind = "artist" | "tag";

export type RoutedQuery = {
  readonly kind: QueryKind;
  readonly value: string;
  readonly forced: boolean;
};

export type Artist = {
  id: string;
  name: string;
};

export type ReleaseGroup = {
  id: string;
  title: string;
  firstReleaseDate?: string | undefined;
};

export type ReleaseGroupDetail = {
  id: string;
  title: string;
  artistName?: string | undefined;
  firstReleaseDate?: string | undefined;
  primaryType?: string | undefined;
  secondaryTypes: string[];
};

export type CoverResult = {
  readonly artist: string;
  readonly releaseTitle: string;
  readonly releaseDate?: string | undefined;
  readonly coverUrl: string;
};

/** "preview" asks the archive for its 500px rendition instead of the original. */
export type CoverSize = "original" | "preview";

/** Which step of the fallback chain produced a cover. */
export type CoverSource = "release-group" | `release:${string}` | "itunes";

export type ResolvedCover = {
  url: string;
  source: CoverSource;
};
