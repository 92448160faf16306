import { releaseGroupUrl } from "../providers/musicbrainz.js";
import type { ReleaseGroupDetail } from "./types.js";

export type ReleaseGroupDocument = {
  id: string;
  title: string;
  text: string;
  url: string;
  metadata: { mb_release_group_id: string };
};

/** Plain-text detail document; lines for missing fields are left out. */
export function releaseGroupDocument(
  id: string,
  detail: ReleaseGroupDetail | null
): ReleaseGroupDocument {
  const title = detail?.title ?? "Unknown release-group";
  const artist = detail?.artistName;
  const url = releaseGroupUrl(id);

  const lines = [`Title: ${title}`];
  if (artist) lines.push(`Artist: ${artist}`);
  if (detail?.firstReleaseDate) lines.push(`First release: ${detail.firstReleaseDate}`);
  if (detail?.primaryType) lines.push(`Primary type: ${detail.primaryType}`);
  if (detail && detail.secondaryTypes.length > 0) {
    lines.push(`Secondary types: ${detail.secondaryTypes.join(", ")}`);
  }
  lines.push(`MusicBrainz URL: ${url}`);

  return {
    id,
    title: artist ? `${artist} — ${title}` : title,
    text: lines.join("\n"),
    url,
    metadata: { mb_release_group_id: id },
  };
}
