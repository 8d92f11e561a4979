/**
 * CI artifact listing extraction
 *
 * Copying the artifact table of a CI run page yields plain text where the
 * header is tab-separated but each artifact spans two lines: its name, then
 * a tab-led line with the remaining cells.
 *
 *   Name \tSize \t
 *   wheels-linux-x86_64
 *   \t4.2 MB \t
 */

import { handleRaggedRow, normalizeText } from "../formats/dsv/utils";
import type { SplitTable } from "../types";

const ARTIFACT_MARKERS = ["wheels-", "artifact-", ".zip", ".tar.gz"] as const;

function tabCells(line: string): string[] {
  return line
    .split("\t")
    .map((cell) => cell.trim())
    .filter((cell) => cell !== "");
}

/**
 * True when the text carries the listing's header and an artifact-like name
 */
export function looksLikeArtifactListing(text: string): boolean {
  return (
    text.includes("Name") &&
    text.includes("\tSize") &&
    ARTIFACT_MARKERS.some((marker) => text.includes(marker))
  );
}

/**
 * Extract an artifact listing into pre-split rows
 *
 * @returns Rows with the header first and `hasHeader: true`, or null when
 * the text is not an artifact listing
 *
 * @example
 * ```typescript
 * extractArtifactListing("Name\tSize\nwheels-linux\n\t4.2 MB\t");
 * // { rows: [["Name", "Size"], ["wheels-linux", "4.2 MB"]], hasHeader: true }
 * ```
 */
export function extractArtifactListing(text: string): SplitTable | null {
  if (!looksLikeArtifactListing(text)) return null;

  const [headerLine = "", ...lines] = normalizeText(text).split("\n");
  const headers = tabCells(headerLine);
  if (!headers.includes("Name")) return null;

  const rows: string[][] = [];
  let pendingName: string | null = null;

  for (const line of lines) {
    if (!line.trim()) continue;

    if (line.startsWith("\t")) {
      // Detail line: belongs to the most recent name line
      if (pendingName !== null) {
        rows.push(handleRaggedRow([pendingName, ...tabCells(line)], headers.length));
        pendingName = null;
      }
    } else {
      pendingName = line.trim();
    }
  }

  return { rows: [headers, ...rows], hasHeader: true };
}
