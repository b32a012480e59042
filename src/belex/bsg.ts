// "BSG 432.311", "BSG_432_311.pdf", "BSG 153.01-1"
const BSG_PATTERN = /BSG[\s_]?([\d.]+(?:-\d+)?)/;

export const DEFAULT_BELEX_API_BASE_URL =
  'https://www.belex.sites.be.ch/api/de/texts_of_law';

/** BSG number contained in a document title, or null. */
export function extractBsgNumber(title: string): string | null {
  const match = BSG_PATTERN.exec(title);
  return match ? match[1] : null;
}

export function lawUrl(
  bsgNumber: string,
  baseUrl: string = DEFAULT_BELEX_API_BASE_URL,
): string {
  return `${baseUrl}/${bsgNumber}`;
}

/** Rechtsbuch (top-level volume) of a BSG number: "430" for "430.11". */
export function rechtsbuchOf(bsgNumber: string): string {
  return bsgNumber.split('.')[0];
}
