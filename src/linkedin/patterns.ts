import type { Profile } from "../pipeline/types.js";

const PROFILE_URL = /(?:https?:\/\/)?(?:[a-z]{2,3}\.)?(?:www\.)?linkedin\.com\/in\/([\w%-]+)/i;
// The handle must end the token; "LinkedIn: linkedin.com/..." or "LinkedIn: https://..." is no handle.
const SHORTHAND = /(?:^|[\s(|,;])@?linkedin\s*:\s*@?([\w-]+)(?=$|[\s|,;)]|[.!?](?:\s|$))/i;
const PARTIAL_PATH = /(?:^|[\s/])in\/([\w%-]+)/i;

const COMPANY = String.raw`([A-Z][\w&-]*(?:\s+(?:&\s+)?[A-Z][\w&-]*)*)`;
const COMPANY_PATTERNS: readonly RegExp[] = [
  new RegExp(
    String.raw`\b(?:CEO|CTO|COO|CFO|CPO|VP|Director|Manager|Lead|Head|Engineer|[Ff]ounder|Co-?[Ff]ounder)\s+(?:of|at|@)\s*` +
      COMPANY,
  ),
  new RegExp(String.raw`\b[Ww]ork(?:ing|s)\s+(?:at|for)\s+` + COMPANY),
  new RegExp(String.raw`(?:^|\s)(?:@|at\s+)` + COMPANY),
];
const LEGAL_SUFFIX = /\s+(?:Inc|LLC|Corp|Ltd|Co|GmbH)\.?$/i;

export const PROFILE_URL_PREFIX = "https://www.linkedin.com/in/";
const SEARCH_URL_PREFIX = "https://www.linkedin.com/search/results/people/?keywords=";

export function normalizeProfileUrl(slug: string): string {
  return PROFILE_URL_PREFIX + slug.toLowerCase();
}

/** First profile URL in free text, normalized; accepts bare domains and `in/<slug>` paths. */
export function findProfileUrl(text: string): string | undefined {
  const full = PROFILE_URL.exec(text);
  if (full?.[1]) return normalizeProfileUrl(full[1]);

  const partial = PARTIAL_PATH.exec(text);
  if (partial?.[1]) return normalizeProfileUrl(partial[1]);

  return undefined;
}

function scan(text: string): string | undefined {
  const full = PROFILE_URL.exec(text);
  if (full?.[1]) return normalizeProfileUrl(full[1]);

  const shorthand = SHORTHAND.exec(text);
  if (shorthand?.[1]) return normalizeProfileUrl(shorthand[1]);

  return undefined;
}

/** Profile URL stated by the counterpart themselves, website first, then bio. */
export function extractLinkedInUrl(profile: Pick<Profile, "website" | "bio">): string | undefined {
  for (const text of [profile.website, profile.bio]) {
    if (!text) continue;
    const url = scan(text);
    if (url) return url;
  }
  return undefined;
}

export function extractCompany(bio: string | undefined): string | undefined {
  if (!bio) return undefined;

  for (const pattern of COMPANY_PATTERNS) {
    const match = pattern.exec(bio);
    if (!match?.[1]) continue;
    const company = match[1].trim().replace(LEGAL_SUFFIX, "");
    if (company.length > 2 && company.length < 50) return company;
  }
  return undefined;
}

function plusEncode(value: string): string {
  return encodeURIComponent(value).replace(/%20/g, "+");
}

/** People-search URL for checking a counterpart by hand. */
export function searchUrl(name: string, location?: string): string {
  const clean = (value: string) => value.replace(/[^\p{L}\p{N}\s]/gu, "").trim();
  let query = plusEncode(clean(name));
  if (location) {
    query += `%20${plusEncode(clean(location))}`;
  }
  return SEARCH_URL_PREFIX + query;
}
