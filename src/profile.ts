/**
 * Read basic details from a user's public profile page
 */

import { type GoodreadsClient, loadHtml } from "./client.js";
import { FetchError } from "./errors.js";
import type { ProfileInfo } from "./types.js";
import { cleanText } from "./utils.js";

const MEMBER_SINCE = "Member since";

/**
 * Parse profile details from profile page markup.
 * Fields missing from the page are left undefined.
 */
export function parseProfile(html: string): ProfileInfo {
  const $ = loadHtml(html);

  const displayName = cleanText($("h1.userProfileName").first().text());
  const location = cleanText($("span.userLocation").first().text());
  const joined = $("span")
    .toArray()
    .map((span) => cleanText($(span).text()))
    .find((text) => text.includes(MEMBER_SINCE));

  return {
    displayName: displayName || undefined,
    location: location || undefined,
    memberSince: joined?.replace(MEMBER_SINCE, "").trim() || undefined,
  };
}

/**
 * Fetch and parse a profile. A failed request yields an empty profile.
 */
export async function scrapeProfile(client: Pick<GoodreadsClient, "profileUrl" | "fetchHtml">, username: string): Promise<ProfileInfo> {
  try {
    const html = await client.fetchHtml(client.profileUrl(username));
    return parseProfile(html);
  } catch (error) {
    if (!(error instanceof FetchError)) throw error;
    console.error(`Error scraping profile: ${error.message}`);
    return {};
  }
}

/**
 * Format the profile fields that were found, one per line.
 */
export function formatProfile(profile: ProfileInfo): string[] {
  const lines: string[] = [];
  if (profile.displayName) lines.push(`  Name: ${profile.displayName}`);
  if (profile.location) lines.push(`  Location: ${profile.location}`);
  if (profile.memberSince) lines.push(`  Member since: ${profile.memberSince}`);
  return lines;
}
