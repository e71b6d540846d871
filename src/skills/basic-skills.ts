/**
 * Skills that answer directly or hand off to the browser.
 *
 * @module skills/basic-skills
 */

import type { Skill, UrlOpener } from './types.js';

/** Web apps the open skill knows by name. */
const KNOWN_APPS: ReadonlyMap<string, { label: string; url: string }> = new Map([
  ['youtube', { label: 'YouTube', url: 'https://www.youtube.com' }],
  ['spotify', { label: 'Spotify', url: 'https://open.spotify.com' }],
]);

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Format a time as a 12-hour clock, e.g. "07:05 PM".
 */
export function formatClockTime(date: Date): string {
  const hours = date.getHours();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  const minutes = date.getMinutes();
  const suffix = hours < 12 ? 'AM' : 'PM';
  return `${String(hour12).padStart(2, '0')}:${String(minutes).padStart(2, '0')} ${suffix}`;
}

export function createTimeSkill(now: () => Date): Skill {
  return async () => `The current time is ${formatClockTime(now())}.`;
}

/**
 * Opens known web apps; anything else is only acknowledged.
 */
export function createOpenAppSkill(openUrl: UrlOpener): Skill {
  return async (params) => {
    const appName = params.appName;
    if (!appName) {
      return 'No application name specified for opening.';
    }

    const known = KNOWN_APPS.get(appName.toLowerCase());
    if (!known) {
      return `Attempting to open ${appName}...`;
    }

    try {
      await openUrl(known.url);
      return `Opening ${known.label}...`;
    } catch (err) {
      process.stderr.write(`[skills] Failed to open browser for ${appName}: ${describeError(err)}\n`);
      return `Sorry, I encountered an error trying to open ${appName}.`;
    }
  };
}

export function createSearchWebSkill(openUrl: UrlOpener): Skill {
  return async (params) => {
    const query = params.query;
    if (!query) {
      return "You didn't specify what to search for.";
    }

    try {
      await openUrl(`https://www.google.com/search?${new URLSearchParams({ q: query }).toString()}`);
      return `Searching the web for '${query}'...`;
    } catch (err) {
      process.stderr.write(`[skills] Failed to open browser for search: ${describeError(err)}\n`);
      return `Sorry, I encountered an error trying to search for '${query}'.`;
    }
  };
}

// Placeholder until a forecast provider is wired in.
export const checkWeatherSkill: Skill = async () => 'Fetching the latest weather forecast for you.';

/**
 * Searches YouTube by default, or Spotify when the service names it.
 */
export function createPlayMediaSkill(openUrl: UrlOpener): Skill {
  return async (params) => {
    const title = params.mediaTitle;
    if (!title) {
      return 'You need to specify what song or video you want to play.';
    }

    const service = params.mediaService?.toLowerCase() ?? '';
    let serviceLabel = 'YouTube (default)';
    let url = `https://www.youtube.com/results?${new URLSearchParams({ search_query: title }).toString()}`;
    if (service.includes('youtube')) {
      serviceLabel = 'YouTube';
    } else if (service.includes('spotify')) {
      serviceLabel = 'Spotify';
      url = `https://open.spotify.com/search/${encodeURIComponent(title)}`;
    }

    try {
      await openUrl(url);
      return `Searching for '${title}' on ${serviceLabel}...`;
    } catch (err) {
      process.stderr.write(`[skills] Failed to open browser for media: ${describeError(err)}\n`);
      return `Sorry, I encountered an error trying to play '${title}' on ${serviceLabel}.`;
    }
  };
}
