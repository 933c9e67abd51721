import { load } from 'cheerio';
import { ExtractionError, MalformedDataError } from '../../errors';
import { PlaylistMetadata } from '../../types/playlist';
import { logDebug } from '../../utils/logger';
import { cleanPageTitle } from '../../utils/text';

// Older pages assign through window[...], newer ones through a var
const INITIAL_DATA_MARKERS: ReadonlyArray<{ name: string; pattern: RegExp }> = [
  { name: 'window["ytInitialData"]', pattern: /window\["ytInitialData"\] = ([^\n]+)/ },
  { name: 'var ytInitialData', pattern: /var ytInitialData = ([^\n]+)/ },
];

const LAST_UPDATED_PATTERN = /<li>Last updated on (\w{3}) (\d{1,2}), (\d{4})<\/li>/;

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

/**
 * Parses a JSON document, turning syntax errors into MalformedDataError.
 */
export function parseJson(raw: string, source: string): unknown {
  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    throw new MalformedDataError(source, error);
  }
}

function trimAssignment(literal: string): string {
  let s = literal;
  const scriptEnd = s.indexOf(';</script>');
  if (scriptEnd !== -1) s = s.slice(0, scriptEnd);
  s = s.trimEnd();
  if (s.endsWith(';')) s = s.slice(0, -1);
  return s;
}

/**
 * Locates the initial-data assignment in the listing page and returns the
 * decoded JSON value it assigns.
 */
export function extractInitialData(html: string): unknown {
  for (const marker of INITIAL_DATA_MARKERS) {
    const match = marker.pattern.exec(html);
    const literal = match?.[1];
    if (literal === undefined) continue;
    logDebug('initial_data_marker_found', { marker: marker.name, length: literal.length });
    return parseJson(trimAssignment(literal), 'initial data');
  }
  throw new ExtractionError(INITIAL_DATA_MARKERS.map((m) => m.name));
}

function extractTitle(html: string): string | null {
  const $ = load(html);
  const raw = $('title').first().text();
  const title = cleanPageTitle(raw);
  return title ? title : null;
}

function extractLastUpdated(html: string): Date | null {
  const match = LAST_UPDATED_PATTERN.exec(html);
  if (!match) return null;
  const [, monthName = '', day = '', year = ''] = match;
  const month = MONTHS.indexOf(monthName.toLowerCase());
  if (month === -1) return null;
  const dayNum = Number(day);
  const date = new Date(Date.UTC(Number(year), month, dayNum));
  // Reject overflow such as "Feb 31"
  if (date.getUTCMonth() !== month || date.getUTCDate() !== dayNum) return null;
  return date;
}

/**
 * Reads the playlist title and last-update date from the listing page.
 * Missing values are null.
 */
export function extractPlaylistMetadata(html: string): PlaylistMetadata {
  return {
    title: extractTitle(html),
    lastUpdated: extractLastUpdated(html),
  };
}
