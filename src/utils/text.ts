import { load } from 'cheerio';

const SITE_TITLE_SUFFIX = /\s*-\s*YouTube\s*$/;

// Page titles arrive as "<playlist name> - YouTube"
export function cleanPageTitle(input: string): string {
  if (!input) return input;
  let s = input.replace(SITE_TITLE_SUFFIX, '');
  s = s.replace(/\s{2,}/g, ' ');
  return s.trim();
}

export function padIndex(index: number, width: number): string {
  return String(index).padStart(width, '0');
}

// Literal `<` is kept as text; only character references are decoded
export function decodeEntities(input: string): string {
  if (!input.includes('&')) return input;
  return load(input.replace(/</g, '&lt;'), null, false).root().text();
}
