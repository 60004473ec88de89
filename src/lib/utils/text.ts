/**
 * Text helpers shared by normalization and rendering
 */

import * as cheerio from "cheerio";

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Plain text of an HTML fragment, entities decoded
 */
export function htmlToText(html: string): string {
  if (!html) return "";
  if (!/[<&]/.test(html)) return collapseWhitespace(html);

  const $ = cheerio.load(`<div id="root">${html}</div>`);
  $("script, style").remove();
  // Keep words on either side of block boundaries apart
  $("br, p, div, li, tr").after(" ");
  return collapseWhitespace($("#root").text());
}

/**
 * Whether the text contains at least one Hangul syllable
 */
export function hasHangul(text: string): boolean {
  return /[가-힣]/.test(text);
}

export function truncate(text: string, maxLength: number, suffix = "…"): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, Math.max(0, maxLength - suffix.length)).trimEnd() + suffix;
}
