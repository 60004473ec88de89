/**
 * Message rendering for Telegram (MarkdownV2)
 */

import type { NormalizedItem } from "../model";
import { getCategoryConfig } from "../../config/categories";
import { formatLocal, KST_OFFSET_MINUTES } from "../pipeline/temporal";
import { truncate } from "../utils/text";

export const MAX_MESSAGE_LENGTH = 4000;
const TRUNCATED_LENGTH = 3900;
const TRUNCATION_NOTICE = "\n\n(이하 생략됨)";
const SUMMARY_LENGTH = 200;

/**
 * Escape text for MarkdownV2
 */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*[\]()~`>#+\-=|{}.!\\])/g, "\\$1");
}

/**
 * Escape a link target inside (...) for MarkdownV2
 */
export function escapeLinkUrl(url: string): string {
  return url.replace(/([)\\])/g, "\\$1");
}

function isEscaped(text: string, index: number): boolean {
  let slashes = 0;
  for (let i = index - 1; i >= 0 && text[i] === "\\"; i--) slashes++;
  return slashes % 2 === 1;
}

function indexOfUnescaped(text: string, token: string, from: number): number {
  for (let i = text.indexOf(token, from); i !== -1; i = text.indexOf(token, i + 1)) {
    if (!isEscaped(text, i)) return i;
  }
  return -1;
}

function lastIndexOfUnescaped(text: string, token: string): number {
  for (let i = text.lastIndexOf(token); i !== -1; i = i === 0 ? -1 : text.lastIndexOf(token, i - 1)) {
    if (!isEscaped(text, i)) return i;
  }
  return -1;
}

/**
 * Largest cut point up to `max` that splits no surrogate pair, escape sequence or link entity
 */
function safeCut(message: string, max: number): number {
  let cut = max;

  const last = message.charCodeAt(cut - 1);
  if (last >= 0xd800 && last <= 0xdbff) cut--;

  // A trailing odd backslash would escape the first character of the notice
  if (isEscaped(message, cut)) cut--;

  const head = message.slice(0, cut);
  const open = lastIndexOfUnescaped(head, "[");
  if (open !== -1) {
    const target = indexOfUnescaped(head, "](", open);
    const close = target === -1 ? -1 : indexOfUnescaped(head, ")", target + 2);
    if (close === -1) cut = open;
  }

  return cut;
}

/**
 * Cut overlong messages the way the Bot API limit requires
 */
export function limitLength(message: string): string {
  if (message.length <= MAX_MESSAGE_LENGTH) return message;
  return message.slice(0, safeCut(message, TRUNCATED_LENGTH)) + escapeMarkdown(TRUNCATION_NOTICE);
}

export function renderItem(item: NormalizedItem, offsetMinutes: number = KST_OFFSET_MINUTES): string {
  const heading = `*${escapeMarkdown(`[${getCategoryConfig(item.category).name}]`)}*`;
  const link = `[${escapeMarkdown(item.title)}](${escapeLinkUrl(item.link)})`;
  const date = item.publishedAt ? formatLocal(item.publishedAt, offsetMinutes) : "날짜 불명";
  const meta = [date, item.sourceName].filter((part): part is string => Boolean(part)).join(" · ");

  const lines = [heading, link];

  // Search results repeat the headline as their summary
  const summary = truncate(item.summary, SUMMARY_LENGTH);
  if (summary && !summary.startsWith(item.title)) {
    lines.push(escapeMarkdown(summary));
  }
  lines.push(escapeMarkdown(meta));

  return limitLength(lines.join("\n"));
}

/**
 * Notice sent when a source could not be loaded
 */
export function renderSourceError(group: string, error: string): string {
  return limitLength(escapeMarkdown(`[뉴스봇 오류] ${group} 요청 실패: ${error}`));
}
