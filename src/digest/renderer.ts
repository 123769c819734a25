// pattern: Functional Core
import type { DigestContent, DigestEntry } from "./content";
import { formatRunDate } from "./content";
import { NOTHING_TO_REPORT } from "./formatter";

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function renderEntry(entry: DigestEntry): string {
  const summary =
    entry.summary === null
      ? ""
      : `<p style="margin:4px 0 0 0;color:#333333;">${escapeHtml(entry.summary)}</p>`;

  return [
    `<li style="margin:0 0 16px 0;">`,
    `<a href="${escapeHtml(entry.url)}" style="color:#1a5fb4;font-weight:bold;text-decoration:none;">${escapeHtml(entry.title)}</a>`,
    summary,
    `<p style="margin:4px 0 0 0;color:#777777;font-size:12px;">${escapeHtml(entry.feedName)}</p>`,
    `</li>`,
  ].join("");
}

/**
 * Renders the digest as an HTML email body. Styles are inline because many
 * mail clients drop `<style>` blocks.
 */
export function renderDigestHtml(content: DigestContent, title: string): string {
  const body =
    content.entries.length === 0
      ? `<p style="color:#333333;">${NOTHING_TO_REPORT}</p>`
      : `<ol style="padding-left:20px;">${content.entries.map(renderEntry).join("")}</ol>`;

  return [
    "<!DOCTYPE html>",
    "<html>",
    `<head><meta charset="utf-8"><title>${escapeHtml(title)}</title></head>`,
    `<body style="font-family:Arial,Helvetica,sans-serif;max-width:640px;margin:0 auto;padding:16px;">`,
    `<h1 style="font-size:20px;margin:0 0 4px 0;">${escapeHtml(title)}</h1>`,
    `<h2 style="font-size:14px;font-weight:normal;color:#777777;margin:0 0 16px 0;">${formatRunDate(content.runAt)}</h2>`,
    body,
    "</body>",
    "</html>",
  ].join("\n");
}
