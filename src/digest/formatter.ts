// pattern: Functional Core
import type { DigestContent, DigestEntry } from "./content";
import { formatRunDate } from "./content";

export const NOTHING_TO_REPORT = "Nothing to report today.";

function escapeMrkdwn(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/** `|` ends the link target in `<url|label>`, so it is percent-encoded. */
function escapeLinkTarget(url: string): string {
  return escapeMrkdwn(url.replace(/\|/g, "%7C"));
}

function formatEntry(entry: DigestEntry, position: number): string {
  const lines = [
    `*${position}. <${escapeLinkTarget(entry.url)}|${escapeMrkdwn(entry.title)}>*`,
  ];
  if (entry.summary !== null) {
    lines.push(`> ${escapeMrkdwn(entry.summary).replace(/\n+/g, " ")}`);
  }
  lines.push(`_${escapeMrkdwn(entry.feedName)}_`);
  return lines.join("\n");
}

/**
 * Renders the digest as Slack mrkdwn text for the messaging webhook.
 * Articles without a summary keep their title and link.
 */
export function formatDigestText(content: DigestContent, title: string): string {
  const header = `*📰 ${escapeMrkdwn(title)} (${formatRunDate(content.runAt)})*`;

  if (content.entries.length === 0) {
    return `${header}\n\n${NOTHING_TO_REPORT}`;
  }

  const blocks = content.entries.map((entry, i) => formatEntry(entry, i + 1));
  return [header, ...blocks].join("\n\n");
}
