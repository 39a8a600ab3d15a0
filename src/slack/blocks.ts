import type { KnownBlock } from "@slack/bolt";
import { formatReport } from "../core/aggregate.js";
import type { RunReport } from "../core/types.js";

export const APPLY_ACTION_ID = "sweep_apply";
export const CANCEL_ACTION_ID = "sweep_cancel";

/** Section text is capped at 3000 characters by Slack. */
const MAX_SECTION_CHARS = 2900;

export function truncateForSection(text: string, limit = MAX_SECTION_CHARS): string {
  if (text.length <= limit) return text;
  const cut = text.lastIndexOf("\n", limit);
  return `${text.slice(0, cut > 0 ? cut : limit)}\n… (truncated)`;
}

export function summarizeReport(report: RunReport): string {
  return "```\n" + truncateForSection(formatReport(report, { maxFilesPerRepo: 5 }), MAX_SECTION_CHARS - 8) + "\n```";
}

export function buildPreviewBlocks(report: RunReport, runId: string): KnownBlock[] {
  const wouldApply = report.counts["would-apply"];
  const files = report.outcomes.reduce((sum, outcome) => sum + outcome.filesChanged, 0);

  return [
    {
      type: "section",
      text: {
        type: "mrkdwn",
        text: `*Preview*: ${files} file(s) in ${wouldApply} repositor${wouldApply === 1 ? "y" : "ies"} would change.`,
      },
    },
    {
      type: "section",
      text: { type: "mrkdwn", text: summarizeReport(report) },
    },
    {
      type: "actions",
      elements: [
        {
          type: "button",
          text: { type: "plain_text", text: "Apply" },
          style: "primary",
          action_id: APPLY_ACTION_ID,
          value: runId,
          confirm: {
            title: { type: "plain_text", text: "Push these changes?" },
            text: { type: "mrkdwn", text: `This commits to ${wouldApply} repositor${wouldApply === 1 ? "y" : "ies"}.` },
            confirm: { type: "plain_text", text: "Apply" },
            deny: { type: "plain_text", text: "Back" },
          },
        },
        {
          type: "button",
          text: { type: "plain_text", text: "Cancel" },
          style: "danger",
          action_id: CANCEL_ACTION_ID,
          value: runId,
        },
      ],
    },
  ];
}
