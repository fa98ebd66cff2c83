import type { Findings } from "./types";

export const ISSUE_MARKER = "▪ Issue Description:";
const NO_ISSUES_PHRASE = "no interesting issues";

export function parseFindings(text: string): Findings {
  return {
    interestingIssueCount: text.split(ISSUE_MARKER).length - 1,
    interesting: !text.toLowerCase().includes(NO_ISSUES_PHRASE),
  };
}
