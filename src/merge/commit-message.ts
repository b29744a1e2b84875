import type { MergeMethod, PullRequest } from "../types.js";

/** Bodies at or above this length are left out of squash commits. */
export const MAX_SQUASH_BODY_LENGTH = 500;

export interface CommitMessage {
  title: string;
  body: string;
}

/**
 * Commit title and body for merging `pr` with `method`.
 *
 * - squash: PR title with ` (#N)` appended unless already present, PR body if short
 * - merge: `Merge pull request #N from <head branch>`, PR title as body
 * - rebase: PR title, no body
 *
 * A custom message replaces the title for every method and drops the body.
 */
export function buildCommitMessage(
  pr: PullRequest,
  method: MergeMethod,
  customMessage?: string,
): CommitMessage {
  if (customMessage) {
    return { title: customMessage, body: "" };
  }

  switch (method) {
    case "squash": {
      const alreadyReferenced = new RegExp(`#${pr.number}(?!\\d)`).test(pr.title);
      const title = alreadyReferenced ? pr.title : `${pr.title} (#${pr.number})`;
      const body = pr.body && pr.body.length < MAX_SQUASH_BODY_LENGTH ? pr.body : "";
      return { title, body };
    }
    case "merge":
      return {
        title: `Merge pull request #${pr.number} from ${pr.headBranch}`,
        body: pr.title,
      };
    case "rebase":
      return { title: pr.title, body: "" };
  }
}
