/**
 * Commit validation and message cleanup.
 * Pure functions used by the commit editor.
 */

export interface CommitValidationResult {
  valid: boolean;
  error: string | null;
}

/**
 * Validate commit message and staged state.
 */
export function validateCommit(
  message: string,
  stagedCount: number,
  amend: boolean
): CommitValidationResult {
  if (!formatCommitMessage(message)) {
    return { valid: false, error: 'Commit message cannot be empty' };
  }

  if (stagedCount === 0 && !amend) {
    return { valid: false, error: 'No changes staged for commit' };
  }

  return { valid: true, error: null };
}

/**
 * Clean a message the way `git commit --cleanup=strip` does: comment lines
 * and trailing whitespace go, runs of blank lines collapse to one, and
 * leading and trailing blank lines are dropped.
 */
export function formatCommitMessage(message: string): string {
  const lines: string[] = [];
  for (const raw of message.split('\n')) {
    if (raw.startsWith('#')) continue;
    const line = raw.trimEnd();
    if (line === '' && (lines.length === 0 || lines[lines.length - 1] === '')) continue;
    lines.push(line);
  }
  while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines.join('\n');
}
