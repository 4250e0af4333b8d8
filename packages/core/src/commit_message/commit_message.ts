export const DEFAULT_COMMIT_MESSAGE = "latest updates";

/**
 * Joins argument tokens with single spaces. An empty result falls back to
 * `fallback`; anything else, whitespace included, is used verbatim.
 *
 * @example
 * resolveCommitMessage(["Fix", "login", "bug"]); // "Fix login bug"
 * resolveCommitMessage([]);                      // "latest updates"
 */
export function resolveCommitMessage(
  tokens: readonly string[],
  fallback: string = DEFAULT_COMMIT_MESSAGE
): string {
  const joined = tokens.join(" ");
  return joined === "" ? fallback : joined;
}
