/**
 * A command was well-formed but not allowed in the current state: lobby full,
 * not the host, players not ready, and so on. The message goes back to the
 * sender as an ERROR event.
 */
export class GameCommandInputError extends Error {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(message);
    this.name = "GameCommandInputError";
  }

  static because(issues: readonly string[]): GameCommandInputError {
    const [firstIssue] = issues;
    const message =
      issues.length === 0
        ? "Invalid game command input"
        : issues.length === 1
          ? (firstIssue ?? "Invalid game command input")
          : `Invalid game command input: ${issues.join("; ")}`;
    return new GameCommandInputError(message, issues);
  }
}
