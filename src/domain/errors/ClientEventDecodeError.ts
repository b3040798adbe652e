export class ClientEventDecodeError extends Error {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(message);
    this.name = "ClientEventDecodeError";
  }

  static because(issues: readonly string[]): ClientEventDecodeError {
    const [firstIssue] = issues;
    const message =
      issues.length === 0
        ? "Malformed event"
        : issues.length === 1
          ? (firstIssue ?? "Malformed event")
          : `Malformed event: ${issues.join("; ")}`;
    return new ClientEventDecodeError(message, issues);
  }
}
