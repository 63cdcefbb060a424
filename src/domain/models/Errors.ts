export class UnresolvedIssueReferenceError extends Error {
  constructor(
    readonly sourceKey: string,
    readonly missingKey: string
  ) {
    super(
      `Issue ${sourceKey} links to ${missingKey}, which is not among the fetched issues`
    );
    this.name = "UnresolvedIssueReferenceError";
  }
}
