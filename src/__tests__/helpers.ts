import { Issue, IssueLink } from "../domain/models/Issue";

export function makeIssue(key: string, overrides: Partial<Issue> = {}): Issue {
  return {
    id: key.replace(/\D/g, ""),
    key,
    status: "Open",
    priority: "Medium",
    components: [],
    links: [],
    ...overrides,
  };
}

export function blocks(targetKey: string): IssueLink {
  return { type: "Blocks", direction: "outward", targetKey };
}

export function blockedBy(targetKey: string): IssueLink {
  return { type: "Blocks", direction: "inward", targetKey };
}
