import { Issue, IssueLink } from "../../domain/models/Issue";
import { JiraIssue, readSeverity } from "../../domain/models/JiraClientModels";
import { JiraPort } from "../../domain/ports/JiraPort";
import type { IJiraClient } from "./types";

export interface JiraAdapterOptions {
  pageSize: number;
  severityField: string;
}

interface IssuePage {
  startAt: number;
  total: number;
  issues: Issue[];
}

export class JiraAdapter implements JiraPort {
  constructor(
    private jiraClient: IJiraClient,
    private opts: JiraAdapterOptions
  ) {}

  async search(
    jql: string,
    startAt: number,
    maxResults: number
  ): Promise<Issue[]> {
    const page = await this.fetchPage(jql, startAt, maxResults);
    return page.issues;
  }

  /** Retrieve every issue matching the JQL, page by page */
  async getIssuesByQuery(jql: string): Promise<Issue[]> {
    const { pageSize } = this.opts;
    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new Error(`Page size must be a positive integer, got ${pageSize}`);
    }

    const all: Issue[] = [];
    let startAt = 0;

    while (true) {
      const page = await this.fetchPage(jql, startAt, pageSize);
      all.push(...page.issues);

      // the server may cap maxResults below the requested page size
      const next = page.startAt + page.issues.length;
      if (next >= page.total) break;
      if (page.issues.length === 0) {
        throw new Error(
          `Jira returned no issues at ${page.startAt} of ${page.total} for "${jql}"`
        );
      }
      startAt = next;
    }
    return all;
  }

  private async fetchPage(
    jql: string,
    startAt: number,
    maxResults: number
  ): Promise<IssuePage> {
    const page = await this.jiraClient.searchIssues(jql, startAt, maxResults);
    return {
      startAt: page.startAt,
      total: page.total,
      issues: page.issues.map(this.mapToIssue.bind(this)),
    };
  }

  private mapToIssue(jiraIssue: JiraIssue): Issue {
    const links: IssueLink[] = [];
    for (const link of jiraIssue.fields.issuelinks ?? []) {
      if (link.outwardIssue) {
        links.push({
          type: link.type.name,
          direction: "outward",
          targetKey: link.outwardIssue.key,
        });
      }
      if (link.inwardIssue) {
        links.push({
          type: link.type.name,
          direction: "inward",
          targetKey: link.inwardIssue.key,
        });
      }
    }

    return {
      id: jiraIssue.id,
      key: jiraIssue.key,
      status: jiraIssue.fields.status.name,
      priority: jiraIssue.fields.priority?.name,
      severity: readSeverity(jiraIssue, this.opts.severityField),
      components: (jiraIssue.fields.components ?? []).map((c) => c.name),
      links,
    };
  }
}
