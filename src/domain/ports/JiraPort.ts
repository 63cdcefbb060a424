import { Issue } from "../models/Issue";

export interface JiraPort {
  search(jql: string, startAt: number, maxResults: number): Promise<Issue[]>;
  getIssuesByQuery(jql: string): Promise<Issue[]>;
}
