import { JiraSearchResponse } from "../../domain/models/JiraClientModels";

export interface IJiraClient {
  searchIssues(
    jql: string,
    startAt: number,
    maxResults: number
  ): Promise<JiraSearchResponse>;
}
