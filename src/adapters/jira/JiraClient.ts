import axios, { AxiosInstance } from "axios";
import { JiraConfig } from "../../domain/models/ConfigModels";
import {
  JiraSearchResponse,
  parseSearchResponse,
} from "../../domain/models/JiraClientModels";
import type { IJiraClient } from "./types";

export class JiraClient implements IJiraClient {
  private client: AxiosInstance;

  constructor(private config: JiraConfig) {
    this.client = axios.create({
      baseURL: `${config.baseUrl.replace(/\/+$/, "")}/rest/api/${config.apiVersion}`,
      auth: { username: config.user, password: config.password },
      headers: { Accept: "application/json" },
    });
  }

  /** Fetch one page of issues matching the JQL */
  async searchIssues(
    jql: string,
    startAt: number,
    maxResults: number
  ): Promise<JiraSearchResponse> {
    const res = await this.client.get<unknown>("/search", {
      params: {
        jql,
        startAt,
        maxResults,
        fields: [
          "status",
          "priority",
          "components",
          "issuelinks",
          this.config.severityField,
        ].join(","),
      },
    });
    return parseSearchResponse(res.data);
  }
}
