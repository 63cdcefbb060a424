import { describe, it, expect, vi, beforeEach } from "vitest";
import { JiraClient } from "../adapters/jira/JiraClient";

const { get, create } = vi.hoisted(() => {
  const get = vi.fn();
  return { get, create: vi.fn(() => ({ get })) };
});

vi.mock("axios", () => ({ default: { create } }));

function makeClient() {
  return new JiraClient({
    baseUrl: "https://jira.example.com/",
    user: "alice",
    password: "test-secret",
    apiVersion: "2",
    severityField: "customfield_10100",
  });
}

describe("JiraClient", () => {
  beforeEach(() => {
    get.mockReset();
  });

  it("uses basic auth against the versioned REST API", () => {
    makeClient();
    expect(create).toHaveBeenLastCalledWith({
      baseURL: "https://jira.example.com/rest/api/2",
      auth: { username: "alice", password: "test-secret" },
      headers: { Accept: "application/json" },
    });
  });

  it("searches with the fields the blocker graph needs", async () => {
    get.mockResolvedValue({
      data: { startAt: 50, maxResults: 50, total: 51, issues: [] },
    });

    const page = await makeClient().searchIssues("project=PROJ", 50, 50);

    expect(get).toHaveBeenCalledWith("/search", {
      params: {
        jql: "project=PROJ",
        startAt: 50,
        maxResults: 50,
        fields: "status,priority,components,issuelinks,customfield_10100",
      },
    });
    expect(page).toEqual({ startAt: 50, maxResults: 50, total: 51, issues: [] });
  });

  it("rejects malformed responses", async () => {
    get.mockResolvedValue({ data: { issues: "none" } });

    await expect(makeClient().searchIssues("project=PROJ", 0, 50)).rejects.toThrow();
  });
});
