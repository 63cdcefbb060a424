import dotenv from "dotenv";
dotenv.config();

export function isPositiveInteger(n: number): boolean {
  return Number.isInteger(n) && n > 0;
}

function parseIntEnv(key: string, defaultValue: number): number {
  const v = process.env[key];
  if (!v) return defaultValue;
  const n = Number.parseInt(v, 10);
  if (!isPositiveInteger(n)) {
    throw new Error(`Invalid positive integer in env var ${key}`);
  }
  return n;
}

export const jiraDefaults = {
  password: process.env.JIRA_PASSWORD || undefined,
  apiVersion: process.env.JIRA_API_VERSION || "2",
  pageSize: parseIntEnv("JIRA_PAGE_SIZE", 100),
  severityField: process.env.JIRA_SEVERITY_FIELD || "severity",
};
