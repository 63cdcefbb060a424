export interface JiraConfig {
  baseUrl: string;
  user: string;
  password: string;
  apiVersion: string;
  severityField: string;
}
