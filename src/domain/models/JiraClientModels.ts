import { z } from "zod";

const namedSchema = z.object({ name: z.string() });

export const jiraIssueLinkSchema = z.object({
  type: namedSchema,
  outwardIssue: z.object({ key: z.string() }).optional(),
  inwardIssue: z.object({ key: z.string() }).optional(),
});

export const jiraIssueSchema = z.object({
  id: z.string(),
  key: z.string(),
  fields: z
    .object({
      status: namedSchema,
      priority: namedSchema.nullish(),
      components: z.array(namedSchema).nullish(),
      issuelinks: z.array(jiraIssueLinkSchema).nullish(),
    })
    .passthrough(),
});

export const jiraSearchResponseSchema = z.object({
  startAt: z.number(),
  maxResults: z.number(),
  total: z.number(),
  issues: z.array(jiraIssueSchema),
});

// Select lists expose `name`, custom field options expose `value`
const severityValueSchema = z.union([
  z.object({ name: z.string() }).transform((v) => v.name),
  z.object({ value: z.string() }).transform((v) => v.value),
  z.string(),
]);

export type JiraIssueLink = z.infer<typeof jiraIssueLinkSchema>;
export type JiraIssue = z.infer<typeof jiraIssueSchema>;
export type JiraSearchResponse = z.infer<typeof jiraSearchResponseSchema>;

export function parseSearchResponse(data: unknown): JiraSearchResponse {
  return jiraSearchResponseSchema.parse(data);
}

/** Read the severity of a raw issue; absent or unrecognised values yield undefined */
export function readSeverity(
  issue: JiraIssue,
  severityField: string
): string | undefined {
  const parsed = severityValueSchema.safeParse(issue.fields[severityField]);
  return parsed.success ? parsed.data : undefined;
}
