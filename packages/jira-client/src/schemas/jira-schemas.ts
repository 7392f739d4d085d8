import type { JsonValue } from '@relscope/model';

import { z } from 'zod';

/**
 * Zod schema for any JSON value, used for descriptions and custom fields
 */
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

const NamedValueSchema = z.object({
  name: z.string().default(''),
});

/**
 * Issue fields; fields other than the known ones (custom fields) are kept as JSON
 */
export const JiraIssueFieldsSchema = z
  .object({
    summary: z.string().nullish(),
    description: JsonValueSchema.optional(),
    issuetype: NamedValueSchema.nullish(),
    status: NamedValueSchema.nullish(),
  })
  .catchall(JsonValueSchema);

export const JiraIssueSchema = z.object({
  id: z.string().optional(),
  key: z.string(),
  fields: JiraIssueFieldsSchema.default({}),
});

export const JiraSearchResultSchema = z.object({
  issues: z.array(JiraIssueSchema).default([]),
});

export const JiraFieldListSchema = z.array(
  z.object({
    id: z.string(),
    name: z.string().optional(),
  }),
);

export type JiraIssue = z.infer<typeof JiraIssueSchema>;
export type JiraSearchResult = z.infer<typeof JiraSearchResultSchema>;
