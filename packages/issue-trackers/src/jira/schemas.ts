import { z } from "zod";

const JiraUserSchema = z
	.object({
		displayName: z.string().optional(),
		name: z.string().optional(),
		accountId: z.string().optional(),
		emailAddress: z.string().optional(),
	})
	.passthrough();

export type JiraUser = z.infer<typeof JiraUserSchema>;

export const JiraIssueSchema = z.object({
	id: z.string(),
	key: z.string(),
	self: z.string().optional(),
	fields: z
		.object({
			summary: z.string().optional(),
			status: z.object({ name: z.string() }).passthrough().nullish(),
			assignee: JiraUserSchema.nullish(),
			reporter: JiraUserSchema.nullish(),
			created: z.string().nullish(),
		})
		.passthrough(),
});

export type JiraIssuePayload = z.infer<typeof JiraIssueSchema>;

export const JiraSearchResponseSchema = z.object({
	startAt: z.number().optional(),
	maxResults: z.number().optional(),
	total: z.number().optional(),
	issues: z.array(JiraIssueSchema),
});

export const JiraCreatedIssueSchema = z.object({
	id: z.string(),
	key: z.string(),
	self: z.string(),
});

export const JiraTransitionsResponseSchema = z.object({
	transitions: z.array(
		z.object({ id: z.string(), name: z.string() }).passthrough(),
	),
});
