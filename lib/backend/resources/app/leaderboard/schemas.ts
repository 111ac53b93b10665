// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import { z } from "zod"
import { LeaderboardError, LeaderboardErrorCode } from "./errors"
import { ScoreOrdering, UpdatePolicy } from "./types"

export const playerIdSchema = z
    .string()
    .min(1)
    .max(64)
    .regex(/^[A-Za-z0-9_.@:-]+$/, "may only contain letters, digits and _ . @ : -")

export const displayNameSchema = z.string().trim().min(1).max(64)

export const leaderboardNameSchema = z.string().trim().min(1).max(128)

export const createSubmissionSchema = (maxMetaLength: number) => z.object({
    key: z.string().min(1).max(256).optional(),
    k: z.string().regex(/^[0-9a-fA-F]{64}$/, "must be a hex encoded HMAC-SHA256").optional(),
    player_id: playerIdSchema,
    name: displayNameSchema.optional(),
    score: z.number().finite(),
    meta: z.string().max(maxMetaLength).optional(),
    timestamp: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER).optional()
}).superRefine((body, ctx) => {
    if (body.key === undefined && body.k === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["key"], message: "either key or k is required" })
    }
    if (body.k !== undefined && body.timestamp === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["timestamp"], message: "required for signed submissions" })
    }
})

export type SubmissionPayload = z.infer<ReturnType<typeof createSubmissionSchema>>

export const createTopQuerySchema = (maxLimit: number) => z.object({
    limit: z.coerce.number().int().min(1).max(maxLimit).default(10)
})

export const createAroundQuerySchema = (maxWindow: number) => z.object({
    player_id: playerIdSchema,
    window: z.coerce.number().int().min(0).max(maxWindow).default(5)
})

export const playerQuerySchema = z.object({
    player_id: playerIdSchema
})

export const searchQuerySchema = z.object({
    name: z.string().min(1).max(64)
})

export const createPlayerSchema = z.object({
    name: displayNameSchema.optional()
})

export const provisionLeaderboardSchema = z.object({
    name: leaderboardNameSchema,
    ordering: z.nativeEnum(ScoreOrdering).default(ScoreOrdering.HIGHER_IS_BETTER),
    update_policy: z.nativeEnum(UpdatePolicy).default(UpdatePolicy.KEEP_BEST)
})

export const renameLeaderboardSchema = z.object({
    name: leaderboardNameSchema
})

/**
 * Parses `input` or throws a LeaderboardError with `code` and the zod issues.
 */
export const parseWith = <T extends z.ZodTypeAny>(schema: T, input: unknown, code: LeaderboardErrorCode): z.output<T> => {
    const parsed = schema.safeParse(input)

    if (!parsed.success) {
        const summary = parsed.error.issues
            .map((issue) => issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message)
            .join("; ")
        throw new LeaderboardError(code, summary, { issues: parsed.error.issues })
    }

    return parsed.data
}
