// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import { z } from "zod"
import { BackendType } from "./backend-type"

const booleanFlag = z
    .enum(["true", "false", "1", "0"])
    .default("false")
    .transform((value) => value === "true" || value === "1")

const configSchema = z.object({
    BACKEND_TYPE: z.nativeEnum(BackendType),
    RDS_SECRET_ARN: z.string().min(1).optional(),
    REDIS_ENDPOINT_ADDRESS: z.string().min(1).optional(),
    REDIS_ENDPOINT_PORT: z.coerce.number().int().positive().default(6379),
    LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
    ADMIN_TOKEN: z.string().min(16).optional(),
    QUERY_REQUIRES_KEY: booleanFlag,
    SUBMISSION_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(4),
    SUBMISSION_BASE_DELAY_MS: z.coerce.number().int().min(0).default(50),
    SUBMISSION_MAX_DELAY_MS: z.coerce.number().int().min(0).default(1000),
    QUERY_MAX_LIMIT: z.coerce.number().int().positive().default(100),
    AROUND_MAX_WINDOW: z.coerce.number().int().positive().default(50),
    MAX_META_LENGTH: z.coerce.number().int().positive().default(1024)
}).superRefine((env, ctx) => {
    if (env.BACKEND_TYPE !== BackendType.MEMORY && !env.RDS_SECRET_ARN) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["RDS_SECRET_ARN"],
            message: `required when BACKEND_TYPE is ${env.BACKEND_TYPE}`
        })
    }

    if (env.BACKEND_TYPE === BackendType.REDIS && !env.REDIS_ENDPOINT_ADDRESS) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["REDIS_ENDPOINT_ADDRESS"],
            message: "required when BACKEND_TYPE is redis"
        })
    }
})

export type AppConfig = z.infer<typeof configSchema>

export class ConfigError extends Error {
    constructor(message: string, public readonly issues: z.ZodIssue[]) {
        super(message)
        this.name = "ConfigError"
    }
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
    const parsed = configSchema.safeParse(env)

    if (!parsed.success) {
        const summary = parsed.error.issues
            .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
            .join("; ")
        throw new ConfigError(`Invalid configuration: ${summary}`, parsed.error.issues)
    }

    return parsed.data
}
