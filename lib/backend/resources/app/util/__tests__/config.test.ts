// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import { describe, expect, it } from "vitest"
import { BackendType } from "../backend-type"
import { ConfigError, loadConfig } from "../config"

describe("loadConfig", () => {
    it("applies defaults to everything but the backend type", () => {
        const config = loadConfig({ BACKEND_TYPE: "memory" })

        expect(config).toEqual({
            BACKEND_TYPE: BackendType.MEMORY,
            REDIS_ENDPOINT_PORT: 6379,
            LOG_LEVEL: "info",
            QUERY_REQUIRES_KEY: false,
            SUBMISSION_MAX_ATTEMPTS: 4,
            SUBMISSION_BASE_DELAY_MS: 50,
            SUBMISSION_MAX_DELAY_MS: 1000,
            QUERY_MAX_LIMIT: 100,
            AROUND_MAX_WINDOW: 50,
            MAX_META_LENGTH: 1024
        })
    })

    it("coerces numbers and flags from strings", () => {
        const config = loadConfig({ BACKEND_TYPE: "memory", QUERY_MAX_LIMIT: "25", QUERY_REQUIRES_KEY: "true", REDIS_ENDPOINT_PORT: "6380" })

        expect(config.QUERY_MAX_LIMIT).toBe(25)
        expect(config.QUERY_REQUIRES_KEY).toBe(true)
        expect(config.REDIS_ENDPOINT_PORT).toBe(6380)
    })

    it("requires the backend type", () => {
        expect(() => loadConfig({})).toThrow("Invalid configuration: BACKEND_TYPE: Required")
        expect(() => loadConfig({ BACKEND_TYPE: "dynamo" })).toThrow(ConfigError)
    })

    it("requires the database secret outside the memory backend", () => {
        expect(() => loadConfig({ BACKEND_TYPE: "rds" }))
            .toThrow("Invalid configuration: RDS_SECRET_ARN: required when BACKEND_TYPE is rds")
    })

    it("requires a redis endpoint for the redis backend", () => {
        expect(() => loadConfig({ BACKEND_TYPE: "redis", RDS_SECRET_ARN: "arn:test" }))
            .toThrow("Invalid configuration: REDIS_ENDPOINT_ADDRESS: required when BACKEND_TYPE is redis")
    })

    it("rejects unknown log levels", () => {
        expect(() => loadConfig({ BACKEND_TYPE: "memory", LOG_LEVEL: "verbose" })).toThrow(ConfigError)
    })
})
