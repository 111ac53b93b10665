// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import pino from "pino"
import type { Logger } from "pino"

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent"

export type { Logger }

/**
 * Structured JSON logger for the Lambda runtime. Components take a child of
 * this logger with their own `component` binding.
 */
export const createLogger = (level: LogLevel): Logger => {
    return pino({
        level,
        base: { service: "leaderboard" },
        formatters: {
            level: (label) => ({ level: label })
        },
        timestamp: () => `,"timestamp":"${new Date().toISOString()}"`
    })
}
