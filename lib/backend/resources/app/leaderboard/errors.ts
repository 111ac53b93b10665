// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

export enum LeaderboardErrorCode {
    AUTHENTICATION_FAILED = "AUTHENTICATION_FAILED",
    LEADERBOARD_NOT_FOUND = "LEADERBOARD_NOT_FOUND",
    PLAYER_NOT_FOUND = "PLAYER_NOT_FOUND",
    MALFORMED_SUBMISSION = "MALFORMED_SUBMISSION",
    MALFORMED_QUERY = "MALFORMED_QUERY",
    STORAGE_UNAVAILABLE = "STORAGE_UNAVAILABLE",
    SUBMISSION_FAILED = "SUBMISSION_FAILED",
    SUBMISSION_CANCELLED = "SUBMISSION_CANCELLED",
    INDEX_INCONSISTENCY = "INDEX_INCONSISTENCY"
}

const RETRYABLE_CODES = new Set([
    LeaderboardErrorCode.STORAGE_UNAVAILABLE,
    LeaderboardErrorCode.SUBMISSION_FAILED,
    LeaderboardErrorCode.SUBMISSION_CANCELLED
])

export class LeaderboardError extends Error {
    constructor(
        public readonly code: LeaderboardErrorCode,
        message: string,
        public readonly details?: Record<string, unknown>,
        options?: { cause?: unknown }
    ) {
        super(message, options)
        this.name = "LeaderboardError"
    }

    public get retryable(): boolean {
        return RETRYABLE_CODES.has(this.code)
    }

    public static authenticationFailed(leaderboardId: string): LeaderboardError {
        return new LeaderboardError(LeaderboardErrorCode.AUTHENTICATION_FAILED, "Invalid leaderboard credentials", { leaderboardId })
    }

    public static leaderboardNotFound(leaderboardId: string): LeaderboardError {
        return new LeaderboardError(LeaderboardErrorCode.LEADERBOARD_NOT_FOUND, "Leaderboard not found", { leaderboardId })
    }

    public static playerNotFound(leaderboardId: string, playerId: string): LeaderboardError {
        return new LeaderboardError(LeaderboardErrorCode.PLAYER_NOT_FOUND, "Player not found", { leaderboardId, playerId })
    }

    public static storageUnavailable(operation: string, cause: unknown): LeaderboardError {
        const reason = cause instanceof Error ? cause.message : String(cause)
        return new LeaderboardError(LeaderboardErrorCode.STORAGE_UNAVAILABLE, `Storage unavailable during ${operation}: ${reason}`, { operation }, { cause })
    }
}

export const isLeaderboardError = (e: unknown, code?: LeaderboardErrorCode): e is LeaderboardError => {
    return e instanceof LeaderboardError && (code === undefined || e.code === code)
}
