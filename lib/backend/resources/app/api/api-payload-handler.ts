// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import type { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2, Context } from "aws-lambda"
import { LeaderboardError, LeaderboardErrorCode, isLeaderboardError } from "../leaderboard"
import type { Logger } from "../util"

const STATUS_CODES: Record<LeaderboardErrorCode, number> = {
    [LeaderboardErrorCode.AUTHENTICATION_FAILED]: 401,
    [LeaderboardErrorCode.LEADERBOARD_NOT_FOUND]: 404,
    [LeaderboardErrorCode.PLAYER_NOT_FOUND]: 404,
    [LeaderboardErrorCode.MALFORMED_SUBMISSION]: 400,
    [LeaderboardErrorCode.MALFORMED_QUERY]: 400,
    [LeaderboardErrorCode.STORAGE_UNAVAILABLE]: 503,
    [LeaderboardErrorCode.SUBMISSION_FAILED]: 503,
    [LeaderboardErrorCode.SUBMISSION_CANCELLED]: 409,
    [LeaderboardErrorCode.INDEX_INCONSISTENCY]: 500
}

const HIDDEN_DETAILS = new Set([LeaderboardErrorCode.AUTHENTICATION_FAILED, LeaderboardErrorCode.INDEX_INCONSISTENCY])

/** Time kept back from the Lambda deadline to answer a cancelled submission. */
const DEADLINE_MARGIN_MS = 500

const HEADERS = {
    "Access-Control-Allow-Origin": "*",
    "Content-Type": "application/json"
}

export class ApiPayloadHandler {
    public static ok(body: unknown, statusCode = 200): APIGatewayProxyStructuredResultV2 {
        return {
            body: JSON.stringify(body),
            statusCode,
            headers: HEADERS
        }
    }

    public static failure(e: unknown, logger: Logger): APIGatewayProxyStructuredResultV2 {
        if (isLeaderboardError(e)) {
            return {
                body: JSON.stringify({
                    error_code: e.code,
                    error_message: e.message,
                    retryable: e.retryable,
                    ...(e.details && !HIDDEN_DETAILS.has(e.code) ? { details: e.details } : {})
                }),
                statusCode: STATUS_CODES[e.code],
                headers: HEADERS
            }
        }

        logger.error({ err: e }, "unhandled error")
        return {
            body: JSON.stringify({ error_code: "INTERNAL_ERROR", error_message: "Internal server error", retryable: true }),
            statusCode: 500,
            headers: HEADERS
        }
    }

    public static pathParameter(event: APIGatewayProxyEventV2, name: string, code = LeaderboardErrorCode.MALFORMED_QUERY): string {
        const value = event.pathParameters?.[name]
        if (!value) {
            throw new LeaderboardError(code, `Missing path parameter ${name}`)
        }
        return value
    }

    public static queryParameters(event: APIGatewayProxyEventV2): Record<string, string | undefined> {
        return event.queryStringParameters ?? {}
    }

    public static header(event: APIGatewayProxyEventV2, name: string): string | undefined {
        const wanted = name.toLowerCase()
        for (const [key, value] of Object.entries(event.headers ?? {})) {
            if (key.toLowerCase() === wanted) {
                return value
            }
        }
        return undefined
    }

    public static jsonBody(event: APIGatewayProxyEventV2, code = LeaderboardErrorCode.MALFORMED_SUBMISSION): unknown {
        if (!event.body) {
            throw new LeaderboardError(code, "Missing required payload")
        }

        const raw = event.isBase64Encoded ? Buffer.from(event.body, "base64").toString("utf8") : event.body
        try {
            const parsed: unknown = JSON.parse(raw)
            return parsed
        } catch (e) {
            throw new LeaderboardError(code, "Payload is not valid JSON", undefined, { cause: e })
        }
    }

    /** Aborts shortly before the invocation would time out. */
    public static deadlineSignal(context?: Context): AbortSignal | undefined {
        if (!context) {
            return undefined
        }
        return AbortSignal.timeout(Math.max(0, context.getRemainingTimeInMillis() - DEADLINE_MARGIN_MS))
    }
}
