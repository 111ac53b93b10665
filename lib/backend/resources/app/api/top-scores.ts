// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import type { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2 } from "aws-lambda"
import { BackendService } from "../backend"
import { LeaderboardErrorCode, createTopQuerySchema, parseWith } from "../leaderboard"
import { ApiPayloadHandler } from "./api-payload-handler"

/** GET /scores/{leaderboardId}?limit= */
export const handler = async(event: APIGatewayProxyEventV2): Promise<APIGatewayProxyStructuredResultV2> => {
    const backend = BackendService.shared()

    try {
        const leaderboardId = ApiPayloadHandler.pathParameter(event, "leaderboardId")
        const { limit } = parseWith(
            createTopQuerySchema(backend.config.QUERY_MAX_LIMIT),
            ApiPayloadHandler.queryParameters(event),
            LeaderboardErrorCode.MALFORMED_QUERY
        )
        const scores = await backend.queries.top(leaderboardId, limit, ApiPayloadHandler.header(event, "x-leaderboard-key"))

        return ApiPayloadHandler.ok(scores)
    } catch (e) {
        return ApiPayloadHandler.failure(e, backend.logger)
    }
}
