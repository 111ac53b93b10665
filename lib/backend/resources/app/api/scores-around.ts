// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import type { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2 } from "aws-lambda"
import { BackendService } from "../backend"
import { LeaderboardErrorCode, createAroundQuerySchema, parseWith } from "../leaderboard"
import { ApiPayloadHandler } from "./api-payload-handler"

/** GET /scores/{leaderboardId}/around?player_id=&window= */
export const handler = async(event: APIGatewayProxyEventV2): Promise<APIGatewayProxyStructuredResultV2> => {
    const backend = BackendService.shared()

    try {
        const leaderboardId = ApiPayloadHandler.pathParameter(event, "leaderboardId")
        const query = parseWith(
            createAroundQuerySchema(backend.config.AROUND_MAX_WINDOW),
            ApiPayloadHandler.queryParameters(event),
            LeaderboardErrorCode.MALFORMED_QUERY
        )
        const scores = await backend.queries.around(leaderboardId, query.player_id, query.window, ApiPayloadHandler.header(event, "x-leaderboard-key"))

        return ApiPayloadHandler.ok(scores)
    } catch (e) {
        return ApiPayloadHandler.failure(e, backend.logger)
    }
}
