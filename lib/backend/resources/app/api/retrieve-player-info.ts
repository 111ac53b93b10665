// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import type { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2 } from "aws-lambda"
import { BackendService } from "../backend"
import { LeaderboardErrorCode, parseWith, playerQuerySchema } from "../leaderboard"
import { ApiPayloadHandler } from "./api-payload-handler"

/** GET /scores/{leaderboardId}/player?player_id= */
export const handler = async(event: APIGatewayProxyEventV2): Promise<APIGatewayProxyStructuredResultV2> => {
    const backend = BackendService.shared()

    try {
        const leaderboardId = ApiPayloadHandler.pathParameter(event, "leaderboardId")
        const { player_id } = parseWith(playerQuerySchema, ApiPayloadHandler.queryParameters(event), LeaderboardErrorCode.MALFORMED_QUERY)
        const response = await backend.queries.playerRank(leaderboardId, player_id, ApiPayloadHandler.header(event, "x-leaderboard-key"))

        return ApiPayloadHandler.ok(response)
    } catch (e) {
        return ApiPayloadHandler.failure(e, backend.logger)
    }
}
