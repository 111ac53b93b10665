// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import type { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2 } from "aws-lambda"
import { BackendService } from "../backend"
import { LeaderboardErrorCode, parseWith, searchQuerySchema } from "../leaderboard"
import { ApiPayloadHandler } from "./api-payload-handler"

/** GET /players/{leaderboardId}?name= */
export const handler = async(event: APIGatewayProxyEventV2): Promise<APIGatewayProxyStructuredResultV2> => {
    const backend = BackendService.shared()

    try {
        const leaderboardId = ApiPayloadHandler.pathParameter(event, "leaderboardId")
        const { name } = parseWith(searchQuerySchema, ApiPayloadHandler.queryParameters(event), LeaderboardErrorCode.MALFORMED_QUERY)
        const players = await backend.players.searchPlayers(leaderboardId, name)

        return ApiPayloadHandler.ok(players)
    } catch (e) {
        return ApiPayloadHandler.failure(e, backend.logger)
    }
}
