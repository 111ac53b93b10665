// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import type { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2 } from "aws-lambda"
import { BackendService } from "../backend"
import { LeaderboardErrorCode, createPlayerSchema, parseWith } from "../leaderboard"
import { ApiPayloadHandler } from "./api-payload-handler"

/** POST /players/{leaderboardId} */
export const handler = async(event: APIGatewayProxyEventV2): Promise<APIGatewayProxyStructuredResultV2> => {
    const backend = BackendService.shared()

    try {
        const leaderboardId = ApiPayloadHandler.pathParameter(event, "leaderboardId")
        const body = event.body ? ApiPayloadHandler.jsonBody(event, LeaderboardErrorCode.MALFORMED_QUERY) : {}
        const { name } = parseWith(createPlayerSchema, body, LeaderboardErrorCode.MALFORMED_QUERY)
        const player = await backend.players.createPlayer(leaderboardId, name)

        return ApiPayloadHandler.ok({ id: player.id, key: player.key, name: player.name }, 201)
    } catch (e) {
        return ApiPayloadHandler.failure(e, backend.logger)
    }
}
