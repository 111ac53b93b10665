// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import type { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2, Context } from "aws-lambda"
import { BackendService } from "../backend"
import { LeaderboardErrorCode } from "../leaderboard"
import { ApiPayloadHandler } from "./api-payload-handler"

/** POST /scores/{leaderboardId} */
export const handler = async(event: APIGatewayProxyEventV2, context?: Context): Promise<APIGatewayProxyStructuredResultV2> => {
    const backend = BackendService.shared()

    try {
        const leaderboardId = ApiPayloadHandler.pathParameter(event, "leaderboardId", LeaderboardErrorCode.MALFORMED_SUBMISSION)
        const body = ApiPayloadHandler.jsonBody(event)
        const receipt = await backend.gateway.submit(leaderboardId, body, {
            signal: ApiPayloadHandler.deadlineSignal(context)
        })

        return ApiPayloadHandler.ok(receipt)
    } catch (e) {
        return ApiPayloadHandler.failure(e, backend.logger)
    }
}
