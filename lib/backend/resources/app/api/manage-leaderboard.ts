// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import type { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2 } from "aws-lambda"
import { BackendService } from "../backend"
import type { LeaderboardBackend } from "../backend"
import {
    LeaderboardError,
    LeaderboardErrorCode,
    constantTimeEquals,
    parseWith,
    provisionLeaderboardSchema,
    renameLeaderboardSchema,
    toPublicLeaderboard
} from "../leaderboard"
import { ApiPayloadHandler } from "./api-payload-handler"

const isAdmin = (backend: LeaderboardBackend, event: APIGatewayProxyEventV2): boolean => {
    const expected = backend.config.ADMIN_TOKEN
    const authorization = ApiPayloadHandler.header(event, "authorization") ?? ""
    const supplied = authorization.startsWith("Bearer ") ? authorization.slice("Bearer ".length) : ""

    return constantTimeEquals(expected ?? "", supplied) && expected !== undefined
}

/**
 * Administrative routes of the registry:
 *
 * - `POST /admin/leaderboards`
 * - `POST /admin/leaderboards/{leaderboardId}/rotate`
 * - `PATCH /admin/leaderboards/{leaderboardId}`
 * - `DELETE /admin/leaderboards/{leaderboardId}`
 */
export const handler = async(event: APIGatewayProxyEventV2): Promise<APIGatewayProxyStructuredResultV2> => {
    const backend = BackendService.shared()

    try {
        if (!isAdmin(backend, event)) {
            throw new LeaderboardError(LeaderboardErrorCode.AUTHENTICATION_FAILED, "Invalid admin credentials")
        }

        switch (event.routeKey) {
            case "POST /admin/leaderboards": {
                const request = parseWith(provisionLeaderboardSchema, ApiPayloadHandler.jsonBody(event, LeaderboardErrorCode.MALFORMED_QUERY), LeaderboardErrorCode.MALFORMED_QUERY)
                const leaderboard = await backend.registry.provision({
                    name: request.name,
                    ordering: request.ordering,
                    updatePolicy: request.update_policy
                })
                return ApiPayloadHandler.ok(leaderboard, 201)
            }
            case "POST /admin/leaderboards/{leaderboardId}/rotate": {
                const leaderboard = await backend.registry.rotateKey(ApiPayloadHandler.pathParameter(event, "leaderboardId"))
                return ApiPayloadHandler.ok(leaderboard)
            }
            case "PATCH /admin/leaderboards/{leaderboardId}": {
                const { name } = parseWith(renameLeaderboardSchema, ApiPayloadHandler.jsonBody(event, LeaderboardErrorCode.MALFORMED_QUERY), LeaderboardErrorCode.MALFORMED_QUERY)
                const leaderboard = await backend.registry.rename(ApiPayloadHandler.pathParameter(event, "leaderboardId"), name)
                return ApiPayloadHandler.ok(toPublicLeaderboard(leaderboard))
            }
            case "DELETE /admin/leaderboards/{leaderboardId}": {
                const leaderboardId = ApiPayloadHandler.pathParameter(event, "leaderboardId")
                const leaderboard = await backend.registry.softDelete(leaderboardId)
                backend.indexes.forget(leaderboardId)
                return ApiPayloadHandler.ok(toPublicLeaderboard(leaderboard))
            }
            default:
                throw new LeaderboardError(LeaderboardErrorCode.MALFORMED_QUERY, `Unsupported route ${event.routeKey}`)
        }
    } catch (e) {
        return ApiPayloadHandler.failure(e, backend.logger)
    }
}
