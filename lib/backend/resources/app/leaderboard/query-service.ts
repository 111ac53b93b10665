// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import type { Logger } from "../util"
import { LeaderboardError, LeaderboardErrorCode } from "./errors"
import type { LeaderboardRegistry } from "./leaderboard-registry"
import type { RankIndex } from "./rank-index"
import type { RankIndexManager } from "./rank-index-manager"
import type { RankedScore } from "./types"

export interface QueryServiceProps {
    registry: LeaderboardRegistry
    indexes: RankIndexManager
    maxLimit: number
    maxWindow: number
    /** When set, reads must present the leaderboard secret. */
    requireKey: boolean
    logger: Logger
}

/**
 * Read side of the leaderboard. Answers from the rank index only.
 */
export class QueryService {
    private readonly registry: LeaderboardRegistry
    private readonly indexes: RankIndexManager
    private readonly maxLimit: number
    private readonly maxWindow: number
    private readonly requireKey: boolean
    private readonly logger: Logger

    constructor(props: QueryServiceProps) {
        this.registry = props.registry
        this.indexes = props.indexes
        this.maxLimit = props.maxLimit
        this.maxWindow = props.maxWindow
        this.requireKey = props.requireKey
        this.logger = props.logger.child({ component: "QueryService" })
    }

    public async top(leaderboardId: string, limit: number, key?: string): Promise<RankedScore[]> {
        this.checkRange("limit", limit, 1, this.maxLimit)
        const index = await this.open(leaderboardId, key)

        return index.top(limit)
    }

    public async around(leaderboardId: string, playerId: string, window: number, key?: string): Promise<RankedScore[]> {
        this.checkRange("window", window, 0, this.maxWindow)
        const index = await this.open(leaderboardId, key)
        const scores = await index.around(playerId, window)

        if (scores.length === 0) {
            throw LeaderboardError.playerNotFound(leaderboardId, playerId)
        }

        return scores
    }

    public async playerRank(leaderboardId: string, playerId: string, key?: string): Promise<RankedScore> {
        const index = await this.open(leaderboardId, key)
        const [own] = await index.around(playerId, 0)

        if (!own) {
            throw LeaderboardError.playerNotFound(leaderboardId, playerId)
        }

        return own
    }

    public async size(leaderboardId: string, key?: string): Promise<number> {
        const index = await this.open(leaderboardId, key)
        return index.size()
    }

    private async open(leaderboardId: string, key: string | undefined): Promise<RankIndex> {
        const leaderboard = await this.registry.resolve(leaderboardId)

        if (this.requireKey && (key === undefined || !await this.registry.authenticate(leaderboardId, key))) {
            this.logger.info({ leaderboardId }, "query rejected, missing or invalid key")
            throw LeaderboardError.authenticationFailed(leaderboardId)
        }

        return this.indexes.forReading(leaderboard)
    }

    private checkRange(name: string, value: number, min: number, max: number) {
        if (!Number.isInteger(value) || value < min || value > max) {
            throw new LeaderboardError(LeaderboardErrorCode.MALFORMED_QUERY, `${name} must be an integer between ${min} and ${max}`, { [name]: value })
        }
    }
}
