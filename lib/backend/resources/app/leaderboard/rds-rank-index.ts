// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import type { RowDataPacket } from "mysql2/promise"
import { isTransientMysqlError } from "../util"
import type { ConnectionManager, Logger } from "../util"
import { LeaderboardError } from "./errors"
import { IndexState, toRankedScore } from "./rank-index"
import type { IndexStatus, RankIndex } from "./rank-index"
import { ScoreOrdering } from "./types"
import type { RankEntry, RankedScore } from "./types"

export interface RdsRankIndexProps {
    leaderboardId: string
    ordering: ScoreOrdering
    connectionManager: ConnectionManager
    logger: Logger
}

const toRankEntry = (row: RowDataPacket): RankEntry => ({
    playerId: String(row["player_id"]),
    name: String(row["name"]),
    value: Number(row["value"]),
    timestamp: Number(row["submitted_at"])
})

const asLimit = (value: number) => Math.max(0, Math.floor(value))

/**
 * Rank index computed by MySQL from the current rows of the scores table, so
 * every container reads the same ranking the store holds. Player ids compare
 * as bytes to match the in-process tie-break.
 */
export class RdsRankIndex implements RankIndex {
    public readonly leaderboardId: string
    private readonly connectionManager: ConnectionManager
    private readonly logger: Logger
    private readonly rankedRows: string
    private readonly position: string

    constructor(props: RdsRankIndexProps) {
        this.leaderboardId = props.leaderboardId
        this.connectionManager = props.connectionManager
        this.logger = props.logger.child({ component: "RdsRankIndex", leaderboardId: props.leaderboardId })

        const higher = props.ordering === ScoreOrdering.HIGHER_IS_BETTER
        const better = higher ? ">" : "<"
        this.rankedRows = "select s.player_id, s.value, s.submitted_at, p.name from scores s"
            + " inner join players p on s.leaderboard_id=p.leaderboard_id and s.player_id=p.id"
            + " where s.leaderboard_id=? and s.is_current=1"
            + ` order by s.value ${higher ? "desc" : "asc"}, s.submitted_at asc, cast(s.player_id as binary) asc`
        this.position = "select (select count(*) from scores s2 where s2.leaderboard_id=s1.leaderboard_id and s2.is_current=1"
            + ` and (s2.value ${better} s1.value or (s2.value=s1.value and (s2.submitted_at < s1.submitted_at`
            + " or (s2.submitted_at=s1.submitted_at and cast(s2.player_id as binary) < cast(s1.player_id as binary)))))) as position"
            + " from scores s1 where s1.leaderboard_id=? and s1.player_id=? and s1.is_current=1"
    }

    /** The store's write already placed the entry. */
    async insertOrUpdate(_entry: RankEntry): Promise<void> {
        return
    }

    async top(n: number): Promise<RankedScore[]> {
        if (n <= 0) {
            return []
        }
        const rows = await this.query("top", `${this.rankedRows} limit ${asLimit(n)}`, [this.leaderboardId])
        return rows.map((row, i) => toRankedScore(toRankEntry(row), i + 1))
    }

    async rankOf(playerId: string): Promise<number | undefined> {
        const position = await this.positionOf(playerId)
        return position === undefined ? undefined : position + 1
    }

    async around(playerId: string, window: number): Promise<RankedScore[]> {
        const position = await this.positionOf(playerId)
        if (position === undefined) {
            return []
        }

        const start = Math.max(0, position - window)
        const count = position - start + window + 1
        const rows = await this.query("around", `${this.rankedRows} limit ${asLimit(count)} offset ${asLimit(start)}`, [this.leaderboardId])
        return rows.map((row, i) => toRankedScore(toRankEntry(row), start + i + 1))
    }

    async size(): Promise<number> {
        const rows = await this.query("size", "select count(*) as total from scores where leaderboard_id=? and is_current=1", [this.leaderboardId])
        return rows.length > 0 ? Number(rows[0]["total"]) : 0
    }

    async entries(): Promise<RankEntry[]> {
        const rows = await this.query("entries", this.rankedRows, [this.leaderboardId])
        return rows.map(toRankEntry)
    }

    async status(): Promise<IndexStatus> {
        return { state: IndexState.READY, generation: 0 }
    }

    async markStale(): Promise<void> {
        return
    }

    async rebuild(_entries: readonly RankEntry[], _expectedGeneration?: number): Promise<boolean> {
        return true
    }

    private async positionOf(playerId: string): Promise<number | undefined> {
        const rows = await this.query("rankOf", this.position, [this.leaderboardId, playerId])
        return rows.length > 0 ? Number(rows[0]["position"]) : undefined
    }

    private async query(operation: string, sql: string, values: string[]): Promise<RowDataPacket[]> {
        try {
            const pool = await this.connectionManager.getOrCreateRDSPool()
            const [rows] = await pool.execute<RowDataPacket[]>(sql, values)
            return rows
        } catch (e) {
            if (isTransientMysqlError(e)) {
                this.logger.warn({ err: e, operation }, "transient mysql failure")
                throw LeaderboardError.storageUnavailable(`rank index ${operation}`, e)
            }
            throw e
        }
    }
}
