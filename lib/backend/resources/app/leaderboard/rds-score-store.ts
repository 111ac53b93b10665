// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import type { PoolConnection, ResultSetHeader, RowDataPacket } from "mysql2/promise"
import { isTransientMysqlError } from "../util"
import type { ConnectionManager, Logger } from "../util"
import { LeaderboardError } from "./errors"
import { decideUpdate } from "./ordering"
import type { PlayerProfile, ScoreStore } from "./score-store"
import type { Leaderboard, Player, PutResult, RankEntry, ScoreEntry } from "./types"

export interface RdsScoreStoreProps {
    connectionManager: ConnectionManager
    logger: Logger
}

const toScoreEntry = (row: RowDataPacket): ScoreEntry => {
    const entry: ScoreEntry = {
        playerId: String(row["player_id"]),
        value: Number(row["value"]),
        timestamp: Number(row["submitted_at"])
    }
    if (row["meta"] !== null && row["meta"] !== undefined) {
        entry.meta = String(row["meta"])
    }
    return entry
}

const toPlayer = (row: RowDataPacket): Player => {
    const player: Player = {
        leaderboardId: String(row["leaderboard_id"]),
        id: String(row["id"]),
        name: String(row["name"])
    }
    if (row["player_key"]) {
        player.key = String(row["player_key"])
    }
    return player
}

const escapeLike = (value: string) => value.replace(/[\\%_]/g, (c) => `\\${c}`)

export class RdsScoreStore implements ScoreStore {
    private readonly connectionManager: ConnectionManager
    private readonly logger: Logger

    constructor(props: RdsScoreStoreProps) {
        this.connectionManager = props.connectionManager
        this.logger = props.logger.child({ component: "RdsScoreStore" })
    }

    async put(leaderboard: Leaderboard, profile: PlayerProfile, entry: ScoreEntry): Promise<PutResult> {
        return this.inTransaction("put", async (conn) => {
            // The upsert takes the player row lock, serialising writers across containers.
            await conn.execute(
                "insert into players (leaderboard_id, id, name) values (?, ?, ?) on duplicate key update name = values(name)",
                [leaderboard.id, profile.id, profile.name]
            )

            const [rows] = await conn.execute<RowDataPacket[]>(
                "select id, player_id, value, submitted_at, meta from scores where leaderboard_id=? and player_id=? and is_current=1 for update",
                [leaderboard.id, profile.id]
            )
            const current = rows.length > 0 ? toScoreEntry(rows[0]) : undefined
            const decision = decideUpdate(leaderboard.updatePolicy, leaderboard.ordering, current, entry)

            if (decision.kind === "retain") {
                if (decision.appendHistory) {
                    await this.insertScore(conn, leaderboard.id, entry, false)
                }
                return { current: decision.current, previous: decision.current, changed: false }
            }

            if (decision.appendHistory) {
                await conn.execute(
                    "update scores set is_current=0 where leaderboard_id=? and player_id=? and is_current=1",
                    [leaderboard.id, profile.id]
                )
            } else {
                await conn.execute(
                    "delete from scores where leaderboard_id=? and player_id=?",
                    [leaderboard.id, profile.id]
                )
            }
            await this.insertScore(conn, leaderboard.id, entry, true)

            return { current: entry, previous: decision.superseded, changed: true }
        })
    }

    async getCurrent(leaderboardId: string, playerId: string): Promise<ScoreEntry | undefined> {
        const rows = await this.query(
            "getCurrent",
            "select player_id, value, submitted_at, meta from scores where leaderboard_id=? and player_id=? and is_current=1",
            [leaderboardId, playerId]
        )
        return rows.length > 0 ? toScoreEntry(rows[0]) : undefined
    }

    async history(leaderboardId: string, playerId: string): Promise<ScoreEntry[]> {
        const rows = await this.query(
            "history",
            "select player_id, value, submitted_at, meta from scores where leaderboard_id=? and player_id=? order by id",
            [leaderboardId, playerId]
        )
        return rows.map(toScoreEntry)
    }

    async currentEntries(leaderboardId: string): Promise<RankEntry[]> {
        const rows = await this.query(
            "currentEntries",
            "select s.player_id, s.value, s.submitted_at, s.meta, p.name from scores s inner join players p on s.leaderboard_id=p.leaderboard_id and s.player_id=p.id where s.leaderboard_id=? and s.is_current=1",
            [leaderboardId]
        )
        return rows.map((row) => ({ ...toScoreEntry(row), name: String(row["name"]) }))
    }

    async getPlayer(leaderboardId: string, playerId: string): Promise<Player | undefined> {
        const rows = await this.query(
            "getPlayer",
            "select leaderboard_id, id, name, player_key from players where leaderboard_id=? and id=?",
            [leaderboardId, playerId]
        )
        return rows.length > 0 ? toPlayer(rows[0]) : undefined
    }

    async createPlayer(player: Player): Promise<Player> {
        await this.query(
            "createPlayer",
            "insert into players (leaderboard_id, id, name, player_key) values (?, ?, ?, ?) on duplicate key update name = values(name), player_key = values(player_key)",
            [player.leaderboardId, player.id, player.name, player.key ?? null]
        )
        return { ...player }
    }

    async searchPlayers(leaderboardId: string, namePrefix: string, limit: number): Promise<Player[]> {
        const rows = await this.query(
            "searchPlayers",
            `select leaderboard_id, id, name, player_key from players where leaderboard_id=? and name like ? order by name limit ${Math.max(0, Math.floor(limit))}`,
            [leaderboardId, `${escapeLike(namePrefix)}%`]
        )
        return rows.map(toPlayer)
    }

    private async insertScore(conn: PoolConnection, leaderboardId: string, entry: ScoreEntry, isCurrent: boolean) {
        await conn.execute<ResultSetHeader>(
            "insert into scores (leaderboard_id, player_id, value, submitted_at, meta, is_current) values (?, ?, ?, ?, ?, ?)",
            [leaderboardId, entry.playerId, entry.value, entry.timestamp, entry.meta ?? null, isCurrent ? 1 : 0]
        )
    }

    private async query(operation: string, sql: string, values: Array<string | number | null>): Promise<RowDataPacket[]> {
        try {
            const pool = await this.connectionManager.getOrCreateRDSPool()
            const [rows] = await pool.execute<RowDataPacket[]>(sql, values)
            return rows
        } catch (e) {
            throw this.translate(operation, e)
        }
    }

    private async inTransaction<T>(operation: string, work: (conn: PoolConnection) => Promise<T>): Promise<T> {
        let conn: PoolConnection | undefined
        try {
            const pool = await this.connectionManager.getOrCreateRDSPool()
            conn = await pool.getConnection()
            await conn.beginTransaction()
            const result = await work(conn)
            await conn.commit()
            return result
        } catch (e) {
            if (conn) {
                await conn.rollback().catch((rollbackError: unknown) => {
                    this.logger.warn({ err: rollbackError, operation }, "rollback failed")
                })
            }
            throw this.translate(operation, e)
        } finally {
            conn?.release()
        }
    }

    private translate(operation: string, e: unknown): unknown {
        if (isTransientMysqlError(e)) {
            this.logger.warn({ err: e, operation }, "transient mysql failure")
            return LeaderboardError.storageUnavailable(operation, e)
        }
        return e
    }
}
