// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import type { ResultSetHeader, RowDataPacket } from "mysql2/promise"
import { isTransientMysqlError } from "../util"
import type { ConnectionManager } from "../util"
import { LeaderboardError } from "./errors"
import type { LeaderboardRepository } from "./leaderboard-repository"
import { ScoreOrdering, UpdatePolicy } from "./types"
import type { Leaderboard } from "./types"

const ORDERINGS: ReadonlySet<string> = new Set(Object.values(ScoreOrdering))
const POLICIES: ReadonlySet<string> = new Set(Object.values(UpdatePolicy))

const isOrdering = (value: string): value is ScoreOrdering => ORDERINGS.has(value)
const isPolicy = (value: string): value is UpdatePolicy => POLICIES.has(value)

const toLeaderboard = (row: RowDataPacket): Leaderboard => {
    const ordering = String(row["ordering"])
    const updatePolicy = String(row["update_policy"])

    if (!isOrdering(ordering) || !isPolicy(updatePolicy)) {
        throw new Error(`Leaderboard ${row["id"]} has an unknown ordering or update policy`)
    }

    const leaderboard: Leaderboard = {
        id: String(row["id"]),
        secret: String(row["secret"]),
        name: String(row["name"]),
        ordering,
        updatePolicy,
        createdAt: new Date(Number(row["created_at"]))
    }
    if (row["deleted_at"] !== null && row["deleted_at"] !== undefined) {
        leaderboard.deletedAt = new Date(Number(row["deleted_at"]))
    }
    return leaderboard
}

export class RdsLeaderboardRepository implements LeaderboardRepository {

    constructor(private readonly connectionManager: ConnectionManager) {}

    async find(id: string): Promise<Leaderboard | undefined> {
        const rows = await this.execute<RowDataPacket[]>(
            "find",
            "select id, secret, name, ordering, update_policy, created_at, deleted_at from leaderboards where id=?",
            [id]
        )
        return rows.length > 0 ? toLeaderboard(rows[0]) : undefined
    }

    async insert(leaderboard: Leaderboard): Promise<void> {
        await this.execute<ResultSetHeader>(
            "insert",
            "insert into leaderboards (id, secret, name, ordering, update_policy, created_at, deleted_at) values (?, ?, ?, ?, ?, ?, ?)",
            [
                leaderboard.id,
                leaderboard.secret,
                leaderboard.name,
                leaderboard.ordering,
                leaderboard.updatePolicy,
                leaderboard.createdAt.getTime(),
                leaderboard.deletedAt?.getTime() ?? null
            ]
        )
    }

    async update(leaderboard: Leaderboard): Promise<void> {
        await this.execute<ResultSetHeader>(
            "update",
            "update leaderboards set secret=?, name=?, deleted_at=? where id=?",
            [leaderboard.secret, leaderboard.name, leaderboard.deletedAt?.getTime() ?? null, leaderboard.id]
        )
    }

    private async execute<T extends RowDataPacket[] | ResultSetHeader>(operation: string, sql: string, values: Array<string | number | null>): Promise<T> {
        try {
            const pool = await this.connectionManager.getOrCreateRDSPool()
            const [result] = await pool.execute<T>(sql, values)
            return result
        } catch (e) {
            if (isTransientMysqlError(e)) {
                throw LeaderboardError.storageUnavailable(`leaderboard ${operation}`, e)
            }
            throw e
        }
    }
}
