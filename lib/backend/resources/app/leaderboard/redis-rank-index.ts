// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import { randomUUID } from "node:crypto"
import type { Logger } from "../util"
import { LeaderboardError, isLeaderboardError } from "./errors"
import { IndexState, toRankedScore } from "./rank-index"
import type { IndexStatus, RankIndex } from "./rank-index"
import { ScoreOrdering } from "./types"
import type { RankEntry, RankedScore } from "./types"

/**
 * The subset of a Redis client the index needs. `Tedis` satisfies it.
 */
export interface RedisCommander {
    command(...parameters: Array<string | number>): Promise<unknown>
}

const TIMESTAMP_WIDTH = 16

/*
 * Each ranked player is a sorted-set member named `<zero padded timestamp>:<player id>`
 * whose score is the value, negated for higher-is-better boards. Redis orders
 * equal scores by member name, which gives the timestamp then player id tie-break.
 *
 * KEYS[1] ranks zset, KEYS[2] player -> member hash, KEYS[3] player -> name hash,
 * KEYS[4] generation counter, KEYS[5] index state ("ready" or "stale", absent until built).
 */
const RANGE_REPLY = `
local function reply(startIndex, rows)
    local names = {}
    for i = 1, #rows, 2 do
        names[#names + 1] = redis.call("HGET", KEYS[3], string.sub(rows[i], ${TIMESTAMP_WIDTH + 2})) or ""
    end
    return { startIndex, rows, names }
end
`

export const RANK_SCRIPTS = {
    upsert: `
local previous = redis.call("HGET", KEYS[2], ARGV[1])
if previous then
    redis.call("ZREM", KEYS[1], previous)
end
redis.call("ZADD", KEYS[1], ARGV[3], ARGV[2])
redis.call("HSET", KEYS[2], ARGV[1], ARGV[2])
redis.call("HSET", KEYS[3], ARGV[1], ARGV[4])
return redis.call("INCR", KEYS[4])
`,
    top: `${RANGE_REPLY}
return reply(0, redis.call("ZRANGE", KEYS[1], 0, tonumber(ARGV[1]), "WITHSCORES"))
`,
    around: `${RANGE_REPLY}
local member = redis.call("HGET", KEYS[2], ARGV[1])
if not member then
    return false
end
local rank = redis.call("ZRANK", KEYS[1], member)
local window = tonumber(ARGV[2])
local startIndex = math.max(0, rank - window)
return reply(startIndex, redis.call("ZRANGE", KEYS[1], startIndex, rank + window, "WITHSCORES"))
`,
    status: `
return { redis.call("GET", KEYS[5]) or "", redis.call("GET", KEYS[4]) or "0" }
`,
    markStale: `
redis.call("SET", KEYS[5], "${IndexState.STALE}")
return redis.call("INCR", KEYS[4])
`,
    // KEYS[6..8] staging copies of KEYS[1..3]; ARGV[1] expected generation, empty to swap unconditionally.
    swap: `
if ARGV[1] ~= "" and (redis.call("GET", KEYS[4]) or "0") ~= ARGV[1] then
    redis.call("DEL", KEYS[6], KEYS[7], KEYS[8])
    return 0
end
for i = 1, 3 do
    if redis.call("EXISTS", KEYS[i + 5]) == 1 then
        redis.call("RENAME", KEYS[i + 5], KEYS[i])
        redis.call("PERSIST", KEYS[i])
    else
        redis.call("DEL", KEYS[i])
    end
end
redis.call("SET", KEYS[5], "${IndexState.READY}")
return 1
`
} as const

export const encodeMember = (entry: Pick<RankEntry, "playerId" | "timestamp">): string => {
    return `${String(entry.timestamp).padStart(TIMESTAMP_WIDTH, "0")}:${entry.playerId}`
}

export const decodeMember = (member: string): { playerId: string, timestamp: number } => {
    return {
        timestamp: Number(member.slice(0, TIMESTAMP_WIDTH)),
        playerId: member.slice(TIMESTAMP_WIDTH + 1)
    }
}

const isStringArray = (value: unknown): value is string[] => {
    return Array.isArray(value) && value.every((item) => typeof item === "string")
}

const REBUILD_BATCH_SIZE = 500
/** Staging keys left by a rebuild that never reached its swap expire after this. */
const STAGING_TTL_SECONDS = 300

const toIndexState = (value: unknown): IndexState => {
    if (value === IndexState.READY || value === IndexState.STALE) {
        return value
    }
    return IndexState.UNBUILT
}

export interface RedisRankIndexProps {
    leaderboardId: string
    ordering: ScoreOrdering
    connect: () => Promise<RedisCommander>
    logger: Logger
}

export class RedisRankIndex implements RankIndex {
    public readonly leaderboardId: string
    private readonly ordering: ScoreOrdering
    private readonly connect: () => Promise<RedisCommander>
    private readonly logger: Logger
    private readonly keys: readonly string[]

    constructor(props: RedisRankIndexProps) {
        this.leaderboardId = props.leaderboardId
        this.ordering = props.ordering
        this.connect = props.connect
        this.logger = props.logger.child({ component: "RedisRankIndex", leaderboardId: props.leaderboardId })
        this.keys = [
            `leaderboard:${props.leaderboardId}:ranks`,
            `leaderboard:${props.leaderboardId}:members`,
            `leaderboard:${props.leaderboardId}:names`,
            `leaderboard:${props.leaderboardId}:generation`,
            `leaderboard:${props.leaderboardId}:state`
        ]
    }

    async insertOrUpdate(entry: RankEntry): Promise<void> {
        await this.eval("insertOrUpdate", RANK_SCRIPTS.upsert, this.keys, [
            entry.playerId,
            encodeMember(entry),
            this.toRedisScore(entry.value),
            entry.name
        ])
    }

    async top(n: number): Promise<RankedScore[]> {
        if (n <= 0) {
            return []
        }
        const reply = await this.eval("top", RANK_SCRIPTS.top, this.keys, [n - 1])
        return this.parseRange(reply)
    }

    async rankOf(playerId: string): Promise<number | undefined> {
        const [own] = await this.around(playerId, 0)
        return own?.rank
    }

    async around(playerId: string, window: number): Promise<RankedScore[]> {
        const reply = await this.eval("around", RANK_SCRIPTS.around, this.keys, [playerId, window])
        return reply === null ? [] : this.parseRange(reply)
    }

    async size(): Promise<number> {
        const reply = await this.run("size", (redis) => redis.command("ZCARD", this.keys[0]))
        return Number(reply)
    }

    async entries(): Promise<RankEntry[]> {
        const ranked = this.parseRange(await this.eval("entries", RANK_SCRIPTS.top, this.keys, [-1]))
        return ranked.map((score) => ({
            playerId: score.player_id,
            name: score.name,
            value: score.score,
            timestamp: score.timestamp
        }))
    }

    async status(): Promise<IndexStatus> {
        const reply = await this.eval("status", RANK_SCRIPTS.status, this.keys, [])
        if (!isStringArray(reply) || reply.length !== 2) {
            throw new Error(`Unexpected status reply from redis for leaderboard ${this.leaderboardId}`)
        }

        return { state: toIndexState(reply[0]), generation: Number(reply[1]) }
    }

    async markStale(): Promise<void> {
        await this.eval("markStale", RANK_SCRIPTS.markStale, this.keys, [])
    }

    /**
     * Writes the new content under staging keys private to this rebuild, then
     * swaps them in with one script, so readers see either the old or the new
     * index. The swap is dropped when another process wrote in the meantime.
     */
    async rebuild(entries: readonly RankEntry[], expectedGeneration?: number): Promise<boolean> {
        const rebuildId = randomUUID()
        const staging = this.keys.slice(0, 3).map((key) => `${key}:rebuild:${rebuildId}`)

        const reply = await this.run("rebuild", async (redis) => {
            for (let i = 0; i < entries.length; i += REBUILD_BATCH_SIZE) {
                const batch = entries.slice(i, i + REBUILD_BATCH_SIZE)
                await redis.command("ZADD", staging[0], ...batch.flatMap((entry) => [this.toRedisScore(entry.value), encodeMember(entry)]))
                await redis.command("HSET", staging[1], ...batch.flatMap((entry) => [entry.playerId, encodeMember(entry)]))
                await redis.command("HSET", staging[2], ...batch.flatMap((entry) => [entry.playerId, entry.name]))
            }
            for (const key of staging) {
                await redis.command("EXPIRE", key, STAGING_TTL_SECONDS)
            }

            const keys = [...this.keys, ...staging]
            return redis.command("EVAL", RANK_SCRIPTS.swap, keys.length, ...keys, expectedGeneration ?? "")
        })

        const swapped = Number(reply) === 1
        if (swapped) {
            this.logger.info({ entries: entries.length }, "redis rank index rebuilt")
        } else {
            this.logger.info({ expectedGeneration }, "redis rank index written during rebuild, swap dropped")
        }
        return swapped
    }

    private toRedisScore(value: number): number {
        return this.ordering === ScoreOrdering.HIGHER_IS_BETTER ? -value : value
    }

    private fromRedisScore(score: string): number {
        const value = Number(score)
        return this.ordering === ScoreOrdering.HIGHER_IS_BETTER ? -value : value
    }

    private parseRange(reply: unknown): RankedScore[] {
        if (!Array.isArray(reply) || reply.length !== 3) {
            throw new Error(`Unexpected range reply from redis for leaderboard ${this.leaderboardId}`)
        }

        const [startIndex, rows, names] = reply
        if (typeof startIndex !== "number" || !isStringArray(rows) || !isStringArray(names)) {
            throw new Error(`Unexpected range reply from redis for leaderboard ${this.leaderboardId}`)
        }

        const results: RankedScore[] = []
        for (let i = 0; i < rows.length; i += 2) {
            const { playerId, timestamp } = decodeMember(rows[i])
            results.push(toRankedScore({
                playerId,
                timestamp,
                value: this.fromRedisScore(rows[i + 1]),
                name: names[i / 2] ?? ""
            }, startIndex + i / 2 + 1))
        }

        return results
    }

    private async eval(operation: string, script: string, keys: readonly string[], args: Array<string | number>): Promise<unknown> {
        return this.run(operation, (redis) => redis.command("EVAL", script, keys.length, ...keys, ...args))
    }

    private async run<T>(operation: string, action: (redis: RedisCommander) => Promise<T>): Promise<T> {
        try {
            const redis = await this.connect()
            return await action(redis)
        } catch (e) {
            if (isLeaderboardError(e)) {
                throw e
            }
            this.logger.warn({ err: e, operation }, "redis rank index operation failed")
            throw LeaderboardError.storageUnavailable(`rank index ${operation}`, e)
        }
    }
}
