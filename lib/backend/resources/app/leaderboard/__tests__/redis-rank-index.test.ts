// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import { beforeEach, describe, expect, it } from "vitest"
import { LeaderboardErrorCode } from "../errors"
import { IndexState } from "../rank-index"
import { RedisRankIndex, decodeMember, encodeMember } from "../redis-rank-index"
import { ScoreOrdering } from "../types"
import { FakeRedis } from "./fake-redis"
import { createMockLogger, rankEntry } from "./fixtures"

describe("member encoding", () => {
    it("pads the timestamp so members sort by time", () => {
        expect(encodeMember({ playerId: "alice", timestamp: 1700000000000 })).toBe("0001700000000000:alice")
        expect(decodeMember("0001700000000000:team:alice")).toEqual({ playerId: "team:alice", timestamp: 1700000000000 })
    })
})

describe("RedisRankIndex", () => {
    let redis: FakeRedis

    const createIndex = (ordering = ScoreOrdering.HIGHER_IS_BETTER) => new RedisRankIndex({
        leaderboardId: "lb-1",
        ordering,
        connect: async () => redis,
        logger: createMockLogger()
    })

    beforeEach(() => {
        redis = new FakeRedis()
    })

    it("stores negated values for higher-is-better boards", async () => {
        const index = createIndex()

        await index.insertOrUpdate(rankEntry("alice", 100, 1, "Alice"))

        expect(redis.zsets.get("leaderboard:lb-1:ranks")).toEqual(new Map([["0000000000000001:alice", -100]]))
        expect(redis.hashes.get("leaderboard:lb-1:names")).toEqual(new Map([["alice", "Alice"]]))
    })

    it("ranks by value, then timestamp, then player id", async () => {
        const index = createIndex()
        await index.insertOrUpdate(rankEntry("carol", 100, 5))
        await index.insertOrUpdate(rankEntry("bob", 100, 3))
        await index.insertOrUpdate(rankEntry("alice", 100, 3))
        await index.insertOrUpdate(rankEntry("dave", 150, 9))

        expect(await index.top(10)).toEqual([
            { player_id: "dave", name: "dave", score: 150, timestamp: 9, rank: 1 },
            { player_id: "alice", name: "alice", score: 100, timestamp: 3, rank: 2 },
            { player_id: "bob", name: "bob", score: 100, timestamp: 3, rank: 3 },
            { player_id: "carol", name: "carol", score: 100, timestamp: 5, rank: 4 }
        ])
        expect(await index.rankOf("bob")).toBe(3)
        expect(await index.size()).toBe(4)
    })

    it("replaces a player's previous member on update", async () => {
        const index = createIndex(ScoreOrdering.LOWER_IS_BETTER)
        await index.insertOrUpdate(rankEntry("alice", 40, 1))
        await index.insertOrUpdate(rankEntry("bob", 35, 1))

        await index.insertOrUpdate(rankEntry("alice", 31, 2))

        expect((await index.top(2)).map((s) => [s.player_id, s.score])).toEqual([["alice", 31], ["bob", 35]])
        expect(await index.size()).toBe(2)
    })

    it("returns the window around a player", async () => {
        const index = createIndex()
        for (const [i, id] of ["a", "b", "c", "d", "e"].entries()) {
            await index.insertOrUpdate(rankEntry(id, 50 - i, 1))
        }

        expect((await index.around("d", 1)).map((s) => [s.player_id, s.rank])).toEqual([["c", 3], ["d", 4], ["e", 5]])
        expect(await index.around("nobody", 1)).toEqual([])
        expect(await index.rankOf("nobody")).toBeUndefined()
    })

    it("rebuilds through staging keys and swaps them in", async () => {
        const index = createIndex()
        await index.insertOrUpdate(rankEntry("stale", 999, 1))

        expect(await index.rebuild([rankEntry("alice", 10, 1), rankEntry("bob", 30, 2)])).toBe(true)

        expect(await index.entries()).toEqual([rankEntry("bob", 30, 2), rankEntry("alice", 10, 1)])
        expect(await index.rankOf("stale")).toBeUndefined()
        expect([...redis.zsets.keys(), ...redis.hashes.keys()].filter((key) => key.includes(":rebuild:"))).toEqual([])
        expect(redis.expiring.size).toBe(0)
    })

    it("clears the index when rebuilt from nothing", async () => {
        const index = createIndex()
        await index.insertOrUpdate(rankEntry("alice", 10, 1))

        await index.rebuild([])

        expect(await index.size()).toBe(0)
        expect(await index.top(5)).toEqual([])
    })

    it("reports an unbuilt index until the first rebuild", async () => {
        const index = createIndex()
        expect(await index.status()).toEqual({ state: IndexState.UNBUILT, generation: 0 })

        await index.rebuild([rankEntry("alice", 10, 1)])
        await index.insertOrUpdate(rankEntry("bob", 20, 2))

        expect(await index.status()).toEqual({ state: IndexState.READY, generation: 1 })
    })

    it("shares the stale marker with every index on the same keys", async () => {
        const writer = createIndex()
        const reader = createIndex()
        await writer.rebuild([])

        await writer.markStale()

        expect(await reader.status()).toEqual({ state: IndexState.STALE, generation: 1 })
        expect(await reader.rebuild([rankEntry("alice", 10, 1)], 1)).toBe(true)
        expect(await writer.status()).toEqual({ state: IndexState.READY, generation: 1 })
    })

    it("drops a rebuild when the index was written after its generation was read", async () => {
        const rebuilding = createIndex()
        const writing = createIndex()
        const { generation } = await rebuilding.status()

        await writing.insertOrUpdate(rankEntry("alice", 99, 2))

        expect(await rebuilding.rebuild([rankEntry("alice", 10, 1)], generation)).toBe(false)
        expect(await rebuilding.top(5)).toEqual([{ player_id: "alice", name: "alice", score: 99, timestamp: 2, rank: 1 }])
        expect((await rebuilding.status()).state).toBe(IndexState.UNBUILT)
        expect([...redis.zsets.keys(), ...redis.hashes.keys()].filter((key) => key.includes(":rebuild:"))).toEqual([])
    })

    it("reports redis failures as storage unavailable", async () => {
        const index = createIndex()
        redis.failNext(1)

        await expect(index.insertOrUpdate(rankEntry("alice", 10, 1))).rejects.toMatchObject({
            code: LeaderboardErrorCode.STORAGE_UNAVAILABLE,
            message: "Storage unavailable during rank index insertOrUpdate: Connection is closed."
        })
    })
})
