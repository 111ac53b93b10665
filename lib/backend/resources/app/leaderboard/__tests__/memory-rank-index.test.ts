// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import { describe, expect, it } from "vitest"
import { MemoryRankIndex } from "../memory-rank-index"
import { compareEntries } from "../ordering"
import { IndexState } from "../rank-index"
import { ScoreOrdering } from "../types"
import type { RankEntry } from "../types"
import { rankEntry } from "./fixtures"

const players = (count: number): RankEntry[] => {
    return Array.from({ length: count }, (_, i) => rankEntry(`p${String(i).padStart(3, "0")}`, (i * 37) % 50, 1000 + (i % 7)))
}

describe("MemoryRankIndex", () => {
    it("ranks the keep-best example", async () => {
        const index = new MemoryRankIndex("lb-1", ScoreOrdering.HIGHER_IS_BETTER)

        await index.insertOrUpdate(rankEntry("alice", 100, 1))
        await index.insertOrUpdate(rankEntry("bob", 150, 2))

        expect(await index.top(2)).toEqual([
            { player_id: "bob", name: "bob", score: 150, timestamp: 2, rank: 1 },
            { player_id: "alice", name: "alice", score: 100, timestamp: 1, rank: 2 }
        ])
    })

    it("orders entries by value, then timestamp, then player id", async () => {
        const index = new MemoryRankIndex("lb-1", ScoreOrdering.HIGHER_IS_BETTER)
        const entries = players(200)

        for (const entry of entries) {
            await index.insertOrUpdate(entry)
        }

        const expected = [...entries].sort((a, b) => compareEntries(ScoreOrdering.HIGHER_IS_BETTER, a, b))
        const top = await index.top(500)

        expect(top.map((s) => s.player_id)).toEqual(expected.map((e) => e.playerId))
        expect(top.map((s) => s.rank)).toEqual(expected.map((_, i) => i + 1))
        expect(await index.size()).toBe(200)
    })

    it("reports ranks consistent with top", async () => {
        const index = new MemoryRankIndex("lb-1", ScoreOrdering.LOWER_IS_BETTER)
        for (const entry of players(64)) {
            await index.insertOrUpdate(entry)
        }

        for (const score of await index.top(64)) {
            expect(await index.rankOf(score.player_id)).toBe(score.rank)
        }
        expect(await index.rankOf("nobody")).toBeUndefined()
    })

    it("moves a player when their entry changes", async () => {
        const index = new MemoryRankIndex("lb-1", ScoreOrdering.HIGHER_IS_BETTER)
        await index.insertOrUpdate(rankEntry("alice", 10, 1))
        await index.insertOrUpdate(rankEntry("bob", 20, 1))
        await index.insertOrUpdate(rankEntry("carol", 30, 1))

        await index.insertOrUpdate(rankEntry("alice", 40, 2))

        expect((await index.top(3)).map((s) => s.player_id)).toEqual(["alice", "carol", "bob"])
        expect(await index.size()).toBe(3)
    })

    it("returns the window around a player, clipped at the edges", async () => {
        const index = new MemoryRankIndex("lb-1", ScoreOrdering.HIGHER_IS_BETTER)
        for (const [i, id] of ["a", "b", "c", "d", "e"].entries()) {
            await index.insertOrUpdate(rankEntry(id, 50 - i, 1))
        }

        expect((await index.around("c", 1)).map((s) => [s.player_id, s.rank])).toEqual([["b", 2], ["c", 3], ["d", 4]])
        expect((await index.around("a", 2)).map((s) => s.rank)).toEqual([1, 2, 3])
        expect((await index.around("e", 10)).map((s) => s.rank)).toEqual([1, 2, 3, 4, 5])
        expect(await index.around("z", 1)).toEqual([])
    })

    it("rebuilds from a projection, keeping the best entry per player", async () => {
        const index = new MemoryRankIndex("lb-1", ScoreOrdering.HIGHER_IS_BETTER)
        await index.insertOrUpdate(rankEntry("stale", 999, 1))

        await index.rebuild([rankEntry("alice", 10, 1), rankEntry("bob", 30, 1), rankEntry("alice", 20, 2)])

        expect(await index.entries()).toEqual([rankEntry("bob", 30, 1), rankEntry("alice", 20, 2)])
        expect(await index.rankOf("stale")).toBeUndefined()

        await index.insertOrUpdate(rankEntry("carol", 25, 3))
        expect((await index.top(3)).map((s) => s.player_id)).toEqual(["bob", "carol", "alice"])
    })

    it("keeps results already read when the index changes afterwards", async () => {
        const index = new MemoryRankIndex("lb-1", ScoreOrdering.HIGHER_IS_BETTER)
        await index.insertOrUpdate(rankEntry("alice", 10, 1))

        const before = await index.entries()
        await index.insertOrUpdate(rankEntry("bob", 20, 1))

        expect(before).toEqual([rankEntry("alice", 10, 1)])
        expect(await index.entries()).toHaveLength(2)
    })

    it("counts writes and drops a rebuild that raced one", async () => {
        const index = new MemoryRankIndex("lb-1", ScoreOrdering.HIGHER_IS_BETTER)
        expect(await index.status()).toEqual({ state: IndexState.UNBUILT, generation: 0 })

        await index.insertOrUpdate(rankEntry("alice", 10, 1))
        expect(await index.rebuild([], 0)).toBe(false)
        expect(await index.size()).toBe(1)

        expect(await index.rebuild([rankEntry("bob", 20, 1)], 1)).toBe(true)
        expect(await index.status()).toEqual({ state: IndexState.READY, generation: 1 })

        await index.markStale()
        expect(await index.status()).toEqual({ state: IndexState.STALE, generation: 2 })
    })

    it("keeps the cost of a write logarithmic in the number of players", async () => {
        const timeWrites = async (players: number) => {
            const index = new MemoryRankIndex("lb-1", ScoreOrdering.HIGHER_IS_BETTER)
            await index.rebuild(Array.from({ length: players }, (_, i) => rankEntry(`p${i}`, i, 1)))

            const started = performance.now()
            for (let i = 0; i < 500; i++) {
                await index.insertOrUpdate(rankEntry(`p${(i * 37) % players}`, players + i, 2))
            }
            return performance.now() - started
        }

        await timeWrites(1_000)
        const small = await timeWrites(1_000)
        const large = await timeWrites(100_000)

        expect(large).toBeLessThan(small * 20 + 50)
    })
})
