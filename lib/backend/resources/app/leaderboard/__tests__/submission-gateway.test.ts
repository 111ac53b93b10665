// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import { describe, expect, it, vi } from "vitest"
import { signSubmission } from "../credentials"
import { LeaderboardError, LeaderboardErrorCode } from "../errors"
import { MemoryRankIndex } from "../memory-rank-index"
import { ScoreOrdering, UpdatePolicy } from "../types"
import { createTestServices } from "./fixtures"

const setup = async (updatePolicy = UpdatePolicy.KEEP_BEST, options: Parameters<typeof createTestServices>[0] = {}) => {
    const services = createTestServices(options)
    const leaderboard = await services.registry.provision({
        name: "Arcade",
        ordering: ScoreOrdering.HIGHER_IS_BETTER,
        updatePolicy
    })
    return { ...services, leaderboard }
}

const unavailable = () => LeaderboardError.storageUnavailable("put", new Error("connection lost"))

describe("SubmissionGateway", () => {
    it("keeps each player's best score", async () => {
        const { gateway, queries, leaderboard } = await setup()
        const key = leaderboard.secret

        await gateway.submit(leaderboard.id, { key, player_id: "alice", score: 100, timestamp: 1 })
        await gateway.submit(leaderboard.id, { key, player_id: "bob", score: 150, timestamp: 2 })
        const receipt = await gateway.submit(leaderboard.id, { key, player_id: "alice", score: 90, timestamp: 3 })

        expect(receipt).toEqual({
            leaderboard_id: leaderboard.id,
            player_id: "alice",
            accepted: false,
            entry: { playerId: "alice", value: 100, timestamp: 1 },
            rank: 2
        })
        expect(await queries.top(leaderboard.id, 2)).toEqual([
            { player_id: "bob", name: "bob", score: 150, timestamp: 2, rank: 1 },
            { player_id: "alice", name: "alice", score: 100, timestamp: 1, rank: 2 }
        ])
    })

    it("rejects a wrong secret without changing anything", async () => {
        const { gateway, queries, store, leaderboard } = await setup()
        await gateway.submit(leaderboard.id, { key: leaderboard.secret, player_id: "alice", score: 100, timestamp: 1 })

        await expect(gateway.submit(leaderboard.id, { key: "test-secret", player_id: "bob", score: 500, timestamp: 2 }))
            .rejects.toMatchObject({ code: LeaderboardErrorCode.AUTHENTICATION_FAILED })

        expect((await queries.top(leaderboard.id, 10)).map((s) => s.player_id)).toEqual(["alice"])
        expect(await store.history(leaderboard.id, "bob")).toEqual([])
    })

    it("treats a repeated keep-latest submission as idempotent", async () => {
        const { gateway, queries, store, leaderboard } = await setup(UpdatePolicy.KEEP_LATEST)
        const submission = { key: leaderboard.secret, player_id: "alice", score: 70, timestamp: 10 }

        await gateway.submit(leaderboard.id, submission)
        const before = await queries.top(leaderboard.id, 10)
        await gateway.submit(leaderboard.id, submission)

        expect(await queries.top(leaderboard.id, 10)).toEqual(before)
        expect(await store.history(leaderboard.id, "alice")).toHaveLength(1)
    })

    it("uses the submitted display name and the server clock when no timestamp is given", async () => {
        const { gateway, queries, leaderboard } = await setup()

        const receipt = await gateway.submit(leaderboard.id, { key: leaderboard.secret, player_id: "p-1", name: "Alice", score: 12 })
        await gateway.submit(leaderboard.id, { key: leaderboard.secret, player_id: "p-1", score: 15, timestamp: 20 })

        expect(receipt.entry.timestamp).toBe(5000)
        expect(await queries.playerRank(leaderboard.id, "p-1")).toEqual({ player_id: "p-1", name: "Alice", score: 15, timestamp: 20, rank: 1 })
    })

    it("rejects malformed submissions with the validation issues", async () => {
        const { gateway, leaderboard } = await setup()

        const rejection = gateway.submit(leaderboard.id, { key: leaderboard.secret, player_id: "alice", score: "lots" })

        await expect(rejection).rejects.toMatchObject({
            code: LeaderboardErrorCode.MALFORMED_SUBMISSION,
            message: "score: Expected number, received string"
        })
    })

    it("rejects meta longer than the configured limit", async () => {
        const { gateway, leaderboard } = await setup()

        await expect(gateway.submit(leaderboard.id, { key: leaderboard.secret, player_id: "alice", score: 1, meta: "x".repeat(65) }))
            .rejects.toMatchObject({ code: LeaderboardErrorCode.MALFORMED_SUBMISSION })
    })

    it("rejects submissions to unknown leaderboards", async () => {
        const { gateway } = await setup()

        await expect(gateway.submit("missing", { key: "test-secret", player_id: "alice", score: 1 }))
            .rejects.toMatchObject({ code: LeaderboardErrorCode.LEADERBOARD_NOT_FOUND })
    })

    it("ranks concurrent submissions from different players consecutively", async () => {
        const { gateway, indexes, queries, leaderboard } = await setup()
        const submissions = Array.from({ length: 50 }, (_, i) => ({ player_id: `player-${i}`, score: (i * 7) % 13, timestamp: i }))

        await Promise.all(submissions.map((submission) => gateway.submit(leaderboard.id, { key: leaderboard.secret, ...submission })))

        const expected = [...submissions].sort((a, b) => b.score - a.score || a.timestamp - b.timestamp)
        const index = await indexes.forReading(leaderboard)
        expect(await queries.size(leaderboard.id)).toBe(50)
        expect((await index.top(50)).map((s) => [s.player_id, s.score, s.rank]))
            .toEqual(expected.map((submission, i) => [submission.player_id, submission.score, i + 1]))
    })

    it("linearises concurrent submissions from one player", async () => {
        const { gateway, queries, store, leaderboard } = await setup()

        await Promise.all(Array.from({ length: 20 }, (_, i) => gateway.submit(leaderboard.id, {
            key: leaderboard.secret,
            player_id: "alice",
            score: i + 1,
            timestamp: i
        })))

        expect(await store.getCurrent(leaderboard.id, "alice")).toEqual({ playerId: "alice", value: 20, timestamp: 19 })
        expect(await queries.top(leaderboard.id, 10)).toEqual([{ player_id: "alice", name: "alice", score: 20, timestamp: 19, rank: 1 }])
    })

    it("retries storage outages with exponential backoff", async () => {
        const { gateway, store, wait, leaderboard } = await setup()
        vi.spyOn(store, "put")
            .mockRejectedValueOnce(unavailable())
            .mockRejectedValueOnce(unavailable())

        const receipt = await gateway.submit(leaderboard.id, { key: leaderboard.secret, player_id: "alice", score: 5, timestamp: 1 })

        expect(receipt.rank).toBe(1)
        expect(wait.mock.calls).toEqual([[50], [100]])
    })

    it("reports a retryable failure once retries are exhausted", async () => {
        const { gateway, store, queries, leaderboard } = await setup()
        vi.spyOn(store, "put").mockRejectedValue(unavailable())

        const failure = await gateway.submit(leaderboard.id, { key: leaderboard.secret, player_id: "alice", score: 5, timestamp: 1 })
            .catch((e: unknown) => e)

        expect(failure).toBeInstanceOf(LeaderboardError)
        expect(failure).toMatchObject({
            code: LeaderboardErrorCode.SUBMISSION_FAILED,
            message: "Submission failed while persisting",
            details: { stage: "persisting", persisted: false },
            retryable: true
        })
        expect(store.put).toHaveBeenCalledTimes(3)
        expect(await queries.top(leaderboard.id, 10)).toEqual([])
    })

    it("marks the index stale when it cannot be updated and rebuilds it before the next read", async () => {
        const { gateway, indexes, queries, leaderboard } = await setup(UpdatePolicy.KEEP_BEST, {
            createIndex: (lb) => {
                const index = new MemoryRankIndex(lb.id, lb.ordering)
                vi.spyOn(index, "insertOrUpdate").mockRejectedValue(LeaderboardError.storageUnavailable("rank index insertOrUpdate", new Error("down")))
                return index
            }
        })

        await expect(gateway.submit(leaderboard.id, { key: leaderboard.secret, player_id: "alice", score: 5, timestamp: 1 }))
            .rejects.toMatchObject({
                code: LeaderboardErrorCode.SUBMISSION_FAILED,
                details: { stage: "indexing", persisted: true }
            })
        expect(indexes.isStale(leaderboard.id)).toBe(true)

        expect(await queries.top(leaderboard.id, 10)).toEqual([{ player_id: "alice", name: "alice", score: 5, timestamp: 1, rank: 1 }])
        expect(indexes.isStale(leaderboard.id)).toBe(false)
    })

    it("abandons a cancelled submission before persisting", async () => {
        const { gateway, store, leaderboard } = await setup()
        const controller = new AbortController()
        controller.abort()

        await expect(gateway.submit(leaderboard.id, { key: leaderboard.secret, player_id: "alice", score: 5 }, { signal: controller.signal }))
            .rejects.toMatchObject({ code: LeaderboardErrorCode.SUBMISSION_CANCELLED })
        expect(await store.getPlayer(leaderboard.id, "alice")).toBeUndefined()
    })

    describe("signed submissions", () => {
        const signedSetup = async () => {
            const services = await setup()
            await services.store.createPlayer({ leaderboardId: services.leaderboard.id, id: "alice", name: "Alice", key: "player-key" })
            return services
        }

        it("accepts a valid player signature", async () => {
            const { gateway, queries, leaderboard } = await signedSetup()
            const k = signSubmission("player-key", { timestamp: 1234, leaderboardSecret: leaderboard.secret, playerId: "alice", score: 88 })

            const receipt = await gateway.submit(leaderboard.id, { k, player_id: "alice", score: 88, timestamp: 1234 })

            expect(receipt.accepted).toBe(true)
            expect(await queries.top(leaderboard.id, 1)).toEqual([{ player_id: "alice", name: "Alice", score: 88, timestamp: 1234, rank: 1 }])
        })

        it("rejects a signature over different fields", async () => {
            const { gateway, leaderboard } = await signedSetup()
            const k = signSubmission("player-key", { timestamp: 1234, leaderboardSecret: leaderboard.secret, playerId: "alice", score: 88 })

            await expect(gateway.submit(leaderboard.id, { k, player_id: "alice", score: 99, timestamp: 1234 }))
                .rejects.toMatchObject({ code: LeaderboardErrorCode.AUTHENTICATION_FAILED })
        })

        it("rejects signatures for players without a key", async () => {
            const { gateway, leaderboard } = await signedSetup()
            const k = signSubmission("player-key", { timestamp: 1, leaderboardSecret: leaderboard.secret, playerId: "bob", score: 1 })

            await expect(gateway.submit(leaderboard.id, { k, player_id: "bob", score: 1, timestamp: 1 }))
                .rejects.toMatchObject({ code: LeaderboardErrorCode.AUTHENTICATION_FAILED })
        })

        it("requires a timestamp", async () => {
            const { gateway, leaderboard } = await signedSetup()

            await expect(gateway.submit(leaderboard.id, { k: "a".repeat(64), player_id: "alice", score: 1 }))
                .rejects.toMatchObject({ code: LeaderboardErrorCode.MALFORMED_SUBMISSION, message: "timestamp: required for signed submissions" })
        })
    })
})
