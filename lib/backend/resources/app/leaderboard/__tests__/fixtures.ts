// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import type { Logger } from "pino"
import { vi } from "vitest"
import { LeaderboardRegistry } from "../leaderboard-registry"
import { MemoryLeaderboardRepository } from "../leaderboard-repository"
import { MemoryRankIndex } from "../memory-rank-index"
import { MemoryScoreStore } from "../memory-score-store"
import { PlayerService } from "../player-service"
import { QueryService } from "../query-service"
import { RankIndexManager } from "../rank-index-manager"
import type { RankIndexFactory } from "../rank-index-manager"
import { SubmissionGateway } from "../submission-gateway"
import { ScoreOrdering, UpdatePolicy } from "../types"
import type { Leaderboard, RankEntry } from "../types"

export const createMockLogger = (): Logger => {
    const logger = {
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
        trace: vi.fn(),
        fatal: vi.fn(),
        child: vi.fn(() => logger)
    } as unknown as Logger
    return logger
}

export const createLeaderboard = (overrides: Partial<Leaderboard> = {}): Leaderboard => ({
    id: "lb-1",
    secret: "test-secret",
    name: "Test leaderboard",
    ordering: ScoreOrdering.HIGHER_IS_BETTER,
    updatePolicy: UpdatePolicy.KEEP_BEST,
    createdAt: new Date(0),
    ...overrides
})

export const rankEntry = (playerId: string, value: number, timestamp: number, name = playerId): RankEntry => ({
    playerId,
    value,
    timestamp,
    name
})

/** mulberry32: the same seed always yields the same sequence in [0, 1). */
export const seededRandom = (seed: number): () => number => {
    let state = seed >>> 0
    return () => {
        state = (state + 0x6d2b79f5) >>> 0
        let t = state
        t = Math.imul(t ^ (t >>> 15), t | 1)
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296
    }
}

export interface TestServicesOptions {
    maxAttempts?: number
    requireKey?: boolean
    createIndex?: RankIndexFactory
}

/** Memory-backed services wired the way the backend wires them, with instant retries. */
export const createTestServices = (options: TestServicesOptions = {}) => {
    const logger = createMockLogger()
    const repository = new MemoryLeaderboardRepository()
    const registry = new LeaderboardRegistry({ repository, logger })
    const store = new MemoryScoreStore()
    const indexes = new RankIndexManager({
        store,
        createIndex: options.createIndex ?? ((lb) => new MemoryRankIndex(lb.id, lb.ordering)),
        logger
    })
    const wait = vi.fn(async (_delayMs: number) => undefined)
    const gateway = new SubmissionGateway({
        registry,
        store,
        indexes,
        retry: { maxAttempts: options.maxAttempts ?? 3, baseDelayMs: 50, maxDelayMs: 1000, wait },
        maxMetaLength: 64,
        logger,
        now: () => 5000
    })
    const queries = new QueryService({
        registry,
        indexes,
        maxLimit: 10,
        maxWindow: 5,
        requireKey: options.requireKey ?? false,
        logger
    })
    const players = new PlayerService({ registry, store, logger })

    return { logger, repository, registry, store, indexes, wait, gateway, queries, players }
}
