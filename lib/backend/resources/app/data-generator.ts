// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import { faker } from "@faker-js/faker"
import type { CloudFormationCustomResourceEvent } from "aws-lambda"
import { BackendService } from "./backend"
import type { LeaderboardBackend } from "./backend"
import { ScoreOrdering, UpdatePolicy } from "./leaderboard"
import type { Leaderboard } from "./leaderboard"

const DEMO_PLAYERS = 1000
const BATCH_SIZE = 100
const MAX_SCORE = 1000000
const PHYSICAL_RESOURCE_ID = "leaderboard-seed"

export interface SeedOptions {
    name?: string
    players?: number
    batchSize?: number
    maxScore?: number
}

export interface SeedResponse {
    PhysicalResourceId: string
    Data?: { LeaderboardId: string }
}

export interface SeedResult {
    leaderboard: Leaderboard
    players: number
}

const seedBatch = async(backend: LeaderboardBackend, leaderboard: Leaderboard, batchSize: number, maxScore: number): Promise<void> => {
    const submissions = []

    for (let i = 0; i < batchSize; i++) {
        submissions.push((async () => {
            const player = await backend.players.createPlayer(leaderboard.id)
            await backend.gateway.submit(leaderboard.id, {
                key: leaderboard.secret,
                player_id: player.id,
                score: faker.number.int({ max: maxScore }),
                timestamp: faker.date.recent().getTime()
            })
        })())
    }

    await Promise.all(submissions)
}

/** Provisions a demo leaderboard and fills it with generated players through the gateway. */
export const seedLeaderboard = async(backend: LeaderboardBackend, options: SeedOptions = {}): Promise<SeedResult> => {
    const players = options.players ?? DEMO_PLAYERS
    const batchSize = options.batchSize ?? BATCH_SIZE
    const maxScore = options.maxScore ?? MAX_SCORE

    const leaderboard = await backend.registry.provision({
        name: options.name ?? "Demo leaderboard",
        ordering: ScoreOrdering.HIGHER_IS_BETTER,
        updatePolicy: UpdatePolicy.KEEP_BEST
    })

    for (let seeded = 0; seeded < players; seeded += batchSize) {
        await seedBatch(backend, leaderboard, Math.min(batchSize, players - seeded), maxScore)
    }

    backend.logger.info({ leaderboardId: leaderboard.id, players }, "demo leaderboard seeded")
    return { leaderboard, players }
}

export const handler = async(event: CloudFormationCustomResourceEvent): Promise<SeedResponse> => {
    const backend = BackendService.shared()

    if (event.RequestType !== "Create") {
        return { PhysicalResourceId: event.PhysicalResourceId }
    }

    await backend.initialize()
    const { leaderboard } = await seedLeaderboard(backend)

    return {
        PhysicalResourceId: PHYSICAL_RESOURCE_ID,
        Data: { LeaderboardId: leaderboard.id }
    }
}
