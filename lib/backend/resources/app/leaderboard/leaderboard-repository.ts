// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import type { Leaderboard } from "./types"

/** Persistence behind the leaderboard registry. */
export interface LeaderboardRepository {
    find(id: string): Promise<Leaderboard | undefined>
    insert(leaderboard: Leaderboard): Promise<void>
    update(leaderboard: Leaderboard): Promise<void>
}

export class MemoryLeaderboardRepository implements LeaderboardRepository {
    private readonly leaderboards = new Map<string, Leaderboard>()

    async find(id: string): Promise<Leaderboard | undefined> {
        const leaderboard = this.leaderboards.get(id)
        return leaderboard ? { ...leaderboard } : undefined
    }

    async insert(leaderboard: Leaderboard): Promise<void> {
        if (this.leaderboards.has(leaderboard.id)) {
            throw new Error(`Leaderboard ${leaderboard.id} already exists`)
        }
        this.leaderboards.set(leaderboard.id, { ...leaderboard })
    }

    async update(leaderboard: Leaderboard): Promise<void> {
        this.leaderboards.set(leaderboard.id, { ...leaderboard })
    }
}
