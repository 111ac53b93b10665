// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import type { Leaderboard, Player, PutResult, RankEntry, ScoreEntry } from "./types"

export interface PlayerProfile {
    id: string
    name: string
}

/**
 * Durable score history per `(leaderboard, player)`.
 *
 * `put` applies the leaderboard's update policy and must not resolve before
 * the write is durable. Implementations throw `STORAGE_UNAVAILABLE` for
 * transient failures so the submission gateway can retry them.
 */
export interface ScoreStore {
    put(leaderboard: Leaderboard, player: PlayerProfile, entry: ScoreEntry): Promise<PutResult>
    getCurrent(leaderboardId: string, playerId: string): Promise<ScoreEntry | undefined>
    /** Every retained entry in submission order; only `keep-all` retains more than one. */
    history(leaderboardId: string, playerId: string): Promise<ScoreEntry[]>
    /** Current entry of every player, the projection the rank index is rebuilt from. */
    currentEntries(leaderboardId: string): Promise<RankEntry[]>

    getPlayer(leaderboardId: string, playerId: string): Promise<Player | undefined>
    createPlayer(player: Player): Promise<Player>
    searchPlayers(leaderboardId: string, namePrefix: string, limit: number): Promise<Player[]>
}
