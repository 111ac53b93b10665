// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import { decideUpdate } from "./ordering"
import type { PlayerProfile, ScoreStore } from "./score-store"
import type { Leaderboard, Player, PutResult, RankEntry, ScoreEntry } from "./types"

interface PlayerRecord {
    player: Player
    current?: ScoreEntry
    history: ScoreEntry[]
}

const recordKey = (leaderboardId: string, playerId: string) => `${leaderboardId}\u0000${playerId}`

export class MemoryScoreStore implements ScoreStore {
    private readonly records = new Map<string, PlayerRecord>()
    private readonly playersByLeaderboard = new Map<string, Set<string>>()

    async put(leaderboard: Leaderboard, profile: PlayerProfile, entry: ScoreEntry): Promise<PutResult> {
        const record = this.upsertPlayer(leaderboard.id, profile)
        const decision = decideUpdate(leaderboard.updatePolicy, leaderboard.ordering, record.current, entry)

        if (decision.appendHistory) {
            record.history.push(entry)
        }

        if (decision.kind === "replace") {
            if (!decision.appendHistory) {
                record.history = [entry]
            }
            record.current = entry
            return { current: entry, previous: decision.superseded, changed: true }
        }

        return { current: decision.current, previous: decision.current, changed: false }
    }

    async getCurrent(leaderboardId: string, playerId: string): Promise<ScoreEntry | undefined> {
        return this.records.get(recordKey(leaderboardId, playerId))?.current
    }

    async history(leaderboardId: string, playerId: string): Promise<ScoreEntry[]> {
        return [...(this.records.get(recordKey(leaderboardId, playerId))?.history ?? [])]
    }

    async currentEntries(leaderboardId: string): Promise<RankEntry[]> {
        const entries: RankEntry[] = []

        for (const playerId of this.playersByLeaderboard.get(leaderboardId) ?? []) {
            const record = this.records.get(recordKey(leaderboardId, playerId))
            if (record?.current) {
                entries.push({ ...record.current, name: record.player.name })
            }
        }

        return entries
    }

    async getPlayer(leaderboardId: string, playerId: string): Promise<Player | undefined> {
        const record = this.records.get(recordKey(leaderboardId, playerId))
        return record ? { ...record.player } : undefined
    }

    async createPlayer(player: Player): Promise<Player> {
        const key = recordKey(player.leaderboardId, player.id)
        const existing = this.records.get(key)

        if (existing) {
            existing.player = { ...player }
        } else {
            this.records.set(key, { player: { ...player }, history: [] })
            this.indexPlayer(player.leaderboardId, player.id)
        }

        return { ...player }
    }

    async searchPlayers(leaderboardId: string, namePrefix: string, limit: number): Promise<Player[]> {
        const results: Player[] = []

        for (const playerId of this.playersByLeaderboard.get(leaderboardId) ?? []) {
            const record = this.records.get(recordKey(leaderboardId, playerId))
            if (record && record.player.name.startsWith(namePrefix)) {
                results.push({ ...record.player })
            }
        }

        return results
            .sort((a, b) => a.name < b.name ? -1 : a.name > b.name ? 1 : 0)
            .slice(0, limit)
    }

    private upsertPlayer(leaderboardId: string, profile: PlayerProfile): PlayerRecord {
        const key = recordKey(leaderboardId, profile.id)
        const existing = this.records.get(key)

        if (existing) {
            existing.player.name = profile.name
            return existing
        }

        const created: PlayerRecord = {
            player: { leaderboardId, id: profile.id, name: profile.name },
            history: []
        }
        this.records.set(key, created)
        this.indexPlayer(leaderboardId, profile.id)

        return created
    }

    private indexPlayer(leaderboardId: string, playerId: string) {
        const players = this.playersByLeaderboard.get(leaderboardId) ?? new Set<string>()
        players.add(playerId)
        this.playersByLeaderboard.set(leaderboardId, players)
    }
}
