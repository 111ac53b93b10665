// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import { randomUUID } from "node:crypto"
import { NameGenerator } from "../util"
import type { Logger } from "../util"
import { generateSecret } from "./credentials"
import type { LeaderboardRegistry } from "./leaderboard-registry"
import type { ScoreStore } from "./score-store"
import type { Player } from "./types"

export interface PlayerServiceProps {
    registry: LeaderboardRegistry
    store: ScoreStore
    logger: Logger
}

const SEARCH_LIMIT = 20

/**
 * Player provisioning for clients that sign their submissions, and display
 * name search.
 */
export class PlayerService {
    private readonly registry: LeaderboardRegistry
    private readonly store: ScoreStore
    private readonly logger: Logger

    constructor(props: PlayerServiceProps) {
        this.registry = props.registry
        this.store = props.store
        this.logger = props.logger.child({ component: "PlayerService" })
    }

    /** The returned key is shown once; clients keep it to sign submissions. */
    public async createPlayer(leaderboardId: string, name?: string): Promise<Required<Player>> {
        const leaderboard = await this.registry.resolve(leaderboardId)
        const player: Required<Player> = {
            leaderboardId: leaderboard.id,
            id: randomUUID(),
            key: generateSecret(),
            name: name ?? NameGenerator.generate()
        }

        await this.store.createPlayer(player)
        this.logger.info({ leaderboardId: leaderboard.id, playerId: player.id }, "player created")

        return player
    }

    public async searchPlayers(leaderboardId: string, namePrefix: string): Promise<Array<Pick<Player, "id" | "name">>> {
        const leaderboard = await this.registry.resolve(leaderboardId)
        const players = await this.store.searchPlayers(leaderboard.id, namePrefix, SEARCH_LIMIT)

        return players.map((player) => ({ id: player.id, name: player.name }))
    }
}
