// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import { randomUUID } from "node:crypto"
import { KeyedMutex } from "../util"
import type { Logger } from "../util"
import { constantTimeEquals, generateSecret } from "./credentials"
import { LeaderboardError } from "./errors"
import type { LeaderboardRepository } from "./leaderboard-repository"
import type { Leaderboard, ScoreOrdering, UpdatePolicy } from "./types"

export interface LeaderboardRegistryProps {
    repository: LeaderboardRepository
    logger: Logger
    /** How long a resolved leaderboard is served from memory. Defaults to 30 seconds. */
    cacheTtlMs?: number
    now?: () => number
}

export interface ProvisionRequest {
    name: string
    ordering: ScoreOrdering
    updatePolicy: UpdatePolicy
}

export interface ResolveOptions {
    /** Reads the record from the repository instead of the cache. */
    fresh?: boolean
}

interface CachedLeaderboard {
    leaderboard: Leaderboard
    expiresAt: number
}

const DEFAULT_CACHE_TTL_MS = 30_000

/**
 * Maps public leaderboard ids to their secret and policies. Reads are served
 * from a short-lived cache, so another container's rename or deletion can
 * take up to the cache TTL to show in queries. Key checks and writes read
 * the repository. Administrative changes lock only the record they touch.
 */
export class LeaderboardRegistry {
    private readonly repository: LeaderboardRepository
    private readonly logger: Logger
    private readonly cacheTtlMs: number
    private readonly now: () => number
    private readonly cache = new Map<string, CachedLeaderboard>()
    private readonly recordLocks = new KeyedMutex()

    constructor(props: LeaderboardRegistryProps) {
        this.repository = props.repository
        this.logger = props.logger.child({ component: "LeaderboardRegistry" })
        this.cacheTtlMs = props.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS
        this.now = props.now ?? Date.now
    }

    public async resolve(leaderboardId: string, options: ResolveOptions = {}): Promise<Leaderboard> {
        const leaderboard = options.fresh ? await this.load(leaderboardId) : await this.lookup(leaderboardId)

        if (!leaderboard || leaderboard.deletedAt) {
            throw LeaderboardError.leaderboardNotFound(leaderboardId)
        }

        return leaderboard
    }

    /** Always checks against the stored secret, so a rotated key stops working at once. */
    public async authenticate(leaderboardId: string, suppliedKey: string): Promise<boolean> {
        const leaderboard = await this.load(leaderboardId)
        const matches = constantTimeEquals(leaderboard?.secret ?? "", suppliedKey)

        return matches && leaderboard !== undefined && !leaderboard.deletedAt
    }

    public async provision(request: ProvisionRequest): Promise<Leaderboard> {
        const leaderboard: Leaderboard = {
            id: randomUUID(),
            secret: generateSecret(),
            name: request.name,
            ordering: request.ordering,
            updatePolicy: request.updatePolicy,
            createdAt: new Date(this.now())
        }

        await this.repository.insert(leaderboard)
        this.remember(leaderboard)
        this.logger.info({ leaderboardId: leaderboard.id, ordering: leaderboard.ordering, updatePolicy: leaderboard.updatePolicy }, "leaderboard provisioned")

        return { ...leaderboard }
    }

    public async rotateKey(leaderboardId: string): Promise<Leaderboard> {
        return this.modify(leaderboardId, "key rotated", (leaderboard) => ({ ...leaderboard, secret: generateSecret() }))
    }

    public async rename(leaderboardId: string, name: string): Promise<Leaderboard> {
        return this.modify(leaderboardId, "leaderboard renamed", (leaderboard) => ({ ...leaderboard, name }))
    }

    /** Hides the leaderboard; its scores stay in storage. */
    public async softDelete(leaderboardId: string): Promise<Leaderboard> {
        return this.modify(leaderboardId, "leaderboard deleted", (leaderboard) => ({ ...leaderboard, deletedAt: new Date(this.now()) }))
    }

    private async modify(leaderboardId: string, event: string, change: (leaderboard: Leaderboard) => Leaderboard): Promise<Leaderboard> {
        return this.recordLocks.runExclusive(leaderboardId, async () => {
            const current = await this.repository.find(leaderboardId)
            if (!current || current.deletedAt) {
                throw LeaderboardError.leaderboardNotFound(leaderboardId)
            }

            const updated = change(current)
            await this.repository.update(updated)
            this.remember(updated)
            this.logger.info({ leaderboardId }, event)

            return { ...updated }
        })
    }

    private async lookup(leaderboardId: string): Promise<Leaderboard | undefined> {
        const cached = this.cache.get(leaderboardId)
        if (cached && cached.expiresAt > this.now()) {
            return { ...cached.leaderboard }
        }

        return this.load(leaderboardId)
    }

    private async load(leaderboardId: string): Promise<Leaderboard | undefined> {
        const leaderboard = await this.repository.find(leaderboardId)
        if (leaderboard) {
            this.remember(leaderboard)
        } else {
            this.cache.delete(leaderboardId)
        }

        return leaderboard
    }

    private remember(leaderboard: Leaderboard) {
        this.cache.set(leaderboard.id, {
            leaderboard: { ...leaderboard },
            expiresAt: this.now() + this.cacheTtlMs
        })
    }
}
