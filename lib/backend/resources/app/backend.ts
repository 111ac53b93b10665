// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import {
    LeaderboardRegistry,
    MemoryLeaderboardRepository,
    MemoryRankIndex,
    MemoryScoreStore,
    PlayerService,
    QueryService,
    RankIndexManager,
    RdsLeaderboardRepository,
    RdsRankIndex,
    RdsScoreStore,
    RedisRankIndex,
    SubmissionGateway
} from "./leaderboard"
import type { LeaderboardRepository, RankIndexFactory, ScoreStore } from "./leaderboard"
import { BackendType, ConnectionManager, createLogger, loadConfig } from "./util"
import type { AppConfig, Logger } from "./util"

export interface LeaderboardBackend {
    readonly config: AppConfig
    readonly logger: Logger
    readonly registry: LeaderboardRegistry
    readonly store: ScoreStore
    readonly indexes: RankIndexManager
    readonly gateway: SubmissionGateway
    readonly queries: QueryService
    readonly players: PlayerService
    /** Creates the storage schema where there is one. */
    initialize(): Promise<void>
    close(): Promise<void>
}

interface Storage {
    repository: LeaderboardRepository
    store: ScoreStore
    createIndex: RankIndexFactory
    connectionManager?: ConnectionManager
}

export class BackendService {
    private static sharedBackend?: LeaderboardBackend

    /** Backend of this Lambda container, configured from the environment on first use. */
    public static shared(): LeaderboardBackend {
        if (!BackendService.sharedBackend) {
            const config = loadConfig()
            BackendService.sharedBackend = BackendService.create(config, createLogger(config.LOG_LEVEL))
        }
        return BackendService.sharedBackend
    }

    public static async resetShared(): Promise<void> {
        const backend = BackendService.sharedBackend
        BackendService.sharedBackend = undefined
        await backend?.close()
    }

    public static create(config: AppConfig, logger: Logger): LeaderboardBackend {
        const storage = BackendService.createStorage(config, logger)

        const registry = new LeaderboardRegistry({ repository: storage.repository, logger })
        const indexes = new RankIndexManager({ store: storage.store, createIndex: storage.createIndex, logger })
        const gateway = new SubmissionGateway({
            registry,
            store: storage.store,
            indexes,
            retry: {
                maxAttempts: config.SUBMISSION_MAX_ATTEMPTS,
                baseDelayMs: config.SUBMISSION_BASE_DELAY_MS,
                maxDelayMs: config.SUBMISSION_MAX_DELAY_MS
            },
            maxMetaLength: config.MAX_META_LENGTH,
            logger
        })
        const queries = new QueryService({
            registry,
            indexes,
            maxLimit: config.QUERY_MAX_LIMIT,
            maxWindow: config.AROUND_MAX_WINDOW,
            requireKey: config.QUERY_REQUIRES_KEY,
            logger
        })
        const players = new PlayerService({ registry, store: storage.store, logger })
        const connectionManager = storage.connectionManager

        logger.info({ backendType: config.BACKEND_TYPE }, "leaderboard backend created")

        return {
            config,
            logger,
            registry,
            store: storage.store,
            indexes,
            gateway,
            queries,
            players,
            initialize: async () => {
                await connectionManager?.initTables()
            },
            close: async () => {
                await connectionManager?.cleanUp()
            }
        }
    }

    private static createStorage(config: AppConfig, logger: Logger): Storage {
        const memoryIndex: RankIndexFactory = (leaderboard) => new MemoryRankIndex(leaderboard.id, leaderboard.ordering)

        if (config.BACKEND_TYPE === BackendType.MEMORY) {
            return {
                repository: new MemoryLeaderboardRepository(),
                store: new MemoryScoreStore(),
                createIndex: memoryIndex
            }
        }

        if (!config.RDS_SECRET_ARN) {
            throw new Error(`RDS_SECRET_ARN is required for the ${config.BACKEND_TYPE} backend`)
        }

        const connectionManager = new ConnectionManager({
            rdsSecretArn: config.RDS_SECRET_ARN,
            redisEndpointAddress: config.REDIS_ENDPOINT_ADDRESS,
            redisEndpointPort: config.REDIS_ENDPOINT_PORT,
            logger
        })
        const storage = {
            repository: new RdsLeaderboardRepository(connectionManager),
            store: new RdsScoreStore({ connectionManager, logger }),
            connectionManager
        }

        if (config.BACKEND_TYPE === BackendType.RDS) {
            return {
                ...storage,
                createIndex: (leaderboard) => new RdsRankIndex({
                    leaderboardId: leaderboard.id,
                    ordering: leaderboard.ordering,
                    connectionManager,
                    logger
                })
            }
        }

        return {
            ...storage,
            createIndex: (leaderboard) => new RedisRankIndex({
                leaderboardId: leaderboard.id,
                ordering: leaderboard.ordering,
                connect: () => connectionManager.getOrCreateRedisConnection(),
                logger
            })
        }
    }
}
