// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import { GetSecretValueCommand, SecretsManagerClient } from "@aws-sdk/client-secrets-manager"
import { createPool } from "mysql2/promise"
import type { Pool } from "mysql2/promise"
import { Tedis } from "tedis"
import { z } from "zod"
import type { Logger } from "./logger"

const rdsSecretSchema = z.object({
    password: z.string(),
    dbname: z.string(),
    engine: z.string().optional(),
    port: z.coerce.number().int().positive(),
    dbInstanceIdentifier: z.string().optional(),
    host: z.string(),
    username: z.string()
})

export type RDSSecretValue = z.infer<typeof rdsSecretSchema>

export interface ConnectionManagerProps {
    rdsSecretArn: string
    redisEndpointAddress?: string
    redisEndpointPort?: number
    logger: Logger
}

const TRANSIENT_MYSQL_ERROR_CODES = new Set([
    "PROTOCOL_CONNECTION_LOST",
    "PROTOCOL_SEQUENCE_TIMEOUT",
    "ECONNREFUSED",
    "ECONNRESET",
    "ETIMEDOUT",
    "EPIPE",
    "ER_CON_COUNT_ERROR",
    "ER_LOCK_WAIT_TIMEOUT",
    "ER_LOCK_DEADLOCK"
])

export const isTransientMysqlError = (e: unknown): boolean => {
    if (typeof e !== "object" || e === null || !("code" in e)) {
        return false
    }
    return typeof e.code === "string" && TRANSIENT_MYSQL_ERROR_CODES.has(e.code)
}

const TABLES = [
    `create table if not exists leaderboards(
        id varchar(64) not null,
        secret varchar(128) not null,
        name varchar(128) not null,
        ordering varchar(32) not null,
        update_policy varchar(32) not null,
        created_at bigint not null,
        deleted_at bigint null,
        primary key (id))`,
    `create table if not exists players(
        leaderboard_id varchar(64) not null,
        id varchar(64) not null,
        name varchar(64) not null,
        player_key varchar(128) null,
        primary key (leaderboard_id, id),
        key idx_player_name(leaderboard_id, name),
        constraint players_fk1 foreign key (leaderboard_id) references leaderboards(id))`,
    `create table if not exists scores(
        id bigint not null auto_increment,
        leaderboard_id varchar(64) not null,
        player_id varchar(64) not null,
        value double precision not null,
        submitted_at bigint not null,
        meta text null,
        is_current tinyint(1) not null default 0,
        primary key (id),
        key idx_player(leaderboard_id, player_id, is_current),
        key idx_rank(leaderboard_id, is_current, value, submitted_at),
        constraint scores_fk1 foreign key (leaderboard_id, player_id) references players(leaderboard_id, id))`
]

/**
 * Owns the MySQL pool and the Redis connection of one Lambda container.
 * Both are opened lazily and reused across invocations.
 */
export class ConnectionManager {
    private readonly secretsManagerClient: SecretsManagerClient

    private secret?: RDSSecretValue
    private rdsPool?: Pool
    private redis?: Tedis

    private readonly connectionProperties: ConnectionManagerProps
    private readonly logger: Logger

    constructor(props: ConnectionManagerProps) {
        this.secretsManagerClient = new SecretsManagerClient()
        this.connectionProperties = props
        this.logger = props.logger.child({ component: "ConnectionManager" })
    }

    public async cleanUp() {
        if (this.rdsPool) {
            await this.rdsPool.end()
            this.rdsPool = undefined
        }

        if (this.redis) {
            this.redis.close()
            this.redis = undefined
        }
    }

    public async getOrCreateRDSPool(): Promise<Pool> {
        if (this.rdsPool) {
            return this.rdsPool
        }

        const secret = await this.populateSecret()
        this.rdsPool = createPool({
            host: secret.host,
            user: secret.username,
            password: secret.password,
            port: secret.port,
            database: secret.dbname,
            connectionLimit: 10,
            waitForConnections: true,
            connectTimeout: 5000
        })
        this.logger.info({ host: secret.host, database: secret.dbname }, "mysql pool created")

        return this.rdsPool
    }

    public async initTables() {
        const pool = await this.getOrCreateRDSPool()
        for (const statement of TABLES) {
            await pool.execute(statement)
        }
        this.logger.info("tables initialised")
    }

    public async getOrCreateRedisConnection(): Promise<Tedis> {
        if (this.redis) {
            return this.redis
        }

        if (!this.connectionProperties.redisEndpointAddress) {
            throw new Error("Redis endpoint is not configured")
        }

        const redis = new Tedis({
            host: this.connectionProperties.redisEndpointAddress,
            port: this.connectionProperties.redisEndpointPort ?? 6379
        })
        redis.on("error", (err) => {
            this.logger.error({ err }, "redis connection error")
            if (this.redis === redis) {
                this.redis = undefined
            }
        })
        this.redis = redis

        return redis
    }

    private async populateSecret(): Promise<RDSSecretValue> {
        if (!this.secret) {
            const actualSecretResp = await this.secretsManagerClient.send(new GetSecretValueCommand({
                SecretId: this.connectionProperties.rdsSecretArn
            }))

            if (!actualSecretResp.SecretString) {
                throw new Error(`Secret ${this.connectionProperties.rdsSecretArn} has no string value`)
            }

            this.secret = rdsSecretSchema.parse(JSON.parse(actualSecretResp.SecretString))
        }

        return this.secret
    }
}
