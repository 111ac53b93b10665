// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

/**
 * Where scores and rank indexes live.
 *
 * - `memory`: everything in process
 * - `rds`: scores and leaderboards in MySQL, rank index rebuilt in memory
 * - `redis`: scores and leaderboards in MySQL, rank index in Redis sorted sets
 */
export enum BackendType {
    MEMORY = "memory",
    RDS = "rds",
    REDIS = "redis"
}
