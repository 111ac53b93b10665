// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import { faker } from "@faker-js/faker"

export class NameGenerator {
    public static generate(maxLength?: number): string {
        const actualMaxLength = maxLength ?? 32
        const name = `${faker.word.adjective()}-${faker.animal.type()}-${faker.string.numeric(3)}`.toLowerCase()

        return name.slice(0, actualMaxLength)
    }
}
