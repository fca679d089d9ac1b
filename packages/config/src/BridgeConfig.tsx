/*
 * Copyright (C) 2026 Fluxer Contributors
 *
 * This file is part of Fluxer.
 *
 * Fluxer is free software: you can redistribute it and/or modify
 * it under the terms of the GNU Affero General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * Fluxer is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU Affero General Public License for more details.
 *
 * You should have received a copy of the GNU Affero General Public License
 * along with Fluxer. If not, see <https://www.gnu.org/licenses/>.
 */

import {
	DEFAULT_CONNECT_TIMEOUT_MS,
	DEFAULT_CONTACT_POINT,
	DEFAULT_KEYSPACE,
	DEFAULT_LOCAL_DATA_CENTER,
	DEFAULT_NATIVE_PORT,
	DEFAULT_REPLICATION_FACTOR,
	DEFAULT_REQUEST_TIMEOUT_MS,
	MAX_PORT,
	MIN_PORT,
} from '@cqlbridge/constants/src/BridgeConstants';
import {IdentifierType} from '@cqlbridge/schema/src/domains/table/TableSchemas';
import {z} from 'zod';

export const BridgeConfig = z.object({
	hosts: z
		.array(z.string().min(1))
		.min(1)
		.default([DEFAULT_CONTACT_POINT])
		.describe('Contact points of the cluster'),
	port: z.number().int().min(MIN_PORT).max(MAX_PORT).default(DEFAULT_NATIVE_PORT).describe('Native protocol port'),
	keyspace: IdentifierType.default(DEFAULT_KEYSPACE).describe('Keyspace used when a table does not name one'),
	table: IdentifierType.optional().describe('Table name overriding the one derived from the table path'),
	verbose: z.boolean().default(false).describe('Log every statement with its timing and row count'),
	allowFiltering: z.boolean().default(true).describe('Append ALLOW FILTERING to full-table scans'),
	replicationFactor: z
		.number()
		.int()
		.min(1)
		.default(DEFAULT_REPLICATION_FACTOR)
		.describe('SimpleStrategy replication factor for created keyspaces'),
	localDataCenter: z.string().min(1).default(DEFAULT_LOCAL_DATA_CENTER).describe('Data centre treated as local'),
	username: z.string().optional().describe('Plain-text authentication user'),
	password: z.string().optional().describe('Plain-text authentication password'),
	connectTimeoutMs: z.number().int().positive().default(DEFAULT_CONNECT_TIMEOUT_MS),
	requestTimeoutMs: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
	timestampZone: z.enum(['local', 'utc']).default('local').describe('Zone used to read timestamp calendar fields'),
	strictDecoding: z.boolean().default(false).describe('Abort a read on the first cell that fails to decode'),
	rejectUnsupportedTypes: z
		.boolean()
		.default(false)
		.describe('Refuse to create tables with columns that have no CQL type'),
});

export type BridgeConfig = Readonly<z.infer<typeof BridgeConfig>>;
export type BridgeConfigInput = z.input<typeof BridgeConfig>;

export const BRIDGE_CONFIG_KEYS: ReadonlySet<string> = new Set(Object.keys(BridgeConfig.shape));
