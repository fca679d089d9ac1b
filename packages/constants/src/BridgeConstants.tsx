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

export const DEFAULT_CONTACT_POINT = '127.0.0.1';
export const DEFAULT_NATIVE_PORT = 9042;
export const DEFAULT_KEYSPACE = 'cqlbridge';
export const DEFAULT_LOCAL_DATA_CENTER = 'datacenter1';
export const DEFAULT_REPLICATION_FACTOR = 1;
export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

export const MIN_PORT = 1;
export const MAX_PORT = 65535;

export const NULL_LITERAL = 'NULL';
export const UNSUPPORTED_CELL = '[UNSUPPORTED_TYPE]';

export const SCAN_POSITION_WIDTH = 8;

export const ESTIMATED_RECORD_COUNT = 10_000;
export const ESTIMATED_RANGE_RECORD_COUNT = 10;

export const TableCapabilities = {
	forwardScan: true,
	positionalAccess: true,
	keyEqualityLookup: true,
	fullTableScan: true,
	rangeScan: false,
	orderedScan: false,
	reverseScan: false,
	secondaryIndexScan: false,
	transactions: false,
} as const;

export type TableCapabilities = typeof TableCapabilities;
