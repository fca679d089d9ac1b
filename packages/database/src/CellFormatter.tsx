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

import {NULL_LITERAL, UNSUPPORTED_CELL} from '@cqlbridge/constants/src/BridgeConstants';
import cassandra from 'cassandra-driver';

function pad(value: number, width: number): string {
	return String(value).padStart(width, '0');
}

function formatLocalTime(time: cassandra.types.LocalTime): string {
	const microsecond = Math.floor(time.nanosecond / 1000);
	return `${pad(time.hour, 2)}:${pad(time.minute, 2)}:${pad(time.second, 2)}.${pad(microsecond, 6)}`;
}

function hasDriverTextForm(value: object): boolean {
	return (
		value instanceof cassandra.types.LocalDate ||
		value instanceof cassandra.types.BigDecimal ||
		value instanceof cassandra.types.Integer ||
		value instanceof cassandra.types.Uuid ||
		value instanceof cassandra.types.InetAddress ||
		value instanceof cassandra.types.Duration
	);
}

/**
 * Renders one driver value as result-cell text. Timestamps become epoch
 * milliseconds, booleans `1`/`0`, blobs `0x` hex.
 */
export function formatCell(value: unknown): string {
	if (value === null || value === undefined) return NULL_LITERAL;
	if (typeof value === 'string') return value;
	if (typeof value === 'boolean') return value ? '1' : '0';
	if (typeof value === 'number' || typeof value === 'bigint') return String(value);
	if (value instanceof Date) return String(value.getTime());
	if (Buffer.isBuffer(value)) return `0x${value.toString('hex')}`;
	if (value instanceof cassandra.types.LocalTime) return formatLocalTime(value);
	if (typeof value === 'object' && hasDriverTextForm(value)) return String(value);
	return UNSUPPORTED_CELL;
}
