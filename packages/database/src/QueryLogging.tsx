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

import type {LoggerInterface} from '@cqlbridge/logger/src/LoggerInterface';

const colors = {
	reset: '\x1b[0m',
	dim: '\x1b[2m',
	bold: '\x1b[1m',
	cyan: '\x1b[36m',
	yellow: '\x1b[33m',
	green: '\x1b[32m',
	magenta: '\x1b[35m',
	blue: '\x1b[34m',
	white: '\x1b[37m',
} as const;

const QUERY_TYPES = ['SELECT', 'INSERT', 'UPDATE', 'DELETE', 'CREATE', 'DROP', 'TRUNCATE', 'USE'] as const;

export type QueryType = (typeof QUERY_TYPES)[number] | 'QUERY';

const typeColors: Record<QueryType, string> = {
	SELECT: colors.cyan,
	INSERT: colors.green,
	UPDATE: colors.yellow,
	DELETE: colors.magenta,
	CREATE: colors.blue,
	DROP: colors.magenta,
	TRUNCATE: colors.magenta,
	USE: colors.white,
	QUERY: colors.white,
};

export function getQueryType(cql: string): QueryType {
	const trimmed = cql.trim().toUpperCase();
	return QUERY_TYPES.find((type) => trimmed.startsWith(type)) ?? 'QUERY';
}

const TABLE_PATTERNS: Partial<Record<QueryType, RegExp>> = {
	SELECT: /\bFROM\s+(\w+(?:\.\w+)?)/i,
	INSERT: /\bINTO\s+(\w+(?:\.\w+)?)/i,
	UPDATE: /^\s*UPDATE\s+(\w+(?:\.\w+)?)/i,
	DELETE: /\bFROM\s+(\w+(?:\.\w+)?)/i,
	CREATE: /\b(?:TABLE|KEYSPACE)\s+(?:IF\s+NOT\s+EXISTS\s+)?(\w+(?:\.\w+)?)/i,
	DROP: /\b(?:TABLE|KEYSPACE)\s+(?:IF\s+EXISTS\s+)?(\w+(?:\.\w+)?)/i,
	TRUNCATE: /^\s*TRUNCATE\s+(?:TABLE\s+)?(\w+(?:\.\w+)?)/i,
	USE: /^\s*USE\s+(\w+)/i,
};

export function extractTableName(cql: string): string {
	const pattern = TABLE_PATTERNS[getQueryType(cql)];
	return pattern?.exec(cql)?.[1] ?? 'unknown';
}

export function formatCql(cql: string): string {
	return cql
		.replace(/\s+/g, ' ')
		.replace(/\s*;\s*$/, '')
		.trim();
}

export function logQuery(logger: LoggerInterface, cql: string, durationMs: number, rowCount: number): void {
	const queryType = getQueryType(cql);
	const typeColor = typeColors[queryType];
	const durationColor = durationMs > 100 ? colors.yellow : durationMs > 50 ? colors.dim : colors.green;

	const lines = [
		`${colors.dim}┌──${colors.reset} ${typeColor}${colors.bold}${queryType}${colors.reset} ${colors.dim}${extractTableName(cql)}${colors.reset}`,
		`${colors.dim}│${colors.reset} ${formatCql(cql)}`,
		`${colors.dim}└──${colors.reset} ${durationColor}${durationMs.toFixed(2)}ms${colors.reset} ${colors.dim}(${rowCount} rows)${colors.reset}`,
	];

	logger.info(
		{queryType, table: extractTableName(cql), durationMs: Number(durationMs.toFixed(2)), rowCount},
		lines.join('\n'),
	);
}
