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
import pino, {type LevelWithSilent} from 'pino';

const LOG_LEVELS: ReadonlyArray<LevelWithSilent> = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function resolveLevel(raw: string | undefined): LevelWithSilent {
	const normalized = raw?.trim().toLowerCase();
	return LOG_LEVELS.find((level) => level === normalized) ?? 'info';
}

export interface CreateLoggerOptions {
	name?: string;
	level?: string;
}

export function createLogger(options: CreateLoggerOptions = {}): LoggerInterface {
	return pino({
		name: options.name ?? 'cqlbridge',
		level: resolveLevel(options.level ?? process.env.LOG_LEVEL),
		base: null,
	});
}

export const Logger: LoggerInterface = createLogger();
