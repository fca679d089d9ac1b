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

import type {QueryResult} from '@cqlbridge/translation/src/RowTypes';

export interface IConnectionFacade {
	connect(): Promise<void>;
	isConnected(): boolean;
	useKeyspace(keyspace: string): Promise<void>;
	getKeyspace(): string | null;
	execute(statement: string): Promise<QueryResult>;
	shutdown(): Promise<void>;
}
