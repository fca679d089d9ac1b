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

import type {BridgeConfig} from '@cqlbridge/config/src/BridgeConfig';
import {describeError} from '@cqlbridge/errors/src/BridgeError';
import {ConnectionError} from '@cqlbridge/errors/src/domains/connection/ConnectionError';
import {ExecutionError} from '@cqlbridge/errors/src/domains/execution/ExecutionError';
import {formatCell} from '@cqlbridge/database/src/CellFormatter';
import type {IConnectionFacade} from '@cqlbridge/database/src/IConnectionFacade';
import {extractTableName, getQueryType, logQuery} from '@cqlbridge/database/src/QueryLogging';
import {Logger} from '@cqlbridge/logger/src/Logger';
import type {LoggerInterface} from '@cqlbridge/logger/src/LoggerInterface';
import type {QueryResult} from '@cqlbridge/translation/src/RowTypes';
import {renderUseKeyspace} from '@cqlbridge/translation/src/StatementBuilder';
import cassandra from 'cassandra-driver';

const PROTOCOL_VERSION = 4;

export interface CqlRow {
	values(): Array<unknown>;
}

export interface CqlResultSet {
	rows?: ReadonlyArray<CqlRow>;
	columns?: ReadonlyArray<{name: string}> | null;
}

/** The part of `cassandra.Client` the connection relies on. */
export interface CqlClient {
	connect(): Promise<void>;
	execute(query: string, params: Array<unknown>, options: cassandra.QueryOptions): Promise<CqlResultSet>;
	shutdown(): Promise<void>;
}

export type CqlClientFactory = (options: cassandra.ClientOptions) => CqlClient;

export const createDriverClient: CqlClientFactory = (options) => new cassandra.Client(options);

export interface CassandraConnectionOptions {
	config: BridgeConfig;
	logger?: LoggerInterface;
	clientFactory?: CqlClientFactory;
}

export function buildClientOptions(config: BridgeConfig): cassandra.ClientOptions {
	const clientOptions: cassandra.ClientOptions = {
		contactPoints: [...config.hosts],
		localDataCenter: config.localDataCenter,
		protocolOptions: {
			port: config.port,
			maxVersion: PROTOCOL_VERSION,
		},
		socketOptions: {
			connectTimeout: config.connectTimeoutMs,
			readTimeout: config.requestTimeoutMs,
		},
		encoding: {
			useUndefinedAsUnset: false,
			useBigIntAsLong: true,
			useBigIntAsVarint: true,
		},
	};

	if (config.username && config.password) {
		clientOptions.credentials = {
			username: config.username,
			password: config.password,
		};
	}

	return clientOptions;
}

function isConnectionFailure(error: unknown): boolean {
	return error instanceof cassandra.errors.NoHostAvailableError || error instanceof cassandra.errors.AuthenticationError;
}

export function toQueryResult(result: CqlResultSet): QueryResult {
	return {
		columnNames: (result.columns ?? []).map((column) => column.name),
		rows: (result.rows ?? []).map((row) => row.values().map((value) => formatCell(value))),
	};
}

export class CassandraConnection implements IConnectionFacade {
	private readonly config: BridgeConfig;
	private readonly logger: LoggerInterface;
	private readonly clientFactory: CqlClientFactory;
	private client: CqlClient | null = null;
	private keyspace: string | null = null;

	constructor(options: CassandraConnectionOptions) {
		this.config = options.config;
		this.logger = (options.logger ?? Logger).child({module: 'cassandra'});
		this.clientFactory = options.clientFactory ?? createDriverClient;
	}

	isConnected(): boolean {
		return this.client !== null;
	}

	getKeyspace(): string | null {
		return this.keyspace;
	}

	async connect(): Promise<void> {
		if (this.client) return;

		const client = this.clientFactory(buildClientOptions(this.config));
		try {
			await client.connect();
		} catch (error) {
			this.logger.error(
				{error: describeError(error), hosts: this.config.hosts, port: this.config.port},
				'Failed to connect to cluster',
			);
			throw ConnectionError.fromDriverError(error, this.config.hosts, this.config.port);
		}

		this.client = client;
		this.logger.debug({hosts: this.config.hosts, port: this.config.port}, 'Connected to cluster');

		if (this.keyspace) {
			await this.execute(renderUseKeyspace(this.keyspace));
		}
	}

	async useKeyspace(keyspace: string): Promise<void> {
		await this.execute(renderUseKeyspace(keyspace));
		this.keyspace = keyspace;
	}

	async execute(statement: string): Promise<QueryResult> {
		const client = this.client;
		if (!client) {
			throw ConnectionError.notConnected();
		}

		const startTime = performance.now();
		let result: CqlResultSet;
		try {
			result = await client.execute(statement, [], {prepare: false});
		} catch (error) {
			this.logger.warn(
				{
					error: describeError(error),
					query: statement,
					queryType: getQueryType(statement),
					table: extractTableName(statement),
				},
				'CQL statement failed',
			);
			if (isConnectionFailure(error)) {
				await this.discardClient(client);
				throw ConnectionError.fromDriverError(error, this.config.hosts, this.config.port);
			}
			throw ExecutionError.fromDriverError(statement, error);
		}

		const queryResult = toQueryResult(result);
		if (this.config.verbose) {
			logQuery(this.logger, statement, performance.now() - startTime, queryResult.rows.length);
		}
		return queryResult;
	}

	async shutdown(): Promise<void> {
		const client = this.client;
		if (!client) return;
		this.client = null;
		await client.shutdown();
		this.logger.debug('Connection closed');
	}

	private async discardClient(client: CqlClient): Promise<void> {
		if (this.client === client) {
			this.client = null;
		}
		try {
			await client.shutdown();
		} catch (error) {
			this.logger.debug({error: describeError(error)}, 'Failed to close broken connection');
		}
	}
}
