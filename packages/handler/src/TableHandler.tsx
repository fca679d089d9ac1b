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
import {parseConnectionParams} from '@cqlbridge/config/src/ConnectionParams';
import {
	ESTIMATED_RANGE_RECORD_COUNT,
	ESTIMATED_RECORD_COUNT,
	TableCapabilities,
} from '@cqlbridge/constants/src/BridgeConstants';
import {UnsupportedOperationError} from '@cqlbridge/errors/src/domains/core/UnsupportedOperationError';
import {CassandraConnection} from '@cqlbridge/database/src/CassandraConnection';
import type {IConnectionFacade} from '@cqlbridge/database/src/IConnectionFacade';
import {Logger} from '@cqlbridge/logger/src/Logger';
import type {LoggerInterface} from '@cqlbridge/logger/src/LoggerInterface';
import type {TableSchema} from '@cqlbridge/schema/src/domains/table/TableSchemas';
import {qualifiedTableName} from '@cqlbridge/schema/src/TableSchemaUtils';
import {ResultMaterializer} from '@cqlbridge/translation/src/ResultMaterializer';
import type {DecodedRow, QueryResult, Row, Scalar} from '@cqlbridge/translation/src/RowTypes';
import {decodeScanPosition, encodeScanPosition} from '@cqlbridge/translation/src/ScanPosition';
import {StatementBuilder} from '@cqlbridge/translation/src/StatementBuilder';
import {TypeMapper} from '@cqlbridge/translation/src/TypeMapper';

export interface TableIdentity {
	keyspace: string;
	table: string;
}

export interface TableInfo {
	records: number;
	deleted: number;
}

export interface TableHandlerOptions {
	schema: TableSchema;
	config: BridgeConfig;
	connection?: IConnectionFacade;
	logger?: LoggerInterface;
}

/**
 * Table lifecycle, row writes and cursor reads for one CQL table. Every query
 * replaces the retained result set, so earlier scan positions stop resolving.
 */
export class TableHandler {
	private readonly schema: TableSchema;
	private readonly config: BridgeConfig;
	private readonly connection: IConnectionFacade;
	private readonly logger: LoggerInterface;
	private readonly builder: StatementBuilder;
	private readonly materializer: ResultMaterializer;

	private resultSet: QueryResult | null = null;
	private cursor = 0;
	private lastReturned: number | null = null;

	constructor(options: TableHandlerOptions) {
		this.schema = options.schema;
		this.config = options.config;
		this.logger = (options.logger ?? Logger).child({module: 'table', table: qualifiedTableName(options.schema)});
		this.connection = options.connection ?? new CassandraConnection({config: options.config, logger: this.logger});

		const typeMapper = new TypeMapper({timestampZone: options.config.timestampZone});
		this.builder = new StatementBuilder({
			typeMapper,
			rejectUnsupportedTypes: options.config.rejectUnsupportedTypes,
		});
		this.materializer = new ResultMaterializer({typeMapper});
	}

	/**
	 * Table name from the comment's `table` key, the configured table, or the
	 * last path segment; keyspace from the comment or the configuration.
	 */
	static resolveIdentity(path: string, comment: string | undefined, config: BridgeConfig): TableIdentity {
		const params = comment ? parseConnectionParams(comment) : {};
		const segments = path.split('/').filter((segment) => segment.length > 0);
		const table = params.table || config.table || segments[segments.length - 1] || path;
		return {keyspace: params.keyspace || config.keyspace, table};
	}

	capabilities(): TableCapabilities {
		return TableCapabilities;
	}

	info(): TableInfo {
		return {records: ESTIMATED_RECORD_COUNT, deleted: 0};
	}

	recordsInRange(): number {
		return ESTIMATED_RANGE_RECORD_COUNT;
	}

	async create(): Promise<void> {
		await this.ensureConnected();
		await this.connection.execute(this.builder.buildCreateKeyspace(this.schema.keyspace, this.config.replicationFactor));
		await this.connection.useKeyspace(this.schema.keyspace);
		await this.connection.execute(this.builder.buildCreateTable(this.schema));
		this.logger.info({keyspace: this.schema.keyspace}, 'Created table');
	}

	async open(): Promise<void> {
		await this.ensureConnected();
	}

	close(): void {
		this.resetCursor(null);
	}

	async dropTable(): Promise<void> {
		await this.run(this.builder.buildDropTable(this.schema));
		this.resetCursor(null);
	}

	async truncate(): Promise<void> {
		await this.run(this.builder.buildTruncate(this.schema));
		this.resetCursor(null);
	}

	async renameTable(_from: string, _to: string): Promise<void> {
		throw new UnsupportedOperationError('rename_table');
	}

	async writeRow(row: Row): Promise<void> {
		await this.run(this.builder.buildInsert(this.schema, row));
	}

	async updateRow(oldRow: Row, newRow: Row): Promise<void> {
		await this.run(this.builder.buildUpdate(this.schema, oldRow, newRow));
	}

	async deleteRow(row: Row): Promise<void> {
		await this.run(this.builder.buildDelete(this.schema, row));
	}

	async rndInit(scan = true): Promise<void> {
		if (!scan) {
			this.cursor = 0;
			this.lastReturned = null;
			return;
		}
		const statement = this.builder.buildSelect(this.schema, {allowFiltering: this.config.allowFiltering});
		this.resetCursor(await this.run(statement));
	}

	rndNext(): DecodedRow | null {
		if (!this.resultSet || this.cursor >= this.resultSet.rows.length) {
			return null;
		}
		const index = this.cursor;
		this.cursor += 1;
		this.lastReturned = index;
		return this.rowAt(index);
	}

	position(): Buffer {
		if (this.lastReturned === null) {
			throw new UnsupportedOperationError('position', 'No row has been read from the current result set');
		}
		return encodeScanPosition(this.lastReturned);
	}

	rndPos(ref: Uint8Array): DecodedRow | null {
		const index = decodeScanPosition(ref);
		if (!this.resultSet || index >= this.resultSet.rows.length) {
			return null;
		}
		this.cursor = index + 1;
		this.lastReturned = index;
		return this.rowAt(index);
	}

	rndEnd(): void {
		this.resetCursor(null);
	}

	async indexRead(keyParts: ReadonlyArray<Scalar | null | undefined>, keypartMap?: number): Promise<DecodedRow | null> {
		const where = this.builder.buildWhereFromKey(this.schema, keyParts, keypartMap);
		const statement = this.builder.buildSelect(this.schema, {where, allowFiltering: this.config.allowFiltering});
		this.resetCursor(await this.run(statement));
		return this.rndNext();
	}

	indexNext(): DecodedRow | null {
		return this.rndNext();
	}

	indexFirst(): DecodedRow | null {
		this.cursor = 0;
		return this.rndNext();
	}

	indexPrev(): DecodedRow | null {
		throw new UnsupportedOperationError('index_prev');
	}

	indexLast(): DecodedRow | null {
		throw new UnsupportedOperationError('index_last');
	}

	private async ensureConnected(): Promise<void> {
		if (!this.connection.isConnected()) {
			await this.connection.connect();
		}
	}

	private async run(statement: string): Promise<QueryResult> {
		await this.ensureConnected();
		return this.connection.execute(statement);
	}

	private resetCursor(resultSet: QueryResult | null): void {
		this.resultSet = resultSet;
		this.cursor = 0;
		this.lastReturned = null;
	}

	private rowAt(index: number): DecodedRow | null {
		const cells = this.resultSet?.rows[index];
		if (!this.resultSet || !cells) {
			return null;
		}

		const {row, errors} = this.materializer.materialize(this.resultSet.columnNames, cells, this.schema);
		const [firstError] = errors;
		if (firstError && this.config.strictDecoding) {
			throw firstError;
		}
		for (const error of errors) {
			this.logger.warn({error: error.message, column: error.column, reason: error.reason}, 'Storing NULL for cell');
		}
		return row;
	}
}
