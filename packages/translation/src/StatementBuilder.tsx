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

import {DEFAULT_REPLICATION_FACTOR, NULL_LITERAL} from '@cqlbridge/constants/src/BridgeConstants';
import {ConfigurationError} from '@cqlbridge/errors/src/domains/config/ConfigurationError';
import {TypeConversionError} from '@cqlbridge/errors/src/domains/conversion/TypeConversionError';
import {UnsupportedOperationError} from '@cqlbridge/errors/src/domains/core/UnsupportedOperationError';
import type {ColumnDescriptor, TableSchema} from '@cqlbridge/schema/src/domains/table/TableSchemas';
import {
	findColumn,
	getKeyColumns,
	getNonKeyColumns,
	qualifiedTableName,
} from '@cqlbridge/schema/src/TableSchemaUtils';
import {unwrapConversion} from '@cqlbridge/translation/src/ConversionResult';
import {keyPredicateFromKeyParts, keyPredicateFromRow} from '@cqlbridge/translation/src/KeyPredicate';
import {type KeyPredicate, type Row, readRowValue, type Scalar} from '@cqlbridge/translation/src/RowTypes';
import {describeLogicalType, TypeMapper} from '@cqlbridge/translation/src/TypeMapper';

export interface StatementBuilderOptions {
	typeMapper?: TypeMapper;
	rejectUnsupportedTypes?: boolean;
}

export interface SelectOptions {
	where?: string;
	allowFiltering?: boolean;
}

export function renderUseKeyspace(keyspace: string): string {
	return `USE ${keyspace}`;
}

export class StatementBuilder {
	private readonly typeMapper: TypeMapper;
	private readonly rejectUnsupportedTypes: boolean;

	constructor(options: StatementBuilderOptions = {}) {
		this.typeMapper = options.typeMapper ?? new TypeMapper();
		this.rejectUnsupportedTypes = options.rejectUnsupportedTypes ?? false;
	}

	buildCreateKeyspace(keyspace: string, replicationFactor: number = DEFAULT_REPLICATION_FACTOR): string {
		return (
			`CREATE KEYSPACE IF NOT EXISTS ${keyspace} WITH replication = ` +
			`{'class': 'SimpleStrategy', 'replication_factor': ${replicationFactor}}`
		);
	}

	buildUseKeyspace(keyspace: string): string {
		return renderUseKeyspace(keyspace);
	}

	buildCreateTable(schema: TableSchema): string {
		const definitions = schema.columns.map((column) => {
			if (this.rejectUnsupportedTypes && !this.typeMapper.isSupportedType(column.type)) {
				throw new UnsupportedOperationError(
					'create_table',
					`Column "${column.name}" has a type with no CQL mapping`,
				);
			}
			return `${column.name} ${this.typeMapper.cqlTypeName(column.type)}`;
		});

		const primaryKey = this.renderPrimaryKey(schema);
		if (primaryKey) {
			definitions.push(primaryKey);
		}
		return `CREATE TABLE IF NOT EXISTS ${qualifiedTableName(schema)} (${definitions.join(', ')})`;
	}

	buildDropTable(schema: TableSchema): string {
		return `DROP TABLE IF EXISTS ${qualifiedTableName(schema)}`;
	}

	buildTruncate(schema: TableSchema): string {
		return `TRUNCATE ${qualifiedTableName(schema)}`;
	}

	buildInsert(schema: TableSchema, row: Row): string {
		return this.renderInsert(schema, schema.columns, row);
	}

	buildUpdate(schema: TableSchema, oldRow: Row, newRow: Row): string {
		const keyColumns = getKeyColumns(schema);
		if (keyColumns.length === 0) {
			throw new UnsupportedOperationError('update', `Table ${qualifiedTableName(schema)} has no key columns`);
		}

		const setColumns = getNonKeyColumns(schema);
		if (setColumns.length === 0) {
			// A key-only row has nothing to SET; the upsert rewrites it.
			return this.renderInsert(schema, keyColumns, newRow);
		}

		const assignments = setColumns.map(
			(column) => `${column.name} = ${this.encodeCell(column, readRowValue(newRow, column.name))}`,
		);
		const where = this.renderRowKey(schema, oldRow);
		return `UPDATE ${qualifiedTableName(schema)} SET ${assignments.join(', ')} WHERE ${where}`;
	}

	buildDelete(schema: TableSchema, row: Row): string {
		if (getKeyColumns(schema).length === 0) {
			throw new UnsupportedOperationError('delete', `Table ${qualifiedTableName(schema)} has no key columns`);
		}
		const where = this.renderRowKey(schema, row);
		return `DELETE FROM ${qualifiedTableName(schema)} WHERE ${where}`;
	}

	buildSelect(schema: TableSchema, options: SelectOptions = {}): string {
		const columns = schema.columns.length > 0 ? schema.columns.map((c) => c.name).join(', ') : '*';
		let statement = `SELECT ${columns} FROM ${qualifiedTableName(schema)}`;
		const where = options.where?.trim();
		if (where) {
			statement += ` WHERE ${where}`;
		}
		if (options.allowFiltering) {
			statement += ' ALLOW FILTERING';
		}
		return statement;
	}

	buildWhereFromKey(
		schema: TableSchema,
		keyParts: ReadonlyArray<Scalar | null | undefined>,
		keypartMap?: number,
	): string {
		return this.renderPredicate(schema, keyPredicateFromKeyParts(schema, keyParts, keypartMap));
	}

	renderPredicate(schema: TableSchema, predicate: KeyPredicate): string {
		return predicate
			.map((term) => {
				const column = findColumn(schema, term.column);
				if (!column) {
					throw new ConfigurationError(`Unknown column "${term.column}" in ${qualifiedTableName(schema)}`);
				}
				return `${column.name} = ${this.encodeCell(column, term.value)}`;
			})
			.join(' AND ');
	}

	/** Key columns cannot hold NULL, so a row missing one has no addressable key. */
	private renderRowKey(schema: TableSchema, row: Row): string {
		for (const column of getKeyColumns(schema)) {
			const value = readRowValue(row, column.name);
			if (value === null || value === undefined) {
				throw TypeConversionError.unencodable(describeLogicalType(column.type), NULL_LITERAL).forColumn(
					column.name,
				);
			}
		}
		return this.renderPredicate(schema, keyPredicateFromRow(schema, row));
	}

	private renderPrimaryKey(schema: TableSchema): string | null {
		const keyColumns = getKeyColumns(schema);
		if (keyColumns.length === 0) {
			return null;
		}

		const partition = keyColumns.filter((c) => c.role === 'partition_key').map((c) => c.name);
		const clustering = keyColumns.filter((c) => c.role !== 'partition_key').map((c) => c.name);
		const parts = partition.length > 1 ? [`(${partition.join(', ')})`, ...clustering] : [...partition, ...clustering];
		return `PRIMARY KEY (${parts.join(', ')})`;
	}

	private renderInsert(schema: TableSchema, columns: ReadonlyArray<ColumnDescriptor>, row: Row): string {
		const names = columns.map((c) => c.name);
		const values = columns.map((column) => this.encodeCell(column, readRowValue(row, column.name)));
		return `INSERT INTO ${qualifiedTableName(schema)} (${names.join(', ')}) VALUES (${values.join(', ')})`;
	}

	private encodeCell(column: ColumnDescriptor, value: Scalar | null | undefined): string {
		return unwrapConversion(this.typeMapper.encode(value, column.type), column.name);
	}
}
