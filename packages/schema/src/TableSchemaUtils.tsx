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

import {ConfigurationError} from '@cqlbridge/errors/src/domains/config/ConfigurationError';
import {
	type ColumnDescriptor,
	TableSchema,
	type TableSchemaInput,
} from '@cqlbridge/schema/src/domains/table/TableSchemas';

export function parseTableSchema(input: TableSchemaInput): TableSchema {
	const result = TableSchema.safeParse(input);
	if (!result.success) {
		const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
		throw new ConfigurationError(`Invalid table schema for "${input.keyspace}.${input.table}"`, issues);
	}
	return result.data;
}

/**
 * Primary-key columns in key order: partition columns, then clustering columns,
 * each in schema order. Falls back to the first column when nothing is marked.
 */
export function getKeyColumns(schema: TableSchema): ReadonlyArray<ColumnDescriptor> {
	const partition = schema.columns.filter((c) => c.role === 'partition_key');
	const clustering = schema.columns.filter((c) => c.role === 'clustering_key');
	if (partition.length > 0 || clustering.length > 0) {
		return [...partition, ...clustering];
	}
	const first = schema.columns[0];
	return first ? [first] : [];
}

export function getNonKeyColumns(schema: TableSchema): ReadonlyArray<ColumnDescriptor> {
	const keyNames = new Set(getKeyColumns(schema).map((c) => c.name));
	return schema.columns.filter((c) => !keyNames.has(c.name));
}

export function findColumn(schema: TableSchema, name: string): ColumnDescriptor | undefined {
	const wanted = name.toLowerCase();
	return schema.columns.find((c) => c.name.toLowerCase() === wanted);
}

export function qualifiedTableName(schema: Pick<TableSchema, 'keyspace' | 'table'>): string {
	return `${schema.keyspace}.${schema.table}`;
}
