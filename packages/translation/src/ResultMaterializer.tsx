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

import type {TypeConversionError} from '@cqlbridge/errors/src/domains/conversion/TypeConversionError';
import type {TableSchema} from '@cqlbridge/schema/src/domains/table/TableSchemas';
import type {DecodedRow, QueryResult} from '@cqlbridge/translation/src/RowTypes';
import {TypeMapper} from '@cqlbridge/translation/src/TypeMapper';

export interface MaterializedRow {
	row: DecodedRow;
	errors: Array<TypeConversionError>;
}

export interface ResultMaterializerOptions {
	typeMapper?: TypeMapper;
}

export function buildColumnIndex(columnNames: ReadonlyArray<string>): Map<string, number> {
	const index = new Map<string, number>();
	columnNames.forEach((name, position) => {
		const key = name.toLowerCase();
		if (!index.has(key)) {
			index.set(key, position);
		}
	});
	return index;
}

/**
 * Maps result cells onto schema columns by name, ignoring case and result
 * column order. Cells that fail to decode are left null and reported.
 */
export class ResultMaterializer {
	private readonly typeMapper: TypeMapper;

	constructor(options: ResultMaterializerOptions = {}) {
		this.typeMapper = options.typeMapper ?? new TypeMapper();
	}

	materialize(columnNames: ReadonlyArray<string>, resultRow: ReadonlyArray<string>, schema: TableSchema): MaterializedRow {
		return this.materializeIndexed(buildColumnIndex(columnNames), resultRow, schema);
	}

	materializeAll(result: QueryResult, schema: TableSchema): Array<MaterializedRow> {
		const index = buildColumnIndex(result.columnNames);
		return result.rows.map((resultRow) => this.materializeIndexed(index, resultRow, schema));
	}

	private materializeIndexed(
		index: ReadonlyMap<string, number>,
		resultRow: ReadonlyArray<string>,
		schema: TableSchema,
	): MaterializedRow {
		const row: DecodedRow = {};
		const errors: Array<TypeConversionError> = [];

		for (const column of schema.columns) {
			const position = index.get(column.name.toLowerCase());
			const cell = position !== undefined ? resultRow[position] : undefined;
			if (cell === undefined) {
				row[column.name] = null;
				continue;
			}

			const decoded = this.typeMapper.decode(cell, column.type);
			if (decoded.ok) {
				row[column.name] = decoded.value;
			} else {
				row[column.name] = null;
				errors.push(decoded.error.forColumn(column.name));
			}
		}

		return {row, errors};
	}
}
