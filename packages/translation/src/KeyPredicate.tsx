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

import type {TableSchema} from '@cqlbridge/schema/src/domains/table/TableSchemas';
import {getKeyColumns} from '@cqlbridge/schema/src/TableSchemaUtils';
import {type KeyPredicate, type KeyPredicateTerm, type Row, readRowValue, type Scalar} from '@cqlbridge/translation/src/RowTypes';

const KEYPART_MAP_BITS = 32;

export function keyPredicateFromRow(schema: TableSchema, row: Row): KeyPredicate {
	return getKeyColumns(schema).map((column) => ({column: column.name, value: readRowValue(row, column.name)}));
}

/**
 * Equality terms for the leading key parts. Stops at the first part that is
 * missing or whose bit in `keypartMap` is clear. The map is a 32-bit mask,
 * so parts past the 32nd are never selected by it.
 */
export function keyPredicateFromKeyParts(
	schema: TableSchema,
	keyParts: ReadonlyArray<Scalar | null | undefined>,
	keypartMap?: number,
): KeyPredicate {
	const terms: Array<KeyPredicateTerm> = [];
	const keyColumns = getKeyColumns(schema);
	for (let i = 0; i < keyColumns.length; i++) {
		const column = keyColumns[i];
		if (!column || i >= keyParts.length) break;
		if (keypartMap !== undefined && (i >= KEYPART_MAP_BITS || (keypartMap & (1 << i)) === 0)) break;
		const value = keyParts[i];
		if (value === undefined) break;
		terms.push({column: column.name, value});
	}
	return terms;
}
