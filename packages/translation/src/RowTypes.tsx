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

export interface CalendarDate {
	year: number;
	month: number;
	day: number;
}

export interface TimeOfDay {
	hour: number;
	minute: number;
	second: number;
}

export interface DateTimeFields extends CalendarDate, TimeOfDay {
	microsecond: number;
}

export type Scalar = number | bigint | string | boolean | Uint8Array | Date | CalendarDate | TimeOfDay | DateTimeFields;

/**
 * A row addressed by column name. A missing key, `undefined` and `null` all
 * encode as `NULL`; decoded rows carry every schema column.
 */
export type Row = Readonly<Record<string, Scalar | null | undefined>>;

export type DecodedRow = Record<string, Scalar | null>;

export interface QueryResult {
	columnNames: Array<string>;
	rows: Array<Array<string>>;
}

export interface KeyPredicateTerm {
	column: string;
	value: Scalar | null | undefined;
}

export type KeyPredicate = ReadonlyArray<KeyPredicateTerm>;

export function readRowValue(row: Row, column: string): Scalar | null | undefined {
	if (Object.hasOwn(row, column)) {
		return row[column];
	}
	const wanted = column.toLowerCase();
	for (const [name, value] of Object.entries(row)) {
		if (name.toLowerCase() === wanted) {
			return value;
		}
	}
	return undefined;
}
