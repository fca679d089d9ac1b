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

import {formatCell} from '@cqlbridge/database/src/CellFormatter';
import cassandra from 'cassandra-driver';
import {describe, expect, test} from 'vitest';

describe('formatCell', () => {
	test('renders null values as NULL', () => {
		expect(formatCell(null)).toBe('NULL');
		expect(formatCell(undefined)).toBe('NULL');
	});

	test('renders scalars', () => {
		expect(formatCell('text')).toBe('text');
		expect(formatCell(true)).toBe('1');
		expect(formatCell(false)).toBe('0');
		expect(formatCell(42)).toBe('42');
		expect(formatCell(0.1)).toBe('0.1');
		expect(formatCell(-9223372036854775808n)).toBe('-9223372036854775808');
		expect(formatCell(Number.NaN)).toBe('NaN');
	});

	test('renders timestamps as epoch milliseconds', () => {
		expect(formatCell(new Date(1704067200500))).toBe('1704067200500');
	});

	test('renders blobs as hex', () => {
		expect(formatCell(Buffer.from([0xca, 0xfe]))).toBe('0xcafe');
	});

	test('renders driver date and time types', () => {
		expect(formatCell(cassandra.types.LocalDate.fromString('2024-03-05'))).toBe('2024-03-05');
		expect(formatCell(cassandra.types.LocalTime.fromString('08:30:15.123456789'))).toBe('08:30:15.123456');
		expect(formatCell(cassandra.types.LocalTime.fromString('23:00:00'))).toBe('23:00:00.000000');
	});

	test('renders driver value types by their text form', () => {
		expect(formatCell(cassandra.types.BigDecimal.fromString('12.5'))).toBe('12.5');
		expect(formatCell(cassandra.types.InetAddress.fromString('10.0.0.1'))).toBe('10.0.0.1');
		expect(formatCell(cassandra.types.Uuid.fromString('6ba7b810-9dad-11d1-80b4-00c04fd430c8'))).toBe(
			'6ba7b810-9dad-11d1-80b4-00c04fd430c8',
		);
	});

	test('marks collections as unsupported', () => {
		expect(formatCell(new Map([['a', 1]]))).toBe('[UNSUPPORTED_TYPE]');
		expect(formatCell(['a'])).toBe('[UNSUPPORTED_TYPE]');
	});
});
