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

import {TypeConversionError} from '@cqlbridge/errors/src/domains/conversion/TypeConversionError';
import {UnsupportedOperationError} from '@cqlbridge/errors/src/domains/core/UnsupportedOperationError';
import {parseTableSchema} from '@cqlbridge/schema/src/TableSchemaUtils';
import {StatementBuilder} from '@cqlbridge/translation/src/StatementBuilder';
import {TypeMapper} from '@cqlbridge/translation/src/TypeMapper';
import {describe, expect, test} from 'vitest';

const people = parseTableSchema({
	keyspace: 'ks',
	table: 't',
	columns: [
		{name: 'id', type: {kind: 'int'}, role: 'partition_key'},
		{name: 'name', type: {kind: 'text'}},
	],
});

const accounts = parseTableSchema({
	keyspace: 'ks',
	table: 't',
	columns: [
		{name: 'id', type: {kind: 'bigint'}, role: 'partition_key'},
		{name: 'name', type: {kind: 'text'}},
	],
});

const events = parseTableSchema({
	keyspace: 'ks',
	table: 'events',
	columns: [
		{name: 'a', type: {kind: 'int'}, role: 'partition_key'},
		{name: 'v', type: {kind: 'double'}},
		{name: 'c', type: {kind: 'timestamp'}, role: 'clustering_key'},
		{name: 'b', type: {kind: 'text'}, role: 'partition_key'},
	],
});

const unmarked = parseTableSchema({
	keyspace: 'ks',
	table: 'flags',
	columns: [
		{name: 'x', type: {kind: 'bigint'}},
		{name: 'y', type: {kind: 'boolean'}},
	],
});

const keyOnly = parseTableSchema({
	keyspace: 'ks',
	table: 'k',
	columns: [{name: 'id', type: {kind: 'int'}, role: 'partition_key'}],
});

const empty = parseTableSchema({keyspace: 'ks', table: 'empty', columns: []});

describe('StatementBuilder', () => {
	const builder = new StatementBuilder({typeMapper: new TypeMapper({timestampZone: 'utc'})});

	describe('buildCreateTable', () => {
		test('lists columns in schema order with the primary key last', () => {
			expect(builder.buildCreateTable(people)).toBe(
				'CREATE TABLE IF NOT EXISTS ks.t (id int, name text, PRIMARY KEY (id))',
			);
		});

		test('groups a composite partition key', () => {
			expect(builder.buildCreateTable(events)).toBe(
				'CREATE TABLE IF NOT EXISTS ks.events (a int, v double, c timestamp, b text, PRIMARY KEY ((a, b), c))',
			);
		});

		test('uses the first column when no key is marked', () => {
			expect(builder.buildCreateTable(unmarked)).toBe(
				'CREATE TABLE IF NOT EXISTS ks.flags (x bigint, y boolean, PRIMARY KEY (x))',
			);
		});

		test('emits no key clause for an empty schema', () => {
			expect(builder.buildCreateTable(empty)).toBe('CREATE TABLE IF NOT EXISTS ks.empty ()');
		});

		test('maps unknown types to text unless rejection is enabled', () => {
			const schema = parseTableSchema({
				keyspace: 'ks',
				table: 'shapes',
				columns: [
					{name: 'id', type: {kind: 'int'}},
					{name: 'shape', type: {kind: 'other', name: 'geometry'}},
				],
			});
			expect(builder.buildCreateTable(schema)).toBe(
				'CREATE TABLE IF NOT EXISTS ks.shapes (id int, shape text, PRIMARY KEY (id))',
			);

			const strict = new StatementBuilder({rejectUnsupportedTypes: true});
			expect(() => strict.buildCreateTable(schema)).toThrow(UnsupportedOperationError);
		});
	});

	describe('buildInsert', () => {
		test('renders every column and escapes quotes', () => {
			expect(builder.buildInsert(people, {id: 7, name: "O'Brien"})).toBe(
				"INSERT INTO ks.t (id, name) VALUES (7, 'O''Brien')",
			);
		});

		test('renders bigint keys at full width', () => {
			expect(builder.buildInsert(accounts, {id: 7n, name: "O'Brien"})).toBe(
				"INSERT INTO ks.t (id, name) VALUES (7, 'O''Brien')",
			);
			expect(builder.buildInsert(accounts, {id: 2n ** 63n - 1n, name: 'max'})).toBe(
				"INSERT INTO ks.t (id, name) VALUES (9223372036854775807, 'max')",
			);
		});

		test('renders absent and null values as NULL', () => {
			expect(builder.buildInsert(people, {id: 7})).toBe('INSERT INTO ks.t (id, name) VALUES (7, NULL)');
			expect(builder.buildInsert(people, {id: 7, name: null})).toBe('INSERT INTO ks.t (id, name) VALUES (7, NULL)');
		});

		test('reads row values ignoring case', () => {
			expect(builder.buildInsert(people, {ID: 1, Name: 'x'})).toBe("INSERT INTO ks.t (id, name) VALUES (1, 'x')");
		});

		test('attaches the column to conversion failures', () => {
			let thrown: unknown;
			try {
				builder.buildInsert(people, {id: 1.5, name: 'x'});
			} catch (error) {
				thrown = error;
			}
			expect(thrown).toBeInstanceOf(TypeConversionError);
			if (thrown instanceof TypeConversionError) {
				expect(thrown.column).toBe('id');
				expect(thrown.reason).toBe('malformed');
			}
		});
	});

	describe('buildUpdate', () => {
		test('sets non-key columns and matches the old key', () => {
			expect(builder.buildUpdate(people, {id: 7, name: 'A'}, {id: 7, name: 'B'})).toBe(
				"UPDATE ks.t SET name = 'B' WHERE id = 7",
			);
		});

		test('matches a bigint key', () => {
			expect(builder.buildUpdate(accounts, {id: 7n, name: 'A'}, {id: 7n, name: 'B'})).toBe(
				"UPDATE ks.t SET name = 'B' WHERE id = 7",
			);
		});

		test('rejects an old row without its key', () => {
			let thrown: unknown;
			try {
				builder.buildUpdate(people, {name: 'A'}, {id: 7, name: 'B'});
			} catch (error) {
				thrown = error;
			}
			expect(thrown).toBeInstanceOf(TypeConversionError);
			if (thrown instanceof TypeConversionError) {
				expect(thrown.column).toBe('id');
				expect(thrown.message).toBe('Cannot encode NULL as column "id" (int)');
			}
		});

		test('covers every key column', () => {
			const oldRow = {a: 1, b: 'x', c: 1704067200500, v: 1.5};
			expect(builder.buildUpdate(events, oldRow, {...oldRow, v: 2.25})).toBe(
				"UPDATE ks.events SET v = 2.25 WHERE a = 1 AND b = 'x' AND c = 1704067200500",
			);
		});

		test('rewrites a key-only row with an insert', () => {
			expect(builder.buildUpdate(keyOnly, {id: 7}, {id: 8})).toBe('INSERT INTO ks.k (id) VALUES (8)');
		});

		test('refuses tables without key columns', () => {
			expect(() => builder.buildUpdate(empty, {}, {})).toThrow(UnsupportedOperationError);
		});
	});

	describe('buildDelete', () => {
		test('deletes by key', () => {
			expect(builder.buildDelete(people, {id: 7, name: 'gone'})).toBe('DELETE FROM ks.t WHERE id = 7');
		});

		test('refuses tables without key columns', () => {
			expect(() => builder.buildDelete(empty, {})).toThrow(UnsupportedOperationError);
		});

		test('rejects a null key value', () => {
			expect(() => builder.buildDelete(events, {a: 1, b: null, c: 1704067200500})).toThrow(
				'Cannot encode NULL as column "b" (text)',
			);
		});
	});

	describe('buildSelect', () => {
		test('omits WHERE for empty or blank clauses', () => {
			expect(builder.buildSelect(people)).toBe('SELECT id, name FROM ks.t');
			expect(builder.buildSelect(people, {where: '   '})).toBe('SELECT id, name FROM ks.t');
		});

		test('appends WHERE and ALLOW FILTERING', () => {
			expect(builder.buildSelect(people, {where: 'id = 7', allowFiltering: true})).toBe(
				'SELECT id, name FROM ks.t WHERE id = 7 ALLOW FILTERING',
			);
			expect(builder.buildSelect(people, {allowFiltering: true})).toBe('SELECT id, name FROM ks.t ALLOW FILTERING');
		});
	});

	describe('buildWhereFromKey', () => {
		test('conjoins every supplied key part', () => {
			expect(builder.buildWhereFromKey(events, [1, 'x', 1704067200500])).toBe(
				"a = 1 AND b = 'x' AND c = 1704067200500",
			);
		});

		test('stops at the first missing part', () => {
			expect(builder.buildWhereFromKey(events, [1])).toBe('a = 1');
			expect(builder.buildWhereFromKey(events, [1, undefined, 5])).toBe('a = 1');
			expect(builder.buildWhereFromKey(events, [])).toBe('');
		});

		test('stops at the first part excluded by the keypart map', () => {
			expect(builder.buildWhereFromKey(events, [1, 'x', 5], 0b001)).toBe('a = 1');
			expect(builder.buildWhereFromKey(events, [1, 'x', 5], 0b101)).toBe('a = 1');
			expect(builder.buildWhereFromKey(events, [1, 'x', 5], 0b010)).toBe('');
		});

		test('treats the keypart map as 32 bits wide', () => {
			const wide = parseTableSchema({
				keyspace: 'ks',
				table: 'wide',
				columns: Array.from({length: 33}, (_, i) => ({
					name: `k${i}`,
					type: {kind: 'int' as const},
					role: 'partition_key' as const,
				})),
			});
			const parts = Array.from({length: 33}, (_, i) => i);
			const where = builder.buildWhereFromKey(wide, parts, -1);
			expect(where.split(' AND ')).toHaveLength(32);
			expect(where.endsWith('k31 = 31')).toBe(true);
		});

		test('renders null key parts as NULL', () => {
			expect(builder.buildWhereFromKey(people, [null])).toBe('id = NULL');
		});
	});

	describe('keyspace and table maintenance', () => {
		test('creates a SimpleStrategy keyspace', () => {
			expect(builder.buildCreateKeyspace('shop', 3)).toBe(
				"CREATE KEYSPACE IF NOT EXISTS shop WITH replication = {'class': 'SimpleStrategy', 'replication_factor': 3}",
			);
		});

		test('renders USE, DROP and TRUNCATE', () => {
			expect(builder.buildUseKeyspace('shop')).toBe('USE shop');
			expect(builder.buildDropTable(people)).toBe('DROP TABLE IF EXISTS ks.t');
			expect(builder.buildTruncate(people)).toBe('TRUNCATE ks.t');
		});
	});
});
