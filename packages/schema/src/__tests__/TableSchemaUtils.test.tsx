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
	findColumn,
	getKeyColumns,
	getNonKeyColumns,
	parseTableSchema,
	qualifiedTableName,
} from '@cqlbridge/schema/src/TableSchemaUtils';
import {describe, expect, test} from 'vitest';

describe('parseTableSchema', () => {
	test('applies column defaults', () => {
		const schema = parseTableSchema({keyspace: 'ks', table: 't', columns: [{name: 'id', type: {kind: 'int'}}]});
		expect(schema.columns).toEqual([{name: 'id', type: {kind: 'int'}, nullable: true, role: 'regular'}]);
	});

	test('rejects column names that differ only by case', () => {
		const parse = () =>
			parseTableSchema({
				keyspace: 'ks',
				table: 't',
				columns: [
					{name: 'Id', type: {kind: 'int'}},
					{name: 'id', type: {kind: 'text'}},
				],
			});
		expect(parse).toThrow(ConfigurationError);
		expect(parse).toThrow('Invalid table schema for "ks.t"');
	});

	test('rejects identifiers that would need quoting', () => {
		let thrown: unknown;
		try {
			parseTableSchema({keyspace: 'ks', table: 'bad-name', columns: []});
		} catch (error) {
			thrown = error;
		}
		expect(thrown).toBeInstanceOf(ConfigurationError);
		if (thrown instanceof ConfigurationError) {
			expect(thrown.issues).toEqual(['table: must be a plain CQL identifier']);
		}
	});
});

describe('key columns', () => {
	const schema = parseTableSchema({
		keyspace: 'ks',
		table: 't',
		columns: [
			{name: 'c2', type: {kind: 'int'}, role: 'clustering_key'},
			{name: 'value', type: {kind: 'text'}},
			{name: 'p1', type: {kind: 'int'}, role: 'partition_key'},
			{name: 'c1', type: {kind: 'int'}, role: 'clustering_key'},
			{name: 'p2', type: {kind: 'int'}, role: 'partition_key'},
		],
	});

	test('orders partition columns before clustering columns', () => {
		expect(getKeyColumns(schema).map((c) => c.name)).toEqual(['p1', 'p2', 'c2', 'c1']);
		expect(getNonKeyColumns(schema).map((c) => c.name)).toEqual(['value']);
	});

	test('falls back to the first column', () => {
		const plain = parseTableSchema({
			keyspace: 'ks',
			table: 't',
			columns: [
				{name: 'a', type: {kind: 'int'}},
				{name: 'b', type: {kind: 'int'}},
			],
		});
		expect(getKeyColumns(plain).map((c) => c.name)).toEqual(['a']);
	});

	test('has no key for an empty schema', () => {
		expect(getKeyColumns(parseTableSchema({keyspace: 'ks', table: 't', columns: []}))).toEqual([]);
	});

	test('finds columns ignoring case', () => {
		expect(findColumn(schema, 'VALUE')?.name).toBe('value');
		expect(findColumn(schema, 'missing')).toBeUndefined();
		expect(qualifiedTableName(schema)).toBe('ks.t');
	});
});
