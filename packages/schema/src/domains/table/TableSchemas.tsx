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

import {z} from 'zod';

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const IdentifierType = z
	.string()
	.regex(IDENTIFIER_PATTERN, 'must be a plain CQL identifier')
	.describe('Unquoted CQL identifier');

export const LogicalType = z.discriminatedUnion('kind', [
	z.object({kind: z.literal('tinyint')}),
	z.object({kind: z.literal('smallint')}),
	z.object({kind: z.literal('int')}),
	z.object({kind: z.literal('bigint')}),
	z.object({kind: z.literal('float')}),
	z.object({kind: z.literal('double')}),
	z.object({kind: z.literal('decimal'), scale: z.number().int().min(0).describe('Digits after the decimal point')}),
	z.object({kind: z.literal('blob'), length: z.number().int().min(0).optional().describe('Fixed byte length')}),
	z.object({kind: z.literal('text')}),
	z.object({kind: z.literal('enum')}),
	z.object({kind: z.literal('set')}),
	z.object({kind: z.literal('json')}),
	z.object({kind: z.literal('date')}),
	z.object({kind: z.literal('time')}),
	z.object({kind: z.literal('timestamp')}),
	z.object({kind: z.literal('boolean')}),
	z.object({kind: z.literal('other'), name: z.string().min(1).describe('Host type name with no CQL mapping')}),
]);

export type LogicalType = z.infer<typeof LogicalType>;

export const ColumnRole = z.enum(['regular', 'partition_key', 'clustering_key']);

export type ColumnRole = z.infer<typeof ColumnRole>;

export const ColumnDescriptor = z.object({
	name: IdentifierType.describe('Column name, unique within the table ignoring case'),
	type: LogicalType.describe('Logical value type of the column'),
	nullable: z.boolean().default(true).describe('Whether the column accepts NULL'),
	role: ColumnRole.default('regular').describe('Primary key participation'),
});

export type ColumnDescriptor = z.infer<typeof ColumnDescriptor>;

export const TableSchema = z
	.object({
		keyspace: IdentifierType.describe('Keyspace holding the table'),
		table: IdentifierType.describe('Table name inside the keyspace'),
		columns: z.array(ColumnDescriptor).describe('Columns in declaration order'),
	})
	.superRefine((schema, ctx) => {
		const seen = new Set<string>();
		schema.columns.forEach((column, index) => {
			const key = column.name.toLowerCase();
			if (seen.has(key)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ['columns', index, 'name'],
					message: `Duplicate column name "${column.name}"`,
				});
			}
			seen.add(key);
		});
	});

export type TableSchema = z.infer<typeof TableSchema>;
export type TableSchemaInput = z.input<typeof TableSchema>;
