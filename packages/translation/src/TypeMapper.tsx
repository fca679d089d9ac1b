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

import {NULL_LITERAL} from '@cqlbridge/constants/src/BridgeConstants';
import {TypeConversionError} from '@cqlbridge/errors/src/domains/conversion/TypeConversionError';
import type {LogicalType} from '@cqlbridge/schema/src/domains/table/TableSchemas';
import {type ConversionResult, conversionFailed, converted} from '@cqlbridge/translation/src/ConversionResult';
import type {CalendarDate, DateTimeFields, Scalar, TimeOfDay} from '@cqlbridge/translation/src/RowTypes';

export type TimestampZone = 'local' | 'utc';

export interface TypeMapperOptions {
	timestampZone?: TimestampZone;
}

type IntegerKind = 'tinyint' | 'smallint' | 'int' | 'bigint';

const INTEGER_RANGES: Record<IntegerKind, {min: bigint; max: bigint}> = {
	tinyint: {min: -128n, max: 127n},
	smallint: {min: -32768n, max: 32767n},
	int: {min: -2147483648n, max: 2147483647n},
	bigint: {min: -(2n ** 63n), max: 2n ** 63n - 1n},
};

const FLOAT_SIGNIFICANT_DIGITS = 15;
const MAX_EPOCH_MS = 8.64e15;

const INTEGER_TEXT = /^[+-]?\d+$/;
const FLOAT_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const NON_FINITE_TEXT = new Map<string, number>([
	['NaN', Number.NaN],
	['Infinity', Number.POSITIVE_INFINITY],
	['+Infinity', Number.POSITIVE_INFINITY],
	['-Infinity', Number.NEGATIVE_INFINITY],
]);
const DECIMAL_TEXT = /^-?\d+(\.\d+)?([eE][+-]?\d+)?$/;
const BLOB_TEXT = /^0[xX]((?:[0-9a-fA-F]{2})*)$/;
const DATE_TEXT = /^\s*([+-]?\d+)-(\d+)-(\d+)/;
const TIME_TEXT = /^\s*(\d+):(\d+):(\d+)/;

export function describeLogicalType(type: LogicalType): string {
	switch (type.kind) {
		case 'decimal':
			return `decimal(${type.scale})`;
		case 'blob':
			return type.length !== undefined ? `blob(${type.length})` : 'blob';
		case 'other':
			return `other(${type.name})`;
		default:
			return type.kind;
	}
}

function describeScalar(value: Scalar): string {
	if (typeof value === 'string') return value;
	if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') return String(value);
	if (value instanceof Uint8Array) return `<${value.byteLength} bytes>`;
	if (value instanceof Date) return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
	return JSON.stringify(value);
}

function pad(value: number, width: number): string {
	const digits = String(Math.abs(value)).padStart(width, '0');
	return value < 0 ? `-${digits}` : digits;
}

function nonFiniteLiteral(value: number): string {
	if (Number.isNaN(value)) return 'NaN';
	return value > 0 ? 'Infinity' : '-Infinity';
}

function trimFraction(text: string): string {
	if (!text.includes('.')) return text;
	return text.replace(/0+$/, '').replace(/\.$/, '');
}

/**
 * printf `%.<precision>g` formatting: fixed notation unless the exponent is
 * below -4 or at least the precision, trailing fraction zeros removed.
 */
export function formatGeneral(value: number, precision: number): string {
	if (!Number.isFinite(value)) return nonFiniteLiteral(value);
	if (value === 0) return Object.is(value, -0) ? '-0' : '0';

	const [mantissa = '0', exponentText = '0'] = value.toExponential(precision - 1).split('e');
	const exponent = Number(exponentText);
	if (exponent < -4 || exponent >= precision) {
		const sign = exponent < 0 ? '-' : '+';
		return `${trimFraction(mantissa)}e${sign}${pad(Math.abs(exponent), 2)}`;
	}
	return trimFraction(value.toFixed(precision - 1 - exponent));
}

export function escapeString(text: string): string {
	return text.replaceAll("'", "''");
}

function quote(text: string): string {
	return `'${escapeString(text)}'`;
}

function hasDateFields(value: Scalar): value is CalendarDate | DateTimeFields {
	return typeof value === 'object' && !(value instanceof Date) && !(value instanceof Uint8Array) && 'year' in value;
}

function hasTimeFields(value: Scalar): value is TimeOfDay | DateTimeFields {
	return typeof value === 'object' && !(value instanceof Date) && !(value instanceof Uint8Array) && 'hour' in value;
}

function isWithin(value: number, min: number, max: number): boolean {
	return Number.isInteger(value) && value >= min && value <= max;
}

function isValidCalendarDate(date: CalendarDate): boolean {
	return Number.isInteger(date.year) && isWithin(date.month, 1, 12) && isWithin(date.day, 1, 31);
}

function isValidTimeOfDay(time: TimeOfDay): boolean {
	return isWithin(time.hour, 0, 23) && isWithin(time.minute, 0, 59) && isWithin(time.second, 0, 59);
}

export class TypeMapper {
	private readonly timestampZone: TimestampZone;

	constructor(options: TypeMapperOptions = {}) {
		this.timestampZone = options.timestampZone ?? 'local';
	}

	cqlTypeName(type: LogicalType): string {
		switch (type.kind) {
			case 'tinyint':
			case 'smallint':
			case 'int':
			case 'bigint':
			case 'float':
			case 'double':
			case 'decimal':
			case 'blob':
			case 'text':
			case 'date':
			case 'time':
			case 'timestamp':
			case 'boolean':
				return type.kind;
			case 'enum':
			case 'set':
			case 'json':
			case 'other':
				return 'text';
			default: {
				const _exhaustive: never = type;
				return _exhaustive;
			}
		}
	}

	escapeString(text: string): string {
		return escapeString(text);
	}

	isSupportedType(type: LogicalType): boolean {
		return type.kind !== 'other';
	}

	encode(value: Scalar | null | undefined, type: LogicalType): ConversionResult<string> {
		if (value === null || value === undefined) {
			return converted(NULL_LITERAL);
		}

		switch (type.kind) {
			case 'tinyint':
			case 'smallint':
			case 'int':
			case 'bigint':
				return this.encodeInteger(value, type.kind);
			case 'float':
				return this.encodeFloat(value);
			case 'double':
				return this.encodeDouble(value);
			case 'decimal':
				return this.encodeDecimal(value, type);
			case 'blob':
				return this.encodeBlob(value, type);
			case 'date':
				return this.encodeDate(value);
			case 'time':
				return this.encodeTime(value);
			case 'timestamp':
				return this.encodeTimestamp(value);
			case 'boolean':
				return this.encodeBoolean(value);
			case 'text':
			case 'enum':
			case 'set':
			case 'json':
			case 'other':
				return this.encodeText(value, type);
			default: {
				const _exhaustive: never = type;
				return _exhaustive;
			}
		}
	}

	decode(text: string, type: LogicalType): ConversionResult<Scalar | null> {
		if (text === NULL_LITERAL || text === '') {
			return converted(null);
		}

		switch (type.kind) {
			case 'tinyint':
			case 'smallint':
			case 'int':
			case 'bigint':
				return this.decodeInteger(text, type.kind);
			case 'float':
			case 'double':
				return this.decodeFloatingPoint(text, type.kind);
			case 'blob':
				return this.decodeBlob(text, type);
			case 'date':
				return this.decodeDate(text);
			case 'time':
				return this.decodeTime(text);
			case 'timestamp':
				return this.decodeTimestamp(text);
			case 'boolean':
				return converted(text === 'true' || text === '1');
			case 'decimal':
			case 'text':
			case 'enum':
			case 'set':
			case 'json':
			case 'other':
				return converted(text);
			default: {
				const _exhaustive: never = type;
				return _exhaustive;
			}
		}
	}

	private encodeInteger(value: Scalar, kind: IntegerKind): ConversionResult<string> {
		let integer: bigint;
		if (typeof value === 'bigint') {
			integer = value;
		} else if (typeof value === 'number') {
			if (!Number.isInteger(value)) {
				return conversionFailed(TypeConversionError.malformed(kind, String(value)));
			}
			integer = BigInt(value);
		} else if (typeof value === 'string') {
			const parsed = this.decodeInteger(value, kind);
			if (!parsed.ok) return parsed;
			return converted(String(parsed.value));
		} else {
			return conversionFailed(TypeConversionError.unencodable(kind, describeScalar(value)));
		}

		const range = INTEGER_RANGES[kind];
		if (integer < range.min || integer > range.max) {
			return conversionFailed(TypeConversionError.outOfRange(kind, integer.toString()));
		}
		return converted(integer.toString());
	}

	private decodeInteger(text: string, kind: IntegerKind): ConversionResult<number | bigint> {
		const trimmed = text.trim();
		if (!INTEGER_TEXT.test(trimmed)) {
			return conversionFailed(TypeConversionError.malformed(kind, text));
		}

		const integer = BigInt(trimmed);
		const range = INTEGER_RANGES[kind];
		if (integer < range.min || integer > range.max) {
			return conversionFailed(TypeConversionError.outOfRange(kind, text));
		}
		return converted(kind === 'bigint' ? integer : Number(integer));
	}

	private toFloatingPoint(value: Scalar, kind: 'float' | 'double'): ConversionResult<number> {
		if (typeof value === 'number') return converted(value);
		if (typeof value === 'bigint') return converted(Number(value));
		if (typeof value === 'string') return this.decodeFloatingPoint(value, kind);
		return conversionFailed(TypeConversionError.unencodable(kind, describeScalar(value)));
	}

	private encodeFloat(value: Scalar): ConversionResult<string> {
		const number = this.toFloatingPoint(value, 'float');
		if (!number.ok) return number;

		const single = Math.fround(number.value);
		if (Number.isFinite(number.value) && !Number.isFinite(single)) {
			return conversionFailed(TypeConversionError.outOfRange('float', String(number.value)));
		}
		return converted(formatGeneral(single, FLOAT_SIGNIFICANT_DIGITS));
	}

	private encodeDouble(value: Scalar): ConversionResult<string> {
		const number = this.toFloatingPoint(value, 'double');
		if (!number.ok) return number;
		// Shortest text that parses back to the same double.
		return converted(Number.isFinite(number.value) ? String(number.value) : nonFiniteLiteral(number.value));
	}

	private decodeFloatingPoint(text: string, kind: 'float' | 'double'): ConversionResult<number> {
		const trimmed = text.trim();
		const nonFinite = NON_FINITE_TEXT.get(trimmed);
		if (nonFinite !== undefined) {
			return converted(nonFinite);
		}
		if (!FLOAT_TEXT.test(trimmed)) {
			return conversionFailed(TypeConversionError.malformed(kind, text));
		}

		const parsed = Number(trimmed);
		const result = kind === 'float' ? Math.fround(parsed) : parsed;
		if (!Number.isFinite(result)) {
			return conversionFailed(TypeConversionError.outOfRange(kind, text));
		}
		return converted(result);
	}

	private encodeDecimal(value: Scalar, type: Extract<LogicalType, {kind: 'decimal'}>): ConversionResult<string> {
		const name = describeLogicalType(type);
		let text: string;
		if (typeof value === 'string') {
			text = value;
		} else if (typeof value === 'bigint' || (typeof value === 'number' && Number.isFinite(value))) {
			text = String(value);
		} else {
			return conversionFailed(TypeConversionError.unencodable(name, describeScalar(value)));
		}

		if (!DECIMAL_TEXT.test(text)) {
			return conversionFailed(TypeConversionError.malformed(name, text));
		}
		return converted(text);
	}

	private encodeText(value: Scalar, type: LogicalType): ConversionResult<string> {
		if (typeof value === 'string') {
			return converted(quote(value));
		}
		if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
			return converted(quote(String(value)));
		}
		if (value instanceof Uint8Array) {
			return converted(quote(Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString('utf8')));
		}
		return conversionFailed(TypeConversionError.unencodable(describeLogicalType(type), describeScalar(value)));
	}

	private encodeBlob(value: Scalar, type: Extract<LogicalType, {kind: 'blob'}>): ConversionResult<string> {
		if (!(value instanceof Uint8Array)) {
			return conversionFailed(TypeConversionError.unencodable(describeLogicalType(type), describeScalar(value)));
		}
		if (type.length !== undefined && value.byteLength > type.length) {
			return conversionFailed(TypeConversionError.outOfRange(describeLogicalType(type), describeScalar(value)));
		}
		return converted(`0x${Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString('hex')}`);
	}

	private decodeBlob(text: string, type: Extract<LogicalType, {kind: 'blob'}>): ConversionResult<Buffer> {
		const match = BLOB_TEXT.exec(text.trim());
		if (!match) {
			return conversionFailed(TypeConversionError.malformed(describeLogicalType(type), text));
		}
		return converted(Buffer.from(match[1] ?? '', 'hex'));
	}

	private calendarFieldsOf(date: Date): DateTimeFields {
		if (this.timestampZone === 'utc') {
			return {
				year: date.getUTCFullYear(),
				month: date.getUTCMonth() + 1,
				day: date.getUTCDate(),
				hour: date.getUTCHours(),
				minute: date.getUTCMinutes(),
				second: date.getUTCSeconds(),
				microsecond: date.getUTCMilliseconds() * 1000,
			};
		}
		return {
			year: date.getFullYear(),
			month: date.getMonth() + 1,
			day: date.getDate(),
			hour: date.getHours(),
			minute: date.getMinutes(),
			second: date.getSeconds(),
			microsecond: date.getMilliseconds() * 1000,
		};
	}

	private encodeDate(value: Scalar): ConversionResult<string> {
		let date: CalendarDate;
		if (value instanceof Date) {
			if (Number.isNaN(value.getTime())) {
				return conversionFailed(TypeConversionError.malformed('date', describeScalar(value)));
			}
			date = this.calendarFieldsOf(value);
		} else if (hasDateFields(value)) {
			date = value;
		} else {
			return conversionFailed(TypeConversionError.unencodable('date', describeScalar(value)));
		}

		if (!isValidCalendarDate(date)) {
			return conversionFailed(TypeConversionError.outOfRange('date', describeScalar(value)));
		}
		return converted(`'${pad(date.year, 4)}-${pad(date.month, 2)}-${pad(date.day, 2)}'`);
	}

	private decodeDate(text: string): ConversionResult<CalendarDate> {
		const match = DATE_TEXT.exec(text);
		if (!match) {
			return conversionFailed(TypeConversionError.malformed('date', text));
		}
		const date: CalendarDate = {year: Number(match[1]), month: Number(match[2]), day: Number(match[3])};
		if (!isValidCalendarDate(date)) {
			return conversionFailed(TypeConversionError.outOfRange('date', text));
		}
		return converted(date);
	}

	private encodeTime(value: Scalar): ConversionResult<string> {
		let time: TimeOfDay;
		if (value instanceof Date) {
			if (Number.isNaN(value.getTime())) {
				return conversionFailed(TypeConversionError.malformed('time', describeScalar(value)));
			}
			time = this.calendarFieldsOf(value);
		} else if (hasTimeFields(value)) {
			time = value;
		} else {
			return conversionFailed(TypeConversionError.unencodable('time', describeScalar(value)));
		}

		if (!isValidTimeOfDay(time)) {
			return conversionFailed(TypeConversionError.outOfRange('time', describeScalar(value)));
		}
		return converted(`'${pad(time.hour, 2)}:${pad(time.minute, 2)}:${pad(time.second, 2)}'`);
	}

	private decodeTime(text: string): ConversionResult<TimeOfDay> {
		const match = TIME_TEXT.exec(text);
		if (!match) {
			return conversionFailed(TypeConversionError.malformed('time', text));
		}
		const time: TimeOfDay = {hour: Number(match[1]), minute: Number(match[2]), second: Number(match[3])};
		if (!isValidTimeOfDay(time)) {
			return conversionFailed(TypeConversionError.outOfRange('time', text));
		}
		return converted(time);
	}

	/**
	 * Milliseconds since the epoch for calendar fields read in the configured
	 * zone. Sub-millisecond precision is truncated.
	 */
	toEpochMillis(fields: CalendarDate & Partial<DateTimeFields>): number {
		const hour = fields.hour ?? 0;
		const minute = fields.minute ?? 0;
		const second = fields.second ?? 0;
		const microsecond = fields.microsecond ?? 0;
		const date = new Date(0);
		if (this.timestampZone === 'utc') {
			date.setUTCFullYear(fields.year, fields.month - 1, fields.day);
			date.setUTCHours(hour, minute, second, 0);
		} else {
			date.setFullYear(fields.year, fields.month - 1, fields.day);
			date.setHours(hour, minute, second, 0);
		}
		return date.getTime() + Math.trunc(microsecond / 1000);
	}

	private encodeTimestamp(value: Scalar): ConversionResult<string> {
		if (value instanceof Date) {
			const millis = value.getTime();
			return Number.isNaN(millis)
				? conversionFailed(TypeConversionError.malformed('timestamp', describeScalar(value)))
				: converted(String(millis));
		}
		if (typeof value === 'number' || typeof value === 'bigint') {
			return this.encodeInteger(value, 'bigint');
		}
		if (typeof value === 'string') {
			const trimmed = value.trim();
			if (INTEGER_TEXT.test(trimmed)) {
				return this.encodeInteger(trimmed, 'bigint');
			}
			const parsed = Date.parse(trimmed);
			return Number.isNaN(parsed)
				? conversionFailed(TypeConversionError.malformed('timestamp', value))
				: converted(String(parsed));
		}
		if (!hasDateFields(value)) {
			return conversionFailed(TypeConversionError.unencodable('timestamp', describeScalar(value)));
		}

		const fields: CalendarDate & Partial<DateTimeFields> = value;
		const timeValid = isValidTimeOfDay({
			hour: fields.hour ?? 0,
			minute: fields.minute ?? 0,
			second: fields.second ?? 0,
		});
		const microsecondValid = isWithin(fields.microsecond ?? 0, 0, 999_999);
		if (!isValidCalendarDate(fields) || !timeValid || !microsecondValid) {
			return conversionFailed(TypeConversionError.outOfRange('timestamp', describeScalar(value)));
		}

		const millis = this.toEpochMillis(fields);
		if (Number.isNaN(millis)) {
			return conversionFailed(TypeConversionError.outOfRange('timestamp', describeScalar(value)));
		}
		return converted(String(millis));
	}

	private decodeTimestamp(text: string): ConversionResult<DateTimeFields | string> {
		const trimmed = text.trim();
		if (!INTEGER_TEXT.test(trimmed)) {
			return converted(text);
		}

		const millis = Number(trimmed);
		if (Math.abs(millis) > MAX_EPOCH_MS) {
			return conversionFailed(TypeConversionError.outOfRange('timestamp', text));
		}

		const seconds = Math.floor(millis / 1000);
		const remainder = millis - seconds * 1000;
		const date = new Date(seconds * 1000);
		return converted({
			year: date.getUTCFullYear(),
			month: date.getUTCMonth() + 1,
			day: date.getUTCDate(),
			hour: date.getUTCHours(),
			minute: date.getUTCMinutes(),
			second: date.getUTCSeconds(),
			microsecond: remainder * 1000,
		});
	}

	private encodeBoolean(value: Scalar): ConversionResult<string> {
		if (typeof value === 'boolean') return converted(value ? 'true' : 'false');
		if (typeof value === 'number') return converted(value !== 0 ? 'true' : 'false');
		if (typeof value === 'bigint') return converted(value !== 0n ? 'true' : 'false');
		return conversionFailed(TypeConversionError.unencodable('boolean', describeScalar(value)));
	}
}
