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
import {decodeScanPosition, encodeScanPosition} from '@cqlbridge/translation/src/ScanPosition';
import {describe, expect, test} from 'vitest';

describe('ScanPosition', () => {
	test('encodes the row index as 8 big-endian bytes', () => {
		expect([...encodeScanPosition(258)]).toEqual([0, 0, 0, 0, 0, 0, 1, 2]);
		expect([...encodeScanPosition(0)]).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
	});

	test('decodes what it encodes', () => {
		expect(decodeScanPosition(encodeScanPosition(9_007_199_254_740_991))).toBe(9_007_199_254_740_991);
		expect(decodeScanPosition(Uint8Array.from([0, 0, 0, 0, 0, 0, 0, 7]))).toBe(7);
	});

	test('rejects references of the wrong width', () => {
		expect(() => decodeScanPosition(Buffer.alloc(4))).toThrow(TypeConversionError);
	});

	test('rejects indexes outside the safe integer range', () => {
		expect(() => encodeScanPosition(-1)).toThrow(TypeConversionError);
		expect(() => encodeScanPosition(1.5)).toThrow(TypeConversionError);
		expect(() => decodeScanPosition(Buffer.alloc(8, 0xff))).toThrow(TypeConversionError);
	});
});
