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

import {SCAN_POSITION_WIDTH} from '@cqlbridge/constants/src/BridgeConstants';
import {TypeConversionError} from '@cqlbridge/errors/src/domains/conversion/TypeConversionError';

const POSITION_TYPE = 'scan_position';

export function encodeScanPosition(index: number): Buffer {
	if (!Number.isSafeInteger(index) || index < 0) {
		throw TypeConversionError.outOfRange(POSITION_TYPE, String(index));
	}
	const ref = Buffer.alloc(SCAN_POSITION_WIDTH);
	ref.writeBigUInt64BE(BigInt(index));
	return ref;
}

export function decodeScanPosition(ref: Uint8Array): number {
	if (ref.byteLength !== SCAN_POSITION_WIDTH) {
		throw TypeConversionError.malformed(POSITION_TYPE, `<${ref.byteLength} bytes>`);
	}
	const index = Buffer.from(ref.buffer, ref.byteOffset, ref.byteLength).readBigUInt64BE();
	if (index > BigInt(Number.MAX_SAFE_INTEGER)) {
		throw TypeConversionError.outOfRange(POSITION_TYPE, index.toString());
	}
	return Number(index);
}
