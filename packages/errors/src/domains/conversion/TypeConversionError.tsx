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

import {
	BridgeErrorCodes,
	type ConversionFailureReason,
	ConversionFailureReasons,
} from '@cqlbridge/constants/src/ErrorCodes';
import {BridgeError} from '@cqlbridge/errors/src/BridgeError';

interface TypeConversionErrorDetails {
	reason: ConversionFailureReason;
	logicalType: string;
	input: string;
	column?: string;
}

export class TypeConversionError extends BridgeError {
	readonly reason: ConversionFailureReason;
	readonly logicalType: string;
	readonly input: string;
	readonly column: string | undefined;

	constructor(details: TypeConversionErrorDetails, message?: string) {
		super(BridgeErrorCodes.TYPE_CONVERSION_FAILED, message ?? TypeConversionError.describe(details));
		this.name = 'TypeConversionError';
		this.reason = details.reason;
		this.logicalType = details.logicalType;
		this.input = details.input;
		this.column = details.column;
	}

	static outOfRange(logicalType: string, input: string): TypeConversionError {
		return new TypeConversionError({reason: ConversionFailureReasons.OUT_OF_RANGE, logicalType, input});
	}

	static malformed(logicalType: string, input: string): TypeConversionError {
		return new TypeConversionError({reason: ConversionFailureReasons.MALFORMED, logicalType, input});
	}

	static unencodable(logicalType: string, input: string): TypeConversionError {
		return new TypeConversionError({reason: ConversionFailureReasons.UNENCODABLE, logicalType, input});
	}

	forColumn(column: string): TypeConversionError {
		return new TypeConversionError({
			reason: this.reason,
			logicalType: this.logicalType,
			input: this.input,
			column,
		});
	}

	private static describe(details: TypeConversionErrorDetails): string {
		const target = details.column ? `column "${details.column}" (${details.logicalType})` : details.logicalType;
		const shown = details.input.length > 64 ? `${details.input.slice(0, 64)}...` : details.input;
		switch (details.reason) {
			case ConversionFailureReasons.OUT_OF_RANGE:
				return `Value ${shown} is out of range for ${target}`;
			case ConversionFailureReasons.MALFORMED:
				return `Cannot parse "${shown}" as ${target}`;
			case ConversionFailureReasons.UNENCODABLE:
				return `Cannot encode ${shown} as ${target}`;
			default: {
				const _exhaustive: never = details.reason;
				return _exhaustive;
			}
		}
	}
}
