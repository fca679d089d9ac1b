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

export const BridgeErrorCodes = {
	CONNECTION_FAILED: 'connection_failed',
	NOT_CONNECTED: 'not_connected',
	EXECUTION_FAILED: 'execution_failed',
	TYPE_CONVERSION_FAILED: 'type_conversion_failed',
	UNSUPPORTED_OPERATION: 'unsupported_operation',
	INVALID_CONFIGURATION: 'invalid_configuration',
} as const;

export type BridgeErrorCode = (typeof BridgeErrorCodes)[keyof typeof BridgeErrorCodes];

export const ConversionFailureReasons = {
	OUT_OF_RANGE: 'out_of_range',
	MALFORMED: 'malformed',
	UNENCODABLE: 'unencodable',
} as const;

export type ConversionFailureReason = (typeof ConversionFailureReasons)[keyof typeof ConversionFailureReasons];
