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

import {BridgeErrorCodes} from '@cqlbridge/constants/src/ErrorCodes';
import {BridgeError, describeError} from '@cqlbridge/errors/src/BridgeError';

export class ExecutionError extends BridgeError {
	readonly statement: string;

	constructor(statement: string, message: string, options?: {cause?: unknown}) {
		super(BridgeErrorCodes.EXECUTION_FAILED, message, options);
		this.name = 'ExecutionError';
		this.statement = statement;
	}

	static fromDriverError(statement: string, error: unknown): ExecutionError {
		return new ExecutionError(statement, `CQL execution failed: ${describeError(error)}`, {cause: error});
	}
}
