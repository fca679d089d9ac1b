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

type ConnectionErrorCode = typeof BridgeErrorCodes.CONNECTION_FAILED | typeof BridgeErrorCodes.NOT_CONNECTED;

export class ConnectionError extends BridgeError {
	readonly hosts: ReadonlyArray<string>;

	constructor(
		message: string,
		options: {hosts?: ReadonlyArray<string>; code?: ConnectionErrorCode; cause?: unknown} = {},
	) {
		super(options.code ?? BridgeErrorCodes.CONNECTION_FAILED, message, {cause: options.cause});
		this.name = 'ConnectionError';
		this.hosts = options.hosts ?? [];
	}

	static fromDriverError(error: unknown, hosts: ReadonlyArray<string>, port: number): ConnectionError {
		return new ConnectionError(`Unable to connect to ${hosts.join(',')}:${port}: ${describeError(error)}`, {
			hosts,
			cause: error,
		});
	}

	static notConnected(): ConnectionError {
		return new ConnectionError('Connection is not established. Call connect() first.', {
			code: BridgeErrorCodes.NOT_CONNECTED,
		});
	}
}
