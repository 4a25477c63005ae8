/**
 * Copyright 2025 Mike Odnis
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import winston from "winston";
import { config } from "./config";

export enum LogLevel {
	DEBUG = "debug",
	INFO = "info",
	WARN = "warn",
	ERROR = "error",
}

export interface LoggerOptions {
	minLevel?: LogLevel;
	includeTimestamp?: boolean;
	/** Replaces the console transport. */
	transports?: winston.LoggerOptions["transports"];
	/** Defaults to true under `NODE_ENV=test`. */
	silent?: boolean;
}

type Meta = Record<string, unknown>;

/**
 * Named logger facade over winston.
 *
 * One instance per name; later `getLogger` calls with the same name return the
 * first instance and ignore their options.
 */
export class Logger {
	private static readonly loggers = new Map<string, Logger>();
	private readonly sink: winston.Logger;

	private constructor(
		readonly name: string,
		options: LoggerOptions,
	) {
		const formats = [
			winston.format.label({ label: name }),
			...(options.includeTimestamp ? [winston.format.timestamp()] : []),
			winston.format.printf(({ level, message, label, timestamp, ...rest }) => {
				const prefix = timestamp ? `${timestamp} ` : "";
				const meta = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : "";
				return `${prefix}[${label}] ${level}: ${message}${meta}`;
			}),
		];

		this.sink = winston.createLogger({
			level: options.minLevel ?? config.LOG_LEVEL,
			silent: options.silent ?? config.NODE_ENV === "test",
			format: winston.format.combine(...formats),
			transports: options.transports ?? [new winston.transports.Console()],
		});
	}

	static getLogger(name: string, options: LoggerOptions = {}): Logger {
		let logger = Logger.loggers.get(name);
		if (!logger) {
			logger = new Logger(name, options);
			Logger.loggers.set(name, logger);
		}
		return logger;
	}

	debug(message: string, meta?: Meta): void {
		this.sink.debug(message, { ...meta });
	}

	info(message: string, meta?: Meta): void {
		this.sink.info(message, { ...meta });
	}

	warn(message: string, meta?: Meta): void {
		this.sink.warn(message, { ...meta });
	}

	error(message: string, error?: unknown, meta?: Meta): void {
		const cause =
			error instanceof Error
				? { error: error.message, errorName: error.name }
				: error === undefined
					? {}
					: { error: String(error) };
		this.sink.error(message, { ...cause, ...meta });
	}

	/** Runs `fn` and logs its duration at debug level, rethrowing failures. */
	async time<T>(label: string, fn: () => Promise<T>): Promise<T> {
		const start = performance.now();
		try {
			return await fn();
		} catch (error) {
			this.error(`${label} failed`, error);
			throw error;
		} finally {
			this.debug(`${label} took ${(performance.now() - start).toFixed(2)}ms`);
		}
	}
}
