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

import { config } from "./config";
import { Logger } from "./logger";

const logger = Logger.getLogger("Database");

/**
 * Process-wide database handle.
 *
 * `getInstance()` constructs lazily on first access. `connect()` additionally
 * opens the connection; concurrent first callers share one in-flight promise,
 * so construction and opening each happen exactly once.
 */
export class Database {
	private static instance: Database | undefined;
	private static opening: Promise<Database> | undefined;
	private static constructions = 0;

	private connected = false;

	private constructor(readonly connectionString: string) {
		Database.constructions += 1;
		logger.info("Database instance created", { connectionString });
	}

	static get constructionCount(): number {
		return Database.constructions;
	}

	static getInstance(): Database {
		Database.instance ??= new Database(config.DATABASE_URL);
		return Database.instance;
	}

	static connect(): Promise<Database> {
		// Assigned before the first await so every racing caller sees it.
		// A failed open is forgotten so the next caller can retry.
		Database.opening ??= Database.getInstance()
			.open()
			.catch((error: unknown) => {
				Database.opening = undefined;
				throw error;
			});
		return Database.opening;
	}

	get isConnected(): boolean {
		return this.connected;
	}

	query(sql: string): string {
		return `Executing: ${sql} on ${this.connectionString}`;
	}

	private async open(): Promise<Database> {
		await logger.time("Open connection", async () => {
			await new Promise<void>((resolve) => setImmediate(resolve));
			this.connected = true;
		});
		logger.info("Database connected", {
			connectionString: this.connectionString,
		});
		return this;
	}
}
