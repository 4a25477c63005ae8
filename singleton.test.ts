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

import { describe, expect, it, vi } from "vitest";

// Each test gets a fresh module, hence a fresh process-wide slot
async function freshDatabase() {
	vi.resetModules();
	const { Database } = await import("./singleton");
	return Database;
}

describe("Database", () => {
	it("constructs lazily on first access", async () => {
		const Database = await freshDatabase();
		expect(Database.constructionCount).toBe(0);

		const first = Database.getInstance();
		const second = Database.getInstance();

		expect(first).toBe(second);
		expect(Database.constructionCount).toBe(1);
	});

	it("constructs exactly once under concurrent first connects", async () => {
		const Database = await freshDatabase();

		const instances = await Promise.all(
			Array.from({ length: 25 }, () => Database.connect()),
		);

		expect(Database.constructionCount).toBe(1);
		expect(new Set(instances).size).toBe(1);
		expect(instances[0].isConnected).toBe(true);
		expect(instances[0]).toBe(Database.getInstance());
	});

	it("reuses an instance created before connecting", async () => {
		const Database = await freshDatabase();
		const early = Database.getInstance();
		expect(early.isConnected).toBe(false);

		await expect(Database.connect()).resolves.toBe(early);
		expect(early.isConnected).toBe(true);
		expect(Database.constructionCount).toBe(1);
	});

	it("queries against the configured connection string", async () => {
		const Database = await freshDatabase();
		const { config } = await import("./config");
		const db = Database.getInstance();

		expect(db.connectionString).toBe(config.DATABASE_URL);
		expect(db.query("SELECT 1")).toBe(`Executing: SELECT 1 on ${config.DATABASE_URL}`);
	});

	it("lets callers retry after a failed connect", async () => {
		const Database = await freshDatabase();
		const { Logger } = await import("./logger");
		vi.spyOn(Logger.getLogger("Database"), "time").mockRejectedValueOnce(
			new Error("connection refused"),
		);

		await expect(Database.connect()).rejects.toThrow("connection refused");
		const db = await Database.connect();

		expect(db.isConnected).toBe(true);
		expect(Database.constructionCount).toBe(1);
	});
});
