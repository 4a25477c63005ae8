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

import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const configSchema = z.object({
	NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
	LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
	DATABASE_URL: z.string().min(1).default("database://localhost:5432"),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Parses configuration out of an environment map.
 * @throws {z.ZodError} when a variable is present but invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv): Config {
	return configSchema.parse({
		NODE_ENV: env.NODE_ENV || undefined,
		LOG_LEVEL: env.LOG_LEVEL || undefined,
		DATABASE_URL: env.DATABASE_URL || undefined,
	});
}

export const config: Config = loadConfig(process.env);
