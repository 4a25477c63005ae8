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

export * from "./errors";
export { Logger, LogLevel, type LoggerOptions } from "./logger";
export { config, loadConfig, type Config } from "./config";

export * as factory from "./factory";
export * as abstractFactory from "./abstract-factory";
export * as builder from "./builder";
export * as prototype from "./prototype";
export * as singleton from "./singleton";
export * as adapter from "./adapter";
export * as bridge from "./bridge";
export * as composite from "./composite";
export * as proxy from "./proxy";
