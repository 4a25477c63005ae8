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

import { UnsupportedVariantError } from "./errors";
import { Logger } from "./logger";

const logger = Logger.getLogger("Factory");

export const PLATFORMS = ["ios", "android"] as const;

export type Platform = (typeof PLATFORMS)[number];

export const isPlatform = (value: string): value is Platform =>
	PLATFORMS.some((platform) => platform === value);

/**
 * Narrows a raw discriminant to a known platform.
 * @throws {UnsupportedVariantError} for anything outside {@link PLATFORMS}
 */
export function parsePlatform(value: string): Platform {
	if (!isPlatform(value)) {
		throw new UnsupportedVariantError(value, PLATFORMS);
	}
	return value;
}

export interface Button {
	readonly platform: Platform;
	readonly label: string;
	render(): string;
}

export interface Checkbox {
	readonly platform: Platform;
	readonly label: string;
	readonly checked: boolean;
	render(): string;
}

export class IOSButton implements Button {
	readonly platform = "ios";

	constructor(readonly label: string) {}

	render(): string {
		return `Rendering iOS button "${this.label}"`;
	}
}

export class AndroidButton implements Button {
	readonly platform = "android";

	constructor(readonly label: string) {}

	render(): string {
		return `Rendering Android button "${this.label}"`;
	}
}

export class IOSCheckbox implements Checkbox {
	readonly platform = "ios";

	constructor(
		readonly label: string,
		readonly checked: boolean,
	) {}

	render(): string {
		return `Rendering iOS switch "${this.label}" (${this.checked ? "on" : "off"})`;
	}
}

export class AndroidCheckbox implements Checkbox {
	readonly platform = "android";

	constructor(
		readonly label: string,
		readonly checked: boolean,
	) {}

	render(): string {
		return `Rendering Android checkbox "${this.label}" [${this.checked ? "x" : " "}]`;
	}
}

export function assertNever(value: never): never {
	throw new Error(`Unhandled variant: ${String(value)}`);
}

// Factory method: the caller only ever sees the Button capability
export function createButton(platform: string, label = "OK"): Button {
	const variant = parsePlatform(platform);
	logger.debug("Creating button", { platform: variant, label });

	switch (variant) {
		case "ios":
			return new IOSButton(label);
		case "android":
			return new AndroidButton(label);
		default:
			return assertNever(variant);
	}
}
