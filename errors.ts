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

export type PatternErrorCode =
	| "UNSUPPORTED_VARIANT"
	| "ALREADY_BUILT"
	| "CYCLIC_COMPOSITION"
	| "OWNERSHIP_CONFLICT"
	| "UNINITIALIZED_ATTRIBUTE"
	| "INVALID_DIMENSION";

/**
 * Base class for every error raised by the pattern components.
 *
 * All of them are local and recoverable: the caller fixes the input and tries again.
 */
export class PatternError extends Error {
	override name = "PatternError";
	readonly code: PatternErrorCode;
	readonly details?: Record<string, unknown>;

	constructor(
		code: PatternErrorCode,
		message: string,
		details?: Record<string, unknown>,
	) {
		super(message);
		this.code = code;
		this.details = details;
	}

	toString() {
		return `${this.name} [${this.code}]: ${this.message}`;
	}
}

export class UnsupportedVariantError extends PatternError {
	override name = "UnsupportedVariantError";

	constructor(
		readonly variant: string,
		readonly supported: readonly string[],
	) {
		super(
			"UNSUPPORTED_VARIANT",
			`Unsupported variant "${variant}" (expected one of: ${supported.join(", ")})`,
			{ variant, supported },
		);
	}
}

export class AlreadyBuiltError extends PatternError {
	override name = "AlreadyBuiltError";

	constructor(target: string) {
		super("ALREADY_BUILT", `${target} builder was already finalized`, {
			target,
		});
	}
}

export class CyclicCompositionError extends PatternError {
	override name = "CyclicCompositionError";

	constructor() {
		super(
			"CYCLIC_COMPOSITION",
			"A composite cannot contain itself, directly or through a descendant",
		);
	}
}

export class OwnershipConflictError extends PatternError {
	override name = "OwnershipConflictError";

	constructor() {
		super(
			"OWNERSHIP_CONFLICT",
			"Graphic already belongs to a composite; remove it there first",
		);
	}
}

export class UninitializedAttributeError extends PatternError {
	override name = "UninitializedAttributeError";

	constructor(readonly attribute: string) {
		super("UNINITIALIZED_ATTRIBUTE", `Attribute "${attribute}" was never set`, {
			attribute,
		});
	}
}

export class InvalidDimensionError extends PatternError {
	override name = "InvalidDimensionError";

	constructor(
		readonly dimension: string,
		readonly value: number,
	) {
		super(
			"INVALID_DIMENSION",
			`${dimension} is out of range (got ${value})`,
			{ dimension, value },
		);
	}
}

export const isPatternError = (value: unknown): value is PatternError =>
	value instanceof PatternError;
