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

import { describe, expect, it } from "vitest";
import {
	AlreadyBuiltError,
	CyclicCompositionError,
	InvalidDimensionError,
	isPatternError,
	PatternError,
	UnsupportedVariantError,
} from "./errors";

describe("PatternError", () => {
	it("keeps subclass identity and code", () => {
		const error = new AlreadyBuiltError("Burger");
		expect(error).toBeInstanceOf(PatternError);
		expect(error).toBeInstanceOf(Error);
		expect(error.name).toBe("AlreadyBuiltError");
		expect(error.code).toBe("ALREADY_BUILT");
		expect(error.toString()).toBe(
			"AlreadyBuiltError [ALREADY_BUILT]: Burger builder was already finalized",
		);
	});

	it("carries structured details", () => {
		expect(new UnsupportedVariantError("x", ["ios"]).details).toEqual({
			variant: "x",
			supported: ["ios"],
		});
		expect(new InvalidDimensionError("width", -2).message).toBe(
			"width is out of range (got -2)",
		);
	});

	it("narrows unknown values", () => {
		expect(isPatternError(new CyclicCompositionError())).toBe(true);
		expect(isPatternError(new Error("plain"))).toBe(false);
		expect(isPatternError("CYCLIC_COMPOSITION")).toBe(false);
	});
});
