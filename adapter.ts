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

import { z } from "zod";
import { InvalidDimensionError } from "./errors";

const dimensionSchema = z.number().finite().nonnegative();

function dimension(name: string, value: number): number {
	const result = dimensionSchema.safeParse(value);
	if (!result.success) {
		throw new InvalidDimensionError(name, value);
	}
	return result.data;
}

// Target capability: anything with a radius can be tested against a round hole
export interface RoundShape {
	readonly radius: number;
}

export class RoundHole {
	readonly radius: number;

	constructor(radius: number) {
		this.radius = dimension("radius", radius);
	}

	fits(peg: RoundShape): boolean {
		return this.radius >= peg.radius;
	}
}

export class RoundPeg implements RoundShape {
	readonly radius: number;

	constructor(radius: number) {
		this.radius = dimension("radius", radius);
	}
}

// Incompatible source: has a width, no radius
export class SquarePeg {
	readonly width: number;

	constructor(width: number) {
		this.width = dimension("width", width);
	}
}

/**
 * Presents a {@link SquarePeg} as a {@link RoundShape}: the radius of the
 * smallest circle enclosing the square.
 */
export class SquarePegAdapter implements RoundShape {
	constructor(private readonly peg: SquarePeg) {}

	get radius(): number {
		return (this.peg.width * Math.SQRT2) / 2;
	}
}
