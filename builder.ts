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

import { AlreadyBuiltError, UninitializedAttributeError } from "./errors";
import { Logger } from "./logger";

const logger = Logger.getLogger("BurgerBuilder");

// Stacking order, bottom to top
export const INGREDIENT_SLOTS = [
	"buns",
	"patty",
	"cheese",
	"lettuce",
	"tomato",
	"sauce",
] as const;

export type IngredientSlot = (typeof INGREDIENT_SLOTS)[number];

export type BurgerRecipe = Partial<Record<IngredientSlot, string>>;

/**
 * Finished burger. Frozen on construction; unset slots stay `undefined`.
 */
export class Burger {
	readonly buns?: string;
	readonly patty?: string;
	readonly cheese?: string;
	readonly lettuce?: string;
	readonly tomato?: string;
	readonly sauce?: string;

	constructor(recipe: BurgerRecipe = {}) {
		this.buns = recipe.buns;
		this.patty = recipe.patty;
		this.cheese = recipe.cheese;
		this.lettuce = recipe.lettuce;
		this.tomato = recipe.tomato;
		this.sauce = recipe.sauce;
		Object.freeze(this);
	}

	get ingredients(): readonly string[] {
		return INGREDIENT_SLOTS.flatMap((slot) => {
			const value = this[slot];
			return value === undefined ? [] : [value];
		});
	}

	require(slot: IngredientSlot): string {
		const value = this[slot];
		if (value === undefined) {
			throw new UninitializedAttributeError(slot);
		}
		return value;
	}

	describe(): string {
		const parts = this.ingredients;
		return parts.length ? `Burger with ${parts.join(", ")}` : "Empty burger";
	}
}

/**
 * Single-use fluent builder. After {@link build} every call, including a
 * second `build()`, throws {@link AlreadyBuiltError}.
 */
export class BurgerBuilder {
	private draft: BurgerRecipe = {};
	private built = false;

	get isBuilt(): boolean {
		return this.built;
	}

	buns(value: string): this {
		return this.set("buns", value);
	}

	patty(value: string): this {
		return this.set("patty", value);
	}

	cheese(value: string): this {
		return this.set("cheese", value);
	}

	lettuce(value: string): this {
		return this.set("lettuce", value);
	}

	tomato(value: string): this {
		return this.set("tomato", value);
	}

	sauce(value: string): this {
		return this.set("sauce", value);
	}

	build(): Burger {
		this.ensureOpen();
		this.built = true;
		const burger = new Burger(this.draft);
		logger.debug("Burger built", { ingredients: burger.ingredients });
		return burger;
	}

	private set(slot: IngredientSlot, value: string): this {
		this.ensureOpen();
		this.draft[slot] = value;
		return this;
	}

	private ensureOpen(): void {
		if (this.built) {
			throw new AlreadyBuiltError("Burger");
		}
	}
}
