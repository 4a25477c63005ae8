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

import { CyclicCompositionError, OwnershipConflictError } from "./errors";

export interface Graphic {
	move(dx: number, dy: number): void;
	draw(): string[];
}

export class Dot implements Graphic {
	constructor(
		public x: number,
		public y: number,
	) {}

	move(dx: number, dy: number): void {
		this.x += dx;
		this.y += dy;
	}

	draw(): string[] {
		return [`Dot(${this.x}, ${this.y})`];
	}
}

export class Circle implements Graphic {
	constructor(
		public x: number,
		public y: number,
		public radius: number,
	) {}

	move(dx: number, dy: number): void {
		this.x += dx;
		this.y += dy;
	}

	draw(): string[] {
		return [`Circle(${this.x}, ${this.y}, r=${this.radius})`];
	}
}

// child -> the one composite that currently owns it
const owners = new WeakMap<Graphic, CompoundGraphic>();

/**
 * Ordered group of graphics, itself a graphic. Operations fan out to the
 * children in insertion order, recursing into nested groups.
 */
export class CompoundGraphic implements Graphic {
	private readonly items: Graphic[] = [];

	constructor(...children: Graphic[]) {
		this.add(...children);
	}

	get children(): readonly Graphic[] {
		return [...this.items];
	}

	/**
	 * Appends children. The whole call is rejected if any child would create a
	 * cycle or already belongs to another composite.
	 * @throws {CyclicCompositionError}
	 * @throws {OwnershipConflictError}
	 */
	add(...children: Graphic[]): this {
		for (const child of children) {
			if (child === this || (child instanceof CompoundGraphic && child.contains(this))) {
				throw new CyclicCompositionError();
			}
			const owner = owners.get(child);
			if (owner !== undefined || children.indexOf(child) !== children.lastIndexOf(child)) {
				throw new OwnershipConflictError();
			}
		}
		for (const child of children) {
			owners.set(child, this);
			this.items.push(child);
		}
		return this;
	}

	remove(child: Graphic): boolean {
		const index = this.items.indexOf(child);
		if (index === -1) {
			return false;
		}
		this.items.splice(index, 1);
		owners.delete(child);
		return true;
	}

	/** True when `node` sits anywhere below this composite. */
	contains(node: Graphic): boolean {
		return this.items.some(
			(child) =>
				child === node || (child instanceof CompoundGraphic && child.contains(node)),
		);
	}

	move(dx: number, dy: number): void {
		for (const child of this.items) {
			child.move(dx, dy);
		}
	}

	draw(): string[] {
		return this.items.flatMap((child) => child.draw());
	}
}
